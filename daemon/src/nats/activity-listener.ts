/**
 * NATS activity listener
 *
 * Every message on the activity subject re-arms the idle monitor. Status
 * requests are answered with the monitor snapshot.
 */

import { ActivitySubjects, encodeMessage, tryDecodeMessage } from '@idlestop/shared';
import type { MonitorServiceLayer } from '../api/index.js';

/**
 * Message shape the listener reads
 */
export interface ListenerMessage {
  data: Uint8Array;
  respond(data?: Uint8Array): boolean;
}

/**
 * The part of a NatsConnection the listener needs
 */
export interface ListenerConnection {
  subscribe(
    subject: string,
    opts: { callback: (err: Error | null, msg: ListenerMessage) => void },
  ): { unsubscribe(): void };
}

export interface ActivityListener {
  /** Unsubscribe from activity and status subjects */
  stop(): void;
}

/**
 * Source label carried by a payload, falling back to 'nats'
 */
export function sourceOf(payload: unknown): string {
  if (
    typeof payload === 'object' &&
    payload !== null &&
    'source' in payload &&
    typeof payload.source === 'string' &&
    payload.source.trim() !== ''
  ) {
    return payload.source.trim();
  }
  return 'nats';
}

/**
 * Subscribe the monitor to activity reports in a namespace
 */
export function startActivityListener(
  nc: ListenerConnection,
  namespace: string,
  service: MonitorServiceLayer,
): ActivityListener {
  const activitySubject = ActivitySubjects.activity(namespace);
  const statusSubject = ActivitySubjects.status(namespace);

  const activitySub = nc.subscribe(activitySubject, {
    callback: (err, msg) => {
      if (err) {
        console.error(`Activity subscription error on ${activitySubject}:`, err.message);
        return;
      }
      // Any message counts, even one that is not JSON
      service.recordActivity(sourceOf(tryDecodeMessage<unknown>(msg.data)));
    },
  });

  const statusSub = nc.subscribe(statusSubject, {
    callback: (err, msg) => {
      if (err) {
        console.error(`Status subscription error on ${statusSubject}:`, err.message);
        return;
      }
      msg.respond(encodeMessage(service.getStatus()));
    },
  });

  console.log(`  Listening for activity on ${activitySubject}`);

  return {
    stop: () => {
      activitySub.unsubscribe();
      statusSub.unsubscribe();
    },
  };
}
