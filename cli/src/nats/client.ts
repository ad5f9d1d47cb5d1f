/**
 * NATS helpers for the CLI
 */

import { v4 as uuidv4 } from 'uuid';
import type { ActivityEvent, CLIConfiguration, MonitorStatus } from '@idlestop/shared';
import {
  ActivitySubjects,
  createNATSClient,
  decodeMessage,
  encodeMessage,
} from '@idlestop/shared';

async function connect(config: CLIConfiguration) {
  return createNATSClient({
    url: config.natsUrl,
    name: 'idlestop-cli',
    reconnect: { maxAttempts: 0, delayMs: 1000 },
  });
}

/**
 * Publish one activity event on the namespace's activity subject
 */
export async function publishActivity(
  config: CLIConfiguration,
  source: string,
): Promise<ActivityEvent> {
  const client = await connect(config);
  try {
    const event: ActivityEvent = {
      id: uuidv4(),
      source,
      timestamp: new Date().toISOString(),
    };
    client.nc.publish(ActivitySubjects.activity(config.namespace), encodeMessage(event));
    return event;
  } finally {
    // drain flushes the publish before closing
    await client.close();
  }
}

/**
 * Ask the daemon for its status over NATS request/reply
 */
export async function requestStatus(
  config: CLIConfiguration,
  timeoutMs = 5000,
): Promise<MonitorStatus> {
  const client = await connect(config);
  try {
    const reply = await client.nc.request(
      ActivitySubjects.status(config.namespace),
      undefined,
      { timeout: timeoutMs },
    );
    return decodeMessage<MonitorStatus>(reply.data);
  } finally {
    await client.close();
  }
}
