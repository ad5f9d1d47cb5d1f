/**
 * End-to-end activity reporting over NATS
 *
 * These tests require a running NATS server.
 * Run with: RUN_INTEGRATION=true NATS_URL=nats://localhost:4222 npm run test:integration
 */

import { describe, it, expect, beforeAll, afterAll, vi } from 'vitest';
import type { ConnectedClient, MonitorStatus } from '@idlestop/shared';
import {
  ActivitySubjects,
  createNATSClient,
  decodeMessage,
  encodeMessage,
} from '@idlestop/shared';
import { IdleMonitor } from '../../daemon/src/idle/index.js';
import { createMonitorServiceLayer } from '../../daemon/src/service.js';
import { startActivityListener, type ActivityListener } from '../../daemon/src/nats/index.js';

const NATS_URL = process.env.NATS_URL || 'nats://localhost:4222';
const RUN_INTEGRATION = process.env.RUN_INTEGRATION === 'true';

describe.skipIf(!RUN_INTEGRATION)('Activity over NATS', () => {
  let client: ConnectedClient;
  let monitor: IdleMonitor;
  let listener: ActivityListener;
  const terminate = vi.fn();
  const namespace = `test-${Date.now()}`;

  beforeAll(async () => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    client = await createNATSClient({ url: NATS_URL, name: 'idlestop-integration' });
    monitor = new IdleMonitor({ shutdownTimeMs: 60000 }, { terminate });
    listener = startActivityListener(client.nc, namespace, createMonitorServiceLayer(monitor));
    await client.nc.flush();
  });

  afterAll(async () => {
    listener.stop();
    monitor.stop();
    await client.close();
    vi.restoreAllMocks();
  });

  it('should arm the monitor on a published activity', async () => {
    client.nc.publish(ActivitySubjects.activity(namespace), encodeMessage({ source: 'integration' }));
    await client.nc.flush();
    await vi.waitFor(() => {
      expect(monitor.getStatus().activityCount).toBe(1);
    });

    expect(monitor.getStatus()).toMatchObject({
      state: 'watching',
      lastActivitySource: 'integration',
    });
  });

  it('should answer status requests', async () => {
    const reply = await client.nc.request(ActivitySubjects.status(namespace), undefined, { timeout: 5000 });
    const status = decodeMessage<MonitorStatus>(reply.data);

    expect(status.shutdownTimeMs).toBe(60000);
    expect(status.activityCount).toBe(1);
    expect(terminate).not.toHaveBeenCalled();
  });
});
