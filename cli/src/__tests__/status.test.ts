import { describe, it, expect, beforeAll } from 'vitest';
import chalk from 'chalk';
import type { MonitorStatus } from '@idlestop/shared';
import { formatStatus } from '../commands/status.js';

describe('formatStatus', () => {
  const now = new Date('2026-01-01T00:00:12.000Z');
  const status: MonitorStatus = {
    state: 'watching',
    shutdownTimeMs: 300000,
    pollIntervalMs: 5000,
    lastActivityAt: '2026-01-01T00:00:00.000Z',
    lastActivitySource: 'http',
    idleForMs: 12000,
    remainingMs: 288000,
    activityCount: 3,
    watcherRunning: true,
  };

  beforeAll(() => {
    chalk.level = 0;
  });

  it('should render every field', () => {
    expect(formatStatus(status, now).split('\n')).toEqual([
      '  State         : watching',
      '  Shutdown After: 5m 0s',
      '  Poll Interval : 5s',
      '  Last Activity : 12s ago (http)',
      '  Idle For      : 12s',
      '  Remaining     : 4m 48s',
      '  Activities    : 3',
    ]);
  });

  it('should say when no activity has been seen', () => {
    const waiting: MonitorStatus = {
      ...status,
      state: 'waiting',
      lastActivityAt: null,
      lastActivitySource: null,
      idleForMs: null,
      remainingMs: null,
      activityCount: 0,
      watcherRunning: false,
    };

    const lines = formatStatus(waiting, now).split('\n');
    expect(lines).toContain('  Last Activity : none yet');
    expect(lines).toContain('  Remaining     : N/A');
  });
});
