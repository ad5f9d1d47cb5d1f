/**
 * Idle monitor
 *
 * Tracks the time of the last reported activity and halts the process once
 * no activity has been reported for the configured window.
 */

import { EventEmitter } from 'events';
import type { IdleShutdownEvent, MonitorState, MonitorStatus } from '@idlestop/shared';
import { DEFAULT_POLL_INTERVAL_MS, DEFAULT_SHUTDOWN_TIME_SECONDS } from '@idlestop/shared';

export interface IdleMonitorConfig {
  /** Idle window in milliseconds (default: 300000 = 5 minutes) */
  shutdownTimeMs?: number;

  /** How often the watcher checks the idle window in milliseconds (default: 5000) */
  pollIntervalMs?: number;
}

/**
 * Monotonic time source in milliseconds
 */
export type Clock = () => number;

/**
 * Called once the idle window is exceeded. Expected not to return control
 * to the monitor in production.
 */
export type Terminator = (event: IdleShutdownEvent) => void;

export interface IdleMonitorDeps {
  clock?: Clock;
  terminate?: Terminator;
}

export const monotonicClock: Clock = () => performance.now();

/**
 * Halt the process right away.
 *
 * Pending timers, open sockets and in-flight requests are abandoned; only
 * synchronous 'exit' listeners run. Idle shutdown is a normal outcome, so the
 * exit code is 0.
 */
export const hardExit: Terminator = () => {
  process.exit(0);
};

function seconds(ms: number): string {
  return `${Math.round(ms / 1000)}s`;
}

/**
 * Idle monitor for a single process
 *
 * The hosting application owns one instance and calls recordActivity() on
 * every inbound event. The first call starts the watcher; later calls only
 * move the idle clock forward.
 *
 * Events:
 * - 'shutdown': Emitted right before the terminator runs (IdleShutdownEvent).
 *   A listener that throws is logged; the terminator still runs.
 */
export class IdleMonitor extends EventEmitter {
  private config: Required<IdleMonitorConfig>;
  private clock: Clock;
  private terminator: Terminator;
  private state: MonitorState = 'waiting';
  private lastActivity: number | null = null;
  private lastActivityAt: Date | null = null;
  private lastActivitySource: string | null = null;
  private activityCount = 0;
  private watcher: NodeJS.Timeout | null = null;

  constructor(config?: IdleMonitorConfig, deps?: IdleMonitorDeps) {
    super();
    this.config = {
      shutdownTimeMs: config?.shutdownTimeMs ?? DEFAULT_SHUTDOWN_TIME_SECONDS * 1000,
      pollIntervalMs: config?.pollIntervalMs ?? DEFAULT_POLL_INTERVAL_MS,
    };
    this.clock = deps?.clock ?? monotonicClock;
    this.terminator = deps?.terminate ?? hardExit;

    // A zero window halts on the first poll after any activity
    if (this.config.shutdownTimeMs < 0) {
      throw new RangeError(`shutdownTimeMs must not be negative, got ${this.config.shutdownTimeMs}`);
    }
    if (this.config.pollIntervalMs <= 0) {
      throw new RangeError(`pollIntervalMs must be positive, got ${this.config.pollIntervalMs}`);
    }
  }

  /**
   * Record a unit of activity and (re)arm the idle timer
   *
   * @param source Label for the channel the activity came from
   * @returns false when the monitor is stopped or terminated and the activity was ignored
   */
  recordActivity(source = 'unknown'): boolean {
    if (!this.isAccepting()) {
      return false;
    }

    const now = this.clock();
    // Never move the idle clock backwards
    this.lastActivity = this.lastActivity === null ? now : Math.max(this.lastActivity, now);
    this.lastActivityAt = new Date();
    this.lastActivitySource = source;
    this.activityCount++;

    console.log(
      `Idle timer armed by ${source}: shutting down after ${seconds(this.config.shutdownTimeMs)} without activity`,
    );

    if (!this.watcher) {
      this.state = 'watching';
      this.watcher = setInterval(() => {
        this.check();
      }, this.config.pollIntervalMs);
    }

    return true;
  }

  /**
   * Whether recordActivity() still has an effect
   */
  isAccepting(): boolean {
    return this.state === 'waiting' || this.state === 'watching';
  }

  /**
   * Cancel the watcher without halting the process
   *
   * A stopped monitor ignores further activity.
   */
  stop(): void {
    this.clearWatcher();
    if (this.state !== 'terminated') {
      this.state = 'stopped';
    }
  }

  /**
   * Current monitor state
   */
  getState(): MonitorState {
    return this.state;
  }

  /**
   * Get a status snapshot
   */
  getStatus(): MonitorStatus {
    const idleForMs = this.lastActivity === null
      ? null
      : Math.max(0, this.clock() - this.lastActivity);

    return {
      state: this.state,
      shutdownTimeMs: this.config.shutdownTimeMs,
      pollIntervalMs: this.config.pollIntervalMs,
      lastActivityAt: this.lastActivityAt?.toISOString() ?? null,
      lastActivitySource: this.lastActivitySource,
      idleForMs,
      remainingMs: idleForMs === null ? null : Math.max(0, this.config.shutdownTimeMs - idleForMs),
      activityCount: this.activityCount,
      watcherRunning: this.watcher !== null,
    };
  }

  /**
   * Compare idle time against the window, terminating once it is reached
   */
  private check(): void {
    if (this.lastActivity === null) {
      return;
    }

    const idleDuration = this.clock() - this.lastActivity;
    if (idleDuration >= this.config.shutdownTimeMs) {
      this.terminate(idleDuration);
    }
  }

  private terminate(idleDuration: number): void {
    this.clearWatcher();
    this.state = 'terminated';

    const event: IdleShutdownEvent = {
      idleDurationMs: idleDuration,
      shutdownTimeMs: this.config.shutdownTimeMs,
      lastActivityAt: this.lastActivityAt?.toISOString() ?? new Date().toISOString(),
      detectedAt: new Date().toISOString(),
    };

    console.log(
      `No activity for ${seconds(idleDuration)} (limit ${seconds(this.config.shutdownTimeMs)}), shutting down now`,
    );

    try {
      this.emit('shutdown', event);
    } catch (error) {
      console.error('Shutdown listener failed:', error);
    } finally {
      this.terminator(event);
    }
  }

  private clearWatcher(): void {
    if (this.watcher) {
      clearInterval(this.watcher);
      this.watcher = null;
    }
  }
}

/**
 * Create an idle monitor instance
 */
export function createIdleMonitor(config?: IdleMonitorConfig, deps?: IdleMonitorDeps): IdleMonitor {
  return new IdleMonitor(config, deps);
}
