/**
 * Lifecycle state of an idle monitor
 *
 * - waiting: no activity recorded yet, no watcher
 * - watching: watcher running, idle clock reset on each activity
 * - terminated: idle window exceeded, process halt requested
 * - stopped: watcher cancelled without halting
 */
export type MonitorState = 'waiting' | 'watching' | 'terminated' | 'stopped';

/**
 * A single reported unit of activity
 */
export interface ActivityEvent {
  /** Event identifier */
  id: string;

  /** Channel the activity arrived on (http, nats, startup, ...) */
  source: string;

  /** ISO timestamp when the activity was reported */
  timestamp: string;
}

/**
 * Snapshot of an idle monitor
 */
export interface MonitorStatus {
  state: MonitorState;

  /** Configured idle window (ms) */
  shutdownTimeMs: number;

  /** Watcher poll interval (ms) */
  pollIntervalMs: number;

  /** Wall-clock time of the last activity, for display */
  lastActivityAt: string | null;

  /** Source label of the last activity */
  lastActivitySource: string | null;

  /** Time since the last activity (ms) */
  idleForMs: number | null;

  /** Time left before the window is exceeded (ms) */
  remainingMs: number | null;

  /** Number of activities recorded */
  activityCount: number;

  /** Whether the background watcher is running */
  watcherRunning: boolean;
}

/**
 * Emitted when the idle window has been exceeded
 */
export interface IdleShutdownEvent {
  /** How long the process has been idle (ms) */
  idleDurationMs: number;

  /** Configured idle window (ms) */
  shutdownTimeMs: number;

  /** Wall-clock time of the last activity */
  lastActivityAt: string;

  /** Timestamp when the shutdown was triggered */
  detectedAt: string;
}

/**
 * Body accepted by POST /api/activity
 */
export interface ActivityRequest {
  source?: string;
}

/**
 * Response of POST /api/activity
 */
export interface ActivityResponse {
  event: ActivityEvent;
  status: MonitorStatus;
}
