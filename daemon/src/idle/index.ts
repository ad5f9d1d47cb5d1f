/**
 * Idle shutdown module
 * Tracks activity and halts the process on idle timeout
 */

export { IdleMonitor, createIdleMonitor, monotonicClock, hardExit } from './monitor.js';
export type { IdleMonitorConfig, IdleMonitorDeps, Clock, Terminator } from './monitor.js';
