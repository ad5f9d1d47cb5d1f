/**
 * Output formatting utilities
 * Handles human-readable and JSON output with colors
 */

import chalk from 'chalk';
import type { MonitorState } from '@idlestop/shared';

export interface OutputOptions {
  json?: boolean;
  quiet?: boolean;
}

/**
 * Print output as-is or as JSON
 */
export function output(data: unknown, options: OutputOptions = {}): void {
  if (options.json) {
    console.log(JSON.stringify(data, null, 2));
  } else if (!options.quiet) {
    console.log(data);
  }
}

/**
 * Print success message
 */
export function success(message: string, options: OutputOptions = {}): void {
  if (options.json) {
    console.log(JSON.stringify({ success: true, message }));
  } else if (!options.quiet) {
    console.log(chalk.green('✓'), message);
  }
}

/**
 * Print error message
 */
export function error(message: string, options: OutputOptions = {}): void {
  if (options.json) {
    console.error(JSON.stringify({ success: false, error: message }));
  } else {
    console.error(chalk.red('✗'), message);
  }
}

/**
 * Print warning message
 */
export function warning(message: string, options: OutputOptions = {}): void {
  if (options.json) {
    console.warn(JSON.stringify({ warning: message }));
  } else if (!options.quiet) {
    console.warn(chalk.yellow('⚠'), message);
  }
}

/**
 * Print info message
 */
export function info(message: string, options: OutputOptions = {}): void {
  if (options.json) {
    console.log(JSON.stringify({ info: message }));
  } else if (!options.quiet) {
    console.log(chalk.blue('ℹ'), message);
  }
}

/**
 * Message of a caught value
 */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * Format a timestamp relative to now
 */
export function formatTimestamp(iso: string | null | undefined, now = new Date()): string {
  if (!iso) return 'N/A';

  const date = new Date(iso);
  const diffSec = Math.floor((now.getTime() - date.getTime()) / 1000);
  const diffMin = Math.floor(diffSec / 60);
  const diffHour = Math.floor(diffMin / 60);

  if (diffSec < 60) return `${diffSec}s ago`;
  if (diffMin < 60) return `${diffMin}m ago`;
  if (diffHour < 24) return `${diffHour}h ago`;

  return date.toLocaleString();
}

/**
 * Format duration in milliseconds to human readable
 */
export function formatDuration(ms: number | null | undefined): string {
  if (ms === null || ms === undefined) return 'N/A';

  const sec = Math.floor(ms / 1000);
  const min = Math.floor(sec / 60);
  const hour = Math.floor(min / 60);

  if (sec < 60) return `${sec}s`;
  if (min < 60) return `${min}m ${sec % 60}s`;
  return `${hour}h ${min % 60}m`;
}

/**
 * Color monitor state
 */
export function colorState(state: MonitorState): string {
  switch (state) {
    case 'watching':
      return chalk.green(state);
    case 'waiting':
      return chalk.gray(state);
    case 'stopped':
      return chalk.yellow(state);
    case 'terminated':
      return chalk.red(state);
  }
}

/**
 * Format key-value pairs
 */
export function formatKeyValue(data: Record<string, string | number>): string {
  const maxKeyLength = Math.max(...Object.keys(data).map((k) => k.length));
  return Object.entries(data)
    .map(([key, value]) => {
      const paddedKey = key.padEnd(maxKeyLength);
      return `  ${chalk.cyan(paddedKey)}: ${value}`;
    })
    .join('\n');
}
