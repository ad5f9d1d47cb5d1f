/**
 * Tests for output formatting utilities
 */

import { describe, it, expect, beforeAll, beforeEach, afterEach } from 'vitest';
import chalk from 'chalk';
import {
  output,
  success,
  error,
  warning,
  info,
  errorMessage,
  formatTimestamp,
  formatDuration,
  colorState,
  formatKeyValue,
} from '../utils/output.js';

describe('Output Utilities', () => {
  let consoleLogs: string[];
  let consoleErrors: string[];
  let consoleWarns: string[];

  const originalLog = console.log;
  const originalError = console.error;
  const originalWarn = console.warn;

  beforeAll(() => {
    chalk.level = 0;
  });

  beforeEach(() => {
    consoleLogs = [];
    consoleErrors = [];
    consoleWarns = [];
    console.log = (...args: unknown[]) => consoleLogs.push(args.join(' '));
    console.error = (...args: unknown[]) => consoleErrors.push(args.join(' '));
    console.warn = (...args: unknown[]) => consoleWarns.push(args.join(' '));
  });

  afterEach(() => {
    console.log = originalLog;
    console.error = originalError;
    console.warn = originalWarn;
  });

  describe('output', () => {
    it('should output data directly', () => {
      output('idle');
      expect(consoleLogs).toEqual(['idle']);
    });

    it('should output as JSON when json option is true', () => {
      output({ state: 'watching' }, { json: true });
      expect(consoleLogs[0]).toBe(JSON.stringify({ state: 'watching' }, null, 2));
    });

    it('should not output when quiet option is true', () => {
      output('idle', { quiet: true });
      expect(consoleLogs).toHaveLength(0);
    });
  });

  describe('messages', () => {
    it('should print success with a checkmark', () => {
      success('Activity recorded');
      expect(consoleLogs).toEqual(['✓ Activity recorded']);
    });

    it('should print success as JSON', () => {
      success('Activity recorded', { json: true });
      expect(JSON.parse(consoleLogs[0] ?? '')).toEqual({ success: true, message: 'Activity recorded' });
    });

    it('should print errors even when quiet', () => {
      error('Connection refused', { quiet: true });
      expect(consoleErrors).toEqual(['✗ Connection refused']);
    });

    it('should print warnings and info', () => {
      warning('No token configured');
      info('Using default namespace');
      expect(consoleWarns).toEqual(['⚠ No token configured']);
      expect(consoleLogs).toEqual(['ℹ Using default namespace']);
    });
  });
});

describe('errorMessage', () => {
  it('should use the message of an Error', () => {
    expect(errorMessage(new Error('boom'))).toBe('boom');
  });

  it('should stringify anything else', () => {
    expect(errorMessage('boom')).toBe('boom');
  });
});

describe('formatDuration', () => {
  it('should format seconds, minutes and hours', () => {
    expect(formatDuration(5000)).toBe('5s');
    expect(formatDuration(288000)).toBe('4m 48s');
    expect(formatDuration(3_900_000)).toBe('1h 5m');
  });

  it('should return N/A when absent', () => {
    expect(formatDuration(null)).toBe('N/A');
    expect(formatDuration(undefined)).toBe('N/A');
  });
});

describe('formatTimestamp', () => {
  const now = new Date('2026-01-01T12:00:00.000Z');

  it('should format relative times', () => {
    expect(formatTimestamp('2026-01-01T11:59:48.000Z', now)).toBe('12s ago');
    expect(formatTimestamp('2026-01-01T11:30:00.000Z', now)).toBe('30m ago');
    expect(formatTimestamp('2026-01-01T09:00:00.000Z', now)).toBe('3h ago');
  });

  it('should return N/A when absent', () => {
    expect(formatTimestamp(null, now)).toBe('N/A');
  });
});

describe('colorState', () => {
  beforeAll(() => {
    chalk.level = 0;
  });

  it('should keep the state text', () => {
    expect(colorState('watching')).toBe('watching');
    expect(colorState('terminated')).toBe('terminated');
  });
});

describe('formatKeyValue', () => {
  beforeAll(() => {
    chalk.level = 0;
  });

  it('should align keys', () => {
    expect(formatKeyValue({ a: 1, long: 'x' })).toBe('  a   : 1\n  long: x');
  });
});
