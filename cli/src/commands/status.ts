/**
 * Status command - Show the idle monitor status
 */

import { Command } from 'commander';
import ora from 'ora';
import type { MonitorStatus } from '@idlestop/shared';
import { loadConfig } from '../utils/config-file.js';
import { createAPIClient } from '../api/client.js';
import { requestStatus } from '../nats/client.js';
import {
  output,
  error,
  errorMessage,
  formatKeyValue,
  formatDuration,
  formatTimestamp,
  colorState,
} from '../utils/output.js';
import { getGlobalOptions } from '../cli.js';

interface StatusOptions {
  nats?: boolean;
}

/**
 * Render a status snapshot as aligned key/value lines
 */
export function formatStatus(status: MonitorStatus, now = new Date()): string {
  const lastActivity = status.lastActivityAt
    ? `${formatTimestamp(status.lastActivityAt, now)} (${status.lastActivitySource ?? 'unknown'})`
    : 'none yet';

  return formatKeyValue({
    'State': colorState(status.state),
    'Shutdown After': formatDuration(status.shutdownTimeMs),
    'Poll Interval': formatDuration(status.pollIntervalMs),
    'Last Activity': lastActivity,
    'Idle For': formatDuration(status.idleForMs),
    'Remaining': formatDuration(status.remainingMs),
    'Activities': status.activityCount,
  });
}

export function statusCommand(): Command {
  const cmd = new Command('status');

  cmd
    .description('Show the idle monitor status')
    .option('--nats', 'Ask over NATS request/reply instead of the REST API')
    .action(async (options: StatusOptions, command: Command) => {
      const globalOpts = getGlobalOptions(command);
      const spinner = ora();

      try {
        const config = loadConfig(globalOpts.config);

        if (!globalOpts.quiet) {
          spinner.start('Fetching status...');
        }

        let status: MonitorStatus;
        if (options.nats) {
          status = await requestStatus(config);
        } else {
          const response = await createAPIClient(config).getStatus();
          if (!response.ok || !response.data) {
            throw new Error(response.error || `Unexpected response (HTTP ${response.status})`);
          }
          status = response.data;
        }

        if (!globalOpts.quiet) {
          spinner.succeed('Status retrieved');
        }

        if (globalOpts.json) {
          output(status, globalOpts);
        } else {
          console.log('\nIdle Monitor');
          console.log('='.repeat(50));
          console.log(formatStatus(status));
          console.log();
        }
      } catch (err) {
        if (spinner.isSpinning) {
          spinner.fail('Failed to fetch status');
        }
        error(`Error: ${errorMessage(err)}`, {});
        process.exit(1);
      }
    });

  return cmd;
}
