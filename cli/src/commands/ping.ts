/**
 * Ping command - Report activity to the daemon
 */

import { Command } from 'commander';
import ora from 'ora';
import { ActivitySubjects } from '@idlestop/shared';
import { loadConfig } from '../utils/config-file.js';
import { createAPIClient } from '../api/client.js';
import { publishActivity } from '../nats/client.js';
import { output, success, error, errorMessage, formatDuration } from '../utils/output.js';
import { getGlobalOptions } from '../cli.js';

interface PingOptions {
  source: string;
  nats?: boolean;
}

export function pingCommand(): Command {
  const cmd = new Command('ping');

  cmd
    .description('Report activity and re-arm the idle timer')
    .option('-s, --source <name>', 'Label for where the activity came from', 'cli')
    .option('--nats', 'Publish on the NATS activity subject instead of calling the REST API')
    .action(async (options: PingOptions, command: Command) => {
      const globalOpts = getGlobalOptions(command);
      const spinner = ora();

      try {
        const config = loadConfig(globalOpts.config);

        if (!globalOpts.quiet) {
          spinner.start('Reporting activity...');
        }

        if (options.nats) {
          const event = await publishActivity(config, options.source);

          if (!globalOpts.quiet) {
            spinner.succeed('Activity published');
          }

          if (globalOpts.json) {
            output(event, globalOpts);
          } else {
            success(`Published ${event.id} on ${ActivitySubjects.activity(config.namespace)}`, globalOpts);
          }
          return;
        }

        const response = await createAPIClient(config).recordActivity(options.source);
        if (!response.ok || !response.data) {
          throw new Error(response.error || `Unexpected response (HTTP ${response.status})`);
        }

        if (!globalOpts.quiet) {
          spinner.succeed('Activity recorded');
        }

        if (globalOpts.json) {
          output(response.data, globalOpts);
        } else {
          success(
            `Idle timer re-armed, shutdown in ${formatDuration(response.data.status.remainingMs)} without further activity`,
            globalOpts,
          );
        }
      } catch (err) {
        if (spinner.isSpinning) {
          spinner.fail('Failed to report activity');
        }
        error(`Error: ${errorMessage(err)}`, {});
        process.exit(1);
      }
    });

  return cmd;
}
