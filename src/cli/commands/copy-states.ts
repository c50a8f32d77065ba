/**
 * copy-states CLI Command - Copy live-state history into long-term statistics
 */

import { Command, InvalidArgumentError } from 'commander';
import type { SessionProvider } from '../session';
import { getOutputFormat, printJson, success, warn } from '../utils/output';

/**
 * Parse an epoch timestamp in seconds
 */
export function parseEpoch(value: string): number {
  const parsed = Number(value);
  if (!/^\d+(\.\d+)?$/.test(value.trim()) || !Number.isFinite(parsed)) {
    throw new InvalidArgumentError('Expected a Unix timestamp in seconds.');
  }
  return parsed;
}

export function createCopyStatesCommand(getSession: SessionProvider): Command {
  return new Command('copy-states')
    .description(
      'Copy the state history of a sensor into the statistics table, one row per hour. ' +
        'Use after adding a state class to a sensor that had none.'
    )
    .argument('<sensor>', 'sensor name in both states and statistics metadata')
    .requiredOption('--until <epoch>', 'copy only states updated before this Unix timestamp', parseEpoch)
    .action((sensor: string, options: { until: number }) => {
      const { context } = getSession();
      const outcome = context.stateImport.copyStatesToStatistics(sensor, { until: options.until });

      if (outcome.status === 'aborted') {
        return;
      }
      if (getOutputFormat() === 'json') {
        printJson(outcome);
        return;
      }
      if (outcome.simulated) {
        warn(`Dry-run: ${outcome.inserted} hourly rows would be inserted, ${outcome.skipped} state rows skipped`);
      } else {
        success(`${outcome.inserted} hourly rows inserted (existing hours ignored), ${outcome.skipped} state rows skipped`);
      }
    });
}
