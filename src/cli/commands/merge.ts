/**
 * merge / merge-all CLI Commands - Fold duplicate sensors into their originals
 */

import { Command } from 'commander';
import type { SessionProvider } from '../session';
import { printMergeReport, printStatements } from '../utils/output';

export function createMergeCommand(getSession: SessionProvider): Command {
  return new Command('merge')
    .description(
      'Merge the duplicate <sensor>_2 into <sensor>. Both sensors must exist; ' +
        'no time ordering check is done.'
    )
    .argument('<sensor>', 'name of the original sensor (without suffix)')
    .action((sensor: string) => {
      const { context } = getSession();
      printStatements(context.maintenance.mergeSingle(sensor));
    });
}

export function createMergeAllCommand(getSession: SessionProvider): Command {
  return new Command('merge-all')
    .description('Merge every duplicate sensor found in the statistics metadata')
    .action(() => {
      const { context } = getSession();
      printMergeReport(context.maintenance.mergeAll());
    });
}
