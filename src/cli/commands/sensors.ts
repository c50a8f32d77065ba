/**
 * list-sensors CLI Command - Show sensor names known to the recorder
 */

import { Command } from 'commander';
import type { SessionProvider } from '../session';
import { getOutputFormat, printJson } from '../utils/output';

export function createListSensorsCommand(getSession: SessionProvider): Command {
  return new Command('list-sensors')
    .description('Show all available sensors')
    .option('--marker <text>', 'Only names containing this text (default: "sensor")')
    .action((options: { marker?: string }) => {
      const { context, logger } = getSession();
      const names = context.maintenance.listSensors(options.marker);

      if (getOutputFormat() === 'json') {
        printJson(names);
        return;
      }

      logger.info({ count: names.length }, 'Available sensors:');
      for (const name of names) {
        console.log(` - ${name}`);
      }
    });
}
