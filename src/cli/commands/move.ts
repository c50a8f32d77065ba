/**
 * move-data CLI Command - Assign statistics of a renamed sensor to its new name
 */

import { Command } from 'commander';
import type { SessionProvider } from '../session';
import { printStatements } from '../utils/output';

export function createMoveDataCommand(getSession: SessionProvider): Command {
  return new Command('move-data')
    .description(
      'Assign data from old sensor to new sensor. This command can be used to ' +
        'update statistical data after a sensor has been renamed.'
    )
    .argument('<old-sensor>', 'name of the old sensor')
    .argument('<new-sensor>', 'name of the new sensor')
    .action((oldSensor: string, newSensor: string) => {
      const { context } = getSession();
      printStatements(context.maintenance.moveData(oldSensor, newSensor));
    });
}
