/**
 * restore-backup CLI Command - Recover purged statistics from backup copies
 */

import { Command, InvalidArgumentError } from 'commander';
import type { SessionProvider } from '../session';
import { printRestoreCounts } from '../utils/output';

/**
 * Parse one `<old-id>=<new-id>` pair into the accumulated mapping
 */
export function parseIdPair(value: string, previous: Map<number, number> | undefined): Map<number, number> {
  const match = /^(\d+)=(\d+)$/.exec(value.trim());
  if (!match) {
    throw new InvalidArgumentError('Expected <old-id>=<new-id> with numeric sensor ids.');
  }
  const oldId = Number(match[1]);
  const mapping = new Map(previous ?? []);
  if (mapping.has(oldId)) {
    throw new InvalidArgumentError(`Sensor id ${oldId} is mapped more than once.`);
  }
  mapping.set(oldId, Number(match[2]));
  return mapping;
}

export function createRestoreBackupCommand(getSession: SessionProvider): Command {
  return new Command('restore-backup')
    .description(
      'Copy statistics of selected sensors from backup databases into the database. ' +
        'Existing rows with the same id are replaced.'
    )
    .argument('<backup-db...>', 'backup copies of the database, the first one wins on repeated rows')
    .requiredOption(
      '--map <old=new...>',
      'sensor ids to restore as <id in backup>=<id in database>; use <id>=<id> to keep an id',
      parseIdPair
    )
    .action((backups: string[], options: { map: Map<number, number> }) => {
      const { context } = getSession();
      printRestoreCounts(context.backupRestore.restore(backups, options.map));
    });
}
