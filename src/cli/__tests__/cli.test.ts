/**
 * Tests for the CLI program
 *
 * Runs the commander program in-process against temporary database files.
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import type { MockInstance } from 'vitest';
import { createHash } from 'crypto';
import { mkdtempSync, readFileSync, rmSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import Database from 'better-sqlite3';
import { CommanderError, InvalidArgumentError } from 'commander';
import { createProgram } from '../program';
import { parseEpoch } from '../commands/copy-states';
import { parseIdPair } from '../commands/restore-backup';
import { DatabaseFileNotFoundError } from '../../db/errors';
import { TABLES } from '../../db/schema';
import {
  createRecorderDbFile,
  countRows,
  seedSample,
  seedState,
  seedStateMeta,
  seedStatisticMeta,
} from '../../../tests/helpers/recorder-db';
import { createLogCapture } from '../../../tests/helpers/log-capture';
import type { LogCapture } from '../../../tests/helpers/log-capture';

function checksum(path: string): string {
  return createHash('sha256').update(readFileSync(path)).digest('hex');
}

describe('stats-repair CLI', () => {
  let dir: string;
  let dbFile: string;
  let logs: LogCapture;
  let stdout: MockInstance<Console['log']>;
  let stderr: string[];

  function run(args: string[]): Promise<unknown> {
    const program = createProgram({
      logDestination: logs.destination,
      writeErr: (str) => {
        stderr.push(str);
      },
    });
    return program.parseAsync(args, { from: 'user' });
  }

  function printed(): string[] {
    return stdout.mock.calls.map((call) => call.map(String).join(' '));
  }

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'stats-repair-'));
    dbFile = join(dir, 'home-assistant_v2.db');
    logs = createLogCapture();
    stderr = [];
    stdout = vi.spyOn(console, 'log').mockImplementation(() => {});

    createRecorderDbFile(dbFile, (db) => {
      seedStatisticMeta(db, 5, 'sensor.a');
      seedStatisticMeta(db, 9, 'sensor.b');
      seedSample(db, TABLES.STATISTICS, { metadataId: 5, createdTs: 100, startTs: 100 });
      seedSample(db, TABLES.STATISTICS, { metadataId: 9, createdTs: 200, startTs: 200 });
      seedStatisticMeta(db, 30, 'sensor.foo');
      seedStatisticMeta(db, 31, 'sensor.foo_2');
      seedStatisticMeta(db, 21, 'sensor.electricmeter_l1_2');
      seedSample(db, TABLES.STATISTICS, { metadataId: 31, createdTs: 300, startTs: 300 });
      seedStateMeta(db, 1, 'sensor.foo');
      seedStateMeta(db, 2, 'sensor.foo_2');
      seedState(db, { metadataId: 2, state: '3', lastUpdatedTs: 300 });
    });
  });

  afterEach(() => {
    stdout.mockRestore();
    rmSync(dir, { recursive: true, force: true });
  });

  it('should print help and fail without a command', async () => {
    const result = run([]);

    await expect(result).rejects.toBeInstanceOf(CommanderError);
    await expect(result).rejects.toMatchObject({ exitCode: 1, code: 'commander.help' });
    expect(stderr.join('')).toContain('Usage: stats-repair');
  });

  it('should fail before connecting when the database file is missing', async () => {
    const missing = join(dir, 'missing.db');

    await expect(run(['-d', missing, 'list-sensors'])).rejects.toBeInstanceOf(DatabaseFileNotFoundError);
    expect(logs.messages('error')).toEqual([
      `Database file ${missing} not found. Set an existing database file with option -d / --db-file.`,
    ]);
  });

  it('should list sensors from both metadata tables', async () => {
    await run(['-d', dbFile, 'list-sensors']);

    expect(printed()).toEqual([
      ' - sensor.a',
      ' - sensor.b',
      ' - sensor.electricmeter_l1_2',
      ' - sensor.foo',
      ' - sensor.foo_2',
    ]);
  });

  it('should leave the file byte-identical in dry-run', async () => {
    const before = checksum(dbFile);

    await run(['-d', dbFile, 'move-data', 'sensor.a', 'sensor.b']);
    await run(['-d', dbFile, 'merge', 'sensor.foo']);
    await run(['-d', dbFile, 'merge-all']);

    expect(checksum(dbFile)).toBe(before);

    const simulated = logs.records().filter((record) => record.msg === 'Dry-run: statement not executed');
    expect(simulated).toHaveLength(2 + 5 + 5);
    expect(simulated[0].sql).toBe('UPDATE statistics\nSET metadata_id = :newId\nWHERE metadata_id = :oldId');
    expect(simulated[0].params).toEqual({ newId: 9, oldId: 5 });
    expect(printed()).toContain('\x1b[2mmove statistics:\x1b[0m Dry-run: no rows modified');
  });

  it('should apply changes with --modify', async () => {
    await run(['-d', dbFile, '--modify', 'move-data', 'sensor.a', 'sensor.b']);

    const db = new Database(dbFile, { readonly: true });
    expect(countRows(db, TABLES.STATISTICS, 5)).toBe(0);
    expect(countRows(db, TABLES.STATISTICS, 9)).toBe(2);
    db.close();

    expect(printed()).toEqual([
      '\x1b[2mmove statistics:\x1b[0m 1 rows modified / deleted',
      '\x1b[2mmove statistics_short_term:\x1b[0m 0 rows modified / deleted',
    ]);
  });

  it('should merge all duplicates and report each candidate', async () => {
    await run(['-d', dbFile, '-m', 'merge-all']);

    const db = new Database(dbFile, { readonly: true });
    expect(countRows(db, TABLES.STATISTICS, 30)).toBe(1);
    expect(countRows(db, TABLES.STATES, 1)).toBe(1);
    db.close();

    const table = [
      ['SENSOR'.padEnd(25), 'RESULT'.padEnd(18)].join('  '),
      ['-'.repeat(25), '-'.repeat(18)].join('  '),
      ['sensor.electricmeter_l1_2', 'skipped (excluded)'].join('  '),
      ['sensor.foo_2'.padEnd(25), 'merged'.padEnd(18)].join('  '),
    ].join('\n');
    expect(printed()).toEqual([table]);
  });

  it('should print the outcome as JSON with --json', async () => {
    await run(['-d', dbFile, '--json', 'move-data', 'sensor.a', 'sensor.b']);

    const calls = printed();
    expect(calls).toHaveLength(1);
    expect(JSON.parse(calls[0])).toEqual({
      status: 'done',
      simulated: true,
      statements: [
        { description: 'move statistics', result: { simulated: true } },
        { description: 'move statistics_short_term', result: { simulated: true } },
      ],
    });
  });

  it('should log executed statements at trace level only with --verbose', async () => {
    await run(['-d', dbFile, '--log-level', 'info', 'list-sensors']);
    expect(logs.records().some((record) => record.level === 'trace')).toBe(false);

    await run(['-d', dbFile, '-v', 'list-sensors']);
    const trace = logs.records().filter((record) => record.level === 'trace');
    expect(trace.some((record) => record.msg === 'Executing read')).toBe(true);
  });

  describe('copy-states', () => {
    it('should require --until', async () => {
      const result = run(['-d', dbFile, 'copy-states', 'sensor.foo_2']);

      await expect(result).rejects.toMatchObject({ code: 'commander.missingMandatoryOptionValue', exitCode: 1 });
      expect(stderr.join('')).toContain("'--until <epoch>'");
    });

    it('should reject a --until that is not a timestamp', async () => {
      const result = run(['-d', dbFile, 'copy-states', 'sensor.foo_2', '--until', 'abc']);

      await expect(result).rejects.toMatchObject({ code: 'commander.invalidArgument', exitCode: 1 });
      expect(stderr.join('')).toContain('Expected a Unix timestamp in seconds.');
    });

    it('should copy the state history with --modify', async () => {
      await run(['-d', dbFile, '-m', 'copy-states', 'sensor.foo_2', '--until', '1000']);

      const db = new Database(dbFile, { readonly: true });
      expect(countRows(db, TABLES.STATISTICS, 31)).toBe(2);
      db.close();

      expect(printed()).toEqual([
        '\x1b[32m1 hourly rows inserted (existing hours ignored), 0 state rows skipped\x1b[0m',
      ]);
    });

    it('should print the counters as JSON in dry-run', async () => {
      await run(['-d', dbFile, '--json', 'copy-states', 'sensor.foo_2', '--until', '1000']);

      expect(printed()).toEqual([
        JSON.stringify({ status: 'done', inserted: 1, skipped: 0, simulated: true }, null, 2),
      ]);
    });
  });

  describe('restore-backup', () => {
    let backupFile: string;

    beforeEach(() => {
      backupFile = join(dir, 'backup.db');
      createRecorderDbFile(backupFile, (db) => {
        seedStatisticMeta(db, 30, 'sensor.foo');
        seedSample(db, TABLES.STATISTICS, { id: 50, metadataId: 30, createdTs: 1000, startTs: 1000 });
      });
    });

    it('should restore rows from the backup with --modify', async () => {
      await run(['-d', dbFile, '-m', 'restore-backup', backupFile, '--map', '30=30']);

      const db = new Database(dbFile, { readonly: true });
      expect(countRows(db, TABLES.STATISTICS, 30)).toBe(1);
      db.close();

      expect(printed()).toEqual([
        '\x1b[2mrestore statistics:\x1b[0m 1 rows restored',
        '\x1b[2mrestore statistics_short_term:\x1b[0m 0 rows restored',
      ]);
    });

    it('should leave the database unchanged in dry-run', async () => {
      const before = checksum(dbFile);

      await run(['-d', dbFile, 'restore-backup', backupFile, '--map', '30=30']);

      expect(checksum(dbFile)).toBe(before);
      expect(printed()).toEqual([
        '\x1b[2mrestore statistics:\x1b[0m Dry-run: 1 rows would be restored',
        '\x1b[2mrestore statistics_short_term:\x1b[0m Dry-run: 0 rows would be restored',
      ]);
    });

    it('should reject a malformed mapping', async () => {
      const result = run(['-d', dbFile, 'restore-backup', backupFile, '--map', '30']);

      await expect(result).rejects.toMatchObject({ code: 'commander.invalidArgument', exitCode: 1 });
      expect(stderr.join('')).toContain('Expected <old-id>=<new-id> with numeric sensor ids.');
    });
  });
});

describe('parseEpoch', () => {
  it('should accept seconds with an optional fraction', () => {
    expect(parseEpoch('1700000000')).toBe(1700000000);
    expect(parseEpoch(' 12.5 ')).toBe(12.5);
  });

  it('should reject anything else', () => {
    expect(() => parseEpoch('abc')).toThrow(InvalidArgumentError);
    expect(() => parseEpoch('-5')).toThrow(InvalidArgumentError);
    expect(() => parseEpoch('')).toThrow(InvalidArgumentError);
  });
});

describe('parseIdPair', () => {
  it('should collect pairs into one mapping', () => {
    const mapping = parseIdPair('6=109', parseIdPair('5=99', undefined));
    expect([...mapping]).toEqual([
      [5, 99],
      [6, 109],
    ]);
  });

  it('should reject malformed pairs and ids mapped twice', () => {
    expect(() => parseIdPair('5', undefined)).toThrow(InvalidArgumentError);
    expect(() => parseIdPair('a=1', undefined)).toThrow(InvalidArgumentError);
    expect(() => parseIdPair('5=100', new Map([[5, 99]]))).toThrow('Sensor id 5 is mapped more than once.');
  });
});
