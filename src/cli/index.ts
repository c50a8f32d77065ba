#!/usr/bin/env node
/**
 * stats-repair CLI - entry point
 *
 * Parses arguments, runs one command and maps failures to the exit code.
 */

import { CommanderError } from 'commander';
import { DatabaseFileNotFoundError } from '../db/errors';
import { createProgram } from './program';
import { error } from './utils/output';

/**
 * Main entry point
 */
async function main(): Promise<void> {
  const program = createProgram();

  try {
    await program.parseAsync(process.argv);
  } catch (err) {
    // Help, version and usage errors carry their own exit code
    if (err instanceof CommanderError) {
      process.exit(err.exitCode);
    }

    // Already logged before any connection was attempted
    if (err instanceof DatabaseFileNotFoundError) {
      process.exit(1);
    }

    const message = err instanceof Error ? err.message : String(err);
    error(message);
    process.exit(1);
  }
}

// Run the CLI
void main();
