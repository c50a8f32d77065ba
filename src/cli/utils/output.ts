/**
 * Output formatting utilities for the stats-repair CLI
 *
 * Everything here goes to stdout and is meant for the operator: sensor
 * lists, row-count summaries and the batch report. Progress and diagnostics
 * go through the logger on stderr.
 */

import type { BackupRestoreOutcome, MaintenanceOutcome, MergeAllEntry, WriteResult } from '../../types';

/**
 * ANSI color codes for terminal output
 */
const COLORS = {
  reset: '\x1b[0m',
  red: '\x1b[31m',
  green: '\x1b[32m',
  yellow: '\x1b[33m',
  dim: '\x1b[2m',
} as const;

/**
 * Output options interface
 */
export interface OutputOptions {
  json: boolean;
}

/**
 * Global output options set by the CLI
 */
let globalOutputOptions: OutputOptions = {
  json: false,
};

/**
 * Set global output options from CLI flags
 */
export function setOutputOptions(options: OutputOptions): void {
  globalOutputOptions = { ...options };
}

/**
 * Get the current output format based on global options
 */
export function getOutputFormat(): 'json' | 'table' {
  return globalOutputOptions.json ? 'json' : 'table';
}

/**
 * Format data as a pretty-printed JSON string
 */
export function formatJson(data: unknown): string {
  return JSON.stringify(data, null, 2);
}

/**
 * Calculate the display width of a string (handling ANSI codes)
 */
function getDisplayWidth(str: string): number {
  const stripped = str.replace(/\x1b\[[0-9;]*m/g, '');
  return stripped.length;
}

/**
 * Pad a string to a specific width (handling ANSI codes)
 */
function padString(str: string, width: number): string {
  const currentWidth = getDisplayWidth(str);
  if (currentWidth >= width) {
    return str;
  }
  return str + ' '.repeat(width - currentWidth);
}

/**
 * Format an array of objects as an ASCII table
 *
 * @param rows - Array of objects to display
 * @param columns - Column names to display (object keys)
 * @returns Formatted ASCII table string
 */
export function formatTable(rows: Record<string, string>[], columns: string[]): string {
  if (rows.length === 0) {
    return '(no results)';
  }

  const columnWidths: Record<string, number> = {};
  for (const col of columns) {
    columnWidths[col] = col.length;
  }
  for (const row of rows) {
    for (const col of columns) {
      columnWidths[col] = Math.max(columnWidths[col], (row[col] ?? '').length);
    }
  }

  const lines: string[] = [];
  lines.push(columns.map((col) => padString(col.toUpperCase(), columnWidths[col])).join('  '));
  lines.push(columns.map((col) => '-'.repeat(columnWidths[col])).join('  '));
  for (const row of rows) {
    lines.push(columns.map((col) => padString(row[col] ?? '', columnWidths[col])).join('  '));
  }

  return lines.join('\n');
}

/**
 * Summary line for a single write
 */
export function formatWriteResult(result: WriteResult): string {
  if (result.simulated) {
    return 'Dry-run: no rows modified';
  }
  return `${result.changes} rows modified / deleted`;
}

/**
 * One-word description of an outcome, for the batch report
 */
export function describeOutcome(outcome: MaintenanceOutcome): string {
  if (outcome.status === 'aborted') {
    return `skipped (${outcome.reason})`;
  }
  return outcome.simulated ? 'dry-run' : 'merged';
}

/**
 * Output a success message in green
 */
export function success(message: string): void {
  console.log(`${COLORS.green}${message}${COLORS.reset}`);
}

/**
 * Output an error message in red
 */
export function error(message: string): void {
  console.error(`${COLORS.red}Error: ${message}${COLORS.reset}`);
}

/**
 * Output a warning message in yellow
 */
export function warn(message: string): void {
  console.log(`${COLORS.yellow}Warning: ${message}${COLORS.reset}`);
}

/**
 * Print data as JSON on stdout
 */
export function printJson(data: unknown): void {
  console.log(formatJson(data));
}

/**
 * Print the row-count line of every write an operation issued
 */
export function printStatements(outcome: MaintenanceOutcome): void {
  if (outcome.status !== 'done') {
    return;
  }
  if (globalOutputOptions.json) {
    printJson(outcome);
    return;
  }
  for (const statement of outcome.statements) {
    console.log(`${COLORS.dim}${statement.description}:${COLORS.reset} ${formatWriteResult(statement.result)}`);
  }
}

/**
 * Print the per-candidate report of a batch merge
 */
export function printMergeReport(entries: MergeAllEntry[]): void {
  if (globalOutputOptions.json) {
    printJson(entries);
    return;
  }
  const rows = entries.map((entry) => ({
    sensor: entry.name,
    result: describeOutcome(entry.outcome),
  }));
  console.log(formatTable(rows, ['sensor', 'result']));
}

/**
 * Print the rows written per table by a backup restore
 */
export function printRestoreCounts(outcome: BackupRestoreOutcome): void {
  if (outcome.status !== 'done') {
    return;
  }
  if (globalOutputOptions.json) {
    printJson(outcome);
    return;
  }
  for (const [table, count] of Object.entries(outcome.restored)) {
    const summary = outcome.simulated ? `Dry-run: ${count} rows would be restored` : `${count} rows restored`;
    console.log(`${COLORS.dim}restore ${table}:${COLORS.reset} ${summary}`);
  }
}
