/**
 * CLI output
 *
 * Results go to stdout as JSON or a table; status lines are prefixed with a
 * coloured marker and respect --quiet / --verbose.
 */

import chalk from 'chalk';

export type OutputFormat = 'json' | 'table';

export interface OutputSettings {
  format: OutputFormat;
  quiet: boolean;
  verbose: boolean;
}

const settings: OutputSettings = { format: 'table', quiet: false, verbose: false };

export function isOutputFormat(value: unknown): value is OutputFormat {
  return value === 'json' || value === 'table';
}

export function configureOutput(next: Partial<OutputSettings>): void {
  Object.assign(settings, next);
}

export function getOutputFormat(): OutputFormat {
  return settings.format;
}

export function printJson(data: unknown): void {
  console.log(JSON.stringify(data, null, 2));
}

// biome-ignore lint/suspicious/noControlCharactersInRegex: ANSI escape codes use control characters
const ANSI_PATTERN = /\x1B\[[0-9;]*[a-zA-Z]/g;

function visibleWidth(text: string): number {
  return text.replace(ANSI_PATTERN, '').length;
}

function formatRow(cells: string[], widths: number[]): string {
  return cells
    .map((cell, i) => cell + ' '.repeat(Math.max(0, widths[i] - visibleWidth(cell))))
    .join('  ')
    .trimEnd();
}

/**
 * Render rows as aligned columns
 */
export function formatTable(headers: string[], rows: string[][]): string[] {
  const widths = headers.map((header, i) =>
    Math.max(visibleWidth(header), ...rows.map((row) => visibleWidth(row[i] ?? '')))
  );
  return [
    formatRow(headers.map((header) => chalk.bold(header)), widths),
    widths.map((width) => '-'.repeat(width)).join('  '),
    ...rows.map((row) => formatRow(headers.map((_, i) => row[i] ?? ''), widths)),
  ];
}

/**
 * Print data in the current format; without a table layout it is always JSON
 */
export function printData<T>(
  data: T | T[],
  table?: {
    headers: string[];
    getRow: (item: T) => string[];
  }
): void {
  if (settings.format === 'json' || !table) {
    printJson(data);
    return;
  }

  const items: T[] = Array.isArray(data) ? data : [data];
  for (const line of formatTable(table.headers, items.map(table.getRow))) {
    console.log(line);
  }
}

export function success(message: string): void {
  if (!settings.quiet) {
    console.log(chalk.green('✓'), message);
  }
}

/** Always printed, even with --quiet */
export function error(message: string): void {
  console.error(chalk.red('✗'), message);
}

export function warn(message: string): void {
  if (!settings.quiet) {
    console.warn(chalk.yellow('⚠'), message);
  }
}

export function info(message: string): void {
  if (!settings.quiet) {
    console.log(chalk.blue('ℹ'), message);
  }
}

export function verbose(message: string): void {
  if (settings.verbose) {
    console.log(chalk.gray('▸'), chalk.gray(message));
  }
}

/**
 * Show just enough of a secret to tell two apart
 */
export function mask(secret: string): string {
  return secret.length <= 4 ? '****' : `${secret.slice(0, 4)}****`;
}
