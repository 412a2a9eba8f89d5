/**
 * CLI output helpers.
 */

import type { OutputFormat } from '../types.js';

interface OutputOptions {
  quiet: boolean;
  noColor: boolean;
  format: OutputFormat;
}

let outputOptions: OutputOptions = {
  quiet: false,
  noColor: false,
  format: 'pretty',
};

export function setOutputOptions(options: Partial<OutputOptions>): void {
  outputOptions = { ...outputOptions, ...options };
}

function supportsColor(): boolean {
  if (outputOptions.noColor || process.env['NO_COLOR'] !== undefined) {
    return false;
  }
  if (process.env['FORCE_COLOR'] !== undefined) {
    return true;
  }
  return process.stdout.isTTY === true;
}

const colors = {
  reset: '\x1b[0m',
  bold: '\x1b[1m',
  red: '\x1b[31m',
  green: '\x1b[32m',
  yellow: '\x1b[33m',
  cyan: '\x1b[36m',
  gray: '\x1b[90m',
} as const;

type ColorName = Exclude<keyof typeof colors, 'reset'>;

export function colorize(text: string, color: ColorName): string {
  if (!supportsColor()) {
    return text;
  }
  return `${colors[color]}${text}${colors.reset}`;
}

export function success(message: string): string {
  return `${colorize('✓', 'green')} ${message}`;
}

/** stdout, unless quiet */
export function print(message: string): void {
  if (!outputOptions.quiet) {
    console.log(message);
  }
}

/** stderr, always */
export function printError(message: string): void {
  console.error(message);
}

/** JSON on stdout; printed even in quiet mode since it is the command's result */
export function printJson(data: unknown): void {
  console.log(JSON.stringify(data, null, 2));
}
