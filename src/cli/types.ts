/**
 * CLI types.
 */

/** Supported output formats */
export type OutputFormat = 'json' | 'table' | 'pretty';

export const OUTPUT_FORMATS: readonly OutputFormat[] = ['json', 'table', 'pretty'];

/** CLI exit codes */
export const ExitCode = {
  Success: 0,
  GeneralError: 1,
  InvalidArguments: 2,
  ValidationError: 3,
  FileNotFound: 4,
  ConfigError: 5,
} as const;

export type ExitCode = (typeof ExitCode)[keyof typeof ExitCode];

/** Global CLI options */
export interface GlobalOptions {
  format: OutputFormat;
  quiet: boolean;
  noColor: boolean;
  config: string | undefined;
}
