/**
 * CLI error classes.
 */

import { ConfigError, NamingPolicyViolationError } from '../../mapping/errors.js';
import { ExitCode } from '../types.js';

/** Base CLI error */
export class CliError extends Error {
  public readonly exitCode: ExitCode;
  public override readonly cause: Error | undefined;

  constructor(message: string, exitCode: ExitCode = ExitCode.GeneralError, cause?: Error) {
    super(message);
    this.name = 'CliError';
    this.exitCode = exitCode;
    this.cause = cause;
  }
}

export class InvalidArgumentsError extends CliError {
  constructor(message: string, cause?: Error) {
    super(message, ExitCode.InvalidArguments, cause);
    this.name = 'InvalidArgumentsError';
  }
}

export class FileNotFoundError extends CliError {
  public readonly filePath: string;

  constructor(filePath: string, cause?: Error) {
    super(`File not found: ${filePath}`, ExitCode.FileNotFound, cause);
    this.name = 'FileNotFoundError';
    this.filePath = filePath;
  }
}

/** One problem found while validating a schema */
export interface ValidationIssue {
  path: string;
  message: string;
}

export class ValidationError extends CliError {
  public readonly issues: ValidationIssue[];

  constructor(message: string, issues: ValidationIssue[] = [], cause?: Error) {
    super(message, ExitCode.ValidationError, cause);
    this.name = 'ValidationError';
    this.issues = issues;
  }
}

export function getExitCode(error: unknown): ExitCode {
  if (error instanceof CliError) {
    return error.exitCode;
  }
  if (error instanceof NamingPolicyViolationError) {
    return ExitCode.ValidationError;
  }
  if (error instanceof ConfigError) {
    return ExitCode.ConfigError;
  }
  return ExitCode.GeneralError;
}

export function formatError(error: unknown): string {
  if (error instanceof ValidationError && error.issues.length > 0) {
    return [error.message, ...error.issues.map((i) => `  ✗ ${i.path}: ${i.message}`)].join('\n');
  }
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
