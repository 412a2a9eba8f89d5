/**
 * CLI version, read from package.json.
 */

import { readFileSync } from 'node:fs';
import { dirname, resolve } from 'node:path';
import { fileURLToPath } from 'node:url';

function readVersion(packagePath: string): string | undefined {
  const parsed: unknown = JSON.parse(readFileSync(packagePath, 'utf-8'));
  if (typeof parsed === 'object' && parsed !== null && 'version' in parsed && typeof parsed.version === 'string') {
    return parsed.version;
  }
  return undefined;
}

function loadVersion(): string {
  const moduleDir = dirname(fileURLToPath(import.meta.url));
  // src/cli and dist/cli both sit two levels below the package root
  const packagePath = resolve(moduleDir, '../../package.json');
  try {
    return readVersion(packagePath) ?? '0.0.0';
  } catch (err) {
    process.emitWarning(`Cannot read version from ${packagePath}: ${err instanceof Error ? err.message : String(err)}`);
    return '0.0.0';
  }
}

export const version = loadVersion();
