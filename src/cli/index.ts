#!/usr/bin/env node
/**
 * mutation-stream CLI entry point.
 */

import { run } from './cli.js';

run().catch((err: unknown) => {
  console.error('Fatal error:', err);
  process.exit(1);
});
