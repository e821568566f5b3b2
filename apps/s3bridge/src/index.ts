#!/usr/bin/env tsx
/**
 * S3Bridge CLI - Entry Point
 */

import { createCli } from './cli';

const program = createCli();

program.parseAsync(process.argv).catch((err: unknown) => {
  console.error('Error:', err instanceof Error ? err.message : String(err));
  process.exit(1);
});
