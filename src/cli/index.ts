#!/usr/bin/env node
import { CommanderError } from 'commander';
import { buildProgram } from './program.js';

const program = buildProgram({
  stdout: process.stdout,
  stderr: process.stderr,
  exit: (status) => process.exit(status),
  cwd: process.cwd(),
  env: process.env,
});

try {
  await program.parseAsync(process.argv);
} catch (err) {
  if (err instanceof CommanderError) {
    // Help, version and usage errors have already been printed.
    process.exit(err.exitCode === 0 ? 0 : 2);
  }
  console.error('Fatal error:', err instanceof Error ? err.message : err);
  process.exit(3);
}
