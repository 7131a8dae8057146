#!/usr/bin/env node
import { CommanderError } from 'commander';
import { createActivityProgram } from '../cli/activityProgram.js';
import { resolveConfig } from '../config.js';
import { loadEnvFiles } from '../env.js';
import { createLogger } from '../log.js';

async function main() {
  loadEnvFiles();
  const config = resolveConfig();
  const program = createActivityProgram({
    config,
    logger: createLogger(config.logLevel),
  });
  await program.parseAsync(process.argv);
}

main().catch((err) => {
  if (err instanceof CommanderError) {
    process.exitCode = err.exitCode;
    return;
  }
  console.error(err instanceof Error ? err.message : String(err));
  process.exitCode = 1;
});
