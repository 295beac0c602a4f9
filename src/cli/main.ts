#!/usr/bin/env node

// src/cli/main.ts - locale-validator entry point

import { CommanderError } from 'commander';
import { createProgram } from './program.js';
import { Logger } from '../utils/logger.js';

async function main(): Promise<void> {
  const program = await createProgram();

  try {
    await program.parseAsync(process.argv);
  } catch (error) {
    // exitOverride turns --help, --version and usage errors into exceptions
    if (error instanceof CommanderError) {
      process.exitCode = error.exitCode;
      return;
    }
    throw error;
  }
}

main().catch((error: unknown) => {
  Logger.error(error instanceof Error ? error.message : String(error));
  process.exitCode = 2;
});
