// src/__tests__/cli/program.test.ts

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import chalk from 'chalk';
import { createProgram } from '../../cli/program.js';
import { Logger, LogLevel } from '../../utils/logger.js';
import { cleanupTempDir, createTempDir } from '../setup.js';

describe('createProgram', () => {
  let tempDir: string;

  beforeEach(async () => {
    chalk.level = 0;
    tempDir = await createTempDir('program-');
  });

  afterEach(async () => {
    process.exitCode = undefined;
    Logger.setLevel(LogLevel.INFO);
    await cleanupTempDir(tempDir);
  });

  async function run(...args: string[]): Promise<void> {
    const program = await createProgram(tempDir);
    await program.parseAsync(['node', 'locale-validator', ...args]);
  }

  it('should set exit code 0 for a passing value', async () => {
    await run('var', 'abc', '--rules', 'alpha');

    expect(process.exitCode).toBe(0);
    expect(console.log).toHaveBeenCalledWith('valid');
  });

  it('should set exit code 1 for a failing value', async () => {
    await run('var', '', '-r', 'required', '-n', 'email');

    expect(process.exitCode).toBe(1);
    expect(console.log).toHaveBeenCalledWith('email:\n    required: email is required');
  });

  it('should report setup errors with exit code 2', async () => {
    await run('--config', 'missing.yml', 'var', 'x', '-r', 'required');

    expect(process.exitCode).toBe(2);
    expect(console.error).toHaveBeenCalledWith(
      expect.stringContaining('[error] ConfigurationError: Config file not found:')
    );
  });

  it('should enable debug logging with --verbose', async () => {
    await run('--verbose', 'var', 'abc', '-r', 'alpha');

    expect(console.debug).toHaveBeenCalledWith(expect.stringContaining('[debug] Validator ready:'));
  });

  it('should pass variadic except fields to the struct command', async () => {
    await run('struct', 'schema.yml', 'data.json', '-e', 'Name', '-p', 'Email');

    expect(process.exitCode).toBe(2);
    expect(console.error).toHaveBeenCalledWith(
      '[error] ConfigurationError: --except and --partial cannot be combined'
    );
  });
});
