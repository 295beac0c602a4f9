// src/cli/program.ts - Commander program factory

import { Command } from 'commander';
import * as fs from 'fs/promises';

import { Logger, LogLevel } from '../utils/logger.js';
import { ErrorFactory } from '../utils/error-factory.js';
import { EXIT_INTERNAL } from './utils/report.js';
import { varCommand } from './commands/var.js';
import { structCommand } from './commands/struct.js';

interface GlobalOptions {
  config?: string;
  verbose?: boolean;
}

async function readVersion(): Promise<string> {
  const pkgPath = new URL('../../package.json', import.meta.url);
  const pkg: unknown = JSON.parse(await fs.readFile(pkgPath, 'utf-8'));
  if (typeof pkg === 'object' && pkg !== null && 'version' in pkg && typeof pkg.version === 'string') {
    return pkg.version;
  }
  return '0.0.0';
}

/**
 * Run a command body, turning thrown setup errors (bad config, unreadable
 * files) into a reported failure with exit code 2.
 */
async function runAction(body: () => Promise<number>): Promise<void> {
  try {
    process.exitCode = await body();
  } catch (error) {
    const details = ErrorFactory.describeInternalError(error);
    Logger.error(`${details.name}: ${details.message}`);
    if (details.suggestion) {
      Logger.error(`  ${details.suggestion}`);
    }
    process.exitCode = EXIT_INTERNAL;
  }
}

export async function createProgram(cwd: string = process.cwd()): Promise<Command> {
  const version = await readVersion();
  const program = new Command();

  program
    .name('locale-validator')
    .version(`locale-validator v${version}`, '-v, --version')
    .description('Validate values and documents with localized error messages')
    .option('-c, --config <path>', 'Config file (default: ./locale-validator.yml)')
    .option('--verbose', 'Show debug logging')
    .exitOverride();

  program.hook('preAction', () => {
    if (program.opts<GlobalOptions>().verbose) {
      Logger.setLevel(LogLevel.DEBUG);
    }
  });

  program
    .command('var')
    .description('Validate a single value against a rule expression')
    .argument('<value>', 'Value to validate')
    .requiredOption('-r, --rules <rules>', "Rule expression, e.g. 'required,min=3'")
    .option('-n, --name <name>', 'Field name used in messages', 'value')
    .option('-o, --other <value>', 'Value to compare against (eqfield, gtfield, ...)')
    .option('-l, --locale <locale>', 'Message locale (default: config defaultLocale)')
    .option('-p, --parse', 'Parse value and other as JSON')
    .option('--json', 'Print errors as JSON')
    .action(async (value: string, opts: {
      rules: string;
      name?: string;
      other?: string;
      locale?: string;
      parse?: boolean;
      json?: boolean;
    }) => {
      await runAction(() => varCommand(cwd, value, { ...opts, config: program.opts<GlobalOptions>().config }));
    });

  program
    .command('struct')
    .description('Validate a YAML/JSON document against a struct schema file')
    .argument('<schema>', 'Struct schema file (YAML or JSON)')
    .argument('<data>', 'Document to validate (YAML or JSON)')
    .option('-e, --except <fields...>', 'Skip these fields')
    .option('-p, --partial <fields...>', 'Validate only these fields')
    .option('-l, --locale <locale>', 'Message locale (default: config defaultLocale)')
    .option('--json', 'Print errors as JSON')
    .action(async (schema: string, data: string, opts: {
      except?: string[];
      partial?: string[];
      locale?: string;
      json?: boolean;
    }) => {
      await runAction(() =>
        structCommand(cwd, schema, data, { ...opts, config: program.opts<GlobalOptions>().config })
      );
    });

  return program;
}
