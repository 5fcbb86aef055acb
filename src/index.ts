#!/usr/bin/env node
import 'dotenv/config'; // Load .env file into process.env
import path from 'path';
import { parseArgs } from 'util';
import chalk from 'chalk';

import { bootstrapLogger, applyLoggerConfig, log, LogLevel } from './logger';
import { ConfigValidationError, loadConfig, type AppConfig } from './configLoader';
import { JournalEngine, type ListResult, type OperationResult } from './services/JournalEngine';
import { VaultStore } from './vault/VaultStore';
import { documentName } from './vault/fileNaming';
import { isNodeError } from './errors';

const USAGE = `Usage:
  brackets generate-weekly [--start YYYY-MM-DD --end YYYY-MM-DD] [--weight KG]
  brackets generate-monthly [--year YYYY --month MM]
  brackets consolidate-month <year> <month> [--overwrite] [--remove-sources]
  brackets consolidate-year <year> [--overwrite] [--remove-sources]
  brackets list [--count N]

Options:
  --vault <dir>   Vault directory (overrides vault.path / BRACKETS_VAULT_DIR)`;

class UsageError extends Error {}

function parseInteger(value: string | undefined, name: string): number {
  if (value === undefined || !/^\d+$/.test(value)) {
    throw new UsageError(`${name} must be a number, got "${value ?? ''}"`);
  }
  return Number(value);
}

function parseWeight(value: string): number {
  if (!/^\d+(\.\d+)?$/.test(value)) {
    throw new UsageError(`weight must be a decimal number, got "${value}"`);
  }
  return Number(value);
}

// parseArgs reports unknown or malformed options with an ERR_PARSE_ARGS_* code.
function isArgumentError(error: unknown): error is Error {
  return isNodeError(error) && (error.code ?? '').startsWith('ERR_PARSE_ARGS');
}

function printResult(result: OperationResult): number {
  if (!result.success) {
    const { error } = result;
    console.error(chalk.red(`✗ ${error.kind}: ${error.message}`));
    if (error.path) console.error(chalk.gray(`  path: ${error.path}`));
    return 1;
  }
  console.log(chalk.green(`✓ ${result.path}`));
  for (const line of result.summary) console.log(`  ${line}`);
  for (const warning of result.warnings) console.warn(chalk.yellow(`⚠ ${warning.message}`));
  return 0;
}

function printList(result: ListResult): number {
  if (!result.success) {
    console.error(chalk.red(`✗ ${result.error.kind}: ${result.error.message}`));
    return 1;
  }
  if (result.weeks.length === 0) {
    console.log(chalk.gray('No weekly documents found.'));
  }
  for (const week of result.weeks) {
    console.log(`${chalk.cyan(documentName(week.key))}  ${week.key.year}-${String(week.key.month).padStart(2, '0')} · week ${week.key.week}`);
  }
  return 0;
}

/**
 * Runs one command and returns the process exit code.
 * Exported so tests can drive the CLI without spawning a process.
 */
export function runCli(argv: string[], config: AppConfig): number {
  const { values, positionals } = parseArgs({
    args: argv,
    allowPositionals: true,
    options: {
      vault: { type: 'string' },
      start: { type: 'string' },
      end: { type: 'string' },
      year: { type: 'string' },
      month: { type: 'string' },
      count: { type: 'string' },
      weight: { type: 'string' },
      overwrite: { type: 'boolean', default: false },
      'remove-sources': { type: 'boolean', default: false },
      help: { type: 'boolean', short: 'h', default: false },
    },
  });

  const [command, ...rest] = positionals;
  if (values.help || !command) {
    console.log(USAGE);
    return values.help ? 0 : 1;
  }

  const vaultDir = path.resolve(values.vault ?? config.vault.path);
  log(LogLevel.DEBUG, `Using vault directory ${vaultDir}`);
  const engine = new JournalEngine({ config, store: new VaultStore(vaultDir) });
  const consolidation = { overwrite: values.overwrite, removeSources: values['remove-sources'] };

  switch (command) {
    case 'generate-weekly': {
      if ((values.start === undefined) !== (values.end === undefined)) {
        throw new UsageError('--start and --end must be given together');
      }
      const range = values.start !== undefined && values.end !== undefined
        ? { startDate: values.start, endDate: values.end }
        : undefined;
      const weight = values.weight !== undefined ? parseWeight(values.weight) : undefined;
      return printResult(engine.generateWeekly(range, { weight }));
    }
    case 'generate-monthly': {
      if ((values.year === undefined) !== (values.month === undefined)) {
        throw new UsageError('--year and --month must be given together');
      }
      const target = values.year !== undefined
        ? { year: parseInteger(values.year, 'year'), month: parseInteger(values.month, 'month') }
        : undefined;
      return printResult(engine.generateMonthlyTopics(target));
    }
    case 'consolidate-month':
      return printResult(engine.consolidateMonth(parseInteger(rest[0], 'year'), parseInteger(rest[1], 'month'), consolidation));
    case 'consolidate-year':
      return printResult(engine.consolidateYear(parseInteger(rest[0], 'year'), consolidation));
    case 'list':
      return printList(engine.listWeeks(values.count !== undefined ? parseInteger(values.count, 'count') : undefined));
    default:
      throw new UsageError(`Unknown command "${command}"`);
  }
}

function main(): void {
  bootstrapLogger();
  let config: AppConfig;
  try {
    config = loadConfig();
  } catch (error) {
    if (error instanceof ConfigValidationError) {
      log(LogLevel.ERROR, error.message);
      process.exitCode = 1;
      return;
    }
    throw error;
  }
  applyLoggerConfig(config.logging);

  try {
    process.exitCode = runCli(process.argv.slice(2), config);
  } catch (error) {
    if (error instanceof UsageError || isArgumentError(error)) {
      console.error(chalk.red(error.message));
      console.error(USAGE);
      process.exitCode = 1;
      return;
    }
    throw error;
  }
}

if (require.main === module) {
  main();
}
