/**
 * Options and plumbing shared by every command.
 */
import { Command } from 'commander';
import * as path from 'node:path';
import { IndexController } from '../../core/engine/controller.js';
import { QueryService } from '../../core/query/service.js';
import { errorMessage } from '../../utils/errors.js';
import { logger as log, type LogLevel } from '../../utils/logger.js';
import { formatJson } from '../formatters/json.js';
import { HumanFormatter } from '../formatters/human.js';

export interface CommonOptions {
  root?: string;
  config?: string;
  json?: boolean;
  verbose?: boolean;
  color?: boolean;
}

export interface OpenIndex {
  controller: IndexController;
  query: QueryService;
}

/**
 * Add the options every command accepts.
 */
export function withCommonOptions(command: Command): Command {
  return command
    .option('-r, --root <dir>', 'Project root', process.cwd())
    .option('-c, --config <path>', 'Path to config file, relative to the root')
    .option('--json', 'Output as JSON')
    .option('-v, --verbose', 'Show debug logs and extra detail')
    .option('--no-color', 'Disable colored output');
}

/**
 * Build the index once and return a query service over it.
 */
export async function openIndex(options: CommonOptions, defaultLevel: LogLevel = 'warn'): Promise<OpenIndex> {
  log.setLevel(options.verbose ? 'debug' : defaultLevel);

  const controller = new IndexController({
    projectRoot: path.resolve(options.root ?? process.cwd()),
    configPath: options.config,
  });
  await controller.start();
  return { controller, query: new QueryService(controller) };
}

export function createFormatter(options: CommonOptions): HumanFormatter {
  return new HumanFormatter({ colors: options.color !== false, verbose: options.verbose ?? false });
}

/**
 * Print a result as JSON or through the human formatter.
 */
export function print<T>(options: CommonOptions, value: T, human: (formatter: HumanFormatter, value: T) => string): void {
  if (options.json) {
    console.log(formatJson(value));
  } else {
    console.log(human(createFormatter(options), value));
  }
}

/**
 * Wrap a command action with the standard error handling.
 */
export function runAction<A extends unknown[]>(action: (...args: A) => Promise<void>): (...args: A) => Promise<void> {
  return async (...args: A) => {
    try {
      await action(...args);
    } catch (error) {
      log.error(errorMessage(error));
      process.exit(1);
    }
  };
}

/**
 * Parse a positive integer option, falling back on bad input.
 */
export function parseCount(value: string | undefined, fallback: number): number {
  if (value === undefined) return fallback;
  const parsed = parseInt(value, 10);
  return isNaN(parsed) || parsed < 0 ? fallback : parsed;
}
