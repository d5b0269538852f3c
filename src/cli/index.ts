/**
 * CLI program.
 */
import { Command } from 'commander';
import { readFileSync } from 'node:fs';
import { dirname, resolve } from 'node:path';
import { fileURLToPath } from 'node:url';
import { createConfigCommand } from './commands/config.js';
import { createUncoveredCommand, createUntestedCommand } from './commands/coverage.js';
import { createRuleCommand } from './commands/rule.js';
import { createSearchCommand } from './commands/search.js';
import { createStaleCommand } from './commands/stale.js';
import { createStatusCommand } from './commands/status.js';
import { createTreeCommand } from './commands/tree.js';
import { createUnmappedCommand } from './commands/unmapped.js';
import { createValidateCommand } from './commands/validate.js';
import { createWatchCommand } from './commands/watch.js';

const __dirname = dirname(fileURLToPath(import.meta.url));

function readVersion(): string {
  const parsed: unknown = JSON.parse(readFileSync(resolve(__dirname, '../../package.json'), 'utf-8'));
  if (typeof parsed === 'object' && parsed !== null && 'version' in parsed && typeof parsed.version === 'string') {
    return parsed.version;
  }
  return '0.0.0';
}

/** Create the CLI program. */
export function createCli(): Command {
  const program = new Command()
    .name('tracemark')
    .description('Link specification rules to the code that implements and verifies them')
    .version(readVersion());

  [
    createStatusCommand,
    createUncoveredCommand,
    createUntestedCommand,
    createStaleCommand,
    createUnmappedCommand,
    createRuleCommand,
    createValidateCommand,
    createSearchCommand,
    createTreeCommand,
    createConfigCommand,
    createWatchCommand,
  ].forEach((cmd) => program.addCommand(cmd()));

  return program;
}
