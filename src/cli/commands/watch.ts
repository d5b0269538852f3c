/**
 * Keep the index live and print a status line after every rebuild.
 */
import { Command } from 'commander';
import chalk from 'chalk';
import { IndexWatcher } from '../../core/engine/watcher.js';
import type { Snapshot } from '../../core/index/types.js';
import { errorMessage } from '../../utils/errors.js';
import { logger as log } from '../../utils/logger.js';
import { createFormatter, openIndex, parseCount, runAction, withCommonOptions, type CommonOptions } from './shared.js';

interface WatchOptions extends CommonOptions {
  debounce?: string;
  poll?: boolean;
  clear?: boolean;
}

export function createWatchCommand(): Command {
  return withCommonOptions(new Command('watch'))
    .description('Rebuild the index on file changes and print coverage')
    .option('--debounce <ms>', 'Debounce delay in milliseconds (default: watch.debounce_ms)')
    .option('--poll', 'Poll for changes instead of using native events')
    .option('--clear', 'Clear terminal between runs')
    .action(runAction(runWatch));
}

async function runWatch(options: WatchOptions): Promise<void> {
  const { controller, query } = await openIndex(options, 'info');
  const formatter = createFormatter(options);

  const report = (snapshot: Snapshot): void => {
    if (options.clear) console.clear();
    if (options.json) {
      console.log(JSON.stringify(query.status()));
      return;
    }
    console.log(formatter.formatStatus(query.status()));
    if (snapshot.findings.length > 0 && options.verbose) {
      console.log(formatter.formatFindings(snapshot.findings));
    }
  };

  const watcher = new IndexWatcher(controller, {
    debounceMs: options.debounce === undefined ? undefined : parseCount(options.debounce, 0),
    usePolling: options.poll ?? false,
  });

  if (!options.json) {
    console.log();
    console.log(chalk.bold.cyan('tracemark watch'));
    console.log(chalk.dim('─'.repeat(50)));
    console.log(chalk.dim(`Root: ${controller.projectRoot}`));
    console.log(chalk.dim('Press Ctrl+C to stop'));
    console.log();
  }

  report(controller.current());
  controller.onSwap(report);
  await watcher.start();

  const shutdown = (): void => {
    watcher
      .close()
      .then(() => process.exit(0))
      .catch((error: unknown) => {
        log.error(`Failed to stop watcher: ${errorMessage(error)}`);
        process.exit(1);
      });
  };
  process.once('SIGINT', shutdown);
  process.once('SIGTERM', shutdown);
}

