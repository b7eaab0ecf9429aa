#!/usr/bin/env node
import chalk from 'chalk';
import { Command, InvalidArgumentError } from 'commander';
import { deps } from './commands/deps';
import { resolve } from './commands/resolve';
import { watch } from './commands/watch';
import { GlobalCliOptions } from './types/command-options';
import { logger, LogLevel } from './utils/debug-logger';
import { HandledError } from './utils/errors';
import { version } from './version';

const program = new Command();

function parseInteger(value: string): number {
  const parsed = parseInt(value, 10);
  if (Number.isNaN(parsed) || parsed < 0) {
    throw new InvalidArgumentError('Expected a non-negative integer.');
  }
  return parsed;
}

function setupLogger(globalOptions: GlobalCliOptions): void {
  if (globalOptions.trace) {
    logger.setLevel(LogLevel.TRACE);
  } else if (globalOptions.verboseLevel !== undefined && globalOptions.verboseLevel > 0) {
    const level = Math.min(LogLevel.TRACE, globalOptions.verboseLevel);
    logger.setLevel(level);
  } else if (globalOptions.verbose) {
    logger.setLevel(LogLevel.NORMAL);
  } else {
    logger.setLevel(LogLevel.ESSENTIAL);
  }
  logger.debug(`Logger level set to: ${logger.getLevel()}`);
}

function commandErrorHandler(error: unknown): void {
  if (error instanceof HandledError) {
    logger.error(error.message);
  } else {
    const err = error instanceof Error ? error : new Error(String(error));
    logger.error(`Command failed: ${err.message}`);
    if (err.stack) {
      logger.debug(err.stack);
    }
    logger.warn(chalk.yellow('💡 This looks like a bug. Re-run with --trace and include the output when reporting it.'));
  }
  process.exitCode = 1;
}

function withGlobalOptions<A extends unknown[]>(
  action: (cliOptions: GlobalCliOptions, ...args: A) => Promise<void>,
) {
  return async (...args: A): Promise<void> => {
    const cliOptions = program.opts<GlobalCliOptions>();
    setupLogger(cliOptions);
    try {
      await action(cliOptions, ...args);
    } catch (error) {
      commandErrorHandler(error);
    }
  };
}

program
  .name('hotview')
  .version(version)
  .description('Hot reload for declarative view files and their stylesheets')
  .option('-p, --project <path>', 'project root directory', process.cwd())
  .option('--config <path>', 'config file (default: hotview.config.js or hotview.config.json)')
  .option('--debounce <ms>', 'quiet window before a change is dispatched', parseInteger)
  .option('-v, --verbose', 'show debug output')
  .option('--verbose-level <level>', 'log level (0=essential, 1=normal, 2=verbose, 3=trace)', parseInteger)
  .option('--trace', 'show every log message (same as --verbose-level 3)');

program
  .command('watch')
  .description('watch view files and report the reloads they would trigger')
  .argument('<patterns...>', 'glob patterns of view files, relative to the project')
  .option('--no-sync', 'do not copy edited source files into the build output')
  .action(withGlobalOptions(watch));

program
  .command('deps')
  .description('print the include tree of a view file')
  .argument('<file>', 'view file')
  .option('--json', 'print the include graph as JSON')
  .action(withGlobalOptions(deps));

program
  .command('resolve')
  .description('show how a path maps between build output and source tree')
  .argument('<path>', 'file path or file: URL')
  .action(withGlobalOptions(resolve));

program.parseAsync(process.argv).catch(commandErrorHandler);
