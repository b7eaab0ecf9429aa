import chalk from 'chalk';
import * as fs from 'fs';
import { glob } from 'glob';
import * as path from 'path';
import { pathToFileURL } from 'url';
import { HotReloadManager, HotReloadManagerDeps } from '../hot-reload-manager';
import { CmdWatchOptions, GlobalCliOptions, HotReloadOptions } from '../types/command-options';
import { Reloadable, StyleRefreshTarget } from '../types/reloadable';
import { initializeCommandContext } from '../utils/command-init';
import { logger } from '../utils/debug-logger';
import { HandledError } from '../utils/errors';

/**
 * Stand-in component for a view file: reports reloads and stylesheet
 * refreshes on the console instead of rebuilding anything.
 */
export class ConsoleViewComponent implements Reloadable {
  reloadCount = 0;
  private stylesheets: string[];

  constructor(
    private readonly file: string,
    private readonly key: string,
    stylesheets: string[] = [],
  ) {
    this.stylesheets = stylesheets;
  }

  resourcePath(): string {
    return this.key;
  }

  sourceLocation(): string {
    return this.file;
  }

  reload(): void {
    this.reloadCount++;
    logger.info(`${chalk.green('↻ reloaded')} ${this.key}`);
  }

  styleRefreshTarget(): StyleRefreshTarget | null {
    if (this.stylesheets.length === 0) {
      return null;
    }
    return {
      getStylesheets: () => this.stylesheets,
      setStylesheets: (next: string[]) => {
        this.stylesheets = next;
        if (next.length > 0) {
          logger.info(`${chalk.cyan('✎ restyled')} ${this.key}`);
        }
      },
    };
  }
}

export interface WatchSession {
  manager: HotReloadManager;
  components: ConsoleViewComponent[];
}

/**
 * Registers a console component for every view file matching the patterns
 * and starts watching.
 */
export async function startWatching(
  patterns: string[],
  options: HotReloadOptions,
  deps: HotReloadManagerDeps = {},
): Promise<WatchSession> {
  const projectRoot = options.projectRoot;
  const matches = await glob(patterns, {
    cwd: projectRoot,
    absolute: true,
    nodir: true,
    ignore: ['**/node_modules/**'],
  });
  const viewFiles = matches
    .filter((file) => options.viewExtensions.includes(path.extname(file).slice(1).toLowerCase()))
    .sort();
  if (viewFiles.length === 0) {
    throw new HandledError(`No view files match: ${patterns.join(' ')}`);
  }

  const manager = new HotReloadManager(options, deps);
  const components: ConsoleViewComponent[] = [];
  for (const file of viewFiles) {
    const stylesheets = options.stylesheetExtensions
      .map((ext) => path.join(path.dirname(file), `${path.basename(file, path.extname(file))}.${ext}`))
      .filter((candidate) => fs.existsSync(candidate))
      .map((candidate) => pathToFileURL(candidate).href);
    const component = new ConsoleViewComponent(
      file,
      manager.registry.resourceKeyFor(file),
      stylesheets,
    );
    if (manager.register(component)) {
      components.push(component);
    }
  }

  manager.start();
  return { manager, components };
}

function waitForInterrupt(): Promise<void> {
  return new Promise((resolve) => {
    process.once('SIGINT', () => resolve());
  });
}

export async function watch(
  cliOptions: GlobalCliOptions,
  patterns: string[],
  cmdOptions: CmdWatchOptions,
): Promise<void> {
  const { options } = await initializeCommandContext(cliOptions, { sync: cmdOptions.sync });
  const { manager, components } = await startWatching(patterns, options);

  logger.info(
    chalk.bold(`👀 Watching ${components.length} view(s) in ${options.projectRoot}. Press Ctrl+C to stop.`),
  );
  await waitForInterrupt();
  await manager.stop();
}
