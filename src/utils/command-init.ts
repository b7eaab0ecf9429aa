import * as fs from 'fs';
import * as path from 'path';
import { GlobalCliOptions, HotReloadOptions } from '../types/command-options';
import { ConfigLoader } from './config-loader';
import { logger } from './debug-logger';
import { HandledError } from './errors';
import { mergeOptions } from './options-merger';

export interface CommandExecutionContext {
  projectRoot: string;
  options: HotReloadOptions;
}

/**
 * Performs common initialization steps for CLI commands: resolves the
 * project, loads the config file and merges it with the CLI arguments.
 */
export async function initializeCommandContext(
  cliOptions: GlobalCliOptions,
  commandOverrides: { sync?: boolean } = {},
): Promise<CommandExecutionContext> {
  const projectRoot = path.resolve(cliOptions.project);
  logger.setProjectRoot(projectRoot);
  logger.debug(`Resolved project root: ${projectRoot}`);
  if (!fs.existsSync(projectRoot)) {
    throw new HandledError(`Project directory does not exist: ${projectRoot}`);
  }

  const fileConfig = await ConfigLoader.loadConfig(cliOptions.config, projectRoot);
  const options = mergeOptions(
    { project: projectRoot, debounce: cliOptions.debounce, sync: commandOverrides.sync },
    fileConfig,
  );
  return { projectRoot, options };
}

/**
 * Resolves a user-supplied file against the project and requires it to exist.
 */
export function resolveExistingFile(projectRoot: string, file: string): string {
  const fullPath = path.resolve(projectRoot, file);
  if (!fs.existsSync(fullPath) || !fs.statSync(fullPath).isFile()) {
    throw new HandledError(`File not found: ${fullPath}`);
  }
  return fullPath;
}
