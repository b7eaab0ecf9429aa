import chalk from 'chalk';
import * as path from 'path';
import { PathResolver } from '../resolver/path-resolver';
import { GlobalCliOptions } from '../types/command-options';
import { initializeCommandContext } from '../utils/command-init';
import { logger } from '../utils/debug-logger';

export interface ResolvedLocation {
  resourcePath: string | null;
  sourcePath: string | null;
  outputPath: string | null;
  projectRoot: string | null;
}

export function resolveLocation(location: string, pathResolver: PathResolver): ResolvedLocation {
  const sourcePath = pathResolver.isSourcePath(location) ? location : pathResolver.toSourcePath(location);
  return {
    resourcePath: pathResolver.extractResourcePath(location),
    sourcePath,
    outputPath: sourcePath ? pathResolver.toOutputPath(sourcePath) : null,
    projectRoot: pathResolver.extractProjectRoot(location),
  };
}

export async function resolve(cliOptions: GlobalCliOptions, location: string): Promise<void> {
  const { projectRoot, options } = await initializeCommandContext(cliOptions);
  const target = location.includes(':') && !path.isAbsolute(location)
    ? location
    : path.resolve(projectRoot, location);
  const result = resolveLocation(target, new PathResolver({ converters: options.converters }));

  const show = (label: string, value: string | null) =>
    logger.info(`${label.padEnd(14)}${value ?? chalk.gray('(none)')}`);
  show('Resource path', result.resourcePath);
  show('Source path', result.sourcePath);
  show('Output path', result.outputPath);
  show('Project root', result.projectRoot);
}
