import chalk from 'chalk';
import * as path from 'path';
import { ComponentRegistry } from '../analyzer/component-registry';
import { DependencyGraph } from '../analyzer/dependency-graph';
import { IncludeAnalyzer } from '../analyzer/include-analyzer';
import { PathResolver } from '../resolver/path-resolver';
import { CmdDepsOptions, GlobalCliOptions, HotReloadOptions } from '../types/command-options';
import { initializeCommandContext, resolveExistingFile } from '../utils/command-init';
import { logger } from '../utils/debug-logger';
import { HandledError } from '../utils/errors';
import { ConsoleViewComponent } from './watch';

export interface DependencyReport {
  resourcePath: string;
  /** Root file first, then its includes in discovery order */
  files: string[];
  graph: DependencyGraph;
}

export function collectDependencies(file: string, options: HotReloadOptions): DependencyReport {
  const pathResolver = new PathResolver({ converters: options.converters });
  const graph = new DependencyGraph();
  const registry = new ComponentRegistry(
    graph,
    new IncludeAnalyzer(pathResolver, {
      namespaces: options.includeNamespaces,
      fallbackTag: options.includeFallbackTag,
    }),
    pathResolver,
    { stylesheetExtensions: options.stylesheetExtensions, projectRoot: options.projectRoot },
  );

  const resourcePath = registry.resourceKeyFor(file);
  const registration = registry.register(new ConsoleViewComponent(file, resourcePath));
  if (!registration) {
    throw new HandledError(`Could not analyze ${file}`);
  }
  return { resourcePath, files: registration.files, graph };
}

export async function deps(
  cliOptions: GlobalCliOptions,
  file: string,
  cmdOptions: CmdDepsOptions,
): Promise<void> {
  const { projectRoot, options } = await initializeCommandContext(cliOptions);
  const fullPath = resolveExistingFile(projectRoot, file);
  const report = collectDependencies(fullPath, options);

  if (cmdOptions.json) {
    console.log(JSON.stringify(report.graph.toJSON(), null, 2));
    return;
  }

  logger.info(chalk.bold(`Include tree of ${report.resourcePath} (${report.files.length} file(s)):`));
  for (const included of report.files) {
    logger.info(`  ${path.relative(projectRoot, included)}`);
  }
}
