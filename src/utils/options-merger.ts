import * as path from 'path';
import {
  DEFAULT_STYLESHEET_EXTENSIONS,
} from '../analyzer/component-registry';
import {
  DEFAULT_INCLUDE_FALLBACK_TAG,
  DEFAULT_INCLUDE_NAMESPACES,
} from '../analyzer/include-analyzer';
import { DEFAULT_VIEW_EXTENSIONS } from '../reload/reload-strategy';
import { ConfigFileOptions, GlobalCliOptions, HotReloadOptions } from '../types/command-options';
import { DEFAULT_DEBOUNCE_MS } from '../watcher/file-watcher';
import { logger } from './debug-logger';

function normalizeExtensions(extensions: string[]): string[] {
  return [...new Set(extensions.map((ext) => ext.replace(/^\./, '').toLowerCase()))];
}

/**
 * Merges CLI arguments and config file settings into fully resolved options.
 *
 * Precedence: CLI arguments, then the configuration file, then defaults.
 */
export function mergeOptions(
  cliOptions: Pick<GlobalCliOptions, 'project' | 'debounce'> & { sync?: boolean },
  fileConfig: ConfigFileOptions | null,
): HotReloadOptions {
  const fileConf = fileConfig ?? {};

  const merged: HotReloadOptions = {
    projectRoot: path.resolve(cliOptions.project),
    debounceMs: cliOptions.debounce ?? fileConf.debounceMs ?? DEFAULT_DEBOUNCE_MS,
    viewExtensions: normalizeExtensions(fileConf.viewExtensions ?? DEFAULT_VIEW_EXTENSIONS),
    stylesheetExtensions: normalizeExtensions(
      fileConf.stylesheetExtensions ?? DEFAULT_STYLESHEET_EXTENSIONS,
    ),
    includeNamespaces: fileConf.includeNamespaces ?? DEFAULT_INCLUDE_NAMESPACES,
    includeFallbackTag: fileConf.includeFallbackTag ?? DEFAULT_INCLUDE_FALLBACK_TAG,
    cssReload: fileConf.cssReload ?? true,
    // `--no-sync` is the only way the CLI sets this
    syncToOutput: cliOptions.sync === false ? false : fileConf.syncToOutput ?? true,
    converters: fileConf.converters ?? [],
  };

  logger.debug('Resolved options:', {
    ...merged,
    converters: `${merged.converters.length} custom`,
  });
  return merged;
}
