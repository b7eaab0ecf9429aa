import { SourcePathConverter } from '../resolver/build-system';

// A type alias so it satisfies commander's OptionValues
export type GlobalCliOptions = {
  config?: string;
  project: string;
  debounce?: number;
  verboseLevel?: number;
  verbose?: boolean;
  trace?: boolean;
};

export interface CmdWatchOptions {
  /** false with `--no-sync` */
  sync?: boolean;
}

export interface CmdDepsOptions {
  json?: boolean;
}

/**
 * Options available in hotview.config.js / hotview.config.json
 */
export interface ConfigFileOptions {
  debounceMs?: number;
  viewExtensions?: string[];
  stylesheetExtensions?: string[];
  includeNamespaces?: string[];
  includeFallbackTag?: string;
  cssReload?: boolean;
  syncToOutput?: boolean;
  // Only usable from a .js config
  converters?: SourcePathConverter[];
}

/**
 * Fully resolved engine options, see `mergeOptions`.
 */
export interface HotReloadOptions {
  projectRoot: string;
  debounceMs: number;
  viewExtensions: string[];
  stylesheetExtensions: string[];
  includeNamespaces: string[];
  includeFallbackTag: string;
  cssReload: boolean;
  syncToOutput: boolean;
  converters: SourcePathConverter[];
}
