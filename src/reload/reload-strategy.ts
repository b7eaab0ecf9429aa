import * as path from 'path';

export enum ReloadStrategy {
  /** Rebuild the whole component */
  FULL_RELOAD = 'full',
  /** Re-apply stylesheets in place, keeping component state */
  STYLESHEET_RELOAD = 'stylesheet',
  IGNORE = 'ignore',
}

export const DEFAULT_VIEW_EXTENSIONS = ['fxml'];

// Resources a view reads at load time
const FULL_RELOAD_EXTENSIONS = new Set(['properties', 'png', 'jpg', 'jpeg', 'gif', 'svg', 'ico']);

export interface StrategyOptions {
  viewExtensions: readonly string[];
  stylesheetExtensions: readonly string[];
  cssReload: boolean;
}

/**
 * Lower-case extension without the dot; '' for files without one.
 */
export function getExtension(file: string): string {
  return path.extname(file).slice(1).toLowerCase();
}

export function strategyForExtension(extension: string, options: StrategyOptions): ReloadStrategy {
  const ext = extension.replace(/^\./, '').toLowerCase();
  if (!ext) {
    return ReloadStrategy.IGNORE;
  }
  if (options.viewExtensions.includes(ext) || FULL_RELOAD_EXTENSIONS.has(ext)) {
    return ReloadStrategy.FULL_RELOAD;
  }
  if (options.stylesheetExtensions.includes(ext)) {
    return options.cssReload ? ReloadStrategy.STYLESHEET_RELOAD : ReloadStrategy.IGNORE;
  }
  return ReloadStrategy.IGNORE;
}
