// Public API
export {
  ComponentRegistry,
  DEFAULT_STYLESHEET_EXTENSIONS,
  weakReferenceFactory,
} from './analyzer/component-registry';
export type {
  ComponentRef,
  ComponentRegistryOptions,
  ReferenceFactory,
  Registration,
} from './analyzer/component-registry';
export { DependencyGraph } from './analyzer/dependency-graph';
export {
  DEFAULT_INCLUDE_FALLBACK_TAG,
  DEFAULT_INCLUDE_NAMESPACES,
  IncludeAnalyzer,
} from './analyzer/include-analyzer';
export type { IncludeAnalyzerOptions } from './analyzer/include-analyzer';
export { HotReloadManager } from './hot-reload-manager';
export type { HotReloadManagerDeps } from './hot-reload-manager';
export { ReloadDispatcher } from './reload/reload-dispatcher';
export type { ReloadDispatcherOptions, ReloadState } from './reload/reload-dispatcher';
export {
  DEFAULT_VIEW_EXTENSIONS,
  getExtension,
  ReloadStrategy,
  strategyForExtension,
} from './reload/reload-strategy';
export { immediateExecutor } from './reload/ui-executor';
export { BUILD_SYSTEM_PROFILES } from './resolver/build-system';
export type { BuildSystemProfile, BuildTool, SourcePathConverter } from './resolver/build-system';
export {
  chainConverters,
  createReplacementConverter,
  PathResolver,
  toFileSystemPath,
} from './resolver/path-resolver';
export { toSourceStylesheetUri } from './resolver/stylesheet-uri';
export type { ConfigFileOptions, HotReloadOptions } from './types/command-options';
export type { Reloadable, StyleRefreshTarget, UiExecutor } from './types/reloadable';
export { ConfigLoader } from './utils/config-loader';
export { logger, LogLevel } from './utils/debug-logger';
export { mergeOptions } from './utils/options-merger';
export { DEFAULT_DEBOUNCE_MS, FileWatcher } from './watcher/file-watcher';
export type { ChangeListener, FileWatcherOptions } from './watcher/file-watcher';
