import { ComponentRegistry, ReferenceFactory } from './analyzer/component-registry';
import { DependencyGraph } from './analyzer/dependency-graph';
import { IncludeAnalyzer } from './analyzer/include-analyzer';
import { ReloadDispatcher } from './reload/reload-dispatcher';
import { PathResolver } from './resolver/path-resolver';
import { HotReloadOptions } from './types/command-options';
import { Reloadable, UiExecutor } from './types/reloadable';
import { logger } from './utils/debug-logger';
import { FileWatcher } from './watcher/file-watcher';

export interface HotReloadManagerDeps {
  executor?: UiExecutor;
  createReference?: ReferenceFactory;
  fileWatcher?: FileWatcher;
}

/**
 * Wires resolver, analyzer, registry, watcher and dispatcher together.
 *
 * @example
 * const manager = new HotReloadManager(mergeOptions({ project: process.cwd() }, null));
 * manager.register(mainView);
 * manager.start();
 */
export class HotReloadManager {
  readonly pathResolver: PathResolver;
  readonly graph: DependencyGraph;
  readonly registry: ComponentRegistry;
  readonly fileWatcher: FileWatcher;
  private dispatcher: ReloadDispatcher;
  private stopped = false;

  constructor(
    private readonly options: HotReloadOptions,
    private readonly deps: HotReloadManagerDeps = {},
  ) {
    this.pathResolver = new PathResolver({ converters: options.converters });
    const analyzer = new IncludeAnalyzer(this.pathResolver, {
      namespaces: options.includeNamespaces,
      fallbackTag: options.includeFallbackTag,
    });
    this.graph = new DependencyGraph();
    this.registry = new ComponentRegistry(this.graph, analyzer, this.pathResolver, {
      stylesheetExtensions: options.stylesheetExtensions,
      projectRoot: options.projectRoot,
      createReference: deps.createReference,
    });
    this.fileWatcher = deps.fileWatcher ?? new FileWatcher({ debounceMs: options.debounceMs });
    this.dispatcher = this.createDispatcher();
  }

  register(component: Reloadable): boolean {
    return this.dispatcher.register(component);
  }

  unregister(component: Reloadable): void {
    this.dispatcher.unregister(component);
  }

  /**
   * Starts watching. After `stop()` the files of every surviving registration
   * are watched again.
   */
  start(): void {
    if (this.fileWatcher.isRunning()) {
      return;
    }
    if (this.stopped) {
      this.dispatcher.watchRegistered();
      this.stopped = false;
    }
    this.fileWatcher.start();
    logger.info(`Hot reload started for ${this.options.projectRoot}`);
  }

  async stop(): Promise<void> {
    await this.fileWatcher.stop();
    this.stopped = true;
    logger.info('Hot reload stopped');
  }

  isRunning(): boolean {
    return this.fileWatcher.isRunning();
  }

  /**
   * Stops watching and forgets every registration.
   */
  async reset(): Promise<void> {
    await this.stop();
    this.dispatcher.dispose();
    this.registry.reset();
    this.dispatcher = this.createDispatcher();
  }

  private createDispatcher(): ReloadDispatcher {
    return new ReloadDispatcher(this.registry, this.fileWatcher, this.pathResolver, {
      executor: this.deps.executor,
      viewExtensions: this.options.viewExtensions,
      stylesheetExtensions: this.options.stylesheetExtensions,
      cssReload: this.options.cssReload,
      syncToOutput: this.options.syncToOutput,
      projectRoot: this.options.projectRoot,
    });
  }
}
