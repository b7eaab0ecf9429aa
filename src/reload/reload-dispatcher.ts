import * as fs from 'fs';
import * as path from 'path';
import { ComponentRegistry, DEFAULT_STYLESHEET_EXTENSIONS } from '../analyzer/component-registry';
import { PathResolver, toFileSystemPath } from '../resolver/path-resolver';
import {
  findSourceFile,
  stylesheetResourcePath,
  toSourceStylesheetUri,
} from '../resolver/stylesheet-uri';
import { Reloadable, StyleRefreshTarget, UiExecutor } from '../types/reloadable';
import { logger } from '../utils/debug-logger';
import { ChangeListener, FileWatcher } from '../watcher/file-watcher';
import {
  DEFAULT_VIEW_EXTENSIONS,
  getExtension,
  ReloadStrategy,
  strategyForExtension,
} from './reload-strategy';
import { immediateExecutor } from './ui-executor';

export type ReloadState = 'idle' | 'pending' | 'reloading';

export interface ReloadDispatcherOptions {
  executor?: UiExecutor;
  viewExtensions?: string[];
  stylesheetExtensions?: string[];
  cssReload?: boolean;
  /** Copy edited source files over their build output before dispatching. */
  syncToOutput?: boolean;
  /** Where bare stylesheet resource paths are looked up when a view sits outside a build layout. */
  projectRoot?: string;
}

function* stylesheetUris(target: StyleRefreshTarget): Generator<string> {
  yield* target.getStylesheets();
  for (const child of target.children?.() ?? []) {
    yield* stylesheetUris(child);
  }
}

/**
 * Turns debounced file changes into component reloads.
 *
 * Per resource path the dispatcher moves `idle → pending → reloading → idle`.
 * A change that fires while its path is still reloading is remembered and fed
 * back through the watcher once the reload task has run.
 */
export class ReloadDispatcher {
  private readonly executor: UiExecutor;
  private readonly viewExtensions: string[];
  private readonly stylesheetExtensions: string[];
  private readonly cssReload: boolean;
  private readonly syncToOutput: boolean;
  private readonly projectRoot?: string;
  private readonly sharedStylesheetFiles = new Set<string>();
  private readonly states = new Map<string, ReloadState>();
  private readonly requeued = new Map<string, string>();
  private readonly onChange: ChangeListener = (file) => this.handleChange(file);
  private readonly onScheduled = (file: string) => this.markPending(file);
  private readonly onStopped = () => this.clearPending();

  constructor(
    private readonly registry: ComponentRegistry,
    private readonly fileWatcher: FileWatcher,
    private readonly pathResolver: PathResolver,
    options: ReloadDispatcherOptions = {},
  ) {
    this.executor = options.executor ?? immediateExecutor;
    this.viewExtensions = options.viewExtensions ?? DEFAULT_VIEW_EXTENSIONS;
    this.stylesheetExtensions = options.stylesheetExtensions ?? DEFAULT_STYLESHEET_EXTENSIONS;
    this.cssReload = options.cssReload ?? true;
    this.syncToOutput = options.syncToOutput ?? true;
    this.projectRoot = options.projectRoot;
    this.fileWatcher.on('scheduled', this.onScheduled);
    this.fileWatcher.on('stopped', this.onStopped);
  }

  /**
   * Registers a component and watches its view file, every include, the
   * stylesheets sitting next to the view and every stylesheet its style
   * lists name.
   */
  register(component: Reloadable): boolean {
    const registration = this.registry.register(component);
    if (!registration) {
      return false;
    }
    this.watchFiles(registration.files);

    const rootFile = this.registry.rootFile(registration.resourcePath);
    if (rootFile) {
      this.watchFiles(this.findStylesheetFiles(rootFile));
    }
    if (this.cssReload) {
      this.trackStylesheets(component, rootFile);
    }
    return true;
  }

  /**
   * Watches the files of every registered root again, e.g. after the watcher
   * was stopped and is about to be restarted.
   */
  watchRegistered(): void {
    for (const root of this.registry.roots()) {
      this.watchFiles(this.registry.reanalyze(root));
      const rootFile = this.registry.rootFile(root);
      if (rootFile) {
        this.watchFiles(this.findStylesheetFiles(rootFile));
      }
    }
    this.watchFiles(this.sharedStylesheetFiles);
  }

  unregister(component: Reloadable): void {
    this.registry.unregister(component);
  }

  stateOf(resourcePath: string): ReloadState {
    return this.states.get(resourcePath) ?? 'idle';
  }

  /**
   * Handles one debounced change. Also callable directly to force a reload.
   */
  handleChange(file: string): void {
    const resourcePath = this.registry.resourceKeyFor(file);
    if (this.states.get(resourcePath) === 'reloading') {
      logger.debug(`Reload in progress, requeueing: ${resourcePath}`);
      this.requeued.set(resourcePath, file);
      return;
    }

    const strategy = strategyForExtension(getExtension(file), {
      viewExtensions: this.viewExtensions,
      stylesheetExtensions: this.stylesheetExtensions,
      cssReload: this.cssReload,
    });
    if (strategy === ReloadStrategy.IGNORE) {
      logger.trace(`Ignoring change: ${resourcePath}`);
      this.states.delete(resourcePath);
      return;
    }

    if (this.syncToOutput) {
      this.copyToOutput(file);
    }

    this.states.set(resourcePath, 'reloading');
    if (strategy === ReloadStrategy.STYLESHEET_RELOAD) {
      this.dispatchStylesheetChange(resourcePath, file);
    } else {
      this.dispatchViewChange(resourcePath);
    }
  }

  /**
   * Forgets state and stops listening; pending UI tasks still run.
   */
  dispose(): void {
    this.fileWatcher.off('scheduled', this.onScheduled);
    this.fileWatcher.off('stopped', this.onStopped);
    this.states.clear();
    this.requeued.clear();
    this.sharedStylesheetFiles.clear();
  }

  private dispatchViewChange(resourcePath: string): void {
    const before = this.registry.findAffected(resourcePath);
    for (const root of before) {
      if (this.registry.isRoot(root)) {
        this.watchFiles(this.registry.reanalyze(root));
      }
    }
    const affected = new Set([...before, ...this.registry.findAffected(resourcePath)]);
    const components = this.registry.collectLiveComponents(affected);
    logger.info(`Reloading ${components.size} component(s) for ${resourcePath}`);

    this.runOnUi(resourcePath, components, (component) => component.reload());
  }

  private dispatchStylesheetChange(resourcePath: string, file: string): void {
    const views = this.registry.findViewsUsingStylesheet(resourcePath);
    const components = new Set([
      ...this.registry.collectLiveComponents(views),
      ...this.registry.findStylesheetOwners(resourcePath),
    ]);
    const projectRoot = this.pathResolver.extractProjectRoot(file);
    logger.info(`Refreshing stylesheets of ${components.size} component(s) for ${resourcePath}`);

    this.runOnUi(resourcePath, components, (component) => {
      const target = component.styleRefreshTarget?.() ?? null;
      if (!target) {
        component.reload();
        return;
      }
      try {
        this.refreshStylesheets(target, resourcePath, projectRoot);
      } catch (e) {
        logger.warn(
          `Stylesheet refresh failed for ${component.constructor.name}, reloading: ${e instanceof Error ? e.message : String(e)}`,
        );
        component.reload();
      }
    });
  }

  private refreshStylesheets(
    target: StyleRefreshTarget,
    resourcePath: string,
    projectRoot: string | null,
  ): void {
    const next = target.getStylesheets().map((uri) => {
      if (!projectRoot || stylesheetResourcePath(uri, this.pathResolver) !== resourcePath) {
        return uri;
      }
      return toSourceStylesheetUri(uri, projectRoot, this.pathResolver) ?? uri;
    });
    // Clearing first forces the stylesheets to be parsed again
    target.setStylesheets([]);
    target.setStylesheets(next);

    for (const child of target.children?.() ?? []) {
      this.refreshStylesheets(child, resourcePath, projectRoot);
    }
  }

  private runOnUi(
    resourcePath: string,
    components: Set<Reloadable>,
    action: (component: Reloadable) => void,
  ): void {
    if (components.size === 0) {
      this.finish(resourcePath);
      return;
    }
    this.executor.runLater(() => {
      try {
        for (const component of components) {
          try {
            action(component);
            logger.verbose(`Reloaded ${component.constructor.name} (${resourcePath})`);
          } catch (e) {
            logger.error(
              `Failed to reload ${component.constructor.name} (${resourcePath}): ${e instanceof Error ? e.message : String(e)}`,
            );
          }
        }
      } finally {
        this.finish(resourcePath);
      }
    });
  }

  private finish(resourcePath: string): void {
    this.states.delete(resourcePath);
    const file = this.requeued.get(resourcePath);
    if (file !== undefined) {
      this.requeued.delete(resourcePath);
      this.fileWatcher.notifyChange(file);
    }
  }

  // Timers died with the watch; a path still reloading finishes on its own
  private clearPending(): void {
    for (const [resourcePath, state] of this.states) {
      if (state === 'pending') {
        this.states.delete(resourcePath);
      }
    }
    this.requeued.clear();
  }

  private markPending(file: string): void {
    const resourcePath = this.registry.resourceKeyFor(file);
    if (this.states.get(resourcePath) !== 'reloading') {
      this.states.set(resourcePath, 'pending');
    }
  }

  private watchFiles(files: Iterable<string>): void {
    for (const file of files) {
      this.fileWatcher.watch(file, this.onChange);
    }
  }

  private findStylesheetFiles(viewFile: string): string[] {
    const dir = path.dirname(viewFile);
    const baseName = path.basename(viewFile, path.extname(viewFile));
    return this.stylesheetExtensions
      .map((ext) => path.join(dir, `${baseName}.${ext}`))
      .filter((candidate) => fs.existsSync(candidate));
  }

  private trackStylesheets(component: Reloadable, viewFile: string | undefined): void {
    const projectRoot =
      (viewFile ? this.pathResolver.extractProjectRoot(viewFile) : null) ?? this.projectRoot ?? null;
    const files: string[] = [];
    try {
      const target = component.styleRefreshTarget?.() ?? null;
      if (!target) {
        return;
      }
      for (const uri of stylesheetUris(target)) {
        const resourcePath = stylesheetResourcePath(uri, this.pathResolver);
        if (!resourcePath) {
          continue;
        }
        this.registry.trackStylesheetOwner(resourcePath, component);
        const file = this.locateStylesheet(uri, resourcePath, projectRoot);
        if (file) {
          files.push(file);
          this.sharedStylesheetFiles.add(file);
        }
      }
    } catch (e) {
      logger.debug(
        `Cannot read style lists of ${component.constructor.name}: ${e instanceof Error ? e.message : String(e)}`,
      );
    }
    this.watchFiles(files);
  }

  /** Source file of a listed stylesheet, else the local file it was loaded from. */
  private locateStylesheet(uri: string, resourcePath: string, projectRoot: string | null): string | null {
    const sourceFile = projectRoot ? findSourceFile(resourcePath, projectRoot) : null;
    if (sourceFile) {
      return sourceFile;
    }
    if (!uri.startsWith('file:')) {
      return null;
    }
    const loadedFrom = this.pathResolver.toSourcePath(uri) ?? toFileSystemPath(uri);
    return loadedFrom && fs.existsSync(loadedFrom) ? loadedFrom : null;
  }

  private copyToOutput(file: string): void {
    if (!this.pathResolver.isSourcePath(file)) {
      return;
    }
    const outputPath = this.pathResolver.toOutputPath(file);
    if (!outputPath) {
      return;
    }
    try {
      fs.mkdirSync(path.dirname(outputPath), { recursive: true });
      fs.copyFileSync(file, outputPath);
      logger.verbose(`Synced ${file} → ${outputPath}`);
    } catch (e) {
      logger.warn(`Failed to sync ${file} to ${outputPath}: ${e instanceof Error ? e.message : String(e)}`);
    }
  }
}
