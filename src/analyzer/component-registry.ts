import * as path from 'path';
import { normalizeSeparators, PathResolver, toFileSystemPath } from '../resolver/path-resolver';
import { Reloadable } from '../types/reloadable';
import { logger } from '../utils/debug-logger';
import { DependencyGraph } from './dependency-graph';
import { IncludeAnalyzer } from './include-analyzer';

export interface ComponentRef<T extends object> {
  deref(): T | undefined;
}

export type ReferenceFactory = <T extends object>(target: T) => ComponentRef<T>;

export const weakReferenceFactory: ReferenceFactory = (target) => new WeakRef(target);

export interface ComponentRegistryOptions {
  stylesheetExtensions?: string[];
  /** Keys files outside any build layout relative to this directory. */
  projectRoot?: string;
  createReference?: ReferenceFactory;
}

export interface Registration {
  resourcePath: string;
  /** Root file and its includes, as analyzed. Empty when the cached analysis was reused. */
  files: string[];
}

export const DEFAULT_STYLESHEET_EXTENSIONS = ['css', 'bss'];

function splitResourcePath(resourcePath: string): { dir: string; baseName: string } {
  const lastSlash = resourcePath.lastIndexOf('/');
  const fileName = lastSlash >= 0 ? resourcePath.slice(lastSlash + 1) : resourcePath;
  const lastDot = fileName.lastIndexOf('.');
  return {
    dir: lastSlash > 0 ? resourcePath.slice(0, lastSlash) : '',
    baseName: lastDot > 0 ? fileName.slice(0, lastDot) : fileName,
  };
}

/**
 * Live components by resource path, plus the include graph and the
 * stylesheet → view mapping derived from their declarative files.
 *
 * Components are held through weak references; a component the application
 * dropped is skipped when collected, never kept alive.
 */
export class ComponentRegistry {
  private readonly componentsByPath = new Map<string, ComponentRef<Reloadable>[]>();
  private readonly rootFiles = new Map<string, string>();
  private readonly analyzedRoots = new Set<string>();
  private readonly stylesheetToViews = new Map<string, Set<string>>();
  private readonly stylesheetOwners = new Map<string, ComponentRef<Reloadable>[]>();
  private readonly stylesheetExtensions: string[];
  private readonly projectRoot?: string;
  private readonly createReference: ReferenceFactory;

  constructor(
    private readonly graph: DependencyGraph,
    private readonly analyzer: IncludeAnalyzer,
    private readonly pathResolver: PathResolver,
    options: ComponentRegistryOptions = {},
  ) {
    this.stylesheetExtensions = options.stylesheetExtensions ?? DEFAULT_STYLESHEET_EXTENSIONS;
    this.projectRoot = options.projectRoot;
    this.createReference = options.createReference ?? weakReferenceFactory;
  }

  /**
   * Registers a component and, once per root, analyzes its include tree.
   * Returns null (after logging) when the component cannot be registered.
   */
  register(component: Reloadable): Registration | null {
    try {
      const resourcePath = component.resourcePath();
      if (!resourcePath) {
        logger.warn(`Cannot register component with empty resource path: ${component.constructor.name}`);
        return null;
      }

      let refs = this.componentsByPath.get(resourcePath);
      if (!refs) {
        refs = [];
        this.componentsByPath.set(resourcePath, refs);
      }
      refs.push(this.createReference(component));
      logger.debug(`Registered component: ${component.constructor.name} -> ${resourcePath}`);

      this.buildStylesheetMapping(resourcePath);

      if (this.analyzedRoots.has(resourcePath)) {
        return { resourcePath, files: [] };
      }
      const location = component.sourceLocation();
      const rootFile =
        this.pathResolver.toSourcePath(location) ?? toFileSystemPath(location) ?? location.toString();
      this.rootFiles.set(resourcePath, rootFile);
      return { resourcePath, files: this.analyze(resourcePath) };
    } catch (e) {
      logger.error(`Failed to register ${component.constructor.name}: ${e instanceof Error ? e.message : String(e)}`);
      return null;
    }
  }

  unregister(component: Reloadable): void {
    for (const refsByPath of [this.componentsByPath, this.stylesheetOwners]) {
      for (const [key, refs] of refsByPath) {
        const remaining = refs.filter((ref) => {
          const target = ref.deref();
          return target !== undefined && target !== component;
        });
        refsByPath.set(key, remaining);
      }
    }
  }

  /**
   * Records that a component lists a stylesheet in one of its style lists,
   * whatever its file name. Held weakly like the component itself.
   */
  trackStylesheetOwner(stylesheetPath: string, component: Reloadable): void {
    let refs = this.stylesheetOwners.get(stylesheetPath);
    if (!refs) {
      refs = [];
      this.stylesheetOwners.set(stylesheetPath, refs);
    }
    if (refs.some((ref) => ref.deref() === component)) {
      return;
    }
    refs.push(this.createReference(component));
    logger.trace(`Stylesheet owner: ${stylesheetPath} -> ${component.constructor.name}`);
  }

  /** Live components whose style lists contain the stylesheet. */
  findStylesheetOwners(stylesheetPath: string): Set<Reloadable> {
    const live = new Set<Reloadable>();
    for (const ref of this.stylesheetOwners.get(stylesheetPath) ?? []) {
      const component = ref.deref();
      if (component) {
        live.add(component);
      }
    }
    return live;
  }

  /**
   * Re-runs include analysis for a registered root, replacing its edges.
   * Returns the files found, or an empty list for unknown roots.
   */
  reanalyze(resourcePath: string): string[] {
    if (!this.rootFiles.has(resourcePath)) {
      return [];
    }
    return this.analyze(resourcePath);
  }

  /**
   * Forgets the cached analysis so the next `register` for this root runs it again.
   */
  invalidate(resourcePath: string): void {
    this.analyzedRoots.delete(resourcePath);
  }

  isRoot(resourcePath: string): boolean {
    return this.rootFiles.has(resourcePath);
  }

  roots(): string[] {
    return [...this.rootFiles.keys()];
  }

  rootFile(resourcePath: string): string | undefined {
    return this.rootFiles.get(resourcePath);
  }

  findAffected(changedResourcePath: string): Set<string> {
    return this.graph.findAffected(changedResourcePath);
  }

  /**
   * Views that conventionally use a stylesheet (same directory and base
   * name), plus everything that includes them.
   */
  findViewsUsingStylesheet(stylesheetPath: string): Set<string> {
    const result = new Set<string>();
    for (const view of this.stylesheetToViews.get(stylesheetPath) ?? []) {
      for (const affected of this.graph.findAffected(view)) {
        result.add(affected);
      }
    }
    return result;
  }

  collectLiveComponents(resourcePaths: Iterable<string>): Set<Reloadable> {
    const live = new Set<Reloadable>();
    for (const resourcePath of resourcePaths) {
      for (const ref of this.componentsByPath.get(resourcePath) ?? []) {
        const component = ref.deref();
        if (component) {
          live.add(component);
        }
      }
    }
    return live;
  }

  /**
   * Canonical key of a file: its resource path inside a build layout, else
   * its path relative to the project root, else its absolute path.
   */
  resourceKeyFor(file: string): string {
    const resourcePath = this.pathResolver.extractResourcePath(file);
    if (resourcePath) {
      return resourcePath;
    }
    const absolute = path.resolve(file);
    if (this.projectRoot) {
      const relative = path.relative(this.projectRoot, absolute);
      if (relative && !relative.startsWith('..') && !path.isAbsolute(relative)) {
        return normalizeSeparators(relative);
      }
    }
    return normalizeSeparators(absolute);
  }

  /** Stylesheet resource paths mapped to at least one view. */
  stylesheets(): string[] {
    return [...this.stylesheetToViews.keys()];
  }

  trackedStylesheets(): string[] {
    return [...this.stylesheetOwners.keys()];
  }

  reset(): void {
    this.componentsByPath.clear();
    this.rootFiles.clear();
    this.analyzedRoots.clear();
    this.stylesheetToViews.clear();
    this.stylesheetOwners.clear();
    this.graph.clear();
  }

  private analyze(resourcePath: string): string[] {
    const rootFile = this.rootFiles.get(resourcePath);
    if (rootFile === undefined) {
      return [];
    }

    const files = this.analyzer.findAllIncluded(rootFile);
    this.graph.removeOutEdges(resourcePath);
    this.graph.addNode(resourcePath);
    for (const file of files) {
      const included = this.resourceKeyFor(file);
      if (included !== resourcePath) {
        this.graph.addEdge(resourcePath, included);
        logger.verbose(`Dependency: ${included} -> ${resourcePath}`);
      }
    }
    this.analyzedRoots.add(resourcePath);
    return [...files];
  }

  private buildStylesheetMapping(resourcePath: string): void {
    const { dir, baseName } = splitResourcePath(resourcePath);
    for (const ext of this.stylesheetExtensions) {
      const stylesheetPath = `${dir ? `${dir}/` : ''}${baseName}.${ext}`;
      let views = this.stylesheetToViews.get(stylesheetPath);
      if (!views) {
        views = new Set();
        this.stylesheetToViews.set(stylesheetPath, views);
      }
      views.add(resourcePath);
      logger.trace(`Stylesheet mapping: ${stylesheetPath} -> ${resourcePath}`);
    }
  }
}
