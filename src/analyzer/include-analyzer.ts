import { DOMParser } from '@xmldom/xmldom';
import * as fs from 'fs';
import * as path from 'path';
import { PathResolver, stripQuery, toFileSystemPath } from '../resolver/path-resolver';
import { logger } from '../utils/debug-logger';

export const DEFAULT_INCLUDE_NAMESPACES = ['http://javafx.com/fxml/1', 'http://javafx.com/fxml'];
export const DEFAULT_INCLUDE_FALLBACK_TAG = 'fx:include';

const INCLUDE_LOCAL_NAME = 'include';
const SOURCE_ATTRIBUTE = 'source';

// Internal subsets included, so no entity declaration reaches the parser
const DOCTYPE_PATTERN = /<!DOCTYPE[^>[]*(\[[\s\S]*?\])?\s*>/gi;

export interface IncludeAnalyzerOptions {
  /** Namespace URIs whose `include` elements count as includes. */
  namespaces?: string[];
  /** Qualified tag name matched without namespace resolution. */
  fallbackTag?: string;
}

/**
 * Finds the declarative files a view file includes, transitively.
 *
 * Include resolution rules:
 * 1. `source="Header.fxml"` or `source="../common/Footer.fxml"` resolve against
 *    the directory of the including file (not the root being analysed).
 * 2. `source="/com/example/Toolbar.fxml"` resolves against the resource root
 *    (output or source directory) of the including file, or the filesystem
 *    root when the file is not inside a known build layout.
 */
export class IncludeAnalyzer {
  private readonly pathResolver: PathResolver;
  private readonly namespaces: string[];
  private readonly fallbackTag: string;

  constructor(pathResolver: PathResolver, options: IncludeAnalyzerOptions = {}) {
    this.pathResolver = pathResolver;
    this.namespaces = options.namespaces ?? DEFAULT_INCLUDE_NAMESPACES;
    this.fallbackTag = options.fallbackTag ?? DEFAULT_INCLUDE_FALLBACK_TAG;
  }

  /**
   * Returns the absolute paths of the root file and every file it includes,
   * directly or through other includes. Failures on single files are logged
   * and skipped; this method does not throw.
   */
  findAllIncluded(rootLocation: string | URL): Set<string> {
    const all = new Set<string>();
    const rootPath = toFileSystemPath(rootLocation);
    if (!rootPath) {
      logger.warn(`Cannot analyze includes of non-file location: ${String(rootLocation)}`);
      return all;
    }

    this.analyzeRecursive(path.resolve(rootPath), all, new Set<string>());
    logger.debug(`Found ${all.size} file(s) in include tree of ${rootPath}`);
    return all;
  }

  /**
   * Raw `source` attribute values of the include elements in one file.
   */
  parseIncludeSources(content: string): string[] {
    const sanitized = content.replace(DOCTYPE_PATTERN, '');
    const parser = new DOMParser({
      locator: {},
      errorHandler: {
        warning: (msg: string) => logger.trace(`XML warning: ${msg}`),
        error: (msg: string) => logger.debug(`XML error: ${msg}`),
        fatalError: (msg: string) => {
          throw new Error(msg);
        },
      },
    });
    const doc = parser.parseFromString(sanitized, 'text/xml');

    const seen = new Set<Element>();
    const sources: string[] = [];
    const collect = (elements: HTMLCollectionOf<Element>) => {
      for (let i = 0; i < elements.length; i++) {
        const element = elements[i];
        if (seen.has(element)) {
          continue;
        }
        seen.add(element);
        const source = element.getAttribute(SOURCE_ATTRIBUTE);
        if (source) {
          sources.push(source);
        }
      }
    };

    for (const namespace of this.namespaces) {
      collect(doc.getElementsByTagNameNS(namespace, INCLUDE_LOCAL_NAME));
    }
    collect(doc.getElementsByTagName(this.fallbackTag));
    return sources;
  }

  /**
   * Resolves an include `source` against the file that declares it.
   */
  resolveInclude(source: string, includingFile: string): string {
    const cleaned = stripQuery(source.trim());

    if (/^[a-z][a-z0-9+.-]+:/i.test(cleaned)) {
      const filePath = toFileSystemPath(cleaned);
      if (!filePath) {
        throw new Error(`unsupported include location '${source}'`);
      }
      return path.resolve(filePath);
    }

    if (cleaned.startsWith('/')) {
      const resourceRoot = this.pathResolver.findResourceRoot(includingFile);
      return resourceRoot ? path.join(resourceRoot, cleaned.slice(1)) : path.resolve(cleaned);
    }

    return path.resolve(path.dirname(includingFile), cleaned);
  }

  private analyzeRecursive(file: string, all: Set<string>, visiting: Set<string>): void {
    if (visiting.has(file)) {
      logger.warn(`Circular include detected: ${file}`);
      return;
    }
    if (all.has(file)) {
      logger.trace(`Already analyzed, skipping: ${file}`);
      return;
    }

    visiting.add(file);
    all.add(file);
    try {
      const content = fs.readFileSync(file, 'utf-8');
      if (!this.mayContainInclude(content)) {
        logger.trace(`No include found, skipping parse: ${file}`);
        return;
      }

      const sources = this.parseIncludeSources(content);
      logger.trace(`Found ${sources.length} include(s) in ${file}`);
      for (const source of sources) {
        try {
          const included = this.resolveInclude(source, file);
          logger.trace(`Resolving include: ${source} -> ${included}`);
          this.analyzeRecursive(included, all, visiting);
        } catch (e) {
          logger.warn(`Failed to resolve include '${source}' in ${file}: ${e instanceof Error ? e.message : String(e)}`);
        }
      }
    } catch (e) {
      logger.warn(`Failed to analyze ${file}: ${e instanceof Error ? e.message : String(e)}`);
    } finally {
      visiting.delete(file);
    }
  }

  private mayContainInclude(content: string): boolean {
    return content.includes(INCLUDE_LOCAL_NAME) || content.includes(this.fallbackTag);
  }
}
