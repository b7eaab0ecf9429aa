import * as fs from 'fs';
import * as path from 'path';
import { fileURLToPath } from 'url';
import { logger } from '../utils/debug-logger';
import {
  BUILD_SYSTEM_PROFILES,
  BUILD_TOOL_ORDER,
  BuildSystemProfile,
  BuildTool,
  OUTPUT_DIR_PRIORITY,
  SOURCE_MARKERS,
  SourcePathConverter,
} from './build-system';

const ARCHIVE_SEPARATOR = '!/';

export interface PathResolverOptions {
  /** Tried before the built-in converters, in the given order. */
  converters?: SourcePathConverter[];
  profiles?: readonly BuildSystemProfile[];
}

interface MarkerSplit {
  /** Everything before the marker, no trailing slash. May be '' for relative input. */
  root: string;
  /** Everything after the marker. */
  rest: string;
  marker: string;
}

export function normalizeSeparators(input: string): string {
  return input.replace(/\\/g, '/');
}

/**
 * Drops cache-busting suffixes such as `?v=12`.
 */
export function stripQuery(location: string): string {
  const queryIndex = location.indexOf('?');
  return queryIndex >= 0 ? location.slice(0, queryIndex) : location;
}

/**
 * Turns a runtime location into a forward-slash filesystem path.
 * Archive entries and non-file URLs have no filesystem path and yield null.
 */
export function toFileSystemPath(location: string | URL): string | null {
  const raw = stripQuery(typeof location === 'string' ? location : location.href);

  if (raw.startsWith('jar:') || raw.includes(ARCHIVE_SEPARATOR)) {
    return null;
  }
  if (raw.startsWith('file:')) {
    try {
      return normalizeSeparators(fileURLToPath(raw));
    } catch (e) {
      logger.trace(`Not a usable file URL '${raw}': ${e instanceof Error ? e.message : String(e)}`);
      return null;
    }
  }
  // Other schemes (http:, https:, ...) are never local files
  if (/^[a-z][a-z0-9+.-]+:\/\//i.test(raw)) {
    return null;
  }
  return normalizeSeparators(raw);
}

/**
 * Splits a path around the first occurrence of a '/'-delimited marker.
 */
export function splitAtMarker(filePath: string, marker: string): MarkerSplit | null {
  const normalized = normalizeSeparators(filePath);
  const prefixed = !normalized.startsWith('/');
  const padded = prefixed ? `/${normalized}` : normalized;
  const index = padded.indexOf(marker);
  if (index < 0) {
    return null;
  }
  const root = padded.slice(0, index);
  return {
    // A marker at the very start of an absolute path means the filesystem root
    root: prefixed ? root.slice(1) : root || '/',
    rest: padded.slice(index + marker.length),
    marker,
  };
}

function joinSegments(root: string, ...segments: string[]): string {
  return path.normalize([root, ...segments].filter((s) => s.length > 0).join('/'));
}

function fileExists(candidate: string): boolean {
  try {
    return fs.statSync(candidate).isFile();
  } catch {
    return false;
  }
}

/**
 * Builds a converter from (output dir, source dir) pairs, e.g.
 * `['target/classes', 'src/main/resources']`. Pairs are tried in order and the
 * first candidate that exists on disk wins.
 */
export function createReplacementConverter(
  pairs: ReadonlyArray<readonly [string, string]>,
): SourcePathConverter {
  return (runtimeLocation: string) => {
    const filePath = toFileSystemPath(runtimeLocation);
    if (!filePath) {
      return null;
    }
    for (const [from, to] of pairs) {
      const split = splitAtMarker(filePath, `/${from}/`);
      if (!split) {
        continue;
      }
      const candidate = joinSegments(split.root, to, split.rest);
      if (fileExists(candidate)) {
        logger.trace(`Converted: ${runtimeLocation} → ${candidate}`);
        return candidate;
      }
    }
    return null;
  };
}

/**
 * Combines converters into one; the first non-null answer wins.
 */
export function chainConverters(...converters: SourcePathConverter[]): SourcePathConverter {
  return (runtimeLocation: string) => {
    for (const converter of converters) {
      const result = converter(runtimeLocation);
      if (result) {
        return result;
      }
    }
    return null;
  };
}

/**
 * Maps between where a resource was loaded from (compiled output) and the file
 * a developer edits (source tree), and derives canonical resource paths.
 */
export class PathResolver {
  private readonly profiles: readonly BuildSystemProfile[];
  private readonly converters: SourcePathConverter[];

  constructor(options: PathResolverOptions = {}) {
    this.profiles = options.profiles ?? BUILD_SYSTEM_PROFILES;
    this.converters = [
      ...(options.converters ?? []),
      ...BUILD_TOOL_ORDER.map((tool) => this.createProfileConverter(tool)),
    ];
  }

  /**
   * Resolves a runtime location to the existing source file it was built from.
   *
   * @returns The source path, or null when no converter produced an existing
   * file. Callers fall back to the runtime location.
   */
  public toSourcePath(runtimeLocation: string | URL): string | null {
    const location = stripQuery(
      typeof runtimeLocation === 'string' ? runtimeLocation : runtimeLocation.href,
    );
    if (location.startsWith('jar:') || location.includes(ARCHIVE_SEPARATOR)) {
      logger.trace(`Archive location has no editable source: ${location}`);
      return null;
    }

    for (const converter of this.converters) {
      try {
        const result = converter(location);
        if (result) {
          return result;
        }
      } catch (e) {
        logger.trace(`Source path converter failed for ${location}: ${e instanceof Error ? e.message : String(e)}`);
      }
    }

    logger.trace(`No source file found for ${location}`);
    return null;
  }

  /**
   * Extracts the canonical resource path (e.g. `com/example/Main.fxml`) from an
   * output path, a source path or an archive location.
   */
  public extractResourcePath(fullPath: string | URL): string | null {
    const raw = stripQuery(typeof fullPath === 'string' ? fullPath : fullPath.href);

    const archiveIndex = raw.indexOf(ARCHIVE_SEPARATOR);
    if (archiveIndex >= 0) {
      const inner = raw.slice(archiveIndex + ARCHIVE_SEPARATOR.length).replace(/^\/+/, '');
      return inner.length > 0 ? inner : null;
    }

    const filePath = toFileSystemPath(raw);
    if (!filePath) {
      return null;
    }

    const split = this.splitAtOutputMarker(filePath) ?? this.splitAtSourceMarker(filePath);
    if (!split || split.rest.length === 0) {
      logger.trace(`No build layout marker in ${filePath}`);
      return null;
    }
    return split.rest;
  }

  /**
   * Returns the profile whose output marker occurs in the path, first in
   * priority order.
   */
  public matchProfile(filePath: string): BuildSystemProfile | null {
    const normalized = this.withTrailingSlash(normalizeSeparators(filePath));
    for (const profile of this.profiles) {
      if (splitAtMarker(normalized, profile.outputMarker)) {
        return profile;
      }
    }
    return null;
  }

  /**
   * Project root of an output or source path, e.g. `/work/app` for
   * `/work/app/target/classes/Main.fxml`.
   */
  public extractProjectRoot(filePath: string): string | null {
    const normalized = this.withTrailingSlash(normalizeSeparators(filePath));
    const split = this.splitAtOutputMarker(normalized) ?? this.splitAtSourceMarker(normalized);
    return split ? split.root : null;
  }

  /**
   * The directory resource paths are relative to: the output or source
   * directory containing the file.
   */
  public findResourceRoot(filePath: string): string | null {
    const split = this.splitAtOutputMarker(filePath) ?? this.splitAtSourceMarker(filePath);
    if (!split) {
      return null;
    }
    return joinSegments(split.root, split.marker.slice(1, -1));
  }

  public isSourcePath(filePath: string): boolean {
    return this.splitAtSourceMarker(this.withTrailingSlash(normalizeSeparators(filePath))) !== null;
  }

  public isTestSourcePath(filePath: string): boolean {
    return normalizeSeparators(filePath).includes('/src/test/');
  }

  /**
   * Finds the output counterpart of a source file in the first output
   * directory that exists (Gradle, then Maven, then IntelliJ).
   */
  public toOutputPath(sourcePath: string): string | null {
    const split = this.splitAtSourceMarker(normalizeSeparators(sourcePath));
    if (!split) {
      return null;
    }
    const test = this.isTestSourcePath(sourcePath);

    for (const tool of OUTPUT_DIR_PRIORITY) {
      const outputDirs = new Set(
        this.profiles.filter((p) => p.tool === tool && p.test === test).map((p) => p.outputDir),
      );
      for (const outputDir of outputDirs) {
        const outputRoot = joinSegments(split.root, outputDir);
        if (fs.existsSync(outputRoot)) {
          return joinSegments(split.root, outputDir, split.rest);
        }
      }
    }
    return null;
  }

  private createProfileConverter(tool: BuildTool): SourcePathConverter {
    const profiles = this.profiles.filter((p) => p.tool === tool);
    return (runtimeLocation: string) => {
      const filePath = toFileSystemPath(runtimeLocation);
      if (!filePath) {
        return null;
      }
      for (const profile of profiles) {
        const split = splitAtMarker(filePath, profile.outputMarker);
        if (!split) {
          continue;
        }
        for (const sourceDir of [profile.sourceDir, ...profile.alternateSourceDirs]) {
          const candidate = joinSegments(split.root, sourceDir, split.rest);
          if (fileExists(candidate)) {
            logger.trace(`Converted (${tool}): ${runtimeLocation} → ${candidate}`);
            return candidate;
          }
        }
      }
      return null;
    };
  }

  private splitAtOutputMarker(filePath: string): MarkerSplit | null {
    for (const profile of this.profiles) {
      const split = splitAtMarker(filePath, profile.outputMarker);
      if (split) {
        return split;
      }
    }
    return null;
  }

  private splitAtSourceMarker(filePath: string): MarkerSplit | null {
    for (const marker of SOURCE_MARKERS) {
      const split = splitAtMarker(filePath, marker);
      if (split) {
        return split;
      }
    }
    return null;
  }

  private withTrailingSlash(filePath: string): string {
    return filePath.endsWith('/') ? filePath : `${filePath}/`;
  }
}
