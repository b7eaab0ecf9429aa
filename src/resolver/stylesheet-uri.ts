import * as fs from 'fs';
import * as path from 'path';
import { pathToFileURL } from 'url';
import { SOURCE_MARKERS } from './build-system';
import { PathResolver } from './path-resolver';

/**
 * Resource path of a stylesheet URI as it appears in a component's style list.
 * Accepts `file:` URLs, archive URLs and bare resource paths.
 */
export function stylesheetResourcePath(uri: string, resolver: PathResolver): string | null {
  if (!uri) {
    return null;
  }
  if (uri.startsWith('file:') || uri.startsWith('jar:')) {
    return resolver.extractResourcePath(uri);
  }
  // Already a resource path, e.g. "app/Main.css"
  if (!uri.includes(':') && !uri.startsWith('/')) {
    return uri.split('?')[0];
  }
  return null;
}

/**
 * Looks for a resource under each known source directory of a project.
 */
export function findSourceFile(resourcePath: string, projectRoot: string): string | null {
  for (const marker of SOURCE_MARKERS) {
    const candidate = path.join(projectRoot, marker.slice(1, -1), resourcePath);
    if (fs.existsSync(candidate)) {
      return candidate;
    }
  }
  return null;
}

/**
 * Rewrites a stylesheet URI to point at the editable source file, so a
 * refresh picks up an edit before the build copies it to the output
 * directory.
 */
export function toSourceStylesheetUri(
  uri: string,
  projectRoot: string,
  resolver: PathResolver,
): string | null {
  const resourcePath = stylesheetResourcePath(uri, resolver);
  if (!resourcePath) {
    return null;
  }
  const sourceFile = findSourceFile(resourcePath, projectRoot);
  return sourceFile ? pathToFileURL(sourceFile).href : null;
}
