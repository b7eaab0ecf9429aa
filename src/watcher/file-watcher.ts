import { FSWatcher, watch } from 'chokidar';
import { EventEmitter } from 'events';
import * as path from 'path';
import { logger } from '../utils/debug-logger';

export type ChangeListener = (file: string) => void;

export const DEFAULT_DEBOUNCE_MS = 200;

export interface FileWatcherOptions {
  /** Quiet window after the last raw event before listeners run. */
  debounceMs?: number;
}

/**
 * Per-file change notification on top of a directory watch.
 *
 * Only the parent directories of watched files are handed to chokidar, one
 * level deep. Bursts of raw events for a file collapse into a single listener
 * call once the file has been quiet for `debounceMs`.
 *
 * Emits `'scheduled'` and `'fired'` with the file path, `'stopped'` once
 * `stop()` has dropped pending work, and `'error'` when the underlying watch
 * fails (only when someone listens for it).
 */
export class FileWatcher extends EventEmitter {
  private readonly debounceMs: number;
  private readonly watchEntries = new Map<string, Set<ChangeListener>>();
  private readonly pendingTasks = new Map<string, NodeJS.Timeout>();
  private readonly watchedDirs = new Set<string>();
  private readonly queuedDirs = new Set<string>();
  private watcher: FSWatcher | null = null;

  constructor(options: FileWatcherOptions = {}) {
    super();
    this.debounceMs = options.debounceMs ?? DEFAULT_DEBOUNCE_MS;
  }

  /**
   * Calls `listener` after `file` changes. Adding the same pair twice has no
   * effect. Works before and after `start()`.
   */
  watch(file: string, listener: ChangeListener): void {
    const key = path.resolve(file);
    let fileListeners = this.watchEntries.get(key);
    if (!fileListeners) {
      fileListeners = new Set();
      this.watchEntries.set(key, fileListeners);
    }
    if (fileListeners.has(listener)) {
      return;
    }
    fileListeners.add(listener);
    logger.trace(`Watching file: ${key}`);
    this.registerDirectory(path.dirname(key));
  }

  unwatch(file: string, listener: ChangeListener): void {
    const key = path.resolve(file);
    const fileListeners = this.watchEntries.get(key);
    if (!fileListeners) {
      return;
    }
    fileListeners.delete(listener);
    if (fileListeners.size === 0) {
      this.watchEntries.delete(key);
      this.cancelPending(key);
    }
  }

  start(): void {
    if (this.watcher) {
      return;
    }
    const dirs = [...this.queuedDirs];
    this.queuedDirs.clear();

    const watcher = watch(dirs, {
      depth: 0,
      ignoreInitial: true,
      persistent: true,
    });
    watcher.on('add', (file: string) => this.handleRawEvent(file));
    watcher.on('change', (file: string) => this.handleRawEvent(file));
    watcher.on('addDir', (dir: string) => this.handleNewDirectory(dir));
    watcher.on('unlinkDir', (dir: string) => this.watchedDirs.delete(path.resolve(dir)));
    watcher.on('error', (error: unknown) => this.handleWatchError(error));
    this.watcher = watcher;

    for (const dir of dirs) {
      this.watchedDirs.add(dir);
    }
    logger.debug(`File watcher started (${dirs.length} director${dirs.length === 1 ? 'y' : 'ies'}, debounce ${this.debounceMs}ms)`);
  }

  /**
   * Closes the directory watch, cancels pending notifications and forgets
   * every watched file.
   */
  async stop(): Promise<void> {
    for (const timer of this.pendingTasks.values()) {
      clearTimeout(timer);
    }
    this.pendingTasks.clear();
    this.watchEntries.clear();
    this.watchedDirs.clear();
    this.queuedDirs.clear();
    this.emit('stopped');

    const watcher = this.watcher;
    this.watcher = null;
    if (watcher) {
      await watcher.close();
      logger.debug('File watcher stopped');
    }
  }

  /**
   * Feeds a synthetic change through the debounce, as if the file had been
   * written now.
   */
  notifyChange(file: string): void {
    this.handleRawEvent(file);
  }

  isPending(file: string): boolean {
    return this.pendingTasks.has(path.resolve(file));
  }

  isRunning(): boolean {
    return this.watcher !== null;
  }

  watchedFiles(): string[] {
    return [...this.watchEntries.keys()];
  }

  private registerDirectory(dir: string): void {
    if (this.watchedDirs.has(dir) || this.queuedDirs.has(dir)) {
      return;
    }
    if (!this.watcher) {
      this.queuedDirs.add(dir);
      return;
    }
    this.watcher.add(dir);
    this.watchedDirs.add(dir);
    logger.trace(`Watching directory: ${dir}`);
  }

  private handleRawEvent(rawFile: string): void {
    const file = path.resolve(rawFile);
    if (!this.watchEntries.has(file)) {
      return;
    }
    this.cancelPending(file);
    const timer = setTimeout(() => this.fire(file), this.debounceMs);
    this.pendingTasks.set(file, timer);
    logger.trace(`Change scheduled: ${file}`);
    this.emit('scheduled', file);
  }

  private handleNewDirectory(rawDir: string): void {
    const dir = path.resolve(rawDir);
    // Only directories that hold watched files, e.g. one deleted and recreated
    const hasWatchedFile = [...this.watchEntries.keys()].some((file) => path.dirname(file) === dir);
    if (hasWatchedFile && !this.watchedDirs.has(dir)) {
      this.registerDirectory(dir);
    }
  }

  private handleWatchError(error: unknown): void {
    const err = error instanceof Error ? error : new Error(String(error));
    logger.warn(`File watch error: ${err.message}`);
    if (this.listenerCount('error') > 0) {
      this.emit('error', err);
    }
  }

  private cancelPending(file: string): void {
    const timer = this.pendingTasks.get(file);
    if (timer) {
      clearTimeout(timer);
      this.pendingTasks.delete(file);
    }
  }

  private fire(file: string): void {
    this.pendingTasks.delete(file);
    const fileListeners = this.watchEntries.get(file);
    if (!fileListeners) {
      return;
    }
    logger.debug(`File changed: ${file}`);
    this.emit('fired', file);
    for (const listener of [...fileListeners]) {
      try {
        listener(file);
      } catch (e) {
        logger.error(`Change listener failed for ${file}: ${e instanceof Error ? e.message : String(e)}`);
      }
    }
  }
}
