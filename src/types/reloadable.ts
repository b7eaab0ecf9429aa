/**
 * A structure whose stylesheet list can be re-applied without rebuilding the
 * view. Typically the root node of a component.
 */
export interface StyleRefreshTarget {
  getStylesheets(): readonly string[];
  setStylesheets(stylesheets: string[]): void;
  /** Nested targets that carry their own stylesheet lists. */
  children?(): Iterable<StyleRefreshTarget>;
}

/**
 * A live view component that can be rebuilt from its declarative file.
 *
 * `reload()` must be safe to call repeatedly and must fully replace prior
 * state. It is only ever invoked from the UI executor.
 */
export interface Reloadable {
  /** Canonical resource path, e.g. `com/example/app/Main.fxml`. */
  resourcePath(): string;
  /** Where the declarative file was loaded from: an absolute path or a `file:` URL. */
  sourceLocation(): string | URL;
  reload(): void;
  /** Returns null when the component has no style list to refresh. */
  styleRefreshTarget?(): StyleRefreshTarget | null;
}

/**
 * Runs tasks on the application's UI context. Component state is only
 * touched from tasks passed to `runLater`.
 */
export interface UiExecutor {
  runLater(task: () => void): void;
}
