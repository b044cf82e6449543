/**
 * Logging contract handed to collaborators.
 *
 * The CLI implements it over GitHub workflow commands; tests pass jest mocks.
 */
export interface RunnerLogger {
  info(message: string): void;
  warning(message: string): void;
  /** Only visible when debug logging is enabled */
  debug(message: string): void;
  /** Run `fn` with its output folded under `name` */
  group<T>(name: string, fn: () => Promise<T>): Promise<T>;
}
