/**
 * Outcome of a dependency resolution run over a batch of scene files.
 */
export interface DependencyResult {
  /** Normalized scene path to its deduplicated dependency paths. */
  readonly dependencies: Map<string, string[]>;
  /** Normalized scene path to the message of the error that stopped its decode. */
  readonly errors: Map<string, string>;
}
