/**
 * Options for dependency resolution and their defaults.
 */
import { TEXTURE_PATH_ATTRIBUTES } from './constants/scene-files.js';

export interface ResolveOptions {
  /** Also resolve scene files discovered as dependencies. */
  readonly recursive: boolean;
  /** Expand `$VAR`, `${VAR}` and `%VAR%` in input and dependency paths. */
  readonly expandEnvironment: boolean;
  /** Text scenes larger than this many bytes are read line by line from disk instead of whole. */
  readonly streamThreshold: number;
  /** String attributes whose values count as file dependencies. */
  readonly textureAttributes: readonly string[];
}

export const DEFAULT_RESOLVE_OPTIONS: ResolveOptions = {
  recursive: false,
  expandEnvironment: false,
  streamThreshold: 256 * 1024 * 1024,
  textureAttributes: TEXTURE_PATH_ATTRIBUTES,
};

/**
 * Fills unset fields from {@link DEFAULT_RESOLVE_OPTIONS}. Fields explicitly set
 * to undefined also fall back to the default.
 */
export function withDefaults(options: Partial<ResolveOptions> = {}): ResolveOptions {
  return {
    recursive: options.recursive ?? DEFAULT_RESOLVE_OPTIONS.recursive,
    expandEnvironment: options.expandEnvironment ?? DEFAULT_RESOLVE_OPTIONS.expandEnvironment,
    streamThreshold: options.streamThreshold ?? DEFAULT_RESOLVE_OPTIONS.streamThreshold,
    textureAttributes: options.textureAttributes ?? DEFAULT_RESOLVE_OPTIONS.textureAttributes,
  };
}
