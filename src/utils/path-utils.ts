/**
 * Path normalization for dependency paths found in scene files.
 */
import { homedir } from 'node:os';
import { extname } from 'node:path';
import { SCENE_EXTENSIONS, UDIM_TOKEN } from '../constants/scene-files.js';

export interface NormalizeOptions {
  /** Expand `$VAR`, `${VAR}` and `%VAR%` references. */
  readonly expandEnvironment?: boolean;
  readonly env?: NodeJS.ProcessEnv;
  readonly homeDir?: string;
}

const URL_SCHEME = /^[A-Za-z][A-Za-z0-9+.-]+:\/\//;
const ENV_REFERENCE = /\$\{([A-Za-z_][A-Za-z0-9_]*)\}|\$([A-Za-z_][A-Za-z0-9_]*)|%([A-Za-z_][A-Za-z0-9_]*)%/g;

/**
 * Replaces environment references with their values. Unknown variables are left as written.
 */
export function expandEnvironmentVariables(path: string, env: NodeJS.ProcessEnv = process.env): string {
  return path.replace(ENV_REFERENCE, (match: string, braced?: string, bare?: string, percent?: string): string => {
    const name = braced ?? bare ?? percent;
    if (name === undefined) return match;
    const value = env[name];
    return value === undefined ? match : value;
  });
}

/**
 * Canonical form of a dependency path:
 * - surrounding whitespace trimmed, `~` expanded to the home directory
 * - backslashes turned into forward slashes
 * - repeated slashes collapsed, except a leading UNC `//` and a URL scheme's `://`
 * - trailing slash removed
 */
export function normalizePath(path: string, options: NormalizeOptions = {}): string {
  let result: string = path.trim();
  if (result.length === 0) {
    return result;
  }

  if (options.expandEnvironment) {
    result = expandEnvironmentVariables(result, options.env);
  }

  if (result === '~' || result.startsWith('~/') || result.startsWith('~\\')) {
    result = (options.homeDir ?? homedir()) + result.slice(1);
  }

  result = result.replace(/\\/g, '/');

  let prefix = '';
  const scheme: RegExpExecArray | null = URL_SCHEME.exec(result);
  if (scheme !== null) {
    prefix = scheme[0];
  } else if (result.startsWith('//')) {
    prefix = '//';
  }
  result = result.slice(prefix.length).replace(/\/{2,}/g, '/');

  if (result.length > 1 || prefix.length > 0) {
    result = result.replace(/\/+$/, '');
  }

  return prefix + result;
}

/** Absolute on either POSIX or Windows, or a URL. */
export function isAbsolutePath(path: string): boolean {
  return path.startsWith('/') || /^[A-Za-z]:\//.test(path) || URL_SCHEME.test(path);
}

export function hasSceneExtension(path: string): boolean {
  return SCENE_EXTENSIONS.includes(extname(path).toLowerCase());
}

/** Multi-tile texture pattern; it names a set of files rather than one. */
export function isUdimPath(path: string): boolean {
  return path.includes(UDIM_TOKEN);
}
