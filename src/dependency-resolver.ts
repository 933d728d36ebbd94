/**
 * Dependency resolution over batches of scene files.
 *
 * Picks the decoder for each file, normalizes and deduplicates what it
 * reports, optionally follows scene dependencies, and records failures per
 * file so that one broken scene never stops the rest of a batch.
 */
import { closeSync, existsSync, openSync, readFileSync, readSync, statSync } from 'node:fs';
import type { Stats } from 'node:fs';
import { extname, posix } from 'node:path';
import { withDefaults } from './config.js';
import type { ResolveOptions } from './config.js';
import { BINARY_SCENE_EXTENSION, SCENE_EXTENSIONS, TEXT_SCENE_EXTENSION } from './constants/scene-files.js';
import { SceneBinaryDecoder, collectDependencyPaths, hasBinarySignature } from './scene-binary.js';
import { SceneTextParser } from './scene-text.js';
import type { DependencyResult } from './types/dependency-result.js';
import { InputError } from './types/errors.js';
import { logger } from './utils/logger.js';
import { hasSceneExtension, isAbsolutePath, normalizePath } from './utils/path-utils.js';

export type SceneKind = 'text' | 'binary';

function readSignature(filePath: string): Buffer {
  const fd: number = openSync(filePath, 'r');
  try {
    const signature: Buffer = Buffer.alloc(4);
    const bytesRead: number = readSync(fd, signature, 0, 4, 0);
    return signature.subarray(0, bytesRead);
  } finally {
    closeSync(fd);
  }
}

/**
 * Decides which decoder reads a file. The extension decides, except that a
 * binary signature wins over a text extension or a missing/unknown one.
 * @throws {InputError} If neither the extension nor the content identify a scene
 */
export function detectSceneKind(filePath: string): SceneKind {
  const extension: string = extname(filePath).toLowerCase();
  if (extension === BINARY_SCENE_EXTENSION) {
    return 'binary';
  }
  const binarySignature: boolean = hasBinarySignature(readSignature(filePath));
  if (binarySignature) {
    return 'binary';
  }
  if (extension === TEXT_SCENE_EXTENSION) {
    return 'text';
  }
  throw new InputError(`Unsupported scene file extension "${extension}" (expected one of ${SCENE_EXTENSIONS.join(', ')}): ${filePath}`);
}

function statFile(filePath: string): Stats {
  if (!existsSync(filePath)) {
    throw new InputError(`Scene file does not exist: ${filePath}`);
  }
  let stats: Stats;
  try {
    stats = statSync(filePath);
  } catch (error) {
    throw new InputError(`Scene file cannot be read: ${filePath}`, error);
  }
  if (!stats.isFile()) {
    throw new InputError(`Scene path is not a file: ${filePath}`);
  }
  return stats;
}

/**
 * Decodes one scene file and returns the dependency paths exactly as written in it.
 *
 * @throws {InputError} If the file is missing, unreadable or not a scene file
 * @throws {SceneFormatError} If a binary scene is structurally broken
 */
export function decodeSceneFile(filePath: string, options: Partial<ResolveOptions> = {}): string[] {
  const resolved: ResolveOptions = withDefaults(options);
  const stats: Stats = statFile(filePath);
  const kind: SceneKind = detectSceneKind(filePath);

  if (kind === 'binary') {
    const document = SceneBinaryDecoder.read({ filePath });
    return collectDependencyPaths(document, resolved.textureAttributes);
  }

  if (stats.size > resolved.streamThreshold) {
    logger.debug(`Streaming ${filePath} (${stats.size} bytes)`);
    return SceneTextParser.parseFile({ filePath, textureAttributes: resolved.textureAttributes });
  }
  return SceneTextParser.parseBuffer({ content: readFileSync(filePath), textureAttributes: resolved.textureAttributes });
}

/**
 * Relative dependencies are relative to the directory of the scene naming them.
 */
export function resolveAgainst(scenePath: string, dependency: string): string {
  if (isAbsolutePath(dependency)) {
    return dependency;
  }
  return normalizePath(posix.join(posix.dirname(scenePath), dependency));
}

/**
 * Normalized, deduplicated dependencies of one scene file, without the file itself.
 */
export function getSceneDependencies(filePath: string, options: Partial<ResolveOptions> = {}): string[] {
  const resolved: ResolveOptions = withDefaults(options);
  const scenePath: string = normalizePath(filePath, { expandEnvironment: resolved.expandEnvironment });
  const dependencies = new Set<string>();

  for (const rawPath of decodeSceneFile(scenePath, resolved)) {
    const dependency: string = normalizePath(rawPath, { expandEnvironment: resolved.expandEnvironment });
    if (dependency.length === 0) {
      continue;
    }
    if (dependency === scenePath || resolveAgainst(scenePath, dependency) === scenePath) {
      continue;
    }
    dependencies.add(dependency);
  }

  return Array.from(dependencies);
}

/**
 * Resolves the dependencies of every given scene file.
 *
 * With `recursive`, scene files found among the dependencies are resolved as
 * well; each path is resolved at most once. A failure is recorded against the
 * path that failed and resolution carries on with the others.
 */
export function resolveDependencies(filePaths: readonly string[], options: Partial<ResolveOptions> = {}): DependencyResult {
  const resolved: ResolveOptions = withDefaults(options);
  const dependencies = new Map<string, string[]>();
  const errors = new Map<string, string>();
  const visited = new Set<string>();
  const queue: string[] = filePaths.map((filePath: string) => normalizePath(filePath, { expandEnvironment: resolved.expandEnvironment }));

  while (queue.length > 0) {
    const scenePath: string | undefined = queue.shift();
    if (scenePath === undefined || scenePath.length === 0 || visited.has(scenePath)) {
      continue;
    }
    visited.add(scenePath);

    logger.info(`Resolving ${scenePath}`);
    try {
      const sceneDependencies: string[] = getSceneDependencies(scenePath, resolved);
      dependencies.set(scenePath, sceneDependencies);
      logger.debug(`Found ${sceneDependencies.length} dependencies in ${scenePath}`);

      if (resolved.recursive) {
        for (const dependency of sceneDependencies) {
          if (hasSceneExtension(dependency)) {
            queue.push(resolveAgainst(scenePath, dependency));
          }
        }
      }
    } catch (error) {
      const message: string = error instanceof Error ? error.message : String(error);
      errors.set(scenePath, message);
      logger.warn(`Skipping ${scenePath}: ${message}`);
    }
  }

  return { dependencies, errors };
}
