/**
 * scene-deps - Main entry point
 *
 * Offline dependency extraction for text and binary scene files.
 */

// Dependency resolution
export { resolveDependencies, getSceneDependencies, decodeSceneFile, detectSceneKind, resolveAgainst } from './dependency-resolver.js';
export type { SceneKind } from './dependency-resolver.js';
export { DEFAULT_RESOLVE_OPTIONS, withDefaults } from './config.js';
export type { ResolveOptions } from './config.js';

// Decoders
export { ChunkReader } from './chunk-reader.js';
export type { ChunkHandler } from './chunk-reader.js';
export { SceneBinaryDecoder, collectDependencyPaths, detectChunkFormat, hasBinarySignature } from './scene-binary.js';
export { SceneTextParser, BufferLineSource, FileLineSource, readStatements, tokenize, statementArguments } from './scene-text.js';
export type { LineSource, Statement } from './scene-text.js';
export { TypeIdTable } from './type-id-table.js';
export { FORMAT_32, FORMAT_64 } from './constants/chunk-tags.js';

// Types and errors
export { SceneFormatError, InputError } from './types/errors.js';
export type { Chunk, ChunkFormat, Endianness } from './types/chunk.js';
export type { SceneDocument, SceneNode, SceneConnection, SceneAttribute, SceneUnits, PluginRequirement, FileInfoEntry } from './types/scene-document.js';
export type { DependencyResult } from './types/dependency-result.js';

// Utilities
export { align, fourCC, tagToString } from './utils/byte-order.js';
export { normalizePath, isUdimPath, hasSceneExtension } from './utils/path-utils.js';
export { Logger, logger } from './utils/logger.js';
export type { LogLevel } from './utils/logger.js';
