/**
 * Error classes shared by the decoders and the dependency resolver.
 */

/**
 * Structural problem in a scene file: bad magic signature, a read past the
 * active chunk bound, or a payload shorter than its header declares.
 */
export class SceneFormatError extends Error {
  constructor(message: string, public readonly cause?: unknown) {
    super(message);
    this.name = 'SceneFormatError';
  }
}

/**
 * The input itself is unusable: missing, unreadable, or not a scene file.
 */
export class InputError extends Error {
  constructor(message: string, public readonly cause?: unknown) {
    super(message);
    this.name = 'InputError';
  }
}
