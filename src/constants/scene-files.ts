/**
 * File-level conventions of the scene serializations.
 */

export const TEXT_SCENE_EXTENSION = '.ma';
export const BINARY_SCENE_EXTENSION = '.mb';
export const SCENE_EXTENSIONS: readonly string[] = [TEXT_SCENE_EXTENSION, BINARY_SCENE_EXTENSION];

/** Short and long names of the file node attribute that stores a texture path. */
export const TEXTURE_PATH_ATTRIBUTES: readonly string[] = ['ftn', 'fileTextureName'];

/** Tile token used by multi-tile texture paths. */
export const UDIM_TOKEN = '<UDIM>';
