/**
 * Records decoded from a binary scene file.
 */

export interface PluginRequirement {
  readonly name: string;
  readonly version: string;
}

export interface FileInfoEntry {
  readonly key: string;
  readonly value: string;
}

export interface SceneUnits {
  readonly angle: string;
  readonly linear: string;
  readonly time: string;
}

export interface SceneNode {
  readonly typeName: string;
  readonly name: string;
  readonly parent: string | null;
}

export interface SceneConnection {
  readonly source: string;
  readonly destination: string;
}

export type AttributeKind = 'string' | 'double' | 'double3' | 'extended';

export type AttributeValue =
  | string
  | number
  | readonly number[]
  | readonly (readonly [number, number, number])[]
  | null;

export interface SceneAttribute {
  /** Name of the most recently created node, or null for attributes set before any CREA chunk. */
  readonly node: string | null;
  readonly name: string;
  readonly value: AttributeValue;
  readonly kind: AttributeKind;
}

/**
 * Everything one decode pass collected. Built incrementally, owned by a single parse.
 */
export interface SceneDocument {
  version: string | null;
  readonly plugins: PluginRequirement[];
  readonly fileInfo: FileInfoEntry[];
  units: SceneUnits | null;
  readonly nodes: SceneNode[];
  readonly connections: SceneConnection[];
  readonly references: string[];
  readonly attributes: SceneAttribute[];
}

export function createSceneDocument(): SceneDocument {
  return {
    version: null,
    plugins: [],
    fileInfo: [],
    units: null,
    nodes: [],
    connections: [],
    references: [],
    attributes: [],
  };
}
