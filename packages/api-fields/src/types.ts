/**
 * API field types
 */

import type { Model } from './model.js';

/** Name of a field group. `'*'` is the default group. */
export type FieldGroup = string;

export const DEFAULT_GROUP: FieldGroup = '*';

export type FieldGetter = (instance: Model, name: string) => unknown;

export type FieldSetter = (instance: Model, name: string, value: unknown) => void;

export interface FieldAccessors {
  get: FieldGetter;
  set: FieldSetter;
}

export type RelationKind = 'foreign-key' | 'one-to-one' | 'to-many' | 'tags';

/**
 * Any model class, API-enabled or not. Relation targets only need to be
 * constructible; the exporter checks membership in the registry itself.
 */
export type ModelConstructor = new () => Model;

export interface RelationInfo {
  kind: RelationKind;
  /** Thunk so that models can point at classes declared later */
  target?: () => ModelConstructor;
}

/**
 * A resolved API field
 */
export interface FieldMeta {
  readonly name: string;
  readonly get: FieldGetter;
  readonly set: FieldSetter;
  readonly relation?: RelationInfo;
}

/**
 * Serialized form of a model instance
 */
export type Payload = Record<string, unknown>;
