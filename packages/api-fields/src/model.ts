/**
 * Model base class and API model finalization
 */

import { ConfigurationError } from '@kendb/shared';
import { initializeAttributes, type Namespace } from './attributes.js';
import type { ApiEngine } from './engine.js';
import { ApiProperty } from './registrar.js';
import type { Annotations } from './resolver.js';

/**
 * Base class of every stored model.
 *
 * Subclasses describe relations and computed fields in `static attributes`;
 * the constructor creates the per-instance state those attributes need.
 */
export abstract class Model {
  static readonly attributes: Namespace = {};

  pk: number | null = null;

  constructor() {
    initializeAttributes(this, new.target.attributes);
  }
}

/**
 * Lookup arguments: attribute name (or `pk`), optionally suffixed with `__in`
 */
export type Query = Readonly<Record<string, unknown>>;

/**
 * Collection of stored instances of one model
 */
export interface ObjectStore<M extends Model> {
  all(): Promise<M[]>;
  filter(query: Query): Promise<M[]>;
  get(query: Query): Promise<M>;
  /** Most recent modification time, null when nothing is stored */
  latestModification?(): Promise<Date | null>;
}

export interface ApiModelClass<M extends Model = Model> {
  new (): M;
  readonly prototype: M;
  readonly name: string;
  readonly api: ApiEngine;
  readonly attributes: Namespace;
  readonly annotations?: Annotations;
  readonly doc?: string;
}

export interface StoredModelClass<M extends Model = Model> extends ApiModelClass<M> {
  readonly objects: ObjectStore<M>;
}

const engines = new WeakMap<object, ApiEngine>();

/**
 * Finalize an API model class: install its tracked properties and assemble
 * its engine. Returns the class for chaining.
 */
export function apiModel<C extends ApiModelClass>(model: C): C {
  if (Object.hasOwn(model, 'attributes')) {
    for (const [name, attribute] of Object.entries(model.attributes)) {
      if (attribute instanceof ApiProperty) {
        Object.defineProperty(model.prototype, name, attribute.toDescriptor());
      }
    }
  }

  model.api.assemble(model);
  engines.set(model, model.api);
  return model;
}

/**
 * Engine of an assembled model class
 */
export function engineOf(model: object): ApiEngine {
  const engine = engines.get(model);
  if (engine === undefined) {
    const name = typeof model === 'function' ? model.name : String(model);
    throw new ConfigurationError(`${name} is not an API model; finalize it with apiModel()`);
  }
  return engine;
}

export function isApiModel(model: object): boolean {
  return engines.has(model);
}
