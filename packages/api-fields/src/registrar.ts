/**
 * Registrar - marks attributes as API fields
 *
 * A Registrar is created by `engine.mark(...groups)`. It can be used three
 * ways:
 *
 * 1. As an annotation value, usually for plain columns:
 *
 *        static annotations = { make: api.mark(), design: api.mark('looks') };
 *
 * 2. Around a namespace attribute, usually for relations:
 *
 *        static attributes = { owner: api.mark().attach(foreignKey(() => Profile)) };
 *
 * 3. As a property factory, for computed fields:
 *
 *        static attributes = {
 *          color_rgb: api.mark('*', 'looks')
 *            .property(function (this: Car) { return toRgb(this.color); })
 *            .setter(function (this: Car, value: Rgb) { this.color = fromRgb(value); }),
 *        };
 */

import { ConfigurationError } from '@kendb/shared';
import type { ApiEngine, FieldRequest } from './engine.js';

export type PropertyGetter<M, V> = (this: M) => V;
export type PropertySetter<M, V> = (this: M, value: V) => void;

interface PropertyAccessors<M, V> {
  get?: PropertyGetter<M, V>;
  set?: PropertySetter<M, V>;
}

type Rebind = (next: object) => void;

/**
 * An accessor property that stays registered while it is rebuilt.
 *
 * Every getter()/setter() call returns a new ApiProperty; the field request
 * that the first one filed is retargeted to the newest one, so the resolver
 * finds whatever object finally ends up in the namespace.
 */
export class ApiProperty<M extends object, V> {
  private readonly accessors: PropertyAccessors<M, V>;
  private readonly registrar: Registrar;
  private readonly rebind: Rebind;

  constructor(registrar: Registrar, accessors: PropertyAccessors<M, V>, rebind: Rebind) {
    this.registrar = registrar;
    this.accessors = accessors;
    this.rebind = rebind;
  }

  getter(get: PropertyGetter<M, V>): ApiProperty<M, V> {
    return this.update({ ...this.accessors, get });
  }

  setter(set: PropertySetter<M, V>): ApiProperty<M, V> {
    return this.update({ ...this.accessors, set });
  }

  get hasGetter(): boolean {
    return this.accessors.get !== undefined;
  }

  get hasSetter(): boolean {
    return this.accessors.set !== undefined;
  }

  /**
   * Standard accessor descriptor, ready for Object.defineProperty()
   */
  toDescriptor(): PropertyDescriptor {
    return {
      get: this.accessors.get,
      set: this.accessors.set,
      enumerable: true,
      configurable: true,
    };
  }

  toString(): string {
    const parts = [this.hasGetter ? 'get' : null, this.hasSetter ? 'set' : null].filter(Boolean);
    return `${this.registrar.toString()}.property(${parts.join(', ')})`;
  }

  private update(accessors: PropertyAccessors<M, V>): ApiProperty<M, V> {
    const next = new ApiProperty<M, V>(this.registrar, accessors, this.rebind);
    this.rebind(next);
    return next;
  }
}

/**
 * Plain property descriptors (anything carrying get/set functions)
 */
function isPropertyDescriptor(value: unknown): boolean {
  if (typeof value !== 'object' || value === null) {
    return false;
  }
  const get: unknown = Reflect.get(value, 'get');
  const set: unknown = Reflect.get(value, 'set');
  return typeof get === 'function' || typeof set === 'function';
}

export function isPropertyLike(value: unknown): boolean {
  return value instanceof ApiProperty || isPropertyDescriptor(value);
}

export class Registrar {
  readonly groups: readonly string[];
  private readonly engine: ApiEngine;

  constructor(engine: ApiEngine, groups: readonly string[]) {
    this.engine = engine;
    this.groups = groups;
    // Matched against the model's annotations; unmatched registrars are skipped
    engine.request(this, groups);
  }

  /**
   * Mark a namespace attribute object. The attribute is returned unchanged
   * and is found by identity when the model is assembled.
   */
  attach<A extends object>(attribute: A): A {
    if (isPropertyLike(attribute)) {
      throw new ConfigurationError(`Use ${this.toString()}.property(getter), not ${this.toString()}.attach(property)`);
    }
    this.engine.request(attribute, this.groups);
    return attribute;
  }

  /**
   * Create a tracked accessor property registered in this registrar's groups
   */
  property<M extends object, V>(getter: PropertyGetter<M, V>): ApiProperty<M, V> {
    if (typeof getter !== 'function' || isPropertyLike(getter)) {
      throw new ConfigurationError(`Don't pass an existing property to ${this.toString()}.property()`);
    }

    let request: FieldRequest | null = null;
    const first = new ApiProperty<M, V>(this, { get: getter }, (next) => {
      request?.retarget(next);
    });
    request = this.engine.request(first, this.groups);
    return first;
  }

  toString(): string {
    return `api.mark(${this.groups.map((group) => `'${group}'`).join(', ')})`;
  }
}
