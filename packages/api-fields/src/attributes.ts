/**
 * Attribute descriptors
 *
 * Descriptors live in a model's `static attributes` namespace. They tell the
 * resolver how a field should be exposed and tell the Model constructor which
 * per-instance state to create.
 */

import { DataError } from '@kendb/shared';
import type { ModelConstructor, RelationKind } from './types.js';

/**
 * The namespace of a model class: attribute name -> attribute object
 */
export type Namespace = Readonly<Record<string, unknown>>;

export class ForeignKey {
  readonly kind: RelationKind = 'foreign-key';

  constructor(readonly target: () => ModelConstructor) {}
}

export class OneToOneField {
  readonly kind: RelationKind = 'one-to-one';

  constructor(readonly target: () => ModelConstructor) {}
}

/**
 * Many-valued relation, held per instance as a set of identifiers
 */
export class ToManyRelation {
  readonly kind: RelationKind = 'to-many';

  constructor(readonly target: () => ModelConstructor) {}
}

export class TagCollection {
  readonly kind: RelationKind = 'tags';
}

/**
 * Timestamp column; accepts `Date` objects and ISO 8601 strings
 */
export class DateTimeField {}

export function foreignKey(target: () => ModelConstructor): ForeignKey {
  return new ForeignKey(target);
}

export function oneToOne(target: () => ModelConstructor): OneToOneField {
  return new OneToOneField(target);
}

export function toMany(target: () => ModelConstructor): ToManyRelation {
  return new ToManyRelation(target);
}

export function tagCollection(): TagCollection {
  return new TagCollection();
}

export function dateTime(): DateTimeField {
  return new DateTimeField();
}

/**
 * Foreign keys and one-to-one fields are exposed through their raw key column
 */
export function isKeyRelation(value: unknown): value is ForeignKey | OneToOneField {
  return value instanceof ForeignKey || value instanceof OneToOneField;
}

export function keyColumnName(name: string): string {
  return `${name}_id`;
}

function toIdentifier(value: unknown): number {
  if (typeof value === 'number' && Number.isSafeInteger(value)) {
    return value;
  }
  throw new DataError(`Could not decode identifier ${JSON.stringify(value) ?? String(value)}`);
}

/**
 * Per-instance membership of a to-many relation, held as identifiers
 */
export class RelatedManager {
  private members: number[] = [];

  ids(): number[] {
    return [...this.members];
  }

  has(id: number): boolean {
    return this.members.includes(id);
  }

  get size(): number {
    return this.members.length;
  }

  /**
   * Replace the membership. Every identifier is validated before anything
   * changes; duplicates keep their first position.
   */
  set(ids: Iterable<unknown>): void {
    const next: number[] = [];
    for (const raw of ids) {
      const id = toIdentifier(raw);
      if (!next.includes(id)) {
        next.push(id);
      }
    }
    this.members = next;
  }

  add(...ids: number[]): void {
    this.set([...this.members, ...ids]);
  }

  clear(): void {
    this.members = [];
  }
}

/**
 * Per-instance tag set, held as tag names in insertion order
 */
export class TagManager {
  private tags: string[] = [];

  names(): string[] {
    return [...this.tags];
  }

  get size(): number {
    return this.tags.length;
  }

  set(names: Iterable<unknown>): void {
    const next: string[] = [];
    for (const raw of names) {
      if (typeof raw !== 'string' || raw.trim() === '') {
        throw new DataError(`Tag names must be non-empty strings, got ${JSON.stringify(raw) ?? String(raw)}`);
      }
      const name = raw.trim();
      if (!next.includes(name)) {
        next.push(name);
      }
    }
    this.tags = next;
  }

  add(...names: string[]): void {
    this.set([...this.tags, ...names]);
  }

  clear(): void {
    this.tags = [];
  }
}

/**
 * Create the per-instance state the namespace asks for
 */
export function initializeAttributes(instance: object, namespace: Namespace): void {
  for (const [name, attribute] of Object.entries(namespace)) {
    if (isKeyRelation(attribute)) {
      Reflect.set(instance, keyColumnName(name), null);
    } else if (attribute instanceof ToManyRelation) {
      Reflect.set(instance, name, new RelatedManager());
    } else if (attribute instanceof TagCollection) {
      Reflect.set(instance, name, new TagManager());
    }
  }
}
