/**
 * Field accessor pairs
 */

import { ConfigurationError, DataError } from '@kendb/shared';
import { RelatedManager, TagManager } from './attributes.js';
import type { FieldAccessors } from './types.js';

/**
 * Plain property get/set
 */
export const plainAccessors: FieldAccessors = {
  get: (instance, name) => Reflect.get(instance, name),
  set: (instance, name, value) => {
    Reflect.set(instance, name, value);
  },
};

function toDate(value: unknown, name: string): Date | null {
  if (value === null) {
    return null;
  }
  const date = value instanceof Date ? new Date(value.getTime()) : typeof value === 'string' ? new Date(value) : null;
  if (date === null || Number.isNaN(date.getTime())) {
    throw new DataError(`Field '${name}' expects a date-time, got ${JSON.stringify(value) ?? String(value)}`, {
      field: name,
    });
  }
  return date;
}

/**
 * Date-times are read as stored and written from a `Date` or an ISO string
 */
export const dateTimeAccessors: FieldAccessors = {
  get: (instance, name) => Reflect.get(instance, name),
  set: (instance, name, value) => {
    Reflect.set(instance, name, toDate(value, name));
  },
};

function iterableOf(value: unknown, name: string): unknown[] {
  if (!Array.isArray(value)) {
    throw new DataError(`Field '${name}' expects a list, got ${typeof value}`, { field: name });
  }
  return value;
}

function relatedManagerOf(instance: object, name: string): RelatedManager {
  const manager: unknown = Reflect.get(instance, name);
  if (!(manager instanceof RelatedManager)) {
    throw new ConfigurationError(`Attribute '${name}' of ${instance.constructor.name} is not a to-many relation`);
  }
  return manager;
}

function tagManagerOf(instance: object, name: string): TagManager {
  const manager: unknown = Reflect.get(instance, name);
  if (!(manager instanceof TagManager)) {
    throw new ConfigurationError(`Attribute '${name}' of ${instance.constructor.name} is not a tag collection`);
  }
  return manager;
}

/**
 * To-many relations serialize as the list of referenced identifiers and
 * deserialize by replacing the membership
 */
export const relationAccessors: FieldAccessors = {
  get: (instance, name) => relatedManagerOf(instance, name).ids(),
  set: (instance, name, value) => {
    relatedManagerOf(instance, name).set(iterableOf(value, name));
  },
};

/**
 * Tag collections serialize as the list of tag names
 */
export const tagAccessors: FieldAccessors = {
  get: (instance, name) => tagManagerOf(instance, name).names(),
  set: (instance, name, value) => {
    tagManagerOf(instance, name).set(iterableOf(value, name));
  },
};
