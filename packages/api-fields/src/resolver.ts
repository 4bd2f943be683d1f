/**
 * Field resolution
 *
 * Turns the pending requests of an engine into the frozen field groups of a
 * model class.
 */

import { AmbiguousMarkerError, AttributeNotFoundError } from '@kendb/shared';
import { dateTimeAccessors, plainAccessors, relationAccessors, tagAccessors } from './accessors.js';
import { DateTimeField, TagCollection, ToManyRelation, isKeyRelation, keyColumnName, type Namespace } from './attributes.js';
import type { FieldRequest } from './engine.js';
import { toApiName } from './naming.js';
import { Registrar } from './registrar.js';
import type { FieldAccessors, FieldMeta, RelationInfo } from './types.js';

/**
 * Declared annotations of a model class: attribute name -> annotation value
 */
export type Annotations = Readonly<Record<string, unknown>>;

/**
 * The parts of a model class the resolver reads
 */
export interface ResolutionTarget {
  readonly name: string;
  readonly attributes: Namespace;
  readonly annotations?: Annotations;
}

export interface AssembledFields {
  readonly fieldGroups: ReadonlyMap<string, readonly FieldMeta[]>;
  readonly allFields: readonly string[];
  readonly apiName: string;
}

function namesOf(entries: Readonly<Record<string, unknown>>, wanted: unknown): string[] {
  return Object.entries(entries)
    .filter(([, value]) => value === wanted)
    .map(([name]) => name);
}

function ownAnnotations(model: ResolutionTarget): Annotations {
  return Object.hasOwn(model, 'annotations') && model.annotations !== undefined ? model.annotations : {};
}

function ownAttributes(model: ResolutionTarget): Namespace {
  return Object.hasOwn(model, 'attributes') ? model.attributes : {};
}

/**
 * Attribute name a request points at, or null for an unused Registrar
 */
function resolveName(model: ResolutionTarget, request: FieldRequest): string | null {
  const locator = request.locator;
  if (typeof locator === 'string') {
    return locator;
  }

  if (locator instanceof Registrar) {
    const names = namesOf(ownAnnotations(model), locator);
    if (names.length > 1) {
      throw new AmbiguousMarkerError(
        `${locator.toString()} annotation reused on several fields of ${model.name}: ${names.join(', ')}`,
        names,
        { model: model.name }
      );
    }
    // A registrar that annotates nothing was used through attach() or property()
    return names.length === 1 ? names[0] : null;
  }

  const names = namesOf(ownAttributes(model), locator);
  if (names.length === 0) {
    throw new AttributeNotFoundError(`Attribute object ${String(locator)}, marked as API, not found in ${model.name}`, {
      model: model.name,
    });
  }
  if (names.length > 1) {
    throw new AmbiguousMarkerError(
      `Attribute object ${String(locator)}, marked as API, found in several fields of ${model.name}: ${names.join(', ')}`,
      names,
      { model: model.name }
    );
  }
  return names[0];
}

function relationOf(attribute: unknown): RelationInfo | undefined {
  if (isKeyRelation(attribute) || attribute instanceof ToManyRelation) {
    return { kind: attribute.kind, target: attribute.target };
  }
  if (attribute instanceof TagCollection) {
    return { kind: attribute.kind };
  }
  return undefined;
}

function fieldMeta(name: string, accessors: FieldAccessors, relation: RelationInfo | undefined): FieldMeta {
  const meta = relation === undefined ? { name, ...accessors } : { name, ...accessors, relation };
  return Object.freeze(meta);
}

function buildField(model: ResolutionTarget, name: string, request: FieldRequest): FieldMeta {
  const attribute = model.attributes[name];
  const relation = relationOf(attribute);

  if (request.accessors !== undefined) {
    return fieldMeta(name, request.accessors, relation);
  }
  if (isKeyRelation(attribute)) {
    return fieldMeta(keyColumnName(name), plainAccessors, relation);
  }
  if (attribute instanceof TagCollection) {
    return fieldMeta(name, tagAccessors, relation);
  }
  if (attribute instanceof ToManyRelation) {
    return fieldMeta(name, relationAccessors, relation);
  }
  if (attribute instanceof DateTimeField) {
    return fieldMeta(name, dateTimeAccessors, relation);
  }
  return fieldMeta(name, plainAccessors, relation);
}

export function resolveFields(model: ResolutionTarget, requests: readonly FieldRequest[]): AssembledFields {
  const groups = new Map<string, FieldMeta[]>();
  const allFields: string[] = [];

  for (const request of requests) {
    const name = resolveName(model, request);
    if (name === null) {
      continue;
    }
    const field = buildField(model, name, request);
    if (request.groups.length > 0 && !allFields.includes(field.name)) {
      allFields.push(field.name);
    }
    for (const group of request.groups) {
      const fields = groups.get(group);
      if (fields === undefined) {
        groups.set(group, [field]);
      } else {
        fields.push(field);
      }
    }
  }

  const fieldGroups = new Map<string, readonly FieldMeta[]>();
  for (const [group, fields] of groups) {
    fieldGroups.set(group, Object.freeze([...fields]));
  }

  return {
    fieldGroups,
    allFields: Object.freeze(allFields),
    apiName: toApiName(model.name),
  };
}
