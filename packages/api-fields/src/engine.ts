/**
 * ApiEngine - per-model field registration
 *
 * Every API model class owns one engine. Fields are requested while the class
 * is being declared and resolved once, when apiModel() assembles the class.
 */

import { AlreadyAssembledError, ConfigurationError, GroupTypeError, UnknownFieldGroupError, createChildLogger } from '@kendb/shared';
import { relationAccessors } from './accessors.js';
import { Registrar } from './registrar.js';
import { resolveFields, type AssembledFields, type ResolutionTarget } from './resolver.js';
import { DEFAULT_GROUP, type FieldAccessors, type FieldMeta } from './types.js';

const logger = createChildLogger({ component: 'ApiEngine' });

/**
 * What a request points at: a field name, a Registrar, or an attribute object
 */
export type FieldLocator = string | object;

export class FieldRequest {
  private target: FieldLocator;
  readonly groups: readonly string[];
  readonly accessors?: FieldAccessors;

  constructor(target: FieldLocator, groups: readonly string[], accessors?: FieldAccessors) {
    this.target = target;
    this.groups = groups;
    this.accessors = accessors;
  }

  get locator(): FieldLocator {
    return this.target;
  }

  retarget(locator: FieldLocator): void {
    this.target = locator;
  }
}

export function describeLocator(locator: FieldLocator): string {
  return typeof locator === 'string' ? `'${locator}'` : String(locator);
}

function normalizeGroups(groups: Iterable<string>, locator: FieldLocator): string[] {
  if (typeof groups === 'string') {
    throw new GroupTypeError(
      `Groups for ${describeLocator(locator)} must be a list of names, not the string '${groups}'`
    );
  }
  if (groups === null || typeof groups !== 'object' || typeof groups[Symbol.iterator] !== 'function') {
    throw new GroupTypeError(`Groups for ${describeLocator(locator)} must be a list of names`);
  }

  const list: unknown[] = Array.from(groups);
  const invalid = list.filter((group) => typeof group !== 'string');
  if (invalid.length > 0) {
    throw new GroupTypeError(
      `Group names for ${describeLocator(locator)} must be strings, got ${JSON.stringify(invalid)}`
    );
  }
  return list.filter((group): group is string => typeof group === 'string');
}

export class ApiEngine {
  private requests: FieldRequest[] | null = [];
  private assembled: AssembledFields | null = null;
  private modelName: string | null = null;

  /**
   * File a registration request. The locator is resolved when the model is
   * assembled.
   */
  request(locator: FieldLocator, groups: Iterable<string>, accessors?: FieldAccessors): FieldRequest {
    if (this.requests === null) {
      throw new AlreadyAssembledError(
        `API of ${this.modelName ?? 'model'} is already assembled, cannot register ${describeLocator(locator)} after assembly`
      );
    }
    const request = new FieldRequest(locator, normalizeGroups(groups, locator), accessors);
    this.requests.push(request);
    return request;
  }

  /**
   * Register a field by name. A single group name is accepted here.
   */
  addField(name: string, groups: string | Iterable<string> = DEFAULT_GROUP, accessors?: FieldAccessors): FieldRequest {
    return this.request(name, typeof groups === 'string' ? [groups] : groups, accessors);
  }

  /**
   * Register a to-many relation by name; it serializes as a list of identifiers
   */
  addRelated(name: string, groups: string | Iterable<string> = DEFAULT_GROUP): FieldRequest {
    return this.addField(name, groups, relationAccessors);
  }

  /**
   * Create a Registrar for the given groups (the default group when none)
   */
  mark(...groups: string[]): Registrar {
    return new Registrar(this, groups.length > 0 ? groups : [DEFAULT_GROUP]);
  }

  assemble(model: ResolutionTarget): void {
    if (this.requests === null) {
      throw new AlreadyAssembledError(`API of ${this.modelName ?? model.name} is already assembled`, {
        model: model.name,
      });
    }
    const requests = this.requests;
    this.requests = null;
    this.modelName = model.name;
    this.assembled = resolveFields(model, requests);

    logger.debug(
      { model: model.name, groups: [...this.assembled.fieldGroups.keys()], fields: this.assembled.allFields.length },
      'API fields assembled'
    );
  }

  get isAssembled(): boolean {
    return this.assembled !== null;
  }

  get fieldGroups(): ReadonlyMap<string, readonly FieldMeta[]> {
    return this.resolved().fieldGroups;
  }

  get allFields(): readonly string[] {
    return this.resolved().allFields;
  }

  get apiName(): string {
    return this.resolved().apiName;
  }

  hasGroup(group: string): boolean {
    return this.resolved().fieldGroups.has(group);
  }

  getFields(group: string = DEFAULT_GROUP): readonly FieldMeta[] {
    const fields = this.resolved().fieldGroups.get(group);
    if (fields === undefined) {
      throw new UnknownFieldGroupError(group);
    }
    return fields;
  }

  toString(): string {
    return this.modelName === null ? 'ApiEngine' : `ApiEngine(${this.modelName})`;
  }

  private resolved(): AssembledFields {
    if (this.assembled === null) {
      throw new ConfigurationError('API is not assembled yet; call apiModel() on the model class');
    }
    return this.assembled;
  }
}
