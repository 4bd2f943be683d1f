/**
 * ApiEngine Tests
 * Registration, resolution and assembly of API fields
 */
import { describe, it, expect, beforeEach } from 'vitest';
import {
  AlreadyAssembledError,
  AmbiguousMarkerError,
  AttributeNotFoundError,
  ConfigurationError,
  GroupTypeError,
  UnknownFieldGroupError,
} from '@kendb/shared';
import { ApiEngine } from './engine.js';
import { foreignKey, oneToOne, tagCollection, toMany } from './attributes.js';
import { plainAccessors } from './accessors.js';
import { toApiName } from './naming.js';
import { Car, Garage, Person } from './__tests__/fixtures.js';

function names(engine: ApiEngine, group: string): string[] {
  return engine.getFields(group).map((field) => field.name);
}

describe('ApiEngine', () => {
  let api: ApiEngine;

  beforeEach(() => {
    api = new ApiEngine();
  });

  // ===========================================
  // Registration by name
  // ===========================================

  describe('addField()', () => {
    it('should register into the default group', () => {
      api.addField('alpha');
      api.addField('beta', ['extra', '*']);
      api.assemble({ name: 'Thing', attributes: {} });

      expect(names(api, '*')).toEqual(['alpha', 'beta']);
      expect(names(api, 'extra')).toEqual(['beta']);
      expect(api.allFields).toEqual(['alpha', 'beta']);
    });

    it('should accept a single group name', () => {
      api.addField('alpha', 'basic');
      api.assemble({ name: 'Thing', attributes: {} });

      expect([...api.fieldGroups.keys()]).toEqual(['basic']);
      expect(names(api, 'basic')).toEqual(['alpha']);
    });

    it('should keep a field registered twice in a group twice', () => {
      api.addField('alpha');
      api.addField('alpha');
      api.assemble({ name: 'Thing', attributes: {} });

      expect(names(api, '*')).toEqual(['alpha', 'alpha']);
      expect(api.allFields).toEqual(['alpha']);
    });

    it('should keep explicit accessors and the literal name for relations', () => {
      api.addField('owner', '*', plainAccessors);
      api.assemble({ name: 'Thing', attributes: { owner: foreignKey(() => Person) } });

      const [field] = api.getFields('*');
      expect(field.name).toBe('owner');
      expect(field.relation?.kind).toBe('foreign-key');
    });

    it('should fail after assembly', () => {
      api.assemble({ name: 'Thing', attributes: {} });

      expect(() => api.addField('late')).toThrow(AlreadyAssembledError);
      expect(() => api.addField('late')).toThrow(
        "API of Thing is already assembled, cannot register 'late' after assembly"
      );
    });
  });

  describe('request()', () => {
    it('should reject a bare string as groups', () => {
      expect(() => api.request('alpha', 'basic')).toThrow(GroupTypeError);
    });

    it('should reject non-string group names', () => {
      expect(() => Reflect.apply(api.request, api, ['alpha', ['*', 7]])).toThrow(GroupTypeError);
    });

    it('should reject groups that are not iterable', () => {
      expect(() => Reflect.apply(api.request, api, ['alpha', 7])).toThrow(GroupTypeError);
    });

    it('should accept any iterable of names', () => {
      api.request('alpha', new Set(['x', 'y']));
      api.assemble({ name: 'Thing', attributes: {} });

      expect([...api.fieldGroups.keys()]).toEqual(['x', 'y']);
    });
  });

  // ===========================================
  // Assembly
  // ===========================================

  describe('assemble()', () => {
    it('should derive the API name from the class name', () => {
      api.assemble({ name: 'MinecraftVersion', attributes: {} });

      expect(api.apiName).toBe('minecraft_version');
    });

    it('should only run once', () => {
      api.assemble({ name: 'Thing', attributes: {} });

      expect(() => api.assemble({ name: 'Thing', attributes: {} })).toThrow(AlreadyAssembledError);
    });

    it('should not expose fields before assembly', () => {
      expect(api.isAssembled).toBe(false);
      expect(() => api.getFields()).toThrow(ConfigurationError);
    });

    it('should reject unknown groups', () => {
      api.addField('alpha');
      api.assemble({ name: 'Thing', attributes: {} });

      expect(() => api.getFields('nope')).toThrow(UnknownFieldGroupError);
      expect(() => api.getFields('nope')).toThrow("No fields registered in group 'nope'");
    });

    it('should freeze the field lists', () => {
      api.addField('alpha');
      api.assemble({ name: 'Thing', attributes: {} });

      expect(Object.isFrozen(api.getFields('*'))).toBe(true);
      expect(Object.isFrozen(api.allFields)).toBe(true);
    });
  });

  // ===========================================
  // Registrars
  // ===========================================

  describe('mark()', () => {
    it('should resolve annotations by identity in declaration order', () => {
      const annotations = {
        first: api.mark(),
        second: api.mark('basic', '*'),
      };
      api.assemble({ name: 'Thing', attributes: {}, annotations });

      expect(names(api, '*')).toEqual(['first', 'second']);
      expect(names(api, 'basic')).toEqual(['second']);
    });

    it('should skip registrars that annotate nothing', () => {
      api.mark('ghost');
      api.addField('alpha');
      api.assemble({ name: 'Thing', attributes: {} });

      expect(api.fieldGroups.has('ghost')).toBe(false);
      expect(api.allFields).toEqual(['alpha']);
    });

    it('should reject one registrar reused on several annotations', () => {
      const marker = api.mark();

      try {
        api.assemble({ name: 'Thing', attributes: {}, annotations: { a: marker, b: marker } });
        expect.unreachable('assemble() should have thrown');
      } catch (error) {
        expect(error).toBeInstanceOf(AmbiguousMarkerError);
        if (error instanceof AmbiguousMarkerError) {
          expect(error.attributeNames).toEqual(['a', 'b']);
        }
      }
    });

    it('should rename foreign keys and one-to-one fields', () => {
      const attributes = {
        owner: api.mark('*', 'basic').attach(foreignKey(() => Person)),
        keeper: api.mark().attach(oneToOne(() => Person)),
      };
      api.assemble({ name: 'Thing', attributes });

      expect(names(api, '*')).toEqual(['owner_id', 'keeper_id']);
      expect(names(api, 'basic')).toEqual(['owner_id']);
    });

    it('should rename annotated foreign keys', () => {
      const annotations = { owner: api.mark() };
      api.assemble({ name: 'Thing', attributes: { owner: foreignKey(() => Person) }, annotations });

      expect(names(api, '*')).toEqual(['owner_id']);
    });

    it('should keep relation targets on the field', () => {
      const attributes = {
        passengers: api.mark().attach(toMany(() => Person)),
        labels: api.mark().attach(tagCollection()),
      };
      api.assemble({ name: 'Thing', attributes });

      const [passengers, labels] = api.getFields('*');
      expect(passengers.relation?.kind).toBe('to-many');
      expect(passengers.relation?.target?.()).toBe(Person);
      expect(labels.relation).toEqual({ kind: 'tags' });
    });

    it('should fail for a marked attribute missing from the namespace', () => {
      api.mark().attach(foreignKey(() => Person));

      expect(() => api.assemble({ name: 'Thing', attributes: {} })).toThrow(AttributeNotFoundError);
    });

    it('should reject one attribute object under several names', () => {
      const shared = api.mark().attach(foreignKey(() => Person));

      expect(() => api.assemble({ name: 'Thing', attributes: { a: shared, b: shared } })).toThrow(
        AmbiguousMarkerError
      );
    });

    it('should refuse properties in attach()', () => {
      const marker = api.mark();
      const property = marker.property(() => 1);

      expect(() => marker.attach(property)).toThrow(ConfigurationError);
      expect(() => marker.attach({ get: () => 1 })).toThrow('Use api.mark(\'*\').property(getter)');
    });

    it('should refuse non-functions in property()', () => {
      const marker = api.mark();

      expect(() => Reflect.apply(marker.property, marker, [{ get: () => 1 }])).toThrow(ConfigurationError);
    });
  });

  describe('property()', () => {
    it('should follow the property through getter() and setter()', () => {
      const first = api.mark('x').property(() => 1);
      const last = first.setter(() => undefined).getter(() => 2);
      api.assemble({ name: 'Thing', attributes: { value: last } });

      expect(names(api, 'x')).toEqual(['value']);
      expect(last.hasGetter).toBe(true);
      expect(last.hasSetter).toBe(true);
      expect(first.hasSetter).toBe(false);
    });

    it('should not find a property that was replaced', () => {
      const first = api.mark('x').property(() => 1);
      first.setter(() => undefined);

      expect(() => api.assemble({ name: 'Thing', attributes: { value: first } })).toThrow(AttributeNotFoundError);
    });
  });
});

// ===========================================
// Assembled fixture models
// ===========================================

describe('assembled models', () => {
  it('should order groups and fields by registration', () => {
    expect([...Car.api.fieldGroups.keys()]).toEqual(['*', 'looks', 'basic']);
    expect(names(Car.api, '*')).toEqual(['make', 'color', 'owner_id', 'passengers']);
    expect(names(Car.api, 'looks')).toEqual(['color', 'features', 'color_hex']);
    expect(names(Car.api, 'basic')).toEqual(['owner_id']);
    expect(Car.api.allFields).toEqual(['make', 'color', 'owner_id', 'passengers', 'features', 'color_hex']);
  });

  it('should initialize relation state on new instances', () => {
    const car = new Car();

    expect(car.owner_id).toBeNull();
    expect(car.passengers.ids()).toEqual([]);
    expect(car.features.names()).toEqual([]);
    expect(car.color_hex).toBe('#000000');
  });

  it('should register to-many relations by name', () => {
    expect(names(Garage.api, '*')).toEqual(['keeper_id', 'car_ids']);
  });
});

describe('toApiName()', () => {
  it.each([
    ['MinecraftVersion', 'minecraft_version'],
    ['Profile', 'profile'],
    ['Submission', 'submission'],
    ['SubmissionRevision', 'submission_revision'],
    ['HTTPServer', 'h_t_t_p_server'],
  ])('should map %s to %s', (typeName, apiName) => {
    expect(toApiName(typeName)).toBe(apiName);
  });
});
