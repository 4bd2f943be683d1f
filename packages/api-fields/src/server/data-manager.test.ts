/**
 * Data Manager Tests
 */
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { DataError } from '@kendb/shared';
import { ModelRegistry } from '../registry.js';
import { getModels, parseIds, serveDataManager } from './data-manager.js';
import { Car, Person, makeCar } from '../__tests__/fixtures.js';

describe('parseIds()', () => {
  it('should map all to null', () => {
    expect(parseIds('all')).toBeNull();
  });

  it('should parse comma separated integers', () => {
    expect(parseIds('1, 2,+3')).toEqual([1, 2, 3]);
    expect(parseIds(' -4 ')).toEqual([-4]);
  });

  it.each(['', '1,,2', '1.5', 'x', 'ALL', '9007199254740993'])('should reject %j', (raw) => {
    expect(() => parseIds(raw)).toThrow(DataError);
  });
});

describe('serveDataManager()', () => {
  let registry: ModelRegistry;

  beforeEach(() => {
    registry = new ModelRegistry();
    registry.register(Car, { lastModified: true });
    registry.register(Person);
    Car.objects.add(makeCar(1, 'Tatra', 7), makeCar(2, 'Skoda'));
  });

  afterEach(() => {
    Car.objects.clear();
  });

  it('should serve every instance of a group', async () => {
    const response = await serveDataManager(registry, 'car', { ids: 'all', fields: 'basic' });

    expect(response).toEqual({
      statusCode: 200,
      body: {
        status: 'OK',
        payload: {
          instances: [
            { owner_id: 7, id: 1 },
            { owner_id: null, id: 2 },
          ],
          last_modified: '2024-03-01T12:00:00.000Z',
          dump: true,
        },
      },
    });
  });

  it('should serve selected instances once each', async () => {
    const response = await serveDataManager(registry, 'car', { ids: '2,2,5', fields: '*' });

    expect(response.statusCode).toBe(200);
    expect(response.body.payload?.instances).toEqual([
      { make: 'Skoda', color: '000000', owner_id: null, passengers: [], id: 2 },
    ]);
    expect(response.body.payload?.dump).toBe(false);
  });

  it('should report the epoch when no model is tracked', async () => {
    const untracked = new ModelRegistry();
    untracked.register(Car);

    const response = await serveDataManager(untracked, 'car', { ids: '1', fields: 'basic' });

    expect(response.body.payload?.last_modified).toBe('1970-01-01T00:00:00.000Z');
  });

  it('should answer 404 for unknown models', async () => {
    const response = await serveDataManager(registry, 'boat', { ids: 'all', fields: '*' });

    expect(response).toEqual({ statusCode: 404, body: { status: 'Unknown model', payload: null } });
  });

  it.each([
    [{ ids: 'all', fields: '*', extra: '1' }, 'Invalid request: unsupported parameters'],
    [{ ids: 'all' }, "Invalid request: 'ids' and 'fields' are required"],
    [{}, "Invalid request: 'ids' and 'fields' are required"],
    [{ ids: ['1', '2'], fields: '*' }, 'Invalid request: malformed parameters'],
    [{ ids: '1,x', fields: '*' }, 'Could not decode ids'],
    [{ ids: 'all', fields: 'wheels' }, 'Unknown field group requested'],
  ])('should answer 400 for %j', async (query, message) => {
    const response = await serveDataManager(registry, 'car', query);

    expect(response).toEqual({ statusCode: 400, body: { status: message, payload: null } });
  });
});

describe('getModels()', () => {
  afterEach(() => {
    Person.objects.clear();
  });

  it('should serialize the requested group', async () => {
    const registry = new ModelRegistry();
    registry.register(Person);
    const person = new Person();
    person.pk = 3;
    person.name = 'Ada';
    Person.objects.add(person);

    const packet = await getModels([3], 'basic', Person, registry);

    expect(packet).toEqual({
      instances: [{ name: 'Ada', id: 3 }],
      last_modified: '1970-01-01T00:00:00.000Z',
      dump: false,
    });
  });
});
