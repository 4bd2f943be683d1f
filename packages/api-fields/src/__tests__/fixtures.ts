/**
 * Test models and an in-memory object store
 */

import { ObjectNotFoundError } from '@kendb/shared';
import {
  ApiEngine,
  Model,
  apiModel,
  foreignKey,
  oneToOne,
  tagCollection,
  toMany,
  type ObjectStore,
  type Query,
  type RelatedManager,
  type TagManager,
} from '../index.js';

export class MemoryStore<M extends Model> implements ObjectStore<M> {
  private items: M[] = [];

  add(...instances: M[]): void {
    this.items.push(...instances);
  }

  clear(): void {
    this.items = [];
  }

  async all(): Promise<M[]> {
    return [...this.items];
  }

  async filter(query: Query): Promise<M[]> {
    return this.items.filter((item) =>
      Object.entries(query).every(([key, value]) => {
        if (key === 'pk__in') {
          return Array.isArray(value) && value.includes(item.pk);
        }
        return Reflect.get(item, key) === value;
      })
    );
  }

  async get(query: Query): Promise<M> {
    const [found] = await this.filter(query);
    if (found === undefined) {
      throw new ObjectNotFoundError('matching object does not exist');
    }
    return found;
  }
}

export class TrackedMemoryStore<M extends Model> extends MemoryStore<M> {
  stamp: Date | null;

  constructor(stamp: Date | null) {
    super();
    this.stamp = stamp;
  }

  async latestModification(): Promise<Date | null> {
    return this.stamp;
  }
}

export const CAR_STAMP = new Date('2024-03-01T12:00:00.000Z');

// ===========================================
// Models
// ===========================================

const personApi = new ApiEngine();

export class Person extends Model {
  static readonly api = personApi;
  static readonly objects = new MemoryStore<Person>();
  static readonly annotations = {
    name: personApi.mark('*', 'basic'),
  };

  name = '';
}

apiModel(Person);

const carApi = new ApiEngine();

export class Car extends Model {
  static readonly doc = 'A car.';
  static readonly api = carApi;
  static readonly objects = new TrackedMemoryStore<Car>(CAR_STAMP);

  static readonly annotations = {
    make: carApi.mark(),
    color: carApi.mark('*', 'looks'),
  };

  static readonly attributes = {
    owner: carApi.mark('*', 'basic').attach(foreignKey(() => Person)),
    passengers: carApi.mark().attach(toMany(() => Person)),
    features: carApi.mark('looks').attach(tagCollection()),
    color_hex: carApi
      .mark('looks')
      .property<Car, unknown>(function () {
        return `#${this.color}`;
      })
      .setter(function (value) {
        if (typeof value === 'string') {
          this.color = value.replace(/^#/, '');
        }
      }),
  };

  declare owner_id: number | null;
  declare passengers: RelatedManager;
  declare features: TagManager;
  declare color_hex: string;

  make = '';
  color = '000000';
}

apiModel(Car);

/** Not an API model */
export class Keeper extends Model {}

const garageApi = new ApiEngine();

export class Garage extends Model {
  static readonly api = garageApi;
  static readonly objects = new MemoryStore<Garage>();

  static readonly attributes = {
    keeper: garageApi.mark().attach(oneToOne(() => Keeper)),
    car_ids: garageApi.mark().attach(toMany(() => Car)),
  };

  declare keeper_id: number | null;
  declare car_ids: RelatedManager;
}

apiModel(Garage);

export function makeCar(pk: number, make: string, ownerId: number | null = null): Car {
  const car = new Car();
  car.pk = pk;
  car.make = make;
  car.owner_id = ownerId;
  return car;
}
