/**
 * Page Injection Tests
 */
import { describe, it, expect, beforeEach } from 'vitest';
import { ConfigurationError } from '@kendb/shared';
import { ModelRegistry } from '../registry.js';
import { inject, type InjectionContext } from './inject.js';
import { Car, Keeper, Person, makeCar } from '../__tests__/fixtures.js';

describe('inject()', () => {
  let registry: ModelRegistry;

  beforeEach(() => {
    registry = new ModelRegistry();
    registry.register(Car, { lastModified: true });
    registry.register(Person);
  });

  it('should add a packet to the context', async () => {
    const context: InjectionContext = { title: 'Cars' };

    const result = await inject(context, [makeCar(1, 'Tatra', 7), null], 'basic', { registry });

    expect(result).toBe(context);
    expect(context).toEqual({
      title: 'Cars',
      injected_packets: [
        {
          model: 'Car',
          fields: 'basic',
          packet: {
            instances: [{ owner_id: 7, id: 1 }],
            last_modified: '2024-03-01T12:00:00.000Z',
            dump: false,
          },
        },
      ],
    });
  });

  it('should append packets on repeated calls', async () => {
    const context: InjectionContext = {};
    const person = new Person();
    person.pk = 4;
    person.name = 'Ada';

    await inject(context, [makeCar(1, 'Tatra')], '*', { registry, dump: true });
    await inject(context, [person], 'basic', { registry });

    expect(context.injected_packets?.map(({ model, fields, packet }) => [model, fields, packet.dump])).toEqual([
      ['Car', '*', true],
      ['Person', 'basic', false],
    ]);
    expect(context.injected_packets?.[1]?.packet.instances).toEqual([{ name: 'Ada', id: 4 }]);
  });

  it('should leave the context alone when there is nothing to inject', async () => {
    const context: InjectionContext = {};

    expect(await inject(context, [null, undefined], '*', { registry })).toBeNull();
    expect(await inject(context, [], '*', { registry })).toBeNull();
    expect(context).toEqual({});
  });

  it('should reject instances of different models', async () => {
    await expect(inject({}, [makeCar(1, 'Tatra'), new Person()], '*', { registry })).rejects.toThrow(
      'Cannot inject instances of different models together: Car, Person'
    );
  });

  it('should reject instances that are not API models', async () => {
    await expect(inject({}, [new Keeper()], '*', { registry })).rejects.toThrow(ConfigurationError);
  });
});
