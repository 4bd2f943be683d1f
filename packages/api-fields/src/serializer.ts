/**
 * Serialize model instances to payloads and back
 */

import { DataError } from '@kendb/shared';
import { engineOf, type ApiModelClass, type Model } from './model.js';
import { DEFAULT_GROUP, type Payload } from './types.js';

/**
 * Serialize the fields of a group, in registration order, followed by `id`
 */
export function serialize(instance: Model, group: string = DEFAULT_GROUP): Payload {
  const fields = engineOf(instance.constructor).getFields(group);

  const result: Payload = {};
  for (const field of fields) {
    result[field.name] = field.get(instance, field.name);
  }
  result.id = instance.pk;
  return result;
}

function toPrimaryKey(value: unknown): number | null {
  if (value === null) {
    return null;
  }
  if (typeof value === 'number' && Number.isSafeInteger(value)) {
    return value;
  }
  throw new DataError(`Could not decode id ${JSON.stringify(value) ?? String(value)}`, { field: 'id' });
}

/**
 * Build a new, unsaved instance from a payload.
 *
 * Only the fields of the group are applied; other keys are ignored and
 * missing fields keep their defaults. Nothing is persisted.
 */
export function deserialize<M extends Model>(
  model: ApiModelClass<M>,
  payload: Readonly<Payload>,
  group: string = DEFAULT_GROUP
): M {
  const fields = engineOf(model).getFields(group);

  const instance = new model();
  if (Object.hasOwn(payload, 'id')) {
    instance.pk = toPrimaryKey(payload.id);
  }
  for (const field of fields) {
    if (Object.hasOwn(payload, field.name)) {
      field.set(instance, field.name, payload[field.name]);
    }
  }
  return instance;
}
