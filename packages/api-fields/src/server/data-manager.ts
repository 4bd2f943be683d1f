/**
 * Data manager endpoint
 *
 * Serves `?ids=<all|1,2,3>&fields=<group>` requests of the frontend model
 * managers.
 */

import { z } from 'zod';
import { DataError, createChildLogger } from '@kendb/shared';
import type { StoredModelClass } from '../model.js';
import { lastModificationTimestamp, type ModelRegistry } from '../registry.js';
import { serialize } from '../serializer.js';
import type { Payload } from '../types.js';
import { failure, success, type ApiResponse } from './responses.js';

const logger = createChildLogger({ component: 'DataManager' });

export interface ModelsPacket {
  instances: Payload[];
  last_modified: string;
  dump: boolean;
}

const dataManagerQuerySchema = z
  .object({
    ids: z.string(),
    fields: z.string(),
  })
  .strict();

const ID_PATTERN = /^\s*[+-]?\d+\s*$/;

/**
 * `'all'` -> null, otherwise a comma separated list of integers
 */
export function parseIds(raw: string): number[] | null {
  if (raw === 'all') {
    return null;
  }
  return raw.split(',').map((part) => {
    const id = Number(part);
    if (!ID_PATTERN.test(part) || !Number.isSafeInteger(id)) {
      throw new DataError('Could not decode ids', { ids: raw });
    }
    return id;
  });
}

/**
 * Serialize the requested instances (all of them when ids is null)
 */
export async function getModels(
  ids: readonly number[] | null,
  group: string,
  model: StoredModelClass,
  registry: ModelRegistry
): Promise<ModelsPacket> {
  const [instances, lastModified] = await Promise.all([
    ids === null ? model.objects.all() : model.objects.filter({ pk__in: [...new Set(ids)] }),
    lastModificationTimestamp(registry),
  ]);

  return {
    instances: instances.map((instance) => serialize(instance, group)),
    last_modified: lastModified.toISOString(),
    dump: ids === null,
  };
}

export async function serveDataManager(
  registry: ModelRegistry,
  modelName: string,
  query: unknown
): Promise<ApiResponse<ModelsPacket>> {
  const model = registry.get(modelName);
  if (model === undefined) {
    return failure('Unknown model', 404);
  }

  const parsed = dataManagerQuerySchema.safeParse(query);
  if (!parsed.success) {
    const issues = parsed.error.issues;
    if (issues.some((issue) => issue.code === 'unrecognized_keys')) {
      return failure('Invalid request: unsupported parameters');
    }
    if (issues.some((issue) => issue.code === 'invalid_type' && issue.received === 'undefined')) {
      return failure("Invalid request: 'ids' and 'fields' are required");
    }
    return failure('Invalid request: malformed parameters');
  }

  let ids: number[] | null;
  try {
    ids = parseIds(parsed.data.ids);
  } catch (error) {
    if (error instanceof DataError) {
      return failure(error.message);
    }
    throw error;
  }

  const group = parsed.data.fields;
  if (!model.api.hasGroup(group)) {
    return failure('Unknown field group requested');
  }

  logger.debug({ model: model.name, group, ids: ids?.length ?? 'all' }, 'Serving data manager request');
  return success(await getModels(ids, group, model, registry));
}
