/**
 * Model registry - the set of models served through the API
 */

import { ConfigurationError, createChildLogger } from '@kendb/shared';
import { isApiModel, type StoredModelClass } from './model.js';

const logger = createChildLogger({ component: 'ModelRegistry' });

export interface RegisterOptions {
  /** Include the model in the last-modified timestamp */
  lastModified?: boolean;
}

function byClassName(a: StoredModelClass, b: StoredModelClass): number {
  if (a.name === b.name) {
    return 0;
  }
  return a.name < b.name ? -1 : 1;
}

export class ModelRegistry {
  private readonly byApiName = new Map<string, StoredModelClass>();
  private readonly registered = new Set<object>();
  private readonly tracked = new Set<StoredModelClass>();

  register<C extends StoredModelClass>(model: C, options: RegisterOptions = {}): C {
    if (!isApiModel(model)) {
      throw new ConfigurationError(`${model.name} must be finalized with apiModel() before it is registered`, {
        model: model.name,
      });
    }

    const apiName = model.api.apiName;
    const existing = this.byApiName.get(apiName);
    if (existing !== undefined && existing !== model) {
      throw new ConfigurationError(`API name '${apiName}' is used by both ${existing.name} and ${model.name}`, {
        model: model.name,
      });
    }

    if (options.lastModified === true) {
      if (typeof model.objects.latestModification !== 'function') {
        throw new ConfigurationError(`Store of ${model.name} does not track modification times`, {
          model: model.name,
        });
      }
      this.tracked.add(model);
    }

    this.byApiName.set(apiName, model);
    this.registered.add(model);
    logger.debug({ model: model.name, apiName, lastModified: options.lastModified === true }, 'Model registered');
    return model;
  }

  get(apiName: string): StoredModelClass | undefined {
    return this.byApiName.get(apiName);
  }

  has(model: object): boolean {
    return this.registered.has(model);
  }

  /**
   * Registered models, sorted by class name
   */
  models(): StoredModelClass[] {
    return [...this.byApiName.values()].sort(byClassName);
  }

  lastModifiedModels(): StoredModelClass[] {
    return [...this.tracked].sort(byClassName);
  }

  get size(): number {
    return this.byApiName.size;
  }
}

/**
 * Latest modification over every tracked model; the epoch when there is none
 */
export async function lastModificationTimestamp(registry: ModelRegistry): Promise<Date> {
  const stamps = await Promise.all(
    registry.lastModifiedModels().map((model) => model.objects.latestModification?.() ?? Promise.resolve(null))
  );

  let latest = new Date(0);
  for (const stamp of stamps) {
    if (stamp !== null && stamp.getTime() > latest.getTime()) {
      latest = stamp;
    }
  }
  return latest;
}
