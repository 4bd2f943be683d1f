/**
 * Page injections
 *
 * Server-rendered pages carry packets of serialized instances so that the
 * frontend model managers start with data already loaded.
 */

import { ConfigurationError } from '@kendb/shared';
import { engineOf, type Model } from '../model.js';
import { lastModificationTimestamp, type ModelRegistry } from '../registry.js';
import { serialize } from '../serializer.js';
import { DEFAULT_GROUP } from '../types.js';
import type { ModelsPacket } from './data-manager.js';

export interface InjectedPacket {
  model: string;
  fields: string;
  packet: ModelsPacket;
}

export interface InjectionContext {
  injected_packets?: InjectedPacket[];
  [key: string]: unknown;
}

export interface InjectOptions {
  registry: ModelRegistry;
  /** The packet holds every instance of the model */
  dump?: boolean;
}

/**
 * Add a packet of instances to the context, in place.
 *
 * Null entries are ignored; returns null (leaving the context alone) when
 * nothing is left. May be called several times on the same context.
 */
export async function inject<C extends InjectionContext>(
  context: C,
  instances: Iterable<Model | null | undefined>,
  group: string = DEFAULT_GROUP,
  options: InjectOptions
): Promise<C | null> {
  const present: Model[] = [];
  for (const instance of instances) {
    if (instance !== null && instance !== undefined) {
      present.push(instance);
    }
  }
  if (present.length === 0) {
    return null;
  }

  const types = new Set(present.map((instance) => instance.constructor));
  if (types.size > 1) {
    throw new ConfigurationError(
      `Cannot inject instances of different models together: ${[...types].map((type) => type.name).join(', ')}`
    );
  }

  const [first] = present;
  // Fails fast for classes that are not API models
  engineOf(first.constructor);
  const lastModified = await lastModificationTimestamp(options.registry);

  const target = context.injected_packets ?? [];
  context.injected_packets = target;
  target.push({
    model: first.constructor.name,
    fields: group,
    packet: {
      instances: present.map((instance) => serialize(instance, group)),
      last_modified: lastModified.toISOString(),
      dump: options.dump ?? false,
    },
  });
  return context;
}
