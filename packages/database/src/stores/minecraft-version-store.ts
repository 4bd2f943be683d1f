/**
 * Minecraft Version Store
 */

import type { SQL } from 'drizzle-orm';
import { asc } from 'drizzle-orm';
import { getDatabase } from '../connection.js';
import { minecraftVersions, type MinecraftVersionRow } from '../schema.js';
import type { MinecraftVersion } from '../models/minecraft-version.js';
import { ModelStore } from './model-store.js';

export class MinecraftVersionStore extends ModelStore<MinecraftVersion> {
  protected readonly modelName = 'MinecraftVersion';
  protected readonly lookups = {
    pk: minecraftVersions.id,
    id: minecraftVersions.id,
    comparator: minecraftVersions.comparator,
    family: minecraftVersions.family,
    display_name: minecraftVersions.displayName,
    is_common: minecraftVersions.isCommon,
    last_modified: minecraftVersions.lastModified,
  };

  private readonly create: () => MinecraftVersion;

  constructor(create: () => MinecraftVersion) {
    super();
    this.create = create;
  }

  protected async select(where: SQL | undefined): Promise<MinecraftVersion[]> {
    const db = getDatabase();
    const rows = await db.select().from(minecraftVersions).where(where).orderBy(asc(minecraftVersions.id));
    return rows.map((row) => this.mapToModel(row));
  }

  async save(version: MinecraftVersion): Promise<MinecraftVersion> {
    const db = getDatabase();
    const now = new Date();
    const values = {
      comparator: version.comparator,
      family: version.family,
      displayName: version.display_name,
      isCommon: version.is_common,
      lastModified: now,
    };

    if (version.pk === null) {
      const [row] = await db.insert(minecraftVersions).values(values).returning({ id: minecraftVersions.id });
      version.pk = row.id;
    } else {
      await db
        .insert(minecraftVersions)
        .values({ id: version.pk, ...values })
        .onConflictDoUpdate({ target: minecraftVersions.id, set: values });
    }

    version.last_modified = now;
    return version;
  }

  async latestModification(): Promise<Date | null> {
    return this.latestOf(minecraftVersions, minecraftVersions.lastModified);
  }

  private mapToModel(row: MinecraftVersionRow): MinecraftVersion {
    const version = this.create();
    version.pk = row.id;
    version.comparator = row.comparator;
    version.family = row.family;
    version.display_name = row.displayName;
    version.is_common = row.isCommon;
    version.last_modified = row.lastModified;
    return version;
  }
}
