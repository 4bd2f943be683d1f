/**
 * Minecraft Version model
 */

import { ApiEngine, Model, apiModel } from '@kendb/api-fields';
import { IncomparableVersionsError } from '@kendb/shared';
import { MinecraftVersionStore } from '../stores/minecraft-version-store.js';

export const VERSION_FAMILIES = {
  JE: 1,
  BE: 2,
  Other: 3,
} as const;

export type VersionFamily = (typeof VERSION_FAMILIES)[keyof typeof VERSION_FAMILIES];

const api = new ApiEngine();

export class MinecraftVersion extends Model {
  static readonly doc = 'A Minecraft version.';
  static readonly api = api;
  static readonly objects: MinecraftVersionStore = new MinecraftVersionStore(() => new MinecraftVersion());

  static readonly annotations = {
    comparator: api.mark(),
    family: api.mark(),
    display_name: api.mark(),
    is_common: api.mark(),
  };

  /** Version number that orders versions of one family */
  comparator = 0;
  family: number = VERSION_FAMILIES.JE;
  /** User-friendly name like `JE 1.19.4` */
  display_name = '';
  /** Well-known version, likely to be filtered against */
  is_common = false;
  last_modified: Date | null = null;

  /**
   * Whether compareTo() and equals() give meaningful results for `other`
   */
  canCompareTo(other: unknown): boolean {
    return other instanceof MinecraftVersion && other.family === this.family;
  }

  /**
   * Negative when this version is older, positive when newer
   */
  compareTo(other: MinecraftVersion): number {
    this.assertComparable(other);
    return this.comparator - other.comparator;
  }

  equals(other: MinecraftVersion): boolean {
    return this.compareTo(other) === 0;
  }

  isOlderThan(other: MinecraftVersion): boolean {
    return this.compareTo(other) < 0;
  }

  toString(): string {
    return `Minecraft version ${this.display_name}`;
  }

  private assertComparable(other: MinecraftVersion): void {
    if (other.family !== this.family) {
      throw new IncomparableVersionsError(this.toString(), other.toString());
    }
  }
}

apiModel(MinecraftVersion);
