/**
 * Minecraft Version Tests
 */
import { describe, it, expect, beforeEach, afterAll } from 'vitest';
import { IncomparableVersionsError } from '@kendb/shared';
import { serialize } from '@kendb/api-fields';
import { closeDatabase } from '../connection.js';
import { createVersion, freshDatabase } from '../__tests__/seed.js';
import { MinecraftVersion, VERSION_FAMILIES } from './minecraft-version.js';

function version(comparator: number, displayName: string, family: number = VERSION_FAMILIES.JE): MinecraftVersion {
  const created = new MinecraftVersion();
  created.comparator = comparator;
  created.display_name = displayName;
  created.family = family;
  return created;
}

describe('MinecraftVersion', () => {
  describe('comparison', () => {
    const old = version(1122, 'JE 1.12.2');
    const current = version(1194, 'JE 1.19.4');
    const bedrock = version(1190, 'BE 1.19.0', VERSION_FAMILIES.BE);

    it('should order versions of one family', () => {
      expect(old.compareTo(current)).toBeLessThan(0);
      expect(current.compareTo(old)).toBeGreaterThan(0);
      expect(old.isOlderThan(current)).toBe(true);
      expect(current.isOlderThan(old)).toBe(false);
      expect(old.equals(version(1122, 'JE 1.12.2 (again)'))).toBe(true);
    });

    it('should only compare within one family', () => {
      expect(current.canCompareTo(old)).toBe(true);
      expect(current.canCompareTo(bedrock)).toBe(false);
      expect(current.canCompareTo('JE 1.19.4')).toBe(false);
    });

    it('should refuse comparisons across families', () => {
      expect(() => current.compareTo(bedrock)).toThrow(IncomparableVersionsError);
      expect(() => current.equals(bedrock)).toThrow(
        'Attempted to compare versions of different families: Minecraft version JE 1.19.4 and Minecraft version BE 1.19.0.'
      );
    });
  });

  it('should serialize every annotated field', () => {
    const created = version(1194, 'JE 1.19.4');
    created.pk = 3;
    created.is_common = true;

    expect(serialize(created)).toEqual({
      comparator: 1194,
      family: 1,
      display_name: 'JE 1.19.4',
      is_common: true,
      id: 3,
    });
  });
});

describe('MinecraftVersionStore', () => {
  beforeEach(() => {
    freshDatabase();
  });

  afterAll(() => {
    closeDatabase();
  });

  it('should have no modification time when empty', async () => {
    expect(await MinecraftVersion.objects.latestModification()).toBeNull();
  });

  it('should save and load versions', async () => {
    const saved = await createVersion(1194, 'JE 1.19.4', VERSION_FAMILIES.JE, true);
    await createVersion(1190, 'BE 1.19.0', VERSION_FAMILIES.BE);

    const loaded = await MinecraftVersion.objects.get({ pk: saved.pk });

    expect(loaded.comparator).toBe(1194);
    expect(loaded.display_name).toBe('JE 1.19.4');
    expect(loaded.is_common).toBe(true);
    expect(loaded.last_modified).toEqual(saved.last_modified);
    expect(await MinecraftVersion.objects.latestModification()).toBeInstanceOf(Date);
  });

  it('should filter by field values', async () => {
    await createVersion(1122, 'JE 1.12.2');
    await createVersion(1190, 'BE 1.19.0', VERSION_FAMILIES.BE);
    await createVersion(1194, 'JE 1.19.4');

    const java = await MinecraftVersion.objects.filter({ family: VERSION_FAMILIES.JE });

    expect(java.map((found) => found.display_name)).toEqual(['JE 1.12.2', 'JE 1.19.4']);
  });

  it('should update saved versions in place', async () => {
    const saved = await createVersion(1122, 'JE 1.12.2');
    saved.is_common = true;
    await MinecraftVersion.objects.save(saved);

    const all = await MinecraftVersion.objects.all();

    expect(all).toHaveLength(1);
    expect(all[0].is_common).toBe(true);
  });
});
