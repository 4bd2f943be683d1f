/**
 * Profile Store
 * Profiles are always loaded together with their user
 */

import { asc, eq, type SQL } from 'drizzle-orm';
import { getDatabase } from '../connection.js';
import { profiles, users, type ProfileRow, type UserRow } from '../schema.js';
import type { Profile } from '../models/profile.js';
import { ModelStore, required } from './model-store.js';
import type { UserStore } from './user-store.js';

export class ProfileStore extends ModelStore<Profile> {
  protected readonly modelName = 'Profile';
  protected readonly lookups = {
    pk: profiles.id,
    id: profiles.id,
    user: profiles.userId,
    user_id: profiles.userId,
    username: users.username,
  };

  private readonly create: () => Profile;
  private readonly users: UserStore;

  constructor(create: () => Profile, userStore: UserStore) {
    super();
    this.create = create;
    this.users = userStore;
  }

  protected async select(where: SQL | undefined): Promise<Profile[]> {
    const db = getDatabase();
    const rows = await db
      .select()
      .from(profiles)
      .innerJoin(users, eq(profiles.userId, users.id))
      .where(where)
      .orderBy(asc(profiles.id));
    return rows.map((row) => this.mapToModel(row.profiles, row.users));
  }

  /**
   * Save the user first, then the profile pointing at it.
   *
   * A profile that only knows its `user_id` (as after deserialization) is
   * attached to the stored user; a display name set on the unsaved
   * placeholder user is carried over.
   */
  async save(profile: Profile): Promise<Profile> {
    const db = getDatabase();
    if (profile.user.pk === null && profile.user_id !== null) {
      const stored = await this.users.get({ pk: profile.user_id });
      if (profile.user.first_name !== '') {
        stored.first_name = profile.user.first_name;
      }
      profile.user = stored;
    }
    const user = await this.users.save(profile.user);
    const values = { userId: required(user.pk, 'user', 'Profile') };
    profile.user_id = values.userId;

    if (profile.pk === null) {
      const [row] = await db.insert(profiles).values(values).returning({ id: profiles.id });
      profile.pk = row.id;
    } else {
      await db
        .insert(profiles)
        .values({ id: profile.pk, ...values })
        .onConflictDoUpdate({ target: profiles.id, set: values });
    }
    return profile;
  }

  private mapToModel(row: ProfileRow, userRow: UserRow): Profile {
    const profile = this.create();
    profile.pk = row.id;
    profile.user_id = row.userId;
    profile.user = this.users.mapToModel(userRow);
    return profile;
  }
}
