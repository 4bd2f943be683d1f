/**
 * User Store
 */

import { asc, type SQL } from 'drizzle-orm';
import { getDatabase } from '../connection.js';
import { users, type UserRow } from '../schema.js';
import type { User } from '../models/user.js';
import { ModelStore } from './model-store.js';

export class UserStore extends ModelStore<User> {
  protected readonly modelName = 'User';
  protected readonly lookups = {
    pk: users.id,
    id: users.id,
    username: users.username,
    first_name: users.firstName,
  };

  private readonly create: () => User;

  constructor(create: () => User) {
    super();
    this.create = create;
  }

  protected async select(where: SQL | undefined): Promise<User[]> {
    const db = getDatabase();
    const rows = await db.select().from(users).where(where).orderBy(asc(users.id));
    return rows.map((row) => this.mapToModel(row));
  }

  async save(user: User): Promise<User> {
    const db = getDatabase();
    const values = { username: user.username, firstName: user.first_name };

    if (user.pk === null) {
      const [row] = await db.insert(users).values(values).returning({ id: users.id });
      user.pk = row.id;
    } else {
      await db
        .insert(users)
        .values({ id: user.pk, ...values })
        .onConflictDoUpdate({ target: users.id, set: values });
    }
    return user;
  }

  mapToModel(row: UserRow): User {
    const user = this.create();
    user.pk = row.id;
    user.username = row.username;
    user.first_name = row.firstName;
    return user;
  }
}
