/**
 * User model
 *
 * Authentication identity. Not served through the API; everything else
 * references Profiles.
 */

import { Model } from '@kendb/api-fields';
import { UserStore } from '../stores/user-store.js';

export class User extends Model {
  static readonly objects: UserStore = new UserStore(() => new User());

  username = '';
  first_name = '';
}
