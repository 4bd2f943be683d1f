/**
 * Profile model
 */

import { ApiEngine, Model, apiModel, oneToOne } from '@kendb/api-fields';
import { ValidationError } from '@kendb/shared';
import { ProfileStore } from '../stores/profile-store.js';
import { User } from './user.js';

const DISPLAY_NAME_MIN = 3;
const DISPLAY_NAME_MAX = 150;

/**
 * Groups of allowed characters separated by exactly one space. Length is
 * checked separately.
 */
const DISPLAY_NAME_PATTERN = /^[A-Za-z0-9\-.@+_()[\]{}&=#~]+(?: [A-Za-z0-9\-.@+_()[\]{}&=#~]+)*$/;

export function validateDisplayName(value: string): void {
  if (value.length > DISPLAY_NAME_MAX) {
    throw new ValidationError(`Display name is too long (${value.length} > ${DISPLAY_NAME_MAX})`, {
      field: 'display_name',
    });
  }
  if (value.length < DISPLAY_NAME_MIN) {
    throw new ValidationError(`Display name is too short (${value.length} < ${DISPLAY_NAME_MIN})`, {
      field: 'display_name',
    });
  }
  if (!DISPLAY_NAME_PATTERN.test(value)) {
    throw new ValidationError('Display name contains illegal characters', { field: 'display_name' });
  }
}

const api = new ApiEngine();

export class Profile extends Model {
  static readonly doc = `Profile model.

    To be extended in future versions. All other code should reference Profiles
    instead of Users unless in authentication/authorization context.`;
  static readonly api = api;
  static readonly objects: ProfileStore = new ProfileStore(() => new Profile(), User.objects);

  static readonly attributes = {
    user: api.mark().attach(oneToOne(() => User)),

    /** Preferred name for the user; null resets it to the username */
    display_name: api
      .mark('basic', '*')
      .property<Profile, unknown>(function () {
        return this.user.first_name || this.user.username;
      })
      .setter(function (value) {
        if (value === null) {
          this.user.first_name = '';
          return;
        }
        if (typeof value !== 'string') {
          throw new ValidationError('Display name must be a string', { field: 'display_name' });
        }
        validateDisplayName(value);
        this.user.first_name = value;
      }),
  };

  declare user_id: number | null;
  declare display_name: string;

  /** Corresponding User object */
  user: User = new User();

  toString(): string {
    return `@${this.user.username} (${this.display_name})`;
  }
}

apiModel(Profile);
