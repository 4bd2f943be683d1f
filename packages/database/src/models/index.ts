/**
 * KenDB3 models
 */

import { ModelRegistry } from '@kendb/api-fields';
import { MinecraftVersion } from './minecraft-version.js';
import { Profile } from './profile.js';
import { Submission } from './submission.js';
import { SubmissionRevision } from './submission-revision.js';

export { MinecraftVersion, VERSION_FAMILIES, type VersionFamily } from './minecraft-version.js';
export { Submission } from './submission.js';
export { SubmissionRevision } from './submission-revision.js';
export { Profile, validateDisplayName } from './profile.js';
export { User } from './user.js';

/**
 * Registry of every model served through the API
 */
export function createModelRegistry(): ModelRegistry {
  const registry = new ModelRegistry();
  registry.register(MinecraftVersion, { lastModified: true });
  registry.register(Submission, { lastModified: true });
  registry.register(SubmissionRevision, { lastModified: true });
  registry.register(Profile);
  return registry;
}
