export { ModelStore, buildWhere, required, type Lookups } from './model-store.js';
export { MinecraftVersionStore } from './minecraft-version-store.js';
export { SubmissionStore } from './submission-store.js';
export { SubmissionRevisionStore } from './submission-revision-store.js';
export { ProfileStore } from './profile-store.js';
export { UserStore } from './user-store.js';
