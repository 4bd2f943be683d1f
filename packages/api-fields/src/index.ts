/**
 * @kendb/api-fields
 * Field registration, serialization and frontend declaration export for API models
 */

export * from './types.js';
export * from './attributes.js';
export * from './accessors.js';
export * from './naming.js';
export * from './registrar.js';
export * from './engine.js';
export * from './resolver.js';
export * from './model.js';
export * from './serializer.js';
export * from './registry.js';
export * from './server/index.js';
export * from './autogen/index.js';
