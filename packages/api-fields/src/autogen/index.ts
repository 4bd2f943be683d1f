export * from './autogenerators.js';
export * from './api-autogenerator.js';
