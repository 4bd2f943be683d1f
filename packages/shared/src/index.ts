/**
 * @kendb/shared
 * Configuration, logging and the error hierarchy shared by every KenDB3 package
 */

export * from './config/index.js';
export * from './logger/index.js';
export * from './errors/index.js';
