/**
 * @docdesk/config
 * Validated environment configuration
 */

export * from './environment.js';
export * from './base-config.js';
export * from './google-config.js';
export * from './agent-config.js';
export * from './storage-config.js';
