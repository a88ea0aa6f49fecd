/**
 * Provisioning client for Databricks workspace resources.
 *
 * @packageDocumentation
 */

export * from './types/index.js';
export * from './errors/index.js';
export * from './auth/index.js';
export * from './config/index.js';
export * from './clock/index.js';
export * from './observability/index.js';
export * from './http/index.js';
export * from './retry/index.js';
export * from './polling/index.js';
export * from './resources/index.js';
export * from './orchestrator/index.js';
export * from './client/index.js';
