/**
 * Services barrel export
 *
 * The node pool and the pipelines it drives over remote sessions.
 */

// Pool facade
export * from './node-pool';

// Registry and sessions
export * from './node-registry';
export * from './session-manager';
export * from './status-tracker';

// Pipelines
export * from './deploy-service';
export * from './run-service';
export * from './liveness-service';
