/**
 * Schema validation exports
 * Centralized validation for the node inventory
 */

export * from './inventory.schema';
export * from './validation';
