/**
 * @fileoverview Main entry point for @taskledger/core
 *
 * Task data layer: task model, operation batches, the replica actor and the
 * storage backends built on it.
 */

export * from './errors/index.js';
export * from './logging/index.js';
export * from './task/index.js';
export * from './operations/index.js';
export * from './replica/index.js';
export * from './storage/index.js';
export * from './query/index.js';
export * from './settings/index.js';
export * from './hooks/index.js';
export * from './manager/index.js';
export * from './sync/index.js';
export * from './io/index.js';

// Version info
export const VERSION = '0.1.0';
export const NAME = 'taskledger';
