/**
 * @file packages/shared/src/index.ts
 * @description Defines module behavior for the Taskforce workspace.
 */

export * from './types.js';
export * from './protocol.js';
export * from './constants.js';
export * from './events/index.js';
