/**
 * @fileoverview Infrastructure Layer Exports
 * @description
 * The container implementation, the reflect-metadata descriptor provider
 * and its decorators, and the loggers.
 *
 * @packageDocumentation
 * @module inject-graph/infrastructure
 */

export * from './di';
export * from './reflection';
export * from './logging';
