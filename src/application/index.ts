/**
 * @fileoverview Application Layer Exports
 * @description
 * Contracts of the container, the built provider and activation scopes.
 *
 * @packageDocumentation
 * @module inject-graph/application
 */

export * from './di';
