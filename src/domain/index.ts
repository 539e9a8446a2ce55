/**
 * @fileoverview Domain Layer Exports
 * @description
 * Keys, lifetimes, descriptors and the error taxonomy. Nothing here depends
 * on reflection or on the container implementation.
 *
 * @packageDocumentation
 * @module inject-graph/domain
 */

export * from './keys';
export * from './lifetime';
export * from './descriptors';
export * from './exceptions';
