/**
 * @module inject-graph/infrastructure/di/resolution
 */

export { ResolutionContext } from './ResolutionContext';
export { DynamicResolver } from './DynamicResolver';
export { FactoryResolver } from './FactoryResolver';
export { InstanceResolver } from './InstanceResolver';
export type { IResolver, IResolutionRegistry } from './IResolver';
