/**
 * @module inject-graph/infrastructure/di
 * @description Container, provider and activation scope implementations
 */

// ============================================================================
// Container
// ============================================================================

export { Container } from './Container';
export { resolveContainerOptions } from './ContainerOptions';
export type { ContainerOptions, ResolvedContainerOptions } from './ContainerOptions';

// ============================================================================
// Provider
// ============================================================================

export { Services } from './Services';
export { ActivationScope } from './ActivationScope';

// ============================================================================
// Resolution
// ============================================================================

export {
  ResolutionContext,
  DynamicResolver,
  FactoryResolver,
  InstanceResolver,
} from './resolution';
export type { IResolver, IResolutionRegistry } from './resolution';

// ============================================================================
// Producers
// ============================================================================

export {
  TypeProducer,
  ArgsTypeProducer,
  ScopedTypeProducer,
  ScopedArgsTypeProducer,
  SingletonTypeProducer,
  FactoryTypeProducer,
  ScopedFactoryTypeProducer,
  SingletonFactoryTypeProducer,
  InstanceProducer,
  classifyFactory,
  toFactoryCall,
} from './producers';
export type { FactoryCall, FactoryConvention } from './producers';
