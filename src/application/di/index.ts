/**
 * @module inject-graph/application/di
 * @description Contracts of the container, the provider and activation scopes
 */

// ============================================================================
// Core Interfaces
// ============================================================================

export type {
  IContainer,
  IServiceProvider,
  IActivationScope,
  IProducer,
} from './IDependencyInjection';

// ============================================================================
// Types
// ============================================================================

export type {
  ScopedServices,
  ServiceFactory,
  Executor,
  AliasAmbiguityPolicy,
} from './IDependencyInjection';
