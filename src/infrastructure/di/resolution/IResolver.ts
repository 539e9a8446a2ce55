/**
 * @fileoverview Resolver contracts
 *
 * A resolver is what a registration stores until build; compiling it yields
 * the producer the provider will run.
 */

import type { ServiceKey } from '../../../domain/keys';
import type { IDescriptorProvider } from '../../../domain/descriptors';
import type { ServiceLifetime } from '../../../domain/lifetime';
import type { IProducer } from '../../../application/di';
import type { ResolutionContext } from './ResolutionContext';

export interface IResolver {
  readonly lifetime: ServiceLifetime;

  /**
   * Compile the producer for the registration stored under `key`.
   */
  compile(context: ResolutionContext, key: ServiceKey): IProducer;

  /**
   * Short description used in error and log messages, such as
   * `<Scoped UnitOfWork>`.
   */
  toString(): string;
}

/**
 * What resolvers may ask of the registry while compiling.
 */
export interface IResolutionRegistry {
  readonly strict: boolean;
  readonly descriptors: IDescriptorProvider;
  getResolver(key: ServiceKey): IResolver | undefined;
  getExactAlias(name: string): ServiceKey | undefined;
  getInferredAliases(name: string): readonly ServiceKey[];
}
