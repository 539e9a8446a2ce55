/**
 * @fileoverview Container configuration
 *
 * @module inject-graph/infrastructure/di
 */

import type { IDescriptorProvider } from '../../domain/descriptors';
import type { AliasAmbiguityPolicy } from '../../application/di';
import { defaultDescriptorProvider } from '../reflection';
import { noopLogger } from '../logging';
import type { ILogger } from '../logging';

/**
 * Container options
 */
export interface ContainerOptions {
  /**
   * Resolve by declared type only. Alias operations throw and untyped
   * dependencies fail.
   * A parameter typed as a union is emitted as `Object`, so strict mode is
   * also what fails the build for an undeclared union.
   * @default false
   */
  strict?: boolean;

  /**
   * Treatment of a name shared by several keys when inferred aliases are
   * added at build.
   * @default 'defer'
   */
  aliasAmbiguity?: AliasAmbiguityPolicy;

  /**
   * Source of constructor, field and callable descriptions.
   * @default the shared MetadataDescriptorProvider
   */
  descriptors?: IDescriptorProvider;

  /**
   * Logger for registrations and builds.
   * @default noopLogger
   */
  logger?: ILogger;
}

export type ResolvedContainerOptions = Readonly<Required<ContainerOptions>>;

/**
 * Default options
 */
const DEFAULT_OPTIONS: ResolvedContainerOptions = {
  strict: false,
  aliasAmbiguity: 'defer',
  descriptors: defaultDescriptorProvider,
  logger: noopLogger,
};

/**
 * Complete a partial options object with the defaults.
 */
export function resolveContainerOptions(options: ContainerOptions = {}): ResolvedContainerOptions {
  return Object.freeze({
    strict: options.strict ?? DEFAULT_OPTIONS.strict,
    aliasAmbiguity: options.aliasAmbiguity ?? DEFAULT_OPTIONS.aliasAmbiguity,
    descriptors: options.descriptors ?? DEFAULT_OPTIONS.descriptors,
    logger: options.logger ?? DEFAULT_OPTIONS.logger,
  });
}
