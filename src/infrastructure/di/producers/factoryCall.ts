/**
 * @fileoverview Factory calling conventions
 *
 * A factory declares which arguments it wants through its arity. The
 * convention is picked once, at registration, and turned into a uniform
 * `FactoryCall` so producers never inspect the factory again.
 */

import type { ServiceKey } from '../../../domain/keys';
import type { Callable } from '../../../domain/descriptors';
import type { IActivationScope } from '../../../application/di';

/**
 * Uniform call shape used by factory producers.
 */
export type FactoryCall = (scope: IActivationScope, activatingType: ServiceKey) => unknown;

export type FactoryConvention =
  | { readonly kind: 'no-args'; readonly factory: () => unknown }
  | { readonly kind: 'with-scope'; readonly factory: (scope: IActivationScope) => unknown }
  | {
      readonly kind: 'with-scope-and-type';
      readonly factory: (scope: IActivationScope, activatingType: ServiceKey) => unknown;
    };

/**
 * Pick the calling convention of a factory from its arity.
 *
 * `Function.length` stops counting at the first defaulted parameter, so the
 * container passes the number of declared parameters instead.
 *
 * @returns `undefined` when the factory declares more than two parameters
 */
export function classifyFactory(
  factory: Callable,
  arity: number = factory.length,
): FactoryConvention | undefined {
  switch (arity) {
    case 0:
      return { kind: 'no-args', factory };
    case 1:
      return { kind: 'with-scope', factory };
    case 2:
      return { kind: 'with-scope-and-type', factory };
    default:
      return undefined;
  }
}

export function toFactoryCall(convention: FactoryConvention): FactoryCall {
  switch (convention.kind) {
    case 'no-args': {
      const { factory } = convention;
      return () => factory();
    }
    case 'with-scope': {
      const { factory } = convention;
      return (scope) => factory(scope);
    }
    case 'with-scope-and-type':
      return convention.factory;
  }
}
