/**
 * @fileoverview Services - the built provider
 *
 * @packageDocumentation
 * @module inject-graph/infrastructure/di
 *
 * ## Hexagonal Architecture Layer: INFRASTRUCTURE
 *
 * Implements `IServiceProvider` over the map of compiled producers handed
 * over by `Container.build()`. Activation is a map lookup followed by a
 * producer call; nothing is described or compiled here, except the
 * parameter list of a function bound with `getExecutor()`, which is read
 * once per function.
 *
 * @version 1.0.0
 */

import { getKeyName } from '../../domain/keys';
import type { ServiceKey } from '../../domain/keys';
import { isUnionType } from '../../domain/descriptors';
import type { Callable, IDescriptorProvider } from '../../domain/descriptors';
import {
  CannotResolveTypeException,
  OverridingServiceException,
  UnsupportedUnionTypeException,
} from '../../domain/exceptions';
import type {
  Executor,
  IActivationScope,
  IProducer,
  IServiceProvider,
  ScopedServices,
} from '../../application/di';
import { defaultDescriptorProvider } from '../reflection';
import { noopLogger } from '../logging';
import type { ILogger } from '../logging';
import { ActivationScope } from './ActivationScope';
import { InstanceProducer } from './producers';

type ParameterGetter = (scope: IActivationScope) => unknown;

function isPromiseLike(value: unknown): value is PromiseLike<unknown> {
  return (
    (typeof value === 'object' || typeof value === 'function') &&
    value !== null &&
    'then' in value &&
    typeof value.then === 'function'
  );
}

/**
 * Built service provider.
 *
 * @example
 * ```typescript
 * const provider = container.build();
 *
 * provider.get(Clock);                        // throws if unknown
 * provider.get(Clock, undefined, null);       // null if unknown
 * provider.exec((clock: Clock) => clock.now());
 * ```
 */
export class Services implements IServiceProvider {
  private readonly getters = new WeakMap<Callable, readonly ParameterGetter[]>();

  constructor(
    private readonly map: Map<ServiceKey, IProducer> = new Map(),
    private readonly descriptors: IDescriptorProvider = defaultDescriptorProvider,
    private readonly logger: ILogger = noopLogger,
  ) {}

  get<T>(key: ServiceKey<T>, scope?: IActivationScope): T;
  get<T, D>(key: ServiceKey<T>, scope: IActivationScope | undefined, defaultValue: D): T | D;
  get(key: ServiceKey, scope?: IActivationScope, ...fallback: unknown[]): unknown {
    const activationScope = scope ?? new ActivationScope(this);
    const scoped = activationScope.scopedServices;
    if (scoped.has(key)) {
      return scoped.get(key);
    }

    const producer = this.map.get(key);
    if (producer === undefined) {
      if (fallback.length > 0) {
        return fallback[0];
      }
      throw new CannotResolveTypeException(key);
    }
    return producer.produce(activationScope, key);
  }

  set<T>(key: ServiceKey<T>, value: T): void {
    const name = getKeyName(key);
    const aliased = typeof key !== 'string';
    if (this.map.has(key) || (aliased && this.map.has(name))) {
      throw new OverridingServiceException(key, value);
    }
    const producer = new InstanceProducer(value);
    this.map.set(key, producer);
    if (aliased) {
      this.map.set(name, producer);
    }
  }

  has(key: ServiceKey): boolean {
    return this.map.has(key);
  }

  keys(): ServiceKey[] {
    return [...this.map.keys()];
  }

  createScope(scoped?: ScopedServices): ActivationScope {
    return new ActivationScope(this, scoped);
  }

  getExecutor<R>(fn: Callable<R>): Executor<R> {
    const getters = this.getParameterGetters(fn);
    return (scoped) => this.invoke(fn, getters, scoped);
  }

  exec<R>(fn: Callable<R>, scoped?: ScopedServices): R {
    return this.invoke(fn, this.getParameterGetters(fn), scoped);
  }

  private getParameterGetters(fn: Callable): readonly ParameterGetter[] {
    const memo = this.getters.get(fn);
    if (memo !== undefined) {
      return memo;
    }

    const getters = this.descriptors.describeCallable(fn).map((parameter): ParameterGetter => {
      const { name, type } = parameter;
      if (isUnionType(type)) {
        throw new UnsupportedUnionTypeException(name, fn.name || '<anonymous>');
      }
      const key = type ?? name;
      return (scope) => this.get(key, scope);
    });
    this.getters.set(fn, getters);
    this.logger.debug(
      `Created executor for '${fn.name || '<anonymous>'}' with ${getters.length} parameter(s)`,
    );
    return getters;
  }

  /**
   * Call `fn` in a fresh scope, disposed once the call has completed.
   */
  private invoke<R>(fn: Callable<R>, getters: readonly ParameterGetter[], scoped?: ScopedServices): R {
    const scope = new ActivationScope(this, scoped);
    let result: R;
    try {
      result = fn(...getters.map((getter) => getter(scope)));
    } catch (error) {
      scope.dispose();
      throw error;
    }

    if (isPromiseLike(result)) {
      const dispose = (): void => scope.dispose();
      void result.then(dispose, dispose);
      return result;
    }
    scope.dispose();
    return result;
  }
}
