/**
 * @fileoverview ActivationScope - one activation session
 *
 * @module inject-graph/infrastructure/di
 */

import type { ServiceKey } from '../../domain/keys';
import { ActivationScopeDisposedException } from '../../domain/exceptions';
import type { IActivationScope, ScopedServices } from '../../application/di';
import type { Services } from './Services';

function isServiceMap(value: ScopedServices): value is ReadonlyMap<ServiceKey, unknown> {
  return value instanceof Map;
}

function toServiceMap(scoped: ScopedServices | undefined): Map<ServiceKey, unknown> {
  if (scoped === undefined) {
    return new Map();
  }
  if (isServiceMap(scoped)) {
    return new Map(scoped);
  }
  return new Map<ServiceKey, unknown>(Object.entries(scoped));
}

/**
 * Cache of scoped instances bound to a provider.
 *
 * @example
 * ```typescript
 * const scope = provider.createScope({ requestId: 'req-1' });
 * try {
 *   const handler = scope.get(CreateOrderHandler);
 * } finally {
 *   scope.dispose();
 * }
 * ```
 */
export class ActivationScope implements IActivationScope {
  private _provider: Services | undefined;
  private _scopedServices: Map<ServiceKey, unknown> | undefined;

  constructor(provider: Services, scoped?: ScopedServices) {
    this._provider = provider;
    this._scopedServices = toServiceMap(scoped);
  }

  /**
   * @throws {ActivationScopeDisposedException} After `dispose()`
   */
  get provider(): Services {
    if (this._provider === undefined) {
      throw new ActivationScopeDisposedException();
    }
    return this._provider;
  }

  /**
   * @throws {ActivationScopeDisposedException} After `dispose()`
   */
  get scopedServices(): Map<ServiceKey, unknown> {
    if (this._scopedServices === undefined) {
      throw new ActivationScopeDisposedException();
    }
    return this._scopedServices;
  }

  get<T>(key: ServiceKey<T>): T;
  get<T, D>(key: ServiceKey<T>, defaultValue: D): T | D;
  get(key: ServiceKey, ...fallback: unknown[]): unknown {
    const provider = this.provider;
    return fallback.length > 0 ? provider.get(key, this, fallback[0]) : provider.get(key, this);
  }

  isDisposed(): boolean {
    return this._provider === undefined;
  }

  dispose(): void {
    this._scopedServices?.clear();
    this._scopedServices = undefined;
    this._provider = undefined;
  }
}
