/**
 * @fileoverview Factory-based producers
 */

import type { ServiceKey } from '../../../domain/keys';
import type { IActivationScope, IProducer } from '../../../application/di';
import type { FactoryCall } from './factoryCall';

/**
 * Transient: calls the factory on every activation.
 */
export class FactoryTypeProducer implements IProducer {
  constructor(private readonly factory: FactoryCall) {}

  produce(scope: IActivationScope, activatingType: ServiceKey): unknown {
    return this.factory(scope, activatingType);
  }
}

/**
 * Scoped: calls the factory once per scope.
 */
export class ScopedFactoryTypeProducer implements IProducer {
  constructor(
    private readonly key: ServiceKey,
    private readonly factory: FactoryCall,
  ) {}

  produce(scope: IActivationScope, activatingType: ServiceKey): unknown {
    const cache = scope.scopedServices;
    if (cache.has(this.key)) {
      return cache.get(this.key);
    }
    const instance = this.factory(scope, activatingType);
    cache.set(this.key, instance);
    return instance;
  }
}

/**
 * Singleton: calls the factory once, on first activation. A factory
 * returning `undefined` or another falsy value is still called only once.
 */
export class SingletonFactoryTypeProducer implements IProducer {
  private created = false;
  private instance: unknown;

  constructor(private readonly factory: FactoryCall) {}

  produce(scope: IActivationScope, activatingType: ServiceKey): unknown {
    if (!this.created) {
      this.instance = this.factory(scope, activatingType);
      this.created = true;
    }
    return this.instance;
  }
}
