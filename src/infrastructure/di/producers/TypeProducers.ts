/**
 * @fileoverview Constructor-based producers
 *
 * One producer class per lifetime and per constructor shape, so the hot path
 * never branches on either. `args` holds one child producer per constructor
 * parameter, in order; children receive the constructed type as their
 * activating type.
 */

import type { Constructor, ServiceKey } from '../../../domain/keys';
import type { IActivationScope, IProducer } from '../../../application/di';

function produceArguments(
  args: readonly IProducer[],
  scope: IActivationScope,
  type: Constructor,
): unknown[] {
  return args.map((arg) => arg.produce(scope, type));
}

/**
 * Transient, no constructor arguments.
 */
export class TypeProducer implements IProducer {
  constructor(private readonly type: Constructor) {}

  produce(): unknown {
    return new this.type();
  }
}

/**
 * Transient, with constructor arguments.
 */
export class ArgsTypeProducer implements IProducer {
  constructor(
    private readonly type: Constructor,
    private readonly args: readonly IProducer[],
  ) {}

  produce(scope: IActivationScope): unknown {
    return new this.type(...produceArguments(this.args, scope, this.type));
  }
}

/**
 * Scoped, no constructor arguments. Cached in the scope under the
 * registration key.
 */
export class ScopedTypeProducer implements IProducer {
  constructor(
    private readonly key: ServiceKey,
    private readonly type: Constructor,
  ) {}

  produce(scope: IActivationScope): unknown {
    const cache = scope.scopedServices;
    if (cache.has(this.key)) {
      return cache.get(this.key);
    }
    const instance = new this.type();
    cache.set(this.key, instance);
    return instance;
  }
}

/**
 * Scoped, with constructor arguments.
 */
export class ScopedArgsTypeProducer implements IProducer {
  constructor(
    private readonly key: ServiceKey,
    private readonly type: Constructor,
    private readonly args: readonly IProducer[],
  ) {}

  produce(scope: IActivationScope): unknown {
    const cache = scope.scopedServices;
    if (cache.has(this.key)) {
      return cache.get(this.key);
    }
    const instance = new this.type(...produceArguments(this.args, scope, this.type));
    cache.set(this.key, instance);
    return instance;
  }
}

/**
 * Singleton, with or without constructor arguments. The instance is created
 * on first activation and kept by the producer.
 */
export class SingletonTypeProducer implements IProducer {
  private created = false;
  private instance: unknown;

  constructor(
    private readonly type: Constructor,
    private readonly args: readonly IProducer[] = [],
  ) {}

  produce(scope: IActivationScope): unknown {
    if (!this.created) {
      this.instance = new this.type(...produceArguments(this.args, scope, this.type));
      this.created = true;
    }
    return this.instance;
  }
}
