import type { ServiceKey } from '../../../domain/keys';
import { getLifetimeName, ServiceLifetime } from '../../../domain/lifetime';
import type { IProducer } from '../../../application/di';
import {
  FactoryTypeProducer,
  ScopedFactoryTypeProducer,
  SingletonFactoryTypeProducer,
} from '../producers';
import type { FactoryCall } from '../producers';
import type { IResolver } from './IResolver';
import type { ResolutionContext } from './ResolutionContext';

/**
 * Resolver of a factory. The factory is already normalized to a
 * `FactoryCall`; compiling only picks the producer for the lifetime.
 */
export class FactoryResolver implements IResolver {
  constructor(
    private readonly factory: FactoryCall,
    readonly lifetime: ServiceLifetime,
    private readonly label: string = 'factory',
  ) {}

  compile(_context: ResolutionContext, key: ServiceKey): IProducer {
    switch (this.lifetime) {
      case ServiceLifetime.Singleton:
        return new SingletonFactoryTypeProducer(this.factory);
      case ServiceLifetime.Scoped:
        return new ScopedFactoryTypeProducer(key, this.factory);
      case ServiceLifetime.Transient:
        return new FactoryTypeProducer(this.factory);
    }
  }

  toString(): string {
    return `<${getLifetimeName(this.lifetime)} ${this.label}>`;
  }
}
