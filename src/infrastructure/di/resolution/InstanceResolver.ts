import { ServiceLifetime } from '../../../domain/lifetime';
import type { IProducer } from '../../../application/di';
import { InstanceProducer } from '../producers';
import type { IResolver } from './IResolver';

/**
 * Resolver of a value registered with `addInstance()`.
 */
export class InstanceResolver implements IResolver {
  readonly lifetime = ServiceLifetime.Singleton;

  constructor(readonly instance: unknown) {}

  compile(): IProducer {
    return new InstanceProducer(this.instance);
  }

  toString(): string {
    const value = this.instance;
    const kind = typeof value === 'object' && value !== null ? value.constructor.name : typeof value;
    return `<Instance ${kind}>`;
  }
}
