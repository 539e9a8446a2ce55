import type { IProducer } from '../../../application/di';

/**
 * Returns a value registered as-is.
 */
export class InstanceProducer implements IProducer {
  constructor(private readonly instance: unknown) {}

  produce(): unknown {
    return this.instance;
  }
}
