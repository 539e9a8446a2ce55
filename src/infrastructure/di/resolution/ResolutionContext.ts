import type { Constructor, ServiceKey } from '../../../domain/keys';
import type { IProducer } from '../../../application/di';

/**
 * State of one build.
 *
 * `resolved` memoizes the producer compiled for each key, so every key is
 * compiled once per build and shared by all its dependents. `chain` is the
 * path of types being compiled, used to detect cycles and to render
 * dependency graphs in errors.
 */
export class ResolutionContext {
  readonly resolved = new Map<ServiceKey, IProducer>();
  readonly chain: Constructor<object>[] = [];

  dispose(): void {
    this.resolved.clear();
    this.chain.length = 0;
  }
}
