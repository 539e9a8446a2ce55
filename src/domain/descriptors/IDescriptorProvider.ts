/**
 * @fileoverview Descriptor Provider - Reflection Boundary
 *
 * @packageDocumentation
 * @module inject-graph/domain/descriptors
 *
 * ## Hexagonal Architecture Layer: DOMAIN
 *
 * The resolution engine never inspects classes or functions itself. It asks an
 * `IDescriptorProvider` for an ordered list of `(name, declared type)` pairs and
 * compiles producers from those lists alone. Once the provider is built, no
 * descriptor is read again.
 *
 * The default adapter (`MetadataDescriptorProvider`) reads reflect-metadata
 * and function source text; any other strategy, such as a hand-written table,
 * can be plugged in through `ContainerOptions.descriptors`.
 *
 * @version 1.0.0
 */

import { getKeyName } from '../keys';
import type { Constructor, ServiceKey } from '../keys';

/**
 * Any function the container may call with resolved arguments.
 */
export type Callable<R = unknown> = (...args: any[]) => R;

/**
 * A dependency declared as one of several types.
 *
 * @remarks
 * TypeScript erases unions before run time, so a union only reaches the
 * resolver when a descriptor states it explicitly. The resolver rejects every
 * union with `UnsupportedUnionTypeException`; it never picks a branch.
 *
 * A union left to emitted metadata arrives as `Object` and counts as untyped,
 * so it is resolved by name. Only a strict container, or a union stated with
 * `declareParameters` or `@Inject(union(...))`, fails the build for it.
 *
 * @example
 * ```typescript
 * @Injectable()
 * class Notifier {
 *   constructor(@Inject(union(EmailSender, SmsSender)) sender: EmailSender | SmsSender) {}
 * }
 * ```
 */
export class UnionType {
  constructor(readonly members: readonly ServiceKey[]) {}

  toString(): string {
    return this.members.map((member) => getKeyName(member)).join(' | ');
  }
}

/**
 * Declare a union of keys.
 */
export function union(...members: ServiceKey[]): UnionType {
  return new UnionType(members);
}

export function isUnionType(value: unknown): value is UnionType {
  return value instanceof UnionType;
}

/**
 * The declared type of a dependency.
 */
export type DeclaredType = ServiceKey | UnionType;

/**
 * One constructor parameter, injectable field or callable parameter.
 */
export interface ParameterDescriptor {
  /** Parameter or field name, used for alias lookups */
  readonly name: string;

  /** Declared type; absent when nothing was declared */
  readonly type?: DeclaredType;
}

/**
 * Capability that describes constructors, fields and callables.
 *
 * @remarks
 * Implementations must be total: every call terminates and returns a
 * description, even an empty one.
 */
export interface IDescriptorProvider {
  /**
   * Describe the parameters of a class constructor.
   *
   * @returns The ordered parameters, without rest parameters, or `undefined`
   * when neither the class nor any base class declares a constructor.
   */
  describeConstructor(type: Constructor): readonly ParameterDescriptor[] | undefined;

  /**
   * Describe the injectable fields of a class without a constructor.
   */
  describeFields(type: Constructor): readonly ParameterDescriptor[];

  /**
   * Describe the parameters of a plain function.
   */
  describeCallable(fn: Callable): readonly ParameterDescriptor[];

  /**
   * The declared return key of a factory, if any.
   */
  describeReturnType(fn: Callable): ServiceKey | undefined;
}
