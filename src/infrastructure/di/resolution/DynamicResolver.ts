/**
 * @fileoverview Resolver of a class registration
 *
 * Compiling a class means describing its constructor, resolving a key for
 * every parameter, compiling (or reusing) the producer of each key, and
 * wrapping the children into the producer matching the lifetime.
 *
 * Parameter keys are resolved in this order:
 *
 * 1. the declared type (a union is rejected);
 * 2. unless the container is strict, an exact alias named like the parameter;
 * 3. unless the container is strict, the single inferred alias for the name.
 *
 * A class declaring no constructor (nor any base class), or declaring one
 * without parameters, is built from its injectable fields when it has some.
 */

import type { Constructor, ServiceKey } from '../../../domain/keys';
import { isUnionType } from '../../../domain/descriptors';
import type { ParameterDescriptor } from '../../../domain/descriptors';
import { getLifetimeName, ServiceLifetime } from '../../../domain/lifetime';
import {
  AmbiguousReferenceNameException,
  CannotResolveParameterException,
  CircularDependencyException,
  UnsupportedUnionTypeException,
} from '../../../domain/exceptions';
import type { IActivationScope, IProducer } from '../../../application/di';
import {
  ArgsTypeProducer,
  ScopedArgsTypeProducer,
  ScopedTypeProducer,
  SingletonTypeProducer,
  TypeProducer,
} from '../producers';
import { FactoryResolver } from './FactoryResolver';
import type { IResolutionRegistry, IResolver } from './IResolver';
import type { ResolutionContext } from './ResolutionContext';

interface Dependency {
  readonly key: ServiceKey;
  readonly resolver: IResolver;
}

export class DynamicResolver implements IResolver {
  constructor(
    readonly concreteType: Constructor<object>,
    private readonly registry: IResolutionRegistry,
    readonly lifetime: ServiceLifetime,
  ) {}

  compile(context: ResolutionContext, key: ServiceKey): IProducer {
    const chain = context.chain;
    chain.push(this.concreteType);
    try {
      const parameters = this.registry.descriptors.describeConstructor(this.concreteType);
      if (parameters === undefined || parameters.length === 0) {
        const fields = this.registry.descriptors.describeFields(this.concreteType);
        if (fields.length > 0) {
          return this.compileFields(context, key, fields);
        }
      }
      return this.compileConstructor(context, key, parameters ?? []);
    } finally {
      chain.pop();
    }
  }

  toString(): string {
    return `<${getLifetimeName(this.lifetime)} ${this.concreteType.name}>`;
  }

  private compileConstructor(
    context: ResolutionContext,
    key: ServiceKey,
    parameters: readonly ParameterDescriptor[],
  ): IProducer {
    const type = this.concreteType;
    if (parameters.length === 0) {
      switch (this.lifetime) {
        case ServiceLifetime.Singleton:
          return new SingletonTypeProducer(type);
        case ServiceLifetime.Scoped:
          return new ScopedTypeProducer(key, type);
        case ServiceLifetime.Transient:
          return new TypeProducer(type);
      }
    }

    const args = parameters.map((parameter) =>
      this.getProducer(context, this.resolveDependency(context, parameter)),
    );
    switch (this.lifetime) {
      case ServiceLifetime.Singleton:
        return new SingletonTypeProducer(type, args);
      case ServiceLifetime.Scoped:
        return new ScopedArgsTypeProducer(key, type, args);
      case ServiceLifetime.Transient:
        return new ArgsTypeProducer(type, args);
    }
  }

  private compileFields(
    context: ResolutionContext,
    key: ServiceKey,
    fields: readonly ParameterDescriptor[],
  ): IProducer {
    const type = this.concreteType;
    const producers = fields.map(
      (field) => [field.name, this.getProducer(context, this.resolveDependency(context, field))] as const,
    );
    const factory = (scope: IActivationScope): object => {
      const instance = new type();
      const values: Record<string, unknown> = {};
      for (const [name, producer] of producers) {
        values[name] = producer.produce(scope, type);
      }
      return Object.assign(instance, values);
    };
    return new FactoryResolver(factory, this.lifetime, type.name).compile(context, key);
  }

  /**
   * The registered key that satisfies a parameter, with its resolver.
   */
  private resolveDependency(context: ResolutionContext, parameter: ParameterDescriptor): Dependency {
    const { name, type } = parameter;
    if (isUnionType(type)) {
      throw new UnsupportedUnionTypeException(name, this.concreteType);
    }

    let key: ServiceKey | undefined = type;
    if (key === undefined) {
      if (this.registry.strict) {
        throw new CannotResolveParameterException(name, this.concreteType, this.chainNames(context));
      }
      key = this.registry.getExactAlias(name) ?? this.getInferredAlias(context, name);
    }

    const resolver = key === undefined ? undefined : this.registry.getResolver(key);
    if (key === undefined || resolver === undefined) {
      throw new CannotResolveParameterException(name, this.concreteType, this.chainNames(context));
    }
    return { key, resolver };
  }

  private getInferredAlias(context: ResolutionContext, name: string): ServiceKey | undefined {
    const candidates = this.registry.getInferredAliases(name);
    if (candidates.length > 1) {
      throw new AmbiguousReferenceNameException(
        name,
        candidates,
        this.concreteType,
        this.chainNames(context),
      );
    }
    return candidates[0];
  }

  /**
   * Producer of a dependency, compiled at most once per build.
   */
  private getProducer(context: ResolutionContext, { key, resolver }: Dependency): IProducer {
    const memo = context.resolved.get(key);
    if (memo !== undefined) {
      return memo;
    }

    if (resolver instanceof DynamicResolver && context.chain.includes(resolver.concreteType)) {
      throw new CircularDependencyException(
        context.chain[0],
        resolver.concreteType,
        this.chainNames(context),
      );
    }

    const producer = resolver.compile(context, key);
    context.resolved.set(key, producer);
    return producer;
  }

  private chainNames(context: ResolutionContext): string[] {
    return context.chain.map((type) => type.name);
  }
}
