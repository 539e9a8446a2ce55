/**
 * @fileoverview Container - the type registry
 *
 * @packageDocumentation
 * @module inject-graph/infrastructure/di
 *
 * ## Hexagonal Architecture Layer: INFRASTRUCTURE
 *
 * Collects registrations and aliases, then compiles them into a `Services`
 * provider. All graph validation happens in `build()`:
 *
 * ```
 * registrations ──┐
 *                 ├─▶ ResolutionContext ─▶ producers ─▶ Services
 * aliases ────────┘        (memo + chain)
 * ```
 *
 * JavaScript runs registrations and builds to completion on one thread, so
 * the registry needs no locking; the provider built from it is read-only,
 * except for `Services.set()`.
 *
 * @version 1.0.0
 */

import { getKeyName, getNameVariants, isAliasableName, isConstructor } from '../../domain/keys';
import type { Constructor, ServiceKey } from '../../domain/keys';
import type { Callable, IDescriptorProvider } from '../../domain/descriptors';
import { getLifetimeName, ServiceLifetime } from '../../domain/lifetime';
import {
  AliasAlreadyDefined,
  AliasConfigurationError,
  AmbiguousReferenceNameException,
  InvalidFactory,
  InvalidOperationInStrictMode,
  MissingTypeException,
  OverridingServiceException,
} from '../../domain/exceptions';
import type {
  IActivationScope,
  IContainer,
  IProducer,
  ServiceFactory,
} from '../../application/di';
import { getInjectableOptions } from '../reflection';
import { resolveContainerOptions } from './ContainerOptions';
import type { ContainerOptions, ResolvedContainerOptions } from './ContainerOptions';
import { classifyFactory, toFactoryCall } from './producers';
import {
  DynamicResolver,
  FactoryResolver,
  InstanceResolver,
  ResolutionContext,
} from './resolution';
import type { IResolutionRegistry, IResolver } from './resolution';
import { Services } from './Services';

function constructorOf(value: unknown): Constructor<object> | undefined {
  if (typeof value !== 'object' || value === null) {
    return undefined;
  }
  const ctor: unknown = value.constructor;
  return isConstructor(ctor) ? ctor : undefined;
}

/**
 * Dependency injection container.
 *
 * @example
 * ```typescript
 * const container = new Container({ logger: consoleLogger });
 *
 * container
 *   .addInstance(new Settings('test-secret'))
 *   .addSingleton(Clock)
 *   .addScoped(UnitOfWork)
 *   .addTransient(CatsRepository, SqlCatsRepository);
 *
 * const provider = container.build();
 * ```
 */
export class Container implements IContainer, IResolutionRegistry {
  private readonly options: ResolvedContainerOptions;
  private readonly registrations = new Map<ServiceKey, IResolver>();
  private readonly inferredAliases = new Map<string, Set<ServiceKey>>();
  private readonly exactAliases = new Map<string, ServiceKey>();
  private _provider: Services | undefined;

  constructor(options: ContainerOptions = {}) {
    this.options = resolveContainerOptions(options);
  }

  get strict(): boolean {
    return this.options.strict;
  }

  get descriptors(): IDescriptorProvider {
    return this.options.descriptors;
  }

  /**
   * The built provider, cached until the next registration.
   */
  get provider(): Services {
    if (this._provider === undefined) {
      this._provider = this.build();
    }
    return this._provider;
  }

  // ==========================================================================
  // Registry access
  // ==========================================================================

  has(key: ServiceKey): boolean {
    return this.registrations.has(key);
  }

  entries(): Array<[ServiceKey, IResolver]> {
    return [...this.registrations.entries()];
  }

  getResolver(key: ServiceKey): IResolver | undefined {
    return this.registrations.get(key);
  }

  getExactAlias(name: string): ServiceKey | undefined {
    return this.exactAliases.get(name);
  }

  getInferredAliases(name: string): readonly ServiceKey[] {
    return [...(this.inferredAliases.get(name) ?? [])];
  }

  // ==========================================================================
  // Registration
  // ==========================================================================

  /**
   * Store a resolver under a key.
   *
   * @throws {OverridingServiceException} When the key is already registered
   */
  bind(key: ServiceKey, resolver: IResolver): this {
    if (this.registrations.has(key)) {
      throw new OverridingServiceException(key, resolver);
    }
    this.registrations.set(key, resolver);
    this._provider = undefined;

    const name = getKeyName(key);
    this.options.logger.debug(`Bound '${name}' to ${resolver}`);
    if (!this.strict && isAliasableName(name)) {
      for (const variant of getNameVariants(name)) {
        this.addInferredAlias(variant, key);
      }
    }
    return this;
  }

  addInstance<T>(instance: T, declaredKey?: ServiceKey<T>): this {
    const key = declaredKey ?? constructorOf(instance);
    if (key === undefined) {
      throw new TypeError('A key is required to register a value that is not an object.');
    }
    return this.bind(key, new InstanceResolver(instance));
  }

  addTransient<T extends object>(type: Constructor<T>): this;
  addTransient<T extends object>(base: ServiceKey<T>, concrete: Constructor<T>): this;
  addTransient(base: ServiceKey<object>, concrete?: Constructor<object>): this {
    return this.addType(base, concrete, ServiceLifetime.Transient);
  }

  addScoped<T extends object>(type: Constructor<T>): this;
  addScoped<T extends object>(base: ServiceKey<T>, concrete: Constructor<T>): this;
  addScoped(base: ServiceKey<object>, concrete?: Constructor<object>): this {
    return this.addType(base, concrete, ServiceLifetime.Scoped);
  }

  addSingleton<T extends object>(type: Constructor<T>): this;
  addSingleton<T extends object>(base: ServiceKey<T>, concrete: Constructor<T>): this;
  addSingleton(base: ServiceKey<object>, concrete?: Constructor<object>): this {
    return this.addType(base, concrete, ServiceLifetime.Singleton);
  }

  /**
   * Register `concrete` under `base`.
   *
   * @remarks
   * `concrete` is not required to extend `base`: a class may `implements` an
   * abstract class without inheriting from it.
   */
  bindTypes<T extends object>(
    base: ServiceKey<T>,
    concrete: Constructor<T>,
    lifetime: ServiceLifetime = ServiceLifetime.Transient,
  ): this {
    return this.bind(base, new DynamicResolver(concrete, this, lifetime));
  }

  addTransientByFactory<T>(factory: ServiceFactory<T>, returnType?: ServiceKey<T>): this {
    return this.registerFactory(factory, returnType, ServiceLifetime.Transient);
  }

  addScopedByFactory<T>(factory: ServiceFactory<T>, returnType?: ServiceKey<T>): this {
    return this.registerFactory(factory, returnType, ServiceLifetime.Scoped);
  }

  addSingletonByFactory<T>(factory: ServiceFactory<T>, returnType?: ServiceKey<T>): this {
    return this.registerFactory(factory, returnType, ServiceLifetime.Singleton);
  }

  /**
   * Register a factory with an explicit lifetime.
   *
   * @throws {InvalidFactory} When `factory` is not a function, or declares
   * more than two parameters
   * @throws {MissingTypeException} When no return type is given nor declared
   */
  registerFactory(factory: Callable, returnType: ServiceKey | undefined, lifetime: ServiceLifetime): this {
    if (typeof factory !== 'function') {
      throw new InvalidFactory(returnType);
    }
    const key = returnType ?? this.descriptors.describeReturnType(factory);
    if (key === undefined) {
      throw new MissingTypeException();
    }
    const arity = Math.max(factory.length, this.descriptors.describeCallable(factory).length);
    const convention = classifyFactory(factory, arity);
    if (convention === undefined) {
      throw new InvalidFactory(key);
    }
    return this.bind(key, new FactoryResolver(toFactoryCall(convention), lifetime, factory.name || 'factory'));
  }

  /**
   * Register an instance, a class, or a class under another key.
   *
   * @remarks
   * A class registered under its own key takes the lifetime declared with
   * `@Injectable()`, transient by default.
   */
  register<T>(key: ServiceKey<T>, concrete?: Constructor<T & object>, instance?: T): this {
    if (instance !== undefined) {
      return this.addInstance(instance, key);
    }
    const type = concrete ?? key;
    if (!isConstructor(type)) {
      throw new TypeError(`A class is required to register '${getKeyName(key)}'.`);
    }
    const lifetime = getInjectableOptions(type)?.lifetime ?? ServiceLifetime.Transient;
    return this.bind(key, new DynamicResolver(type, this, lifetime));
  }

  /**
   * Activate `key` through the cached provider.
   */
  resolve<T>(key: ServiceKey<T>, scope?: IActivationScope): T {
    return this.provider.get(key, scope);
  }

  // ==========================================================================
  // Aliases
  // ==========================================================================

  /**
   * Add a name under which `key` can be found by name-based resolution.
   *
   * @throws {InvalidOperationInStrictMode} On a strict container
   * @throws {AliasAlreadyDefined} When the name is already an alias
   */
  addAlias(name: string, key: ServiceKey): this {
    this.assertNotStrict();
    if (this.inferredAliases.has(name) || this.exactAliases.has(name)) {
      throw new AliasAlreadyDefined(name);
    }
    this.addInferredAlias(name, key);
    this._provider = undefined;
    this.options.logger.debug(`Added alias '${name}' for '${getKeyName(key)}'`);
    return this;
  }

  addAliases(aliases: Readonly<Record<string, ServiceKey>>): this {
    for (const [name, key] of Object.entries(aliases)) {
      this.addAlias(name, key);
    }
    return this;
  }

  /**
   * Set an exact alias. Exact aliases take precedence over inferred ones.
   *
   * @throws {InvalidOperationInStrictMode} On a strict container
   * @throws {AliasAlreadyDefined} When the exact alias exists and `override`
   * is not set
   */
  setAlias(name: string, key: ServiceKey, override: boolean = false): this {
    this.assertNotStrict();
    if (!override && this.exactAliases.has(name)) {
      throw new AliasAlreadyDefined(name);
    }
    this.exactAliases.set(name, key);
    this._provider = undefined;
    this.options.logger.debug(`Set alias '${name}' for '${getKeyName(key)}'`);
    return this;
  }

  setAliases(aliases: Readonly<Record<string, ServiceKey>>, override: boolean = false): this {
    for (const [name, key] of Object.entries(aliases)) {
      this.setAlias(name, key, override);
    }
    return this;
  }

  // ==========================================================================
  // Build
  // ==========================================================================

  /**
   * Compile every registration into a provider.
   *
   * @throws {CannotResolveParameterException} A dependency has no registration
   * @throws {CircularDependencyException} A type depends on itself
   * @throws {UnsupportedUnionTypeException} A dependency is declared as a union
   * @throws {AmbiguousReferenceNameException} A name matches several keys
   * @throws {AliasConfigurationError} An alias targets an unregistered key
   */
  build(): Services {
    const context = new ResolutionContext();
    try {
      const map = new Map<ServiceKey, IProducer>();
      for (const [key, resolver] of this.registrations) {
        let producer = context.resolved.get(key);
        if (producer === undefined) {
          if (resolver instanceof DynamicResolver) {
            context.chain.length = 0;
          }
          producer = resolver.compile(context, key);
          context.resolved.set(key, producer);
        }
        map.set(key, producer);
        const name = getKeyName(key);
        if (isAliasableName(name)) {
          map.set(name, producer);
        }
      }

      if (!this.strict) {
        this.addInferredAliasEntries(map, context);
        for (const [name, key] of this.exactAliases) {
          map.set(name, this.getAliasTarget(name, key, context));
        }
      }

      this.options.logger.debug(
        `Built provider with ${this.registrations.size} registration(s) and ${map.size} entries`,
      );
      return new Services(map, this.descriptors, this.options.logger);
    } finally {
      context.dispose();
    }
  }

  buildProvider(): Services {
    return this.build();
  }

  // ==========================================================================
  // Helpers
  // ==========================================================================

  private addType(base: ServiceKey<object>, concrete: Constructor<object> | undefined, lifetime: ServiceLifetime): this {
    const type = concrete ?? base;
    if (!isConstructor(type)) {
      throw new TypeError(
        `A concrete class is required to register '${getKeyName(base)}' as ${getLifetimeName(lifetime)}.`,
      );
    }
    return this.bind(base, new DynamicResolver(type, this, lifetime));
  }

  private addInferredAlias(name: string, key: ServiceKey): void {
    const keys = this.inferredAliases.get(name);
    if (keys === undefined) {
      this.inferredAliases.set(name, new Set([key]));
    } else {
      keys.add(key);
    }
  }

  private addInferredAliasEntries(map: Map<ServiceKey, IProducer>, context: ResolutionContext): void {
    for (const [name, keys] of this.inferredAliases) {
      if (this.registrations.has(name)) {
        continue;
      }
      const candidates = [...keys];
      if (candidates.length > 1) {
        switch (this.options.aliasAmbiguity) {
          case 'defer':
            continue;
          case 'eager':
            throw new AmbiguousReferenceNameException(name, candidates);
          case 'first':
            break;
        }
      }
      map.set(name, this.getAliasTarget(name, candidates[0], context));
    }
  }

  private getAliasTarget(name: string, key: ServiceKey, context: ResolutionContext): IProducer {
    const producer = context.resolved.get(key);
    if (producer === undefined) {
      throw new AliasConfigurationError(name, key);
    }
    return producer;
  }

  private assertNotStrict(): void {
    if (this.strict) {
      throw new InvalidOperationInStrictMode();
    }
  }
}
