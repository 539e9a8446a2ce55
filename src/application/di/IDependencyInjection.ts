/**
 * @fileoverview Dependency Injection Container Interfaces
 *
 * @packageDocumentation
 * @module inject-graph/application/di
 *
 * ## Hexagonal Architecture Layer: APPLICATION
 *
 * This file belongs to the **Application Layer**. It states what the container
 * offers to the code that configures it and to the code that consumes it; the
 * implementations live in `infrastructure/di`.
 *
 * Application layer:
 * - ✅ **CAN**: Define registration, resolution and scope contracts
 * - ✅ **CAN**: Depend on domain keys, lifetimes and descriptors
 * - ❌ **CANNOT**: Read metadata or parse source text
 * - ❌ **CANNOT**: Cache instances
 *
 * ## Two Phases
 *
 * ```
 * ┌─────────────────────────┐   build()   ┌──────────────────────────┐
 * │ IContainer (mutable)    │ ──────────▶ │ IServiceProvider (fixed) │
 * │  add, register, aliases │             │  get/set/exec/createScope│
 * └─────────────────────────┘             └──────────────────────────┘
 * ```
 *
 * 1. **Configure**: register keys with a lifetime, plus optional aliases.
 * 2. **Build**: every registration is compiled once into a producer. Graph
 *    errors (missing dependency, cycle, ambiguity) surface here.
 * 3. **Activate**: the provider looks the key up and runs its producer. No
 *    reflection happens after build.
 *
 * ## Resolution by Type and by Name
 *
 * A dependency with a declared type is resolved by that type. A dependency
 * without one (plain JavaScript, or a parameter typed as an interface, which
 * TypeScript emits as `Object`) falls back to its name, unless the container
 * is strict:
 *
 * ```typescript
 * class SqlCatsRepository {
 *   constructor(connectionString) {}   // no type: resolved by name
 * }
 *
 * container
 *   .addInstance('foodb://local', 'connection_string')
 *   .addTransient(CatsRepository, SqlCatsRepository)
 *   .addAlias('connectionString', 'connection_string');
 * ```
 *
 * @version 1.0.0
 */

import type { Constructor, ServiceKey } from '../../domain/keys';
import type { Callable } from '../../domain/descriptors';
import type { ServiceLifetime } from '../../domain/lifetime';

// ============================================================================
// Activation scope
// ============================================================================

/**
 * Values seeded into an activation scope before anything is activated.
 *
 * @remarks
 * A record keys its values by name; a map may use any key. Seeded values win
 * over registrations for the duration of the scope.
 */
export type ScopedServices = ReadonlyMap<ServiceKey, unknown> | Readonly<Record<string, unknown>>;

/**
 * One activation session.
 *
 * @remarks
 * **Scope Ownership:**
 *
 * The scope owns the cache of scoped instances and nothing else. Singletons
 * stay with the provider; transients are never cached. Disposing a scope
 * drops its cache and unbinds it from the provider; using it afterwards
 * throws `ActivationScopeDisposedException`. Disposal is idempotent.
 *
 * @example
 * ```typescript
 * const scope = provider.createScope();
 * try {
 *   const a = scope.get(UnitOfWork);
 *   const b = scope.get(UnitOfWork);
 *   // a === b
 * } finally {
 *   scope.dispose();
 * }
 * ```
 */
export interface IActivationScope {
  /**
   * Scoped instances activated so far, plus seeded values.
   */
  readonly scopedServices: Map<ServiceKey, unknown>;

  /**
   * Activate a service within this scope.
   */
  get<T>(key: ServiceKey<T>): T;
  get<T, D>(key: ServiceKey<T>, defaultValue: D): T | D;

  /**
   * Drop the scoped cache and unbind from the provider.
   */
  dispose(): void;

  isDisposed(): boolean;
}

// ============================================================================
// Producers and factories
// ============================================================================

/**
 * A compiled activation routine.
 *
 * @remarks
 * Producers are created by `IContainer.build()` and never change afterwards.
 * `activatingType` is the key being activated when the producer runs, so a
 * factory may vary its result per consumer.
 */
export interface IProducer {
  produce(scope: IActivationScope, activatingType: ServiceKey): unknown;
}

/**
 * A factory registered for a key.
 *
 * @remarks
 * The arity chosen at registration decides the arguments the factory
 * receives. A function taking more than two parameters is rejected with
 * `InvalidFactory`.
 *
 * @example
 * ```typescript
 * container.addSingletonByFactory(() => new Settings(), Settings);
 * container.addScopedByFactory((scope) => new UnitOfWork(scope.get(Db)), UnitOfWork);
 * container.addTransientByFactory(
 *   (scope, activatingType) => new Logger(getKeyName(activatingType)),
 *   Logger,
 * );
 * ```
 */
export type ServiceFactory<T = unknown> =
  | (() => T)
  | ((scope: IActivationScope) => T)
  | ((scope: IActivationScope, activatingType: ServiceKey) => T);

/**
 * A callable bound to a provider, see `IServiceProvider.getExecutor()`.
 */
export type Executor<R> = (scoped?: ScopedServices) => R;

// ============================================================================
// Provider
// ============================================================================

/**
 * The built, read-only service provider.
 *
 * @remarks
 * **Lookup Order:**
 *
 * 1. A value in the activation scope's cache (seeded or already activated)
 * 2. The compiled producer for the key
 * 3. The default value, when one was passed
 * 4. `CannotResolveTypeException`
 *
 * Without an explicit scope, a one-shot scope is used, so scoped services
 * behave like transients.
 */
export interface IServiceProvider {
  /**
   * Activate the service registered for `key`.
   *
   * @throws {CannotResolveTypeException} When the key is unknown and no
   * default was passed
   */
  get<T>(key: ServiceKey<T>, scope?: IActivationScope): T;
  get<T, D>(key: ServiceKey<T>, scope: IActivationScope | undefined, defaultValue: D): T | D;

  /**
   * Add a ready-made value to the built provider.
   *
   * @throws {OverridingServiceException} When the key, or its canonical name,
   * is already present
   */
  set<T>(key: ServiceKey<T>, value: T): void;

  has(key: ServiceKey): boolean;

  /**
   * Every key the provider can activate, aliases and canonical names included.
   */
  keys(): ServiceKey[];

  createScope(scoped?: ScopedServices): IActivationScope;

  /**
   * Bind a function to this provider.
   *
   * @remarks
   * Parameters are described once, when the executor is created. Each call of
   * the executor opens a fresh scope seeded with `scoped`, resolves every
   * parameter (by declared type, else by name) and calls the function. The
   * scope is disposed when the function returns, throws, or, for a promise
   * result, when the promise settles.
   *
   * @example
   * ```typescript
   * async function handle(repository: CatsRepository, requestId: string) {
   *   return repository.getById(requestId);
   * }
   *
   * const execute = provider.getExecutor(handle);
   * const cat = await execute({ requestId: 'cat-1' });
   * ```
   */
  getExecutor<R>(fn: Callable<R>): Executor<R>;

  /**
   * Call a function once with resolved arguments.
   */
  exec<R>(fn: Callable<R>, scoped?: ScopedServices): R;
}

// ============================================================================
// Container
// ============================================================================

/**
 * How build-time inference treats a name shared by several keys.
 *
 * - `defer`: leave the name out of the provider; a dependency looked up by
 *   that name fails when its consumer is compiled
 * - `first`: map the name to the first key registered under it
 * - `eager`: fail the build with `AmbiguousReferenceNameException`
 */
export type AliasAmbiguityPolicy = 'defer' | 'first' | 'eager';

/**
 * The mutable registry.
 *
 * @remarks
 * **Registration Rules:**
 *
 * - A key is registered at most once (`OverridingServiceException`).
 * - Every registration invalidates the cached provider.
 * - Alias operations are rejected on a strict container
 *   (`InvalidOperationInStrictMode`).
 *
 * @example
 * ```typescript
 * const container = new Container();
 *
 * container
 *   .addInstance(new Settings('test-secret'))
 *   .addSingleton(Clock)
 *   .addScoped(UnitOfWork)
 *   .addTransient(CatsRepository, SqlCatsRepository);
 *
 * const provider = container.build();
 * const repository = provider.get(CatsRepository);
 * ```
 */
export interface IContainer {
  readonly strict: boolean;

  /**
   * The built provider, cached until the next registration.
   */
  readonly provider: IServiceProvider;

  addInstance<T>(instance: T, declaredKey?: ServiceKey<T>): this;

  addTransient<T extends object>(type: Constructor<T>): this;
  addTransient<T extends object>(base: ServiceKey<T>, concrete: Constructor<T>): this;

  addScoped<T extends object>(type: Constructor<T>): this;
  addScoped<T extends object>(base: ServiceKey<T>, concrete: Constructor<T>): this;

  addSingleton<T extends object>(type: Constructor<T>): this;
  addSingleton<T extends object>(base: ServiceKey<T>, concrete: Constructor<T>): this;

  addTransientByFactory<T>(factory: ServiceFactory<T>, returnType?: ServiceKey<T>): this;
  addScopedByFactory<T>(factory: ServiceFactory<T>, returnType?: ServiceKey<T>): this;
  addSingletonByFactory<T>(factory: ServiceFactory<T>, returnType?: ServiceKey<T>): this;

  /**
   * Register `concrete` under `base` with an explicit lifetime.
   */
  bindTypes<T extends object>(
    base: ServiceKey<T>,
    concrete: Constructor<T>,
    lifetime?: ServiceLifetime,
  ): this;

  /**
   * Register a type, an instance, or a type under another key.
   *
   * @remarks
   * With an instance, the instance is registered under `key`. Otherwise
   * `concrete` (or `key` itself, when it is a class) is registered with the
   * lifetime given to `@Injectable`, transient when there is none.
   */
  register<T>(key: ServiceKey<T>, concrete?: Constructor<T & object>, instance?: T): this;

  /**
   * Build the provider and activate `key`.
   */
  resolve<T>(key: ServiceKey<T>, scope?: IActivationScope): T;

  has(key: ServiceKey): boolean;

  addAlias(name: string, key: ServiceKey): this;
  addAliases(aliases: Readonly<Record<string, ServiceKey>>): this;
  setAlias(name: string, key: ServiceKey, override?: boolean): this;
  setAliases(aliases: Readonly<Record<string, ServiceKey>>, override?: boolean): this;

  build(): IServiceProvider;
}

