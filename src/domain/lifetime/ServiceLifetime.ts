/**
 * @fileoverview ServiceLifetime - Instance Reuse Policy
 *
 * @packageDocumentation
 * @module inject-graph/domain/lifetime
 *
 * ## Hexagonal Architecture Layer: DOMAIN
 *
 * The lifetime chosen at registration decides which compiled producer a
 * service gets, and therefore where its instances are cached:
 *
 * | Lifetime | Created | Shared | Cache owner |
 * |----------|---------|--------|-------------|
 * | Transient | Every activation | Never | nobody |
 * | Scoped | First activation in a scope | Within one activation scope | the `ActivationScope` |
 * | Singleton | First activation | For the life of the provider | the producer itself |
 *
 * Rebuilding the provider produces new singleton producers, so singleton
 * state never survives a rebuild.
 *
 * @version 1.0.0
 */

/**
 * Enum representing the lifetime of services activated by the container.
 *
 * @example Choosing a lifetime
 * ```typescript
 * container
 *   .addSingleton(Settings)           // one per provider
 *   .addScoped(UnitOfWork)            // one per activation scope
 *   .addTransient(CreateUserHandler); // a new one every time
 * ```
 */
export enum ServiceLifetime {
  /**
   * Transient: a new instance for every activation.
   *
   * @remarks
   * Every `get()` call, and every dependent that needs the service, receives
   * its own instance.
   */
  Transient = 'transient',

  /**
   * Scoped: one instance per activation scope.
   *
   * @remarks
   * Two activations that share a scope share the instance; the instance is
   * dropped when the scope is disposed. Calls to `get()` without a scope use a
   * one-shot scope, so they always receive a new instance.
   *
   * ```typescript
   * const scope = provider.createScope();
   * try {
   *   const a = provider.get(UnitOfWork, scope);
   *   const b = provider.get(UnitOfWork, scope);
   *   // a === b
   * } finally {
   *   scope.dispose();
   * }
   * ```
   */
  Scoped = 'scoped',

  /**
   * Singleton: one instance for the life of the built provider.
   *
   * @remarks
   * The instance is created lazily, on first activation, and cached by the
   * compiled producer. Never store unit-of-work state in a singleton.
   */
  Singleton = 'singleton',
}

/**
 * Get a human-readable name for a lifetime.
 */
export function getLifetimeName(lifetime: ServiceLifetime): string {
  switch (lifetime) {
    case ServiceLifetime.Singleton:
      return 'Singleton';
    case ServiceLifetime.Scoped:
      return 'Scoped';
    case ServiceLifetime.Transient:
      return 'Transient';
    default:
      return 'Unknown';
  }
}
