/**
 * @fileoverview inject-graph - Dependency Injection Container
 * @description
 * A container that compiles a graph of registrations into producers once,
 * then activates services by key, with transient, scoped and singleton
 * lifetimes, constructor and field injection, factories, and name-based
 * resolution for code without type metadata.
 *
 * ## Architecture Layers
 *
 * - **domain**: keys, lifetimes, descriptors, exceptions
 * - **application**: container, provider and scope contracts
 * - **infrastructure**: container implementation, reflection, logging
 *
 * @example
 * ```typescript
 * import 'reflect-metadata';
 * import { Container, Injectable } from 'inject-graph';
 *
 * @Injectable()
 * class Clock {
 *   now(): Date { return new Date(); }
 * }
 *
 * @Injectable()
 * class Greeter {
 *   constructor(private readonly clock: Clock) {}
 * }
 *
 * const provider = new Container().addSingleton(Clock).addTransient(Greeter).build();
 * const greeter = provider.get(Greeter);
 * ```
 *
 * @packageDocumentation
 * @module inject-graph
 * @version 1.0.0
 */

// ============================================================================
// DOMAIN LAYER EXPORTS
// ============================================================================

export * from './domain';

// ============================================================================
// APPLICATION LAYER EXPORTS
// ============================================================================

export * from './application';

// ============================================================================
// INFRASTRUCTURE LAYER EXPORTS
// ============================================================================

export * from './infrastructure';
