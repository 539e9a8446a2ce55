/**
 * @module inject-graph/domain/lifetime
 */

export { ServiceLifetime, getLifetimeName } from './ServiceLifetime';
