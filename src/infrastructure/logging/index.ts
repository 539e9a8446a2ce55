/**
 * @module inject-graph/infrastructure/logging
 */

export { consoleLogger, noopLogger } from './logger';
export type { ILogger } from './logger';
