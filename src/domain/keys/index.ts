/**
 * @module inject-graph/domain/keys
 */

export { getKeyName, isConstructor } from './ServiceKey';
export type { Constructor, AbstractConstructor, ServiceKey } from './ServiceKey';
export { toStandardParamName, getNameVariants, isAliasableName } from './naming';
