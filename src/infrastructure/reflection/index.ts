/**
 * @module inject-graph/infrastructure/reflection
 */

export { MetadataDescriptorProvider, defaultDescriptorProvider } from './MetadataDescriptorProvider';
export {
  Injectable,
  Inject,
  getInjectableOptions,
  getInjectedFields,
  getParameterOverrides,
  INJECTABLE_KEY,
  INJECT_PARAMETERS_KEY,
  INJECT_FIELDS_KEY,
} from './decorators';
export type { InjectableOptions, InjectedField } from './decorators';
export { parseParameterList, parseConstructorParameters, parseCallableParameters } from './signature';
