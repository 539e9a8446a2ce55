/**
 * @module inject-graph/domain/descriptors
 */

export { UnionType, union, isUnionType } from './IDescriptorProvider';
export type {
  Callable,
  DeclaredType,
  ParameterDescriptor,
  IDescriptorProvider,
} from './IDescriptorProvider';
