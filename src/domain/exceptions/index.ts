/**
 * @module inject-graph/domain/exceptions
 *
 * Error taxonomy of the container
 */

export {
  buildDependencyGraph,
  DIException,
  OverridingServiceException,
  CannotResolveParameterException,
  AmbiguousReferenceNameException,
  CannotResolveTypeException,
  UnsupportedUnionTypeException,
  CircularDependencyException,
  InvalidOperationInStrictMode,
  AliasAlreadyDefined,
  AliasConfigurationError,
  MissingTypeException,
  InvalidFactory,
  ActivationScopeDisposedException,
} from './exceptions';
