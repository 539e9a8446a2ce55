/**
 * @module inject-graph/infrastructure/di/producers
 */

export {
  TypeProducer,
  ArgsTypeProducer,
  ScopedTypeProducer,
  ScopedArgsTypeProducer,
  SingletonTypeProducer,
} from './TypeProducers';
export {
  FactoryTypeProducer,
  ScopedFactoryTypeProducer,
  SingletonFactoryTypeProducer,
} from './FactoryProducers';
export { InstanceProducer } from './InstanceProducer';
export { classifyFactory, toFactoryCall } from './factoryCall';
export type { FactoryCall, FactoryConvention } from './factoryCall';
