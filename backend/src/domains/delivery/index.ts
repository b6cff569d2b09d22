export { DeliveryEngine, type DeliveryEngineDependencies, type DeliveryOutcome, type Viewer } from './DeliveryEngine';
