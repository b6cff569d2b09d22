export { RelayPipeline, isAlreadyGone, type RelayPipelineDependencies, type RetractionResult } from './RelayPipeline';
