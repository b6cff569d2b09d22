/**
 * Upload session domain
 * @module domains/upload-session
 */

export type { IUploadSessionStore } from './IUploadSessionStore';
export { InMemoryUploadSessionStore } from './InMemoryUploadSessionStore';
export { RedisUploadSessionStore, type RedisUploadSessionStoreDependencies } from './RedisUploadSessionStore';
export {
  MediaGroupAggregator,
  type MediaGroupAggregatorDependencies,
  type SubmittedItem,
  type IUploadNotifier,
  type SubmitOutcome,
} from './MediaGroupAggregator';
