export { EMPTY_VIEWER_STATE, type IViewerStateStore } from './IViewerStateStore';
export { InMemoryViewerStateStore } from './InMemoryViewerStateStore';
export { RedisViewerStateStore, type RedisViewerStateStoreDependencies } from './RedisViewerStateStore';
