/**
 * Shares domain
 * @module domains/shares
 */

export type { IShareRepository } from './IShareRepository';
export { InMemoryShareRepository } from './InMemoryShareRepository';
export {
  MssqlShareRepository,
  parseItemRefs,
  parseShareRow,
  serializeItemRefs,
  type ShareDbRecord,
} from './MssqlShareRepository';
export { ShareRegistry, type ShareRegistryDependencies } from './ShareRegistry';
export { generateShareToken } from './share-token';
