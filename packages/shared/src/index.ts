/**
 * @relayshare/shared
 *
 * Shared definitions for the share relay: types, constants, zod schemas
 * and the pure paging utilities.
 *
 * @module @relayshare/shared
 *
 * @example
 * ```typescript
 * import type { ShareRecord } from '@relayshare/shared';
 * import { paginate, RELAY_CONFIG } from '@relayshare/shared';
 * ```
 */

export * from './types';
export * from './constants';
export * from './schemas';
export * from './utils';
