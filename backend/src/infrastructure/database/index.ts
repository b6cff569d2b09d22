/**
 * Database infrastructure
 * @module infrastructure/database
 */

export {
  initDatabase,
  getDatabase,
  executeQuery,
  ensureSchema,
  closeDatabase,
  checkDatabaseHealth,
  type SqlParams,
  type SqlValue,
} from './database';
