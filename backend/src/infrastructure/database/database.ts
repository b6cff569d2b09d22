/**
 * Database Configuration
 *
 * SQL Server connection pool management for the share index.
 * Uses mssql library for SQL Server connectivity.
 *
 * @module infrastructure/database/database
 */

import sql, { ConnectionPool, config as SqlConfig, ISqlType } from 'mssql';
import { env, isProd } from '@/infrastructure/config/environment';
import { createChildLogger } from '@/shared/utils/logger';

const logger = createChildLogger({ service: 'Database' });

/**
 * Transient error codes that should trigger a retry
 *
 * 40613: Database unavailable
 * 40197: Error processing request
 * 40501: Service busy
 * 10053: Transport-level error (software caused connection abort)
 * 10054: Transport-level error (connection reset by peer)
 * 10060: Network error
 * 40540: Service busy
 * 40143: Service busy
 * -1: Connection error (generic)
 */
const TRANSIENT_ERROR_CODES = [40613, 40197, 40501, 10053, 10054, 10060, 40540, 40143, -1];

let pool: ConnectionPool | null = null;

/**
 * SQL parameter type mapping
 *
 * Explicit bindings for the share columns so mssql does not infer
 * BIGINT owner ids as INT.
 */
const PARAMETER_TYPE_MAP: Record<string, ISqlType | (() => ISqlType)> = {
  share_token: sql.NVarChar(32),
  item_refs: sql.NVarChar(sql.MAX),
  owner_id: sql.BigInt,
  caption: sql.NVarChar(255),
  kind: sql.NVarChar(50),
  created_at: sql.DateTime2,
  offset: sql.Int,
  limit: sql.Int,
};

/**
 * Infer SQL type from parameter name and value
 */
export function inferSqlType(key: string, value: unknown): ISqlType | (() => ISqlType) {
  const mapped = PARAMETER_TYPE_MAP[key];
  if (mapped) {
    return mapped;
  }

  if (key.endsWith('_at')) {
    return sql.DateTime2;
  }

  if (typeof value === 'boolean') {
    return sql.Bit;
  }

  if (typeof value === 'number') {
    if (!Number.isInteger(value)) {
      return sql.Float;
    }
    return Number.isSafeInteger(value) && Math.abs(value) > 2_147_483_647 ? sql.BigInt : sql.Int;
  }

  if (value instanceof Date) {
    return sql.DateTime2;
  }

  return sql.NVarChar(sql.MAX);
}

/**
 * Get database configuration
 *
 * @throws Error if any connection setting is missing
 */
export function getDatabaseConfig(): SqlConfig {
  if (!env.DATABASE_SERVER || !env.DATABASE_NAME || !env.DATABASE_USER || !env.DATABASE_PASSWORD) {
    throw new Error(
      'Database configuration is incomplete. Provide DATABASE_SERVER, DATABASE_NAME, DATABASE_USER, and DATABASE_PASSWORD.'
    );
  }

  return {
    server: env.DATABASE_SERVER,
    database: env.DATABASE_NAME,
    user: env.DATABASE_USER,
    password: env.DATABASE_PASSWORD,
    options: {
      encrypt: true,
      trustServerCertificate: !isProd,
      enableArithAbort: true,
    },
    pool: {
      max: env.DATABASE_POOL_MAX,
      min: 1,
      idleTimeoutMillis: 300000,
      acquireTimeoutMillis: 10000,
    },
    connectionTimeout: 30000,
    requestTimeout: 30000,
  };
}

function describeConnectionError(err: Error): string | undefined {
  if (err.message.includes('ETIMEDOUT')) {
    return 'Connection timeout. Check network connectivity and firewall rules.';
  }
  if (err.message.includes('ECONNREFUSED')) {
    return 'Connection refused. Check that the SQL server is running and reachable.';
  }
  if (err.message.includes('ELOGIN') || err.message.includes('Login failed')) {
    return 'Authentication failed. Check DATABASE_USER and DATABASE_PASSWORD.';
  }
  if (err.message.includes('ENOTFOUND')) {
    return 'Server not found. Check DATABASE_SERVER hostname.';
  }
  return undefined;
}

async function verifyConnection(pool: ConnectionPool): Promise<boolean> {
  try {
    const result = await pool.request().query<{ health: number }>('SELECT 1 AS health');
    return result.recordset[0]?.health === 1;
  } catch (error) {
    logger.error({ err: error }, 'Database verification failed');
    return false;
  }
}

/**
 * Connect to database with linear backoff retry logic
 */
async function connectWithRetry(config: SqlConfig, maxRetries: number = 10): Promise<ConnectionPool> {
  let lastError: Error | null = null;

  for (let attempt = 1; attempt <= maxRetries; attempt++) {
    try {
      logger.info({ attempt, maxRetries }, 'Connecting to SQL Server');

      const newPool = await new ConnectionPool(config).connect();

      if (!(await verifyConnection(newPool))) {
        await newPool.close();
        throw new Error('Connection established but verification failed');
      }

      return newPool;
    } catch (error) {
      lastError = error instanceof Error ? error : new Error(String(error));
      logger.error({ err: lastError, hint: describeConnectionError(lastError) }, 'Database connection failed');

      if (attempt < maxRetries) {
        const delay = Math.min(attempt * 100, 3200);
        await new Promise((resolve) => setTimeout(resolve, delay));
      }
    }
  }

  throw lastError ?? new Error('Database connection failed after all retries');
}

/**
 * Initialize database connection pool
 */
export async function initDatabase(): Promise<ConnectionPool> {
  if (pool?.connected) {
    return pool;
  }

  const connected = await connectWithRetry(getDatabaseConfig(), 10);
  pool = connected;
  logger.info('Connected to SQL Server');

  connected.on('error', (err: Error) => {
    logger.error({ err, hint: describeConnectionError(err) }, 'Database pool error, reconnecting in 5s');
    pool = null;
    setTimeout(() => {
      initDatabase().catch((reconnectError: unknown) => {
        logger.error({ err: reconnectError }, 'Automatic database reconnection failed');
      });
    }, 5000);
  });

  return connected;
}

/**
 * Get the database connection pool
 *
 * @returns Connection pool or null if not initialized
 */
export function getDatabase(): ConnectionPool | null {
  return pool;
}

/**
 * SQL Parameter Value Types
 */
export type SqlValue = string | number | boolean | Date | null | undefined;

/**
 * Typed SQL Parameters
 */
export type SqlParams = Record<string, SqlValue>;

function isTransientError(error: unknown): boolean {
  if (typeof error !== 'object' || error === null) {
    return false;
  }
  const number = 'number' in error && typeof error.number === 'number' ? error.number : undefined;
  const code = 'code' in error && typeof error.code === 'number' ? error.code : undefined;
  const message = error instanceof Error ? error.message : '';

  return (
    (number !== undefined && TRANSIENT_ERROR_CODES.includes(number)) ||
    (code !== undefined && TRANSIENT_ERROR_CODES.includes(code)) ||
    message.includes('ETIMEDOUT') ||
    message.includes('ECONNRESET') ||
    message.includes('socket hang up')
  );
}

/**
 * Execute an operation with retry logic for transient errors
 */
async function executeWithRetry<T>(
  operation: () => Promise<T>,
  context: string,
  maxRetries: number = 3
): Promise<T> {
  for (let attempt = 1; ; attempt++) {
    try {
      return await operation();
    } catch (error) {
      if (!isTransientError(error) || attempt > maxRetries) {
        throw error;
      }
      const delay = Math.min(attempt * 200, 2000);
      logger.warn({ err: error, context, attempt, delayMs: delay }, 'Transient database error, retrying');
      await new Promise((resolve) => setTimeout(resolve, delay));
    }
  }
}

/**
 * Execute a query with type-safe parameters
 *
 * @example
 * ```typescript
 * const result = await executeQuery<ShareRow>(
 *   'SELECT * FROM shares WHERE share_token = @share_token',
 *   { share_token: 'aB3_-x9QzK1' }
 * );
 * ```
 */
export async function executeQuery<T = unknown>(
  query: string,
  params?: SqlParams
): Promise<sql.IResult<T>> {
  const db = getDatabase();

  if (!db || !db.connected) {
    throw new Error('Database not connected. Call initDatabase() first.');
  }

  const request = db.request();

  if (params) {
    for (const [key, value] of Object.entries(params)) {
      request.input(key, inferSqlType(key, value), value);
    }
  }

  try {
    return await executeWithRetry(() => request.query<T>(query), 'executeQuery');
  } catch (error) {
    logger.error({ err: error }, 'Query execution failed');
    throw error;
  }
}

/**
 * Create the share table and its owner index when absent
 */
export const SHARES_SCHEMA_SQL = `
IF OBJECT_ID(N'dbo.shares', N'U') IS NULL
BEGIN
  CREATE TABLE dbo.shares (
    share_token NVARCHAR(32) NOT NULL PRIMARY KEY,
    item_refs NVARCHAR(MAX) NOT NULL,
    owner_id BIGINT NOT NULL,
    caption NVARCHAR(255) NOT NULL,
    kind NVARCHAR(50) NOT NULL,
    created_at DATETIME2 NOT NULL DEFAULT SYSUTCDATETIME()
  );
  CREATE INDEX IX_shares_owner_id ON dbo.shares (owner_id, created_at DESC);
END
`;

export async function ensureSchema(): Promise<void> {
  await executeQuery(SHARES_SCHEMA_SQL);
  logger.info('Share schema ready');
}

/**
 * Close the database connection pool
 */
export async function closeDatabase(): Promise<void> {
  if (pool) {
    const closing = pool;
    pool = null;
    await closing.close();
    logger.info('Database connection closed');
  }
}

/**
 * Check if database is connected and healthy
 */
export async function checkDatabaseHealth(): Promise<boolean> {
  try {
    const db = getDatabase();
    if (!db || !db.connected) {
      return false;
    }
    await executeQuery('SELECT 1 AS health');
    return true;
  } catch (error) {
    logger.error({ err: error }, 'Database health check failed');
    return false;
  }
}

export { sql };
