/**
 * Database helper tests
 *
 * No pool is connected in unit tests.
 */

import { describe, it, expect } from 'vitest';
import {
  SHARES_SCHEMA_SQL,
  checkDatabaseHealth,
  executeQuery,
  getDatabaseConfig,
  inferSqlType,
  sql,
} from '@/infrastructure/database/database';

describe('inferSqlType', () => {
  it('uses the declared type of known share columns', () => {
    expect(inferSqlType('owner_id', 1001)).toBe(sql.BigInt);
    expect(inferSqlType('created_at', new Date())).toBe(sql.DateTime2);
    expect(inferSqlType('offset', 0)).toBe(sql.Int);
    expect(inferSqlType('share_token', 'tok_AAAAAAA')).toEqual(sql.NVarChar(32));
  });

  it('infers the type of other parameters from the value', () => {
    expect(inferSqlType('updated_at', '2026-01-01')).toBe(sql.DateTime2);
    expect(inferSqlType('flag', true)).toBe(sql.Bit);
    expect(inferSqlType('ratio', 0.5)).toBe(sql.Float);
    expect(inferSqlType('count', 5)).toBe(sql.Int);
    expect(inferSqlType('big', 3_000_000_000)).toBe(sql.BigInt);
    expect(inferSqlType('when', new Date())).toBe(sql.DateTime2);
    expect(inferSqlType('note', 'text')).toEqual(sql.NVarChar(sql.MAX));
  });
});

describe('connection state', () => {
  it('requires every connection setting', () => {
    expect(() => getDatabaseConfig()).toThrow('Database configuration is incomplete');
  });

  it('refuses queries before the pool is connected', async () => {
    await expect(executeQuery('SELECT 1')).rejects.toThrow('Database not connected. Call initDatabase() first.');
  });

  it('reports unhealthy without a pool', async () => {
    expect(await checkDatabaseHealth()).toBe(false);
  });
});

describe('SHARES_SCHEMA_SQL', () => {
  it('creates the table only when absent and indexes owner listings', () => {
    expect(SHARES_SCHEMA_SQL).toContain("IF OBJECT_ID(N'dbo.shares', N'U') IS NULL");
    expect(SHARES_SCHEMA_SQL).toContain('CREATE INDEX IX_shares_owner_id ON dbo.shares (owner_id, created_at DESC)');
  });
});
