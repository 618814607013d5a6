// =============================================================================
// BASTION — Schema Migration
//
// Applies db/schema.sql. Idempotent: every statement is IF NOT EXISTS or
// CREATE OR REPLACE. Run from the repository root: npm run db:migrate
// =============================================================================

import { readFileSync } from 'fs';
import path from 'path';
import { loadConfig } from '../config';
import { createPool } from './pool';

export const SCHEMA_PATH = path.resolve(process.cwd(), 'db', 'schema.sql');

async function migrate(): Promise<void> {
  const config = loadConfig();
  const pool = createPool(config.db);
  const sql = readFileSync(SCHEMA_PATH, 'utf8');

  try {
    await pool.query(sql);
    console.log(`[DB] Schema applied from ${SCHEMA_PATH}`);
  } finally {
    await pool.end();
  }
}

migrate().catch((err: unknown) => {
  console.error('[DB] Migration failed:', err);
  process.exit(1);
});
