import Database, { type Database as DatabaseType } from 'better-sqlite3';
import path from 'path';
import fs from 'fs';

export function openDatabase(dbPath: string): DatabaseType {
  if (dbPath !== ':memory:') {
    // Ensure data directory exists
    const dataDir = path.dirname(dbPath);
    if (!fs.existsSync(dataDir)) {
      fs.mkdirSync(dataDir, { recursive: true });
    }
  }

  const db = new Database(dbPath);

  // Enable WAL mode for better concurrent access
  db.pragma('journal_mode = WAL');

  initializeDatabase(db);
  return db;
}

export function initializeDatabase(db: DatabaseType): void {
  db.exec(`
    -- Token gate configuration per group
    CREATE TABLE IF NOT EXISTS group_configs (
      group_id INTEGER PRIMARY KEY,     -- Telegram chat ID
      chain_id TEXT NOT NULL,
      token_address TEXT NOT NULL,      -- CashToken category ID (hex)
      min_balance TEXT NOT NULL,        -- decimal string
      verifier_address TEXT NOT NULL,
      updated_at INTEGER NOT NULL
    );

    -- Deep-link tokens that resolve to a group
    CREATE TABLE IF NOT EXISTS verification_links (
      token TEXT PRIMARY KEY,
      group_id INTEGER NOT NULL,
      created_at INTEGER NOT NULL
    );

    -- Verified users per group
    CREATE TABLE IF NOT EXISTS user_records (
      group_id INTEGER NOT NULL,
      user_id INTEGER NOT NULL,
      address TEXT NOT NULL,
      verified INTEGER NOT NULL DEFAULT 0,
      last_verified_at INTEGER NOT NULL,
      PRIMARY KEY (group_id, user_id)
    );

    CREATE TABLE IF NOT EXISTS whitelist (
      group_id INTEGER PRIMARY KEY,
      whitelisted INTEGER NOT NULL DEFAULT 0
    );

    CREATE TABLE IF NOT EXISTS pending_whitelist (
      group_id INTEGER PRIMARY KEY,
      group_name TEXT NOT NULL,
      requesting_admin_id INTEGER NOT NULL,
      requesting_admin_name TEXT NOT NULL,
      requested_at INTEGER NOT NULL
    );

    CREATE TABLE IF NOT EXISTS rejected_groups (
      group_id INTEGER PRIMARY KEY,
      rejection_count INTEGER NOT NULL DEFAULT 0,
      group_name TEXT NOT NULL,
      last_admin_id INTEGER NOT NULL,
      last_admin_name TEXT NOT NULL,
      first_rejected_at INTEGER NOT NULL,
      last_rejected_at INTEGER NOT NULL,
      blocked INTEGER NOT NULL DEFAULT 0
    );

    -- Token metadata cache (BCMR)
    CREATE TABLE IF NOT EXISTS token_metadata (
      category TEXT PRIMARY KEY,
      name TEXT,
      symbol TEXT,
      decimals INTEGER,
      fetched_at INTEGER NOT NULL
    );

    CREATE INDEX IF NOT EXISTS idx_links_group ON verification_links(group_id);
    CREATE INDEX IF NOT EXISTS idx_user_records_address ON user_records(group_id, address);
  `);

  // Migration: Add verification_tx_confirmed column if it doesn't exist
  const columns = db.prepare<[], { name: string }>('PRAGMA table_info(user_records)').all();
  if (!columns.some(col => col.name === 'verification_tx_confirmed')) {
    db.exec('ALTER TABLE user_records ADD COLUMN verification_tx_confirmed INTEGER NOT NULL DEFAULT 0');
    console.log('Added verification_tx_confirmed column to user_records table');
  }

  console.log('Database initialized');
}
