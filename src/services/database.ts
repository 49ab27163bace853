import BetterSqlite3 from 'better-sqlite3';
import * as fs from 'fs';
import * as path from 'path';

export interface Database {
  raw: BetterSqlite3.Database;
  close(): void;
}

const SCHEMA = `
  CREATE TABLE IF NOT EXISTS subscriptions (
    id TEXT PRIMARY KEY,
    account TEXT NOT NULL,
    resource_type TEXT NOT NULL,
    resource_path TEXT NOT NULL,
    change_type TEXT NOT NULL,
    notification_url TEXT NOT NULL,
    client_state TEXT NOT NULL,
    status TEXT NOT NULL,
    expires_at TEXT NOT NULL,
    renewed_at TEXT NOT NULL,
    next_check_at TEXT NOT NULL,
    last_error TEXT,
    created_at TEXT NOT NULL,
    updated_at TEXT NOT NULL
  );

  CREATE TABLE IF NOT EXISTS target_holds (
    resource_type TEXT NOT NULL,
    account TEXT NOT NULL,
    resource_path TEXT NOT NULL,
    reason TEXT NOT NULL,
    created_at TEXT NOT NULL,
    PRIMARY KEY (resource_type, account, resource_path)
  );

  CREATE UNIQUE INDEX IF NOT EXISTS idx_subscriptions_one_active
    ON subscriptions(resource_type, account, resource_path)
    WHERE status = 'Active';
  CREATE INDEX IF NOT EXISTS idx_subscriptions_target
    ON subscriptions(resource_type, account, resource_path);
  CREATE INDEX IF NOT EXISTS idx_subscriptions_due
    ON subscriptions(status, next_check_at);
`;

/**
 * Open (or create) the relay database. Pass ':memory:' for a throwaway store.
 */
export function createDatabase(dbPath: string): Database {
  if (dbPath !== ':memory:') {
    const dir = path.dirname(dbPath);
    if (!fs.existsSync(dir)) {
      fs.mkdirSync(dir, { recursive: true });
    }
  }

  const db = new BetterSqlite3(dbPath);
  db.pragma('journal_mode = WAL');
  db.exec(SCHEMA);

  return {
    raw: db,

    close(): void {
      if (db.open) {
        db.close();
      }
    }
  };
}
