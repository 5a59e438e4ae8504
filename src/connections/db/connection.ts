import Database from 'better-sqlite3';
import fs from 'fs';
import path from 'path';
import { logger } from '../../utils/logging';

export type Connection = Database.Database;

export interface CatalogConfig {
  /** Path of the SQLite file holding the catalog. */
  dbPath: string;
}

export const ensureDatabaseDir = (dbPath: string): void => {
  const dir = path.dirname(dbPath);
  if (!fs.existsSync(dir)) {
    fs.mkdirSync(dir, { recursive: true });
    logger.info('Created catalog directory', { dir });
  }
};

/**
 * Open the catalog file, run `work`, and close the connection whatever happens.
 */
export const withConnection = <T>(config: CatalogConfig, work: (db: Connection) => T): T => {
  const db = new Database(config.dbPath);
  try {
    return work(db);
  } finally {
    db.close();
  }
};

export const pingDatabase = (config: CatalogConfig): boolean =>
  withConnection(config, db => {
    const row = db.prepare<[], { ok: number }>('SELECT 1 AS ok').get();
    return row?.ok === 1;
  });
