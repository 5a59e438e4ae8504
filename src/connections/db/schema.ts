import type { Connection } from './connection';

export const createProductsTable = (db: Connection): void => {
  db.exec(`
    CREATE TABLE IF NOT EXISTS products (
      id          INTEGER PRIMARY KEY AUTOINCREMENT,
      sku         TEXT UNIQUE NOT NULL,
      name        TEXT NOT NULL,
      category    TEXT NOT NULL,
      price       REAL NOT NULL,
      cost        REAL DEFAULT 0,
      inventory   INTEGER DEFAULT 0,
      unit        TEXT DEFAULT 'ea',
      description TEXT DEFAULT '',
      active      INTEGER DEFAULT 1,
      created_at  TEXT NOT NULL,
      updated_at  TEXT NOT NULL
    )
  `);

  db.exec('CREATE INDEX IF NOT EXISTS idx_products_sku ON products(sku)');
  db.exec('CREATE INDEX IF NOT EXISTS idx_products_category ON products(category)');
};
