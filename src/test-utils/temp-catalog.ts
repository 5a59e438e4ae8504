import fs from 'fs';
import os from 'os';
import path from 'path';
import { withConnection } from '../connections';
import { ProductCatalog } from '../modules/products/product-catalog';

export interface TempCatalog {
  catalog: ProductCatalog;
  dir: string;
  dbPath: string;
  deactivate: (sku: string) => void;
  cleanup: () => void;
}

export const createTempCatalog = (): TempCatalog => {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'product-catalog-'));
  const dbPath = path.join(dir, 'nested', 'catalog.db');
  const catalog = new ProductCatalog({ dbPath });
  catalog.initialize();

  return {
    catalog,
    dir,
    dbPath,
    // No store operation flips the flag, so tests write it directly
    deactivate: sku =>
      withConnection({ dbPath }, db => {
        db.prepare('UPDATE products SET active = 0 WHERE sku = ?').run(sku);
      }),
    cleanup: () => fs.rmSync(dir, { recursive: true, force: true }),
  };
};
