import fs from 'fs';
import {
  createProductsTable,
  ensureDatabaseDir,
  pingDatabase,
  withConnection,
} from '../../connections';
import type { CatalogConfig } from '../../connections';
import {
  toProduct,
  type CatalogStats,
  type CreateProductInput,
  type ListProductsOptions,
  type Product,
  type ProductRow,
} from '../../connections/db/models/product.model';
import { logger } from '../../utils/logging';
import { buildCatalogCsv } from './catalog.csv';
import { DuplicateSkuError, isUniqueViolation } from './products.errors';
import { LOW_STOCK_THRESHOLD, round2 } from './product.metrics';

const DEFAULT_LIST_LIMIT = 50;

// LIKE wildcards in user input must match literally
const escapeLike = (value: string): string => value.replace(/[\\%_]/g, char => `\\${char}`);

/**
 * SKU, pricing and inventory store backed by a single SQLite file.
 * Each call opens its own connection and closes it before returning.
 */
export class ProductCatalog {
  constructor(private readonly config: CatalogConfig) {}

  get dbPath(): string {
    return this.config.dbPath;
  }

  initialize(): void {
    ensureDatabaseDir(this.config.dbPath);
    withConnection(this.config, createProductsTable);
  }

  ping(): boolean {
    return pingDatabase(this.config);
  }

  add(input: CreateProductInput): Product {
    const now = new Date().toISOString();
    const sku = input.sku.toUpperCase();
    const draft = {
      sku,
      name: input.name,
      category: input.category,
      price: input.price,
      cost: input.cost ?? 0,
      inventory: input.inventory ?? 0,
      unit: input.unit ?? 'ea',
      description: input.description ?? '',
      active: true,
      created_at: now,
      updated_at: now,
    };

    const id = withConnection(this.config, db => {
      try {
        const result = db
          .prepare(
            `INSERT INTO products
               (sku, name, category, price, cost, inventory, unit, description, active, created_at, updated_at)
             VALUES (@sku, @name, @category, @price, @cost, @inventory, @unit, @description, 1, @created_at, @updated_at)`
          )
          .run({
            sku: draft.sku,
            name: draft.name,
            category: draft.category,
            price: draft.price,
            cost: draft.cost,
            inventory: draft.inventory,
            unit: draft.unit,
            description: draft.description,
            created_at: draft.created_at,
            updated_at: draft.updated_at,
          });
        return Number(result.lastInsertRowid);
      } catch (error) {
        if (isUniqueViolation(error)) {
          throw new DuplicateSkuError(sku);
        }
        throw error;
      }
    });

    logger.info('Product added', { id, sku });
    return { id, ...draft };
  }

  list(options: ListProductsOptions = {}): Product[] {
    const { category, activeOnly = true, limit = DEFAULT_LIST_LIMIT } = options;

    let query = 'SELECT * FROM products WHERE 1=1';
    const params: Array<string | number> = [];

    if (activeOnly) {
      query += ' AND active = 1';
    }

    if (category) {
      query += ' AND category = ?';
      params.push(category);
    }

    query += ' ORDER BY category, name LIMIT ?';
    params.push(limit);

    return withConnection(this.config, db =>
      db.prepare<Array<string | number>, ProductRow>(query).all(...params).map(toProduct)
    );
  }

  search(query: string): Product[] {
    const pattern = `%${escapeLike(query)}%`;
    return withConnection(this.config, db =>
      db
        .prepare<[string, string, string, string], ProductRow>(
          `SELECT * FROM products
           WHERE sku LIKE ? ESCAPE '\\'
              OR name LIKE ? ESCAPE '\\'
              OR category LIKE ? ESCAPE '\\'
              OR description LIKE ? ESCAPE '\\'
           ORDER BY name`
        )
        .all(pattern, pattern, pattern, pattern)
        .map(toProduct)
    );
  }

  /**
   * Adds `delta` to the stock of `sku`, clamping at zero.
   * Returns null when the SKU is unknown; nothing is written in that case.
   */
  adjustInventory(sku: string, delta: number): Product | null {
    const normalized = sku.toUpperCase();
    const now = new Date().toISOString();

    const row = withConnection(this.config, db => {
      const update = db.prepare<[number, string, string]>(
        'UPDATE products SET inventory = MAX(0, inventory + ?), updated_at = ? WHERE sku = ?'
      );
      const select = db.prepare<[string], ProductRow>('SELECT * FROM products WHERE sku = ?');

      return db.transaction(() => {
        const { changes } = update.run(delta, now, normalized);
        return changes === 0 ? undefined : select.get(normalized);
      })();
    });

    if (!row) {
      logger.warn('Inventory adjustment for unknown SKU', { sku: normalized, delta });
      return null;
    }

    logger.info('Inventory adjusted', { sku: normalized, delta, inventory: row.inventory });
    return toProduct(row);
  }

  exportCsv(outputPath?: string): string {
    const products = withConnection(this.config, db =>
      db
        .prepare<[], ProductRow>('SELECT * FROM products ORDER BY category, name')
        .all()
        .map(toProduct)
    );
    const csv = buildCatalogCsv(products);

    if (outputPath) {
      fs.writeFileSync(outputPath, csv, 'utf8');
      logger.info('Catalog exported', { outputPath, rows: products.length });
    }

    return csv;
  }

  stats(): CatalogStats {
    return withConnection(this.config, db => {
      const count = (where: string): number => {
        const row = db
          .prepare<[], { cnt: number }>(`SELECT COUNT(*) AS cnt FROM products WHERE active = 1${where}`)
          .get();
        return row?.cnt ?? 0;
      };

      const total = count('');
      const outOfStock = count(' AND inventory = 0');
      const lowStock = count(` AND inventory > 0 AND inventory < ${LOW_STOCK_THRESHOLD}`);

      const categoryRows = db
        .prepare<[], { category: string; cnt: number }>(
          'SELECT category, COUNT(*) AS cnt FROM products WHERE active = 1 GROUP BY category'
        )
        .all();

      const valueRow = db
        .prepare<[], { value: number | null }>(
          'SELECT SUM(price * inventory) AS value FROM products WHERE active = 1'
        )
        .get();

      const categories: Record<string, number> = {};
      for (const { category, cnt } of categoryRows) {
        categories[category] = cnt;
      }

      return {
        total,
        out_of_stock: outOfStock,
        low_stock: lowStock,
        in_stock: total - outOfStock - lowStock,
        inventory_value: round2(valueRow?.value ?? 0),
        categories,
      };
    });
  }
}
