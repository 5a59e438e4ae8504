// Product Model - mirrors the products table

export type InventoryStatus = 'OUT_OF_STOCK' | 'LOW_STOCK' | 'IN_STOCK';

export interface Product {
  id: number;
  sku: string; // unique, upper-case
  name: string;
  category: string;
  price: number;
  cost: number; // default: 0
  inventory: number; // default: 0, never negative
  unit: string; // default: 'ea'
  description: string; // default: ''
  active: boolean; // default: true
  created_at: string;
  updated_at: string;
}

/** Row shape as stored; SQLite keeps booleans as 0/1. */
export interface ProductRow {
  id: number;
  sku: string;
  name: string;
  category: string;
  price: number;
  cost: number;
  inventory: number;
  unit: string;
  description: string;
  active: number;
  created_at: string;
  updated_at: string;
}

export interface CreateProductInput {
  sku: string; // REQUIRED - unique
  name: string;
  category: string;
  price: number;
  cost?: number;
  inventory?: number;
  unit?: string;
  description?: string;
}

export interface ListProductsOptions {
  category?: string;
  activeOnly?: boolean; // default: true
  limit?: number; // default: 50
}

export interface CatalogStats {
  total: number;
  out_of_stock: number;
  low_stock: number;
  in_stock: number;
  inventory_value: number;
  categories: Record<string, number>;
}

export const toProduct = (row: ProductRow): Product => ({
  id: row.id,
  sku: row.sku,
  name: row.name,
  category: row.category,
  price: row.price,
  cost: row.cost,
  inventory: row.inventory,
  unit: row.unit,
  description: row.description,
  active: row.active === 1,
  created_at: row.created_at,
  updated_at: row.updated_at,
});
