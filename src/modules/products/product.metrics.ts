import type { InventoryStatus, Product } from '../../connections/db/models/product.model';

export const LOW_STOCK_THRESHOLD = 10;

export const round2 = (value: number): number => Math.round(value * 100) / 100;

export const marginPct = (product: Pick<Product, 'price' | 'cost'>): number => {
  if (product.price <= 0) {
    return 0;
  }
  return round2(((product.price - product.cost) / product.price) * 100);
};

export const inventoryStatus = (product: Pick<Product, 'inventory'>): InventoryStatus => {
  if (product.inventory <= 0) return 'OUT_OF_STOCK';
  if (product.inventory < LOW_STOCK_THRESHOLD) return 'LOW_STOCK';
  return 'IN_STOCK';
};
