import * as Papa from 'papaparse';
import type { Product } from '../../connections/db/models/product.model';
import { inventoryStatus, marginPct } from './product.metrics';

export const CSV_HEADER = [
  'SKU',
  'Name',
  'Category',
  'Price',
  'Cost',
  'Margin%',
  'Inventory',
  'Unit',
  'Status',
  'Active',
];

const CSV_NEWLINE = '\r\n';

export const toCsvRow = (p: Product): string[] => [
  p.sku,
  p.name,
  p.category,
  p.price.toFixed(2),
  p.cost.toFixed(2),
  marginPct(p).toFixed(1),
  String(p.inventory),
  p.unit,
  inventoryStatus(p),
  p.active ? 'True' : 'False',
];

export const buildCatalogCsv = (products: Product[]): string =>
  Papa.unparse([CSV_HEADER, ...products.map(toCsvRow)], { newline: CSV_NEWLINE }) + CSV_NEWLINE;
