import { ZodError } from 'zod';
import type { CatalogStats, Product } from '../connections/db/models/product.model';
import type { ProductCatalog } from '../modules/products/product-catalog';
import { DuplicateSkuError } from '../modules/products/products.errors';
import { inventoryStatus, marginPct } from '../modules/products/product.metrics';
import {
  adjustInventorySchema,
  createProductSchema,
  listProductsQuerySchema,
} from '../modules/products/products.validation';

export interface CliOutput {
  out: (line: string) => void;
  err: (line: string) => void;
}

export const USAGE = [
  'Usage: product-catalog <command> [args]',
  '',
  '  list [category] [includeInactive] [limit]',
  '  add <sku> <name> <category> <price> [cost] [inventory] [unit] [description]',
  '  update <sku> <delta>',
  '  search <query>',
  '  status',
  '  export [path]',
];

const money = (value: number): string =>
  value.toLocaleString('en-US', { minimumFractionDigits: 2, maximumFractionDigits: 2 });

export const formatProduct = (p: Product): string =>
  `${p.sku.padEnd(14)}  ${p.name}  [${p.category}]  $${p.price.toFixed(2)}  ` +
  `margin ${marginPct(p).toFixed(1)}%  stock ${p.inventory} ${p.unit}  ${inventoryStatus(p)}`;

export const formatStats = (stats: CatalogStats): string[] => {
  const lines = [
    `Active products  : ${stats.total}`,
    `In stock         : ${stats.in_stock}`,
    `Low stock        : ${stats.low_stock}`,
    `Out of stock     : ${stats.out_of_stock}`,
    `Inventory value  : $${money(stats.inventory_value)}`,
  ];

  const categories = Object.keys(stats.categories).sort();
  if (categories.length > 0) {
    lines.push('', 'Categories:');
    for (const category of categories) {
      lines.push(`  ${category.padEnd(20)} ${stats.categories[category]}`);
    }
  }
  return lines;
};

const runCommand = (catalog: ProductCatalog, command: string, args: string[], io: CliOutput): number => {
  switch (command) {
    case 'list': {
      const [category, includeInactive, limit] = args;
      const query = listProductsQuerySchema.parse({ category, includeInactive, limit });
      const products = catalog.list({
        category: query.category,
        activeOnly: !query.includeInactive,
        limit: query.limit,
      });
      io.out(`Products (${products.length} shown)`);
      if (products.length === 0) {
        io.out('No products found.');
      }
      products.forEach(p => io.out(formatProduct(p)));
      return 0;
    }

    case 'add': {
      const [sku, name, category, price, cost, inventory, unit, description] = args;
      const input = createProductSchema.parse({ sku, name, category, price, cost, inventory, unit, description });
      const p = catalog.add(input);
      io.out(`Product added: [${p.sku}] ${p.name}  $${p.price.toFixed(2)}  stock: ${p.inventory}`);
      return 0;
    }

    case 'update': {
      const [sku, delta] = args;
      if (!sku) {
        io.err('update requires a SKU');
        return 1;
      }
      const parsed = adjustInventorySchema.parse({ delta });
      const p = catalog.adjustInventory(sku, parsed.delta);
      if (!p) {
        io.err(`SKU '${sku}' not found`);
        return 1;
      }
      const sign = parsed.delta >= 0 ? '+' : '';
      io.out(`${p.sku} inventory: ${sign}${parsed.delta} -> ${p.inventory} ${p.unit}  [${inventoryStatus(p)}]`);
      return 0;
    }

    case 'search': {
      const query = args[0] ?? '';
      const results = catalog.search(query);
      io.out(`Search: '${query}'  (${results.length} results)`);
      results.forEach(p => io.out(formatProduct(p)));
      return 0;
    }

    case 'status':
      formatStats(catalog.stats()).forEach(line => io.out(line));
      return 0;

    case 'export': {
      const [outputPath] = args;
      const csv = catalog.exportCsv(outputPath);
      if (outputPath) {
        io.out(`Exported to: ${outputPath}`);
      } else {
        io.out(csv);
      }
      return 0;
    }

    default:
      io.err(command ? `Unknown command: ${command}` : 'Missing command');
      USAGE.forEach(line => io.err(line));
      return 1;
  }
};

/**
 * Runs one catalog command and returns the process exit code.
 * Store and file errors other than duplicates propagate to the caller.
 */
export const runCli = (catalog: ProductCatalog, argv: string[], io: CliOutput): number => {
  const [command = '', ...args] = argv;
  try {
    return runCommand(catalog, command, args, io);
  } catch (error) {
    if (error instanceof DuplicateSkuError) {
      io.err(error.message);
      return 1;
    }
    if (error instanceof ZodError) {
      error.issues.forEach(issue => io.err(`Invalid ${issue.path.join('.')}: ${issue.message}`));
      return 1;
    }
    throw error;
  }
};
