import { z } from 'zod';

const booleanFlag = z
  .union([z.boolean(), z.enum(['true', 'false', '1', '0'])])
  .transform(value => value === true || value === 'true' || value === '1');

// Request schemas shared by the HTTP routes and the command line
export const createProductSchema = z.object({
  sku: z.string().trim().min(1, 'SKU is required'),
  name: z.string().min(1, 'Name is required'),
  category: z.string().min(1, 'Category is required'),
  price: z.coerce.number().finite('Price must be a finite number').nonnegative('Price must not be negative'),
  cost: z.coerce.number().finite('Cost must be a finite number').nonnegative('Cost must not be negative').default(0),
  inventory: z.coerce.number().int().nonnegative('Inventory must not be negative').default(0),
  unit: z.string().min(1).default('ea'),
  description: z.string().default(''),
});

export const listProductsQuerySchema = z.object({
  category: z.string().optional(),
  includeInactive: booleanFlag.default(false),
  limit: z.coerce.number().int().positive().default(50),
});

export const searchProductsQuerySchema = z.object({
  q: z.string().default(''),
});

export const adjustInventorySchema = z.object({
  delta: z.coerce.number().finite('Delta must be a finite number').int('Delta must be a whole number'),
});

export type CreateProductBody = z.infer<typeof createProductSchema>;
export type ListProductsQuery = z.infer<typeof listProductsQuerySchema>;
