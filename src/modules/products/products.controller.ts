import type { NextFunction, Request, Response } from 'express';
import { ResponseHandler } from '../../utils/response';
import type { ProductCatalog } from './product-catalog';
import {
  adjustInventorySchema,
  createProductSchema,
  listProductsQuerySchema,
  searchProductsQuerySchema,
} from './products.validation';

type Handler = (req: Request, res: Response, next: NextFunction) => Response | void;

export interface ProductsController {
  listProducts: Handler;
  createProduct: Handler;
  adjustInventory: Handler;
  searchProducts: Handler;
  getStatus: Handler;
  exportCsv: Handler;
}

// Validation and duplicate errors go to errorHandler through next()
export const createProductsController = (catalog: ProductCatalog): ProductsController => ({
  // list [category] [includeInactive] [limit]
  listProducts: (req, res, next) => {
    try {
      const { category, includeInactive, limit } = listProductsQuerySchema.parse(req.query);
      const products = catalog.list({ category, activeOnly: !includeInactive, limit });
      return ResponseHandler.success(res, products, `${products.length} products`);
    } catch (error) {
      next(error);
    }
  },

  createProduct: (req, res, next) => {
    try {
      const product = catalog.add(createProductSchema.parse(req.body));
      return ResponseHandler.created(res, product, 'Product added');
    } catch (error) {
      next(error);
    }
  },

  adjustInventory: (req, res, next) => {
    try {
      const { delta } = adjustInventorySchema.parse(req.body);
      const product = catalog.adjustInventory(req.params.sku, delta);
      if (!product) {
        return ResponseHandler.notFound(res, `SKU '${req.params.sku}' not found`);
      }
      return ResponseHandler.success(res, product, 'Inventory updated');
    } catch (error) {
      next(error);
    }
  },

  searchProducts: (req, res, next) => {
    try {
      const { q } = searchProductsQuerySchema.parse(req.query);
      const products = catalog.search(q);
      return ResponseHandler.success(res, products, `${products.length} results`);
    } catch (error) {
      next(error);
    }
  },

  getStatus: (_req, res, next) => {
    try {
      return ResponseHandler.success(res, catalog.stats());
    } catch (error) {
      next(error);
    }
  },

  exportCsv: (_req, res, next) => {
    try {
      return ResponseHandler.csv(res, catalog.exportCsv(), 'product_catalog.csv');
    } catch (error) {
      next(error);
    }
  },
});
