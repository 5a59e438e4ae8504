import express from 'express';
import type { ProductCatalog } from './product-catalog';
import { createProductsController } from './products.controller';

export const createProductsRouter = (catalog: ProductCatalog): express.Router => {
  const router = express.Router();
  const productsController = createProductsController(catalog);

  // Fixed paths go before /:sku
  router.get('/search', productsController.searchProducts);
  router.get('/status', productsController.getStatus);
  router.get('/export', productsController.exportCsv);
  router.get('/', productsController.listProducts);

  router.post('/', productsController.createProduct);
  router.patch('/:sku/inventory', productsController.adjustInventory);

  return router;
};
