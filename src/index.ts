import { createApp } from './app';
import { appConfig } from './connections/config/app.config';
import { ProductCatalog } from './modules/products/product-catalog';
import { logger } from './utils/logging';

const startServer = () => {
  try {
    logger.info('Opening product catalog...', { path: appConfig.catalogPath });
    const catalog = new ProductCatalog({ dbPath: appConfig.catalogPath });
    catalog.initialize();

    const app = createApp(catalog, appConfig);
    app.listen(appConfig.port, () => {
      logger.info(`Server is running on port ${appConfig.port}`);
      logger.info(`Environment: ${appConfig.nodeEnv}`);
    });
  } catch (error) {
    logger.error('Failed to start server:', {
      error: error instanceof Error ? error.message : String(error),
      stack: error instanceof Error ? error.stack : undefined,
    });
    process.exit(1);
  }
};

startServer();
