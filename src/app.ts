import express from 'express';
import cors from 'cors';
import type { AppConfig } from './connections/config/app.config';
import { ProductCatalog } from './modules/products/product-catalog';
import { createProductsRouter } from './modules/products/products.routes';
import { errorHandler, notFoundHandler } from './middlewares/error.middleware';

type CorsSettings = Pick<AppConfig, 'corsOrigins' | 'nodeEnv'>;

const buildCorsOptions = (settings: CorsSettings): cors.CorsOptions => ({
  origin: (origin, callback) => {
    // Allow requests with no origin (curl, the CLI, same-host tools)
    if (!origin) {
      return callback(null, true);
    }

    if (settings.corsOrigins.includes(origin)) {
      return callback(null, true);
    }

    // In development, allow all origins if CORS_ORIGINS is not set
    if (settings.nodeEnv === 'development' && settings.corsOrigins.length === 0) {
      return callback(null, true);
    }

    callback(new Error('Not allowed by CORS'));
  },
  methods: ['GET', 'POST', 'PATCH', 'OPTIONS'],
  allowedHeaders: ['Content-Type', 'Accept', 'Origin'],
  maxAge: 86400, // 24 hours
  optionsSuccessStatus: 200,
});

export const createApp = (catalog: ProductCatalog, settings: CorsSettings): express.Express => {
  const app = express();

  app.use(cors(buildCorsOptions(settings)));
  app.use(express.json());

  app.get('/health', (_req, res) => {
    try {
      catalog.ping();
      res.json({ status: 'ok', database: 'connected' });
    } catch {
      res.status(500).json({ status: 'error', database: 'disconnected' });
    }
  });

  app.use('/api/products', createProductsRouter(catalog));

  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
};
