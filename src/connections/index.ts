// Database
export { withConnection, pingDatabase, ensureDatabaseDir } from './db/connection';
export type { CatalogConfig, Connection } from './db/connection';
export { createProductsTable } from './db/schema';

// Config
export { appConfig, loadAppConfig } from './config/app.config';
export type { AppConfig } from './config/app.config';
