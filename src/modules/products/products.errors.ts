export class CatalogError extends Error {
  constructor(message: string, readonly code: string) {
    super(message);
    this.name = new.target.name;
  }
}

export class DuplicateSkuError extends CatalogError {
  constructor(readonly sku: string) {
    super(`SKU '${sku}' already exists`, 'DUPLICATE_SKU');
  }
}

// better-sqlite3 reports constraint failures through SqliteError.code
export const isUniqueViolation = (err: unknown): boolean =>
  err instanceof Error && 'code' in err && err.code === 'SQLITE_CONSTRAINT_UNIQUE';
