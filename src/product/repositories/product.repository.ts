import { Product, ProductInput } from '../product.entity';

export const PRODUCT_REPOSITORY = Symbol('PRODUCT_REPOSITORY');

export interface OperationOptions {
  /** Aborting fails the operation with a StorageError instead of completing it. */
  signal?: AbortSignal;
}

/**
 * Storage contract shared by the PostgreSQL and in-memory backends.
 *
 * Lookups, updates and deletes reject with `ProductNotFoundError` when no
 * product has the given id; every other failure is a `StorageError`.
 */
export interface ProductRepository {
  create(product: Product, options?: OperationOptions): Promise<Product>;
  /** All-or-nothing: a failed insert leaves the dataset untouched. */
  createBulk(products: Product[], options?: OperationOptions): Promise<void>;
  getById(id: string, options?: OperationOptions): Promise<Product>;
  /** `page` and `pageSize` are 1-based; pages past the end are empty. */
  list(page: number, pageSize: number, options?: OperationOptions): Promise<Product[]>;
  getAll(options?: OperationOptions): Promise<Product[]>;
  update(id: string, input: ProductInput, options?: OperationOptions): Promise<Product>;
  delete(id: string, options?: OperationOptions): Promise<void>;
  deleteAll(options?: OperationOptions): Promise<void>;
  count(options?: OperationOptions): Promise<number>;
}
