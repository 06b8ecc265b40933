import { Logger } from '@nestjs/common';
import { Clock, systemClock } from '../../common/clock';
import { ReadWriteLock } from '../../common/concurrency/read-write-lock';
import { throwIfAborted } from '../../common/concurrency/abort';
import { ProductNotFoundError, StorageError } from '../errors/product.errors';
import { cloneProduct, Product, ProductInput } from '../product.entity';
import { OperationOptions, ProductRepository } from './product.repository';

/**
 * Process-local product store. Products are kept in insertion order in one
 * array guarded by a reader/writer lock; nothing outside this class ever holds
 * a reference into it.
 */
export class MemoryProductRepository implements ProductRepository {
  private readonly logger = new Logger(MemoryProductRepository.name);
  private readonly lock = new ReadWriteLock();
  private products: Product[] = [];

  constructor(private readonly clock: Clock = systemClock) {}

  async create(product: Product, options?: OperationOptions): Promise<Product> {
    this.ensureActive('create', options);
    return this.lock.write(() => {
      this.products.push(cloneProduct(product));
      return cloneProduct(product);
    });
  }

  async createBulk(products: Product[], options?: OperationOptions): Promise<void> {
    this.ensureActive('createBulk', options);
    await this.lock.write(() => {
      for (const product of products) {
        this.products.push(cloneProduct(product));
      }
    });
    this.logger.debug(`Stored ${products.length} products in memory`);
  }

  async getById(id: string, options?: OperationOptions): Promise<Product> {
    this.ensureActive('getById', options);
    return this.lock.read(() => {
      const product = this.products.find((candidate) => candidate.id === id);
      if (!product) {
        throw new ProductNotFoundError(id);
      }
      return cloneProduct(product);
    });
  }

  async list(page: number, pageSize: number, options?: OperationOptions): Promise<Product[]> {
    this.ensureActive('list', options);
    return this.lock.read(() => {
      const start = (page - 1) * pageSize;
      if (start >= this.products.length) {
        return [];
      }
      const end = Math.min(start + pageSize, this.products.length);
      return this.products.slice(start, end).map(cloneProduct);
    });
  }

  async getAll(options?: OperationOptions): Promise<Product[]> {
    this.ensureActive('getAll', options);
    return this.lock.read(() => this.products.map(cloneProduct));
  }

  async update(id: string, input: ProductInput, options?: OperationOptions): Promise<Product> {
    this.ensureActive('update', options);
    return this.lock.write(() => {
      const product = this.products.find((candidate) => candidate.id === id);
      if (!product) {
        throw new ProductNotFoundError(id);
      }
      product.name = input.name;
      product.description = input.description ?? '';
      product.price = input.price;
      product.updatedAt = new Date(this.clock.now().getTime());
      return cloneProduct(product);
    });
  }

  async delete(id: string, options?: OperationOptions): Promise<void> {
    this.ensureActive('delete', options);
    await this.lock.write(() => {
      const index = this.products.findIndex((candidate) => candidate.id === id);
      if (index === -1) {
        throw new ProductNotFoundError(id);
      }
      // swap with the last element and truncate
      const last = this.products.length - 1;
      this.products[index] = this.products[last];
      this.products.length = last;
    });
  }

  async deleteAll(options?: OperationOptions): Promise<void> {
    this.ensureActive('deleteAll', options);
    await this.lock.write(() => {
      this.products = [];
    });
  }

  async count(options?: OperationOptions): Promise<number> {
    this.ensureActive('count', options);
    return this.lock.read(() => this.products.length);
  }

  private ensureActive(operation: string, options?: OperationOptions): void {
    try {
      throwIfAborted(options?.signal);
    } catch (error) {
      throw new StorageError(operation, error);
    }
  }
}
