import { Logger } from '@nestjs/common';
import { QueryResultRow } from 'pg';
import { Clock, systemClock } from '../../common/clock';
import { SqlDatabase, SqlExecutor } from '../../database/database.types';
import { ProductNotFoundError, StorageError } from '../errors/product.errors';
import { Product, ProductInput } from '../product.entity';
import { OperationOptions, ProductRepository } from './product.repository';

export interface ProductRow extends QueryResultRow {
  id: string;
  name: string;
  description: string | null;
  price: string | number;
  created_at: Date;
  updated_at: Date;
}

const COLUMNS = 'id, name, description, price, created_at, updated_at';

const INSERT_PRODUCT = `
  INSERT INTO products (${COLUMNS})
  VALUES ($1, $2, $3, $4, $5, $6)
  RETURNING ${COLUMNS}
`;

export function toProduct(row: ProductRow): Product {
  return {
    id: row.id,
    name: row.name,
    description: row.description ?? '',
    price: typeof row.price === 'number' ? row.price : parseFloat(row.price),
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

function insertValues(product: Product): unknown[] {
  return [
    product.id,
    product.name,
    product.description,
    product.price,
    product.createdAt,
    product.updatedAt,
  ];
}

/**
 * Product storage on PostgreSQL. Ordering for `list` and `getAll` is newest
 * first, ties broken by id so that pages never overlap.
 */
export class PostgresProductRepository implements ProductRepository {
  private readonly logger = new Logger(PostgresProductRepository.name);

  constructor(
    private readonly db: SqlDatabase,
    private readonly clock: Clock = systemClock,
  ) {}

  async create(product: Product, options?: OperationOptions): Promise<Product> {
    return this.write('create', options, async (tx) => {
      const result = await tx.query<ProductRow>(INSERT_PRODUCT, insertValues(product));
      return toProduct(result.rows[0]);
    });
  }

  async createBulk(products: Product[], options?: OperationOptions): Promise<void> {
    if (products.length === 0) {
      return;
    }

    await this.write('createBulk', options, async (tx) => {
      for (const product of products) {
        await tx.query(INSERT_PRODUCT, insertValues(product));
      }
    });
    this.logger.debug(`Inserted ${products.length} products in one transaction`);
  }

  async getById(id: string, options?: OperationOptions): Promise<Product> {
    return this.run('getById', async () => {
      const result = await this.db.query<ProductRow>(
        `SELECT ${COLUMNS} FROM products WHERE id = $1`,
        [id],
        options?.signal,
      );
      if (result.rows.length === 0) {
        throw new ProductNotFoundError(id);
      }
      return toProduct(result.rows[0]);
    });
  }

  async list(page: number, pageSize: number, options?: OperationOptions): Promise<Product[]> {
    return this.run('list', async () => {
      const offset = (page - 1) * pageSize;
      const result = await this.db.query<ProductRow>(
        `SELECT ${COLUMNS} FROM products ORDER BY created_at DESC, id LIMIT $1 OFFSET $2`,
        [pageSize, offset],
        options?.signal,
      );
      return result.rows.map(toProduct);
    });
  }

  async getAll(options?: OperationOptions): Promise<Product[]> {
    return this.run('getAll', async () => {
      const result = await this.db.query<ProductRow>(
        `SELECT ${COLUMNS} FROM products ORDER BY created_at DESC, id`,
        [],
        options?.signal,
      );
      return result.rows.map(toProduct);
    });
  }

  async update(id: string, input: ProductInput, options?: OperationOptions): Promise<Product> {
    return this.write('update', options, async (tx) => {
      const result = await tx.query<ProductRow>(
        `UPDATE products
         SET name = $1, description = $2, price = $3, updated_at = $4
         WHERE id = $5
         RETURNING ${COLUMNS}`,
        [input.name, input.description ?? '', input.price, this.clock.now(), id],
      );
      if (result.rows.length === 0) {
        throw new ProductNotFoundError(id);
      }
      return toProduct(result.rows[0]);
    });
  }

  async delete(id: string, options?: OperationOptions): Promise<void> {
    await this.write('delete', options, async (tx) => {
      const result = await tx.query('DELETE FROM products WHERE id = $1', [id]);
      if (!result.rowCount) {
        throw new ProductNotFoundError(id);
      }
    });
  }

  async deleteAll(options?: OperationOptions): Promise<void> {
    await this.write('deleteAll', options, (tx) => tx.query('DELETE FROM products'));
  }

  async count(options?: OperationOptions): Promise<number> {
    return this.run('count', async () => {
      const result = await this.db.query<{ count: string }>(
        'SELECT COUNT(*) AS count FROM products',
        [],
        options?.signal,
      );
      return Number(result.rows[0]?.count ?? 0);
    });
  }

  // Writes run in a transaction: an abort while a statement is in flight rolls it back.
  private write<T>(
    operation: string,
    options: OperationOptions | undefined,
    work: (tx: SqlExecutor) => Promise<T>,
  ): Promise<T> {
    return this.run(operation, () => this.db.transaction(work, options?.signal));
  }

  private async run<T>(operation: string, work: () => Promise<T>): Promise<T> {
    try {
      return await work();
    } catch (error) {
      throw StorageError.wrap(operation, error);
    }
  }
}
