import {
  Inject,
  Injectable,
  InternalServerErrorException,
  Logger,
  NotFoundException,
} from '@nestjs/common';
import { CLOCK, Clock } from '../common/clock';
import { errorStack } from '../common/errors';
import { CreateProductDto } from './dto/create-product.dto';
import { UpdateProductDto } from './dto/update-product.dto';
import { ProductNotFoundError } from './errors/product.errors';
import { RandomProductGenerator } from './generator/random-product.generator';
import { createProduct, Product } from './product.entity';
import { PRODUCT_REPOSITORY, ProductRepository } from './repositories/product.repository';

export interface ProductPage {
  products: Product[];
  page: number;
  pageSize: number;
  totalCount: number;
}

export interface BulkGenerateResult {
  message: string;
  count: number;
  totalCount: number;
}

@Injectable()
export class ProductService {
  private readonly logger = new Logger(ProductService.name);

  constructor(
    @Inject(PRODUCT_REPOSITORY) private readonly repository: ProductRepository,
    private readonly generator: RandomProductGenerator,
    @Inject(CLOCK) private readonly clock: Clock,
  ) {}

  async create(createProductDto: CreateProductDto, signal?: AbortSignal): Promise<Product> {
    const product = createProduct(createProductDto, { now: this.clock.now() });

    try {
      const created = await this.repository.create(product, { signal });
      this.logger.log(`Product created: ${created.id} (${created.name})`);
      return created;
    } catch (error) {
      throw this.translate(error, 'Failed to create product');
    }
  }

  async findAll(page: number, pageSize: number, signal?: AbortSignal): Promise<ProductPage> {
    try {
      const products = await this.repository.list(page, pageSize, { signal });
      const totalCount = await this.repository.count({ signal });
      this.logger.debug(`Listed page ${page} (size ${pageSize}): ${products.length} of ${totalCount} products`);
      return { products, page, pageSize, totalCount };
    } catch (error) {
      throw this.translate(error, 'Failed to retrieve products');
    }
  }

  async findEvery(signal?: AbortSignal): Promise<ProductPage> {
    try {
      const products = await this.repository.getAll({ signal });
      return { products, page: 1, pageSize: products.length, totalCount: products.length };
    } catch (error) {
      throw this.translate(error, 'Failed to retrieve products');
    }
  }

  async findOne(id: string, signal?: AbortSignal): Promise<Product> {
    try {
      return await this.repository.getById(id, { signal });
    } catch (error) {
      throw this.translate(error, 'Failed to retrieve product');
    }
  }

  async update(id: string, updateProductDto: UpdateProductDto, signal?: AbortSignal): Promise<Product> {
    try {
      const updated = await this.repository.update(id, updateProductDto, { signal });
      this.logger.log(`Product updated: ${id}`);
      return updated;
    } catch (error) {
      throw this.translate(error, 'Failed to update product');
    }
  }

  async remove(id: string, signal?: AbortSignal): Promise<{ id: string }> {
    try {
      await this.repository.delete(id, { signal });
      this.logger.log(`Product deleted: ${id}`);
      return { id };
    } catch (error) {
      throw this.translate(error, 'Failed to delete product');
    }
  }

  async removeAll(signal?: AbortSignal): Promise<void> {
    try {
      await this.repository.deleteAll({ signal });
      this.logger.log('All products deleted');
    } catch (error) {
      throw this.translate(error, 'Failed to delete all products');
    }
  }

  async count(signal?: AbortSignal): Promise<{ totalCount: number }> {
    try {
      return { totalCount: await this.repository.count({ signal }) };
    } catch (error) {
      throw this.translate(error, 'Failed to retrieve product count');
    }
  }

  async generateBulk(count: number, signal?: AbortSignal): Promise<BulkGenerateResult> {
    const products = this.generator.generateMany(count, this.clock.now());

    try {
      await this.repository.createBulk(products, { signal });
    } catch (error) {
      throw this.translate(error, 'Failed to generate products');
    }

    let totalCount = 0;
    try {
      totalCount = await this.repository.count({ signal });
    } catch (error) {
      this.logger.warn(`Failed to retrieve total product count after bulk generation: ${String(error)}`);
    }

    this.logger.log(`Generated ${count} random products, ${totalCount} in total`);
    return { message: 'Products generated successfully', count, totalCount };
  }

  /**
   * Not-found becomes a 404; anything else is logged and surfaced as an
   * opaque 500 so storage details never reach the client.
   */
  private translate(error: unknown, failureMessage: string): Error {
    if (error instanceof ProductNotFoundError) {
      return new NotFoundException(error.message);
    }
    this.logger.error(`${failureMessage}: ${String(error)}`, errorStack(error));
    return new InternalServerErrorException(failureMessage);
  }
}
