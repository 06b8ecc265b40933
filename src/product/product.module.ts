import { Logger, Module } from '@nestjs/common';
import { CLOCK, Clock } from '../common/clock';
import { CommonModule } from '../common/common.module';
import { APP_CONFIG, AppConfig } from '../config/configuration';
import { SQL_DATABASE, SqlDatabase } from '../database/database.types';
import { RandomProductGenerator } from './generator/random-product.generator';
import { ProductController } from './product.controller';
import { ProductService } from './product.service';
import { MemoryProductRepository } from './repositories/memory-product.repository';
import { PostgresProductRepository } from './repositories/postgres-product.repository';
import { PRODUCT_REPOSITORY, ProductRepository } from './repositories/product.repository';

export function createProductRepository(config: AppConfig, db: SqlDatabase, clock: Clock): ProductRepository {
  new Logger('ProductModule').log(`Using '${config.storageBackend}' product storage`);
  return config.storageBackend === 'memory'
    ? new MemoryProductRepository(clock)
    : new PostgresProductRepository(db, clock);
}

@Module({
  imports: [CommonModule],
  controllers: [ProductController],
  providers: [
    ProductService,
    {
      provide: PRODUCT_REPOSITORY,
      inject: [APP_CONFIG, SQL_DATABASE, CLOCK],
      useFactory: createProductRepository,
    },
    {
      provide: RandomProductGenerator,
      inject: [APP_CONFIG],
      useFactory: (config: AppConfig) => new RandomProductGenerator(config.generatorSeed),
    },
  ],
  exports: [ProductService],
})
export class ProductModule {}
