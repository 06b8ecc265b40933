import { Module } from '@nestjs/common';
import { AppController } from './app.controller';
import { CommonModule } from './common/common.module';
import { ConfigModule } from './config/config.module';
import { DatabaseModule } from './database/database.module';
import { ProductModule } from './product/product.module';

@Module({
  imports: [ConfigModule, DatabaseModule, CommonModule, ProductModule],
  controllers: [AppController],
})
export class AppModule {}
