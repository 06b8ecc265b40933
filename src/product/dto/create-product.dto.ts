import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import { IsNumber, IsOptional, IsString, Length, Max, Min } from 'class-validator';
import { ProductInput } from '../product.entity';

/** Largest value a DECIMAL(10,2) column holds. */
export const MAX_PRODUCT_PRICE = 99_999_999.99;

export class CreateProductDto implements ProductInput {
  @ApiProperty({ minLength: 3, maxLength: 255, example: 'Widget' })
  @IsString()
  @Length(3, 255)
  name!: string;

  @ApiPropertyOptional({ default: '', example: 'A widget for everyday use' })
  @IsString()
  @IsOptional()
  description?: string;

  @ApiProperty({ minimum: 0, maximum: MAX_PRODUCT_PRICE, example: 9.99, description: 'At most two decimal places' })
  @IsNumber({ allowNaN: false, allowInfinity: false, maxDecimalPlaces: 2 })
  @Min(0)
  @Max(MAX_PRODUCT_PRICE)
  price!: number;
}
