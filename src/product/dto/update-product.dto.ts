import { CreateProductDto } from './create-product.dto';

/** Updates replace name, description and price together. */
export class UpdateProductDto extends CreateProductDto {}
