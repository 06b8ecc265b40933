import {
  Controller,
  Get,
  Post,
  Put,
  Body,
  Param,
  Delete,
  Query,
  ParseUUIDPipe,
} from '@nestjs/common';
import { ApiOperation, ApiTags, ApiParam, ApiQuery, ApiOkResponse, ApiCreatedResponse } from '@nestjs/swagger';
import { ProductService } from './product.service';
import { CreateProductDto } from './dto/create-product.dto';
import { UpdateProductDto } from './dto/update-product.dto';
import {
  BulkGenerateResponseDto,
  ProductCountResponseDto,
  ProductPageResponseDto,
  ProductResponseDto,
} from './dto/product-response.dto';
import { ApiResponseWrapper } from '../common/decorators/api-response.decorator';
import { RequestSignal } from '../common/decorators/request-signal.decorator';

export const DEFAULT_PAGE_SIZE = 10;
export const MAX_PAGE_SIZE = 100;
export const DEFAULT_BULK_COUNT = 1000;
export const MAX_BULK_COUNT = 10_000;

/** Plain decimal integers only; `12abc`, `1e2` and `1.5` are rejected. */
function parseInteger(value?: string): number | undefined {
  return value !== undefined && /^[+-]?\d+$/.test(value) ? Number(value) : undefined;
}

function parsePage(value?: string): number {
  const page = parseInteger(value);
  return page === undefined || page < 1 ? 1 : page;
}

function parsePageSize(value?: string): number {
  const pageSize = parseInteger(value);
  return pageSize === undefined || pageSize < 1 || pageSize > MAX_PAGE_SIZE ? DEFAULT_PAGE_SIZE : pageSize;
}

function parseBulkCount(value?: string): number {
  const count = parseInteger(value);
  return count === undefined || count < 1 || count > MAX_BULK_COUNT ? DEFAULT_BULK_COUNT : count;
}

@ApiTags('products')
@Controller('products')
export class ProductController {
  constructor(private readonly productService: ProductService) {}

  @Post()
  @ApiOperation({ summary: 'Create a new product' })
  @ApiCreatedResponse({ type: ProductResponseDto })
  @ApiResponseWrapper({ message: 'Product created successfully' })
  async create(@Body() createProductDto: CreateProductDto, @RequestSignal() signal?: AbortSignal) {
    return this.productService.create(createProductDto, signal);
  }

  @Get()
  @ApiOperation({ summary: 'List products page by page' })
  @ApiOkResponse({ type: ProductPageResponseDto })
  @ApiResponseWrapper({ message: 'Products retrieved successfully' })
  @ApiQuery({ name: 'page', required: false, type: Number, description: 'Page number (default: 1)' })
  @ApiQuery({ name: 'pageSize', required: false, type: Number, description: 'Items per page (default: 10, max: 100)' })
  async findAll(
    @Query('page') page?: string,
    @Query('pageSize') pageSize?: string,
    @RequestSignal() signal?: AbortSignal,
  ) {
    return this.productService.findAll(parsePage(page), parsePageSize(pageSize), signal);
  }

  @Get('all')
  @ApiOperation({ summary: 'Get every product without pagination' })
  @ApiOkResponse({ type: ProductPageResponseDto })
  @ApiResponseWrapper({ message: 'Products retrieved successfully' })
  async findEvery(@RequestSignal() signal?: AbortSignal) {
    return this.productService.findEvery(signal);
  }

  @Get('count')
  @ApiOperation({ summary: 'Get the total number of products' })
  @ApiOkResponse({ type: ProductCountResponseDto })
  @ApiResponseWrapper({ message: 'Product count retrieved successfully' })
  async count(@RequestSignal() signal?: AbortSignal) {
    return this.productService.count(signal);
  }

  @Post('bulk/generate')
  @ApiOperation({ summary: 'Generate and store random products' })
  @ApiCreatedResponse({ type: BulkGenerateResponseDto })
  @ApiQuery({ name: 'count', required: false, type: Number, description: 'How many products (default: 1000, max: 10000)' })
  @ApiResponseWrapper({ message: 'Products generated successfully' })
  async generateBulk(@Query('count') count?: string, @RequestSignal() signal?: AbortSignal) {
    return this.productService.generateBulk(parseBulkCount(count), signal);
  }

  @Delete('bulk')
  @ApiOperation({ summary: 'Delete every product' })
  @ApiResponseWrapper({ message: 'All products deleted successfully' })
  async removeAll(@RequestSignal() signal?: AbortSignal) {
    return this.productService.removeAll(signal);
  }

  @Get(':id')
  @ApiOperation({ summary: 'Get a product by ID' })
  @ApiParam({ name: 'id', format: 'uuid' })
  @ApiOkResponse({ type: ProductResponseDto })
  @ApiResponseWrapper({ message: 'Product retrieved successfully' })
  async findOne(@Param('id', ParseUUIDPipe) id: string, @RequestSignal() signal?: AbortSignal) {
    return this.productService.findOne(id, signal);
  }

  @Put(':id')
  @ApiOperation({ summary: 'Replace the fields of a product' })
  @ApiParam({ name: 'id', format: 'uuid' })
  @ApiOkResponse({ type: ProductResponseDto })
  @ApiResponseWrapper({ message: 'Product updated successfully' })
  async update(
    @Param('id', ParseUUIDPipe) id: string,
    @Body() updateProductDto: UpdateProductDto,
    @RequestSignal() signal?: AbortSignal,
  ) {
    return this.productService.update(id, updateProductDto, signal);
  }

  @Delete(':id')
  @ApiOperation({ summary: 'Delete a product by ID' })
  @ApiParam({ name: 'id', format: 'uuid' })
  @ApiResponseWrapper({ message: 'Product deleted successfully' })
  async remove(@Param('id', ParseUUIDPipe) id: string, @RequestSignal() signal?: AbortSignal) {
    return this.productService.remove(id, signal);
  }
}
