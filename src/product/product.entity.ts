import { randomUUID } from 'crypto';

export interface Product {
  id: string;
  name: string;
  description: string;
  price: number;
  createdAt: Date;
  updatedAt: Date;
}

/** Client-supplied fields of a product; ids and timestamps are never part of it. */
export interface ProductInput {
  name: string;
  description?: string;
  price: number;
}

export interface CreateProductOptions {
  id?: string;
  now?: Date;
}

/**
 * Turn a request payload into a new product with a fresh id and
 * `createdAt === updatedAt`.
 */
export function createProduct(input: ProductInput, options: CreateProductOptions = {}): Product {
  const now = options.now ?? new Date();
  return {
    id: options.id ?? randomUUID(),
    name: input.name,
    description: input.description ?? '',
    price: input.price,
    createdAt: new Date(now.getTime()),
    updatedAt: new Date(now.getTime()),
  };
}

export function cloneProduct(product: Product): Product {
  return {
    ...product,
    createdAt: new Date(product.createdAt.getTime()),
    updatedAt: new Date(product.updatedAt.getTime()),
  };
}
