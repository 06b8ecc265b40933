import { plainToInstance } from 'class-transformer';
import { validate } from 'class-validator';
import { CreateProductDto, MAX_PRODUCT_PRICE } from './create-product.dto';

async function errorsFor(payload: Record<string, unknown>): Promise<string[]> {
  const errors = await validate(plainToInstance(CreateProductDto, payload));
  return errors.map((error) => error.property);
}

describe('CreateProductDto', () => {
  it('accepts a valid payload with an empty description', async () => {
    await expect(errorsFor({ name: 'Widget', description: '', price: 9.99 })).resolves.toEqual([]);
  });

  it('accepts a free product without a description', async () => {
    await expect(errorsFor({ name: 'Freebie', price: 0 })).resolves.toEqual([]);
  });

  it('rejects a negative price', async () => {
    await expect(errorsFor({ name: 'Widget', price: -0.01 })).resolves.toEqual(['price']);
  });

  it('rejects prices with more than two decimal places', async () => {
    await expect(errorsFor({ name: 'Widget', price: 9.999 })).resolves.toEqual(['price']);
    await expect(errorsFor({ name: 'Widget', price: 9.9 })).resolves.toEqual([]);
  });

  it('rejects prices a DECIMAL(10,2) column cannot hold', async () => {
    await expect(errorsFor({ name: 'Widget', price: 123456789.5 })).resolves.toEqual(['price']);
    await expect(errorsFor({ name: 'Widget', price: MAX_PRODUCT_PRICE })).resolves.toEqual([]);
  });

  it('rejects names outside 3..255 characters', async () => {
    await expect(errorsFor({ name: 'ab', price: 1 })).resolves.toEqual(['name']);
    await expect(errorsFor({ name: 'x'.repeat(256), price: 1 })).resolves.toEqual(['name']);
    await expect(errorsFor({ name: 'x'.repeat(255), price: 1 })).resolves.toEqual([]);
  });

  it('rejects a missing name and a non-numeric price', async () => {
    await expect(errorsFor({ price: '12' })).resolves.toEqual(['name', 'price']);
  });
});
