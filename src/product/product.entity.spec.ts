import { cloneProduct, createProduct } from './product.entity';

describe('createProduct', () => {
  it('assigns an id and identical timestamps', () => {
    const now = new Date('2024-05-05T10:00:00.000Z');
    const product = createProduct({ name: 'Widget', description: '', price: 9.99 }, { now });

    expect(product.id).toMatch(/^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/);
    expect(product.name).toBe('Widget');
    expect(product.description).toBe('');
    expect(product.price).toBe(9.99);
    expect(product.createdAt).toEqual(now);
    expect(product.updatedAt).toEqual(product.createdAt);
  });

  it('defaults a missing description to an empty string', () => {
    expect(createProduct({ name: 'Gizmo', price: 0 }).description).toBe('');
  });

  it('gives every product its own id', () => {
    const first = createProduct({ name: 'Gizmo', price: 1 });
    const second = createProduct({ name: 'Gizmo', price: 1 });
    expect(first.id).not.toBe(second.id);
  });
});

describe('cloneProduct', () => {
  it('copies the timestamps', () => {
    const product = createProduct({ name: 'Widget', price: 1 }, { id: 'p1' });
    const copy = cloneProduct(product);

    expect(copy).toEqual(product);
    expect(copy.createdAt).not.toBe(product.createdAt);
    expect(copy.updatedAt).not.toBe(product.updatedAt);
  });
});
