import { INestApplication } from '@nestjs/common';
import { Test, TestingModule } from '@nestjs/testing';
import request from 'supertest';
import { AppModule } from '../src/app.module';
import { configureApp } from '../src/app.setup';
import { CLOCK, Clock } from '../src/common/clock';
import { APP_CONFIG, loadConfiguration } from '../src/config/configuration';

describe('Products (e2e, memory storage)', () => {
  let app: INestApplication;
  let tick: number;

  const clock: Clock = {
    now: () => {
      tick += 1000;
      return new Date(tick);
    },
  };

  beforeEach(async () => {
    tick = Date.parse('2024-01-01T00:00:00.000Z');

    const moduleRef: TestingModule = await Test.createTestingModule({
      imports: [AppModule],
    })
      .overrideProvider(APP_CONFIG)
      .useValue(loadConfiguration({ STORAGE_BACKEND: 'memory', PRODUCT_GENERATOR_SEED: '7' }))
      .overrideProvider(CLOCK)
      .useValue(clock)
      .compile();

    app = moduleRef.createNestApplication({ logger: false });
    configureApp(app);
    await app.init();
  });

  afterEach(async () => {
    await app.close();
  });

  const api = () => request(app.getHttpServer());

  it('creates, updates and deletes a product', async () => {
    const created = await api()
      .post('/api/v1/products')
      .send({ name: 'Widget', description: '', price: 9.99 })
      .expect(201);

    expect(created.body.status).toBe('success');
    expect(created.body.message).toBe('Product created successfully');
    const product = created.body.data;
    expect(product).toMatchObject({ name: 'Widget', description: '', price: 9.99 });
    expect(product.createdAt).toBe(product.updatedAt);

    await api()
      .put(`/api/v1/products/${product.id}`)
      .send({ name: 'Widget Pro', description: 'upgraded', price: 19.99 })
      .expect(200);

    const fetched = await api().get(`/api/v1/products/${product.id}`).expect(200);
    expect(fetched.body.data).toMatchObject({
      id: product.id,
      name: 'Widget Pro',
      description: 'upgraded',
      price: 19.99,
      createdAt: product.createdAt,
    });
    expect(Date.parse(fetched.body.data.updatedAt)).toBeGreaterThan(Date.parse(fetched.body.data.createdAt));

    await api().delete(`/api/v1/products/${product.id}`).expect(200);

    const missing = await api().get(`/api/v1/products/${product.id}`).expect(404);
    expect(missing.body.message).toBe(`Product with ID ${product.id} not found`);
  });

  it('rejects invalid payloads', async () => {
    const negative = await api().post('/api/v1/products').send({ name: 'Widget', price: -1 }).expect(400);
    expect(negative.body.message).toEqual(['price must not be less than 0']);

    const fractional = await api().post('/api/v1/products').send({ name: 'Widget', price: 9.999 }).expect(400);
    expect(fractional.body.message).toEqual(['price must be a number conforming to the specified constraints']);

    const huge = await api().post('/api/v1/products').send({ name: 'Widget', price: 123456789.5 }).expect(400);
    expect(huge.body.message).toEqual(['price must not be greater than 99999999.99']);

    const short = await api().post('/api/v1/products').send({ name: 'ab', price: 1 }).expect(400);
    expect(short.body.message).toEqual(['name must be longer than or equal to 3 characters']);

    const withId = await api()
      .post('/api/v1/products')
      .send({ id: 'chosen', name: 'Widget', price: 1 })
      .expect(400);
    expect(withId.body.message).toEqual(['property id should not exist']);
  });

  it('rejects ids that are not UUIDs', async () => {
    await api().get('/api/v1/products/not-a-uuid').expect(400);
  });

  it('returns 404 when updating or deleting an unknown product', async () => {
    const unknown = '0b8f1d0e-3a6c-4c55-9d0e-2f4b8c7a1e11';
    await api().put(`/api/v1/products/${unknown}`).send({ name: 'Nothing', price: 1 }).expect(404);
    await api().delete(`/api/v1/products/${unknown}`).expect(404);
  });

  it('generates products in bulk and pages through them', async () => {
    const generated = await api().post('/api/v1/products/bulk/generate?count=25').expect(201);
    expect(generated.body.data).toEqual({ message: 'Products generated successfully', count: 25, totalCount: 25 });

    const firstPage = await api().get('/api/v1/products?page=1&pageSize=10').expect(200);
    expect(firstPage.body.data.products).toHaveLength(10);
    expect(firstPage.body.data).toMatchObject({ page: 1, pageSize: 10, totalCount: 25 });

    const lastPage = await api().get('/api/v1/products?page=3&pageSize=10').expect(200);
    expect(lastPage.body.data.products).toHaveLength(5);

    const beyond = await api().get('/api/v1/products?page=100&pageSize=10').expect(200);
    expect(beyond.body.data.products).toEqual([]);

    const all = await api().get('/api/v1/products/all').expect(200);
    expect(all.body.data).toMatchObject({ page: 1, pageSize: 25, totalCount: 25 });

    const count = await api().get('/api/v1/products/count').expect(200);
    expect(count.body.data).toEqual({ totalCount: 25 });

    await api().delete('/api/v1/products/bulk').expect(200);

    const afterDelete = await api().get('/api/v1/products/count').expect(200);
    expect(afterDelete.body.data).toEqual({ totalCount: 0 });
  });

  it('sets security headers on every response', async () => {
    for (const path of ['/health', '/api/v1/products/count']) {
      const response = await api().get(path).expect(200);
      expect(response.headers['x-xss-protection']).toBe('1; mode=block');
      expect(response.headers['x-content-type-options']).toBe('nosniff');
      expect(response.headers['x-frame-options']).toBe('DENY');
      expect(response.headers['strict-transport-security']).toBe('max-age=3600; includeSubDomains');
      expect(response.headers['content-security-policy']).toBe("default-src 'self'");
    }
  });

  it('serves the health probes without the api prefix', async () => {
    const health = await api().get('/health').expect(200);
    expect(health.body.data).toMatchObject({ status: 'healthy', storage: 'memory', database: 'disabled' });

    const live = await api().get('/live').expect(200);
    expect(live.body.data).toEqual({ status: 'alive' });
  });
});
