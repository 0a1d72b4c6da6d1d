/**
 * HTTP tests for the REST surface, driven in-process through supertest
 */

import request from 'supertest';
import { createApp } from '../src/app';
import { parseEnv, toShopSettings } from '../src/config';
import { InMemoryOrderRepository } from '../src/storage/orderRepository';
import { Order, OrderDraft } from '../src/storage/sessionTypes';
import { ShopStore, createShopStore } from '../src/storage/shopStore';

const API = '/api/v1';

function buildApp(
  envOverrides: NodeJS.ProcessEnv = {},
  store: ShopStore = createShopStore(),
): { app: ReturnType<typeof createApp>; store: ShopStore } {
  const settings = toShopSettings(parseEnv({ NTH_ORDER_DISCOUNT: '3', ...envOverrides }));
  return { app: createApp({ settings, store }), store };
}

const widget = { product_id: 1, name: 'Test Product', price: 100, quantity: 1 };

describe('REST API', () => {
  describe('session cookie', () => {
    it('mints a session for a first-time visitor', async () => {
      const { app, store } = buildApp();

      const res = await request(app).get(`${API}/cart`);

      expect(res.status).toBe(200);
      expect(res.body).toEqual({ items: [], total_items: 0, subtotal: 0 });
      expect(String(res.get('Set-Cookie'))).toMatch(/^session_id=[^;]+; Path=\/; HttpOnly; SameSite=Lax/);
      expect(await store.sessions.list()).toHaveLength(1);
    });

    it('reuses the session named by the cookie', async () => {
      const { app } = buildApp();
      const agent = request.agent(app);

      await agent.post(`${API}/cart/add`).send(widget).expect(201);
      const res = await agent.get(`${API}/cart`);

      expect(res.get('Set-Cookie')).toBeUndefined();
      expect(res.body.total_items).toBe(1);
    });

    it('keeps carts of different visitors apart', async () => {
      const { app } = buildApp();

      await request.agent(app).post(`${API}/cart/add`).send(widget).expect(201);
      const res = await request.agent(app).get(`${API}/cart`);

      expect(res.body.items).toEqual([]);
    });

    it('replaces a cookie the server never issued', async () => {
      const { app, store } = buildApp();

      const res = await request(app).get(`${API}/cart`).set('Cookie', 'session_id=forged');

      expect(String(res.get('Set-Cookie'))).toMatch(/^session_id=/);
      expect(String(res.get('Set-Cookie'))).not.toContain('session_id=forged');
      expect(await store.sessions.exists('forged')).toBe(false);
    });
  });

  describe('cart', () => {
    it('adds items and reports totals', async () => {
      const { app } = buildApp();

      const res = await request(app)
        .post(`${API}/cart/add`)
        .send({ product_id: 1, name: 'Test Product', price: 99.99, quantity: 2 });

      expect(res.status).toBe(201);
      expect(res.body).toEqual({
        items: [{ product_id: 1, name: 'Test Product', price: 99.99, quantity: 2 }],
        total_items: 2,
        subtotal: 199.98,
      });
    });

    it('defaults quantity to 1 and rounds the price to cents', async () => {
      const { app } = buildApp();

      const res = await request(app).post(`${API}/cart/add`).send({ product_id: 5, name: 'Cable', price: 9.499 });

      expect(res.status).toBe(201);
      expect(res.body.items).toEqual([{ product_id: 5, name: 'Cable', price: 9.5, quantity: 1 }]);
    });

    it.each([
      ['a negative price', { ...widget, price: -10 }],
      ['a zero quantity', { ...widget, quantity: 0 }],
      ['a fractional product id', { ...widget, product_id: 1.5 }],
      ['a missing name', { product_id: 1, price: 10 }],
      ['a price that rounds to zero', { ...widget, price: 0.001 }],
    ])('rejects %s with 422', async (_label, body) => {
      const { app } = buildApp();

      const res = await request(app).post(`${API}/cart/add`).send(body);

      expect(res.status).toBe(422);
      expect(res.body.code).toBe('VALIDATION_FAILED');
    });

    it.each([
      ['an overflowing price', '{"product_id":1,"name":"Test Product","price":1e999,"quantity":1}'],
      ['a price above the cap', '{"product_id":1,"name":"Test Product","price":1000000.01,"quantity":1}'],
      ['an unsafe quantity', '{"product_id":1,"name":"Test Product","price":10,"quantity":1e20}'],
      ['a quantity above the cap', '{"product_id":1,"name":"Test Product","price":10,"quantity":10001}'],
      ['an unsafe product id', '{"product_id":1e20,"name":"Test Product","price":10,"quantity":1}'],
    ])('rejects %s with 422', async (_label, raw) => {
      const { app, store } = buildApp();

      const res = await request(app).post(`${API}/cart/add`).set('Content-Type', 'application/json').send(raw);

      expect(res.status).toBe(422);
      expect(res.body.code).toBe('VALIDATION_FAILED');
      const [session] = await store.sessions.list();
      expect(await store.carts.get(session.id)).toEqual([]);
    });

    it('refuses an add that would push a line past the quantity cap', async () => {
      const { app } = buildApp();
      const agent = request.agent(app);
      await agent.post(`${API}/cart/add`).send({ ...widget, quantity: 10000 }).expect(201);

      const res = await agent.post(`${API}/cart/add`).send(widget);

      expect(res.status).toBe(400);
      expect(res.body).toEqual({ error: 'Quantity exceeds the per-line limit of 10000', code: 'QUANTITY_LIMIT' });
      const cart = await agent.get(`${API}/cart`);
      expect(cart.body.total_items).toBe(10000);
    });

    it('keeps statistics finite after a rejected oversized price', async () => {
      const { app } = buildApp();
      const agent = request.agent(app);
      await agent
        .post(`${API}/cart/add`)
        .set('Content-Type', 'application/json')
        .send('{"product_id":1,"name":"Test Product","price":1e999}')
        .expect(422);
      await agent.post(`${API}/cart/add`).send({ ...widget, price: 25 }).expect(201);
      await agent.post(`${API}/checkout`).send({}).expect(201);

      const res = await request(app).get(`${API}/admin/stats`);

      expect(res.body.total_purchase_amount).toBe(25);
      expect(res.body.average_order_value).toBe(25);
    });

    it('updates the quantity of an item in the cart', async () => {
      const { app } = buildApp();
      const agent = request.agent(app);
      await agent.post(`${API}/cart/add`).send({ product_id: 2, name: 'Another Product', price: 50, quantity: 1 });

      const res = await agent.put(`${API}/cart/update`).send({ product_id: 2, quantity: 5 });

      expect(res.status).toBe(200);
      expect(res.body.items[0].quantity).toBe(5);
      expect(res.body.subtotal).toBe(250);
    });

    it('returns 404 when updating a product that is not in the cart', async () => {
      const { app } = buildApp();

      const res = await request(app).put(`${API}/cart/update`).send({ product_id: 9999, quantity: 1 });

      expect(res.status).toBe(404);
      expect(res.body).toEqual({ error: 'Product 9999 not found in cart', code: 'NOT_FOUND' });
    });

    it('removes an item and returns 404 for one that is absent', async () => {
      const { app } = buildApp();
      const agent = request.agent(app);
      await agent.post(`${API}/cart/add`).send({ ...widget, product_id: 3 });

      const removed = await agent.delete(`${API}/cart/remove/3`);
      expect(removed.status).toBe(200);
      expect(removed.body.items).toEqual([]);

      const missing = await agent.delete(`${API}/cart/remove/3`);
      expect(missing.status).toBe(404);
    });

    it('rejects a non-numeric product id in the path', async () => {
      const { app } = buildApp();

      const res = await request(app).delete(`${API}/cart/remove/abc`);

      expect(res.status).toBe(422);
    });

    it('clears the cart with 204', async () => {
      const { app } = buildApp();
      const agent = request.agent(app);
      await agent.post(`${API}/cart/add`).send(widget);

      await agent.delete(`${API}/cart`).expect(204);
      const res = await agent.get(`${API}/cart`);

      expect(res.body).toEqual({ items: [], total_items: 0, subtotal: 0 });
    });

    it('answers 400 for malformed JSON', async () => {
      const { app } = buildApp();

      const res = await request(app)
        .post(`${API}/cart/add`)
        .set('Content-Type', 'application/json')
        .send('{"product_id":');

      expect(res.status).toBe(400);
      expect(res.body.code).toBe('BAD_REQUEST');
    });
  });

  describe('checkout', () => {
    async function sessionIdOf(app: ReturnType<typeof createApp>): Promise<string> {
      const users = await request(app).get(`${API}/admin/users`);
      return users.body[0].session_id;
    }

    it('checks out the cart without a discount', async () => {
      const { app } = buildApp();
      const agent = request.agent(app);
      await agent.post(`${API}/cart/add`).send({ ...widget, quantity: 2 });

      const res = await agent.post(`${API}/checkout`).send({ discount_code: '' });

      expect(res.status).toBe(201);
      expect(res.body).toMatchObject({
        subtotal: 200,
        discount_applied: false,
        discount_amount: 0,
        total_amount: 200,
        new_discount_code: null,
        message: 'Order placed successfully!',
      });
      expect(res.body.order_id).toEqual(expect.any(String));

      const cart = await agent.get(`${API}/cart`);
      expect(cart.body.items).toEqual([]);
    });

    it('accepts a request without a body', async () => {
      const { app } = buildApp();
      const agent = request.agent(app);
      await agent.post(`${API}/cart/add`).send(widget);

      const res = await agent.post(`${API}/checkout`);

      expect(res.status).toBe(201);
    });

    it('answers 500 with a generic message when the order log fails', async () => {
      class FailingOrders extends InMemoryOrderRepository {
        async createOrder(_sessionId: string, _draft: OrderDraft): Promise<Order | undefined> {
          throw new Error('order log unavailable at /var/shop');
        }
      }
      const { app } = buildApp({}, createShopStore({ orders: new FailingOrders() }));
      const agent = request.agent(app);
      await agent.post(`${API}/cart/add`).send(widget);

      const res = await agent.post(`${API}/checkout`).send({});

      expect(res.status).toBe(500);
      expect(res.body).toEqual({ error: 'An error occurred during checkout', code: 'INTERNAL_FAILURE' });
    });

    it('rejects an empty cart', async () => {
      const { app } = buildApp();

      const res = await request(app).post(`${API}/checkout`).send({});

      expect(res.status).toBe(400);
      expect(res.body).toEqual({ error: 'Cart is empty', code: 'EMPTY_CART' });
    });

    it('applies an admin-issued code once', async () => {
      const { app } = buildApp();
      const agent = request.agent(app);
      await agent.post(`${API}/cart/add`).send(widget);

      const issued = await request(app)
        .post(`${API}/admin/generate-discount`)
        .send({ session_id: await sessionIdOf(app) });
      expect(issued.status).toBe(201);
      expect(issued.body.message).toBe('Discount code generated successfully');
      const code: string = issued.body.discount_code;
      expect(code).toMatch(/^SAVE10[A-Z0-9]{8}$/);

      const first = await agent.post(`${API}/checkout`).send({ discount_code: code });
      expect(first.status).toBe(201);
      expect(first.body).toMatchObject({ discount_applied: true, discount_amount: 10, total_amount: 90 });

      await agent.post(`${API}/cart/add`).send(widget);
      const second = await agent.post(`${API}/checkout`).send({ discount_code: code });
      expect(second.status).toBe(400);
      expect(second.body).toEqual({ error: 'Discount code has already been used', code: 'DISCOUNT_ALREADY_USED' });
    });

    it('rejects an unknown code', async () => {
      const { app } = buildApp();
      const agent = request.agent(app);
      await agent.post(`${API}/cart/add`).send(widget);

      const res = await agent.post(`${API}/checkout`).send({ discount_code: 'INVALID123' });

      expect(res.status).toBe(400);
      expect(res.body).toEqual({ error: 'Invalid discount code', code: 'INVALID_DISCOUNT_CODE' });
      const cart = await agent.get(`${API}/cart`);
      expect(cart.body.total_items).toBe(1);
    });

    it('awards a discount code on the third order', async () => {
      const { app } = buildApp();
      const agent = request.agent(app);
      const codes: Array<string | null> = [];

      for (let i = 1; i <= 3; i++) {
        await agent.post(`${API}/cart/add`).send({ product_id: i, name: `Product ${i}`, price: 100, quantity: 1 });
        const res = await agent.post(`${API}/checkout`).send({ discount_code: '' });
        codes.push(res.body.new_discount_code);
      }

      expect(codes[0]).toBeNull();
      expect(codes[1]).toBeNull();
      expect(codes[2]).toMatch(/^SAVE10[A-Z0-9]{8}$/);
    });
  });

  describe('admin', () => {
    it('reports statistics', async () => {
      const { app } = buildApp();
      const agent = request.agent(app);
      await agent.post(`${API}/cart/add`).send({ ...widget, price: 40, quantity: 2 });
      await agent.post(`${API}/checkout`).send({});

      const res = await request(app).get(`${API}/admin/stats`);

      expect(res.status).toBe(200);
      expect(res.body).toEqual({
        total_orders: 1,
        total_items_purchased: 1,
        total_purchase_amount: 80,
        total_discount_amount: 0,
        discount_codes: [],
        average_order_value: 80,
        discount_utilization_rate: 0,
      });
    });

    it('refuses to issue a code for an unknown session', async () => {
      const { app } = buildApp();

      const res = await request(app).post(`${API}/admin/generate-discount`).send({ session_id: 'nope' });

      expect(res.status).toBe(404);
      expect(res.body).toEqual({ error: 'Unknown session: nope', code: 'NOT_FOUND' });
    });

    it('validates the generate-discount body', async () => {
      const { app } = buildApp();

      const res = await request(app).post(`${API}/admin/generate-discount`).send({});

      expect(res.status).toBe(422);
    });

    it('serves admin routes without credentials', async () => {
      const { app } = buildApp({ ADMIN_API_KEY: 'test-secret' });

      await request(app).get(`${API}/admin/stats`).expect(200);
    });

    it('does not mint sessions for admin calls', async () => {
      const { app } = buildApp();

      const res = await request(app).get(`${API}/admin/users`);

      expect(res.body).toEqual([]);
      expect(res.get('Set-Cookie')).toBeUndefined();
    });
  });

  describe('misc', () => {
    it('serves the product catalog', async () => {
      const { app } = buildApp();

      const res = await request(app).get(`${API}/products`);

      expect(res.status).toBe(200);
      expect(res.body.products).toHaveLength(6);
      expect(res.body.products[0]).toEqual({
        id: 1,
        name: 'Trail Backpack',
        price: 89.5,
        description: '28 litre daypack with rain cover',
      });
    });

    it('answers the health check', async () => {
      const { app } = buildApp();

      await request(app).get('/health').expect(200, { status: 'ok' });
    });

    it('returns 404 JSON for unknown routes', async () => {
      const { app } = buildApp();

      const res = await request(app).get(`${API}/nowhere`);

      expect(res.status).toBe(404);
      expect(res.body.code).toBe('NOT_FOUND');
    });
  });
});
