// Express provides routing for cart endpoints.
import express from 'express';
import { AddToCartSchema, ProductIdParamSchema, UpdateCartSchema } from '../shop/shopSchemas';
import { CartService } from '../services/CartService';
import { sessionIdOf } from '../middleware/sessionCookie';

// Express router for the caller's cart; expects sessionCookie to run first.
export function cartRouter(cart: CartService): express.Router {
  const router = express.Router();

  // GET /cart
  // Returns current cart contents with item count and subtotal.
  router.get('/', async (_req, res, next) => {
    try {
      res.json(await cart.getCart(sessionIdOf(res)));
    } catch (e) {
      next(e);
    }
  });

  // POST /cart/add
  // Adds a product, merging quantity into an existing line for the same product id.
  router.post('/add', async (req, res, next) => {
    try {
      const input = AddToCartSchema.parse(req.body);
      const view = await cart.addItem(sessionIdOf(res), input.product_id, input.name, input.price, input.quantity);
      res.status(201).json(view);
    } catch (e) {
      next(e);
    }
  });

  // PUT /cart/update
  // Sets the quantity of a product already in the cart (404 otherwise).
  router.put('/update', async (req, res, next) => {
    try {
      const input = UpdateCartSchema.parse(req.body);
      res.json(await cart.updateItem(sessionIdOf(res), input.product_id, input.quantity));
    } catch (e) {
      next(e);
    }
  });

  // DELETE /cart/remove/:productId
  router.delete('/remove/:productId', async (req, res, next) => {
    try {
      const productId = ProductIdParamSchema.parse(req.params.productId);
      res.json(await cart.removeItem(sessionIdOf(res), productId));
    } catch (e) {
      next(e);
    }
  });

  // DELETE /cart
  // Empties the cart; always succeeds.
  router.delete('/', async (_req, res, next) => {
    try {
      await cart.clearCart(sessionIdOf(res));
      res.status(204).end();
    } catch (e) {
      next(e);
    }
  });

  return router;
}
