// Express provides routing for the checkout endpoint.
import express from 'express';
import { CheckoutSchema } from '../shop/shopSchemas';
import { CheckoutService } from '../services/CheckoutService';
import { sessionIdOf } from '../middleware/sessionCookie';

export function checkoutRouter(checkout: CheckoutService): express.Router {
  const router = express.Router();

  /**
   * POST /checkout
   * Converts the session's cart into an order, applying an optional discount code.
   * Every nth order earns a new code, returned as new_discount_code.
   * 400 for an empty cart, an unknown code or a code that was already used.
   */
  router.post('/', async (req, res, next) => {
    try {
      const input = CheckoutSchema.parse(req.body ?? {});
      const result = await checkout.checkout(sessionIdOf(res), input.discount_code);
      res.status(201).json(result);
    } catch (e) {
      next(e);
    }
  });

  return router;
}
