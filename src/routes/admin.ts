// Express provides routing for admin endpoints.
import express from 'express';
import { GenerateDiscountSchema } from '../shop/shopSchemas';
import { AdminService } from '../services/AdminService';
import { DiscountService } from '../services/DiscountService';

// Express router for store statistics and manual discount issuance.
export function adminRouter(admin: AdminService, discounts: DiscountService): express.Router {
  const router = express.Router();

  // GET /admin/stats
  router.get('/stats', async (_req, res, next) => {
    try {
      res.json(await admin.getStatistics());
    } catch (e) {
      next(e);
    }
  });

  // POST /admin/generate-discount
  // Issues a code to the given session; a still-unused code is returned instead of a new one.
  router.post('/generate-discount', async (req, res, next) => {
    try {
      const input = GenerateDiscountSchema.parse(req.body);
      const code = await discounts.issueForSession(input.session_id);
      res.status(201).json({ discount_code: code, message: 'Discount code generated successfully' });
    } catch (e) {
      next(e);
    }
  });

  // GET /admin/users
  router.get('/users', async (_req, res, next) => {
    try {
      res.json(await admin.getUsers());
    } catch (e) {
      next(e);
    }
  });

  return router;
}
