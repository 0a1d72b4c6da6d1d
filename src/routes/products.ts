// Express provides routing for the product catalog.
import express from 'express';
import { ProductService } from '../services/ProductService';

export function productsRouter(products: ProductService): express.Router {
  const router = express.Router();

  // GET /products
  router.get('/', (_req, res) => {
    res.json(products.getProducts());
  });

  return router;
}
