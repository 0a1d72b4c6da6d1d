// Express provides the HTTP server and routing.
import express from 'express';
// Helmet adds secure HTTP headers.
import helmet from 'helmet';
// Morgan logs HTTP requests in a standard format.
import morgan from 'morgan';
// cookie-parser populates req.cookies for the session cookie.
import cookieParser from 'cookie-parser';

import { ShopSettings } from './config';
import { mapError } from './errors/mapError';
import { Logger, logger as defaultLogger } from './logger';
import { sessionCookie } from './middleware/sessionCookie';
import { adminRouter } from './routes/admin';
import { cartRouter } from './routes/cart';
import { checkoutRouter } from './routes/checkout';
import { productsRouter } from './routes/products';
import { AdminService } from './services/AdminService';
import { CartService } from './services/CartService';
import { CheckoutService } from './services/CheckoutService';
import { DiscountService } from './services/DiscountService';
import { ProductService } from './services/ProductService';
import { ShopStore } from './storage/shopStore';

export interface AppOptions {
  settings: ShopSettings;
  store: ShopStore;
  products?: ProductService;
  logger?: Logger;
}

// Builds the REST surface around an explicitly constructed store; nothing here listens.
export function createApp(options: AppOptions): express.Express {
  const { settings, store } = options;
  const log = options.logger ?? defaultLogger;

  const discounts = new DiscountService(store, settings.discount);
  const cart = new CartService(store);
  const checkout = new CheckoutService(store, settings.discount, discounts);
  const admin = new AdminService(store);
  const products = options.products ?? ProductService.fromFile();

  const app = express();

  // Helmet sets security-related headers for the HTTP API.
  app.use(helmet());
  // JSON body parser for incoming requests.
  app.use(express.json({ limit: '1mb' }));
  app.use(cookieParser());
  // Morgan access lines go through the structured logger.
  app.use(morgan('combined', { stream: { write: line => log.info(line.trim()) } }));

  // Basic health check for the process.
  app.get('/health', (_req, res) => res.json({ status: 'ok' }));

  const prefix = settings.apiPrefix;
  app.get(prefix || '/', (_req, res) => {
    res.json({
      name: 'session-shop-api',
      endpoints: ['/cart', '/checkout', '/products', '/admin/stats', '/admin/users', '/admin/generate-discount'].map(
        p => `${prefix}${p}`,
      ),
      health: '/health',
    });
  });

  const withSession = sessionCookie(store.sessions, { secure: settings.secureCookies });
  app.use(`${prefix}/cart`, withSession, cartRouter(cart));
  app.use(`${prefix}/checkout`, withSession, checkoutRouter(checkout));
  app.use(`${prefix}/products`, productsRouter(products));
  app.use(`${prefix}/admin`, adminRouter(admin, discounts));

  app.use((_req, res) => {
    res.status(404).json({ error: 'Not Found', code: 'NOT_FOUND' });
  });

  // Error handler that maps domain and validation errors onto HTTP responses.
  app.use((err: unknown, req: express.Request, res: express.Response, _next: express.NextFunction) => {
    const mapped = mapError(err);
    if (mapped.status >= 500) {
      log.error({ err, method: req.method, path: req.path }, 'Request failed');
    }
    res.status(mapped.status).json({ error: mapped.error, code: mapped.code, issues: mapped.issues });
  });

  return app;
}
