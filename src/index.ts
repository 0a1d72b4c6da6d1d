// dotenv loads .env values into process.env for local development.
import 'dotenv/config';

import { createApp } from './app';
import { env, toShopSettings } from './config';
import { logger } from './logger';
import { createShopStore } from './storage/shopStore';

const settings = toShopSettings(env);
// One store per process; state is lost on restart.
const store = createShopStore();
const app = createApp({ settings, store });

// Bind to configured host/port (default 127.0.0.1:8000) for local dev/testing.
const port = Number(env.PORT || 8000);
const host = env.HOST || '127.0.0.1';
const server = app.listen(port, host, () => {
  logger.info(
    { host, port, apiPrefix: settings.apiPrefix, nthOrder: settings.discount.nthOrder },
    `Shop API listening on http://${host}:${port}`,
  );
});

function shutdown(signal: string): void {
  logger.info({ signal }, 'Shutting down');
  server.close(err => {
    if (err) {
      logger.error({ err }, 'Error during shutdown');
      process.exit(1);
    }
    process.exit(0);
  });
}

process.on('SIGTERM', () => shutdown('SIGTERM'));
process.on('SIGINT', () => shutdown('SIGINT'));
