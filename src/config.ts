// Zod provides runtime validation for environment variables.
import { z } from 'zod';

const EnvSchema = z.object({
  PORT: z.string().optional(),
  HOST: z.string().optional(),
  API_PREFIX: z.string().startsWith('/').default('/api/v1'),
  NTH_ORDER_DISCOUNT: z.coerce.number().int().min(1).default(3),
  DISCOUNT_PERCENTAGE: z.coerce.number().min(0).max(100).default(10),
  DISCOUNT_CODE_PREFIX: z.string().min(1).default('SAVE10'),
  DISCOUNT_CODE_LENGTH: z.coerce.number().int().min(1).max(64).default(8),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
  COOKIE_SECURE: z.string().optional(),
});

// Inferred type keeps TS in sync with the runtime schema.
export type Env = z.infer<typeof EnvSchema>;

// Parses an environment map; exported so tests can validate arbitrary inputs.
export function parseEnv(source: NodeJS.ProcessEnv): Env {
  return EnvSchema.parse(source);
}

// Parse process.env once and export a typed, validated config object.
export const env: Env = parseEnv(process.env);

// Discount rules injected into the checkout workflow and the admin issuer.
export interface DiscountSettings {
  nthOrder: number;
  percent: number;
  codePrefix: string;
  codeLength: number;
}

export interface ShopSettings {
  apiPrefix: string;
  discount: DiscountSettings;
  secureCookies: boolean;
}

// Converts the flat env representation into the settings handed to createApp.
export function toShopSettings(source: Env): ShopSettings {
  return {
    apiPrefix: source.API_PREFIX.replace(/\/$/, ''),
    discount: {
      nthOrder: source.NTH_ORDER_DISCOUNT,
      percent: source.DISCOUNT_PERCENTAGE,
      codePrefix: source.DISCOUNT_CODE_PREFIX,
      codeLength: source.DISCOUNT_CODE_LENGTH,
    },
    secureCookies: source.COOKIE_SECURE === 'true',
  };
}
