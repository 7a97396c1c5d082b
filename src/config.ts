import 'dotenv/config';
import { z } from 'zod';

const csv = z
  .string()
  .default('')
  .transform((s) =>
    s
      .split(',')
      .map((x) => x.trim())
      .filter(Boolean)
  );

/**
 * Centralized environment validation.
 * - Intervals and timeouts are in seconds unless the name says MS.
 * - PREPAY_PERCENT drives the prepay/remainder split of an order total.
 * - OPERATOR_RECIPIENTS: comma-separated messaging ids that receive alerts.
 */
const Schema = z.object({
  NODE_ENV: z.string().default('development'),
  PORT: z.coerce.number().default(3000),
  TRUST_PROXY: z.coerce.number().int().min(0).default(0), // reverse-proxy hops; X-Forwarded-For is ignored at 0
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
  DATABASE_URL: z.string().default(''),
  ADMIN_TOKEN: z.string().default(''),
  OPERATOR_RECIPIENTS: csv,

  // Messaging (WhatsApp Cloud)
  WHATSAPP_TOKEN: z.string().default(''),
  PHONE_NUMBER_ID: z.string().default(''),
  GRAPH_API_VERSION: z.string().default('v19.0'),

  // Payment gateway
  PSP_BASE_URL: z.string().default(''),
  PSP_SHOP_ID: z.string().default(''),
  PSP_SECRET_KEY: z.string().default(''),
  PSP_RETURN_URL: z.string().default(''),
  PSP_WEBHOOK_SECRET: z.string().default(''), // when set, x-psp-signature is verified
  PSP_WEBHOOK_ALLOWED_IPS: csv,               // IPs or CIDRs; empty = no origin filter
  PSP_TIMEOUT_MS: z.coerce.number().int().positive().default(15_000),
  CURRENCY: z.string().length(3).default('RUB'),
  PREPAY_PERCENT: z.coerce.number().int().min(1).max(99).default(30),
  PAYMENT_TIMEOUT_SEC: z.coerce.number().int().positive().default(600),
  SWEEP_INTERVAL_SEC: z.coerce.number().int().positive().default(60),

  // Carrier
  CARRIER_BASE_URL: z.string().default(''),
  CARRIER_CLIENT_ID: z.string().default(''),
  CARRIER_CLIENT_SECRET: z.string().default(''),
  CARRIER_TIMEOUT_MS: z.coerce.number().int().positive().default(30_000),
  CARRIER_SHIPMENT_POINT: z.string().default(''),
  CARRIER_TARIFF_CODE: z.coerce.number().int().default(136),
  PACKAGE_WEIGHT_G: z.coerce.number().int().positive().default(750),
  PACKAGE_LENGTH_CM: z.coerce.number().int().positive().default(26),
  PACKAGE_WIDTH_CM: z.coerce.number().int().positive().default(19),
  PACKAGE_HEIGHT_CM: z.coerce.number().int().positive().default(8),
  POLL_INTERVAL_SEC: z.coerce.number().int().positive().default(300),

  // Outbox / locks
  OUTBOX_INTERVAL_SEC: z.coerce.number().int().positive().default(5),
  OUTBOX_MAX_ATTEMPTS: z.coerce.number().int().positive().default(5),
  LOCK_SHARDS: z.coerce.number().int().positive().default(64),
});

export type Env = z.infer<typeof Schema>;

export function parseEnv(source: Record<string, string | undefined>): Env {
  return Schema.parse(source);
}

export const env = parseEnv(process.env);

/**
 * Warn about credentials that are empty at boot, without crashing the
 * process (the HTTP surface still serves status reads).
 */
export function assertCriticalEnv(keys: Array<keyof Env>, source: Env = env): Array<keyof Env> {
  const missing = keys.filter((k) => {
    const v = source[k];
    return v === undefined || v === '' || (Array.isArray(v) && v.length === 0);
  });
  if (missing.length) {
    // eslint-disable-next-line no-console
    console.warn('[config] Missing recommended env:', missing.join(', '));
  }
  return missing;
}
