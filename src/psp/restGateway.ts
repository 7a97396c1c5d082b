// src/psp/restGateway.ts
// HTTP client for the payment service provider (redirect-confirmation REST API).

import { randomUUID } from 'node:crypto';
import { fetch, type Dispatcher, type Response } from 'undici';
import { z } from 'zod';
import { env } from '../config.js';
import { GatewayError, errorMessage } from '../errors.js';
import { createLogger } from '../logger.js';
import type { CreateIntentInput, GatewayPaymentStatus, PaymentGateway, PaymentIntent } from './gateway.js';

const log = createLogger('psp');

export type RestGatewayOptions = {
  baseUrl: string;
  shopId: string;
  secretKey: string;
  currency: string;
  timeoutMs: number;
  dispatcher?: Dispatcher;
};

const PaymentResponse = z.object({
  id: z.string().min(1),
  status: z.string(),
  confirmation: z.object({ confirmation_url: z.string().url() }).partial().optional(),
});

/** Provider statuses to the three the engine cares about. */
export function mapProviderStatus(status: string): GatewayPaymentStatus {
  switch (status.toLowerCase()) {
    case 'succeeded':
      return 'succeeded';
    case 'canceled':
    case 'cancelled':
    case 'failed':
      return 'failed';
    default:
      return 'pending'; // pending, waiting_for_capture, ...
  }
}

/** Minor units to the provider's decimal string, e.g. 599000 -> "5990.00". */
export function toAmountValue(minor: number): string {
  return `${Math.floor(minor / 100)}.${String(minor % 100).padStart(2, '0')}`;
}

export class RestPaymentGateway implements PaymentGateway {
  private readonly base: string;
  private readonly auth: string;

  constructor(private readonly opts: RestGatewayOptions) {
    this.base = opts.baseUrl.replace(/\/$/, '');
    this.auth = `Basic ${Buffer.from(`${opts.shopId}:${opts.secretKey}`).toString('base64')}`;
  }

  async createIntent(input: CreateIntentInput): Promise<PaymentIntent> {
    const body = {
      amount: { value: toAmountValue(input.amountMinor), currency: this.opts.currency },
      confirmation: { type: 'redirect', return_url: input.returnUrl },
      capture: true,
      description: input.description,
      metadata: {
        order_id: String(input.orderId),
        owner_ref: input.ownerRef,
        payment_kind: input.kind,
      },
    };
    const data = await this.request('POST', '/payments', body);
    const url = data.confirmation?.confirmation_url;
    if (!url) throw new GatewayError(`Payment ${data.id} has no confirmation url`);
    log.info({ orderId: input.orderId, kind: input.kind, gatewayId: data.id }, 'payment intent created');
    return { gatewayId: data.id, confirmationUrl: url, status: mapProviderStatus(data.status) };
  }

  async queryStatus(gatewayId: string): Promise<GatewayPaymentStatus> {
    const data = await this.request('GET', `/payments/${encodeURIComponent(gatewayId)}`);
    return mapProviderStatus(data.status);
  }

  private async request(method: 'GET' | 'POST', path: string, body?: unknown): Promise<z.infer<typeof PaymentResponse>> {
    const headers: Record<string, string> = { Authorization: this.auth };
    if (body !== undefined) {
      headers['Content-Type'] = 'application/json';
      headers['Idempotence-Key'] = randomUUID();
    }

    let res: Response;
    try {
      res = await fetch(`${this.base}${path}`, {
        method,
        headers,
        body: body === undefined ? undefined : JSON.stringify(body),
        signal: AbortSignal.timeout(this.opts.timeoutMs),
        dispatcher: this.opts.dispatcher,
      });
    } catch (err) {
      // timeouts land here too; silence is never treated as success
      throw new GatewayError(`${method} ${path} failed: ${errorMessage(err)}`, { cause: err });
    }

    if (!res.ok) {
      const txt = await res.text().catch(() => '');
      throw new GatewayError(`${method} ${path} returned ${res.status}: ${txt.slice(0, 300)}`, { status: res.status });
    }

    let json: unknown;
    try {
      json = await res.json();
    } catch (err) {
      throw new GatewayError(`${method} ${path} returned invalid JSON`, { cause: err });
    }
    const parsed = PaymentResponse.safeParse(json);
    if (!parsed.success) {
      throw new GatewayError(`${method} ${path} returned an unexpected body`, { cause: parsed.error });
    }
    return parsed.data;
  }
}

export function gatewayFromEnv(): RestPaymentGateway {
  return new RestPaymentGateway({
    baseUrl: env.PSP_BASE_URL,
    shopId: env.PSP_SHOP_ID,
    secretKey: env.PSP_SECRET_KEY,
    currency: env.CURRENCY,
    timeoutMs: env.PSP_TIMEOUT_MS,
  });
}
