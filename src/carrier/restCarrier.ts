// src/carrier/restCarrier.ts
// HTTP client for the carrier's order API (OAuth client-credentials).

import { fetch, type Dispatcher, type Response } from 'undici';
import { z } from 'zod';
import { env } from '../config.js';
import { CarrierError, errorMessage } from '../errors.js';
import { createLogger } from '../logger.js';
import type { CarrierClient, CreatedShipment, ShipmentInfo, ShipmentSnapshot } from './carrier.js';

const log = createLogger('carrier');

export type PackageSpec = { weightG: number; lengthCm: number; widthCm: number; heightCm: number };

export type RestCarrierOptions = {
  baseUrl: string;
  clientId: string;
  clientSecret: string;
  shipmentPoint: string;
  tariffCode: number;
  packageSpec: PackageSpec;
  itemName: string;
  timeoutMs: number;
  dispatcher?: Dispatcher;
  now?: () => number;
};

const TokenResponse = z.object({
  access_token: z.string().min(1),
  expires_in: z.coerce.number().positive().default(3600),
});

const CreateResponse = z.object({
  entity: z.object({ uuid: z.string().min(1) }),
});

const InfoResponse = z.object({
  entity: z.object({
    uuid: z.string().min(1),
    tracking_number: z.string().nullish(),
    status: z
      .object({ code: z.string().nullish(), description: z.string().nullish() })
      .nullish(),
  }),
});

/** Strip everything but digits and a leading plus. */
export function normalizePhone(phone: string): string {
  const digits = phone.replace(/[^\d]/g, '');
  return phone.trim().startsWith('+') ? `+${digits}` : digits;
}

export class RestCarrierClient implements CarrierClient {
  private readonly base: string;
  private cachedToken = '';
  private tokenExp = 0;

  constructor(private readonly opts: RestCarrierOptions) {
    this.base = opts.baseUrl.replace(/\/$/, '');
  }

  private now(): number {
    return this.opts.now ? this.opts.now() : Date.now();
  }

  private async getToken(): Promise<string> {
    const now = this.now();
    if (this.cachedToken && now < this.tokenExp - 10_000) return this.cachedToken;

    const form = new URLSearchParams({
      grant_type: 'client_credentials',
      client_id: this.opts.clientId,
      client_secret: this.opts.clientSecret,
    });
    const res = await this.send('/oauth/token', {
      method: 'POST',
      headers: { 'Content-Type': 'application/x-www-form-urlencoded' },
      body: form.toString(),
    });
    const data = await this.parse(res, TokenResponse, 'token');
    this.cachedToken = data.access_token;
    this.tokenExp = now + data.expires_in * 1000;
    return this.cachedToken;
  }

  buildPayload(s: ShipmentSnapshot): Record<string, unknown> {
    const pkg = this.opts.packageSpec;
    const declared = Math.floor(s.declaredValueMinor / 100);
    return {
      type: 2,
      number: s.idempotencyKey,
      tariff_code: this.opts.tariffCode,
      comment: s.comment,
      shipment_point: this.opts.shipmentPoint,
      delivery_recipient_cost: { value: 0 },
      to_location: {
        code: s.pickupPoint.code,
        address: s.pickupPoint.address,
        postal_code: s.pickupPoint.postalCode ?? '',
      },
      recipient: {
        name: s.recipient.name,
        email: s.recipient.email ?? undefined,
        phones: [{ number: normalizePhone(s.recipient.phone) }],
      },
      packages: [
        {
          number: s.idempotencyKey,
          weight: pkg.weightG,
          length: pkg.lengthCm,
          width: pkg.widthCm,
          height: pkg.heightCm,
          items: [
            {
              name: this.opts.itemName,
              ware_key: s.idempotencyKey,
              payment: { value: 0 },
              cost: declared,
              weight: pkg.weightG,
              amount: 1,
            },
          ],
        },
      ],
      services: [{ code: 'INSURANCE', parameter: declared }],
    };
  }

  async createShipment(snapshot: ShipmentSnapshot): Promise<CreatedShipment> {
    const token = await this.getToken();
    const res = await this.send('/orders', {
      method: 'POST',
      headers: { Authorization: `Bearer ${token}`, 'Content-Type': 'application/json' },
      body: JSON.stringify(this.buildPayload(snapshot)),
    });
    const data = await this.parse(res, CreateResponse, 'create shipment');
    log.info({ orderId: snapshot.orderId, carrierId: data.entity.uuid }, 'carrier accepted shipment');
    return { carrierId: data.entity.uuid, raw: data };
  }

  async getShipment(carrierId: string): Promise<ShipmentInfo> {
    const token = await this.getToken();
    const res = await this.send(`/orders/${encodeURIComponent(carrierId)}`, {
      method: 'GET',
      headers: { Authorization: `Bearer ${token}` },
    });
    const data = await this.parse(res, InfoResponse, 'get shipment');
    return {
      carrierId: data.entity.uuid,
      trackingNumber: data.entity.tracking_number || null,
      statusCode: data.entity.status?.code ?? null,
      statusDescription: data.entity.status?.description ?? null,
      raw: data,
    };
  }

  private async send(path: string, init: { method: string; headers: Record<string, string>; body?: string }): Promise<Response> {
    try {
      return await fetch(`${this.base}${path}`, {
        ...init,
        signal: AbortSignal.timeout(this.opts.timeoutMs),
        dispatcher: this.opts.dispatcher,
      });
    } catch (err) {
      throw new CarrierError(`${init.method} ${path} failed: ${errorMessage(err)}`, { cause: err });
    }
  }

  private async parse<T extends z.ZodTypeAny>(res: Response, schema: T, what: string): Promise<z.infer<T>> {
    if (!res.ok) {
      const txt = await res.text().catch(() => '');
      throw new CarrierError(`Carrier ${what} returned ${res.status}: ${txt.slice(0, 300)}`, { status: res.status });
    }
    let json: unknown;
    try {
      json = await res.json();
    } catch (err) {
      throw new CarrierError(`Carrier ${what} returned invalid JSON`, { cause: err });
    }
    const parsed = schema.safeParse(json);
    if (!parsed.success) {
      throw new CarrierError(`Carrier ${what} returned an unexpected body`, { cause: parsed.error });
    }
    return parsed.data;
  }
}

export function carrierFromEnv(): RestCarrierClient {
  return new RestCarrierClient({
    baseUrl: env.CARRIER_BASE_URL,
    clientId: env.CARRIER_CLIENT_ID,
    clientSecret: env.CARRIER_CLIENT_SECRET,
    shipmentPoint: env.CARRIER_SHIPMENT_POINT,
    tariffCode: env.CARRIER_TARIFF_CODE,
    packageSpec: {
      weightG: env.PACKAGE_WEIGHT_G,
      lengthCm: env.PACKAGE_LENGTH_CM,
      widthCm: env.PACKAGE_WIDTH_CM,
      heightCm: env.PACKAGE_HEIGHT_CM,
    },
    itemName: 'Gift box',
    timeoutMs: env.CARRIER_TIMEOUT_MS,
  });
}
