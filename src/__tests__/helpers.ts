// Shared fixtures: an in-memory database and fakes behind the client contracts.
import knex, { type Knex } from 'knex';
import type { CarrierClient, CreatedShipment, ShipmentInfo, ShipmentSnapshot } from '../carrier/carrier.js';
import { parseEnv } from '../config.js';
import { migrationSource } from '../db/migrations/index.js';
import { Engine } from '../engine.js';
import { GatewayError } from '../errors.js';
import type { NotificationTransport } from '../notify/transport.js';
import type { CreateIntentInput, GatewayPaymentStatus, PaymentGateway, PaymentIntent } from '../psp/gateway.js';
import type { Customer, FulfillmentKind, Order, OrderExtension, OrderStatus, PaymentKind } from '../types.js';

export const OPERATOR = 'ops-1';
export const BUYER = 'buyer-1';

export const settings = parseEnv({
  OPERATOR_RECIPIENTS: OPERATOR,
  PSP_RETURN_URL: 'https://shop.example.test/return',
  LOCK_SHARDS: '8',
});

export async function createTestDb(): Promise<Knex> {
  const db = knex({
    client: 'better-sqlite3',
    connection: { filename: ':memory:' },
    useNullAsDefault: true,
    // one connection: every query sees the same in-memory database
    pool: { min: 1, max: 1 },
  });
  await db.migrate.latest({ migrationSource });
  return db;
}

export const sleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

export class FakeGateway implements PaymentGateway {
  readonly created: CreateIntentInput[] = [];
  readonly queried: string[] = [];
  readonly statuses = new Map<string, GatewayPaymentStatus>();
  readonly failingQueries = new Set<string>();
  failCreate: Error | null = null;
  private seq = 0;

  async createIntent(input: CreateIntentInput): Promise<PaymentIntent> {
    if (this.failCreate) throw this.failCreate;
    this.created.push(input);
    const gatewayId = `pay-${++this.seq}`;
    this.statuses.set(gatewayId, 'pending');
    return { gatewayId, confirmationUrl: `https://pay.example.test/${gatewayId}`, status: 'pending' };
  }

  async queryStatus(gatewayId: string): Promise<GatewayPaymentStatus> {
    this.queried.push(gatewayId);
    if (this.failingQueries.has(gatewayId)) throw new GatewayError(`GET /payments/${gatewayId} failed: timeout`);
    return this.statuses.get(gatewayId) ?? 'pending';
  }
}

export class FakeCarrier implements CarrierClient {
  readonly createCalls: ShipmentSnapshot[] = [];
  readonly infoCalls: string[] = [];
  readonly info = new Map<string, Partial<Omit<ShipmentInfo, 'carrierId' | 'raw'>>>();
  failCreate: Error | null = null;
  failInfo: Error | null = null;
  createDelayMs = 0;

  async createShipment(snapshot: ShipmentSnapshot): Promise<CreatedShipment> {
    this.createCalls.push(snapshot);
    if (this.createDelayMs) await sleep(this.createDelayMs);
    if (this.failCreate) throw this.failCreate;
    const carrierId = `cr-${snapshot.idempotencyKey}-${this.createCalls.length}`;
    return { carrierId, raw: { entity: { uuid: carrierId } } };
  }

  async getShipment(carrierId: string): Promise<ShipmentInfo> {
    this.infoCalls.push(carrierId);
    if (this.failInfo) throw this.failInfo;
    const info = this.info.get(carrierId) ?? {};
    return {
      carrierId,
      trackingNumber: info.trackingNumber ?? null,
      statusCode: info.statusCode ?? null,
      statusDescription: info.statusDescription ?? null,
      raw: { entity: { uuid: carrierId } },
    };
  }
}

export class RecordingTransport implements NotificationTransport {
  readonly sent: Array<{ recipient: string; text: string }> = [];
  readonly failingRecipients = new Set<string>();

  async send(recipient: string, text: string): Promise<void> {
    if (this.failingRecipients.has(recipient)) throw new Error(`send to ${recipient} refused`);
    this.sent.push({ recipient, text });
  }
}

export type Harness = {
  db: Knex;
  engine: Engine;
  gateway: FakeGateway;
  carrier: FakeCarrier;
  transport: RecordingTransport;
  /** Offset added to the wall clock the sweeper sees. */
  advance(seconds: number): void;
};

export async function createHarness(): Promise<Harness> {
  const db = await createTestDb();
  const gateway = new FakeGateway();
  const carrier = new FakeCarrier();
  const transport = new RecordingTransport();
  let offsetMs = 0;
  const engine = new Engine({
    db,
    gateway,
    carrier,
    transport,
    settings,
    now: () => new Date(Date.now() + offsetMs),
  });
  return {
    db,
    engine,
    gateway,
    carrier,
    transport,
    advance(seconds) {
      offsetMs += seconds * 1000;
    },
  };
}

export const PICKUP = { code: 'MSK-101', address: 'Tverskaya 1, Moscow', postalCode: '125009' };

export const CUSTOMER: Omit<Customer, 'ref'> = {
  fullName: 'Anna Petrova',
  phone: '+7 (900) 000-00-01',
  email: 'anna@example.test',
};

export type SeedOrder = {
  status?: OrderStatus;
  paidKind?: PaymentKind | null;
  fulfillment?: FulfillmentKind;
  totalMinor?: number;
  trackingId?: string | null;
  extension?: OrderExtension;
  withCustomer?: boolean;
};

/** Insert an order straight into a given state, bypassing the validator. */
export async function seedOrder(h: Harness, seed: SeedOrder = {}): Promise<Order> {
  const created = await h.engine.orders.createOrder({
    ownerRef: BUYER,
    totalMinor: seed.totalMinor ?? 599000,
    fulfillment: seed.fulfillment ?? 'full',
    extension: seed.extension ?? { pickupPoint: PICKUP },
    customer: seed.withCustomer === false ? undefined : CUSTOMER,
  });
  await h.db('orders')
    .where({ id: created.id })
    .update({
      status: seed.status ?? 'new',
      paid_kind: seed.paidKind ?? null,
      tracking_id: seed.trackingId ?? null,
    });
  const order = await h.engine.store.getOrder(created.id);
  if (!order) throw new Error('seeded order vanished');
  return order;
}

export async function textsFor(h: Harness, recipient: string): Promise<string[]> {
  const rows = await h.engine.store.listNotifications(recipient);
  return rows.map((n) => n.text);
}
