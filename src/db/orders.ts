// src/db/orders.ts
// Order store: the durable source of truth. Status writes only happen through
// compareAndSet(), which the transition validator (orderState.ts) wraps.

import type { Knex } from 'knex';
import { z } from 'zod';
import {
  ORDER_STATUSES,
  PAYMENT_KINDS,
  type AttemptStatus,
  type Customer,
  type FulfillmentKind,
  type Notification,
  type Order,
  type OrderExtension,
  type OrderStatus,
  type OutgoingNotification,
  type PaymentAttempt,
  type PaymentKind,
  type ShipmentRequest,
  type ShipmentState,
} from '../types.js';

/* ------------------------------- Row shapes ------------------------------- */

type DbTime = Date | string | number;

interface OrderRow {
  id: number;
  owner_ref: string;
  total_minor: number;
  fulfillment: string;
  status: string;
  paid_kind: string | null;
  tracking_id: string | null;
  extension: unknown;
  version: number;
  created_at: DbTime;
  updated_at: DbTime;
  status_changed_at: DbTime;
}

interface CustomerRow {
  ref: string;
  full_name: string | null;
  phone: string | null;
  email: string | null;
}

interface AttemptRow {
  gateway_id: string;
  order_id: number;
  kind: string;
  amount_minor: number;
  status: string;
  confirmation_url: string | null;
  created_at: DbTime;
  updated_at: DbTime;
}

interface ShipmentRow {
  order_id: number;
  carrier_id: string | null;
  state: string;
  last_status_code: string | null;
  last_status_description: string | null;
  terminal: boolean | number;
  raw: unknown;
  created_at: DbTime;
  updated_at: DbTime;
}

interface NotificationRow {
  id: number;
  recipient: string;
  text: string;
  attempts: number;
  last_error: string | null;
  created_at: DbTime;
  sent_at: DbTime | null;
}

/* ------------------------------- Decoding --------------------------------- */

const StatusSchema = z.enum(ORDER_STATUSES);
const KindSchema = z.enum(PAYMENT_KINDS);
const FulfillmentSchema = z.enum(['full', 'prepay']);
const AttemptStatusSchema = z.enum(['pending', 'succeeded', 'failed']);
const ShipmentStateSchema = z.enum(['requested', 'accepted', 'failed']);

export const PickupPointSchema = z.object({
  code: z.string().min(1),
  address: z.string(),
  postalCode: z.string().optional(),
  cityCode: z.string().optional(),
});

export const OrderExtensionSchema = z
  .object({
    pickupPoint: PickupPointSchema.optional(),
    deliveryCostMinor: z.number().int().nonnegative().optional(),
    deliveryPeriod: z.string().optional(),
    giftText: z.string().optional(),
    pendingPayments: z
      .object({ full: z.string(), prepay: z.string(), remainder: z.string() })
      .partial()
      .optional(),
    paymentId: z.string().optional(),
  })
  .passthrough();

/** pg hands json back parsed, sqlite as text. */
function readJson(value: unknown): unknown {
  if (typeof value === 'string') return JSON.parse(value);
  return value ?? null;
}

function toDate(value: DbTime): Date {
  return value instanceof Date ? value : new Date(value);
}

function toOrder(row: OrderRow): Order {
  return {
    id: Number(row.id),
    ownerRef: row.owner_ref,
    totalMinor: Number(row.total_minor),
    fulfillment: FulfillmentSchema.parse(row.fulfillment),
    status: StatusSchema.parse(row.status),
    paidKind: row.paid_kind == null ? null : KindSchema.parse(row.paid_kind),
    trackingId: row.tracking_id,
    extension: OrderExtensionSchema.parse(readJson(row.extension) ?? {}),
    createdAt: toDate(row.created_at),
    updatedAt: toDate(row.updated_at),
    statusChangedAt: toDate(row.status_changed_at),
  };
}

function toAttempt(row: AttemptRow): PaymentAttempt {
  return {
    gatewayId: row.gateway_id,
    orderId: Number(row.order_id),
    kind: KindSchema.parse(row.kind),
    amountMinor: Number(row.amount_minor),
    status: AttemptStatusSchema.parse(row.status),
    confirmationUrl: row.confirmation_url,
    createdAt: toDate(row.created_at),
    updatedAt: toDate(row.updated_at),
  };
}

function toShipment(row: ShipmentRow): ShipmentRequest {
  return {
    orderId: Number(row.order_id),
    carrierId: row.carrier_id,
    state: ShipmentStateSchema.parse(row.state),
    lastStatusCode: row.last_status_code,
    lastStatusDescription: row.last_status_description,
    terminal: Boolean(row.terminal),
    raw: readJson(row.raw),
    createdAt: toDate(row.created_at),
    updatedAt: toDate(row.updated_at),
  };
}

function toNotification(row: NotificationRow): Notification {
  return {
    id: Number(row.id),
    recipient: row.recipient,
    text: row.text,
    attempts: Number(row.attempts),
    lastError: row.last_error,
    createdAt: toDate(row.created_at),
    sentAt: row.sent_at == null ? null : toDate(row.sent_at),
  };
}

/* --------------------------------- Store ---------------------------------- */

export type NewOrder = {
  ownerRef: string;
  totalMinor: number;
  fulfillment: FulfillmentKind;
  extension?: OrderExtension;
};

/** Field writes applied together with a status guard. */
export type OrderChanges = {
  status?: OrderStatus;
  paidKind?: PaymentKind | null;
  trackingId?: string | null;
  extension?: OrderExtension;
};

export type CasGuard = {
  expectedFrom: readonly OrderStatus[];
  version: number;
  expectPaidKind?: PaymentKind | null;
};

export class OrderStore {
  constructor(readonly db: Knex) {}

  /** Run `fn` against a store bound to one database transaction. */
  transaction<T>(fn: (tx: OrderStore) => Promise<T>): Promise<T> {
    return this.db.transaction((trx) => fn(new OrderStore(trx)));
  }

  /* ------------------------------ Customers ------------------------------- */

  async upsertCustomer(c: Customer, now = new Date()): Promise<void> {
    await this.db('customers')
      .insert({
        ref: c.ref,
        full_name: c.fullName,
        phone: c.phone,
        email: c.email,
        created_at: now,
        updated_at: now,
      })
      .onConflict('ref')
      .merge(['full_name', 'phone', 'email', 'updated_at']);
  }

  async getCustomer(ref: string): Promise<Customer | null> {
    const row: CustomerRow | undefined = await this.db('customers').where({ ref }).first();
    if (!row) return null;
    return { ref: row.ref, fullName: row.full_name, phone: row.phone, email: row.email };
  }

  /* -------------------------------- Orders -------------------------------- */

  async insertOrder(input: NewOrder, now = new Date()): Promise<Order> {
    const [row]: OrderRow[] = await this.db('orders')
      .insert({
        owner_ref: input.ownerRef,
        total_minor: input.totalMinor,
        fulfillment: input.fulfillment,
        status: 'new',
        paid_kind: null,
        tracking_id: null,
        extension: JSON.stringify(input.extension ?? {}),
        version: 0,
        created_at: now,
        updated_at: now,
        status_changed_at: now,
      })
      .returning('*');
    return toOrder(row);
  }

  async getOrder(id: number): Promise<Order | null> {
    const row = await this.getOrderRow(id);
    return row ? toOrder(row) : null;
  }

  /** The order together with its optimistic-concurrency version. */
  async getVersionedOrder(id: number): Promise<{ order: Order; version: number } | null> {
    const row = await this.getOrderRow(id);
    return row ? { order: toOrder(row), version: Number(row.version) } : null;
  }

  private async getOrderRow(id: number): Promise<OrderRow | null> {
    const row: OrderRow | undefined = await this.db('orders').where({ id }).first();
    return row ?? null;
  }

  async listOrdersByStatus(
    statuses: readonly OrderStatus[],
    opts: { changedBefore?: Date; limit?: number } = {}
  ): Promise<Order[]> {
    const q = this.db('orders').whereIn('status', statuses).orderBy('id', 'asc');
    if (opts.changedBefore) q.where('status_changed_at', '<', opts.changedBefore);
    if (opts.limit) q.limit(opts.limit);
    const rows: OrderRow[] = await q;
    return rows.map(toOrder);
  }

  /**
   * One atomic conditional update: applies `changes` only if the stored status
   * is in `expectedFrom` and nobody wrote the row since `version` was read.
   * Returns the number of rows written (0 or 1).
   */
  async compareAndSet(id: number, guard: CasGuard, changes: OrderChanges, now = new Date()): Promise<number> {
    const patch: Record<string, unknown> = {
      version: guard.version + 1,
      updated_at: now,
    };
    if (changes.status !== undefined) {
      patch.status = changes.status;
      patch.status_changed_at = now;
    }
    if (changes.paidKind !== undefined) patch.paid_kind = changes.paidKind;
    if (changes.trackingId !== undefined) patch.tracking_id = changes.trackingId;
    if (changes.extension !== undefined) patch.extension = JSON.stringify(changes.extension);

    const q = this.db('orders')
      .where({ id, version: guard.version })
      .whereIn('status', guard.expectedFrom);
    if (guard.expectPaidKind !== undefined) {
      if (guard.expectPaidKind === null) q.whereNull('paid_kind');
      else q.where('paid_kind', guard.expectPaidKind);
    }
    return q.update(patch);
  }

  /* --------------------------- Payment attempts --------------------------- */

  async insertAttempt(a: Omit<PaymentAttempt, 'createdAt' | 'updatedAt'>, now = new Date()): Promise<PaymentAttempt> {
    await this.db('payment_attempts').insert({
      gateway_id: a.gatewayId,
      order_id: a.orderId,
      kind: a.kind,
      amount_minor: a.amountMinor,
      status: a.status,
      confirmation_url: a.confirmationUrl,
      created_at: now,
      updated_at: now,
    });
    return { ...a, createdAt: now, updatedAt: now };
  }

  async getAttempt(gatewayId: string): Promise<PaymentAttempt | null> {
    const row: AttemptRow | undefined = await this.db('payment_attempts').where({ gateway_id: gatewayId }).first();
    return row ? toAttempt(row) : null;
  }

  async listAttempts(orderId: number, status?: AttemptStatus): Promise<PaymentAttempt[]> {
    const q = this.db('payment_attempts').where({ order_id: orderId }).orderBy('created_at', 'asc');
    if (status) q.where({ status });
    const rows: AttemptRow[] = await q;
    return rows.map(toAttempt);
  }

  async findPendingAttempt(orderId: number, kind: PaymentKind): Promise<PaymentAttempt | null> {
    const row: AttemptRow | undefined = await this.db('payment_attempts')
      .where({ order_id: orderId, kind, status: 'pending' })
      .orderBy('created_at', 'desc')
      .first();
    return row ? toAttempt(row) : null;
  }

  /** Pending remainder attempts older than `createdBefore` (lost remainder webhooks). */
  async listStalePendingAttempts(kind: PaymentKind, createdBefore: Date): Promise<PaymentAttempt[]> {
    const rows: AttemptRow[] = await this.db('payment_attempts')
      .where({ kind, status: 'pending' })
      .where('created_at', '<', createdBefore)
      .orderBy('created_at', 'asc');
    return rows.map(toAttempt);
  }

  /** Moves a pending attempt to its final status; no-op if it already left pending. */
  async settleAttempt(gatewayId: string, status: Exclude<AttemptStatus, 'pending'>, now = new Date()): Promise<boolean> {
    const n = await this.db('payment_attempts')
      .where({ gateway_id: gatewayId, status: 'pending' })
      .update({ status, updated_at: now });
    return n > 0;
  }

  /* --------------------------- Shipment requests -------------------------- */

  async getShipmentRequest(orderId: number): Promise<ShipmentRequest | null> {
    const row: ShipmentRow | undefined = await this.db('shipment_requests').where({ order_id: orderId }).first();
    return row ? toShipment(row) : null;
  }

  async insertShipmentRequest(orderId: number, now = new Date()): Promise<void> {
    await this.db('shipment_requests').insert({
      order_id: orderId,
      carrier_id: null,
      state: 'requested',
      terminal: false,
      raw: null,
      created_at: now,
      updated_at: now,
    });
  }

  /** Re-arms a failed request for an explicit operator retry. */
  async rearmShipmentRequest(orderId: number, now = new Date()): Promise<boolean> {
    const n = await this.db('shipment_requests')
      .where({ order_id: orderId, state: 'failed' })
      .update({ state: 'requested', updated_at: now });
    return n > 0;
  }

  async finishShipmentRequest(
    orderId: number,
    outcome: { state: Exclude<ShipmentState, 'requested'>; carrierId?: string; raw: unknown },
    now = new Date()
  ): Promise<void> {
    await this.db('shipment_requests')
      .where({ order_id: orderId, state: 'requested' })
      .update({
        state: outcome.state,
        carrier_id: outcome.carrierId ?? null,
        raw: JSON.stringify(outcome.raw ?? null),
        updated_at: now,
      });
  }

  async recordShipmentStatus(
    orderId: number,
    status: { code: string | null; description: string | null; terminal: boolean; raw: unknown },
    now = new Date()
  ): Promise<void> {
    await this.db('shipment_requests')
      .where({ order_id: orderId })
      .update({
        last_status_code: status.code,
        last_status_description: status.description,
        terminal: status.terminal,
        raw: JSON.stringify(status.raw ?? null),
        updated_at: now,
      });
  }

  /** Shipped orders whose accepted shipment has not reached a terminal carrier status. */
  async listShipmentsToPoll(): Promise<Array<{ order: Order; shipment: ShipmentRequest }>> {
    const rows: ShipmentRow[] = await this.db('shipment_requests')
      .join('orders', 'orders.id', 'shipment_requests.order_id')
      .where('orders.status', 'shipped')
      .where('shipment_requests.state', 'accepted')
      .where('shipment_requests.terminal', false)
      .whereNotNull('shipment_requests.carrier_id')
      .orderBy('shipment_requests.order_id', 'asc')
      .select('shipment_requests.*');

    const out: Array<{ order: Order; shipment: ShipmentRequest }> = [];
    for (const row of rows) {
      const order = await this.getOrder(Number(row.order_id));
      if (order) out.push({ order, shipment: toShipment(row) });
    }
    return out;
  }

  /* -------------------------------- Outbox -------------------------------- */

  async enqueueNotifications(items: readonly OutgoingNotification[], now = new Date()): Promise<void> {
    if (!items.length) return;
    await this.db('notifications').insert(
      items.map((n) => ({
        recipient: n.recipient,
        text: n.text,
        attempts: 0,
        last_error: null,
        created_at: now,
        sent_at: null,
      }))
    );
  }

  async listUnsentNotifications(maxAttempts: number, limit = 50): Promise<Notification[]> {
    const rows: NotificationRow[] = await this.db('notifications')
      .whereNull('sent_at')
      .where('attempts', '<', maxAttempts)
      .orderBy('id', 'asc')
      .limit(limit);
    return rows.map(toNotification);
  }

  async listNotifications(recipient?: string): Promise<Notification[]> {
    const q = this.db('notifications').orderBy('id', 'asc');
    if (recipient) q.where({ recipient });
    const rows: NotificationRow[] = await q;
    return rows.map(toNotification);
  }

  async markNotificationSent(id: number, now = new Date()): Promise<void> {
    await this.db('notifications')
      .where({ id })
      .update({ sent_at: now, attempts: this.db.raw('attempts + 1') });
  }

  async markNotificationFailed(id: number, error: string): Promise<void> {
    await this.db('notifications')
      .where({ id })
      .update({ last_error: error.slice(0, 1000), attempts: this.db.raw('attempts + 1') });
  }
}
