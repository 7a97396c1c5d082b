// src/services/orders.ts
// Checkout confirmation, operator actions and status reads. Every write
// still goes through the transition validator under the order lock.

import type { NewOrder, OrderStore } from '../db/orders.js';
import { OrderNotFoundError } from '../errors.js';
import { formatMinor, t } from '../i18n.js';
import { createLogger } from '../logger.js';
import type { OrderLocks } from '../orderLocks.js';
import { amendOrder, attemptTransition, nextStatuses } from '../orderState.js';
import type { Customer, Order, OrderStatus, PaymentAttempt, ShipmentRequest } from '../types.js';
import { splitAmounts } from './payments.js';

const log = createLogger('orders');

export type CreateOrderInput = NewOrder & {
  customer?: Omit<Customer, 'ref'>;
};

export type OrderStatusView = {
  order: Order;
  attempts: PaymentAttempt[];
  shipment: ShipmentRequest | null;
  next: readonly OrderStatus[];
};

export class OrderService {
  constructor(
    private readonly store: OrderStore,
    private readonly locks: OrderLocks,
    private readonly settings: { currency: string; prepayPercent: number }
  ) {}

  /** Checkout confirmation: the order starts in NEW. */
  async createOrder(input: CreateOrderInput): Promise<Order> {
    const { customer, ...fields } = input;
    const order = await this.store.transaction(async (tx) => {
      if (customer) await tx.upsertCustomer({ ref: input.ownerRef, ...customer });
      return tx.insertOrder(fields);
    });
    log.info({ orderId: order.id, ownerRef: order.ownerRef, totalMinor: order.totalMinor }, 'order created');
    return order;
  }

  /** The buyer walks away before paying. */
  cancelOrder(orderId: number): Promise<Order> {
    return this.locks.runExclusive(orderId, () => attemptTransition(this.store, orderId, ['new'], 'abandoned'));
  }

  markAssembled(orderId: number): Promise<Order> {
    return this.locks.runExclusive(orderId, async () => {
      const order = await this.requireOrder(orderId);
      const { remainderMinor } = splitAmounts(order.totalMinor, this.settings.prepayPercent);
      const text =
        order.paidKind === 'prepay'
          ? t('order.assembled_remainder_due', { orderId, remainder: formatMinor(remainderMinor, this.settings.currency) })
          : t('order.assembled', { orderId });
      return attemptTransition(this.store, orderId, ['paid_partially', 'paid_full'], 'assembled', {
        notifications: [{ recipient: order.ownerRef, text }],
      });
    });
  }

  archiveOrder(orderId: number): Promise<Order> {
    return this.locks.runExclusive(orderId, () => attemptTransition(this.store, orderId, ['shipped'], 'archived'));
  }

  /** Manual override; the poller leaves a non-placeholder tracking id alone. */
  setTracking(orderId: number, trackingId: string): Promise<Order> {
    return this.locks.runExclusive(orderId, async () => {
      const order = await this.requireOrder(orderId);
      return amendOrder(this.store, orderId, ['shipped'], {
        trackingId,
        notifications: [{ recipient: order.ownerRef, text: t('shipment.tracking', { orderId, tracking: trackingId }) }],
      });
    });
  }

  async getStatus(orderId: number): Promise<OrderStatusView> {
    const order = await this.requireOrder(orderId);
    const [attempts, shipment] = await Promise.all([
      this.store.listAttempts(orderId),
      this.store.getShipmentRequest(orderId),
    ]);
    return { order, attempts, shipment, next: nextStatuses(order.status) };
  }

  private async requireOrder(orderId: number): Promise<Order> {
    const order = await this.store.getOrder(orderId);
    if (!order) throw new OrderNotFoundError(orderId);
    return order;
  }
}
