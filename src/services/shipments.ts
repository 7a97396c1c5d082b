// src/services/shipments.ts
// Shipment creation. The ShipmentRequest row is written before the carrier is
// called, so a second request for the same order (a double click, a retry
// after a crash) finds it and never creates a second parcel.

import type { CarrierClient, CreatedShipment, ShipmentSnapshot } from '../carrier/carrier.js';
import type { OrderStore } from '../db/orders.js';
import { CarrierError, OrderNotFoundError, StaleStateError, ValidationError, errorMessage } from '../errors.js';
import { t } from '../i18n.js';
import { createLogger } from '../logger.js';
import type { Notifier } from '../notify/outbox.js';
import type { OrderLocks } from '../orderLocks.js';
import { attemptTransition } from '../orderState.js';
import type { Order, PaymentKind, ShipmentRequest } from '../types.js';

const log = createLogger('shipments');

/** Paid kinds that leave nothing outstanding. */
const FULLY_PAID: readonly PaymentKind[] = ['full', 'remainder'];

export type ShipmentResult = {
  order: Order;
  shipment: ShipmentRequest;
  /** False when an existing accepted request was returned. */
  created: boolean;
};

export class ShipmentService {
  constructor(
    private readonly store: OrderStore,
    private readonly carrier: CarrierClient,
    private readonly locks: OrderLocks,
    private readonly notifier: Notifier
  ) {}

  requestShipment(orderId: number): Promise<ShipmentResult> {
    return this.locks.runExclusive(orderId, () => this.requestLocked(orderId));
  }

  private async requestLocked(orderId: number): Promise<ShipmentResult> {
    const order = await this.store.getOrder(orderId);
    if (!order) throw new OrderNotFoundError(orderId);

    const existing = await this.store.getShipmentRequest(orderId);
    if (existing?.state === 'accepted' && existing.carrierId) {
      // crashed between carrier acceptance and the SHIPPED write
      const current = order.status === 'assembled' ? await this.markShipped(order, existing.carrierId) : order;
      return { order: current, shipment: existing, created: false };
    }
    if (existing?.state === 'requested') {
      await this.notifier.alertOperator(t('ops.shipment_unknown', { orderId }));
      throw new CarrierError(`Shipment request for order #${orderId} has an unknown outcome`);
    }

    const snapshot = await this.buildSnapshot(order);

    if (existing?.state === 'failed') {
      await this.store.rearmShipmentRequest(orderId);
      log.info({ orderId }, 'retrying failed shipment request');
    } else {
      await this.store.insertShipmentRequest(orderId);
    }

    let created: CreatedShipment;
    try {
      created = await this.carrier.createShipment(snapshot);
    } catch (err) {
      await this.store.finishShipmentRequest(orderId, { state: 'failed', raw: { error: errorMessage(err) } });
      log.error({ err, orderId }, 'carrier rejected shipment request');
      await this.notifier.alertOperator(t('ops.shipment_failed', { orderId, error: errorMessage(err) }));
      throw err instanceof CarrierError ? err : new CarrierError('Shipment creation failed', { cause: err });
    }

    await this.store.finishShipmentRequest(orderId, { state: 'accepted', carrierId: created.carrierId, raw: created.raw });
    const shipped = await this.markShipped(order, created.carrierId);
    const shipment = await this.store.getShipmentRequest(orderId);
    if (!shipment) throw new CarrierError(`Shipment request for order #${orderId} vanished after acceptance`);

    log.info({ orderId, carrierId: created.carrierId }, 'shipment created');
    return { order: shipped, shipment, created: true };
  }

  private async buildSnapshot(order: Order): Promise<ShipmentSnapshot> {
    if (order.status !== 'assembled') throw new StaleStateError(order.id, ['assembled'], order.status);
    if (!order.paidKind || !FULLY_PAID.includes(order.paidKind)) {
      throw new ValidationError(`Order #${order.id} is not fully paid`);
    }

    const pickupPoint = order.extension.pickupPoint;
    if (!pickupPoint) throw new ValidationError(`Order #${order.id} has no pickup point`);

    const customer = await this.store.getCustomer(order.ownerRef);
    if (!customer?.fullName || !customer.phone) {
      throw new ValidationError(`Order #${order.id} has no recipient name or phone`);
    }

    const comment = order.extension.giftText ? `Order #${order.id}. Gift note: ${order.extension.giftText}` : `Order #${order.id}`;
    return {
      idempotencyKey: String(order.id),
      orderId: order.id,
      recipient: { name: customer.fullName, phone: customer.phone, email: customer.email },
      pickupPoint,
      declaredValueMinor: order.totalMinor,
      comment,
    };
  }

  /** The carrier id stands in as tracking until the poller sees the real number. */
  private markShipped(order: Order, carrierId: string): Promise<Order> {
    return attemptTransition(this.store, order.id, ['assembled'], 'shipped', {
      trackingId: carrierId,
      notifications: this.notifier.forOperators(t('ops.shipment_created', { orderId: order.id, carrierId })),
    });
  }
}
