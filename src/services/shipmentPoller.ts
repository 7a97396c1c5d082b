// src/services/shipmentPoller.ts
// Follows accepted shipments at the carrier until they reach a final status.

import type { CarrierClient } from '../carrier/carrier.js';
import type { OrderStore } from '../db/orders.js';
import { CarrierError, StaleStateError, errorMessage } from '../errors.js';
import { t } from '../i18n.js';
import { createLogger } from '../logger.js';
import type { Notifier } from '../notify/outbox.js';
import type { OrderLocks } from '../orderLocks.js';
import { amendOrder } from '../orderState.js';
import type { Order, OutgoingNotification } from '../types.js';

const log = createLogger('poller');

/** Carrier statuses the buyer hears about. */
export const NOTIFY_STATUS_CODES: ReadonlySet<string> = new Set([
  'ACCEPTED_AT_WAREHOUSE',
  'OUT_FOR_DELIVERY',
  'DELIVERED',
  'DELIVERY_FAILED',
  'RETURNED',
]);

/** No further movement expected; polling stops. */
export const TERMINAL_STATUS_CODES: ReadonlySet<string> = new Set(['DELIVERED', 'RETURNED']);

export type PollOutcome = {
  trackingNotified: boolean;
  statusNotified: boolean;
  terminal: boolean;
};

export type PollResult = { polled: number; tracking: number; statusUpdates: number; errors: number };

function hasPlaceholderTracking(order: Order, carrierId: string): boolean {
  return order.trackingId === null || order.trackingId === carrierId;
}

export class ShipmentPoller {
  // last values seen per order; the persisted state is the real guard
  private readonly lastTracking = new Map<number, string>();
  private readonly lastStatus = new Map<number, string>();

  constructor(
    private readonly store: OrderStore,
    private readonly carrier: CarrierClient,
    private readonly locks: OrderLocks,
    private readonly notifier: Notifier
  ) {}

  async tick(signal?: AbortSignal): Promise<PollResult> {
    const result: PollResult = { polled: 0, tracking: 0, statusUpdates: 0, errors: 0 };
    const targets = await this.store.listShipmentsToPoll();

    for (const { order } of targets) {
      if (signal?.aborted) break;
      result.polled++;
      try {
        const outcome = await this.locks.runExclusive(order.id, () => this.pollOne(order.id));
        if (outcome?.trackingNotified) result.tracking++;
        if (outcome?.statusNotified) result.statusUpdates++;
      } catch (err) {
        result.errors++;
        if (err instanceof CarrierError) {
          log.warn({ err, orderId: order.id }, 'carrier status check failed; retrying next tick');
        } else {
          log.error({ err, orderId: order.id }, 'shipment poll failed');
          await this.notifier.alertOperator(t('ops.poller_error', { orderId: order.id, error: errorMessage(err) }));
        }
      }
    }
    return result;
  }

  /** Poll one shipment; the caller holds the order lock. Null when nothing is left to poll. */
  async pollOne(orderId: number): Promise<PollOutcome | null> {
    const order = await this.store.getOrder(orderId);
    const shipment = await this.store.getShipmentRequest(orderId);
    if (!order || order.status !== 'shipped' || !shipment || shipment.state !== 'accepted' || shipment.terminal) return null;
    const carrierId = shipment.carrierId;
    if (!carrierId) return null;

    const info = await this.carrier.getShipment(carrierId);
    const code = info.statusCode;
    const terminal = code !== null && TERMINAL_STATUS_CODES.has(code);

    let tracking = order.trackingId;
    let trackingNotified = false;
    const number = info.trackingNumber;
    if (number && number !== order.trackingId && this.lastTracking.get(orderId) !== number) {
      if (hasPlaceholderTracking(order, carrierId)) {
        trackingNotified = await this.applyTracking(order, carrierId, number);
        if (trackingNotified) tracking = number;
      }
      this.lastTracking.set(orderId, number);
    }

    const items: OutgoingNotification[] = [];
    if (code && NOTIFY_STATUS_CODES.has(code) && code !== shipment.lastStatusCode && this.lastStatus.get(orderId) !== code) {
      items.push({
        recipient: order.ownerRef,
        text: t('shipment.status_update', {
          orderId,
          status: info.statusDescription ?? code,
          tracking: tracking ?? carrierId,
        }),
      });
      if (terminal) {
        items.push(...this.notifier.forOperators(t('ops.shipment_final', { orderId, status: info.statusDescription ?? code })));
      }
    }

    // the status only counts as seen once its notifications are queued
    await this.store.transaction(async (tx) => {
      if (items.length) await tx.enqueueNotifications(items);
      await tx.recordShipmentStatus(orderId, {
        code,
        description: info.statusDescription,
        terminal,
        raw: info.raw,
      });
    });
    const statusNotified = items.length > 0;
    if (code) this.lastStatus.set(orderId, code);

    if (terminal) {
      this.lastTracking.delete(orderId);
      this.lastStatus.delete(orderId);
      log.info({ orderId, code }, 'shipment reached a final status');
    }
    return { trackingNotified, statusNotified, terminal };
  }

  private async applyTracking(order: Order, carrierId: string, number: string): Promise<boolean> {
    try {
      await amendOrder(this.store, order.id, ['shipped'], {
        trackingId: number,
        precondition: (fresh) => hasPlaceholderTracking(fresh, carrierId),
        notifications: [
          { recipient: order.ownerRef, text: t('shipment.tracking', { orderId: order.id, tracking: number }) },
          ...this.notifier.forOperators(t('ops.tracking_received', { orderId: order.id, tracking: number })),
        ],
      });
    } catch (err) {
      if (!(err instanceof StaleStateError)) throw err;
      log.info({ orderId: order.id, actual: err.actual }, 'tracking already set elsewhere');
      return false;
    }
    log.info({ orderId: order.id, tracking: number }, 'tracking number received');
    return true;
  }
}
