import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { CarrierError } from '../errors.js';
import { t } from '../i18n.js';
import type { Order } from '../types.js';
import { BUYER, OPERATOR, createHarness, seedOrder, textsFor, type Harness } from './helpers.js';

describe('ShipmentPoller', () => {
  let h: Harness;
  let order: Order;
  let carrierId: string;

  beforeEach(async () => {
    h = await createHarness();
    const seeded = await seedOrder(h, { status: 'assembled', paidKind: 'full' });
    const { shipment } = await h.engine.shipments.requestShipment(seeded.id);
    carrierId = shipment.carrierId ?? '';
    const shipped = await h.engine.store.getOrder(seeded.id);
    if (!shipped) throw new Error('order missing');
    order = shipped;
  });

  afterEach(async () => {
    await h.db.destroy();
  });

  it('replaces the placeholder tracking once and notifies once', async () => {
    expect(order.trackingId).toBe(carrierId);
    h.carrier.info.set(carrierId, { trackingNumber: 'TRK-100', statusCode: 'CREATED', statusDescription: 'Created' });

    const first = await h.engine.poller.tick();
    const second = await h.engine.poller.tick();

    expect(first).toEqual({ polled: 1, tracking: 1, statusUpdates: 0, errors: 0 });
    expect(second).toEqual({ polled: 1, tracking: 0, statusUpdates: 0, errors: 0 });
    expect((await h.engine.store.getOrder(order.id))?.trackingId).toBe('TRK-100');
    expect(await textsFor(h, BUYER)).toEqual([t('shipment.tracking', { orderId: order.id, tracking: 'TRK-100' })]);
  });

  it('stores the last carrier status', async () => {
    h.carrier.info.set(carrierId, { statusCode: 'IN_TRANSIT', statusDescription: 'In transit' });

    await h.engine.poller.tick();

    const shipment = await h.engine.store.getShipmentRequest(order.id);
    expect(shipment?.lastStatusCode).toBe('IN_TRANSIT');
    expect(shipment?.lastStatusDescription).toBe('In transit');
    expect(shipment?.terminal).toBe(false);
    expect(await textsFor(h, BUYER)).toEqual([]);
  });

  it('tells the buyer about a notable status change once', async () => {
    h.carrier.info.set(carrierId, { statusCode: 'OUT_FOR_DELIVERY', statusDescription: 'Out for delivery' });

    await h.engine.poller.tick();
    await h.engine.poller.tick();

    expect(await textsFor(h, BUYER)).toEqual([
      t('shipment.status_update', { orderId: order.id, status: 'Out for delivery', tracking: carrierId }),
    ]);
  });

  it('stops polling at a final status without archiving', async () => {
    h.carrier.info.set(carrierId, { trackingNumber: 'TRK-100', statusCode: 'DELIVERED', statusDescription: 'Delivered' });

    await h.engine.poller.tick();
    const after = await h.engine.poller.tick();

    expect(after.polled).toBe(0);
    expect(h.carrier.infoCalls).toHaveLength(1);
    expect((await h.engine.store.getShipmentRequest(order.id))?.terminal).toBe(true);
    expect((await h.engine.store.getOrder(order.id))?.status).toBe('shipped');
    expect(await textsFor(h, OPERATOR)).toContain(t('ops.shipment_final', { orderId: order.id, status: 'Delivered' }));
  });

  it('leaves a manually set tracking number alone', async () => {
    await h.engine.orders.setTracking(order.id, 'MANUAL-1');
    h.carrier.info.set(carrierId, { trackingNumber: 'TRK-100', statusCode: 'CREATED' });

    const result = await h.engine.poller.tick();

    expect(result.tracking).toBe(0);
    expect((await h.engine.store.getOrder(order.id))?.trackingId).toBe('MANUAL-1');
    expect(await textsFor(h, BUYER)).toEqual([t('shipment.tracking', { orderId: order.id, tracking: 'MANUAL-1' })]);
  });

  it('counts carrier failures and retries on the next tick', async () => {
    h.carrier.failInfo = new CarrierError('GET /orders/x failed: timeout');

    expect(await h.engine.poller.tick()).toEqual({ polled: 1, tracking: 0, statusUpdates: 0, errors: 1 });
    expect(await textsFor(h, OPERATOR)).toHaveLength(1);

    h.carrier.failInfo = null;
    h.carrier.info.set(carrierId, { trackingNumber: 'TRK-100' });
    expect((await h.engine.poller.tick()).tracking).toBe(1);
  });

  it('retries a status notification when the tick failed before queuing it', async () => {
    h.carrier.info.set(carrierId, { trackingNumber: 'TRK-7', statusCode: 'OUT_FOR_DELIVERY', statusDescription: 'Out for delivery' });
    vi.spyOn(h.engine.store, 'transaction').mockRejectedValueOnce(new Error('db unavailable'));

    expect(await h.engine.poller.tick()).toEqual({ polled: 1, tracking: 0, statusUpdates: 0, errors: 1 });
    expect((await h.engine.store.getShipmentRequest(order.id))?.lastStatusCode).toBeNull();

    expect(await h.engine.poller.tick()).toEqual({ polled: 1, tracking: 1, statusUpdates: 1, errors: 0 });
    expect(await textsFor(h, BUYER)).toEqual([
      t('shipment.tracking', { orderId: order.id, tracking: 'TRK-7' }),
      t('shipment.status_update', { orderId: order.id, status: 'Out for delivery', tracking: 'TRK-7' }),
    ]);
  });
});
