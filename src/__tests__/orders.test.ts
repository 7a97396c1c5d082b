import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { OrderNotFoundError, StaleStateError } from '../errors.js';
import { formatMinor, t } from '../i18n.js';
import { BUYER, CUSTOMER, PICKUP, createHarness, seedOrder, textsFor, type Harness } from './helpers.js';

describe('OrderService', () => {
  let h: Harness;

  beforeEach(async () => {
    h = await createHarness();
  });

  afterEach(async () => {
    await h.db.destroy();
  });

  it('creates a NEW order and stores the buyer profile', async () => {
    const order = await h.engine.orders.createOrder({
      ownerRef: 'buyer-9',
      totalMinor: 450000,
      fulfillment: 'prepay',
      extension: { pickupPoint: PICKUP, deliveryCostMinor: 35000 },
      customer: CUSTOMER,
    });

    expect(order.status).toBe('new');
    expect(order.paidKind).toBeNull();
    expect(order.extension).toEqual({ pickupPoint: PICKUP, deliveryCostMinor: 35000 });
    expect(await h.engine.store.getCustomer('buyer-9')).toEqual({ ref: 'buyer-9', ...CUSTOMER });
  });

  it('lets the buyer cancel only before paying starts', async () => {
    const fresh = await seedOrder(h);
    expect((await h.engine.orders.cancelOrder(fresh.id)).status).toBe('abandoned');

    const pending = await seedOrder(h, { status: 'pending_payment' });
    await expect(h.engine.orders.cancelOrder(pending.id)).rejects.toBeInstanceOf(StaleStateError);
  });

  it('asks for the remainder when a prepay order is assembled', async () => {
    const order = await seedOrder(h, { status: 'paid_partially', paidKind: 'prepay', fulfillment: 'prepay' });

    const assembled = await h.engine.orders.markAssembled(order.id);

    expect(assembled.status).toBe('assembled');
    expect(await textsFor(h, BUYER)).toEqual([
      t('order.assembled_remainder_due', { orderId: order.id, remainder: formatMinor(419300, 'RUB') }),
    ]);
  });

  it('confirms assembly of a fully paid order', async () => {
    const order = await seedOrder(h, { status: 'paid_full', paidKind: 'full' });

    await h.engine.orders.markAssembled(order.id);

    expect(await textsFor(h, BUYER)).toEqual([t('order.assembled', { orderId: order.id })]);
  });

  it('archives only shipped orders', async () => {
    const shipped = await seedOrder(h, { status: 'shipped', paidKind: 'full' });
    expect((await h.engine.orders.archiveOrder(shipped.id)).status).toBe('archived');

    const assembled = await seedOrder(h, { status: 'assembled', paidKind: 'full' });
    await expect(h.engine.orders.archiveOrder(assembled.id)).rejects.toBeInstanceOf(StaleStateError);
  });

  it('reports status with attempts and the next possible steps', async () => {
    const order = await seedOrder(h);
    await h.engine.payments.startPayment(order.id, 'full');

    const view = await h.engine.orders.getStatus(order.id);

    expect(view.order.status).toBe('pending_payment');
    expect(view.attempts.map((a) => [a.gatewayId, a.kind, a.status])).toEqual([['pay-1', 'full', 'pending']]);
    expect(view.shipment).toBeNull();
    expect(view.next).toEqual(['paid_partially', 'paid_full', 'abandoned']);
  });

  it('reports a missing order', async () => {
    await expect(h.engine.orders.getStatus(12345)).rejects.toBeInstanceOf(OrderNotFoundError);
  });
});
