import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { formatMinor, t } from '../i18n.js';
import { BUYER, createHarness, seedOrder, textsFor, type Harness } from './helpers.js';

const PAST_TIMEOUT = 601;

describe('PaymentSweeper', () => {
  let h: Harness;

  beforeEach(async () => {
    h = await createHarness();
  });

  afterEach(async () => {
    await h.db.destroy();
  });

  it('settles a prepay whose webhook was lost instead of abandoning it', async () => {
    const order = await seedOrder(h, { fulfillment: 'prepay' });
    const { attempt } = await h.engine.payments.startPayment(order.id, 'prepay');
    h.gateway.statuses.set(attempt.gatewayId, 'succeeded');
    h.advance(PAST_TIMEOUT);

    const result = await h.engine.sweeper.tick();

    expect(result).toMatchObject({ checked: 1, settled: 1, abandoned: 0, deferred: 0, errors: 0 });
    const stored = await h.engine.store.getOrder(order.id);
    expect(stored?.status).toBe('paid_partially');
    expect(stored?.paidKind).toBe('prepay');
    expect(await textsFor(h, BUYER)).toEqual([
      t('payment.received_prepay', {
        orderId: order.id,
        amount: formatMinor(179700, 'RUB'),
        remainder: formatMinor(419300, 'RUB'),
      }),
    ]);
  });

  it('leaves orders inside the payment window alone', async () => {
    const order = await seedOrder(h);
    await h.engine.payments.startPayment(order.id, 'full');

    const result = await h.engine.sweeper.tick();

    expect(result.checked).toBe(0);
    expect(h.gateway.queried).toEqual([]);
  });

  it('abandons an unpaid order exactly once', async () => {
    const order = await seedOrder(h);
    await h.engine.payments.startPayment(order.id, 'full');
    h.advance(PAST_TIMEOUT);

    expect((await h.engine.sweeper.tick()).abandoned).toBe(1);
    expect((await h.engine.sweeper.tick()).checked).toBe(0);

    expect((await h.engine.store.getOrder(order.id))?.status).toBe('abandoned');
    expect(await textsFor(h, BUYER)).toEqual([t('order.abandoned', { orderId: order.id })]);
  });

  it('marks attempts the gateway reports as failed and abandons the order', async () => {
    const order = await seedOrder(h);
    const { attempt } = await h.engine.payments.startPayment(order.id, 'full');
    h.gateway.statuses.set(attempt.gatewayId, 'failed');
    h.advance(PAST_TIMEOUT);

    await h.engine.sweeper.tick();

    expect((await h.engine.store.getAttempt(attempt.gatewayId))?.status).toBe('failed');
    expect((await h.engine.store.getOrder(order.id))?.status).toBe('abandoned');
  });

  it('defers abandonment while the gateway cannot be reached', async () => {
    const order = await seedOrder(h);
    const { attempt } = await h.engine.payments.startPayment(order.id, 'full');
    h.gateway.failingQueries.add(attempt.gatewayId);
    h.advance(PAST_TIMEOUT);

    expect((await h.engine.sweeper.tick()).deferred).toBe(1);
    expect((await h.engine.store.getOrder(order.id))?.status).toBe('pending_payment');

    h.gateway.failingQueries.clear();
    h.gateway.statuses.set(attempt.gatewayId, 'succeeded');
    expect((await h.engine.sweeper.tick()).settled).toBe(1);
    expect((await h.engine.store.getOrder(order.id))?.status).toBe('paid_full');
  });

  it('is a no-op once the webhook has resolved the order', async () => {
    const order = await seedOrder(h);
    const { attempt } = await h.engine.payments.startPayment(order.id, 'full');
    await h.engine.webhook.handle({
      event: 'payment.succeeded',
      object: { id: attempt.gatewayId, metadata: { order_id: order.id, payment_kind: 'full' } },
    }, 'verified');
    h.advance(PAST_TIMEOUT);

    const result = await h.engine.sweeper.tick();

    expect(result.checked).toBe(0);
    expect(await textsFor(h, BUYER)).toEqual([t('payment.received_full', { orderId: order.id })]);
  });

  it('never double-notifies when webhook and sweep race on one payment', async () => {
    const order = await seedOrder(h);
    const { attempt } = await h.engine.payments.startPayment(order.id, 'full');
    h.gateway.statuses.set(attempt.gatewayId, 'succeeded');
    h.advance(PAST_TIMEOUT);

    const [outcome] = await Promise.all([
      h.engine.webhook.handle({
        event: 'payment.succeeded',
        object: { id: attempt.gatewayId, metadata: { order_id: order.id, payment_kind: 'full' } },
      }, 'verified'),
      h.engine.sweeper.tick(),
    ]);

    expect(['applied', 'duplicate']).toContain(outcome);
    expect((await h.engine.store.getOrder(order.id))?.status).toBe('paid_full');
    expect(await textsFor(h, BUYER)).toEqual([t('payment.received_full', { orderId: order.id })]);
  });

  it('reconciles a remainder whose webhook was lost', async () => {
    const order = await seedOrder(h, { fulfillment: 'prepay', status: 'assembled', paidKind: 'prepay' });
    const { attempt } = await h.engine.payments.startPayment(order.id, 'remainder');
    h.gateway.statuses.set(attempt.gatewayId, 'succeeded');
    h.advance(PAST_TIMEOUT);

    const result = await h.engine.sweeper.tick();

    expect(result.remaindersSettled).toBe(1);
    const stored = await h.engine.store.getOrder(order.id);
    expect(stored?.status).toBe('assembled');
    expect(stored?.paidKind).toBe('remainder');
  });

  it('stops after the order in hand once the tick is aborted', async () => {
    const orders = [await seedOrder(h), await seedOrder(h), await seedOrder(h)];
    for (const o of orders) await h.engine.payments.startPayment(o.id, 'full');
    h.advance(PAST_TIMEOUT);
    const stop = new AbortController();
    const query = h.gateway.queryStatus.bind(h.gateway);
    vi.spyOn(h.gateway, 'queryStatus').mockImplementation(async (gatewayId) => {
      stop.abort();
      return query(gatewayId);
    });

    const result = await h.engine.sweeper.tick(stop.signal);

    expect(result).toMatchObject({ checked: 1, abandoned: 1 });
    expect(h.gateway.queried).toEqual(['pay-1']);
    expect((await h.engine.store.getOrder(orders[1].id))?.status).toBe('pending_payment');
    expect((await h.engine.store.getOrder(orders[2].id))?.status).toBe('pending_payment');
  });
});
