// src/services/paymentSweeper.ts
// Timeout reconciliation. Webhooks get lost; the sweeper asks the gateway
// directly about every overdue PENDING_PAYMENT order and either settles it
// from what the gateway says or abandons it.
//
// An order is only abandoned when every pending attempt got an answer. A
// query that errors defers the decision to the next tick, so a gateway outage
// never abandons an order that may have been paid.

import type { OrderStore } from '../db/orders.js';
import { StaleStateError, errorMessage } from '../errors.js';
import { t } from '../i18n.js';
import { createLogger } from '../logger.js';
import type { Notifier } from '../notify/outbox.js';
import type { OrderLocks } from '../orderLocks.js';
import { attemptTransition } from '../orderState.js';
import type { GatewayPaymentStatus, PaymentGateway } from '../psp/gateway.js';
import type { PaymentAttempt } from '../types.js';
import type { PaymentService } from './payments.js';

const log = createLogger('sweeper');

export type ReconcileOutcome = 'settled' | 'abandoned' | 'deferred' | 'skipped';

export type SweepResult = {
  checked: number;
  settled: number;
  abandoned: number;
  deferred: number;
  remaindersSettled: number;
  errors: number;
};

export type SweeperOptions = {
  timeoutSec: number;
  now?: () => Date;
};

export class PaymentSweeper {
  private readonly now: () => Date;

  constructor(
    private readonly store: OrderStore,
    private readonly gateway: PaymentGateway,
    private readonly locks: OrderLocks,
    private readonly payments: PaymentService,
    private readonly notifier: Notifier,
    private readonly opts: SweeperOptions
  ) {
    this.now = opts.now ?? (() => new Date());
  }

  /** One sweep; an aborted signal stops it after the order in hand. */
  async tick(signal?: AbortSignal): Promise<SweepResult> {
    const cutoff = new Date(this.now().getTime() - this.opts.timeoutSec * 1000);
    const result: SweepResult = { checked: 0, settled: 0, abandoned: 0, deferred: 0, remaindersSettled: 0, errors: 0 };

    const overdue = await this.store.listOrdersByStatus(['pending_payment'], { changedBefore: cutoff });
    for (const order of overdue) {
      if (signal?.aborted) break;
      result.checked++;
      try {
        const outcome = await this.locks.runExclusive(order.id, () => this.reconcileOrder(order.id, cutoff));
        if (outcome === 'settled') result.settled++;
        else if (outcome === 'abandoned') result.abandoned++;
        else if (outcome === 'deferred') result.deferred++;
      } catch (err) {
        result.errors++;
        await this.reportError(order.id, err);
      }
    }

    const remainders = signal?.aborted ? [] : await this.store.listStalePendingAttempts('remainder', cutoff);
    for (const attempt of remainders) {
      if (signal?.aborted) break;
      try {
        const settled = await this.locks.runExclusive(attempt.orderId, () => this.reconcileRemainder(attempt));
        if (settled) result.remaindersSettled++;
      } catch (err) {
        result.errors++;
        await this.reportError(attempt.orderId, err);
      }
    }

    if (overdue.length || remainders.length) log.info(result, 'sweep finished');
    return result;
  }

  /** One overdue order; the caller holds its lock. */
  async reconcileOrder(orderId: number, cutoff: Date): Promise<ReconcileOutcome> {
    const order = await this.store.getOrder(orderId);
    // re-read under the lock: the webhook may have won in the meantime
    if (!order || order.status !== 'pending_payment' || order.statusChangedAt >= cutoff) return 'skipped';

    const pending = await this.store.listAttempts(orderId, 'pending');
    let unanswered = 0;

    for (const attempt of pending) {
      let status: GatewayPaymentStatus;
      try {
        status = await this.gateway.queryStatus(attempt.gatewayId);
      } catch (err) {
        unanswered++;
        log.warn({ err, orderId, gatewayId: attempt.gatewayId }, 'gateway status query failed; retrying next tick');
        continue;
      }

      if (status === 'succeeded') {
        const outcome = await this.payments.settleSucceeded(orderId, attempt.gatewayId, attempt.kind, 'sweeper');
        return outcome === 'applied' ? 'settled' : 'skipped';
      }
      if (status === 'failed') await this.payments.markFailed(attempt.gatewayId);
    }

    if (unanswered > 0) return 'deferred';

    // a buyer who just started another attempt still gets the full window
    if (pending.some((a) => a.createdAt >= cutoff)) return 'deferred';

    try {
      await attemptTransition(this.store, orderId, ['pending_payment'], 'abandoned', {
        notifications: [{ recipient: order.ownerRef, text: t('order.abandoned', { orderId }) }],
      });
    } catch (err) {
      if (err instanceof StaleStateError) return 'skipped';
      throw err;
    }
    log.info({ orderId, attempts: pending.length }, 'order abandoned after payment timeout');
    return 'abandoned';
  }

  /** A remainder attempt whose webhook never came; never abandons anything. */
  async reconcileRemainder(attempt: PaymentAttempt): Promise<boolean> {
    const fresh = await this.store.getAttempt(attempt.gatewayId);
    if (!fresh || fresh.status !== 'pending') return false;

    let status: GatewayPaymentStatus;
    try {
      status = await this.gateway.queryStatus(fresh.gatewayId);
    } catch (err) {
      log.warn({ err, orderId: fresh.orderId, gatewayId: fresh.gatewayId }, 'remainder status query failed; retrying next tick');
      return false;
    }

    if (status === 'succeeded') {
      const outcome = await this.payments.settleSucceeded(fresh.orderId, fresh.gatewayId, 'remainder', 'sweeper');
      return outcome === 'applied';
    }
    if (status === 'failed') await this.payments.markFailed(fresh.gatewayId);
    return false;
  }

  private async reportError(orderId: number, err: unknown): Promise<void> {
    log.error({ err, orderId }, 'reconciliation failed');
    await this.notifier.alertOperator(t('ops.sweeper_error', { orderId, error: errorMessage(err) }));
  }
}
