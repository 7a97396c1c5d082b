// src/services/payments.ts
// Payment intents and their settlement. Settlement is shared by the webhook,
// the sweeper and the buyer's return from the payment page, so every source
// applies exactly the same transition.

import type { OrderStore } from '../db/orders.js';
import { GatewayError, OrderNotFoundError, StaleStateError, ValidationError, errorMessage } from '../errors.js';
import { formatMinor, t } from '../i18n.js';
import { createLogger } from '../logger.js';
import type { Notifier } from '../notify/outbox.js';
import type { OrderLocks } from '../orderLocks.js';
import { amendOrder, attemptTransition, isPaymentTerminal, type TransitionOptions } from '../orderState.js';
import type { GatewayPaymentStatus, PaymentGateway, PaymentIntent } from '../psp/gateway.js';
import type { Order, OrderStatus, OutgoingNotification, PaymentAttempt, PaymentKind } from '../types.js';

const log = createLogger('payments');

export type PaymentSource = 'webhook' | 'sweeper' | 'return';

/**
 * applied: this payment moved the order.
 * duplicate: already applied, or the order was already settled.
 * stale: the order is somewhere this payment cannot move it from.
 * ignored: unknown order.
 */
export type SettleOutcome = 'applied' | 'duplicate' | 'stale' | 'ignored';

/** pending: nothing succeeded yet. nothing_pending: no open attempt to ask about. */
export type ConfirmOutcome = SettleOutcome | 'pending' | 'nothing_pending';

export type ConfirmResult = { outcome: ConfirmOutcome; order: Order };

export type PaymentSettings = {
  currency: string;
  prepayPercent: number;
  returnUrl: string;
};

export type StartPaymentResult = {
  attempt: PaymentAttempt;
  confirmationUrl: string | null;
  /** True when an existing pending attempt was handed back instead of a new intent. */
  reused: boolean;
};

/** prepay = ceil(total * percent / 100), remainder = total - prepay. */
export function splitAmounts(totalMinor: number, prepayPercent: number): { prepayMinor: number; remainderMinor: number } {
  const prepayMinor = Math.floor((totalMinor * prepayPercent + 99) / 100);
  return { prepayMinor, remainderMinor: totalMinor - prepayMinor };
}

export function amountFor(order: Order, kind: PaymentKind, prepayPercent: number): number {
  if (kind === 'full') return order.totalMinor;
  const { prepayMinor, remainderMinor } = splitAmounts(order.totalMinor, prepayPercent);
  return kind === 'prepay' ? prepayMinor : remainderMinor;
}

type SettlementPlan = {
  expectedFrom: readonly OrderStatus[];
  /** Undefined: settle in place without a status change. */
  to?: OrderStatus;
  expectPaidKind?: PaymentKind;
};

function planSettlement(order: Order, kind: PaymentKind): SettlementPlan {
  switch (kind) {
    case 'full':
      return { expectedFrom: ['pending_payment'], to: 'paid_full' };
    case 'prepay':
      return { expectedFrom: ['pending_payment'], to: 'paid_partially' };
    case 'remainder':
      // An assembled prepay order keeps its status; paidKind records the remainder.
      if (order.status === 'assembled') return { expectedFrom: ['assembled'], expectPaidKind: 'prepay' };
      return { expectedFrom: ['paid_partially'], to: 'paid_full', expectPaidKind: 'prepay' };
  }
}

function payableFrom(kind: PaymentKind): readonly OrderStatus[] {
  return kind === 'remainder' ? ['paid_partially', 'assembled'] : ['new', 'pending_payment'];
}

export class PaymentService {
  constructor(
    private readonly store: OrderStore,
    private readonly gateway: PaymentGateway,
    private readonly locks: OrderLocks,
    private readonly notifier: Notifier,
    private readonly settings: PaymentSettings
  ) {}

  /**
   * Start (or resume) a payment of `kind`. A pending attempt of the same kind
   * is handed back as is, so a double tap never creates two intents.
   */
  startPayment(orderId: number, kind: PaymentKind): Promise<StartPaymentResult> {
    return this.locks.runExclusive(orderId, async () => {
      let order = await this.store.getOrder(orderId);
      if (!order) throw new OrderNotFoundError(orderId);
      this.assertPayable(order, kind);

      if (order.status === 'new') {
        order = await attemptTransition(this.store, orderId, ['new'], 'pending_payment');
      }

      const existing = await this.store.findPendingAttempt(orderId, kind);
      if (existing) {
        log.info({ orderId, kind, gatewayId: existing.gatewayId }, 'reusing pending payment attempt');
        return { attempt: existing, confirmationUrl: existing.confirmationUrl, reused: true };
      }

      const amountMinor = amountFor(order, kind, this.settings.prepayPercent);
      let intent: PaymentIntent;
      try {
        intent = await this.gateway.createIntent({
          orderId,
          ownerRef: order.ownerRef,
          amountMinor,
          kind,
          description: `Order #${orderId} (${kind})`,
          returnUrl: this.settings.returnUrl,
        });
      } catch (err) {
        log.error({ err, orderId, kind }, 'payment intent creation failed');
        await this.notifier.alertOperator(t('ops.payment_failed', { orderId, kind, error: errorMessage(err) }));
        throw err instanceof GatewayError ? err : new GatewayError('Payment intent creation failed', { cause: err });
      }

      const attempt = await this.store.insertAttempt({
        gatewayId: intent.gatewayId,
        orderId,
        kind,
        amountMinor,
        status: 'pending',
        confirmationUrl: intent.confirmationUrl,
      });

      try {
        await amendOrder(this.store, orderId, [order.status], {
          extension: { pendingPayments: { ...order.extension.pendingPayments, [kind]: intent.gatewayId } },
        });
      } catch (err) {
        if (!(err instanceof StaleStateError)) throw err;
        // The attempt row is already stored; the extension copy is informational.
        log.warn({ orderId, kind, gatewayId: intent.gatewayId, actual: err.actual }, 'order moved before pendingPayments was recorded');
      }

      log.info({ orderId, kind, gatewayId: intent.gatewayId, amountMinor }, 'payment attempt created');
      return { attempt, confirmationUrl: intent.confirmationUrl, reused: false };
    });
  }

  private assertPayable(order: Order, kind: PaymentKind): void {
    if (kind !== 'full' && order.fulfillment !== 'prepay') {
      throw new ValidationError(`Order #${order.id} is not a prepay order`);
    }
    const from = payableFrom(kind);
    if (!from.includes(order.status)) throw new StaleStateError(order.id, from, order.status);
    if (kind === 'remainder' && order.paidKind !== 'prepay') {
      throw new StaleStateError(order.id, from, order.status);
    }
  }

  /**
   * The buyer says they paid. Ask the gateway about every pending attempt and
   * settle the first that succeeded; a query that fails leaves it pending.
   */
  confirmPayment(orderId: number): Promise<ConfirmResult> {
    return this.locks.runExclusive(orderId, async () => {
      const order = await this.store.getOrder(orderId);
      if (!order) throw new OrderNotFoundError(orderId);

      const pending = await this.store.listAttempts(orderId, 'pending');
      if (!pending.length) return { outcome: 'nothing_pending', order };

      for (const attempt of pending) {
        let status: GatewayPaymentStatus;
        try {
          status = await this.gateway.queryStatus(attempt.gatewayId);
        } catch (err) {
          log.warn({ err, orderId, gatewayId: attempt.gatewayId }, 'status query on return failed');
          continue;
        }
        if (status === 'succeeded') {
          const outcome = await this.settleSucceeded(orderId, attempt.gatewayId, attempt.kind, 'return');
          return { outcome, order: (await this.store.getOrder(orderId)) ?? order };
        }
        if (status === 'failed') await this.markFailed(attempt.gatewayId);
      }
      return { outcome: 'pending', order };
    });
  }

  /**
   * Apply a payment the gateway reports as succeeded. The caller holds the
   * order lock. Owner and operator notifications commit with the transition.
   */
  async settleSucceeded(orderId: number, gatewayId: string, kind: PaymentKind, source: PaymentSource): Promise<SettleOutcome> {
    const order = await this.store.getOrder(orderId);
    if (!order) {
      log.warn({ orderId, gatewayId, source }, 'succeeded payment for unknown order');
      return 'ignored';
    }

    const attempt = await this.store.getAttempt(gatewayId);
    if (attempt?.status === 'succeeded' || order.extension.paymentId === gatewayId) {
      log.info({ orderId, gatewayId, source }, 'payment already applied');
      return 'duplicate';
    }

    if (isPaymentTerminal(order.status)) {
      await this.flagOrphan(order, gatewayId, kind);
      return 'duplicate';
    }

    const plan = planSettlement(order, kind);
    const now = new Date();
    const stillPending = { ...order.extension.pendingPayments };
    delete stillPending[kind];
    const opts: TransitionOptions = {
      paidKind: kind,
      expectPaidKind: plan.expectPaidKind,
      extension: { paymentId: gatewayId, pendingPayments: stillPending },
      notifications: this.settledNotifications({ ...order, status: plan.to ?? order.status }, kind, gatewayId, source),
      within: async (tx) => {
        await tx.settleAttempt(gatewayId, 'succeeded', now);
      },
      now,
    };

    try {
      const updated =
        plan.to === undefined
          ? await amendOrder(this.store, orderId, plan.expectedFrom, opts)
          : await attemptTransition(this.store, orderId, plan.expectedFrom, plan.to, opts);
      log.info({ orderId, gatewayId, kind, source, status: updated.status }, 'payment settled');
      return 'applied';
    } catch (err) {
      if (!(err instanceof StaleStateError)) throw err;
      const fresh = (await this.store.getOrder(orderId)) ?? order;
      await this.flagOrphan(fresh, gatewayId, kind);
      return 'stale';
    }
  }

  /** payment.canceled, or a failed status seen by the sweeper. */
  async markFailed(gatewayId: string): Promise<boolean> {
    const changed = await this.store.settleAttempt(gatewayId, 'failed');
    if (changed) log.info({ gatewayId }, 'payment attempt failed');
    return changed;
  }

  private settledNotifications(order: Order, kind: PaymentKind, gatewayId: string, source: PaymentSource): OutgoingNotification[] {
    const { prepayMinor, remainderMinor } = splitAmounts(order.totalMinor, this.settings.prepayPercent);
    const ownerText =
      kind === 'full'
        ? t('payment.received_full', { orderId: order.id })
        : kind === 'prepay'
          ? t('payment.received_prepay', {
              orderId: order.id,
              amount: formatMinor(prepayMinor, this.settings.currency),
              remainder: formatMinor(remainderMinor, this.settings.currency),
            })
          : t('payment.received_remainder', { orderId: order.id });

    return [
      { recipient: order.ownerRef, text: ownerText },
      ...this.notifier.forOperators(
        t('ops.payment_success', { orderId: order.id, kind, paymentId: gatewayId, source, status: order.status })
      ),
    ];
  }

  /**
   * A succeeded payment that cannot settle the order: money arrived that no
   * transition accounts for. The attempt still records the gateway's verdict.
   */
  private async flagOrphan(order: Order, gatewayId: string, kind: PaymentKind): Promise<void> {
    const marked = await this.store.settleAttempt(gatewayId, 'succeeded');
    log.warn({ orderId: order.id, gatewayId, kind, status: order.status, marked }, 'succeeded payment did not settle the order');
    await this.notifier.alertOperator(
      t('ops.payment_orphaned', { orderId: order.id, status: order.status, kind, paymentId: gatewayId })
    );
  }
}
