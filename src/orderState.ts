/**
 * Order status state machine.
 *
 * STATUS FLOW:
 *   new -> pending_payment -> paid_partially -> paid_full -> assembled -> shipped -> archived
 *                             paid_partially --------------> assembled   (remainder paid later)
 *   new | pending_payment -> abandoned
 *
 * Every status write goes through attemptTransition() or amendOrder(): one
 * conditional update against the store, so a webhook and a sweep racing on
 * the same order cannot both win.
 */

import { InvalidTransitionError, OrderNotFoundError, StaleStateError } from './errors.js';
import type { OrderChanges, OrderStore } from './db/orders.js';
import type { Order, OrderExtension, OrderStatus, OutgoingNotification, PaymentKind } from './types.js';

export const ORDER_TRANSITIONS: Record<OrderStatus, readonly OrderStatus[]> = {
  new: ['pending_payment', 'abandoned'],
  pending_payment: ['paid_partially', 'paid_full', 'abandoned'],
  paid_partially: ['paid_full', 'assembled'],
  paid_full: ['assembled'],
  assembled: ['shipped'],
  shipped: ['archived'],
  archived: [],
  abandoned: [],
};

/** Position in the lifecycle; every allowed edge moves to a higher rank. */
export const STATUS_RANK: Record<OrderStatus, number> = {
  new: 0,
  pending_payment: 1,
  paid_partially: 2,
  paid_full: 3,
  assembled: 4,
  shipped: 5,
  archived: 6,
  abandoned: 7,
};

/** Once here, no payment event may move the order again. */
export const PAYMENT_TERMINAL_STATUSES: readonly OrderStatus[] = ['paid_full', 'shipped', 'archived'];

export const TERMINAL_STATUSES: readonly OrderStatus[] = ['archived', 'abandoned'];

export function isValidTransition(from: OrderStatus, to: OrderStatus): boolean {
  return ORDER_TRANSITIONS[from].includes(to);
}

export function nextStatuses(from: OrderStatus): readonly OrderStatus[] {
  return ORDER_TRANSITIONS[from];
}

export function isPaymentTerminal(status: OrderStatus): boolean {
  return PAYMENT_TERMINAL_STATUSES.includes(status);
}

export function isTerminal(status: OrderStatus): boolean {
  return TERMINAL_STATUSES.includes(status);
}

export type TransitionOptions = {
  paidKind?: PaymentKind | null;
  trackingId?: string | null;
  /** Merged into the stored extension map. */
  extension?: Partial<OrderExtension>;
  /** Additional guard on the stored paid kind. */
  expectPaidKind?: PaymentKind | null;
  /** Checked against the fresh row inside the transaction; false means stale. */
  precondition?: (order: Order) => boolean;
  /** Committed in the same transaction as the write. */
  notifications?: readonly OutgoingNotification[];
  /** Extra writes that must commit or roll back with the transition. */
  within?: (tx: OrderStore) => Promise<void>;
  now?: Date;
};

// A concurrent write that left the status inside expectedFrom (an extension
// update, say) only bumps the version; re-read and retry that many times.
const MAX_VERSION_RETRIES = 3;

async function applyGuarded(
  store: OrderStore,
  orderId: number,
  expectedFrom: readonly OrderStatus[],
  to: OrderStatus | undefined,
  opts: TransitionOptions
): Promise<Order> {
  const now = opts.now ?? new Date();

  return store.transaction(async (tx) => {
    for (let attempt = 0; attempt <= MAX_VERSION_RETRIES; attempt++) {
      const current = await tx.getVersionedOrder(orderId);
      if (!current) throw new OrderNotFoundError(orderId);
      const { order, version } = current;

      if (!expectedFrom.includes(order.status)) {
        throw new StaleStateError(orderId, expectedFrom, order.status);
      }
      if (opts.expectPaidKind !== undefined && order.paidKind !== opts.expectPaidKind) {
        throw new StaleStateError(orderId, expectedFrom, order.status);
      }
      if (opts.precondition && !opts.precondition(order)) {
        throw new StaleStateError(orderId, expectedFrom, order.status);
      }
      if (to !== undefined && !isValidTransition(order.status, to)) {
        throw new InvalidTransitionError(order.status, to);
      }

      const changes: OrderChanges = {};
      if (to !== undefined) changes.status = to;
      if (opts.paidKind !== undefined) changes.paidKind = opts.paidKind;
      if (opts.trackingId !== undefined) changes.trackingId = opts.trackingId;
      if (opts.extension) changes.extension = { ...order.extension, ...opts.extension };

      const written = await tx.compareAndSet(
        orderId,
        { expectedFrom, version, expectPaidKind: opts.expectPaidKind },
        changes,
        now
      );
      if (written === 1) {
        await tx.enqueueNotifications(opts.notifications ?? [], now);
        if (opts.within) await opts.within(tx);
        return {
          ...order,
          status: changes.status ?? order.status,
          paidKind: changes.paidKind !== undefined ? changes.paidKind : order.paidKind,
          trackingId: changes.trackingId !== undefined ? changes.trackingId : order.trackingId,
          extension: changes.extension ?? order.extension,
          updatedAt: now,
          statusChangedAt: changes.status !== undefined ? now : order.statusChangedAt,
        };
      }
    }
    const latest = await tx.getOrder(orderId);
    throw new StaleStateError(orderId, expectedFrom, latest?.status ?? null);
  });
}

/**
 * Compare-and-set a status change. Succeeds only if the stored status is in
 * `expectedFrom` and `current -> to` is an allowed edge.
 */
export function attemptTransition(
  store: OrderStore,
  orderId: number,
  expectedFrom: readonly OrderStatus[],
  to: OrderStatus,
  opts: TransitionOptions = {}
): Promise<Order> {
  return applyGuarded(store, orderId, expectedFrom, to, opts);
}

/** Same guard as attemptTransition, without a status change. */
export function amendOrder(
  store: OrderStore,
  orderId: number,
  expectedFrom: readonly OrderStatus[],
  opts: TransitionOptions
): Promise<Order> {
  return applyGuarded(store, orderId, expectedFrom, undefined, opts);
}
