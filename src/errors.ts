import type { ZodIssue } from 'zod';
import type { OrderStatus } from './types.js';

export const GENERIC_USER_MESSAGE = 'Something went wrong. Please try again or contact support.';

/**
 * Base class for every failure the engine raises on purpose.
 * `userMessage` is what a buyer may see; the full error only goes to logs.
 */
export class FulfillmentError extends Error {
  readonly code: string;
  readonly httpStatus: number;
  readonly userMessage: string;

  constructor(code: string, message: string, opts: { httpStatus?: number; userMessage?: string; cause?: unknown } = {}) {
    super(message, opts.cause === undefined ? undefined : { cause: opts.cause });
    this.name = new.target.name;
    this.code = code;
    this.httpStatus = opts.httpStatus ?? 500;
    this.userMessage = opts.userMessage ?? GENERIC_USER_MESSAGE;
  }
}

/** A compare-and-set lost the race: re-read and decide again. */
export class StaleStateError extends FulfillmentError {
  constructor(
    readonly orderId: number,
    readonly expected: readonly OrderStatus[],
    readonly actual: OrderStatus | null
  ) {
    super(
      'stale_state',
      `Order #${orderId} is ${actual ?? 'missing'}, expected one of [${expected.join(', ')}]`,
      { httpStatus: 409, userMessage: 'This order has changed in the meantime. Please check its status.' }
    );
  }
}

/** A transition outside the allowed-edges table. Always a programming error. */
export class InvalidTransitionError extends FulfillmentError {
  constructor(readonly from: OrderStatus, readonly to: OrderStatus) {
    super('invalid_transition', `Transition ${from} -> ${to} is not allowed`, { httpStatus: 409 });
  }
}

export class GatewayError extends FulfillmentError {
  /** HTTP status of the failed call, null for timeouts and transport errors. */
  readonly status: number | null;

  constructor(message: string, opts: { cause?: unknown; status?: number } = {}) {
    super('gateway_error', message, { httpStatus: 502, cause: opts.cause });
    this.status = opts.status ?? null;
  }
}

export class CarrierError extends FulfillmentError {
  /** HTTP status of the failed call, null for timeouts and transport errors. */
  readonly status: number | null;

  constructor(message: string, opts: { cause?: unknown; status?: number } = {}) {
    super('carrier_error', message, { httpStatus: 502, cause: opts.cause });
    this.status = opts.status ?? null;
  }
}

/** Malformed input from a user or a webhook, rejected at the boundary. */
export class ValidationError extends FulfillmentError {
  constructor(message: string, readonly issues: ZodIssue[] = []) {
    super('validation_error', message, { httpStatus: 400, userMessage: message });
  }
}

export class OrderNotFoundError extends FulfillmentError {
  constructor(readonly orderId: number) {
    super('order_not_found', `Order #${orderId} not found`, { httpStatus: 404, userMessage: 'Order not found.' });
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
