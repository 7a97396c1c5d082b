// src/services/paymentWebhook.ts
// Gateway callbacks. Every well-formed event is acknowledged: an error here is
// logged and raised to an operator, never turned into a gateway retry.
// An event that arrived without a signature or origin check is only a hint:
// its payment must be one of ours and the gateway must confirm its status.

import { z } from 'zod';
import type { OrderStore } from '../db/orders.js';
import { ValidationError, errorMessage } from '../errors.js';
import { t } from '../i18n.js';
import { createLogger } from '../logger.js';
import type { Notifier } from '../notify/outbox.js';
import type { OrderLocks } from '../orderLocks.js';
import type { PaymentGateway } from '../psp/gateway.js';
import { PAYMENT_KINDS, type PaymentKind } from '../types.js';
import type { PaymentService, SettleOutcome } from './payments.js';

const log = createLogger('psp-webhook');

export const WebhookPayloadSchema = z.object({
  type: z.string().optional(),
  event: z.string().min(1),
  object: z.object({
    id: z.string().min(1),
    status: z.string().optional(),
    metadata: z.record(z.unknown()).default({}),
  }),
});

export type WebhookPayload = z.infer<typeof WebhookPayloadSchema>;

/** 'unconfirmed': an unverified event the gateway did not back up. */
export type WebhookOutcome = SettleOutcome | 'canceled' | 'unconfirmed' | 'error';

/** Whether the HTTP layer checked a signature or an allowed origin. */
export type WebhookTrust = 'verified' | 'unverified';

// digits or an integer only; booleans and arrays never name an order
const OrderIdSchema = z
  .union([z.string().regex(/^\d+$/), z.number().int()])
  .pipe(z.coerce.number().int().positive());
const KindSchema = z.enum(PAYMENT_KINDS);

function readOrderId(metadata: Record<string, unknown>): number | null {
  const parsed = OrderIdSchema.safeParse(metadata.order_id);
  return parsed.success ? parsed.data : null;
}

export class PaymentWebhookHandler {
  constructor(
    private readonly store: OrderStore,
    private readonly locks: OrderLocks,
    private readonly gateway: PaymentGateway,
    private readonly payments: PaymentService,
    private readonly notifier: Notifier
  ) {}

  /** Throws ValidationError only for a body that is not a webhook at all. */
  async handle(body: unknown, trust: WebhookTrust): Promise<WebhookOutcome> {
    const parsed = WebhookPayloadSchema.safeParse(body);
    if (!parsed.success) {
      throw new ValidationError('Malformed payment webhook', parsed.error.issues);
    }
    const { event, object } = parsed.data;

    try {
      switch (event) {
        case 'payment.succeeded':
          return await this.onSucceeded(object.id, object.metadata, trust);
        case 'payment.canceled':
          return await this.onCanceled(object.id, trust);
        default:
          log.info({ event, paymentId: object.id }, 'ignoring webhook event');
          return 'ignored';
      }
    } catch (err) {
      log.error({ err, event, paymentId: object.id }, 'webhook handling failed');
      await this.notifier.alertOperator(t('ops.webhook_error', { paymentId: object.id, error: errorMessage(err) }));
      return 'error';
    }
  }

  private async onSucceeded(
    paymentId: string,
    metadata: Record<string, unknown>,
    trust: WebhookTrust
  ): Promise<WebhookOutcome> {
    const orderId = readOrderId(metadata);
    if (orderId === null) {
      log.warn({ paymentId, metadata }, 'succeeded webhook without a usable order_id');
      return 'ignored';
    }

    const attempt = await this.store.getAttempt(paymentId);
    if (attempt && attempt.orderId !== orderId) {
      log.warn({ paymentId, orderId, attemptOrderId: attempt.orderId }, 'succeeded webhook names another order');
      return 'ignored';
    }

    let kind: PaymentKind | null;
    if (trust === 'unverified') {
      if (!attempt) {
        log.warn({ paymentId, orderId }, 'unverified webhook for a payment we never created');
        return 'ignored';
      }
      const status = await this.gateway.queryStatus(paymentId);
      if (status !== 'succeeded') {
        log.warn({ paymentId, orderId, status }, 'unverified webhook not confirmed by the gateway');
        return 'unconfirmed';
      }
      kind = attempt.kind;
    } else {
      kind = this.resolveKind(metadata, attempt?.kind ?? null);
    }
    if (!kind) {
      log.warn({ paymentId, orderId, metadata }, 'succeeded webhook without a payment kind');
      return 'ignored';
    }

    const payKind = kind;
    const outcome = await this.locks.runExclusive(orderId, () =>
      this.payments.settleSucceeded(orderId, paymentId, payKind, 'webhook')
    );
    log.info({ paymentId, orderId, kind, trust, outcome }, 'payment webhook handled');
    return outcome;
  }

  private async onCanceled(paymentId: string, trust: WebhookTrust): Promise<WebhookOutcome> {
    if (trust === 'unverified') {
      const status = await this.gateway.queryStatus(paymentId);
      if (status !== 'failed') {
        log.warn({ paymentId, status }, 'unverified cancel not confirmed by the gateway');
        return 'unconfirmed';
      }
    }
    await this.payments.markFailed(paymentId);
    return 'canceled';
  }

  // metadata first; a stored attempt covers gateways that drop unknown keys
  private resolveKind(metadata: Record<string, unknown>, stored: PaymentKind | null): PaymentKind | null {
    const fromMeta = KindSchema.safeParse(metadata.payment_kind);
    return fromMeta.success ? fromMeta.data : stored;
  }
}
