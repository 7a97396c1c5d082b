// src/notify/outbox.ts
// Notifications are rows first: transition-bound messages are inserted in the
// same transaction as the status change (see orderState.ts), and the relay
// delivers them afterwards. A crash between commit and send delays a message,
// it never drops it.

import type { OrderStore } from '../db/orders.js';
import { errorMessage } from '../errors.js';
import { createLogger } from '../logger.js';
import type { Notification, OutgoingNotification } from '../types.js';
import type { NotificationTransport } from './transport.js';

const log = createLogger('outbox');

export class Notifier {
  constructor(
    private readonly store: OrderStore,
    readonly operators: readonly string[]
  ) {}

  /** One message per configured operator. */
  forOperators(text: string): OutgoingNotification[] {
    return this.operators.map((recipient) => ({ recipient, text }));
  }

  async enqueue(items: readonly OutgoingNotification[]): Promise<void> {
    try {
      await this.store.enqueueNotifications(items);
    } catch (err) {
      log.error({ err, count: items.length }, 'failed to enqueue notifications');
    }
  }

  /**
   * Operator alert for revenue-impacting failures. Never throws: an alert
   * that cannot be recorded is still logged.
   */
  async alertOperator(text: string): Promise<void> {
    log.warn({ alert: text }, 'operator alert');
    await this.enqueue(this.forOperators(text));
  }
}

export type RelayResult = { sent: number; failed: number };

export class OutboxRelay {
  // delivered rows whose sent_at did not stick; never handed to the transport again
  private readonly unmarked = new Set<number>();

  constructor(
    private readonly store: OrderStore,
    private readonly transport: NotificationTransport,
    private readonly opts: { maxAttempts: number; batchSize?: number }
  ) {}

  /** Deliver every unsent notification once; failures stay queued until maxAttempts. */
  async tick(signal?: AbortSignal): Promise<RelayResult> {
    const batch = await this.store.listUnsentNotifications(this.opts.maxAttempts, this.opts.batchSize ?? 50);
    let sent = 0;
    let failed = 0;
    for (const n of batch) {
      if (signal?.aborted) break;
      if (this.unmarked.has(n.id)) {
        await this.markSent(n);
        continue;
      }
      try {
        await this.transport.send(n.recipient, n.text);
      } catch (err) {
        failed++;
        const attempts = n.attempts + 1;
        log.warn({ err, notificationId: n.id, recipient: n.recipient, attempts }, 'notification delivery failed');
        if (attempts >= this.opts.maxAttempts) {
          log.error({ notificationId: n.id, recipient: n.recipient }, 'notification dropped after max attempts');
        }
        await this.store.markNotificationFailed(n.id, errorMessage(err));
        continue;
      }

      sent++;
      await this.markSent(n);
    }
    return { sent, failed };
  }

  private async markSent(n: Notification): Promise<void> {
    try {
      await this.store.markNotificationSent(n.id);
      this.unmarked.delete(n.id);
    } catch (err) {
      this.unmarked.add(n.id);
      log.error({ err, notificationId: n.id, recipient: n.recipient }, 'notification sent but not marked; retrying the mark');
    }
  }
}
