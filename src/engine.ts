// src/engine.ts
// Wires the store, clients and services together. server.ts builds one from
// the environment; tests build one from fakes.

import type { Knex } from 'knex';
import type { CarrierClient } from './carrier/carrier.js';
import type { Env } from './config.js';
import { OrderStore } from './db/orders.js';
import { PeriodicTask } from './jobs/periodic.js';
import { createLogger } from './logger.js';
import { Notifier, OutboxRelay } from './notify/outbox.js';
import type { NotificationTransport } from './notify/transport.js';
import { OrderLocks } from './orderLocks.js';
import type { PaymentGateway } from './psp/gateway.js';
import { OrderService } from './services/orders.js';
import { PaymentSweeper } from './services/paymentSweeper.js';
import { PaymentWebhookHandler } from './services/paymentWebhook.js';
import { PaymentService } from './services/payments.js';
import { ShipmentPoller } from './services/shipmentPoller.js';
import { ShipmentService } from './services/shipments.js';

const log = createLogger('engine');

export type EngineSettings = Pick<
  Env,
  | 'CURRENCY'
  | 'PREPAY_PERCENT'
  | 'PSP_RETURN_URL'
  | 'PAYMENT_TIMEOUT_SEC'
  | 'SWEEP_INTERVAL_SEC'
  | 'POLL_INTERVAL_SEC'
  | 'OUTBOX_INTERVAL_SEC'
  | 'OUTBOX_MAX_ATTEMPTS'
  | 'LOCK_SHARDS'
  | 'OPERATOR_RECIPIENTS'
>;

export type EngineDeps = {
  db: Knex;
  gateway: PaymentGateway;
  carrier: CarrierClient;
  transport: NotificationTransport;
  settings: EngineSettings;
  now?: () => Date;
};

export class Engine {
  readonly store: OrderStore;
  readonly locks: OrderLocks;
  readonly notifier: Notifier;
  readonly relay: OutboxRelay;
  readonly payments: PaymentService;
  readonly webhook: PaymentWebhookHandler;
  readonly sweeper: PaymentSweeper;
  readonly shipments: ShipmentService;
  readonly poller: ShipmentPoller;
  readonly orders: OrderService;
  readonly tasks: PeriodicTask[];

  constructor(deps: EngineDeps) {
    const s = deps.settings;
    this.store = new OrderStore(deps.db);
    this.locks = new OrderLocks(s.LOCK_SHARDS);
    this.notifier = new Notifier(this.store, s.OPERATOR_RECIPIENTS);
    this.relay = new OutboxRelay(this.store, deps.transport, { maxAttempts: s.OUTBOX_MAX_ATTEMPTS });
    this.payments = new PaymentService(this.store, deps.gateway, this.locks, this.notifier, {
      currency: s.CURRENCY,
      prepayPercent: s.PREPAY_PERCENT,
      returnUrl: s.PSP_RETURN_URL,
    });
    this.webhook = new PaymentWebhookHandler(this.store, this.locks, deps.gateway, this.payments, this.notifier);
    this.sweeper = new PaymentSweeper(this.store, deps.gateway, this.locks, this.payments, this.notifier, {
      timeoutSec: s.PAYMENT_TIMEOUT_SEC,
      now: deps.now,
    });
    this.shipments = new ShipmentService(this.store, deps.carrier, this.locks, this.notifier);
    this.poller = new ShipmentPoller(this.store, deps.carrier, this.locks, this.notifier);
    this.orders = new OrderService(this.store, this.locks, {
      currency: s.CURRENCY,
      prepayPercent: s.PREPAY_PERCENT,
    });

    this.tasks = [
      new PeriodicTask('payment-sweeper', s.SWEEP_INTERVAL_SEC * 1000, (signal) => this.sweeper.tick(signal)),
      new PeriodicTask('shipment-poller', s.POLL_INTERVAL_SEC * 1000, (signal) => this.poller.tick(signal)),
      new PeriodicTask('outbox-relay', s.OUTBOX_INTERVAL_SEC * 1000, (signal) => this.relay.tick(signal)),
    ];
  }

  start(): void {
    this.tasks.forEach((task) => task.start());
  }

  /** Stop the background tasks, then let every lock holder finish. */
  async stop(): Promise<void> {
    await Promise.all(this.tasks.map((task) => task.stop()));
    await this.locks.close();
    log.info('engine stopped');
  }
}
