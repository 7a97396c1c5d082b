// src/routes/orders.ts
// Buyer-side surface called by the conversational front end.
import type { NextFunction, Request, Response } from 'express';
import { Router } from 'express';
import { z } from 'zod';
import { PickupPointSchema } from '../db/orders.js';
import type { Engine } from '../engine.js';
import { PAYMENT_KINDS } from '../types.js';
import { parseInput, parseOrderId } from './parse.js';

const CreateOrderBody = z.object({
  ownerRef: z.string().min(1),
  totalMinor: z.number().int().positive(),
  fulfillment: z.enum(['full', 'prepay']).default('full'),
  customer: z
    .object({
      fullName: z.string().min(1).nullable().default(null),
      phone: z.string().min(5).nullable().default(null),
      email: z.string().email().nullable().default(null),
    })
    .optional(),
  extension: z
    .object({
      pickupPoint: PickupPointSchema.optional(),
      deliveryCostMinor: z.number().int().nonnegative().optional(),
      deliveryPeriod: z.string().optional(),
      giftText: z.string().max(500).optional(),
    })
    .default({}),
});

const PayBody = z.object({ kind: z.enum(PAYMENT_KINDS) });

export function ordersRouter(engine: Engine): Router {
  const orders = Router();

  orders.post('/orders', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const body = parseInput(CreateOrderBody, req.body, 'order');
      const order = await engine.orders.createOrder(body);
      return res.status(201).json({ ok: true, order });
    } catch (err) {
      return next(err);
    }
  });

  orders.get('/orders/:id', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const view = await engine.orders.getStatus(parseOrderId(req.params.id));
      return res.json({ ok: true, ...view });
    } catch (err) {
      return next(err);
    }
  });

  orders.post('/orders/:id/pay', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const orderId = parseOrderId(req.params.id);
      const { kind } = parseInput(PayBody, req.body, 'payment request');
      const { attempt, confirmationUrl, reused } = await engine.payments.startPayment(orderId, kind);
      return res.json({
        ok: true,
        paymentId: attempt.gatewayId,
        amountMinor: attempt.amountMinor,
        confirmationUrl,
        reused,
      });
    } catch (err) {
      return next(err);
    }
  });

  /** Buyer is back from the payment page: reconcile with the gateway now. */
  orders.get('/orders/:id/confirm', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { outcome, order } = await engine.payments.confirmPayment(parseOrderId(req.params.id));
      return res.json({ ok: true, outcome, status: order.status, paidKind: order.paidKind });
    } catch (err) {
      return next(err);
    }
  });

  orders.post('/orders/:id/cancel', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const order = await engine.orders.cancelOrder(parseOrderId(req.params.id));
      return res.json({ ok: true, order });
    } catch (err) {
      return next(err);
    }
  });

  return orders;
}
