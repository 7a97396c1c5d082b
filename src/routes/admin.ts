// src/routes/admin.ts
// Operator actions. Mounted behind requireAdmin.
import type { NextFunction, Request, Response } from 'express';
import { Router } from 'express';
import { z } from 'zod';
import type { Engine } from '../engine.js';
import { parseInput, parseOrderId } from './parse.js';

const TrackingBody = z.object({ trackingId: z.string().trim().min(1).max(64) });

type OrderAction = (orderId: number, req: Request) => Promise<unknown>;

function action(fn: OrderAction) {
  return async (req: Request, res: Response, next: NextFunction) => {
    try {
      const result = await fn(parseOrderId(req.params.id), req);
      return res.json({ ok: true, result });
    } catch (err) {
      return next(err);
    }
  };
}

export function adminRouter(engine: Engine): Router {
  const admin = Router();

  admin.post('/orders/:id/assemble', action((id) => engine.orders.markAssembled(id)));
  admin.post('/orders/:id/ship', action((id) => engine.shipments.requestShipment(id)));
  admin.post('/orders/:id/archive', action((id) => engine.orders.archiveOrder(id)));
  admin.post(
    '/orders/:id/tracking',
    action((id, req) => engine.orders.setTracking(id, parseInput(TrackingBody, req.body, 'tracking').trackingId))
  );

  return admin;
}
