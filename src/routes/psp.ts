// src/routes/psp.ts
import type { NextFunction, Request, Response } from 'express';
import { Router } from 'express';
import crypto from 'node:crypto';
import { BlockList, isIPv6 } from 'node:net';
import { createLogger } from '../logger.js';
import type { PaymentWebhookHandler } from '../services/paymentWebhook.js';

const log = createLogger('psp-route');

export type PspRouteOptions = {
  /** HMAC-SHA256 key for x-psp-signature; empty disables the check. */
  webhookSecret: string;
  /** Gateway IPs or CIDRs; empty accepts any origin. */
  allowedIps: readonly string[];
};

/** Peer address; X-Forwarded-For counts only when the app trusts proxy hops. */
function clientIp(req: Request): string | undefined {
  return req.ip ?? req.socket.remoteAddress;
}

/** Hex HMAC-SHA256 of the raw body, compared in constant time. */
export function verifySignature(rawBody: string, signature: string | undefined, secret: string): boolean {
  if (!signature) return false;
  const expected = crypto.createHmac('sha256', secret).update(rawBody).digest('hex');
  const a = Buffer.from(signature.trim().toLowerCase());
  const b = Buffer.from(expected);
  return a.length === b.length && crypto.timingSafeEqual(a, b);
}

function stripMappedPrefix(ip: string): string {
  return ip.startsWith('::ffff:') ? ip.slice('::ffff:'.length) : ip;
}

/** Builds an origin check from "1.2.3.4" and "10.0.0.0/8" style entries. */
export function createOriginFilter(entries: readonly string[]): (ip: string | undefined) => boolean {
  if (!entries.length) return () => true;

  const list = new BlockList();
  for (const entry of entries) {
    const [address, prefix] = entry.split('/');
    const family = isIPv6(address) ? 'ipv6' : 'ipv4';
    if (prefix !== undefined) list.addSubnet(address, Number(prefix), family);
    else list.addAddress(address, family);
  }

  return (ip) => {
    if (!ip) return false;
    const address = stripMappedPrefix(ip);
    return list.check(address, isIPv6(address) ? 'ipv6' : 'ipv4');
  };
}

export function pspRouter(handler: PaymentWebhookHandler, opts: PspRouteOptions): Router {
  const psp = Router();
  const originAllowed = createOriginFilter(opts.allowedIps);
  // with neither check configured every event is confirmed with the gateway
  const verified = opts.webhookSecret !== '' || opts.allowedIps.length > 0;
  if (!verified) log.warn('webhook has no secret and no allowed IPs; events are confirmed with the gateway');

  /** Gateway webhook (payment.succeeded / payment.canceled) */
  psp.post('/payments/webhook', async (req: Request, res: Response, next: NextFunction) => {
    const ip = clientIp(req);
    if (!originAllowed(ip)) {
      log.warn({ ip }, 'webhook from unexpected origin');
      // Acknowledge but ignore to avoid retry storms
      return res.json({ received: true, verified: false });
    }
    if (opts.webhookSecret && !verifySignature(req.rawBody ?? '', req.get('x-psp-signature'), opts.webhookSecret)) {
      log.warn({ ip }, 'webhook signature mismatch');
      return res.json({ received: true, verified: false });
    }

    try {
      const outcome = await handler.handle(req.body, verified ? 'verified' : 'unverified');
      return res.json({ received: true, verified, outcome });
    } catch (err) {
      return next(err);
    }
  });

  return psp;
}
