// src/middleware/auth.ts
import type { NextFunction, Request, Response } from 'express';
import crypto from 'node:crypto';
import { createLogger } from '../logger.js';

const log = createLogger('auth');

function sameSecret(a: string, b: string): boolean {
  const ab = Buffer.from(a);
  const bb = Buffer.from(b);
  return ab.length === bb.length && crypto.timingSafeEqual(ab, bb);
}

/**
 * Operator auth for /api/admin.
 * Caller must send:  Authorization: Bearer <ADMIN_TOKEN>
 * With no token configured the admin API stays closed.
 */
export function requireAdmin(token: string) {
  if (!token) log.warn('ADMIN_TOKEN is not set; /api/admin rejects every request');

  return (req: Request, res: Response, next: NextFunction) => {
    const header = req.get('authorization') ?? '';
    const provided = header.startsWith('Bearer ') ? header.slice('Bearer '.length).trim() : '';

    if (!token || !provided || !sameSecret(provided, token)) {
      return res.status(401).json({ ok: false, error: 'unauthorized' });
    }
    return next();
  };
}
