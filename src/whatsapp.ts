// src/whatsapp.ts
// WhatsApp Cloud API transport for buyer and operator notifications.

import { fetch, type Dispatcher } from 'undici';
import { env } from './config.js';
import type { NotificationTransport } from './notify/transport.js';

const GRAPH_BASE = 'https://graph.facebook.com';

export type WhatsAppOptions = {
  token: string;
  phoneNumberId: string;
  apiVersion?: string;
  timeoutMs?: number;
  dispatcher?: Dispatcher;
};

export class WhatsAppError extends Error {
  constructor(readonly status: number, readonly body: string) {
    super(`WhatsApp API error ${status}: ${body.slice(0, 300)}`);
    this.name = 'WhatsAppError';
  }
}

export class WhatsAppTransport implements NotificationTransport {
  private readonly msgUrl: string;

  constructor(private readonly opts: WhatsAppOptions) {
    this.msgUrl = `${GRAPH_BASE}/${opts.apiVersion ?? 'v19.0'}/${opts.phoneNumberId}/messages`;
  }

  async send(to: string, body: string): Promise<void> {
    if (!to || !body) return;
    const res = await fetch(this.msgUrl, {
      method: 'POST',
      headers: {
        Authorization: `Bearer ${this.opts.token}`,
        'Content-Type': 'application/json',
      },
      body: JSON.stringify({
        messaging_product: 'whatsapp',
        to,
        type: 'text',
        text: { preview_url: false, body },
      }),
      signal: AbortSignal.timeout(this.opts.timeoutMs ?? 10_000),
      dispatcher: this.opts.dispatcher,
    });
    if (!res.ok) {
      const txt = await res.text().catch(() => '');
      throw new WhatsAppError(res.status, txt);
    }
  }
}

export function whatsAppFromEnv(): WhatsAppTransport {
  return new WhatsAppTransport({
    token: env.WHATSAPP_TOKEN,
    phoneNumberId: env.PHONE_NUMBER_ID,
    apiVersion: env.GRAPH_API_VERSION,
  });
}
