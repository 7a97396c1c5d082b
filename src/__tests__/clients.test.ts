import { MockAgent } from 'undici';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { RestCarrierClient, normalizePhone } from '../carrier/restCarrier.js';
import { CarrierError, GatewayError } from '../errors.js';
import { RestPaymentGateway, mapProviderStatus, toAmountValue } from '../psp/restGateway.js';
import { WhatsAppError, WhatsAppTransport } from '../whatsapp.js';
import { PICKUP } from './helpers.js';

const PSP = 'https://psp.example.test';
const CARRIER = 'https://carrier.example.test';

let agent: MockAgent;

beforeEach(() => {
  agent = new MockAgent();
  agent.disableNetConnect();
});

afterEach(async () => {
  await agent.close();
});

describe('RestPaymentGateway', () => {
  function gateway() {
    return new RestPaymentGateway({
      baseUrl: `${PSP}/`,
      shopId: 'shop-1',
      secretKey: 'test-secret',
      currency: 'RUB',
      timeoutMs: 1000,
      dispatcher: agent,
    });
  }

  it('maps provider statuses and amounts', () => {
    expect(mapProviderStatus('succeeded')).toBe('succeeded');
    expect(mapProviderStatus('CANCELED')).toBe('failed');
    expect(mapProviderStatus('waiting_for_capture')).toBe('pending');
    expect(toAmountValue(599005)).toBe('5990.05');
    expect(toAmountValue(7)).toBe('0.07');
  });

  it('creates an intent with order metadata', async () => {
    let sent: unknown;
    agent
      .get(PSP)
      .intercept({
        path: '/payments',
        method: 'POST',
        headers: { authorization: `Basic ${Buffer.from('shop-1:test-secret').toString('base64')}` },
        body: (body: string) => {
          sent = JSON.parse(body);
          return true;
        },
      })
      .reply(200, {
        id: 'pay-42',
        status: 'pending',
        confirmation: { type: 'redirect', confirmation_url: `${PSP}/confirm/42` },
      });

    const intent = await gateway().createIntent({
      orderId: 42,
      ownerRef: 'buyer-1',
      amountMinor: 179700,
      kind: 'prepay',
      description: 'Order #42 (prepay)',
      returnUrl: 'https://shop.example.test/return',
    });

    expect(intent).toEqual({ gatewayId: 'pay-42', confirmationUrl: `${PSP}/confirm/42`, status: 'pending' });
    expect(sent).toEqual({
      amount: { value: '1797.00', currency: 'RUB' },
      confirmation: { type: 'redirect', return_url: 'https://shop.example.test/return' },
      capture: true,
      description: 'Order #42 (prepay)',
      metadata: { order_id: '42', owner_ref: 'buyer-1', payment_kind: 'prepay' },
    });
  });

  it('queries a payment status', async () => {
    agent.get(PSP).intercept({ path: '/payments/pay-42', method: 'GET' }).reply(200, { id: 'pay-42', status: 'canceled' });

    await expect(gateway().queryStatus('pay-42')).resolves.toBe('failed');
  });

  it('turns an error status into a GatewayError', async () => {
    agent.get(PSP).intercept({ path: '/payments/pay-1', method: 'GET' }).reply(503, 'busy');

    const err = await gateway().queryStatus('pay-1').catch((e: unknown) => e);
    expect(err).toBeInstanceOf(GatewayError);
    expect(err instanceof GatewayError && err.status).toBe(503);
  });

  it('turns a transport failure into a GatewayError without a status', async () => {
    agent.get(PSP).intercept({ path: '/payments/pay-1', method: 'GET' }).replyWithError(new Error('socket hang up'));

    const err = await gateway().queryStatus('pay-1').catch((e: unknown) => e);
    expect(err).toBeInstanceOf(GatewayError);
    expect(err instanceof GatewayError && err.status).toBeNull();
  });

  it('rejects an unexpected body', async () => {
    agent.get(PSP).intercept({ path: '/payments/pay-1', method: 'GET' }).reply(200, { nope: true });

    await expect(gateway().queryStatus('pay-1')).rejects.toThrow('GET /payments/pay-1 returned an unexpected body');
  });
});

describe('RestCarrierClient', () => {
  let clock = 0;

  function carrier() {
    return new RestCarrierClient({
      baseUrl: CARRIER,
      clientId: 'client-1',
      clientSecret: 'test-secret',
      shipmentPoint: 'MSK-WH1',
      tariffCode: 136,
      packageSpec: { weightG: 750, lengthCm: 26, widthCm: 19, heightCm: 8 },
      itemName: 'Gift box',
      timeoutMs: 1000,
      dispatcher: agent,
      now: () => clock,
    });
  }

  const snapshot = {
    idempotencyKey: '7',
    orderId: 7,
    recipient: { name: 'Anna Petrova', phone: '+7 (900) 000-00-01', email: null },
    pickupPoint: PICKUP,
    declaredValueMinor: 599000,
    comment: 'Order #7',
  };

  beforeEach(() => {
    clock = 1_000_000;
  });

  it('normalizes phone numbers', () => {
    expect(normalizePhone('+7 (900) 000-00-01')).toBe('+79000000001');
    expect(normalizePhone('8 900 000 00 01')).toBe('89000000001');
  });

  it('creates a shipment and reuses the cached token', async () => {
    const pool = agent.get(CARRIER);
    pool.intercept({ path: '/oauth/token', method: 'POST' }).reply(200, { access_token: 'tok-1', expires_in: 3600 });
    let payload: unknown;
    pool
      .intercept({
        path: '/orders',
        method: 'POST',
        headers: { authorization: 'Bearer tok-1' },
        body: (body: string) => {
          payload = JSON.parse(body);
          return true;
        },
      })
      .reply(200, { entity: { uuid: 'c-1' } });
    pool
      .intercept({ path: '/orders/c-1', method: 'GET', headers: { authorization: 'Bearer tok-1' } })
      .reply(200, {
        entity: { uuid: 'c-1', tracking_number: 'TRK-7', status: { code: 'DELIVERED', description: 'Delivered' } },
      });

    const client = carrier();
    const created = await client.createShipment(snapshot);
    const info = await client.getShipment('c-1');

    expect(created).toEqual({ carrierId: 'c-1', raw: { entity: { uuid: 'c-1' } } });
    expect(payload).toMatchObject({
      number: '7',
      tariff_code: 136,
      shipment_point: 'MSK-WH1',
      to_location: { code: 'MSK-101', address: 'Tverskaya 1, Moscow', postal_code: '125009' },
      recipient: { name: 'Anna Petrova', phones: [{ number: '+79000000001' }] },
      services: [{ code: 'INSURANCE', parameter: 5990 }],
    });
    expect(info).toMatchObject({ carrierId: 'c-1', trackingNumber: 'TRK-7', statusCode: 'DELIVERED', statusDescription: 'Delivered' });
    agent.assertNoPendingInterceptors();
  });

  it('fetches a new token once the old one expires', async () => {
    const pool = agent.get(CARRIER);
    pool.intercept({ path: '/oauth/token', method: 'POST' }).reply(200, { access_token: 'tok-1', expires_in: 60 });
    pool.intercept({ path: '/orders/c-1', method: 'GET', headers: { authorization: 'Bearer tok-1' } }).reply(200, { entity: { uuid: 'c-1' } });
    pool.intercept({ path: '/oauth/token', method: 'POST' }).reply(200, { access_token: 'tok-2', expires_in: 60 });
    pool.intercept({ path: '/orders/c-1', method: 'GET', headers: { authorization: 'Bearer tok-2' } }).reply(200, { entity: { uuid: 'c-1' } });

    const client = carrier();
    const first = await client.getShipment('c-1');
    clock += 55_000;
    await client.getShipment('c-1');

    expect(first).toMatchObject({ trackingNumber: null, statusCode: null, statusDescription: null });
    agent.assertNoPendingInterceptors();
  });

  it('turns a rejected request into a CarrierError', async () => {
    const pool = agent.get(CARRIER);
    pool.intercept({ path: '/oauth/token', method: 'POST' }).reply(200, { access_token: 'tok-1' });
    pool.intercept({ path: '/orders', method: 'POST' }).reply(400, { errors: [{ message: 'bad pickup point' }] });

    const err = await carrier()
      .createShipment(snapshot)
      .catch((e: unknown) => e);
    expect(err).toBeInstanceOf(CarrierError);
    expect(err instanceof CarrierError && err.status).toBe(400);
  });
});

describe('WhatsAppTransport', () => {
  const GRAPH = 'https://graph.facebook.com';

  function transport() {
    return new WhatsAppTransport({ token: 'test-token', phoneNumberId: '1001', apiVersion: 'v19.0', dispatcher: agent });
  }

  it('posts a text message', async () => {
    let sent: unknown;
    agent
      .get(GRAPH)
      .intercept({
        path: '/v19.0/1001/messages',
        method: 'POST',
        body: (body: string) => {
          sent = JSON.parse(body);
          return true;
        },
      })
      .reply(200, { messages: [{ id: 'wamid.1' }] });

    await transport().send('79000000001', 'hello');

    expect(sent).toEqual({
      messaging_product: 'whatsapp',
      to: '79000000001',
      type: 'text',
      text: { preview_url: false, body: 'hello' },
    });
  });

  it('throws on an API error so the outbox retries', async () => {
    agent.get(GRAPH).intercept({ path: '/v19.0/1001/messages', method: 'POST' }).reply(400, 'invalid recipient');

    await expect(transport().send('nobody', 'hello')).rejects.toBeInstanceOf(WhatsAppError);
  });
});
