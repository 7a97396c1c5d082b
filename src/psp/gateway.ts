import type { PaymentKind } from '../types.js';

export type GatewayPaymentStatus = 'pending' | 'succeeded' | 'failed';

export type CreateIntentInput = {
  orderId: number;
  ownerRef: string;
  amountMinor: number;
  kind: PaymentKind;
  description: string;
  returnUrl: string;
};

export type PaymentIntent = {
  gatewayId: string;
  confirmationUrl: string;
  status: GatewayPaymentStatus;
};

/**
 * Payment gateway contract. Implementations throw GatewayError on any failure,
 * including timeouts. createIntent is not idempotent: callers dedupe by
 * looking for a pending attempt of the same kind first.
 */
export interface PaymentGateway {
  createIntent(input: CreateIntentInput): Promise<PaymentIntent>;
  queryStatus(gatewayId: string): Promise<GatewayPaymentStatus>;
}
