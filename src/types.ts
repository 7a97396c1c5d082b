export const ORDER_STATUSES = [
  'new',
  'pending_payment',
  'paid_partially',
  'paid_full',
  'assembled',
  'shipped',
  'archived',
  'abandoned',
] as const;

export type OrderStatus = (typeof ORDER_STATUSES)[number];

export const PAYMENT_KINDS = ['full', 'prepay', 'remainder'] as const;
export type PaymentKind = (typeof PAYMENT_KINDS)[number];

/** How the buyer chose to pay at checkout. `prepay` means prepay + remainder. */
export type FulfillmentKind = 'full' | 'prepay';

export type AttemptStatus = 'pending' | 'succeeded' | 'failed';

export type PickupPoint = {
  code: string;
  address: string;
  postalCode?: string;
  cityCode?: string;
};

/**
 * Flow-specific data, always read-modify-written wholesale.
 * The payment path owns `pendingPayments` and `paymentId`.
 */
export type OrderExtension = {
  pickupPoint?: PickupPoint;
  deliveryCostMinor?: number;
  deliveryPeriod?: string;
  giftText?: string;
  pendingPayments?: Partial<Record<PaymentKind, string>>;
  paymentId?: string;
  [key: string]: unknown;
};

export type Order = {
  id: number;
  ownerRef: string;
  totalMinor: number;
  fulfillment: FulfillmentKind;
  status: OrderStatus;
  paidKind: PaymentKind | null;
  trackingId: string | null;
  extension: OrderExtension;
  createdAt: Date;
  updatedAt: Date;
  statusChangedAt: Date;
};

export type Customer = {
  ref: string;
  fullName: string | null;
  phone: string | null;
  email: string | null;
};

export type PaymentAttempt = {
  gatewayId: string;
  orderId: number;
  kind: PaymentKind;
  amountMinor: number;
  status: AttemptStatus;
  confirmationUrl: string | null;
  createdAt: Date;
  updatedAt: Date;
};

export type ShipmentState = 'requested' | 'accepted' | 'failed';

export type ShipmentRequest = {
  orderId: number;
  carrierId: string | null;
  state: ShipmentState;
  lastStatusCode: string | null;
  lastStatusDescription: string | null;
  terminal: boolean;
  raw: unknown;
  createdAt: Date;
  updatedAt: Date;
};

export type Notification = {
  id: number;
  recipient: string;
  text: string;
  attempts: number;
  lastError: string | null;
  createdAt: Date;
  sentAt: Date | null;
};

/** A message to enqueue in the outbox. */
export type OutgoingNotification = {
  recipient: string;
  text: string;
};
