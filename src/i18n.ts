// src/i18n.ts
// Buyer- and operator-facing texts. Single language for now; keys stay
// stable so a second dictionary can slot in.

const dict = {
  // ===== Buyer =====
  'payment.received_full': 'Payment received! Order #{orderId} is now being assembled.',
  'payment.received_prepay':
    'Prepayment of {amount} received. Order #{orderId} is now being assembled; the remainder ({remainder}) is due before shipping.',
  'payment.received_remainder': 'Remaining payment received. Order #{orderId} is ready to ship.',
  'order.abandoned': 'Your order #{orderId} was cancelled because no payment arrived in time.',
  'order.assembled': 'Order #{orderId} is assembled and will ship soon.',
  'order.assembled_remainder_due': 'Order #{orderId} is assembled. Please pay the remaining {remainder} so we can ship it.',
  'shipment.tracking': 'Your parcel is on its way! Order #{orderId}, tracking number: {tracking}',
  'shipment.status_update': 'Update for order #{orderId}: {status}. Tracking: {tracking}',

  // ===== Operator =====
  'ops.payment_success': '[payment] Order #{orderId}: {kind} payment {paymentId} settled ({source}). Status: {status}.',
  'ops.payment_failed': '[payment] Could not create a {kind} payment for order #{orderId}: {error}',
  'ops.payment_orphaned':
    '[payment] Order #{orderId} is {status}, yet {kind} payment {paymentId} succeeded. Refund or reconcile it manually.',
  'ops.webhook_error': '[webhook] Internal error while handling payment {paymentId}: {error}',
  'ops.sweeper_error': '[sweeper] Reconciliation failed for order #{orderId}: {error}',
  'ops.shipment_created': '[shipment] Order #{orderId} accepted by the carrier, id {carrierId}. Tracking follows automatically.',
  'ops.shipment_failed': '[shipment] Carrier request failed for order #{orderId}: {error}. Status left at assembled; retry manually.',
  'ops.shipment_unknown':
    '[shipment] Order #{orderId} has a carrier request with unknown outcome. Check with the carrier before retrying.',
  'ops.tracking_received': '[shipment] Tracking for order #{orderId}: {tracking}',
  'ops.shipment_final': '[shipment] Order #{orderId} reached "{status}" at the carrier. Archive it when appropriate.',
  'ops.poller_error': '[poller] Status check failed for order #{orderId}: {error}',
} as const;

export type MessageKey = keyof typeof dict;

function interpolate(template: string, params?: Record<string, string | number>): string {
  if (!params) return template;
  return template.replace(/\{(\w+)\}/g, (_, k: string) => String(params[k] ?? `{${k}}`));
}

export function t(key: MessageKey, params?: Record<string, string | number>): string {
  return interpolate(dict[key], params);
}

/** Integer minor units to a display amount, e.g. 599000 -> "5990.00 RUB". */
export function formatMinor(minor: number, currency: string): string {
  const sign = minor < 0 ? '-' : '';
  const abs = Math.abs(minor);
  const major = Math.floor(abs / 100);
  const cents = String(abs % 100).padStart(2, '0');
  return `${sign}${major}.${cents} ${currency}`;
}
