import type { PickupPoint } from '../types.js';

export type ShipmentSnapshot = {
  /** Business key; the order id, so a replayed request maps to one parcel. */
  idempotencyKey: string;
  orderId: number;
  recipient: { name: string; phone: string; email: string | null };
  pickupPoint: PickupPoint;
  declaredValueMinor: number;
  comment: string;
};

export type CreatedShipment = {
  carrierId: string;
  raw: unknown;
};

export type ShipmentInfo = {
  carrierId: string;
  trackingNumber: string | null;
  statusCode: string | null;
  statusDescription: string | null;
  raw: unknown;
};

/**
 * Shipping carrier contract. Implementations throw CarrierError on any
 * failure, including timeouts.
 */
export interface CarrierClient {
  createShipment(snapshot: ShipmentSnapshot): Promise<CreatedShipment>;
  getShipment(carrierId: string): Promise<ShipmentInfo>;
}
