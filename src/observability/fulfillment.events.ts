import { getFulfillmentPolicy } from '../config/fulfillmentPolicy';
import { getRequestContext } from '../lib/requestContext';

export const FULFILLMENT_EVENT = {
  CREATED: 'FULFILLMENT_CREATED',
  CANCELLED: 'FULFILLMENT_CANCELLED',
  RECOMPUTED: 'FULFILLMENT_RECOMPUTED',
  DRIFT_DETECTED: 'FULFILLMENT_SNAPSHOT_DRIFT_DETECTED',
  SHIPMENT_COMMITTED: 'FULFILLMENT_SHIPMENT_COMMITTED',
  SHIPMENT_STATUS_CHANGED: 'FULFILLMENT_SHIPMENT_STATUS_CHANGED',
  DELIVERY_POSTED: 'FULFILLMENT_DELIVERY_POSTED',
  PAYMENT_RECORDED: 'FULFILLMENT_PAYMENT_RECORDED',
  PAYMENT_VOIDED: 'FULFILLMENT_PAYMENT_VOIDED',
  PAYMENT_DEPOSITED: 'FULFILLMENT_PAYMENT_DEPOSITED'
} as const;

export type FulfillmentEventName = (typeof FULFILLMENT_EVENT)[keyof typeof FULFILLMENT_EVENT];

type SnapshotSummary = {
  status: string;
  fulfillmentPercentage: number;
  paymentPercentage: number;
};

export type FulfillmentEventPayloadMap = {
  [FULFILLMENT_EVENT.CREATED]: { fulfillmentId: string; fulfillmentNumber: string; orderId: string };
  [FULFILLMENT_EVENT.CANCELLED]: { fulfillmentId: string; reason: string | null };
  [FULFILLMENT_EVENT.RECOMPUTED]: { fulfillmentId: string; snapshot: SnapshotSummary };
  [FULFILLMENT_EVENT.DRIFT_DETECTED]: { fulfillmentId: string; fields: string[] };
  [FULFILLMENT_EVENT.SHIPMENT_COMMITTED]: {
    fulfillmentId: string;
    shipmentId: string;
    shipmentNumber: string;
    itemsLoaded: number;
    replayed: boolean;
  };
  [FULFILLMENT_EVENT.SHIPMENT_STATUS_CHANGED]: {
    fulfillmentId: string;
    shipmentId: string;
    from: string;
    to: string;
  };
  [FULFILLMENT_EVENT.DELIVERY_POSTED]: {
    fulfillmentId: string;
    shipmentId: string;
    outcome: 'posted' | 'already_posted';
    appliedQuantity: number;
    snapshot: SnapshotSummary;
  };
  [FULFILLMENT_EVENT.PAYMENT_RECORDED]: {
    fulfillmentId: string;
    paymentId: string;
    amount: number;
    status: string;
  };
  [FULFILLMENT_EVENT.PAYMENT_VOIDED]: {
    fulfillmentId: string;
    paymentId: string;
    amount: number;
    reason: string | null;
  };
  [FULFILLMENT_EVENT.PAYMENT_DEPOSITED]: {
    fulfillmentId: string;
    paymentId: string;
    outcome: 'deposited' | 'already_deposited';
    depositBranchId: string | null;
  };
};

export function summarizeSnapshot(snapshot: SnapshotSummary): SnapshotSummary {
  return {
    status: snapshot.status,
    fulfillmentPercentage: snapshot.fulfillmentPercentage,
    paymentPercentage: snapshot.paymentPercentage
  };
}

/**
 * Writes one JSON line per domain event. Called after the owning transaction
 * has committed.
 */
export function emitFulfillmentEvent<T extends FulfillmentEventName>(
  event: T,
  payload: FulfillmentEventPayloadMap[T],
  logger: (line: string) => void = console.log
): void {
  if (!getFulfillmentPolicy().logDomainEvents) return;
  logger(
    JSON.stringify({
      event,
      requestId: getRequestContext()?.requestId,
      ...payload,
      timestamp: new Date().toISOString()
    })
  );
}
