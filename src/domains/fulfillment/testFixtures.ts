import type { FulfillmentLine, PaymentEntry, Shipment, ShipmentStatus } from './types';

export const fixedDate = new Date('2026-01-05T08:00:00.000Z');

export const twoLines: FulfillmentLine[] = [
  { orderLineId: 'L1', productId: 'cement', productName: 'Cement', quantityOrdered: 60, unitPrice: 500 },
  { orderLineId: 'L2', productId: 'sand', productName: 'Sand', quantityOrdered: 40, unitPrice: 500 }
];

export function makeShipment(
  id: string,
  status: ShipmentStatus,
  quantities: Record<string, number>,
  overrides: Partial<Shipment> = {}
): Shipment {
  const lines = Object.entries(quantities).map(([orderLineId, quantity]) => {
    const line = twoLines.find((candidate) => candidate.orderLineId === orderLineId);
    return {
      id: `${id}-${orderLineId}`,
      shipmentId: id,
      orderLineId,
      productId: line?.productId ?? orderLineId,
      quantityOrdered: line?.quantityOrdered ?? quantity,
      quantityDelivered: quantity,
      quantityRemaining: 0,
      unitPrice: line?.unitPrice ?? 0,
      subtotal: quantity * (line?.unitPrice ?? 0)
    };
  });
  return {
    id,
    shipmentNumber: `SHP-${id}`,
    fulfillmentId: 'f-1',
    vehicleCapacity: 100,
    itemsLoaded: lines.reduce((total, line) => total + line.quantityDelivered, 0),
    status,
    scheduledAt: fixedDate,
    dispatchedAt: null,
    deliveredAt: status === 'delivered' ? fixedDate : null,
    cancelledAt: null,
    cancelReason: null,
    failedAt: null,
    failureReason: null,
    deliveryAddress: null,
    customerName: null,
    customerPhone: null,
    customerSigned: false,
    vehicleRef: null,
    driverRef: null,
    tripRef: null,
    deliveryFee: 0,
    notes: null,
    idempotencyKey: null,
    lines,
    createdAt: fixedDate,
    updatedAt: fixedDate,
    ...overrides
  };
}

export function makePayment(id: string, amount: number, overrides: Partial<PaymentEntry> = {}): PaymentEntry {
  return {
    id,
    paymentNumber: `PAY-${id}`,
    fulfillmentId: 'f-1',
    shipmentId: null,
    collectingBranchId: 'branch-a',
    amount,
    method: 'cash',
    status: 'completed',
    isDeposited: false,
    depositBranchId: null,
    depositedAt: null,
    referenceNumber: null,
    receiptNumber: null,
    collectedBy: null,
    paidAt: fixedDate,
    voidedAt: null,
    voidReason: null,
    notes: null,
    createdAt: fixedDate,
    updatedAt: fixedDate,
    ...overrides
  };
}
