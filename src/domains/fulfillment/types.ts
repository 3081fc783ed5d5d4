export const FULFILLMENT_STATUSES = ['PENDING', 'PARTIALLY_FULFILLED', 'FULLY_FULFILLED', 'CANCELLED'] as const;
export type FulfillmentStatus = (typeof FULFILLMENT_STATUSES)[number];

export const SHIPMENT_STATUSES = ['scheduled', 'loading', 'in_transit', 'delivered', 'failed', 'cancelled'] as const;
export type ShipmentStatus = (typeof SHIPMENT_STATUSES)[number];

export const PAYMENT_STATUSES = ['pending', 'completed', 'voided'] as const;
export type PaymentStatus = (typeof PAYMENT_STATUSES)[number];

export const PAYMENT_METHODS = ['cash', 'bank_transfer', 'mobile_money', 'cheque', 'card', 'other'] as const;
export type PaymentMethod = (typeof PAYMENT_METHODS)[number];

export const RECORD_ORIGINS = ['SYSTEM', 'MANUAL'] as const;
export type RecordOrigin = (typeof RECORD_ORIGINS)[number];

export const EXPENSE_CATEGORIES = ['transport', 'other'] as const;
export type ExpenseCategory = (typeof EXPENSE_CATEGORIES)[number];

/** Order line as copied onto the fulfillment at creation; never edited afterwards. */
export type FulfillmentLine = {
  orderLineId: string;
  productId: string;
  productName: string | null;
  quantityOrdered: number;
  unitPrice: number;
};

/**
 * Derived fields of a fulfillment. Written only by the aggregator.
 */
export type FulfillmentSnapshot = {
  status: FulfillmentStatus;
  orderedQuantity: number;
  orderedAmount: number;
  deliveredQuantity: number;
  deliveredAmount: number;
  inFlightQuantity: number;
  remainingQuantity: number;
  unallocatedQuantity: number;
  collectedAmount: number;
  remainingBalance: number;
  fulfillmentPercentage: number;
  paymentPercentage: number;
};

export type Fulfillment = {
  id: string;
  fulfillmentNumber: string;
  orderId: string;
  orderNumber: string | null;
  destinationBranchId: string;
  lines: FulfillmentLine[];
  snapshot: FulfillmentSnapshot;
  notes: string | null;
  cancelledAt: Date | null;
  cancelReason: string | null;
  recomputedAt: Date | null;
  createdAt: Date;
  updatedAt: Date;
};

export type ShipmentLineItem = {
  id: string;
  shipmentId: string;
  orderLineId: string;
  productId: string;
  quantityOrdered: number;
  quantityDelivered: number;
  quantityRemaining: number;
  unitPrice: number;
  subtotal: number;
};

export type Shipment = {
  id: string;
  shipmentNumber: string;
  fulfillmentId: string;
  vehicleCapacity: number;
  itemsLoaded: number;
  status: ShipmentStatus;
  scheduledAt: Date | null;
  dispatchedAt: Date | null;
  deliveredAt: Date | null;
  cancelledAt: Date | null;
  cancelReason: string | null;
  failedAt: Date | null;
  failureReason: string | null;
  deliveryAddress: string | null;
  customerName: string | null;
  customerPhone: string | null;
  customerSigned: boolean;
  vehicleRef: string | null;
  driverRef: string | null;
  tripRef: string | null;
  deliveryFee: number;
  notes: string | null;
  idempotencyKey: string | null;
  lines: ShipmentLineItem[];
  createdAt: Date;
  updatedAt: Date;
};

export type PaymentEntry = {
  id: string;
  paymentNumber: string;
  fulfillmentId: string;
  shipmentId: string | null;
  collectingBranchId: string;
  amount: number;
  method: PaymentMethod;
  status: PaymentStatus;
  isDeposited: boolean;
  depositBranchId: string | null;
  depositedAt: Date | null;
  referenceNumber: string | null;
  receiptNumber: string | null;
  collectedBy: string | null;
  paidAt: Date;
  voidedAt: Date | null;
  voidReason: string | null;
  notes: string | null;
  createdAt: Date;
  updatedAt: Date;
};

export type StockMovement = {
  id: string;
  shipmentId: string;
  orderLineId: string;
  branchId: string;
  productId: string;
  quantity: number;
  direction: 'in';
  origin: RecordOrigin;
  note: string | null;
  createdAt: Date;
};

export type Expense = {
  id: string;
  expenseNumber: string;
  branchId: string;
  shipmentId: string | null;
  category: ExpenseCategory;
  amount: number;
  description: string;
  origin: RecordOrigin;
  incurredAt: Date;
  createdAt: Date;
};

export type FulfillmentFilter = {
  status?: FulfillmentStatus;
  branchId?: string;
  orderId?: string;
  withBalanceOnly?: boolean;
  limit?: number;
  offset?: number;
};

export type ShipmentFilter = {
  fulfillmentId?: string;
  status?: ShipmentStatus;
  limit?: number;
  offset?: number;
};

export type PaymentFilter = {
  fulfillmentId?: string;
  collectingBranchId?: string;
  status?: PaymentStatus;
  isDeposited?: boolean;
};

export type ExpenseFilter = {
  branchId?: string;
  origin?: RecordOrigin;
  shipmentId?: string;
};

export type DocumentSequence = 'fulfillment' | 'shipment' | 'payment' | 'expense';
