import type { InventorySink } from './internal/stockPoster';
import type {
  DocumentSequence,
  Expense,
  ExpenseFilter,
  Fulfillment,
  FulfillmentFilter,
  FulfillmentSnapshot,
  PaymentEntry,
  PaymentFilter,
  Shipment,
  ShipmentFilter,
  StockMovement
} from './types';

export type MovementFilter = {
  shipmentId?: string;
  branchId?: string;
};

/**
 * One unit of work. Everything done through a tx commits together or not at
 * all. `lock*` reads take an exclusive row lock held until the end of the tx.
 */
export interface FulfillmentTx {
  readonly inventory: InventorySink;

  lockFulfillment(id: string): Promise<Fulfillment | null>;
  findActiveFulfillmentForOrder(orderId: string): Promise<Fulfillment | null>;
  insertFulfillment(fulfillment: Fulfillment): Promise<void>;
  writeSnapshot(id: string, snapshot: FulfillmentSnapshot, now: Date): Promise<void>;
  markFulfillmentCancelled(id: string, reason: string | null, now: Date): Promise<void>;
  deleteFulfillment(id: string): Promise<void>;
  nextNumber(sequence: DocumentSequence): Promise<string>;

  findShipmentFulfillmentId(shipmentId: string): Promise<string | null>;
  listShipmentsForFulfillment(fulfillmentId: string): Promise<Shipment[]>;
  findShipmentByIdempotencyKey(fulfillmentId: string, key: string): Promise<Shipment | null>;
  lockShipment(id: string): Promise<Shipment | null>;
  insertShipment(shipment: Shipment): Promise<void>;
  updateShipment(shipment: Shipment): Promise<void>;

  findPaymentFulfillmentId(paymentId: string): Promise<string | null>;
  listPaymentsForFulfillment(fulfillmentId: string): Promise<PaymentEntry[]>;
  lockPayment(id: string): Promise<PaymentEntry | null>;
  insertPayment(entry: PaymentEntry): Promise<void>;
  updatePayment(entry: PaymentEntry): Promise<void>;

  findSystemExpenseForShipment(shipmentId: string): Promise<Expense | null>;
  lockExpense(id: string): Promise<Expense | null>;
  insertExpense(expense: Expense): Promise<void>;
  deleteExpense(id: string): Promise<void>;
}

/** Lock-free reads for query endpoints. */
export interface FulfillmentReader {
  getFulfillment(id: string): Promise<Fulfillment | null>;
  listFulfillments(filter: FulfillmentFilter): Promise<Fulfillment[]>;
  getShipment(id: string): Promise<Shipment | null>;
  listShipments(filter: ShipmentFilter): Promise<Shipment[]>;
  getPayment(id: string): Promise<PaymentEntry | null>;
  listPayments(filter: PaymentFilter): Promise<PaymentEntry[]>;
  listMovements(filter: MovementFilter): Promise<StockMovement[]>;
  getStockLevel(branchId: string, productId: string): Promise<number>;
  getExpense(id: string): Promise<Expense | null>;
  listExpenses(filter: ExpenseFilter): Promise<Expense[]>;
}

export interface FulfillmentStore {
  readonly reader: FulfillmentReader;
  transaction<T>(work: (tx: FulfillmentTx) => Promise<T>): Promise<T>;
}

const NUMBER_PREFIX: Record<DocumentSequence, string> = {
  fulfillment: 'FUL',
  shipment: 'SHP',
  payment: 'PAY',
  expense: 'EXP'
};

export function formatDocumentNumber(sequence: DocumentSequence, value: number): string {
  return `${NUMBER_PREFIX[sequence]}-${String(value).padStart(6, '0')}`;
}
