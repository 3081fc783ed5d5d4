import type { QueryResult, QueryResultRow } from 'pg';
import { query, withTransactionRetry, type PoolClient } from '../../../db';
import { getFulfillmentPolicy } from '../../../config/fulfillmentPolicy';
import { hasPgCode, PG_ERROR } from '../../../lib/pgErrors';
import { toNumber } from '../../../lib/numbers';
import { FULFILLMENT_ERROR, FulfillmentError } from '../errors';
import {
  formatDocumentNumber,
  type FulfillmentReader,
  type FulfillmentStore,
  type FulfillmentTx,
  type MovementFilter
} from '../store';
import type {
  DocumentSequence,
  Expense,
  ExpenseCategory,
  ExpenseFilter,
  Fulfillment,
  FulfillmentFilter,
  FulfillmentLine,
  FulfillmentSnapshot,
  FulfillmentStatus,
  PaymentEntry,
  PaymentFilter,
  PaymentMethod,
  PaymentStatus,
  RecordOrigin,
  Shipment,
  ShipmentFilter,
  ShipmentLineItem,
  ShipmentStatus,
  StockMovement
} from '../types';
import type { InventorySink } from './stockPoster';

type Numeric = string | number;

type Runner = <R extends QueryResultRow>(text: string, params: unknown[]) => Promise<QueryResult<R>>;

function clientRunner(client: PoolClient): Runner {
  return <R extends QueryResultRow>(text: string, params: unknown[]) => client.query<R>(text, params);
}

const poolRunner: Runner = <R extends QueryResultRow>(text: string, params: unknown[]) => query<R>(text, params);

type FulfillmentRow = {
  id: string;
  fulfillment_number: string;
  order_id: string;
  order_number: string | null;
  destination_branch_id: string;
  status: FulfillmentStatus;
  ordered_quantity: Numeric;
  ordered_amount: Numeric;
  delivered_quantity: Numeric;
  delivered_amount: Numeric;
  in_flight_quantity: Numeric;
  remaining_quantity: Numeric;
  unallocated_quantity: Numeric;
  collected_amount: Numeric;
  remaining_balance: Numeric;
  fulfillment_percentage: Numeric;
  payment_percentage: Numeric;
  notes: string | null;
  cancelled_at: Date | null;
  cancel_reason: string | null;
  recomputed_at: Date | null;
  created_at: Date;
  updated_at: Date;
};

type FulfillmentLineRow = {
  fulfillment_id: string;
  order_line_id: string;
  product_id: string;
  product_name: string | null;
  quantity_ordered: Numeric;
  unit_price: Numeric;
};

type ShipmentRow = {
  id: string;
  shipment_number: string;
  fulfillment_id: string;
  vehicle_capacity: Numeric;
  items_loaded: Numeric;
  status: ShipmentStatus;
  scheduled_at: Date | null;
  dispatched_at: Date | null;
  delivered_at: Date | null;
  cancelled_at: Date | null;
  cancel_reason: string | null;
  failed_at: Date | null;
  failure_reason: string | null;
  delivery_address: string | null;
  customer_name: string | null;
  customer_phone: string | null;
  customer_signed: boolean;
  vehicle_ref: string | null;
  driver_ref: string | null;
  trip_ref: string | null;
  delivery_fee: Numeric;
  notes: string | null;
  idempotency_key: string | null;
  created_at: Date;
  updated_at: Date;
};

type ShipmentLineRow = {
  id: string;
  shipment_id: string;
  order_line_id: string;
  product_id: string;
  quantity_ordered: Numeric;
  quantity_delivered: Numeric;
  quantity_remaining: Numeric;
  unit_price: Numeric;
  subtotal: Numeric;
};

type PaymentRow = {
  id: string;
  payment_number: string;
  fulfillment_id: string;
  shipment_id: string | null;
  collecting_branch_id: string;
  amount: Numeric;
  method: PaymentMethod;
  status: PaymentStatus;
  is_deposited: boolean;
  deposit_branch_id: string | null;
  deposited_at: Date | null;
  reference_number: string | null;
  receipt_number: string | null;
  collected_by: string | null;
  paid_at: Date;
  voided_at: Date | null;
  void_reason: string | null;
  notes: string | null;
  created_at: Date;
  updated_at: Date;
};

type MovementRow = {
  id: string;
  shipment_id: string;
  order_line_id: string;
  branch_id: string;
  product_id: string;
  quantity: Numeric;
  origin: RecordOrigin;
  note: string | null;
  created_at: Date;
};

type ExpenseRow = {
  id: string;
  expense_number: string;
  branch_id: string;
  shipment_id: string | null;
  category: ExpenseCategory;
  amount: Numeric;
  description: string;
  origin: RecordOrigin;
  incurred_at: Date;
  created_at: Date;
};

const SEQUENCE_NAME: Record<DocumentSequence, string> = {
  fulfillment: 'fulfillment_number_seq',
  shipment: 'shipment_number_seq',
  payment: 'payment_number_seq',
  expense: 'expense_number_seq'
};

function mapFulfillment(row: FulfillmentRow, lines: FulfillmentLineRow[]): Fulfillment {
  return {
    id: row.id,
    fulfillmentNumber: row.fulfillment_number,
    orderId: row.order_id,
    orderNumber: row.order_number,
    destinationBranchId: row.destination_branch_id,
    lines: lines.map(
      (line): FulfillmentLine => ({
        orderLineId: line.order_line_id,
        productId: line.product_id,
        productName: line.product_name,
        quantityOrdered: toNumber(line.quantity_ordered),
        unitPrice: toNumber(line.unit_price)
      })
    ),
    snapshot: {
      status: row.status,
      orderedQuantity: toNumber(row.ordered_quantity),
      orderedAmount: toNumber(row.ordered_amount),
      deliveredQuantity: toNumber(row.delivered_quantity),
      deliveredAmount: toNumber(row.delivered_amount),
      inFlightQuantity: toNumber(row.in_flight_quantity),
      remainingQuantity: toNumber(row.remaining_quantity),
      unallocatedQuantity: toNumber(row.unallocated_quantity),
      collectedAmount: toNumber(row.collected_amount),
      remainingBalance: toNumber(row.remaining_balance),
      fulfillmentPercentage: toNumber(row.fulfillment_percentage),
      paymentPercentage: toNumber(row.payment_percentage)
    },
    notes: row.notes,
    cancelledAt: row.cancelled_at,
    cancelReason: row.cancel_reason,
    recomputedAt: row.recomputed_at,
    createdAt: row.created_at,
    updatedAt: row.updated_at
  };
}

function mapShipmentLine(row: ShipmentLineRow): ShipmentLineItem {
  return {
    id: row.id,
    shipmentId: row.shipment_id,
    orderLineId: row.order_line_id,
    productId: row.product_id,
    quantityOrdered: toNumber(row.quantity_ordered),
    quantityDelivered: toNumber(row.quantity_delivered),
    quantityRemaining: toNumber(row.quantity_remaining),
    unitPrice: toNumber(row.unit_price),
    subtotal: toNumber(row.subtotal)
  };
}

function mapShipment(row: ShipmentRow, lines: ShipmentLineRow[]): Shipment {
  return {
    id: row.id,
    shipmentNumber: row.shipment_number,
    fulfillmentId: row.fulfillment_id,
    vehicleCapacity: toNumber(row.vehicle_capacity),
    itemsLoaded: toNumber(row.items_loaded),
    status: row.status,
    scheduledAt: row.scheduled_at,
    dispatchedAt: row.dispatched_at,
    deliveredAt: row.delivered_at,
    cancelledAt: row.cancelled_at,
    cancelReason: row.cancel_reason,
    failedAt: row.failed_at,
    failureReason: row.failure_reason,
    deliveryAddress: row.delivery_address,
    customerName: row.customer_name,
    customerPhone: row.customer_phone,
    customerSigned: row.customer_signed,
    vehicleRef: row.vehicle_ref,
    driverRef: row.driver_ref,
    tripRef: row.trip_ref,
    deliveryFee: toNumber(row.delivery_fee),
    notes: row.notes,
    idempotencyKey: row.idempotency_key,
    lines: lines.map(mapShipmentLine),
    createdAt: row.created_at,
    updatedAt: row.updated_at
  };
}

function mapPayment(row: PaymentRow): PaymentEntry {
  return {
    id: row.id,
    paymentNumber: row.payment_number,
    fulfillmentId: row.fulfillment_id,
    shipmentId: row.shipment_id,
    collectingBranchId: row.collecting_branch_id,
    amount: toNumber(row.amount),
    method: row.method,
    status: row.status,
    isDeposited: row.is_deposited,
    depositBranchId: row.deposit_branch_id,
    depositedAt: row.deposited_at,
    referenceNumber: row.reference_number,
    receiptNumber: row.receipt_number,
    collectedBy: row.collected_by,
    paidAt: row.paid_at,
    voidedAt: row.voided_at,
    voidReason: row.void_reason,
    notes: row.notes,
    createdAt: row.created_at,
    updatedAt: row.updated_at
  };
}

function mapMovement(row: MovementRow): StockMovement {
  return {
    id: row.id,
    shipmentId: row.shipment_id,
    orderLineId: row.order_line_id,
    branchId: row.branch_id,
    productId: row.product_id,
    quantity: toNumber(row.quantity),
    direction: 'in',
    origin: row.origin,
    note: row.note,
    createdAt: row.created_at
  };
}

function mapExpense(row: ExpenseRow): Expense {
  return {
    id: row.id,
    expenseNumber: row.expense_number,
    branchId: row.branch_id,
    shipmentId: row.shipment_id,
    category: row.category,
    amount: toNumber(row.amount),
    description: row.description,
    origin: row.origin,
    incurredAt: row.incurred_at,
    createdAt: row.created_at
  };
}

function groupBy<T>(rows: T[], keyOf: (row: T) => string): Map<string, T[]> {
  const grouped = new Map<string, T[]>();
  for (const row of rows) {
    const key = keyOf(row);
    const bucket = grouped.get(key);
    if (bucket) {
      bucket.push(row);
    } else {
      grouped.set(key, [row]);
    }
  }
  return grouped;
}

async function loadFulfillments(run: Runner, rows: FulfillmentRow[]): Promise<Fulfillment[]> {
  if (rows.length === 0) return [];
  const lines = await run<FulfillmentLineRow>(
    `SELECT * FROM fulfillment_lines WHERE fulfillment_id = ANY($1::uuid[]) ORDER BY order_line_id ASC`,
    [rows.map((row) => row.id)]
  );
  const byFulfillment = groupBy(lines.rows, (line) => line.fulfillment_id);
  return rows.map((row) => mapFulfillment(row, byFulfillment.get(row.id) ?? []));
}

async function loadShipments(run: Runner, rows: ShipmentRow[]): Promise<Shipment[]> {
  if (rows.length === 0) return [];
  const lines = await run<ShipmentLineRow>(
    `SELECT * FROM fulfillment_shipment_lines WHERE shipment_id = ANY($1::uuid[]) ORDER BY order_line_id ASC`,
    [rows.map((row) => row.id)]
  );
  const byShipment = groupBy(lines.rows, (line) => line.shipment_id);
  return rows.map((row) => mapShipment(row, byShipment.get(row.id) ?? []));
}

async function first<T>(promise: Promise<T[]>): Promise<T | null> {
  const rows = await promise;
  return rows[0] ?? null;
}

class PgInventory implements InventorySink {
  constructor(private readonly client: PoolClient) {}

  async findMovementsForShipment(shipmentId: string): Promise<StockMovement[]> {
    const res = await this.client.query<MovementRow>(
      `SELECT * FROM stock_movements WHERE shipment_id = $1 ORDER BY order_line_id ASC`,
      [shipmentId]
    );
    return res.rows.map(mapMovement);
  }

  async applyStock(branchId: string, productId: string, delta: number): Promise<void> {
    await this.client.query(
      `INSERT INTO branch_stock (branch_id, product_id, quantity, updated_at)
       VALUES ($1, $2, $3, now())
       ON CONFLICT (branch_id, product_id)
       DO UPDATE SET quantity = branch_stock.quantity + EXCLUDED.quantity, updated_at = now()`,
      [branchId, productId, delta]
    );
  }

  async recordMovement(movement: StockMovement): Promise<void> {
    try {
      await this.client.query(
        `INSERT INTO stock_movements (id, shipment_id, order_line_id, branch_id, product_id, quantity, direction, origin, note, created_at)
         VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10)`,
        [
          movement.id,
          movement.shipmentId,
          movement.orderLineId,
          movement.branchId,
          movement.productId,
          movement.quantity,
          movement.direction,
          movement.origin,
          movement.note,
          movement.createdAt
        ]
      );
    } catch (err) {
      if (hasPgCode(err, PG_ERROR.UNIQUE_VIOLATION)) {
        throw new FulfillmentError(FULFILLMENT_ERROR.ALREADY_POSTED, {
          shipmentId: movement.shipmentId,
          orderLineId: movement.orderLineId
        });
      }
      throw err;
    }
  }
}

class PgTx implements FulfillmentTx {
  readonly inventory: InventorySink;
  private readonly run: Runner;

  constructor(private readonly client: PoolClient) {
    this.inventory = new PgInventory(client);
    this.run = clientRunner(client);
  }

  async lockFulfillment(id: string) {
    const res = await this.client.query<FulfillmentRow>(`SELECT * FROM fulfillments WHERE id = $1 FOR UPDATE`, [id]);
    return first(loadFulfillments(this.run, res.rows));
  }

  async findActiveFulfillmentForOrder(orderId: string) {
    const res = await this.client.query<FulfillmentRow>(
      `SELECT * FROM fulfillments WHERE order_id = $1 AND status <> 'CANCELLED' LIMIT 1`,
      [orderId]
    );
    return first(loadFulfillments(this.run, res.rows));
  }

  async insertFulfillment(fulfillment: Fulfillment) {
    const { snapshot } = fulfillment;
    await this.client.query(
      `INSERT INTO fulfillments (
          id, fulfillment_number, order_id, order_number, destination_branch_id, status,
          ordered_quantity, ordered_amount, delivered_quantity, delivered_amount, in_flight_quantity,
          remaining_quantity, unallocated_quantity, collected_amount, remaining_balance,
          fulfillment_percentage, payment_percentage, notes, recomputed_at, created_at, updated_at
       ) VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10, $11, $12, $13, $14, $15, $16, $17, $18, $19, $20, $21)`,
      [
        fulfillment.id,
        fulfillment.fulfillmentNumber,
        fulfillment.orderId,
        fulfillment.orderNumber,
        fulfillment.destinationBranchId,
        snapshot.status,
        snapshot.orderedQuantity,
        snapshot.orderedAmount,
        snapshot.deliveredQuantity,
        snapshot.deliveredAmount,
        snapshot.inFlightQuantity,
        snapshot.remainingQuantity,
        snapshot.unallocatedQuantity,
        snapshot.collectedAmount,
        snapshot.remainingBalance,
        snapshot.fulfillmentPercentage,
        snapshot.paymentPercentage,
        fulfillment.notes,
        fulfillment.recomputedAt,
        fulfillment.createdAt,
        fulfillment.updatedAt
      ]
    );
    for (const line of fulfillment.lines) {
      await this.client.query(
        `INSERT INTO fulfillment_lines (fulfillment_id, order_line_id, product_id, product_name, quantity_ordered, unit_price)
         VALUES ($1, $2, $3, $4, $5, $6)`,
        [fulfillment.id, line.orderLineId, line.productId, line.productName, line.quantityOrdered, line.unitPrice]
      );
    }
  }

  async writeSnapshot(id: string, snapshot: FulfillmentSnapshot, now: Date) {
    await this.client.query(
      `UPDATE fulfillments
          SET status = $2,
              ordered_quantity = $3,
              ordered_amount = $4,
              delivered_quantity = $5,
              delivered_amount = $6,
              in_flight_quantity = $7,
              remaining_quantity = $8,
              unallocated_quantity = $9,
              collected_amount = $10,
              remaining_balance = $11,
              fulfillment_percentage = $12,
              payment_percentage = $13,
              recomputed_at = $14,
              updated_at = $14
        WHERE id = $1`,
      [
        id,
        snapshot.status,
        snapshot.orderedQuantity,
        snapshot.orderedAmount,
        snapshot.deliveredQuantity,
        snapshot.deliveredAmount,
        snapshot.inFlightQuantity,
        snapshot.remainingQuantity,
        snapshot.unallocatedQuantity,
        snapshot.collectedAmount,
        snapshot.remainingBalance,
        snapshot.fulfillmentPercentage,
        snapshot.paymentPercentage,
        now
      ]
    );
  }

  async markFulfillmentCancelled(id: string, reason: string | null, now: Date) {
    await this.client.query(
      `UPDATE fulfillments SET status = 'CANCELLED', cancelled_at = $2, cancel_reason = $3, updated_at = $2 WHERE id = $1`,
      [id, now, reason]
    );
  }

  async deleteFulfillment(id: string) {
    await this.client.query(`DELETE FROM fulfillments WHERE id = $1`, [id]);
  }

  async nextNumber(sequence: DocumentSequence) {
    const res = await this.client.query<{ value: Numeric }>(`SELECT nextval($1::regclass) AS value`, [
      SEQUENCE_NAME[sequence]
    ]);
    return formatDocumentNumber(sequence, toNumber(res.rows[0]?.value));
  }

  async findShipmentFulfillmentId(shipmentId: string) {
    const res = await this.client.query<{ fulfillment_id: string }>(
      `SELECT fulfillment_id FROM fulfillment_shipments WHERE id = $1`,
      [shipmentId]
    );
    return res.rows[0]?.fulfillment_id ?? null;
  }

  async listShipmentsForFulfillment(fulfillmentId: string) {
    const res = await this.client.query<ShipmentRow>(
      `SELECT * FROM fulfillment_shipments WHERE fulfillment_id = $1 ORDER BY shipment_number ASC`,
      [fulfillmentId]
    );
    return loadShipments(this.run, res.rows);
  }

  async findShipmentByIdempotencyKey(fulfillmentId: string, key: string) {
    const res = await this.client.query<ShipmentRow>(
      `SELECT * FROM fulfillment_shipments WHERE fulfillment_id = $1 AND idempotency_key = $2`,
      [fulfillmentId, key]
    );
    return first(loadShipments(this.run, res.rows));
  }

  async lockShipment(id: string) {
    const res = await this.client.query<ShipmentRow>(`SELECT * FROM fulfillment_shipments WHERE id = $1 FOR UPDATE`, [id]);
    return first(loadShipments(this.run, res.rows));
  }

  async insertShipment(shipment: Shipment) {
    await this.client.query(
      `INSERT INTO fulfillment_shipments (
          id, shipment_number, fulfillment_id, vehicle_capacity, items_loaded, status, scheduled_at,
          delivery_address, customer_name, customer_phone, customer_signed, vehicle_ref, driver_ref, trip_ref,
          delivery_fee, notes, idempotency_key, created_at, updated_at
       ) VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10, $11, $12, $13, $14, $15, $16, $17, $18, $19)`,
      [
        shipment.id,
        shipment.shipmentNumber,
        shipment.fulfillmentId,
        shipment.vehicleCapacity,
        shipment.itemsLoaded,
        shipment.status,
        shipment.scheduledAt,
        shipment.deliveryAddress,
        shipment.customerName,
        shipment.customerPhone,
        shipment.customerSigned,
        shipment.vehicleRef,
        shipment.driverRef,
        shipment.tripRef,
        shipment.deliveryFee,
        shipment.notes,
        shipment.idempotencyKey,
        shipment.createdAt,
        shipment.updatedAt
      ]
    );
    for (const line of shipment.lines) {
      await this.client.query(
        `INSERT INTO fulfillment_shipment_lines (
            id, shipment_id, order_line_id, product_id, quantity_ordered, quantity_delivered,
            quantity_remaining, unit_price, subtotal
         ) VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9)`,
        [
          line.id,
          shipment.id,
          line.orderLineId,
          line.productId,
          line.quantityOrdered,
          line.quantityDelivered,
          line.quantityRemaining,
          line.unitPrice,
          line.subtotal
        ]
      );
    }
  }

  async updateShipment(shipment: Shipment) {
    await this.client.query(
      `UPDATE fulfillment_shipments
          SET status = $2,
              dispatched_at = $3,
              delivered_at = $4,
              cancelled_at = $5,
              cancel_reason = $6,
              failed_at = $7,
              failure_reason = $8,
              delivery_address = $9,
              customer_name = $10,
              customer_phone = $11,
              customer_signed = $12,
              notes = $13,
              updated_at = $14
        WHERE id = $1`,
      [
        shipment.id,
        shipment.status,
        shipment.dispatchedAt,
        shipment.deliveredAt,
        shipment.cancelledAt,
        shipment.cancelReason,
        shipment.failedAt,
        shipment.failureReason,
        shipment.deliveryAddress,
        shipment.customerName,
        shipment.customerPhone,
        shipment.customerSigned,
        shipment.notes,
        shipment.updatedAt
      ]
    );
  }

  async findPaymentFulfillmentId(paymentId: string) {
    const res = await this.client.query<{ fulfillment_id: string }>(
      `SELECT fulfillment_id FROM payment_entries WHERE id = $1`,
      [paymentId]
    );
    return res.rows[0]?.fulfillment_id ?? null;
  }

  async listPaymentsForFulfillment(fulfillmentId: string) {
    const res = await this.client.query<PaymentRow>(
      `SELECT * FROM payment_entries WHERE fulfillment_id = $1 ORDER BY payment_number ASC`,
      [fulfillmentId]
    );
    return res.rows.map(mapPayment);
  }

  async lockPayment(id: string) {
    const res = await this.client.query<PaymentRow>(`SELECT * FROM payment_entries WHERE id = $1 FOR UPDATE`, [id]);
    const row = res.rows[0];
    return row ? mapPayment(row) : null;
  }

  async insertPayment(entry: PaymentEntry) {
    await this.client.query(
      `INSERT INTO payment_entries (
          id, payment_number, fulfillment_id, shipment_id, collecting_branch_id, amount, method, status,
          is_deposited, reference_number, receipt_number, collected_by, paid_at, notes, created_at, updated_at
       ) VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10, $11, $12, $13, $14, $15, $16)`,
      [
        entry.id,
        entry.paymentNumber,
        entry.fulfillmentId,
        entry.shipmentId,
        entry.collectingBranchId,
        entry.amount,
        entry.method,
        entry.status,
        entry.isDeposited,
        entry.referenceNumber,
        entry.receiptNumber,
        entry.collectedBy,
        entry.paidAt,
        entry.notes,
        entry.createdAt,
        entry.updatedAt
      ]
    );
  }

  async updatePayment(entry: PaymentEntry) {
    await this.client.query(
      `UPDATE payment_entries
          SET status = $2,
              is_deposited = $3,
              deposit_branch_id = $4,
              deposited_at = $5,
              voided_at = $6,
              void_reason = $7,
              updated_at = $8
        WHERE id = $1`,
      [
        entry.id,
        entry.status,
        entry.isDeposited,
        entry.depositBranchId,
        entry.depositedAt,
        entry.voidedAt,
        entry.voidReason,
        entry.updatedAt
      ]
    );
  }

  async findSystemExpenseForShipment(shipmentId: string) {
    const res = await this.client.query<ExpenseRow>(
      `SELECT * FROM delivery_expenses WHERE shipment_id = $1 AND origin = 'SYSTEM'`,
      [shipmentId]
    );
    const row = res.rows[0];
    return row ? mapExpense(row) : null;
  }

  async lockExpense(id: string) {
    const res = await this.client.query<ExpenseRow>(`SELECT * FROM delivery_expenses WHERE id = $1 FOR UPDATE`, [id]);
    const row = res.rows[0];
    return row ? mapExpense(row) : null;
  }

  async insertExpense(expense: Expense) {
    await this.client.query(
      `INSERT INTO delivery_expenses (
          id, expense_number, branch_id, shipment_id, category, amount, description, origin, incurred_at, created_at
       ) VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10)`,
      [
        expense.id,
        expense.expenseNumber,
        expense.branchId,
        expense.shipmentId,
        expense.category,
        expense.amount,
        expense.description,
        expense.origin,
        expense.incurredAt,
        expense.createdAt
      ]
    );
  }

  async deleteExpense(id: string) {
    await this.client.query(`DELETE FROM delivery_expenses WHERE id = $1`, [id]);
  }
}

const pgReader: FulfillmentReader = {
  async getFulfillment(id) {
    const res = await query<FulfillmentRow>(`SELECT * FROM fulfillments WHERE id = $1`, [id]);
    return first(loadFulfillments(poolRunner, res.rows));
  },

  async listFulfillments(filter: FulfillmentFilter) {
    const clauses: string[] = [];
    const params: unknown[] = [];
    if (filter.status) {
      params.push(filter.status);
      clauses.push(`status = $${params.length}`);
    }
    if (filter.branchId) {
      params.push(filter.branchId);
      clauses.push(`destination_branch_id = $${params.length}`);
    }
    if (filter.orderId) {
      params.push(filter.orderId);
      clauses.push(`order_id = $${params.length}`);
    }
    if (filter.withBalanceOnly) {
      clauses.push('remaining_balance > 0');
    }
    params.push(filter.limit ?? null, filter.offset ?? 0);
    const where = clauses.length > 0 ? `WHERE ${clauses.join(' AND ')}` : '';
    const res = await query<FulfillmentRow>(
      `SELECT * FROM fulfillments ${where}
        ORDER BY fulfillment_number DESC
        LIMIT $${params.length - 1} OFFSET $${params.length}`,
      params
    );
    return loadFulfillments(poolRunner, res.rows);
  },

  async getShipment(id) {
    const res = await query<ShipmentRow>(`SELECT * FROM fulfillment_shipments WHERE id = $1`, [id]);
    return first(loadShipments(poolRunner, res.rows));
  },

  async listShipments(filter: ShipmentFilter) {
    const clauses: string[] = [];
    const params: unknown[] = [];
    if (filter.fulfillmentId) {
      params.push(filter.fulfillmentId);
      clauses.push(`fulfillment_id = $${params.length}`);
    }
    if (filter.status) {
      params.push(filter.status);
      clauses.push(`status = $${params.length}`);
    }
    params.push(filter.limit ?? null, filter.offset ?? 0);
    const where = clauses.length > 0 ? `WHERE ${clauses.join(' AND ')}` : '';
    const res = await query<ShipmentRow>(
      `SELECT * FROM fulfillment_shipments ${where}
        ORDER BY shipment_number ASC
        LIMIT $${params.length - 1} OFFSET $${params.length}`,
      params
    );
    return loadShipments(poolRunner, res.rows);
  },

  async getPayment(id) {
    const res = await query<PaymentRow>(`SELECT * FROM payment_entries WHERE id = $1`, [id]);
    const row = res.rows[0];
    return row ? mapPayment(row) : null;
  },

  async listPayments(filter: PaymentFilter) {
    const clauses: string[] = [];
    const params: unknown[] = [];
    if (filter.fulfillmentId) {
      params.push(filter.fulfillmentId);
      clauses.push(`fulfillment_id = $${params.length}`);
    }
    if (filter.collectingBranchId) {
      params.push(filter.collectingBranchId);
      clauses.push(`collecting_branch_id = $${params.length}`);
    }
    if (filter.status) {
      params.push(filter.status);
      clauses.push(`status = $${params.length}`);
    }
    if (filter.isDeposited !== undefined) {
      params.push(filter.isDeposited);
      clauses.push(`is_deposited = $${params.length}`);
    }
    const where = clauses.length > 0 ? `WHERE ${clauses.join(' AND ')}` : '';
    const res = await query<PaymentRow>(`SELECT * FROM payment_entries ${where} ORDER BY payment_number ASC`, params);
    return res.rows.map(mapPayment);
  },

  async listMovements(filter: MovementFilter) {
    const clauses: string[] = [];
    const params: unknown[] = [];
    if (filter.shipmentId) {
      params.push(filter.shipmentId);
      clauses.push(`shipment_id = $${params.length}`);
    }
    if (filter.branchId) {
      params.push(filter.branchId);
      clauses.push(`branch_id = $${params.length}`);
    }
    const where = clauses.length > 0 ? `WHERE ${clauses.join(' AND ')}` : '';
    const res = await query<MovementRow>(
      `SELECT * FROM stock_movements ${where} ORDER BY created_at ASC, order_line_id ASC`,
      params
    );
    return res.rows.map(mapMovement);
  },

  async getStockLevel(branchId, productId) {
    const res = await query<{ quantity: Numeric }>(
      `SELECT quantity FROM branch_stock WHERE branch_id = $1 AND product_id = $2`,
      [branchId, productId]
    );
    return toNumber(res.rows[0]?.quantity);
  },

  async getExpense(id) {
    const res = await query<ExpenseRow>(`SELECT * FROM delivery_expenses WHERE id = $1`, [id]);
    const row = res.rows[0];
    return row ? mapExpense(row) : null;
  },

  async listExpenses(filter: ExpenseFilter) {
    const clauses: string[] = [];
    const params: unknown[] = [];
    if (filter.branchId) {
      params.push(filter.branchId);
      clauses.push(`branch_id = $${params.length}`);
    }
    if (filter.origin) {
      params.push(filter.origin);
      clauses.push(`origin = $${params.length}`);
    }
    if (filter.shipmentId) {
      params.push(filter.shipmentId);
      clauses.push(`shipment_id = $${params.length}`);
    }
    const where = clauses.length > 0 ? `WHERE ${clauses.join(' AND ')}` : '';
    const res = await query<ExpenseRow>(`SELECT * FROM delivery_expenses ${where} ORDER BY expense_number ASC`, params);
    return res.rows.map(mapExpense);
  }
};

/**
 * Postgres-backed store. Each transaction is replayed on serialization
 * failure, deadlock or lock timeout; running out of attempts surfaces as
 * CONCURRENCY_CONFLICT.
 */
export function createPgFulfillmentStore(): FulfillmentStore {
  return {
    reader: pgReader,
    transaction<T>(work: (tx: FulfillmentTx) => Promise<T>): Promise<T> {
      const policy = getFulfillmentPolicy();
      return withTransactionRetry((client) => work(new PgTx(client)), {
        retries: policy.transactionRetries,
        baseDelayMs: policy.retryBaseDelayMs,
        lockTimeoutMs: policy.lockTimeoutMs,
        onExhausted: (err, attempts) =>
          new FulfillmentError(FULFILLMENT_ERROR.CONCURRENCY_CONFLICT, {
            attempts,
            cause: err instanceof Error ? err.message : String(err)
          })
      });
    }
  };
}
