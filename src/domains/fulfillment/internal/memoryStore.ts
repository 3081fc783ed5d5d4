import { Mutex } from '../../../lib/mutex';
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
  ExpenseFilter,
  Fulfillment,
  FulfillmentFilter,
  FulfillmentSnapshot,
  PaymentEntry,
  PaymentFilter,
  Shipment,
  ShipmentFilter,
  StockMovement
} from '../types';
import type { InventorySink } from './stockPoster';

type MemoryState = {
  fulfillments: Map<string, Fulfillment>;
  shipments: Map<string, Shipment>;
  payments: Map<string, PaymentEntry>;
  movements: StockMovement[];
  expenses: Map<string, Expense>;
  stock: Map<string, number>;
  sequences: Record<DocumentSequence, number>;
};

function emptyState(): MemoryState {
  return {
    fulfillments: new Map(),
    shipments: new Map(),
    payments: new Map(),
    movements: [],
    expenses: new Map(),
    stock: new Map(),
    sequences: { fulfillment: 0, shipment: 0, payment: 0, expense: 0 }
  };
}

function stockKey(branchId: string, productId: string): string {
  return `${branchId}:${productId}`;
}

function copy<T>(value: T): T {
  return structuredClone(value);
}

function page<T>(rows: T[], limit?: number, offset?: number): T[] {
  const start = offset ?? 0;
  return limit === undefined ? rows.slice(start) : rows.slice(start, start + limit);
}

function byNumber<T>(numberOf: (row: T) => string) {
  return (a: T, b: T) => {
    const left = numberOf(a);
    const right = numberOf(b);
    return left < right ? -1 : left > right ? 1 : 0;
  };
}

function requireRow<T>(row: T | undefined, entity: string, id: string): T {
  if (!row) {
    throw new FulfillmentError(FULFILLMENT_ERROR.NOT_FOUND, { entity, id });
  }
  return row;
}

function readFrom(state: () => MemoryState): FulfillmentReader {
  return {
    async getFulfillment(id) {
      const row = state().fulfillments.get(id);
      return row ? copy(row) : null;
    },
    async listFulfillments(filter: FulfillmentFilter) {
      const rows = [...state().fulfillments.values()]
        .filter(
          (row) =>
            (!filter.status || row.snapshot.status === filter.status) &&
            (!filter.branchId || row.destinationBranchId === filter.branchId) &&
            (!filter.orderId || row.orderId === filter.orderId) &&
            (!filter.withBalanceOnly || row.snapshot.remainingBalance > 0)
        )
        .sort(byNumber<Fulfillment>((row) => row.fulfillmentNumber))
        .reverse();
      return copy(page(rows, filter.limit, filter.offset));
    },
    async getShipment(id) {
      const row = state().shipments.get(id);
      return row ? copy(row) : null;
    },
    async listShipments(filter: ShipmentFilter) {
      const rows = [...state().shipments.values()]
        .filter(
          (row) =>
            (!filter.fulfillmentId || row.fulfillmentId === filter.fulfillmentId) &&
            (!filter.status || row.status === filter.status)
        )
        .sort(byNumber<Shipment>((row) => row.shipmentNumber));
      return copy(page(rows, filter.limit, filter.offset));
    },
    async getPayment(id) {
      const row = state().payments.get(id);
      return row ? copy(row) : null;
    },
    async listPayments(filter: PaymentFilter) {
      const rows = [...state().payments.values()]
        .filter(
          (row) =>
            (!filter.fulfillmentId || row.fulfillmentId === filter.fulfillmentId) &&
            (!filter.collectingBranchId || row.collectingBranchId === filter.collectingBranchId) &&
            (!filter.status || row.status === filter.status) &&
            (filter.isDeposited === undefined || row.isDeposited === filter.isDeposited)
        )
        .sort(byNumber<PaymentEntry>((row) => row.paymentNumber));
      return copy(rows);
    },
    async listMovements(filter: MovementFilter) {
      return copy(
        state().movements.filter(
          (row) =>
            (!filter.shipmentId || row.shipmentId === filter.shipmentId) &&
            (!filter.branchId || row.branchId === filter.branchId)
        )
      );
    },
    async getStockLevel(branchId, productId) {
      return state().stock.get(stockKey(branchId, productId)) ?? 0;
    },
    async getExpense(id) {
      const row = state().expenses.get(id);
      return row ? copy(row) : null;
    },
    async listExpenses(filter: ExpenseFilter) {
      const rows = [...state().expenses.values()]
        .filter(
          (row) =>
            (!filter.branchId || row.branchId === filter.branchId) &&
            (!filter.origin || row.origin === filter.origin) &&
            (!filter.shipmentId || row.shipmentId === filter.shipmentId)
        )
        .sort(byNumber<Expense>((row) => row.expenseNumber));
      return copy(rows);
    }
  };
}

class MemoryInventory implements InventorySink {
  constructor(private readonly state: MemoryState) {}

  async findMovementsForShipment(shipmentId: string): Promise<StockMovement[]> {
    return copy(this.state.movements.filter((row) => row.shipmentId === shipmentId));
  }

  async applyStock(branchId: string, productId: string, delta: number): Promise<void> {
    const key = stockKey(branchId, productId);
    this.state.stock.set(key, (this.state.stock.get(key) ?? 0) + delta);
  }

  async recordMovement(movement: StockMovement): Promise<void> {
    const duplicate = this.state.movements.some(
      (row) => row.shipmentId === movement.shipmentId && row.orderLineId === movement.orderLineId
    );
    if (duplicate) {
      throw new FulfillmentError(FULFILLMENT_ERROR.ALREADY_POSTED, {
        shipmentId: movement.shipmentId,
        orderLineId: movement.orderLineId
      });
    }
    this.state.movements.push(copy(movement));
  }
}

class MemoryTx implements FulfillmentTx {
  readonly inventory: InventorySink;

  constructor(private readonly state: MemoryState) {
    this.inventory = new MemoryInventory(state);
  }

  async lockFulfillment(id: string) {
    const row = this.state.fulfillments.get(id);
    return row ? copy(row) : null;
  }

  async findActiveFulfillmentForOrder(orderId: string) {
    for (const row of this.state.fulfillments.values()) {
      if (row.orderId === orderId && row.snapshot.status !== 'CANCELLED') return copy(row);
    }
    return null;
  }

  async insertFulfillment(fulfillment: Fulfillment) {
    this.state.fulfillments.set(fulfillment.id, copy(fulfillment));
  }

  async writeSnapshot(id: string, snapshot: FulfillmentSnapshot, now: Date) {
    const row = requireRow(this.state.fulfillments.get(id), 'fulfillment', id);
    this.state.fulfillments.set(id, { ...row, snapshot: copy(snapshot), recomputedAt: now, updatedAt: now });
  }

  async markFulfillmentCancelled(id: string, reason: string | null, now: Date) {
    const row = requireRow(this.state.fulfillments.get(id), 'fulfillment', id);
    this.state.fulfillments.set(id, {
      ...row,
      snapshot: { ...row.snapshot, status: 'CANCELLED' },
      cancelledAt: now,
      cancelReason: reason,
      updatedAt: now
    });
  }

  async deleteFulfillment(id: string) {
    this.state.fulfillments.delete(id);
  }

  async nextNumber(sequence: DocumentSequence) {
    this.state.sequences[sequence] += 1;
    return formatDocumentNumber(sequence, this.state.sequences[sequence]);
  }

  async findShipmentFulfillmentId(shipmentId: string) {
    return this.state.shipments.get(shipmentId)?.fulfillmentId ?? null;
  }

  async listShipmentsForFulfillment(fulfillmentId: string) {
    return copy(
      [...this.state.shipments.values()]
        .filter((row) => row.fulfillmentId === fulfillmentId)
        .sort(byNumber<Shipment>((row) => row.shipmentNumber))
    );
  }

  async findShipmentByIdempotencyKey(fulfillmentId: string, key: string) {
    for (const row of this.state.shipments.values()) {
      if (row.fulfillmentId === fulfillmentId && row.idempotencyKey === key) return copy(row);
    }
    return null;
  }

  async lockShipment(id: string) {
    const row = this.state.shipments.get(id);
    return row ? copy(row) : null;
  }

  async insertShipment(shipment: Shipment) {
    this.state.shipments.set(shipment.id, copy(shipment));
  }

  async updateShipment(shipment: Shipment) {
    requireRow(this.state.shipments.get(shipment.id), 'shipment', shipment.id);
    this.state.shipments.set(shipment.id, copy(shipment));
  }

  async findPaymentFulfillmentId(paymentId: string) {
    return this.state.payments.get(paymentId)?.fulfillmentId ?? null;
  }

  async listPaymentsForFulfillment(fulfillmentId: string) {
    return copy(
      [...this.state.payments.values()]
        .filter((row) => row.fulfillmentId === fulfillmentId)
        .sort(byNumber<PaymentEntry>((row) => row.paymentNumber))
    );
  }

  async lockPayment(id: string) {
    const row = this.state.payments.get(id);
    return row ? copy(row) : null;
  }

  async insertPayment(entry: PaymentEntry) {
    this.state.payments.set(entry.id, copy(entry));
  }

  async updatePayment(entry: PaymentEntry) {
    requireRow(this.state.payments.get(entry.id), 'payment', entry.id);
    this.state.payments.set(entry.id, copy(entry));
  }

  async findSystemExpenseForShipment(shipmentId: string) {
    for (const row of this.state.expenses.values()) {
      if (row.shipmentId === shipmentId && row.origin === 'SYSTEM') return copy(row);
    }
    return null;
  }

  async lockExpense(id: string) {
    const row = this.state.expenses.get(id);
    return row ? copy(row) : null;
  }

  async insertExpense(expense: Expense) {
    this.state.expenses.set(expense.id, copy(expense));
  }

  async deleteExpense(id: string) {
    this.state.expenses.delete(id);
  }
}

/**
 * In-process store. Transactions run one at a time; each works on a copy of
 * the state that replaces the live state only when the work resolves.
 */
export class MemoryFulfillmentStore implements FulfillmentStore {
  private state: MemoryState = emptyState();
  private readonly mutex = new Mutex();
  readonly reader: FulfillmentReader = readFrom(() => this.state);

  async transaction<T>(work: (tx: FulfillmentTx) => Promise<T>): Promise<T> {
    return this.mutex.runExclusive(async () => {
      const draft = structuredClone(this.state);
      const result = await work(new MemoryTx(draft));
      this.state = draft;
      return result;
    });
  }
}

export function createMemoryFulfillmentStore(): MemoryFulfillmentStore {
  return new MemoryFulfillmentStore();
}
