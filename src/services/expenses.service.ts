import { v4 as uuidv4 } from 'uuid';
import {
  FULFILLMENT_ERROR,
  FulfillmentError,
  notFound,
  type Expense,
  type ExpenseFilter,
  type FulfillmentStore
} from '../domains/fulfillment';
import { roundMoney } from '../lib/numbers';
import type { ExpenseCreateInput } from '../schemas/expenses.schema';

export async function listExpenses(store: FulfillmentStore, filter: ExpenseFilter = {}): Promise<Expense[]> {
  return store.reader.listExpenses(filter);
}

export async function getExpense(store: FulfillmentStore, id: string): Promise<Expense> {
  const expense = await store.reader.getExpense(id);
  if (!expense) throw notFound('expense', id);
  return expense;
}

export async function createManualExpense(store: FulfillmentStore, input: ExpenseCreateInput): Promise<Expense> {
  return store.transaction(async (tx) => {
    if (input.shipmentId && !(await tx.findShipmentFulfillmentId(input.shipmentId))) {
      throw notFound('shipment', input.shipmentId);
    }
    const now = new Date();
    const expense: Expense = {
      id: uuidv4(),
      expenseNumber: await tx.nextNumber('expense'),
      branchId: input.branchId,
      shipmentId: input.shipmentId ?? null,
      category: input.category,
      amount: roundMoney(input.amount),
      description: input.description,
      origin: 'MANUAL',
      incurredAt: input.incurredAt ? new Date(input.incurredAt) : now,
      createdAt: now
    };
    await tx.insertExpense(expense);
    return expense;
  });
}

/** Manual expenses only; SYSTEM records belong to the delivery that produced them. */
export async function deleteExpense(store: FulfillmentStore, id: string): Promise<void> {
  await store.transaction(async (tx) => {
    const expense = await tx.lockExpense(id);
    if (!expense) throw notFound('expense', id);
    if (expense.origin === 'SYSTEM') {
      throw new FulfillmentError(FULFILLMENT_ERROR.SYSTEM_RECORD_IMMUTABLE, { expenseId: id, origin: expense.origin });
    }
    await tx.deleteExpense(id);
  });
}
