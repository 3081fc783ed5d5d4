export * from './types';
export * from './errors';
export {
  formatDocumentNumber,
  type FulfillmentReader,
  type FulfillmentStore,
  type FulfillmentTx,
  type MovementFilter
} from './store';

export {
  buildQuantityLedger,
  compareLineIds,
  summarizeQuantityLedger,
  type LineProgress,
  type QuantityTotals
} from './internal/quantityLedger';

export {
  allocate,
  assertCapacity,
  assertCommittable,
  orderForAllocation,
  remainingVector,
  type AllocateOptions,
  type AllocationLine,
  type AllocationPlan,
  type CommitLine,
  type ProposedAllocation,
  type RemainingLine
} from './internal/allocator';

export {
  advanceStatus,
  applyRecompute,
  checkInvariants,
  deriveStatus,
  diffSnapshots,
  emptySnapshot,
  recompute,
  type InvariantViolation,
  type Recomputation,
  type RecomputeInput,
  type SnapshotWriter
} from './internal/aggregator';

export {
  assertConfirmable,
  assertPositiveAmount,
  assertVoidable,
  assertWithinOrderValue,
  collectedMinorUnits,
  filterOutstanding,
  isDepositable,
  isOutstanding,
  summarizeOutstanding,
  type OutstandingFilter,
  type OutstandingSummary
} from './internal/paymentLedger';

export { appendPaymentEntry, type PaymentDraft } from './internal/paymentPoster';
export { postDelivery, type InventorySink, type PostingOutcome, type PostingResult } from './internal/stockPoster';
export { postDeliveryExpense, type ExpensePosting } from './internal/expensePoster';
export { assertShipmentTransition, canTransition } from './internal/shipmentStatus';
export {
  assertNotCancelled,
  lockFulfillmentOrThrow,
  lockPaymentWithFulfillment,
  lockShipmentWithFulfillment
} from './internal/guards';

export { MemoryFulfillmentStore, createMemoryFulfillmentStore } from './internal/memoryStore';
