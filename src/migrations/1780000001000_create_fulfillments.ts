import type { MigrationBuilder } from 'node-pg-migrate';

export async function up(pgm: MigrationBuilder): Promise<void> {
  pgm.createTable('fulfillments', {
    id: { type: 'uuid', primaryKey: true },
    fulfillment_number: { type: 'text', notNull: true, unique: true },
    order_id: { type: 'text', notNull: true },
    order_number: { type: 'text' },
    destination_branch_id: { type: 'text', notNull: true },
    status: { type: 'text', notNull: true, default: 'PENDING' },
    ordered_quantity: { type: 'integer', notNull: true, default: 0 },
    ordered_amount: { type: 'numeric(14,2)', notNull: true, default: 0 },
    delivered_quantity: { type: 'integer', notNull: true, default: 0 },
    delivered_amount: { type: 'numeric(14,2)', notNull: true, default: 0 },
    in_flight_quantity: { type: 'integer', notNull: true, default: 0 },
    remaining_quantity: { type: 'integer', notNull: true, default: 0 },
    unallocated_quantity: { type: 'integer', notNull: true, default: 0 },
    collected_amount: { type: 'numeric(14,2)', notNull: true, default: 0 },
    remaining_balance: { type: 'numeric(14,2)', notNull: true, default: 0 },
    fulfillment_percentage: { type: 'numeric(7,2)', notNull: true, default: 0 },
    payment_percentage: { type: 'numeric(7,2)', notNull: true, default: 0 },
    notes: { type: 'text' },
    cancelled_at: { type: 'timestamptz' },
    cancel_reason: { type: 'text' },
    recomputed_at: { type: 'timestamptz' },
    created_at: { type: 'timestamptz', notNull: true, default: pgm.func('now()') },
    updated_at: { type: 'timestamptz', notNull: true, default: pgm.func('now()') }
  });

  pgm.addConstraint('fulfillments', 'chk_fulfillments_status', {
    check: "status IN ('PENDING', 'PARTIALLY_FULFILLED', 'FULLY_FULFILLED', 'CANCELLED')"
  });
  pgm.addConstraint('fulfillments', 'chk_fulfillments_delivered_within_ordered', {
    check: 'delivered_quantity <= ordered_quantity'
  });
  pgm.addConstraint('fulfillments', 'chk_fulfillments_collected_within_ordered', {
    check: 'collected_amount <= ordered_amount'
  });

  pgm.createIndex('fulfillments', 'order_id', {
    name: 'idx_fulfillments_active_order_unique',
    unique: true,
    where: "status <> 'CANCELLED'"
  });
  pgm.createIndex('fulfillments', ['destination_branch_id', 'status'], { name: 'idx_fulfillments_branch_status' });

  pgm.createTable('fulfillment_lines', {
    fulfillment_id: { type: 'uuid', notNull: true, references: 'fulfillments', onDelete: 'CASCADE' },
    order_line_id: { type: 'text', notNull: true },
    product_id: { type: 'text', notNull: true },
    product_name: { type: 'text' },
    quantity_ordered: { type: 'integer', notNull: true },
    unit_price: { type: 'numeric(14,2)', notNull: true }
  });

  pgm.addConstraint('fulfillment_lines', 'pk_fulfillment_lines', {
    primaryKey: ['fulfillment_id', 'order_line_id']
  });
  pgm.addConstraint('fulfillment_lines', 'chk_fulfillment_lines_qty_positive', {
    check: 'quantity_ordered > 0 AND unit_price >= 0'
  });
}

export async function down(pgm: MigrationBuilder): Promise<void> {
  pgm.dropTable('fulfillment_lines');
  pgm.dropTable('fulfillments');
}
