import type { MigrationBuilder } from 'node-pg-migrate';

export async function up(pgm: MigrationBuilder): Promise<void> {
  pgm.createTable('payment_entries', {
    id: { type: 'uuid', primaryKey: true },
    payment_number: { type: 'text', notNull: true, unique: true },
    fulfillment_id: { type: 'uuid', notNull: true, references: 'fulfillments' },
    shipment_id: { type: 'uuid', references: 'fulfillment_shipments' },
    collecting_branch_id: { type: 'text', notNull: true },
    amount: { type: 'numeric(14,2)', notNull: true },
    method: { type: 'text', notNull: true },
    status: { type: 'text', notNull: true, default: 'completed' },
    is_deposited: { type: 'boolean', notNull: true, default: false },
    deposit_branch_id: { type: 'text' },
    deposited_at: { type: 'timestamptz' },
    reference_number: { type: 'text' },
    receipt_number: { type: 'text' },
    collected_by: { type: 'text' },
    paid_at: { type: 'timestamptz', notNull: true },
    voided_at: { type: 'timestamptz' },
    void_reason: { type: 'text' },
    notes: { type: 'text' },
    created_at: { type: 'timestamptz', notNull: true, default: pgm.func('now()') },
    updated_at: { type: 'timestamptz', notNull: true, default: pgm.func('now()') }
  });

  pgm.addConstraint('payment_entries', 'chk_payment_entries_amount_positive', {
    check: 'amount > 0'
  });
  pgm.addConstraint('payment_entries', 'chk_payment_entries_method', {
    check: "method IN ('cash', 'bank_transfer', 'mobile_money', 'cheque', 'card', 'other')"
  });
  pgm.addConstraint('payment_entries', 'chk_payment_entries_status', {
    check: "status IN ('pending', 'completed', 'voided')"
  });
  pgm.addConstraint('payment_entries', 'chk_payment_entries_deposit', {
    check: "NOT is_deposited OR (status = 'completed' AND deposit_branch_id IS NOT NULL AND deposited_at IS NOT NULL)"
  });

  pgm.createIndex('payment_entries', 'fulfillment_id', { name: 'idx_payment_entries_fulfillment' });
  pgm.createIndex('payment_entries', ['collecting_branch_id', 'is_deposited'], {
    name: 'idx_payment_entries_outstanding',
    where: "status = 'completed'"
  });
}

export async function down(pgm: MigrationBuilder): Promise<void> {
  pgm.dropTable('payment_entries');
}
