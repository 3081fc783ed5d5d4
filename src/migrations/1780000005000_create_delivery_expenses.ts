import type { MigrationBuilder } from 'node-pg-migrate';

export async function up(pgm: MigrationBuilder): Promise<void> {
  pgm.createTable('delivery_expenses', {
    id: { type: 'uuid', primaryKey: true },
    expense_number: { type: 'text', notNull: true, unique: true },
    branch_id: { type: 'text', notNull: true },
    shipment_id: { type: 'uuid', references: 'fulfillment_shipments' },
    category: { type: 'text', notNull: true },
    amount: { type: 'numeric(14,2)', notNull: true },
    description: { type: 'text', notNull: true },
    origin: { type: 'text', notNull: true, default: 'MANUAL' },
    incurred_at: { type: 'timestamptz', notNull: true },
    created_at: { type: 'timestamptz', notNull: true, default: pgm.func('now()') }
  });

  pgm.addConstraint('delivery_expenses', 'chk_delivery_expenses_amount_positive', {
    check: 'amount > 0'
  });
  pgm.addConstraint('delivery_expenses', 'chk_delivery_expenses_origin', {
    check: "origin IN ('SYSTEM', 'MANUAL') AND category IN ('transport', 'other')"
  });

  pgm.createIndex('delivery_expenses', 'shipment_id', {
    name: 'idx_delivery_expenses_system_shipment_unique',
    unique: true,
    where: "origin = 'SYSTEM'"
  });
  pgm.createIndex('delivery_expenses', ['branch_id', 'incurred_at'], { name: 'idx_delivery_expenses_branch' });
}

export async function down(pgm: MigrationBuilder): Promise<void> {
  pgm.dropTable('delivery_expenses');
}
