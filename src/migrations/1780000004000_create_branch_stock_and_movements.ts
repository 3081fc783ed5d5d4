import type { MigrationBuilder } from 'node-pg-migrate';

export async function up(pgm: MigrationBuilder): Promise<void> {
  pgm.createTable('branch_stock', {
    branch_id: { type: 'text', notNull: true },
    product_id: { type: 'text', notNull: true },
    quantity: { type: 'integer', notNull: true, default: 0 },
    updated_at: { type: 'timestamptz', notNull: true, default: pgm.func('now()') }
  });

  pgm.addConstraint('branch_stock', 'pk_branch_stock', {
    primaryKey: ['branch_id', 'product_id']
  });

  pgm.createTable('stock_movements', {
    id: { type: 'uuid', primaryKey: true },
    shipment_id: { type: 'uuid', notNull: true, references: 'fulfillment_shipments' },
    order_line_id: { type: 'text', notNull: true },
    branch_id: { type: 'text', notNull: true },
    product_id: { type: 'text', notNull: true },
    quantity: { type: 'integer', notNull: true },
    direction: { type: 'text', notNull: true, default: 'in' },
    origin: { type: 'text', notNull: true, default: 'SYSTEM' },
    note: { type: 'text' },
    created_at: { type: 'timestamptz', notNull: true, default: pgm.func('now()') }
  });

  pgm.addConstraint('stock_movements', 'chk_stock_movements_quantity_positive', {
    check: "quantity > 0 AND direction = 'in'"
  });
  pgm.addConstraint('stock_movements', 'uq_stock_movements_shipment_line', {
    unique: ['shipment_id', 'order_line_id']
  });

  pgm.createIndex('stock_movements', ['branch_id', 'product_id'], { name: 'idx_stock_movements_branch_product' });
}

export async function down(pgm: MigrationBuilder): Promise<void> {
  pgm.dropTable('stock_movements');
  pgm.dropTable('branch_stock');
}
