import type { MigrationBuilder } from 'node-pg-migrate';

export async function up(pgm: MigrationBuilder): Promise<void> {
  pgm.createTable('fulfillment_shipments', {
    id: { type: 'uuid', primaryKey: true },
    shipment_number: { type: 'text', notNull: true, unique: true },
    fulfillment_id: { type: 'uuid', notNull: true, references: 'fulfillments' },
    vehicle_capacity: { type: 'integer', notNull: true },
    items_loaded: { type: 'integer', notNull: true },
    status: { type: 'text', notNull: true, default: 'scheduled' },
    scheduled_at: { type: 'timestamptz' },
    dispatched_at: { type: 'timestamptz' },
    delivered_at: { type: 'timestamptz' },
    cancelled_at: { type: 'timestamptz' },
    cancel_reason: { type: 'text' },
    failed_at: { type: 'timestamptz' },
    failure_reason: { type: 'text' },
    delivery_address: { type: 'text' },
    customer_name: { type: 'text' },
    customer_phone: { type: 'text' },
    customer_signed: { type: 'boolean', notNull: true, default: false },
    vehicle_ref: { type: 'text' },
    driver_ref: { type: 'text' },
    trip_ref: { type: 'text' },
    delivery_fee: { type: 'numeric(14,2)', notNull: true, default: 0 },
    notes: { type: 'text' },
    idempotency_key: { type: 'text' },
    created_at: { type: 'timestamptz', notNull: true, default: pgm.func('now()') },
    updated_at: { type: 'timestamptz', notNull: true, default: pgm.func('now()') }
  });

  pgm.addConstraint('fulfillment_shipments', 'chk_fulfillment_shipments_status', {
    check: "status IN ('scheduled', 'loading', 'in_transit', 'delivered', 'failed', 'cancelled')"
  });
  pgm.addConstraint('fulfillment_shipments', 'chk_fulfillment_shipments_capacity', {
    check: 'vehicle_capacity > 0 AND items_loaded > 0 AND items_loaded <= vehicle_capacity'
  });

  pgm.createIndex('fulfillment_shipments', ['fulfillment_id', 'status'], { name: 'idx_fulfillment_shipments_status' });
  pgm.createIndex('fulfillment_shipments', ['fulfillment_id', 'idempotency_key'], {
    name: 'idx_fulfillment_shipments_idempotency_unique',
    unique: true,
    where: 'idempotency_key IS NOT NULL'
  });

  pgm.createTable('fulfillment_shipment_lines', {
    id: { type: 'uuid', primaryKey: true },
    shipment_id: { type: 'uuid', notNull: true, references: 'fulfillment_shipments', onDelete: 'CASCADE' },
    order_line_id: { type: 'text', notNull: true },
    product_id: { type: 'text', notNull: true },
    quantity_ordered: { type: 'integer', notNull: true },
    quantity_delivered: { type: 'integer', notNull: true },
    quantity_remaining: { type: 'integer', notNull: true },
    unit_price: { type: 'numeric(14,2)', notNull: true },
    subtotal: { type: 'numeric(14,2)', notNull: true }
  });

  pgm.addConstraint('fulfillment_shipment_lines', 'chk_fulfillment_shipment_lines_qty', {
    check: 'quantity_delivered > 0 AND quantity_remaining >= 0'
  });
  pgm.addConstraint('fulfillment_shipment_lines', 'uq_fulfillment_shipment_lines_line', {
    unique: ['shipment_id', 'order_line_id']
  });
}

export async function down(pgm: MigrationBuilder): Promise<void> {
  pgm.dropTable('fulfillment_shipment_lines');
  pgm.dropTable('fulfillment_shipments');
}
