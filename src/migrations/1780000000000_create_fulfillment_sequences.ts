import type { MigrationBuilder } from 'node-pg-migrate';

const SEQUENCES = ['fulfillment_number_seq', 'shipment_number_seq', 'payment_number_seq', 'expense_number_seq'];

export async function up(pgm: MigrationBuilder): Promise<void> {
  for (const name of SEQUENCES) {
    pgm.createSequence(name, {
      minvalue: 1,
      start: 1,
      increment: 1,
      ifNotExists: true
    });
  }
}

export async function down(pgm: MigrationBuilder): Promise<void> {
  for (const name of [...SEQUENCES].reverse()) {
    pgm.dropSequence(name, { ifExists: true });
  }
}
