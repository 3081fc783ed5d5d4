import { config } from 'dotenv';

config();

const PAGE_SIZE = 200;

function hasFlag(name: string, argv: string[] = process.argv): boolean {
  return argv.includes(`--${name}`);
}

async function run() {
  // Loaded after dotenv so db.ts sees DATABASE_URL.
  const { pool } = await import('../src/db');
  const { createPgFulfillmentStore } = await import('../src/domains/fulfillment/internal/pgStore');
  const { recomputeFulfillment, verifyFulfillment } = await import('../src/services/fulfillment.service');

  const store = createPgFulfillmentStore();
  const repair = hasFlag('repair');
  const fulfillmentId = process.env.FULFILLMENT_ID;

  const ids: string[] = [];
  if (fulfillmentId) {
    ids.push(fulfillmentId);
  } else {
    for (let offset = 0; ; offset += PAGE_SIZE) {
      const page = await store.reader.listFulfillments({ limit: PAGE_SIZE, offset });
      ids.push(...page.map((row) => row.id));
      if (page.length < PAGE_SIZE) break;
    }
  }

  let failed = false;
  for (const id of ids) {
    const report = await verifyFulfillment(store, id);
    if (report.consistent) continue;
    console.log(JSON.stringify({ fulfillmentId: id, violations: report.violations }, null, 2));
    const driftOnly = report.violations.every((violation) => violation.code === 'SNAPSHOT_DRIFT');
    if (repair && driftOnly) {
      const repaired = await recomputeFulfillment(store, id);
      console.log(JSON.stringify({ fulfillmentId: id, repaired: true, status: repaired.snapshot.status }));
    } else {
      failed = true;
    }
  }

  console.log(JSON.stringify({ checked: ids.length, failed }));
  await pool.end();
  process.exit(failed ? 2 : 0);
}

run().catch((err) => {
  console.error(err);
  process.exit(1);
});
