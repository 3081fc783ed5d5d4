import 'dotenv/config';
import { createApp } from './app';
import { pool, query } from './db';
import { createPgFulfillmentStore } from './domains/fulfillment/internal/pgStore';

const PORT = Number(process.env.PORT) || 3000;

const app = createApp(createPgFulfillmentStore(), {
  readinessProbe: () => query('SELECT 1')
});

pool.on('error', (err) => {
  console.error('Unexpected DB pool error', err);
});

app.listen(PORT, () => {
  console.log(JSON.stringify({ event: 'server_started', port: PORT, timestamp: new Date().toISOString() }));
});
