export type FulfillmentPolicy = {
  transactionRetries: number;
  retryBaseDelayMs: number;
  lockTimeoutMs: number;
  requireDeliverySignature: boolean;
  deliveryExpenseEnabled: boolean;
  logDomainEvents: boolean;
};

function parseBoolean(value: string | undefined, fallback: boolean): boolean {
  if (value === undefined) return fallback;
  if (value.toLowerCase() === 'true') return true;
  if (value.toLowerCase() === 'false') return false;
  return fallback;
}

function parseInteger(value: string | undefined, fallback: number, min = 0): number {
  if (value === undefined || value.trim() === '') return fallback;
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < min) return fallback;
  return parsed;
}

export function getFulfillmentPolicy(): FulfillmentPolicy {
  return {
    transactionRetries: parseInteger(process.env.FULFILLMENT_TX_RETRIES, 3),
    retryBaseDelayMs: parseInteger(process.env.FULFILLMENT_RETRY_BASE_DELAY_MS, 25),
    lockTimeoutMs: parseInteger(process.env.PG_LOCK_TIMEOUT_MS, 0),
    requireDeliverySignature: parseBoolean(process.env.REQUIRE_DELIVERY_SIGNATURE, false),
    deliveryExpenseEnabled: parseBoolean(process.env.DELIVERY_EXPENSE_ENABLED, true),
    logDomainEvents: parseBoolean(process.env.LOG_DOMAIN_EVENTS, true)
  };
}
