import type { OrderInput } from '../schemas/fulfillments.schema';

export function singleLineOrder(id = 'order-1', quantity = 100, unitPrice = 500): OrderInput {
  return {
    id,
    orderNumber: `SO-${id}`,
    lines: [{ lineId: 'L1', productId: 'cement', productName: 'Cement 50kg', quantityOrdered: quantity, unitPrice }],
    totalValue: quantity * unitPrice
  };
}

export function twoLineOrder(id = 'order-2'): OrderInput {
  return {
    id,
    orderNumber: null,
    lines: [
      { lineId: 'L2', productId: 'sand', productName: 'Sand', quantityOrdered: 40, unitPrice: 250 },
      { lineId: 'L1', productId: 'cement', productName: 'Cement', quantityOrdered: 60, unitPrice: 500 }
    ],
    totalValue: 40000
  };
}
