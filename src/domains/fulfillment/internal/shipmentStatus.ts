import { invalidState } from '../errors';
import type { ShipmentStatus } from '../types';

const TRANSITIONS: Record<ShipmentStatus, readonly ShipmentStatus[]> = {
  scheduled: ['loading', 'in_transit', 'delivered', 'cancelled'],
  loading: ['in_transit', 'delivered', 'failed', 'cancelled'],
  in_transit: ['delivered', 'failed', 'cancelled'],
  delivered: [],
  failed: [],
  cancelled: []
};

export function canTransition(from: ShipmentStatus, to: ShipmentStatus): boolean {
  return TRANSITIONS[from].includes(to);
}

export function assertShipmentTransition(shipmentId: string, from: ShipmentStatus, to: ShipmentStatus): void {
  if (!canTransition(from, to)) {
    throw invalidState('SHIPMENT_STATUS_INVALID_TRANSITION', { shipmentId, from, to });
  }
}
