import { describe, expect, it } from 'vitest';
import { assertShipmentTransition, canTransition } from './shipmentStatus';

describe('shipment transitions', () => {
  it('moves forward through the delivery stages', () => {
    expect(canTransition('scheduled', 'loading')).toBe(true);
    expect(canTransition('loading', 'in_transit')).toBe(true);
    expect(canTransition('in_transit', 'delivered')).toBe(true);
    expect(canTransition('scheduled', 'delivered')).toBe(true);
  });

  it('lets a loaded or moving shipment fail', () => {
    expect(canTransition('loading', 'failed')).toBe(true);
    expect(canTransition('in_transit', 'failed')).toBe(true);
    expect(canTransition('scheduled', 'failed')).toBe(false);
  });

  it('treats delivered, failed and cancelled as final', () => {
    expect(canTransition('delivered', 'cancelled')).toBe(false);
    expect(canTransition('failed', 'delivered')).toBe(false);
    expect(canTransition('failed', 'cancelled')).toBe(false);
    expect(canTransition('cancelled', 'scheduled')).toBe(false);
    expect(canTransition('in_transit', 'loading')).toBe(false);
  });

  it('names the rejected transition', () => {
    expect(() => assertShipmentTransition('s1', 'delivered', 'cancelled')).toThrowError('INVALID_STATE');
  });
});
