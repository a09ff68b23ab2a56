/**
 * Quantity helpers shared by sizing and risk checks
 */

// Tolerance for float noise in share arithmetic
export const QUANTITY_EPSILON = 1e-9;

export function roundQuantity(value: number): number {
  return Math.round(value * 1e8) / 1e8;
}

/**
 * Largest multiple of `lotSize` not above `quantity`; 0 for non-positive input
 */
export function floorToLot(quantity: number, lotSize: number): number {
  if (!Number.isFinite(quantity) || quantity <= 0 || lotSize <= 0) {
    return 0;
  }
  return roundQuantity(Math.floor(quantity / lotSize + QUANTITY_EPSILON) * lotSize);
}

export function isZeroQuantity(value: number): boolean {
  return Math.abs(value) < QUANTITY_EPSILON;
}
