import { DECIMAL_SCALE } from '../services/money';

/** Whole hours, rates or percentages as scaled decimals: 150 -> 1500000n */
export function toScaled(units: number | bigint): bigint {
  return BigInt(units) * DECIMAL_SCALE;
}
