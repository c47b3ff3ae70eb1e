import type { RateStats } from '../types/entities.js';

/**
 * Pure rate-stat derivation. No side effects, no DB.
 */

export interface RateInputs {
  atBats: number;
  hits: number;
  walks: number;
  hitByPitch: number;
  sacFlies: number;
  totalBases: number;
}

const RATE_DECIMALS = 3;

/**
 * Round to 3 decimals, half away from zero.
 * The scaled value is normalized to 12 significant digits first so binary
 * artifacts (1.0005 * 1000 = 1000.4999...) still round on the decimal midpoint.
 */
export function roundRate(value: number): number {
  const factor = 10 ** RATE_DECIMALS;
  const scaled = Number((Math.abs(value) * factor).toPrecision(12));
  const rounded = Math.round(scaled) / factor;
  return value < 0 ? -rounded : rounded;
}

function ratio(numerator: number, denominator: number): number {
  if (denominator === 0) return 0;
  return roundRate(numerator / denominator);
}

export function battingAverage(c: RateInputs): number {
  return ratio(c.hits, c.atBats);
}

export function onBasePercentage(c: RateInputs): number {
  return ratio(c.hits + c.walks + c.hitByPitch, c.atBats + c.walks + c.hitByPitch + c.sacFlies);
}

export function sluggingPercentage(c: RateInputs): number {
  return ratio(c.totalBases, c.atBats);
}

/** Zero denominators give 0, never NaN. OPS is the rounded sum of the rounded OBP and SLG. */
export function deriveRates(c: RateInputs): RateStats {
  const obp = onBasePercentage(c);
  const slg = sluggingPercentage(c);
  return {
    avg: battingAverage(c),
    obp,
    slg,
    ops: roundRate(obp + slg),
  };
}
