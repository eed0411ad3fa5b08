/**
 * Curve Helpers
 *
 * Convenience functions for reading values out of sampled curves.
 */

import type { ForcingCurve, ForcingSample } from './domain-types.js';
import { lerp } from './primitives/math.js';

/**
 * Value of a curve at time t, linearly interpolated between samples.
 *
 * @param curve - Samples ordered by time
 * @param t - Years since the pulse
 * @returns Interpolated value, or undefined if t is outside the curve
 */
export function sampleAt(curve: ForcingCurve, t: number): number | undefined {
  if (curve.length === 0) return undefined;

  const first = curve[0];
  const last = curve[curve.length - 1];
  if (t < first.time || t > last.time) return undefined;
  if (t === last.time) return last.forcing;

  // Binary search for the bracketing pair
  let lo = 0;
  let hi = curve.length - 1;
  while (hi - lo > 1) {
    const mid = (lo + hi) >> 1;
    if (curve[mid].time <= t) lo = mid;
    else hi = mid;
  }

  const a = curve[lo];
  const b = curve[hi];
  return lerp(a.forcing, b.forcing, (t - a.time) / (b.time - a.time));
}

/**
 * Split a curve into parallel time and value arrays (for plotting).
 */
export function extractSeries(curve: ForcingCurve): { times: number[]; values: number[] } {
  const times: number[] = [];
  const values: number[] = [];

  for (const s of curve) {
    times.push(s.time);
    values.push(s.forcing);
  }

  return { times, values };
}

/**
 * Sample with the largest value; the earliest one on ties.
 */
export function peakSample(curve: ForcingCurve): ForcingSample | undefined {
  let peak: ForcingSample | undefined;
  for (const s of curve) {
    if (!peak || s.forcing > peak.forcing) peak = s;
  }
  return peak;
}
