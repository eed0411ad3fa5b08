/**
 * Primitive numerical functions
 *
 * Pure functions with no dependencies: grid construction and quadrature
 * over uniformly sampled values. Callers validate their inputs; these
 * assume a grid of at least two points.
 */

/**
 * n evenly spaced points on [start, end], both endpoints exact.
 *
 * Each point is computed from its index rather than by accumulation,
 * so the grid is identical on every call.
 */
export function linspace(start: number, end: number, n: number): number[] {
  const points = new Array<number>(n);
  const last = n - 1;
  for (let i = 0; i < n; i++) {
    points[i] = i === last ? end : start + ((end - start) * i) / last;
  }
  return points;
}

/**
 * Composite trapezoidal rule on a uniform grid.
 *
 * @param values - Integrand samples
 * @param dx - Grid spacing
 */
export function trapezoid(values: readonly number[], dx: number): number {
  const last = values.length - 1;
  let sum = (values[0] + values[last]) / 2;
  for (let i = 1; i < last; i++) {
    sum += values[i];
  }
  return sum * dx;
}

/**
 * Simpson's 1/3 rule over values[from..to], where (to - from) is even.
 */
function simpsonSegment(values: readonly number[], dx: number, from: number, to: number): number {
  let sum = values[from] + values[to];
  for (let i = from + 1; i < to; i++) {
    sum += (i - from) % 2 === 1 ? 4 * values[i] : 2 * values[i];
  }
  return (sum * dx) / 3;
}

/**
 * Composite Simpson's rule on a uniform grid.
 *
 * Even interval count: plain composite 1/3 rule.
 * Odd interval count ≥ 3: 1/3 rule on the leading intervals, Simpson's 3/8
 * rule on the last three. A single interval falls back to the trapezoid.
 *
 * All weights are positive, so a non-negative integrand gives a
 * non-negative result.
 *
 * @param values - Integrand samples
 * @param dx - Grid spacing
 */
export function simpson(values: readonly number[], dx: number): number {
  const intervals = values.length - 1;

  if (intervals === 1) {
    return trapezoid(values, dx);
  }

  if (intervals % 2 === 0) {
    return simpsonSegment(values, dx, 0, intervals);
  }

  // 3/8 rule on [n-3, n]
  const n = intervals;
  const tail = (3 * dx / 8) * (values[n - 3] + 3 * values[n - 2] + 3 * values[n - 1] + values[n]);
  const head = n > 3 ? simpsonSegment(values, dx, 0, n - 3) : 0;
  return head + tail;
}

/**
 * Running trapezoidal integral: result[i] = ∫ from x₀ to xᵢ, result[0] = 0.
 */
export function cumulativeTrapezoid(values: readonly number[], dx: number): number[] {
  const result = new Array<number>(values.length);
  result[0] = 0;
  for (let i = 1; i < values.length; i++) {
    result[i] = result[i - 1] + ((values[i - 1] + values[i]) * dx) / 2;
  }
  return result;
}

/**
 * Linear interpolation between two values
 */
export function lerp(a: number, b: number, t: number): number {
  return a + (b - a) * Math.max(0, Math.min(1, t));
}

/**
 * Relative difference |a − b| / |b|, or |a − b| when b is 0
 */
export function relativeError(actual: number, expected: number): number {
  const diff = Math.abs(actual - expected);
  return expected === 0 ? diff : diff / Math.abs(expected);
}
