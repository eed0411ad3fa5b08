/**
 * Forcing Integrator
 *
 * Samples the forcing of a pulse on a uniform grid over [0, H] and integrates
 * it to the Absolute Global Warming Potential:
 *
 *   AGWP(H) = ∫₀ᴴ RE · IRF(t) dt
 *
 * The numerical path is the general implementation; it handles constant
 * (never-decaying) terms and any future non-exponential kernel. The closed
 * form RE · Σ aᵢτᵢ(1 − e^(−H/τᵢ)) is kept as `analyticAgwp` for finite-τ gases
 * and serves as the reference the quadrature is checked against.
 *
 * Sampling policy: unless the caller fixes the sample count, the grid step
 * is at most (fastest τ) / samplesPerTimeConstant, so the fastest mode is
 * resolved before it has decayed away.
 *
 * With no sample count, `integrateAgwp` integrates on a per-gas grid whose
 * step does not depend on the horizon: whole panels from t = 0, then one
 * shorter panel ending at the horizon. Lengthening the horizon only extends
 * that last panel or appends a new one, so AGWP never decreases with it.
 */

import { AgwpResult, ForcingCurve, ForcingSample, GasParameters, TimeHorizon } from '../domain-types.js';
import { ParamMeta, ValidationResult, WarningHandler } from '../framework/types.js';
import { InvalidInputError } from '../framework/errors.js';
import { validatedMerge } from '../framework/validated-merge.js';
import { cumulativeTrapezoid, linspace, simpson, trapezoid } from '../primitives/math.js';
import { airborneFractionIntegral, assertValidGas, fastestTimeConstant, irf } from './decay-kernel.js';
import { forcingFromFraction } from './radiative-efficiency.js';

const COMPONENT = 'forcing-integrator';

// =============================================================================
// SETTINGS
// =============================================================================

export type QuadratureRule = 'simpson' | 'trapezoid';

export const QUADRATURE_RULES: readonly QuadratureRule[] = ['simpson', 'trapezoid'];

export interface IntegratorSettings {
  samplesPerTimeConstant: number;  // Grid points per fastest τ, >= 2 (10)
  minSamples: number;              // Floor on the default grid (101)
  maxSamples: number;              // Ceiling on the default grid (2 000 001)
  quadrature: QuadratureRule;      // Integration rule ('simpson')
  pulseMass: number;               // Emitted mass, efficiency's mass unit (1)
}

export const integratorDefaults: IntegratorSettings = {
  samplesPerTimeConstant: 10,
  minSamples: 101,
  maxSamples: 2_000_001,
  quadrature: 'simpson',
  pulseMass: 1,
};

export const integratorParamMeta: Record<Exclude<keyof IntegratorSettings, 'quadrature'>, ParamMeta> = {
  samplesPerTimeConstant: {
    description: 'Default grid resolution: sampling interval is at most the fastest decay time constant divided by this.',
    unit: 'samples per τ',
    range: { min: 2, max: 1000, default: 10 },
  },
  minSamples: {
    description: 'Smallest default grid, used when every time constant is long relative to the horizon.',
    unit: 'samples',
    range: { min: 2, max: 100_000, default: 101 },
  },
  maxSamples: {
    description: 'Largest default grid. A gas whose fastest mode would need more is rejected rather than under-sampled.',
    unit: 'samples',
    range: { min: 2, max: 100_000_000, default: 2_000_001 },
  },
  pulseMass: {
    description: 'Mass of the emitted pulse. Forcing and AGWP scale linearly with it; GWP does not depend on it.',
    unit: 'efficiency mass unit (kg for catalog gases)',
    range: { min: 0, default: 1 },
  },
};

function isPositiveInteger(value: number): boolean {
  return Number.isInteger(value) && value > 0;
}

export function validateIntegratorSettings(settings: IntegratorSettings): ValidationResult {
  const errors: string[] = [];
  const warnings: string[] = [];

  // Below 2 a panel may span more than one time constant and the last
  // panel's weight can shrink as it lengthens
  if (!Number.isFinite(settings.samplesPerTimeConstant) || settings.samplesPerTimeConstant < 2) {
    errors.push(`samplesPerTimeConstant must be at least 2, got ${settings.samplesPerTimeConstant}`);
  } else if (settings.samplesPerTimeConstant < 4) {
    warnings.push(`samplesPerTimeConstant ${settings.samplesPerTimeConstant} under-resolves the fastest decay mode`);
  }

  if (!isPositiveInteger(settings.minSamples) || settings.minSamples < 2) {
    errors.push(`minSamples must be an integer >= 2, got ${settings.minSamples}`);
  }
  if (!isPositiveInteger(settings.maxSamples) || settings.maxSamples < 2) {
    errors.push(`maxSamples must be an integer >= 2, got ${settings.maxSamples}`);
  }
  if (settings.maxSamples < settings.minSamples) {
    errors.push(`maxSamples ${settings.maxSamples} is below minSamples ${settings.minSamples}`);
  }

  if (!QUADRATURE_RULES.includes(settings.quadrature)) {
    errors.push(`quadrature must be one of ${QUADRATURE_RULES.join(', ')}, got ${String(settings.quadrature)}`);
  }

  if (!Number.isFinite(settings.pulseMass) || settings.pulseMass <= 0) {
    errors.push(`pulseMass must be positive, got ${settings.pulseMass}`);
  }

  return { valid: errors.length === 0, errors, warnings };
}

export function mergeIntegratorSettings(
  partial: Partial<IntegratorSettings>,
  onWarning?: WarningHandler
): IntegratorSettings {
  return validatedMerge(
    COMPONENT,
    validateIntegratorSettings,
    (p: Partial<IntegratorSettings>) => ({ ...integratorDefaults, ...p }),
    partial,
    onWarning
  );
}

// =============================================================================
// INPUT CHECKS
// =============================================================================

function assertHorizon(horizon: TimeHorizon): void {
  if (!Number.isFinite(horizon) || horizon <= 0) {
    throw new InvalidInputError(COMPONENT, [`horizon must be positive, got ${horizon}`]);
  }
}

function assertSampleCount(samples: number): void {
  if (!Number.isInteger(samples) || samples < 2) {
    throw new InvalidInputError(COMPONENT, [`samples must be an integer >= 2, got ${samples}`]);
  }
}

function assertSettings(settings: IntegratorSettings): void {
  const result = validateIntegratorSettings(settings);
  if (!result.valid) {
    throw new InvalidInputError(COMPONENT, result.errors);
  }
}

// =============================================================================
// SAMPLING
// =============================================================================

/**
 * Default grid size for a gas over a horizon.
 *
 * Interval count is the larger of (minSamples − 1) and
 * ⌈H / (τ_min / samplesPerTimeConstant)⌉, rounded up to even so the
 * composite Simpson rule applies without a 3/8 tail.
 */
export function defaultSampleCount(
  gas: GasParameters,
  horizon: TimeHorizon,
  settings: IntegratorSettings = integratorDefaults
): number {
  assertValidGas(gas);
  assertHorizon(horizon);
  assertSettings(settings);

  let intervals = settings.minSamples - 1;
  const fastest = fastestTimeConstant(gas);
  if (fastest !== undefined) {
    const maxStep = fastest / settings.samplesPerTimeConstant;
    intervals = Math.max(intervals, Math.ceil(horizon / maxStep));
  }
  if (intervals % 2 === 1) intervals += 1;

  const samples = intervals + 1;
  if (samples > settings.maxSamples) {
    throw new InvalidInputError(COMPONENT, [
      `${gas.id}: resolving τ = ${fastest} yr over ${horizon} yr needs ${samples} samples, above maxSamples ${settings.maxSamples}`,
    ]);
  }
  return samples;
}

/**
 * Step of the horizon-independent grid used by `integrateAgwp` when no
 * sample count is given: fastest τ / samplesPerTimeConstant. A gas without
 * a decaying term has a constant integrand and gets minSamples − 1 steps
 * over the horizon.
 */
export function integrationStep(
  gas: GasParameters,
  horizon: TimeHorizon,
  settings: IntegratorSettings = integratorDefaults
): number {
  assertValidGas(gas);
  assertHorizon(horizon);
  assertSettings(settings);

  const fastest = fastestTimeConstant(gas);
  return fastest === undefined
    ? horizon / (settings.minSamples - 1)
    : fastest / settings.samplesPerTimeConstant;
}

/**
 * Sample the forcing of a pulse at `samples` uniform points on [0, horizon].
 *
 * @param gas - Validated gas parameters
 * @param horizon - Years, > 0
 * @param samples - Grid size (≥ 2); defaults to `defaultSampleCount`
 * @param settings - Integrator settings (pulse mass, default-grid policy)
 */
export function forcingCurve(
  gas: GasParameters,
  horizon: TimeHorizon,
  samples?: number,
  settings: IntegratorSettings = integratorDefaults
): ForcingCurve {
  assertValidGas(gas);
  assertHorizon(horizon);
  assertSettings(settings);

  const n = samples ?? defaultSampleCount(gas, horizon, settings);
  assertSampleCount(n);

  const curve: ForcingSample[] = linspace(0, horizon, n).map((time) => ({
    time,
    forcing: forcingFromFraction(gas, irf(gas.decayTerms, time), settings.pulseMass),
  }));
  return Object.freeze(curve);
}

// =============================================================================
// INTEGRATION
// =============================================================================

function integrate(values: readonly number[], dx: number, rule: QuadratureRule): number {
  return rule === 'trapezoid' ? trapezoid(values, dx) : simpson(values, dx);
}

/**
 * ∫ₐᵇ over one panel: Simpson on (a, midpoint, b) or trapezoid on (a, b).
 * Both weights are non-negative for any panel length.
 */
function panel(forcingAt: (t: number) => number, a: number, b: number, rule: QuadratureRule): number {
  const width = b - a;
  return rule === 'trapezoid'
    ? (width / 2) * (forcingAt(a) + forcingAt(b))
    : (width / 6) * (forcingAt(a) + 4 * forcingAt(a + width / 2) + forcingAt(b));
}

/**
 * AGWP on the gas's own grid: panels of one step (trapezoid) or two steps
 * (Simpson) from t = 0, the last one cut at the horizon.
 *
 * Panels are summed in time order, so two horizons share every whole panel
 * before the shorter one ends. Within the last panel the integral grows with
 * its length as long as the panel spans at most one time constant, which
 * samplesPerTimeConstant >= 2 guarantees.
 */
function fixedStepAgwp(gas: GasParameters, horizon: TimeHorizon, settings: IntegratorSettings): AgwpResult {
  const step = integrationStep(gas, horizon, settings);
  const rule = settings.quadrature;
  const width = rule === 'trapezoid' ? step : 2 * step;

  let panels = Math.floor(horizon / width);
  if (panels * width > horizon) panels -= 1;
  const hasTail = horizon > panels * width;

  const pointsPerPanel = rule === 'trapezoid' ? 1 : 2;
  const samples = (panels + (hasTail ? 1 : 0)) * pointsPerPanel + 1;
  if (samples > settings.maxSamples) {
    throw new InvalidInputError(COMPONENT, [
      `${gas.id}: integrating with step ${step} yr over ${horizon} yr needs ${samples} samples, above maxSamples ${settings.maxSamples}`,
    ]);
  }

  const forcingAt = (t: number) => forcingFromFraction(gas, irf(gas.decayTerms, t), settings.pulseMass);

  let agwp = 0;
  for (let i = 0; i < panels; i++) {
    agwp += panel(forcingAt, i * width, (i + 1) * width, rule);
  }
  if (hasTail) {
    agwp += panel(forcingAt, panels * width, horizon, rule);
  }
  return agwp;
}

/**
 * Time-integrated forcing of a pulse over [0, horizon] by quadrature.
 *
 * With `samples`, integrates the uniform `forcingCurve` of that size.
 * Without, integrates on the horizon-independent grid of `integrationStep`.
 * Either way the result is non-negative and converges to `analyticAgwp` as
 * the grid is refined; the default path is also non-decreasing in horizon.
 */
export function integrateAgwp(
  gas: GasParameters,
  horizon: TimeHorizon,
  samples?: number,
  settings: IntegratorSettings = integratorDefaults
): AgwpResult {
  if (samples === undefined) {
    return fixedStepAgwp(gas, horizon, settings);
  }
  const curve = forcingCurve(gas, horizon, samples, settings);
  const dx = horizon / (curve.length - 1);
  return integrate(curve.map((s) => s.forcing), dx, settings.quadrature);
}

/**
 * Exact AGWP for gases with exponential terms only.
 */
export function analyticAgwp(
  gas: GasParameters,
  horizon: TimeHorizon,
  settings: IntegratorSettings = integratorDefaults
): AgwpResult {
  assertHorizon(horizon);
  assertSettings(settings);
  return forcingFromFraction(gas, airborneFractionIntegral(gas, horizon), settings.pulseMass);
}

/**
 * Running integral of the forcing curve: sample i holds ∫₀^tᵢ F dt.
 *
 * Uses the cumulative trapezoid on the same grid as `forcingCurve`; the
 * final value agrees with `integrateAgwp` given the same sample count under
 * quadrature 'trapezoid', up to rounding.
 */
export function cumulativeForcingCurve(
  gas: GasParameters,
  horizon: TimeHorizon,
  samples?: number,
  settings: IntegratorSettings = integratorDefaults
): ForcingCurve {
  const curve = forcingCurve(gas, horizon, samples, settings);
  const dx = horizon / (curve.length - 1);
  const running = cumulativeTrapezoid(curve.map((s) => s.forcing), dx);
  return Object.freeze(curve.map((s, i) => ({ time: s.time, forcing: running[i] })));
}
