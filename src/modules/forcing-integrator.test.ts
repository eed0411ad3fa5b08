/**
 * Forcing Integrator Tests
 *
 * Settings validation, the default sampling policy, forcing curves, and
 * the numerical AGWP checked against the closed form.
 */

import {
  integratorDefaults,
  validateIntegratorSettings,
  mergeIntegratorSettings,
  defaultSampleCount,
  integrationStep,
  forcingCurve,
  integrateAgwp,
  analyticAgwp,
  cumulativeForcingCurve,
} from './forcing-integrator.js';
import { defineGas, exponentialTerm, constantTerm } from './decay-kernel.js';
import { relativeError } from '../primitives/math.js';
import { test, expect, printSummary } from '../test-utils.js';

console.log('\n=== Forcing Integrator Tests ===\n');

const methaneLike = defineGas({ id: 'a', radiativeEfficiency: 1, decayTerms: [exponentialTerm(1, 12.4)] });

const bern = defineGas({
  id: 'b',
  radiativeEfficiency: 1,
  decayTerms: [
    constantTerm(0.2173),
    exponentialTerm(0.2240, 394.4),
    exponentialTerm(0.2824, 36.54),
    exponentialTerm(0.2763, 4.304),
  ],
});

const twoPool = defineGas({
  id: 'two-pool',
  radiativeEfficiency: 0.5,
  decayTerms: [exponentialTerm(0.6, 2), exponentialTerm(0.4, 50)],
});

// =============================================================================
// SETTINGS
// =============================================================================

test('defaults are valid', () => {
  const result = validateIntegratorSettings(integratorDefaults);
  expect(result.valid).toBeTrue();
  expect(result.warnings).toHaveLength(0);
});

test('merge fills in defaults', () => {
  const settings = mergeIntegratorSettings({ quadrature: 'trapezoid' });
  expect(settings.quadrature).toBe('trapezoid');
  expect(settings.samplesPerTimeConstant).toBe(10);
  expect(settings.minSamples).toBe(101);
});

test('merge rejects invalid settings', () => {
  expect(() => mergeIntegratorSettings({ minSamples: 1 })).toThrowKind('InvalidInput', 'minSamples must be an integer >= 2');
  expect(() => mergeIntegratorSettings({ pulseMass: 0 })).toThrowKind('InvalidInput', 'pulseMass must be positive');
  expect(() => mergeIntegratorSettings({ samplesPerTimeConstant: -1 })).toThrowKind('InvalidInput', 'samplesPerTimeConstant');
  expect(() => mergeIntegratorSettings({ samplesPerTimeConstant: 1.5 })).toThrowKind('InvalidInput', 'samplesPerTimeConstant must be at least 2, got 1.5');
  expect(() => mergeIntegratorSettings({ minSamples: 11, maxSamples: 10 })).toThrowKind('InvalidInput', 'maxSamples 10 is below minSamples 11');
});

test('coarse sampling produces a warning', () => {
  const warnings: string[] = [];
  mergeIntegratorSettings({ samplesPerTimeConstant: 2 }, (m) => warnings.push(m));
  expect(warnings).toHaveLength(1);
  expect(warnings[0].startsWith('[forcing-integrator] Warning: samplesPerTimeConstant 2')).toBeTrue();
});

// =============================================================================
// SAMPLING POLICY
// =============================================================================

test('long-lived gas uses the minimum grid', () => {
  expect(defaultSampleCount(methaneLike, 20)).toBe(101);
});

test('fast decay refines the grid', () => {
  const fast = defineGas({ id: 'fast', radiativeEfficiency: 1, decayTerms: [exponentialTerm(1, 0.5)] });
  expect(defaultSampleCount(fast, 100)).toBe(2001);
});

test('interval count is rounded up to even', () => {
  const gas = defineGas({ id: 'unit', radiativeEfficiency: 1, decayTerms: [exponentialTerm(1, 1)] });
  const settings = mergeIntegratorSettings({ samplesPerTimeConstant: 2, minSamples: 3 }, () => {});
  // ⌈7 / 0.5⌉ = 14 intervals → 15 samples; ⌈7.2 / 0.5⌉ = 15 → 16 → 17
  expect(defaultSampleCount(gas, 7, settings)).toBe(15);
  expect(defaultSampleCount(gas, 7.2, settings)).toBe(17);
});

test('constant-only gas uses the minimum grid', () => {
  const flat = defineGas({ id: 'flat', radiativeEfficiency: 1, decayTerms: [constantTerm(1)] });
  expect(defaultSampleCount(flat, 1000)).toBe(101);
});

test('grid beyond maxSamples is rejected', () => {
  const veryFast = defineGas({ id: 'very-fast', radiativeEfficiency: 1, decayTerms: [exponentialTerm(1, 1e-3)] });
  expect(() => defaultSampleCount(veryFast, 500)).toThrowKind('InvalidInput', 'above maxSamples 2000001');
  expect(() => integrateAgwp(veryFast, 500)).toThrowKind('InvalidInput', 'above maxSamples');
});

test('integration step follows the fastest time constant', () => {
  expect(integrationStep(methaneLike, 20)).toBeCloseTo(1.24, 12);
  expect(integrationStep(methaneLike, 500)).toBeCloseTo(1.24, 12);
  expect(integrationStep(bern, 100)).toBeCloseTo(0.4304, 12);
});

test('integration step of a constant-only gas spans the horizon', () => {
  const flat = defineGas({ id: 'flat', radiativeEfficiency: 1, decayTerms: [constantTerm(1)] });
  expect(integrationStep(flat, 250)).toBeCloseTo(2.5, 12);
});

test('an explicit sample count bypasses the policy', () => {
  const veryFast = defineGas({ id: 'very-fast', radiativeEfficiency: 1, decayTerms: [exponentialTerm(1, 1e-3)] });
  expect(forcingCurve(veryFast, 500, 11)).toHaveLength(11);
});

// =============================================================================
// FORCING CURVE
// =============================================================================

test('forcing curve samples [0, H] uniformly', () => {
  const curve = forcingCurve(methaneLike, 20, 5);
  expect(curve.map((s) => s.time)).toEqual([0, 5, 10, 15, 20]);
  expect(curve[0].forcing).toBe(1);
  expect(curve[2].forcing).toBeCloseTo(Math.exp(-10 / 12.4), 12);
});

test('forcing curve ends exactly at the horizon', () => {
  const curve = forcingCurve(bern, 100);
  expect(curve[curve.length - 1].time).toBe(100);
});

test('forcing curve is non-negative', () => {
  for (const gas of [methaneLike, bern, twoPool]) {
    expect(forcingCurve(gas, 500).every((s) => s.forcing >= 0)).toBeTrue();
  }
});

test('forcing scales with pulse mass', () => {
  const settings = mergeIntegratorSettings({ pulseMass: 1e9 });
  expect(forcingCurve(methaneLike, 20, 3, settings)[0].forcing).toBe(1e9);
});

test('forcing curve is frozen', () => {
  expect(Object.isFrozen(forcingCurve(methaneLike, 20))).toBeTrue();
});

test('rejects non-positive horizons', () => {
  expect(() => forcingCurve(methaneLike, 0)).toThrowKind('InvalidInput', 'horizon must be positive, got 0');
  expect(() => integrateAgwp(methaneLike, -5)).toThrowKind('InvalidInput', 'horizon must be positive, got -5');
  expect(() => integrateAgwp(methaneLike, NaN)).toThrowKind('InvalidInput');
});

test('rejects too few or fractional samples', () => {
  expect(() => integrateAgwp(methaneLike, 20, 1)).toThrowKind('InvalidInput', 'samples must be an integer >= 2, got 1');
  expect(() => integrateAgwp(methaneLike, 20, 2.5)).toThrowKind('InvalidInput', 'samples must be an integer >= 2');
});

test('rejects unvalidated gases', () => {
  const broken = { id: 'broken', radiativeEfficiency: 1, decayTerms: [exponentialTerm(1, -1)] };
  expect(() => integrateAgwp(broken, 20)).toThrowKind('InvalidInput', 'timeConstant must be positive');
});

// =============================================================================
// AGWP
// =============================================================================

test('analytic AGWP of a single exponential', () => {
  expect(analyticAgwp(methaneLike, 20)).toBeCloseToRelative(9.928579103936528, 1e-12);
});

test('numerical AGWP matches the closed form with 1000 samples', () => {
  for (const gas of [methaneLike, twoPool]) {
    for (const horizon of [1, 20, 100, 500]) {
      const numeric = integrateAgwp(gas, horizon, 1000);
      expect(relativeError(numeric, analyticAgwp(gas, horizon))).toBeLessThan(1e-4);
    }
  }
});

test('default grid is far inside the tolerance', () => {
  expect(relativeError(integrateAgwp(methaneLike, 20), analyticAgwp(methaneLike, 20))).toBeLessThan(1e-6);
  expect(relativeError(integrateAgwp(bern, 100), 52.35538856914976)).toBeLessThan(1e-7);
  expect(relativeError(integrateAgwp(twoPool, 100), analyticAgwp(twoPool, 100))).toBeLessThan(1e-6);
});

test('trapezoid rule also converges', () => {
  const settings = mergeIntegratorSettings({ quadrature: 'trapezoid' });
  const numeric = integrateAgwp(methaneLike, 20, 1000, settings);
  expect(relativeError(numeric, analyticAgwp(methaneLike, 20))).toBeLessThan(1e-4);
});

test('two samples reduce to a single trapezoid', () => {
  const expected = (1 + Math.exp(-20 / 12.4)) * 10;
  expect(integrateAgwp(methaneLike, 20, 2)).toBeCloseTo(expected, 12);
});

test('AGWP with a constant term', () => {
  expect(integrateAgwp(bern, 20)).toBeCloseToRelative(14.241679936997453, 1e-6);
  expect(integrateAgwp(bern, 100)).toBeCloseToRelative(52.35538856914976, 1e-6);
  expect(integrateAgwp(bern, 500)).toBeCloseToRelative(183.63751758885422, 1e-6);
});

test('constant-only gas integrates to RE × H', () => {
  const flat = defineGas({ id: 'flat', radiativeEfficiency: 3, decayTerms: [constantTerm(1)] });
  expect(integrateAgwp(flat, 250)).toBeCloseTo(750, 9);
});

test('AGWP is non-decreasing in horizon', () => {
  const horizons = [1, 5, 20, 50, 100, 500, 1000];
  for (const gas of [methaneLike, bern, twoPool]) {
    const values = horizons.map((h) => integrateAgwp(gas, h));
    for (let i = 1; i < values.length; i++) {
      expect(values[i]).toBeGreaterThanOrEqual(values[i - 1]);
    }
  }
});

test('AGWP does not drop when the horizon crosses a grid point', () => {
  // 126.48 yr sits on a Simpson panel boundary of the τ = 12.4 grid
  const h1 = 1.24 * 102;
  const h2 = h1 + 0.01;
  expect(integrateAgwp(methaneLike, h2)).toBeGreaterThan(integrateAgwp(methaneLike, h1));
});

test('AGWP is non-decreasing over finely spaced horizons', () => {
  const trapezoidSettings = mergeIntegratorSettings({ quadrature: 'trapezoid' });
  const cases = [
    { gas: methaneLike, start: 120, settings: integratorDefaults },
    { gas: methaneLike, start: 120, settings: trapezoidSettings },
    { gas: bern, start: 1, settings: integratorDefaults },
    { gas: twoPool, start: 0.5, settings: integratorDefaults },
  ];
  for (const { gas, start, settings } of cases) {
    let previous = integrateAgwp(gas, start, undefined, settings);
    let drops = 0;
    for (let i = 1; i <= 1500; i++) {
      const value = integrateAgwp(gas, start + i * 0.01, undefined, settings);
      if (value < previous) drops++;
      previous = value;
    }
    expect(drops).toBe(0);
  }
});

test('AGWP is deterministic', () => {
  expect(integrateAgwp(bern, 100)).toBe(integrateAgwp(bern, 100));
});

test('AGWP scales with pulse mass', () => {
  const settings = mergeIntegratorSettings({ pulseMass: 1000 });
  expect(integrateAgwp(methaneLike, 20, undefined, settings)).toBeCloseToRelative(1000 * integrateAgwp(methaneLike, 20), 1e-12);
  expect(analyticAgwp(methaneLike, 20, settings)).toBeCloseToRelative(1000 * 9.928579103936528, 1e-12);
});

test('analytic AGWP refuses constant terms', () => {
  expect(() => analyticAgwp(bern, 100)).toThrowKind('InvalidInput', 'closed form covers exponential terms only');
});

// =============================================================================
// CUMULATIVE CURVE
// =============================================================================

test('cumulative forcing starts at zero and never decreases', () => {
  const running = cumulativeForcingCurve(bern, 100);
  expect(running[0].forcing).toBe(0);
  for (let i = 1; i < running.length; i++) {
    expect(running[i].forcing).toBeGreaterThanOrEqual(running[i - 1].forcing);
  }
});

test('cumulative forcing ends at the trapezoid AGWP', () => {
  const settings = mergeIntegratorSettings({ quadrature: 'trapezoid' });
  const running = cumulativeForcingCurve(methaneLike, 20, 401);
  expect(running[400].forcing).toBeCloseToRelative(integrateAgwp(methaneLike, 20, 401, settings), 1e-12);
  expect(running[400].time).toBe(20);
});

printSummary();
