/**
 * Radiative Efficiency Tests
 */

import {
  forcingFromFraction,
  efficiencyPerKg,
  agwpToJoules,
  SECONDS_PER_YEAR,
  KG_PER_MEGATONNE,
} from './radiative-efficiency.js';
import { defineGas, exponentialTerm } from './decay-kernel.js';
import { test, expect, printSummary } from '../test-utils.js';

console.log('\n=== Radiative Efficiency Tests ===\n');

const gas = defineGas({ id: 'g', radiativeEfficiency: 2, decayTerms: [exponentialTerm(1, 10)] });

test('forcing is efficiency times airborne fraction', () => {
  expect(forcingFromFraction(gas, 0.5)).toBe(1);
  expect(forcingFromFraction(gas, 0)).toBe(0);
});

test('forcing scales linearly with pulse mass', () => {
  expect(forcingFromFraction(gas, 0.5, 3)).toBe(3);
});

test('per-ppb to per-kg conversion for CO2', () => {
  expect(efficiencyPerKg(1.37e-5, 44.01)).toBeCloseToRelative(1.7561448365751542e-15, 1e-9);
});

test('indirect factor scales the per-kg efficiency', () => {
  expect(efficiencyPerKg(3.63e-4, 16.04, 1.65)).toBeCloseToRelative(2.10657699836326e-13, 1e-9);
  expect(efficiencyPerKg(3.63e-4, 16.04, 1.65) / efficiencyPerKg(3.63e-4, 16.04)).toBeCloseTo(1.65, 12);
});

test('lighter molecules get a larger per-kg efficiency', () => {
  expect(efficiencyPerKg(1e-3, 16)).toBeGreaterThan(efficiencyPerKg(1e-3, 44));
});

test('efficiencyPerKg rejects a non-positive efficiency', () => {
  expect(() => efficiencyPerKg(0, 44.01)).toThrowKind('InvalidInput', '[radiative-efficiency] radiative efficiency per ppb must be positive, got 0');
});

test('efficiencyPerKg lists every bad argument', () => {
  expect(() => efficiencyPerKg(-1, -2, 0)).toThrowKind('InvalidInput', 'Invalid input:');
  expect(() => efficiencyPerKg(-1, -2, 0)).toThrow('indirect factor must be positive, got 0');
});

test('year length is the mean Gregorian year', () => {
  expect(SECONDS_PER_YEAR).toBeCloseTo(31556952, 6);
});

test('AGWP converts to joules over the whole planet', () => {
  expect(agwpToJoules(1)).toBeCloseToRelative(1.6096317620544e22, 1e-12);
  expect(agwpToJoules(0)).toBe(0);
});

test('a megatonne is 1e9 kg', () => {
  expect(KG_PER_MEGATONNE).toBe(1e9);
});

printSummary();
