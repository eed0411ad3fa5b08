/**
 * Curve Helper Tests
 */

import { sampleAt, extractSeries, peakSample } from './helpers.js';
import { ForcingCurve } from './domain-types.js';
import { test, expect, printSummary } from './test-utils.js';

console.log('\n=== Curve Helper Tests ===\n');

const rising: ForcingCurve = [
  { time: 0, forcing: 1 },
  { time: 10, forcing: 3 },
  { time: 20, forcing: 5 },
];

const humped: ForcingCurve = [
  { time: 0, forcing: 0 },
  { time: 1, forcing: 2 },
  { time: 2, forcing: 2 },
  { time: 3, forcing: 1 },
];

test('sampleAt returns sample values at grid points', () => {
  expect(sampleAt(rising, 0)).toBe(1);
  expect(sampleAt(rising, 10)).toBe(3);
  expect(sampleAt(rising, 20)).toBe(5);
});

test('sampleAt interpolates between samples', () => {
  expect(sampleAt(rising, 5)).toBe(2);
  expect(sampleAt(rising, 15)).toBe(4);
});

test('sampleAt is undefined outside the curve', () => {
  expect(sampleAt(rising, -1)).toBe(undefined);
  expect(sampleAt(rising, 21)).toBe(undefined);
  expect(sampleAt([], 0)).toBe(undefined);
});

test('extractSeries splits times and values', () => {
  expect(extractSeries(rising)).toEqual({ times: [0, 10, 20], values: [1, 3, 5] });
});

test('peakSample picks the earliest maximum', () => {
  expect(peakSample(humped)).toEqual({ time: 1, forcing: 2 });
  expect(peakSample(rising)?.time).toBe(20);
});

test('peakSample of an empty curve is undefined', () => {
  expect(peakSample([])).toBe(undefined);
});

printSummary();
