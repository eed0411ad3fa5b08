/**
 * Settings Introspection Tests
 */

import { describeSettings, listSettings } from './introspection.js';
import { integratorDefaults } from './modules/forcing-integrator.js';
import { test, expect, printSummary } from './test-utils.js';

console.log('\n=== Settings Introspection Tests ===\n');

const schema = describeSettings();

test('every integrator setting is described', () => {
  expect(listSettings()).toEqual(['maxSamples', 'minSamples', 'pulseMass', 'quadrature', 'samplesPerTimeConstant']);
});

test('numeric defaults match the integrator defaults', () => {
  expect(schema.samplesPerTimeConstant.default).toBe(integratorDefaults.samplesPerTimeConstant);
  expect(schema.minSamples.default).toBe(integratorDefaults.minSamples);
  expect(schema.maxSamples.default).toBe(integratorDefaults.maxSamples);
  expect(schema.pulseMass.default).toBe(integratorDefaults.pulseMass);
});

test('numeric defaults lie within their ranges', () => {
  for (const name of listSettings()) {
    const info = schema[name];
    if (info.type !== 'number' || typeof info.default !== 'number') continue;
    if (info.min !== undefined) expect(info.default).toBeGreaterThanOrEqual(info.min);
    if (info.max !== undefined) expect(info.default).toBeLessThanOrEqual(info.max);
  }
});

test('quadrature is a choice between the two rules', () => {
  expect(schema.quadrature.type).toBe('choice');
  expect(schema.quadrature.default).toBe('simpson');
  expect(schema.quadrature.choices).toEqual(['simpson', 'trapezoid']);
});

test('pulse mass has no upper bound', () => {
  expect(schema.pulseMass.min).toBe(0);
  expect(schema.pulseMass.max).toBe(undefined);
});

test('every setting has a unit and description', () => {
  for (const info of Object.values(schema)) {
    expect(info.unit.length).toBeGreaterThan(0);
    expect(info.description.length).toBeGreaterThan(0);
  }
});

printSummary();
