/**
 * Shared Test Utilities
 *
 * Lightweight test framework used by all tests.
 * NaN-guarded: numeric assertions fail explicitly on NaN instead of silently passing.
 */

import type { GwpErrorKind } from './framework/errors.js';

let passed = 0;
let failed = 0;

function messageOf(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export function test(name: string, fn: () => void) {
  try {
    fn();
    console.log(`✓ ${name}`);
    passed++;
  } catch (e) {
    console.error(`✗ ${name}`);
    console.error(`  ${messageOf(e)}`);
    failed++;
  }
}

function asNumber(value: unknown): number {
  if (typeof value !== 'number') {
    throw new Error(`Expected a number, got ${typeof value}`);
  }
  return value;
}

/**
 * Run fn and return what it threw; fails if it returned normally.
 */
function thrownBy(fn: unknown): unknown {
  if (typeof fn !== 'function') {
    throw new Error('Expected a function');
  }
  try {
    fn();
  } catch (err) {
    return err;
  }
  throw new Error('Expected function to throw');
}

export function expect<T>(actual: T) {
  return {
    toBe(expected: T) {
      if (actual !== expected) {
        throw new Error(`Expected ${expected}, got ${actual}`);
      }
    },
    toEqual(expected: T) {
      if (JSON.stringify(actual) !== JSON.stringify(expected)) {
        throw new Error(`Expected ${JSON.stringify(expected)}, got ${JSON.stringify(actual)}`);
      }
    },
    toBeCloseTo(expected: number, precision: number = 2) {
      const value = asNumber(actual);
      if (Number.isNaN(value) || Number.isNaN(expected)) {
        throw new Error(`Expected ~${expected}, got ${value} (NaN detected)`);
      }
      const diff = Math.abs(value - expected);
      const threshold = Math.pow(10, -precision);
      if (diff > threshold) {
        throw new Error(`Expected ~${expected}, got ${value} (diff: ${diff.toExponential(3)})`);
      }
    },
    toBeCloseToRelative(expected: number, tolerance: number) {
      const value = asNumber(actual);
      if (Number.isNaN(value) || Number.isNaN(expected)) {
        throw new Error(`Expected ~${expected}, got ${value} (NaN detected)`);
      }
      const rel = expected === 0 ? Math.abs(value) : Math.abs(value - expected) / Math.abs(expected);
      if (rel > tolerance) {
        throw new Error(`Expected ~${expected} (rel ${tolerance}), got ${value} (rel error: ${rel.toExponential(3)})`);
      }
    },
    toBeGreaterThan(expected: number) {
      const value = asNumber(actual);
      if (Number.isNaN(value) || Number.isNaN(expected)) {
        throw new Error(`Expected ${value} > ${expected} (NaN detected)`);
      }
      if (value <= expected) {
        throw new Error(`Expected ${value} > ${expected}`);
      }
    },
    toBeGreaterThanOrEqual(expected: number) {
      const value = asNumber(actual);
      if (Number.isNaN(value) || Number.isNaN(expected)) {
        throw new Error(`Expected ${value} >= ${expected} (NaN detected)`);
      }
      if (value < expected) {
        throw new Error(`Expected ${value} >= ${expected}`);
      }
    },
    toBeLessThan(expected: number) {
      const value = asNumber(actual);
      if (Number.isNaN(value) || Number.isNaN(expected)) {
        throw new Error(`Expected ${value} < ${expected} (NaN detected)`);
      }
      if (value >= expected) {
        throw new Error(`Expected ${value} < ${expected}`);
      }
    },
    toBeLessThanOrEqual(expected: number) {
      const value = asNumber(actual);
      if (Number.isNaN(value) || Number.isNaN(expected)) {
        throw new Error(`Expected ${value} <= ${expected} (NaN detected)`);
      }
      if (value > expected) {
        throw new Error(`Expected ${value} <= ${expected}`);
      }
    },
    toBeBetween(min: number, max: number) {
      const value = asNumber(actual);
      if (Number.isNaN(value) || Number.isNaN(min) || Number.isNaN(max)) {
        throw new Error(`Expected ${value} to be between ${min} and ${max} (NaN detected)`);
      }
      if (value < min || value > max) {
        throw new Error(`Expected ${value} to be between ${min} and ${max}`);
      }
    },
    toBeTrue() {
      if (actual !== true) {
        throw new Error(`Expected true, got ${actual}`);
      }
    },
    toBeFalse() {
      if (actual !== false) {
        throw new Error(`Expected false, got ${actual}`);
      }
    },
    toThrow(message?: string) {
      const err = thrownBy(actual);
      if (message && !messageOf(err).includes(message)) {
        throw new Error(`Expected error containing "${message}", got "${messageOf(err)}"`);
      }
    },
    /** Thrown value must carry `kind` (InvalidInput / DivisionUndefined) */
    toThrowKind(kind: GwpErrorKind, message?: string) {
      const err = thrownBy(actual);
      const actualKind = typeof err === 'object' && err !== null && 'kind' in err ? err.kind : undefined;
      if (actualKind !== kind) {
        throw new Error(`Expected ${kind} error, got ${String(actualKind)}: "${messageOf(err)}"`);
      }
      if (message && !messageOf(err).includes(message)) {
        throw new Error(`Expected error containing "${message}", got "${messageOf(err)}"`);
      }
    },
    toHaveLength(expected: number) {
      if (!Array.isArray(actual) || actual.length !== expected) {
        throw new Error(`Expected length ${expected}, got ${Array.isArray(actual) ? actual.length : 'not an array'}`);
      }
    },
  };
}

export function printSummary() {
  console.log('\n=== Summary ===\n');
  console.log(`Passed: ${passed}`);
  console.log(`Failed: ${failed}`);
  console.log(`Total:  ${passed + failed}`);
  if (failed > 0) {
    process.exit(1);
  }
}
