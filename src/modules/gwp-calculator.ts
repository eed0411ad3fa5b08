/**
 * GWP Calculator
 *
 *   GWP(gas, H) = AGWP(gas, H) / AGWP(reference, H)
 *
 * Single ratios, batch tables over gases × horizons, and GWP as a function
 * of horizon. Every entry is an independent pure computation; nothing is
 * cached beyond a single call.
 */

import { AgwpResult, GasParameters, GwpResult, TimeHorizon } from '../domain-types.js';
import { DivisionUndefinedError, GwpError, InvalidInputError, isGwpError } from '../framework/errors.js';
import {
  IntegratorSettings,
  cumulativeForcingCurve,
  defaultSampleCount,
  integrateAgwp,
  integratorDefaults,
} from './forcing-integrator.js';

const COMPONENT = 'gwp-calculator';

// =============================================================================
// TYPES
// =============================================================================

/** How a batch treats a failing (gas, horizon) pair */
export type ErrorPolicy = 'throw' | 'collect';

export type Outcome<T> =
  | { readonly ok: true; readonly value: T }
  | { readonly ok: false; readonly error: GwpError };

export type GwpCell = Outcome<GwpResult>;

/**
 * table[gasId][horizon]. Horizons are plain object keys, so a row is keyed
 * by `String(horizon)`: look a cell up with the same number it was computed
 * for, and expect a non-integer horizon such as 0.1 + 0.2 to list as
 * '0.30000000000000004' in `Object.keys`.
 */
export type GwpTable<TCell> = Record<string, Record<number, TCell>>;

export interface GwpTableOptions<TPolicy extends ErrorPolicy = ErrorPolicy> {
  /** Required: fail the whole batch, or report a per-entry error */
  onError: TPolicy;
  settings?: IntegratorSettings;
}

export interface GwpSample {
  readonly time: number;
  readonly gwp: GwpResult;
}

export type GwpCurve = readonly GwpSample[];

// =============================================================================
// SINGLE RATIO
// =============================================================================

function ratio(agwp: AgwpResult, referenceAgwp: AgwpResult, referenceId: string, horizon: TimeHorizon): GwpResult {
  if (referenceAgwp === 0) {
    throw new DivisionUndefinedError(referenceId, horizon);
  }
  return agwp / referenceAgwp;
}

/**
 * GWP of `gas` relative to `referenceGas` over `horizon` years.
 *
 * Each AGWP uses its gas's default grid, so gwp(ref, ref, H) is exactly 1.
 */
export function gwp(
  gas: GasParameters,
  referenceGas: GasParameters,
  horizon: TimeHorizon,
  settings: IntegratorSettings = integratorDefaults
): GwpResult {
  const referenceAgwp = integrateAgwp(referenceGas, horizon, undefined, settings);
  const agwp = integrateAgwp(gas, horizon, undefined, settings);
  return ratio(agwp, referenceAgwp, referenceGas.id, horizon);
}

// =============================================================================
// BATCH TABLE
// =============================================================================

function assertUnique<T>(values: readonly T[], what: string): void {
  const seen = new Set<T>();
  const duplicates = new Set<T>();
  for (const value of values) {
    if (seen.has(value)) duplicates.add(value);
    seen.add(value);
  }
  if (duplicates.size > 0) {
    throw new InvalidInputError(COMPONENT, [
      `duplicate ${what}: ${[...duplicates].join(', ')}`,
    ]);
  }
}

/**
 * Run `fn`, turning domain errors into a failed cell. Anything that is not
 * a GwpError is a bug and propagates.
 */
function attempt<T>(fn: () => T): Outcome<T> {
  try {
    return { ok: true, value: fn() };
  } catch (err) {
    if (isGwpError(err)) {
      return { ok: false, error: err };
    }
    throw err;
  }
}

/**
 * GWP for every (gas, horizon) pair.
 *
 * With `onError: 'throw'` the first failing pair aborts the batch. With
 * `onError: 'collect'` every pair gets a cell, failed or not; none is
 * dropped. Duplicate gas ids or horizons are rejected under both policies.
 */
export function gwpTable(
  gases: readonly GasParameters[],
  referenceGas: GasParameters,
  horizons: readonly TimeHorizon[],
  options: GwpTableOptions<'throw'>
): GwpTable<GwpResult>;
export function gwpTable(
  gases: readonly GasParameters[],
  referenceGas: GasParameters,
  horizons: readonly TimeHorizon[],
  options: GwpTableOptions<'collect'>
): GwpTable<GwpCell>;
export function gwpTable(
  gases: readonly GasParameters[],
  referenceGas: GasParameters,
  horizons: readonly TimeHorizon[],
  options: GwpTableOptions
): GwpTable<GwpResult> | GwpTable<GwpCell> {
  assertUnique(gases.map((g) => g.id), 'gas ids');
  assertUnique(horizons, 'horizons');

  const settings = options.settings ?? integratorDefaults;

  // Reference AGWP once per horizon
  const referenceAgwp = new Map<TimeHorizon, Outcome<AgwpResult>>();
  const referenceAt = (horizon: TimeHorizon): AgwpResult => {
    let cached = referenceAgwp.get(horizon);
    if (!cached) {
      cached = attempt(() => integrateAgwp(referenceGas, horizon, undefined, settings));
      referenceAgwp.set(horizon, cached);
    }
    if (!cached.ok) throw cached.error;
    return cached.value;
  };

  const cell = (gas: GasParameters, horizon: TimeHorizon): GwpResult =>
    ratio(
      integrateAgwp(gas, horizon, undefined, settings),
      referenceAt(horizon),
      referenceGas.id,
      horizon
    );

  if (options.onError === 'throw') {
    const table: GwpTable<GwpResult> = {};
    for (const gas of gases) {
      const row: Record<number, GwpResult> = {};
      for (const horizon of horizons) {
        row[horizon] = cell(gas, horizon);
      }
      table[gas.id] = row;
    }
    return table;
  }

  const table: GwpTable<GwpCell> = {};
  for (const gas of gases) {
    const row: Record<number, GwpCell> = {};
    for (const horizon of horizons) {
      row[horizon] = attempt(() => cell(gas, horizon));
    }
    table[gas.id] = row;
  }
  return table;
}

// =============================================================================
// GWP OVER TIME
// =============================================================================

/**
 * GWP as a function of horizon: ratio of the two cumulative forcing curves
 * on one shared grid, for every sample after t = 0 (where both are zero).
 *
 * @param samples - Grid size; defaults to the finer of the two gases' grids
 */
export function gwpCurve(
  gas: GasParameters,
  referenceGas: GasParameters,
  horizon: TimeHorizon,
  samples?: number,
  settings: IntegratorSettings = integratorDefaults
): GwpCurve {
  const n = samples ?? Math.max(
    defaultSampleCount(gas, horizon, settings),
    defaultSampleCount(referenceGas, horizon, settings)
  );

  const cumulative = cumulativeForcingCurve(gas, horizon, n, settings);
  const reference = cumulativeForcingCurve(referenceGas, horizon, n, settings);

  const curve: GwpSample[] = [];
  for (let i = 1; i < cumulative.length; i++) {
    const { time } = cumulative[i];
    curve.push({ time, gwp: ratio(cumulative[i].forcing, reference[i].forcing, referenceGas.id, time) });
  }
  return Object.freeze(curve);
}
