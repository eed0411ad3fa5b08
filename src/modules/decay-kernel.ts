/**
 * Decay Kernel
 *
 * Impulse-response function (IRF) of a gas: the fraction of an
 * instantaneous pulse still airborne t years after emission.
 *
 *   IRF(t) = Σᵢ aᵢ·exp(−t/τᵢ) + Σⱼ aⱼ        (exponential + constant terms)
 *
 * A single-lifetime gas has one exponential term with τ = its perturbation
 * lifetime. CO₂ uses a Bern-type multi-pool fit with a constant term for the
 * fraction that stays airborne on all horizons of interest.
 *
 * References:
 *   Joos et al. (2013) Atmos. Chem. Phys. 13, 2793–2825
 *   Myhre et al. (2013) IPCC AR5 WG1 Ch. 8, Appendix 8.A
 */

import { DecayTerm, GasParameters } from '../domain-types.js';
import { ValidationResult, WarningHandler } from '../framework/types.js';
import { InvalidInputError } from '../framework/errors.js';
import { validatedMerge } from '../framework/validated-merge.js';

const COMPONENT = 'decay-kernel';

/** Allowed deviation of Σ amplitudes from 1, so that IRF(0) = 1 within it */
export const AMPLITUDE_SUM_TOLERANCE = 1e-9;

/** Time constants beyond this (years) behave like a constant term */
const LONG_TIME_CONSTANT = 1e6;

// =============================================================================
// VALIDATION
// =============================================================================

function describeTerm(index: number, term: DecayTerm): string {
  return `decayTerms[${index}] (${term.kind})`;
}

export function validateGas(gas: GasParameters): ValidationResult {
  const errors: string[] = [];
  const warnings: string[] = [];

  if (typeof gas.id !== 'string' || gas.id.trim() === '') {
    errors.push('id must be a non-empty string');
  }

  const label = gas.id || '<unnamed>';

  if (!Number.isFinite(gas.radiativeEfficiency) || gas.radiativeEfficiency <= 0) {
    errors.push(`${label}: radiativeEfficiency must be positive, got ${gas.radiativeEfficiency}`);
  }

  if (gas.decayTerms.length === 0) {
    errors.push(`${label}: decayTerms must not be empty`);
    return { valid: false, errors, warnings };
  }

  let amplitudeSum = 0;
  gas.decayTerms.forEach((term, i) => {
    if (!Number.isFinite(term.amplitude) || term.amplitude <= 0 || term.amplitude > 1) {
      errors.push(`${label}: ${describeTerm(i, term)} amplitude must be in (0, 1], got ${term.amplitude}`);
    }
    amplitudeSum += term.amplitude;

    if (term.kind === 'exponential') {
      if (!Number.isFinite(term.timeConstant) || term.timeConstant <= 0) {
        errors.push(`${label}: ${describeTerm(i, term)} timeConstant must be positive and finite, got ${term.timeConstant}`);
      } else if (term.timeConstant > LONG_TIME_CONSTANT) {
        warnings.push(`${label}: ${describeTerm(i, term)} timeConstant ${term.timeConstant} yr exceeds ${LONG_TIME_CONSTANT}; consider a constant term`);
      }
    }
  });

  const deviation = Math.abs(amplitudeSum - 1);
  if (!Number.isFinite(amplitudeSum) || deviation > AMPLITUDE_SUM_TOLERANCE) {
    errors.push(`${label}: amplitudes sum to ${amplitudeSum}, expected 1 ± ${AMPLITUDE_SUM_TOLERANCE}`);
  }

  return { valid: errors.length === 0, errors, warnings };
}

/**
 * Throws InvalidInputError unless the gas satisfies every invariant.
 */
export function assertValidGas(gas: GasParameters): void {
  const result = validateGas(gas);
  if (!result.valid) {
    throw new InvalidInputError(COMPONENT, result.errors);
  }
}

/**
 * Build an immutable, validated GasParameters record.
 */
export function defineGas(params: GasParameters, onWarning?: WarningHandler): GasParameters {
  return validatedMerge<GasParameters, GasParameters>(
    COMPONENT,
    validateGas,
    (s) => Object.freeze({
      ...s,
      decayTerms: Object.freeze(s.decayTerms.map((term) => Object.freeze({ ...term }))),
    }),
    params,
    onWarning
  );
}

// =============================================================================
// TERM CONSTRUCTORS
// =============================================================================

export function exponentialTerm(amplitude: number, timeConstant: number): DecayTerm {
  return { kind: 'exponential', amplitude, timeConstant };
}

export function constantTerm(amplitude: number): DecayTerm {
  return { kind: 'constant', amplitude };
}

// =============================================================================
// EVALUATION
// =============================================================================

/**
 * Fraction of a pulse remaining airborne at time t (years).
 *
 * In [0, 1] for t ≥ 0 and equal to 1 at t = 0, both within
 * AMPLITUDE_SUM_TOLERANCE.
 */
export function remainingFraction(gas: GasParameters, t: number): number {
  if (!Number.isFinite(t) || t < 0) {
    throw new InvalidInputError(COMPONENT, [`time must be finite and >= 0, got ${t}`]);
  }
  assertValidGas(gas);
  return irf(gas.decayTerms, t);
}

/**
 * Unchecked IRF evaluation for callers that already validated the gas
 * and the time grid.
 */
export function irf(terms: readonly DecayTerm[], t: number): number {
  let fraction = 0;
  for (const term of terms) {
    fraction += term.kind === 'constant'
      ? term.amplitude
      : term.amplitude * Math.exp(-t / term.timeConstant);
  }
  return fraction;
}

export function hasOnlyFiniteTimeConstants(gas: GasParameters): boolean {
  return gas.decayTerms.every((term) => term.kind === 'exponential');
}

/**
 * Smallest exponential time constant, or undefined if the gas has none.
 */
export function fastestTimeConstant(gas: GasParameters): number | undefined {
  let fastest: number | undefined;
  for (const term of gas.decayTerms) {
    if (term.kind === 'exponential' && (fastest === undefined || term.timeConstant < fastest)) {
      fastest = term.timeConstant;
    }
  }
  return fastest;
}

/**
 * Closed form ∫₀ᴴ IRF(t) dt = Σ aᵢτᵢ(1 − e^(−H/τᵢ)) for finite-τ-only gases.
 *
 * Test oracle for the numerical integrator; gases with a constant term
 * go through the numerical path only.
 */
export function airborneFractionIntegral(gas: GasParameters, horizon: number): number {
  assertValidGas(gas);
  if (!Number.isFinite(horizon) || horizon <= 0) {
    throw new InvalidInputError(COMPONENT, [`horizon must be positive, got ${horizon}`]);
  }

  let integral = 0;
  for (const term of gas.decayTerms) {
    if (term.kind === 'constant') {
      throw new InvalidInputError(COMPONENT, [
        `${gas.id}: closed form covers exponential terms only; use the numerical integrator`,
      ]);
    }
    // -expm1(-x) = 1 - e^(-x) without cancellation for small x
    integral += term.amplitude * term.timeConstant * -Math.expm1(-horizon / term.timeConstant);
  }
  return integral;
}

/**
 * Mean airborne time of a pulse, ∫₀^∞ IRF dt = Σ aᵢτᵢ.
 * Undefined when a constant term keeps part of the pulse airborne forever.
 */
export function perturbationLifetime(gas: GasParameters): number | undefined {
  assertValidGas(gas);
  let lifetime = 0;
  for (const term of gas.decayTerms) {
    if (term.kind === 'constant') return undefined;
    lifetime += term.amplitude * term.timeConstant;
  }
  return lifetime;
}
