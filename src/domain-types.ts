/**
 * Domain types for pulse-emission forcing and GWP.
 *
 * Time is in years throughout. Mass and forcing units are whatever the
 * radiative efficiency is expressed in (W·m⁻² per kg for the shipped
 * catalog, W·m⁻² per unit for synthetic test gases).
 */

/**
 * One mode of a multi-exponential impulse response.
 *
 * A permanently airborne fraction is a `constant` term, not an exponential
 * with an infinite time constant.
 */
export type DecayTerm =
  | { readonly kind: 'exponential'; readonly amplitude: number; readonly timeConstant: number }
  | { readonly kind: 'constant'; readonly amplitude: number };

/**
 * A greenhouse gas and the physical constants that drive its response:
 * IRF(t) = Σ aᵢ·exp(−t/τᵢ) + Σ aⱼ (constant terms), Σ a = 1.
 */
export interface GasParameters {
  /** Stable identifier, used as the table key (e.g. 'ch4') */
  readonly id: string;
  /** Display name */
  readonly name?: string;
  /** Forcing per unit airborne mass (W·m⁻² per mass unit), > 0 */
  readonly radiativeEfficiency: number;
  /** Non-empty, amplitudes sum to 1 */
  readonly decayTerms: readonly DecayTerm[];
}

/** Integration window in years, > 0 */
export type TimeHorizon = number;

export interface ForcingSample {
  /** Years since the pulse */
  readonly time: number;
  /** Instantaneous forcing (W·m⁻²) */
  readonly forcing: number;
}

/**
 * Uniformly spaced samples on [0, horizon], both endpoints included.
 */
export type ForcingCurve = readonly ForcingSample[];

/** Time-integrated forcing of a pulse (W·m⁻²·yr per pulse) */
export type AgwpResult = number;

/** AGWP(gas) / AGWP(reference), dimensionless */
export type GwpResult = number;

/** Reporting horizons (years) for catalogs that name none */
export const STANDARD_HORIZONS: readonly TimeHorizon[] = [20, 100, 500];
