/**
 * Radiative Efficiency
 *
 * Converts airborne mass into instantaneous forcing. Forcing is taken to be
 * linear in the airborne mass of the pulse: F = RE × fraction × mass. This
 * holds for pulse sizes small relative to background concentrations and is
 * the standard pulse-GWP assumption; it ignores the logarithmic saturation
 * of CO₂ forcing at high concentrations.
 *
 * Also carries the unit conversions used to build per-kg efficiencies from
 * per-ppb literature values and to express integrated forcing as energy.
 */

import { GasParameters } from '../domain-types.js';
import { InvalidInputError } from '../framework/errors.js';

const COMPONENT = 'radiative-efficiency';

// =============================================================================
// CONSTANTS
// =============================================================================

/** Total mass of the atmosphere (kg), AR5 Appendix 8.A */
export const ATMOSPHERE_MASS_KG = 5.1352e18;

/** Molar mass of dry air (g/mol) */
export const DRY_AIR_MOLAR_MASS = 28.97;

/** Earth surface area (m²) */
export const EARTH_SURFACE_AREA_M2 = 510_072_000_000_000;

/** Seconds per mean Gregorian year */
export const SECONDS_PER_YEAR = 365.2425 * 24 * 3600;

export const KG_PER_MEGATONNE = 1e9;

// =============================================================================
// FORCING
// =============================================================================

/**
 * Instantaneous forcing (W·m⁻²) from the fraction of a pulse still airborne.
 *
 * @param gas - Gas whose radiative efficiency applies
 * @param fraction - Airborne fraction of the pulse (IRF value)
 * @param pulseMass - Emitted mass in the efficiency's mass unit
 */
export function forcingFromFraction(gas: GasParameters, fraction: number, pulseMass: number = 1): number {
  return gas.radiativeEfficiency * fraction * pulseMass;
}

// =============================================================================
// UNIT CONVERSIONS
// =============================================================================

/**
 * W·m⁻²·ppb⁻¹ → W·m⁻²·kg⁻¹.
 *
 * One ppb of a gas with molar mass M weighs
 *   1e-9 × ATMOSPHERE_MASS_KG × M / DRY_AIR_MOLAR_MASS  kg,
 * so RE_kg = RE_ppb / that mass. `indirectFactor` scales the result for
 * forcing the gas causes through other species (AR5 uses 1.65 for CH₄:
 * +50% tropospheric ozone, +15% stratospheric water vapour).
 *
 * @param perPpb - Radiative efficiency (W·m⁻²·ppb⁻¹)
 * @param molarMass - Molar mass of the gas (g/mol)
 * @param indirectFactor - Multiplier for indirect effects
 */
export function efficiencyPerKg(perPpb: number, molarMass: number, indirectFactor: number = 1): number {
  const problems: string[] = [];
  if (!Number.isFinite(perPpb) || perPpb <= 0) {
    problems.push(`radiative efficiency per ppb must be positive, got ${perPpb}`);
  }
  if (!Number.isFinite(molarMass) || molarMass <= 0) {
    problems.push(`molar mass must be positive, got ${molarMass}`);
  }
  if (!Number.isFinite(indirectFactor) || indirectFactor <= 0) {
    problems.push(`indirect factor must be positive, got ${indirectFactor}`);
  }
  if (problems.length > 0) {
    throw new InvalidInputError(COMPONENT, problems);
  }

  const kgPerPpb = 1e-9 * ATMOSPHERE_MASS_KG * molarMass / DRY_AIR_MOLAR_MASS;
  return (perPpb / kgPerPpb) * indirectFactor;
}

/**
 * Integrated forcing (W·m⁻²·yr) → energy absorbed by the whole planet (J).
 */
export function agwpToJoules(agwp: number): number {
  return agwp * EARTH_SURFACE_AREA_M2 * SECONDS_PER_YEAR;
}
