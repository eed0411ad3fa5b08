/**
 * pulse-gwp - Radiative forcing of pulse emissions and Global Warming Potentials
 *
 * Main entry point for programmatic use.
 */

// Domain types
export { STANDARD_HORIZONS } from './domain-types.js';
export type {
  DecayTerm,
  GasParameters,
  TimeHorizon,
  ForcingSample,
  ForcingCurve,
  AgwpResult,
  GwpResult,
} from './domain-types.js';

// Decay kernel
export {
  AMPLITUDE_SUM_TOLERANCE,
  validateGas,
  assertValidGas,
  defineGas,
  exponentialTerm,
  constantTerm,
  remainingFraction,
  hasOnlyFiniteTimeConstants,
  fastestTimeConstant,
  airborneFractionIntegral,
  perturbationLifetime,
} from './modules/decay-kernel.js';

// Radiative efficiency
export {
  forcingFromFraction,
  efficiencyPerKg,
  agwpToJoules,
  ATMOSPHERE_MASS_KG,
  DRY_AIR_MOLAR_MASS,
  EARTH_SURFACE_AREA_M2,
  SECONDS_PER_YEAR,
  KG_PER_MEGATONNE,
} from './modules/radiative-efficiency.js';

// Forcing integrator
export {
  integratorDefaults,
  integratorParamMeta,
  validateIntegratorSettings,
  mergeIntegratorSettings,
  defaultSampleCount,
  integrationStep,
  forcingCurve,
  integrateAgwp,
  analyticAgwp,
  cumulativeForcingCurve,
  QUADRATURE_RULES,
} from './modules/forcing-integrator.js';
export type { IntegratorSettings, QuadratureRule } from './modules/forcing-integrator.js';

// GWP calculator
export { gwp, gwpTable, gwpCurve } from './modules/gwp-calculator.js';
export type { ErrorPolicy, Outcome, GwpCell, GwpTable, GwpTableOptions, GwpSample, GwpCurve } from './modules/gwp-calculator.js';

// Errors
export { InvalidInputError, DivisionUndefinedError, isGwpError } from './framework/errors.js';
export type { GwpError, GwpErrorKind } from './framework/errors.js';
export type { ValidationResult, WarningHandler, ParamMeta, Range } from './framework/types.js';

// Catalog loader
export { loadCatalog, parseCatalog, catalogToGases, findGas, listCatalogs, getCatalogPath } from './catalog.js';
export type { GasCatalog, CatalogGas, CatalogDecayEntry } from './catalog.js';

// Curve helpers
export { sampleAt, extractSeries, peakSample } from './helpers.js';

// Reporting
export { formatGwp, formatGwpTable, curvesToCsv, parseReportArgs } from './report.js';
export type { CsvColumn, ReportOptions } from './report.js';

// Introspection
export { describeSettings, listSettings } from './introspection.js';
export type { SettingInfo, SettingsSchema } from './introspection.js';
