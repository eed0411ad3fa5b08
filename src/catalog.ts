/**
 * Gas Catalog Loader
 *
 * Loads gas parameter sets from JSON files and turns them into validated
 * GasParameters. Catalogs carry literature values as published (efficiency
 * per ppb, molar mass, lifetime or multi-term response); conversion to
 * per-kg efficiencies happens here, not in the data.
 *
 * Catalog format:
 *   {
 *     "name": "...", "description": "...", "source": "...",
 *     "reference": "co2", "horizons": [20, 100, 500],   (optional)
 *     "gases": [
 *       { "id": "ch4", "molarMass": 16.04, "radiativeEfficiencyPerPpb": 3.63e-4,
 *         "indirectFactor": 1.65, "lifetime": 12.4 },
 *       { "id": "co2", "molarMass": 44.01, "radiativeEfficiencyPerPpb": 1.37e-5,
 *         "decay": [{ "amplitude": 0.2173, "timeConstant": null }, ...] }
 *     ]
 *   }
 *
 * `timeConstant: null` marks a constant (permanently airborne) term.
 */

import { readFile, readdir } from 'fs/promises';
import { join, dirname } from 'path';
import { fileURLToPath } from 'url';
import { DecayTerm, GasParameters, STANDARD_HORIZONS, TimeHorizon } from './domain-types.js';
import { WarningHandler } from './framework/types.js';
import { InvalidInputError } from './framework/errors.js';
import { constantTerm, defineGas, exponentialTerm } from './modules/decay-kernel.js';
import { efficiencyPerKg } from './modules/radiative-efficiency.js';

const COMPONENT = 'catalog';

// =============================================================================
// TYPES
// =============================================================================

export interface CatalogDecayEntry {
  amplitude: number;
  /** Years; null for a constant term */
  timeConstant: number | null;
}

export interface CatalogGas {
  id: string;
  name?: string;
  /** g/mol */
  molarMass: number;
  /** W·m⁻²·ppb⁻¹ */
  radiativeEfficiencyPerPpb: number;
  /** Multiplier for indirect forcing (default 1) */
  indirectFactor?: number;
  /** Single-exponential perturbation lifetime (years); exclusive with `decay` */
  lifetime?: number;
  /** Multi-term response; exclusive with `lifetime` */
  decay?: CatalogDecayEntry[];
}

export interface GasCatalog {
  name: string;
  description: string;
  source?: string;
  /** Id of the reference gas */
  reference: string;
  /** Default reporting horizons (years); STANDARD_HORIZONS when the file has none */
  horizons: TimeHorizon[];
  gases: CatalogGas[];
}

// =============================================================================
// PARSING
// =============================================================================

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function readNumber(
  obj: Record<string, unknown>,
  key: string,
  where: string,
  problems: string[]
): number {
  const value = obj[key];
  if (typeof value !== 'number') {
    problems.push(`${where}.${key} must be a number`);
    return NaN;
  }
  return value;
}

function readOptionalNumber(
  obj: Record<string, unknown>,
  key: string,
  where: string,
  problems: string[]
): number | undefined {
  return obj[key] === undefined ? undefined : readNumber(obj, key, where, problems);
}

function readString(
  obj: Record<string, unknown>,
  key: string,
  where: string,
  problems: string[]
): string {
  const value = obj[key];
  if (typeof value !== 'string' || value === '') {
    problems.push(`${where}.${key} must be a non-empty string`);
    return '';
  }
  return value;
}

function parseDecay(value: unknown, where: string, problems: string[]): CatalogDecayEntry[] {
  if (!Array.isArray(value)) {
    problems.push(`${where}.decay must be an array`);
    return [];
  }
  return value.map((entry: unknown, i): CatalogDecayEntry => {
    const at = `${where}.decay[${i}]`;
    if (!isRecord(entry)) {
      problems.push(`${at} must be an object`);
      return { amplitude: NaN, timeConstant: null };
    }
    const amplitude = readNumber(entry, 'amplitude', at, problems);
    const timeConstant = entry.timeConstant === null
      ? null
      : readNumber(entry, 'timeConstant', at, problems);
    return { amplitude, timeConstant };
  });
}

function parseGas(value: unknown, index: number, problems: string[]): CatalogGas {
  const where = `gases[${index}]`;
  if (!isRecord(value)) {
    problems.push(`${where} must be an object`);
    return { id: '', molarMass: NaN, radiativeEfficiencyPerPpb: NaN };
  }

  const gas: CatalogGas = {
    id: readString(value, 'id', where, problems),
    molarMass: readNumber(value, 'molarMass', where, problems),
    radiativeEfficiencyPerPpb: readNumber(value, 'radiativeEfficiencyPerPpb', where, problems),
  };
  if (typeof value.name === 'string') gas.name = value.name;

  const indirectFactor = readOptionalNumber(value, 'indirectFactor', where, problems);
  if (indirectFactor !== undefined) gas.indirectFactor = indirectFactor;

  const hasLifetime = value.lifetime !== undefined;
  const hasDecay = value.decay !== undefined;
  if (hasLifetime === hasDecay) {
    problems.push(`${where} must have exactly one of 'lifetime' or 'decay'`);
  } else if (hasLifetime) {
    gas.lifetime = readNumber(value, 'lifetime', where, problems);
  } else {
    gas.decay = parseDecay(value.decay, where, problems);
  }

  return gas;
}

/**
 * Structural check of a parsed JSON catalog.
 * Physical invariants are checked later, when gases are built.
 *
 * @param json - Parsed JSON
 * @param source - File path or label for error messages
 */
export function parseCatalog(json: unknown, source: string): GasCatalog {
  if (!isRecord(json)) {
    throw new InvalidInputError(COMPONENT, [`${source}: catalog must be a JSON object`]);
  }

  const problems: string[] = [];
  const name = readString(json, 'name', 'catalog', problems);
  const description = typeof json.description === 'string' ? json.description : '';
  const reference = readString(json, 'reference', 'catalog', problems);

  const horizons: TimeHorizon[] = [];
  if (json.horizons === undefined) {
    horizons.push(...STANDARD_HORIZONS);
  } else if (Array.isArray(json.horizons)) {
    json.horizons.forEach((h: unknown, i: number) => {
      if (typeof h === 'number') horizons.push(h);
      else problems.push(`catalog.horizons[${i}] must be a number`);
    });
  } else {
    problems.push('catalog.horizons must be an array of numbers');
  }

  let gases: CatalogGas[] = [];
  if (Array.isArray(json.gases)) {
    gases = json.gases.map((g: unknown, i: number) => parseGas(g, i, problems));
  } else {
    problems.push('catalog.gases must be an array');
  }

  if (problems.length === 0 && !gases.some((g) => g.id === reference)) {
    problems.push(`reference '${reference}' is not one of the catalog gases`);
  }

  if (problems.length > 0) {
    throw new InvalidInputError(COMPONENT, problems.map((p) => `${source}: ${p}`));
  }

  const catalog: GasCatalog = { name, description, reference, horizons, gases };
  if (typeof json.source === 'string') catalog.source = json.source;
  return catalog;
}

// =============================================================================
// CONVERSION
// =============================================================================

function toDecayTerms(gas: CatalogGas): DecayTerm[] {
  if (gas.lifetime !== undefined) {
    return [exponentialTerm(1, gas.lifetime)];
  }
  return (gas.decay ?? []).map((entry) =>
    entry.timeConstant === null
      ? constantTerm(entry.amplitude)
      : exponentialTerm(entry.amplitude, entry.timeConstant)
  );
}

/**
 * Build validated GasParameters (efficiency in W·m⁻²·kg⁻¹) for every
 * catalog entry, in catalog order.
 */
export function catalogToGases(catalog: GasCatalog, onWarning?: WarningHandler): GasParameters[] {
  return catalog.gases.map((gas) => {
    const params: GasParameters = {
      id: gas.id,
      radiativeEfficiency: efficiencyPerKg(
        gas.radiativeEfficiencyPerPpb,
        gas.molarMass,
        gas.indirectFactor ?? 1
      ),
      decayTerms: toDecayTerms(gas),
    };
    return defineGas(gas.name === undefined ? params : { ...params, name: gas.name }, onWarning);
  });
}

/**
 * Look up a gas by id; throws InvalidInputError listing the known ids.
 */
export function findGas(gases: readonly GasParameters[], id: string): GasParameters {
  const gas = gases.find((g) => g.id === id);
  if (!gas) {
    throw new InvalidInputError(COMPONENT, [
      `unknown gas '${id}'; available: ${gases.map((g) => g.id).join(', ')}`,
    ]);
  }
  return gas;
}

// =============================================================================
// LOADER
// =============================================================================

/**
 * Load a catalog from a JSON file
 */
export async function loadCatalog(path: string): Promise<GasCatalog> {
  const content = await readFile(path, 'utf-8');

  let json: unknown;
  try {
    json = JSON.parse(content);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new InvalidInputError(COMPONENT, [`${path} is not valid JSON: ${reason}`]);
  }

  return parseCatalog(json, path);
}

// =============================================================================
// CATALOG LISTING
// =============================================================================

const DEFAULT_DATA_DIR = join(dirname(fileURLToPath(import.meta.url)), '../data');

/**
 * List available catalogs in the data directory
 */
export async function listCatalogs(dataDir?: string): Promise<string[]> {
  const dir = dataDir ?? DEFAULT_DATA_DIR;

  let files: string[];
  try {
    files = await readdir(dir);
  } catch (err) {
    if (err instanceof Error && 'code' in err && err.code === 'ENOENT') return [];
    throw err;
  }
  return files
    .filter(f => f.endsWith('.json'))
    .map(f => f.replace('.json', ''))
    .sort();
}

/**
 * Get catalog path from name
 */
export function getCatalogPath(name: string, dataDir?: string): string {
  return join(dataDir ?? DEFAULT_DATA_DIR, `${name}.json`);
}
