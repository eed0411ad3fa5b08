/**
 * GWP Report
 *
 * Text and CSV rendering of results, plus the command-line front-end:
 *
 *   npx tsx src/report.ts [--catalog=ar5] [--horizons=20,100,500] [--collect]
 *
 * All console output lives here and in scripts/; the modules never print.
 */

import { GasParameters, GwpResult, TimeHorizon } from './domain-types.js';
import { InvalidInputError, isGwpError } from './framework/errors.js';
import { IntegratorSettings, QUADRATURE_RULES, QuadratureRule, integrateAgwp, mergeIntegratorSettings } from './modules/forcing-integrator.js';
import { GwpCell, GwpTable, gwpTable } from './modules/gwp-calculator.js';
import { KG_PER_MEGATONNE, agwpToJoules } from './modules/radiative-efficiency.js';
import { catalogToGases, findGas, getCatalogPath, listCatalogs, loadCatalog } from './catalog.js';

// =============================================================================
// FORMATTING
// =============================================================================

const NAME_WIDTH = 16;
const CELL_WIDTH = 12;

/**
 * Three significant figures below 1000, whole numbers from there on.
 */
export function formatGwp(value: GwpResult): string {
  // 999.5 and up would print as 1.00e+3
  return Math.abs(value) >= 999.5 ? Math.round(value).toString() : value.toPrecision(3);
}

function formatCell(cell: GwpResult | GwpCell | undefined): string {
  if (cell === undefined) return '-';
  if (typeof cell === 'number') return formatGwp(cell);
  return cell.ok ? formatGwp(cell.value) : cell.error.kind;
}

/**
 * Fixed-width table: one row per gas, one column per horizon.
 * Failed cells show their error kind; pairs absent from the table show '-'.
 */
export function formatGwpTable(
  table: GwpTable<GwpResult | GwpCell>,
  gasIds: readonly string[],
  horizons: readonly TimeHorizon[]
): string[] {
  const header = 'Gas'.padEnd(NAME_WIDTH) + horizons.map((h) => `GWP${h}`.padStart(CELL_WIDTH)).join('');
  const lines = [header, '─'.repeat(header.length)];

  for (const id of gasIds) {
    const row = table[id];
    const cells = horizons.map((h) => formatCell(row?.[h]).padStart(CELL_WIDTH));
    lines.push(id.padEnd(NAME_WIDTH) + cells.join(''));
  }

  return lines;
}

export interface CsvColumn {
  header: string;
  values: readonly number[];
}

/**
 * CSV with a leading `time` column. Every column must match `times` in length.
 */
export function curvesToCsv(times: readonly number[], columns: readonly CsvColumn[]): string {
  const mismatched = columns.filter((c) => c.values.length !== times.length);
  if (mismatched.length > 0) {
    throw new InvalidInputError('report', mismatched.map(
      (c) => `column '${c.header}' has ${c.values.length} values, expected ${times.length}`
    ));
  }

  const rows = [['time', ...columns.map((c) => c.header)].join(',')];
  times.forEach((t, i) => {
    rows.push([t, ...columns.map((c) => c.values[i])].join(','));
  });
  return rows.join('\n') + '\n';
}

// =============================================================================
// ARGUMENTS
// =============================================================================

export interface ReportOptions {
  catalog: string;
  reference?: string;
  horizons?: TimeHorizon[];
  gases?: string[];
  settings: Partial<IntegratorSettings>;
  collect: boolean;
  list: boolean;
  help: boolean;
  /** Flags that were not recognised or had unusable values */
  ignored: string[];
}

function parseNumberList(value: string): TimeHorizon[] | undefined {
  const parts = value.split(',').map((v) => v.trim());
  if (parts.some((v) => v === '')) return undefined;
  const numbers = parts.map(Number);
  return numbers.every((n) => Number.isFinite(n)) ? numbers : undefined;
}

function isQuadratureRule(value: string): value is QuadratureRule {
  return QUADRATURE_RULES.some((rule) => rule === value);
}

/**
 * Parse report CLI flags. Values are not range-checked here; the
 * integrator and calculator reject what they cannot use.
 */
export function parseReportArgs(args: readonly string[]): ReportOptions {
  const options: ReportOptions = {
    catalog: 'ar5',
    settings: {},
    collect: false,
    list: false,
    help: false,
    ignored: [],
  };

  for (const arg of args) {
    const eq = arg.indexOf('=');
    const flag = eq === -1 ? arg : arg.slice(0, eq);
    const value = eq === -1 ? '' : arg.slice(eq + 1);

    switch (flag) {
      case '--catalog':
        if (value) options.catalog = value;
        else options.ignored.push(arg);
        break;
      case '--reference':
        if (value) options.reference = value;
        else options.ignored.push(arg);
        break;
      case '--horizons': {
        const horizons = parseNumberList(value);
        if (horizons) options.horizons = horizons;
        else options.ignored.push(arg);
        break;
      }
      case '--gases':
        if (value) options.gases = value.split(',').map((g) => g.trim()).filter((g) => g !== '');
        else options.ignored.push(arg);
        break;
      case '--quadrature':
        if (isQuadratureRule(value)) options.settings.quadrature = value;
        else options.ignored.push(arg);
        break;
      case '--samples-per-tau': {
        const n = Number(value);
        if (value && Number.isFinite(n)) options.settings.samplesPerTimeConstant = n;
        else options.ignored.push(arg);
        break;
      }
      case '--collect':
        options.collect = true;
        break;
      case '--list':
        options.list = true;
        break;
      case '--help':
      case '-h':
        options.help = true;
        break;
      default:
        options.ignored.push(arg);
    }
  }

  return options;
}

// =============================================================================
// CLI RUNNER
// =============================================================================

function catalogPath(nameOrPath: string): string {
  return nameOrPath.endsWith('.json') ? nameOrPath : getCatalogPath(nameOrPath);
}

function printHelp() {
  console.log('Usage: npx tsx src/report.ts [options]');
  console.log('');
  console.log('Options:');
  console.log('  --catalog=NAME|FILE       Gas catalog (default: ar5)');
  console.log('  --reference=ID            Reference gas (default: catalog reference)');
  console.log('  --horizons=20,100,500     Time horizons in years');
  console.log('  --gases=ID,ID             Restrict to these gases');
  console.log('  --quadrature=RULE         simpson | trapezoid');
  console.log('  --samples-per-tau=N       Default grid resolution');
  console.log('  --collect                 Report failing entries instead of aborting');
  console.log('  --list                    List available catalogs');
  console.log('  --help, -h                Show this help');
}

async function runCLI() {
  const options = parseReportArgs(process.argv.slice(2));

  if (options.help) {
    printHelp();
    return;
  }

  if (options.list) {
    console.log('Available catalogs:');
    for (const name of await listCatalogs()) {
      console.log(`  ${name}`);
    }
    return;
  }

  if (options.ignored.length > 0) {
    console.warn(`Warning: Unknown or invalid flags ignored: ${options.ignored.join(', ')}`);
    console.warn('Run with --help to see available options.');
    console.warn('');
  }

  const catalog = await loadCatalog(catalogPath(options.catalog));
  const gases = catalogToGases(catalog, (message) => console.warn(message));
  const settings = mergeIntegratorSettings(options.settings, (message) => console.warn(message));

  const reference = findGas(gases, options.reference ?? catalog.reference);
  const selected: GasParameters[] = options.gases
    ? options.gases.map((id) => findGas(gases, id))
    : gases;
  const horizons = options.horizons ?? catalog.horizons;
  const ids = selected.map((g) => g.id);

  console.log(`\n=== ${catalog.name}: GWP relative to ${reference.name ?? reference.id} ===\n`);
  if (catalog.source) console.log(`Source: ${catalog.source}\n`);

  console.log('Reference AGWP');
  for (const h of horizons) {
    try {
      const agwp = integrateAgwp(reference, h, undefined, settings);
      const joulesPerMt = agwpToJoules(agwp) * KG_PER_MEGATONNE;
      console.log(`  ${String(h).padStart(5)} yr: ${agwp.toExponential(4)} W·m⁻²·yr/kg  (${joulesPerMt.toExponential(3)} J per Mt)`);
    } catch (err) {
      if (!options.collect || !isGwpError(err)) throw err;
      console.log(`  ${String(h).padStart(5)} yr: ${err.message}`);
    }
  }
  console.log('');

  if (options.collect) {
    const table = gwpTable(selected, reference, horizons, { onError: 'collect', settings });
    for (const line of formatGwpTable(table, ids, horizons)) console.log(line);

    const failures = ids.flatMap((id) =>
      horizons.flatMap((h) => {
        const cell = table[id][h];
        return cell.ok ? [] : [`${id} @ ${h} yr: ${cell.error.message}`];
      })
    );
    if (failures.length > 0) {
      console.log('\nFailed entries:');
      for (const f of failures) console.log(`  ${f}`);
    }
  } else {
    const table = gwpTable(selected, reference, horizons, { onError: 'throw', settings });
    for (const line of formatGwpTable(table, ids, horizons)) console.log(line);
  }
}

if (process.argv[1]?.endsWith('report.ts') || process.argv[1]?.endsWith('report.js')) {
  runCLI().catch(err => {
    console.error(isGwpError(err) ? err.message : err);
    process.exit(1);
  });
}
