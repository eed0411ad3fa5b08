/**
 * Pulse Curves Export
 *
 * Writes CSV time series for every gas in a catalog, for a 1 Mt pulse:
 * instantaneous forcing, cumulative absorbed energy, and GWP against the
 * catalog reference as a function of horizon. All gases share one grid.
 *
 * Usage: npx tsx scripts/pulse-curves.ts [--catalog=ar5] [--horizon=100] [--output=curves.csv]
 */

import * as fs from 'fs';
import * as path from 'path';
import {
  loadCatalog,
  getCatalogPath,
  catalogToGases,
  findGas,
  mergeIntegratorSettings,
  defaultSampleCount,
  forcingCurve,
  cumulativeForcingCurve,
  gwpCurve,
  agwpToJoules,
  curvesToCsv,
  extractSeries,
  isGwpError,
  KG_PER_MEGATONNE,
} from '../src/index.js';
import type { CsvColumn } from '../src/index.js';

async function main() {
  let catalogName = 'ar5';
  let horizon = 100;
  let outputPath: string | undefined;

  for (const arg of process.argv.slice(2)) {
    if (arg.startsWith('--catalog=')) {
      catalogName = arg.split('=')[1];
    } else if (arg.startsWith('--horizon=')) {
      horizon = Number(arg.split('=')[1]);
    } else if (arg.startsWith('--output=')) {
      outputPath = arg.split('=')[1];
    } else {
      console.warn(`Ignoring unknown argument: ${arg}`);
    }
  }

  const catalog = await loadCatalog(
    catalogName.endsWith('.json') ? catalogName : getCatalogPath(catalogName)
  );
  const gases = catalogToGases(catalog, (message) => console.warn(message));
  const reference = findGas(gases, catalog.reference);
  const settings = mergeIntegratorSettings({ pulseMass: KG_PER_MEGATONNE });

  // One grid fine enough for the fastest gas
  const samples = Math.max(...gases.map((g) => defaultSampleCount(g, horizon, settings)));

  const referenceForcing = forcingCurve(reference, horizon, samples, settings);
  const { times } = extractSeries(referenceForcing);
  const columns: CsvColumn[] = [];

  for (const gas of gases) {
    const forcing = extractSeries(forcingCurve(gas, horizon, samples, settings)).values;
    const energy = cumulativeForcingCurve(gas, horizon, samples, settings).map((s) => agwpToJoules(s.forcing));
    // At t = 0 the cumulative ratio tends to the ratio of instantaneous forcings
    const gwp = [
      forcing[0] / referenceForcing[0].forcing,
      ...gwpCurve(gas, reference, horizon, samples, settings).map((s) => s.gwp),
    ];

    columns.push(
      { header: `${gas.id}_forcing_W_m2`, values: forcing },
      { header: `${gas.id}_energy_J`, values: energy },
      { header: `${gas.id}_gwp`, values: gwp }
    );
  }

  const csv = curvesToCsv(times, columns);

  if (!outputPath) {
    process.stdout.write(csv);
    return;
  }

  const outputDir = path.dirname(outputPath);
  if (!fs.existsSync(outputDir)) {
    fs.mkdirSync(outputDir, { recursive: true });
  }
  fs.writeFileSync(outputPath, csv);
  console.log(`${gases.length} gases, ${samples} samples over ${horizon} yr`);
  console.log(`Curves saved to: ${outputPath}`);
}

main().catch((err) => {
  console.error(isGwpError(err) ? err.message : err);
  process.exit(1);
});
