/**
 * Quadrature Convergence
 *
 * Relative error of the numerical AGWP against the closed form for every
 * catalog gas without a constant term, over increasing sample counts and
 * both quadrature rules. The default fixed-step grid is shown last, with its step.
 *
 * Usage: npx tsx scripts/convergence.ts [--catalog=ar5] [--horizon=100]
 */

import {
  loadCatalog,
  getCatalogPath,
  catalogToGases,
  hasOnlyFiniteTimeConstants,
  mergeIntegratorSettings,
  integrationStep,
  integrateAgwp,
  analyticAgwp,
  isGwpError,
  QUADRATURE_RULES,
} from '../src/index.js';
import { relativeError } from '../src/primitives/math.js';

const SAMPLE_COUNTS = [3, 5, 11, 21, 51, 101, 1001, 10001];

function formatError(error: number): string {
  return error === 0 ? '0' : error.toExponential(1);
}

async function main() {
  let catalogName = 'ar5';
  let horizon = 100;

  for (const arg of process.argv.slice(2)) {
    if (arg.startsWith('--catalog=')) {
      catalogName = arg.split('=')[1];
    } else if (arg.startsWith('--horizon=')) {
      horizon = Number(arg.split('=')[1]);
    }
  }

  const catalog = await loadCatalog(
    catalogName.endsWith('.json') ? catalogName : getCatalogPath(catalogName)
  );
  const gases = catalogToGases(catalog).filter(hasOnlyFiniteTimeConstants);

  console.log(`=== AGWP Convergence (${catalog.name}, H = ${horizon} yr) ===\n`);

  for (const quadrature of QUADRATURE_RULES) {
    const settings = mergeIntegratorSettings({ quadrature });

    console.log(`Quadrature: ${quadrature}\n`);
    console.log(
      'Gas'.padEnd(14) +
        SAMPLE_COUNTS.map((n) => `n=${n}`.padStart(10)).join('') +
        'default'.padStart(20)
    );
    console.log('-'.repeat(14 + SAMPLE_COUNTS.length * 10 + 20));

    for (const gas of gases) {
      const exact = analyticAgwp(gas, horizon, settings);
      const errors = SAMPLE_COUNTS.map((n) =>
        formatError(relativeError(integrateAgwp(gas, horizon, n, settings), exact)).padStart(10)
      );
      const step = integrationStep(gas, horizon, settings);
      const atDefault = relativeError(integrateAgwp(gas, horizon, undefined, settings), exact);
      console.log(
        gas.id.padEnd(14) + errors.join('') + `${formatError(atDefault)} (Δt ${step.toPrecision(3)})`.padStart(20)
      );
    }
    console.log('');
  }
}

main().catch((err) => {
  console.error(isGwpError(err) ? err.message : err);
  process.exit(1);
});
