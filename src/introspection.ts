/**
 * Settings Introspection
 *
 * Structured metadata about the integrator settings, so front-ends can list
 * and validate options without reading source code.
 *
 * Usage:
 *   import { describeSettings } from './introspection.js';
 *   const schema = describeSettings();
 *   console.log(schema.samplesPerTimeConstant);
 *   // { type: 'number', default: 10, min: 1, max: 1000, unit: 'samples per τ', ... }
 */

import {
  QUADRATURE_RULES,
  integratorDefaults,
  integratorParamMeta,
} from './modules/forcing-integrator.js';

// =============================================================================
// TYPES
// =============================================================================

export interface SettingInfo {
  type: 'number' | 'choice';
  default: number | string;
  min?: number;
  max?: number;
  /** Allowed values for 'choice' settings */
  choices?: readonly string[];
  unit: string;
  description: string;
}

export interface SettingsSchema {
  [key: string]: SettingInfo;
}

// =============================================================================
// SCHEMA
// =============================================================================

/**
 * Metadata for every integrator setting, generated from its paramMeta.
 */
export function describeSettings(): SettingsSchema {
  const schema: SettingsSchema = {};

  for (const [key, meta] of Object.entries(integratorParamMeta)) {
    const info: SettingInfo = {
      type: 'number',
      default: meta.range.default,
      unit: meta.unit,
      description: meta.description,
    };
    if (meta.range.min !== undefined) info.min = meta.range.min;
    if (meta.range.max !== undefined) info.max = meta.range.max;
    schema[key] = info;
  }

  schema.quadrature = {
    type: 'choice',
    default: integratorDefaults.quadrature,
    choices: QUADRATURE_RULES,
    unit: '-',
    description: "Quadrature rule for AGWP: composite Simpson (3/8 rule on an odd trailing interval) or trapezoid.",
  };

  return schema;
}

/**
 * Setting names, sorted.
 */
export function listSettings(): string[] {
  return Object.keys(describeSettings()).sort();
}

// =============================================================================
// CLI
// =============================================================================

async function runCLI() {
  const args = process.argv.slice(2);

  if (args.includes('--help') || args.includes('-h')) {
    console.log('Usage: npx tsx src/introspection.ts [options]');
    console.log('');
    console.log('Options:');
    console.log('  --list         List all setting names');
    console.log('  --json         Output full schema as JSON');
    console.log('  --param=NAME   Show details for a specific setting');
    console.log('  --help, -h     Show this help');
    return;
  }

  const schema = describeSettings();

  if (args.includes('--list')) {
    console.log(listSettings().join('\n'));
    return;
  }

  if (args.includes('--json')) {
    console.log(JSON.stringify(schema, null, 2));
    return;
  }

  const paramArg = args.find(a => a.startsWith('--param='));
  if (paramArg) {
    const name = paramArg.split('=')[1];
    const info = schema[name];
    if (!info) {
      console.error(`Unknown setting: ${name}`);
      console.error(`Available: ${listSettings().join(', ')}`);
      process.exit(1);
    }
    console.log(`${name}:`);
    console.log(`  Type: ${info.type}`);
    console.log(`  Default: ${info.default}`);
    if (info.choices) console.log(`  Choices: ${info.choices.join(', ')}`);
    else console.log(`  Range: [${info.min ?? ''}, ${info.max ?? ''}]`);
    console.log(`  Unit: ${info.unit}`);
    console.log(`  Description: ${info.description}`);
    return;
  }

  console.log(`Integrator settings (${Object.keys(schema).length} total):\n`);
  console.log('Name                       Default    Unit');
  console.log('----                       -------    ----');
  for (const [name, info] of Object.entries(schema)) {
    console.log(`${name.padEnd(26)} ${String(info.default).padStart(7)}    ${info.unit}`);
  }
  console.log('\nRun with --param=NAME for details, --json for full schema');
}

if (process.argv[1]?.endsWith('introspection.ts') || process.argv[1]?.endsWith('introspection.js')) {
  runCLI().catch(err => {
    console.error(err);
    process.exit(1);
  });
}
