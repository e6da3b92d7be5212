#!/usr/bin/env node
/**
 * ANF CLI
 *
 * Usage: boolean-anf <rule> [-n vars] [-w bits] [--array] [--table] [--verbose]
 */

import { realpathSync } from 'fs';
import { pathToFileURL } from 'url';
import {
  tryTransformArray,
  tryTransformPacked,
  formatTable,
  packedToTable,
  parseTable,
  numVariablesOf,
  unsignedBigInt,
} from './anf/index.js';

// Elementary cellular automata: 3-cell neighborhood
const DEFAULT_VARIABLES = 3;

// Tables beyond this take too long to print or transform interactively
const MAX_VARIABLES = 16;
const MAX_WIDTH = 2 ** MAX_VARIABLES;

const STANDARD_WIDTHS = [8, 16, 32, 64, 128, 256];

interface CliOptions {
  rule: string;
  numVariables: number;
  width: number | null;
  arrayMode: boolean;
  showTable: boolean;
  verbose: boolean;
}

function parseCount(value: string): number | null {
  if (!/^\d+$/.test(value)) {
    return null;
  }
  return Number(value);
}

function parseArgs(args: string[]): CliOptions | null {
  const cliArgs = args.slice(2); // Skip node and script path

  if (cliArgs.length === 0) {
    return null;
  }

  let rule = '';
  let numVariables = DEFAULT_VARIABLES;
  let width: number | null = null;
  let arrayMode = false;
  let showTable = false;
  let verbose = false;

  for (let i = 0; i < cliArgs.length; i++) {
    const arg = cliArgs[i];

    if (arg === '-n' || arg === '--vars') {
      const count = i + 1 < cliArgs.length ? parseCount(cliArgs[++i]) : null;
      if (count === null) {
        console.error(`Error: ${arg} requires a non-negative integer`);
        return null;
      }
      numVariables = count;
    } else if (arg === '-w' || arg === '--width') {
      const bits = i + 1 < cliArgs.length ? parseCount(cliArgs[++i]) : null;
      if (bits === null || bits === 0) {
        console.error(`Error: ${arg} requires a positive integer`);
        return null;
      }
      if (bits > MAX_WIDTH) {
        console.error(`Error: ${arg} must be at most ${MAX_WIDTH}, got ${bits}`);
        return null;
      }
      width = bits;
    } else if (arg === '--array') {
      arrayMode = true;
    } else if (arg === '--table') {
      showTable = true;
    } else if (arg === '--verbose') {
      verbose = true;
    } else if (arg === '-h' || arg === '--help') {
      return null;
    } else if (!arg.startsWith('-')) {
      rule = arg;
    } else {
      console.error(`Error: Unknown option '${arg}'`);
      return null;
    }
  }

  if (!rule) {
    console.error('Error: No rule specified');
    return null;
  }

  return { rule, numVariables, width, arrayMode, showTable, verbose };
}

function printUsage(): void {
  console.log(`Algebraic Normal Form transform

Usage: boolean-anf <rule> [-n vars] [-w bits] [--array] [--table] [--verbose]

Arguments:
  <rule>               Rule number (decimal, 0x hex or 0b binary), or with
                       --array a 0/1 truth table string, index 0 first

Options:
  -n, --vars <n>       Number of variables (default: ${DEFAULT_VARIABLES})
  -w, --width <bits>   Integer width for the packed transform
                       (default: smallest of ${STANDARD_WIDTHS.join('/')} that fits)
  --array              Transform an explicit truth table string
  --table              Print truth value and ANF coefficient per index
  --verbose            Log each butterfly pass
  -h, --help           Show this help message

Examples:
  boolean-anf 30
  boolean-anf 0xe8 --table
  boolean-anf 0100 --array`);
}

/**
 * Smallest standard width holding 2^n bits, else exactly 2^n.
 */
export function defaultWidth(numVariables: number): number {
  const size = 2 ** numVariables;
  return STANDARD_WIDTHS.find(w => w >= size) ?? size;
}

/**
 * One line per index: assignment in binary (x_{n-1} first), truth value, ANF coefficient.
 */
export function formatRows(truth: readonly boolean[], anf: readonly boolean[], numVariables: number): string[] {
  const width = Math.max(5, numVariables);
  const rows = [`${'index'.padEnd(width)}  f  anf`];
  for (let i = 0; i < truth.length; i++) {
    const index = i.toString(2).padStart(numVariables, '0');
    rows.push(`${index.padEnd(width)}  ${truth[i] ? 1 : 0}  ${anf[i] ? 1 : 0}`);
  }
  return rows;
}

function runPacked(options: CliOptions): number {
  let value: bigint;
  try {
    value = BigInt(options.rule);
  } catch {
    console.error(`Error: Invalid rule number: ${options.rule}`);
    return 1;
  }

  const type = unsignedBigInt(options.width ?? defaultWidth(options.numVariables));

  if (options.verbose) {
    console.log(`Transforming rule ${value} (${options.numVariables} variables, ${type.name})`);
  }

  const result = tryTransformPacked(value, options.numVariables, type, { verbose: options.verbose });
  if (!result.ok) {
    console.error(`Error: ${result.error.message}`);
    return 1;
  }

  console.log(`ANF: ${result.value}`);

  if (options.showTable) {
    const truth = packedToTable(value, options.numVariables, type);
    const anf = packedToTable(result.value, options.numVariables, type);
    console.log(formatRows(truth, anf, options.numVariables).join('\n'));
  }

  return 0;
}

function runArray(options: CliOptions): number {
  const table = parseTable(options.rule);
  if (table === null) {
    console.error(`Error: Truth table must contain only 0 and 1: ${options.rule}`);
    return 1;
  }

  const truth = [...table];
  const result = tryTransformArray(table, { verbose: options.verbose });
  if (!result.ok) {
    console.error(`Error: ${result.error.message}`);
    return 1;
  }

  console.log(`ANF: ${formatTable(result.value)}`);

  if (options.showTable) {
    const numVariables = numVariablesOf(table.length) ?? 0;
    console.log(formatRows(truth, result.value, numVariables).join('\n'));
  }

  return 0;
}

export function main(args: string[] = process.argv): number {
  const options = parseArgs(args);

  if (!options) {
    printUsage();
    return args.some(a => a === '-h' || a === '--help') ? 0 : 1;
  }

  const numVariables = options.arrayMode
    ? numVariablesOf(options.rule.length)
    : options.numVariables;
  if (numVariables !== undefined && numVariables > MAX_VARIABLES) {
    console.error(`Error: At most ${MAX_VARIABLES} variables are supported, got ${numVariables}`);
    return 1;
  }

  return options.arrayMode ? runArray(options) : runPacked(options);
}

function isEntryPoint(): boolean {
  const script = process.argv[1];
  if (!script) return false;
  try {
    return import.meta.url === pathToFileURL(realpathSync(script)).href;
  } catch {
    return false;
  }
}

// Run if executed directly
if (isEntryPoint()) {
  process.exit(main());
}
