/**
 * meter-calc command dispatcher.
 *
 * runCli() takes argv (without the node/script prefix) and an output sink and
 * returns the process exit status:
 *   0  success
 *   1  calculation error (unknown unit, kind mismatch, invalid input)
 *   2  usage error (unknown command or option, malformed argument)
 */

import { QUANTITY_KINDS, isQuantityKind } from '../contracts/units.ids';
import {
  runConversion,
  runFlowCalculation,
  runGasReport,
  runPressureDropCalculation,
} from '../engine/Calculator';
import { isCalculationError } from '../engine/errors';
import {
  UsageError,
  assertKnownFlags,
  expectPositionals,
  numberFlag,
  parseArgs,
  parseNumber,
  stringFlag,
} from './args';
import type { ParsedArgs } from './args';
import {
  formatAssumptions,
  formatConversion,
  formatFlow,
  formatGasReport,
  formatNotes,
  formatPressureDrop,
  formatUnitList,
} from './format';

export const CLI_NAME = 'meter-calc';
export const CLI_VERSION = '1.0.0';

export interface CliIO {
  out: (line: string) => void;
  err: (line: string) => void;
}

export const consoleIO: CliIO = {
  out: line => console.log(line),
  err: line => console.error(line),
};

export const USAGE = `Usage:
  ${CLI_NAME} convert <value> <from> <to> <kind>
  ${CLI_NAME} flow <diameter> (--velocity <v> | --flow-rate <q>)
      [--diameter-unit m] [--velocity-unit mps] [--flow-unit m3h]
  ${CLI_NAME} pressure <flow> <diameter> <length> [--roughness <e>]
      [--flow-unit m3h] [--diameter-unit m] [--length-unit m] [--roughness-unit mm]
      [--density <kg/m3>] [--viscosity <m2/s>] [--dynamic-viscosity <Pa.s>]
  ${CLI_NAME} gas <pressure_barg> <temperature_c> <component=mol%>...
  ${CLI_NAME} units [kind]
  ${CLI_NAME} --version | --help

Kinds: ${QUANTITY_KINDS.join(', ')}
Options:
  -v, --verbose   list the assumptions behind each result
Run with no arguments for the interactive menu.`;

type Command = (args: ParsedArgs, io: CliIO) => void;

function printAll(io: CliIO, lines: readonly string[]): void {
  for (const line of lines) io.out(line);
}

const convertCommand: Command = (args, io) => {
  assertKnownFlags(args, []);
  const [value, from, to, kind] = expectPositionals(args, ['value', 'from', 'to', 'kind']);
  const normalisedKind = kind.trim().toLowerCase();
  if (!isQuantityKind(normalisedKind)) {
    throw new UsageError(`Unknown unit type '${kind}'. Use one of: ${QUANTITY_KINDS.join(', ')}`);
  }
  printAll(io, formatConversion(runConversion({
    value: parseNumber(value, 'value'),
    from,
    to,
    kind: normalisedKind,
  })));
};

const flowCommand: Command = (args, io) => {
  assertKnownFlags(args, ['velocity', 'flow-rate', 'diameter-unit', 'velocity-unit', 'flow-unit']);
  const [diameter] = expectPositionals(args, ['diameter']);
  printAll(io, formatFlow(runFlowCalculation({
    diameter: parseNumber(diameter, 'diameter'),
    diameterUnit: stringFlag(args, 'diameter-unit'),
    velocity: numberFlag(args, 'velocity'),
    velocityUnit: stringFlag(args, 'velocity-unit'),
    flowRate: numberFlag(args, 'flow-rate'),
    flowUnit: stringFlag(args, 'flow-unit'),
  })));
};

const pressureCommand: Command = (args, io) => {
  assertKnownFlags(args, [
    'roughness', 'flow-unit', 'diameter-unit', 'length-unit', 'roughness-unit',
    'density', 'viscosity', 'dynamic-viscosity',
  ]);
  const [flow, diameter, length] = expectPositionals(args, ['flow', 'diameter', 'length']);
  const result = runPressureDropCalculation({
    flowRate: parseNumber(flow, 'flow'),
    flowUnit: stringFlag(args, 'flow-unit'),
    diameter: parseNumber(diameter, 'diameter'),
    diameterUnit: stringFlag(args, 'diameter-unit'),
    length: parseNumber(length, 'length'),
    lengthUnit: stringFlag(args, 'length-unit'),
    roughness: numberFlag(args, 'roughness'),
    roughnessUnit: stringFlag(args, 'roughness-unit'),
    density: numberFlag(args, 'density'),
    kinematicViscosity: numberFlag(args, 'viscosity'),
    dynamicViscosity: numberFlag(args, 'dynamic-viscosity'),
  });
  printAll(io, formatPressureDrop(result));
  printAll(io, formatNotes(result.notes));
  if (args.flags.has('verbose')) printAll(io, formatAssumptions(result.assumptions));
};

/** `methane=94.5` → ['methane', 94.5] */
export function parseComponent(token: string): [string, number] {
  const eq = token.indexOf('=');
  if (eq <= 0) {
    throw new UsageError(`Expected <component>=<mol%>, got '${token}'`);
  }
  return [token.slice(0, eq), parseNumber(token.slice(eq + 1), token.slice(0, eq))];
}

/** Component tokens → composition; a component named twice (any case) is rejected. */
export function parseComposition(tokens: readonly string[]): Record<string, number> {
  const composition: Record<string, number> = {};
  const seen = new Set<string>();
  for (const [id, molPct] of tokens.map(parseComponent)) {
    const key = id.trim().toLowerCase();
    if (seen.has(key)) throw new UsageError(`Component '${key}' is given more than once`);
    seen.add(key);
    composition[id] = molPct;
  }
  return composition;
}

const gasCommand: Command = (args, io) => {
  assertKnownFlags(args, []);
  const [pressure, temperature, ...components] = args.positionals;
  if (pressure === undefined) throw new UsageError('Missing argument <pressure_barg>');
  if (temperature === undefined) throw new UsageError('Missing argument <temperature_c>');
  if (components.length === 0) throw new UsageError('Missing argument <component=mol%>');

  const report = runGasReport({
    composition: parseComposition(components),
    pressureBarg: parseNumber(pressure, 'pressure_barg'),
    temperatureC: parseNumber(temperature, 'temperature_c'),
  });
  printAll(io, formatGasReport(report));
  printAll(io, formatNotes(report.notes));
  if (args.flags.has('verbose')) printAll(io, formatAssumptions(report.assumptions));
};

const unitsCommand: Command = (args, io) => {
  assertKnownFlags(args, []);
  if (args.positionals.length === 0) {
    printAll(io, formatUnitList());
    return;
  }
  const [kind] = expectPositionals(args, ['kind']);
  const normalisedKind = kind.trim().toLowerCase();
  if (!isQuantityKind(normalisedKind)) {
    throw new UsageError(`Unknown unit type '${kind}'. Use one of: ${QUANTITY_KINDS.join(', ')}`);
  }
  printAll(io, formatUnitList([normalisedKind]));
};

const COMMANDS: ReadonlyMap<string, Command> = new Map([
  ['convert', convertCommand],
  ['flow', flowCommand],
  ['pressure', pressureCommand],
  ['gas', gasCommand],
  ['units', unitsCommand],
]);

export function runCli(argv: readonly string[], io: CliIO = consoleIO): number {
  try {
    const parsed = parseArgs(argv);

    if (parsed.flags.has('help')) {
      io.out(USAGE);
      return 0;
    }
    if (parsed.flags.has('version')) {
      io.out(`${CLI_NAME} ${CLI_VERSION}`);
      return 0;
    }

    const [name, ...rest] = parsed.positionals;
    if (name === undefined) throw new UsageError('Missing command');
    const command = COMMANDS.get(name);
    if (!command) throw new UsageError(`Unknown command '${name}'`);

    command({ positionals: rest, flags: parsed.flags }, io);
    return 0;
  } catch (err) {
    if (err instanceof UsageError) {
      io.err(`Error: ${err.message}`);
      io.err(`Run '${CLI_NAME} --help' for usage.`);
      return 2;
    }
    if (isCalculationError(err)) {
      io.err(`Error: ${err.message}`);
      return 1;
    }
    throw err;
  }
}
