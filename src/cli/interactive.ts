/**
 * Menu-driven session used when meter-calc is started without arguments.
 * Input comes through a Prompter so the loop can be driven from tests.
 */

import { createInterface } from 'node:readline/promises';
import { QUANTITY_KINDS, isQuantityKind } from '../contracts/units.ids';
import {
  runConversion,
  runFlowCalculation,
  runGasReport,
  runPressureDropCalculation,
} from '../engine/Calculator';
import { isCalculationError } from '../engine/errors';
import { UsageError, parseNumber } from './args';
import {
  formatConversion,
  formatFlow,
  formatGasReport,
  formatNotes,
  formatPressureDrop,
} from './format';
import { CLI_NAME, CLI_VERSION, consoleIO, parseComposition } from './meterCli';
import type { CliIO } from './meterCli';

export interface Prompter {
  /** Resolves with the next answer, or undefined once input is exhausted. */
  ask: (question: string) => Promise<string | undefined>;
  close: () => void;
}

/**
 * Reads answers line by line from `input`. Lines that arrive before their
 * question (piped input) are queued by the line iterator, not dropped.
 */
export function readlinePrompter(
  input: NodeJS.ReadableStream = process.stdin,
  output: NodeJS.WritableStream = process.stdout,
): Prompter {
  const rl = createInterface({ input, output });
  const lines = rl[Symbol.asyncIterator]();
  return {
    ask: async question => {
      output.write(question);
      const next = await lines.next();
      return next.done ? undefined : next.value;
    },
    close: () => rl.close(),
  };
}

const MENU_RULE = '='.repeat(60);

/** Raised when input runs out mid-dialogue; ends the session. */
class EndOfInput extends Error {}

async function required(prompter: Prompter, question: string): Promise<string> {
  const answer = await prompter.ask(question);
  if (answer === undefined) throw new EndOfInput();
  return answer.trim();
}

async function requiredNumber(prompter: Prompter, question: string, name: string): Promise<number> {
  return parseNumber(await required(prompter, question), name);
}

async function optionalNumber(prompter: Prompter, question: string, name: string): Promise<number | undefined> {
  const answer = await required(prompter, question);
  return answer === '' ? undefined : parseNumber(answer, name);
}

async function unitConverter(prompter: Prompter, io: CliIO): Promise<void> {
  io.out('');
  io.out('--- Unit Converter ---');
  io.out(`Available unit types: ${QUANTITY_KINDS.join(', ')}`);
  const kind = (await required(prompter, 'Enter unit type: ')).toLowerCase();
  if (!isQuantityKind(kind)) {
    io.out(`Invalid unit type. Please use: ${QUANTITY_KINDS.join(', ')}`);
    return;
  }
  const value = await requiredNumber(prompter, 'Enter value to convert: ', 'value');
  const from = await required(prompter, 'Enter from unit: ');
  const to = await required(prompter, 'Enter to unit: ');
  const [line] = formatConversion(runConversion({ value, from, to, kind }));
  io.out('');
  io.out(`Result: ${line}`);
}

async function flowCalculator(prompter: Prompter, io: CliIO): Promise<void> {
  io.out('');
  io.out('--- Flow Calculator ---');
  const diameter = await requiredNumber(prompter, 'Enter pipe diameter: ', 'diameter');
  const diameterUnit = await required(prompter, 'Diameter unit (m, cm, mm, in, ft) [m]: ');
  io.out('');
  io.out('Choose calculation type:');
  io.out('1. Calculate flow rate from velocity');
  io.out('2. Calculate velocity from flow rate');
  const choice = await required(prompter, 'Enter choice (1 or 2): ');

  let lines: string[];
  if (choice === '1') {
    const velocity = await requiredNumber(prompter, 'Enter velocity (m/s): ', 'velocity');
    lines = formatFlow(runFlowCalculation({ diameter, diameterUnit: diameterUnit || undefined, velocity }));
  } else if (choice === '2') {
    const flowRate = await requiredNumber(prompter, 'Enter flow rate: ', 'flow rate');
    const flowUnit = await required(prompter, 'Flow unit (m3h, gpm, lpm, ...) [m3h]: ');
    lines = formatFlow(runFlowCalculation({
      diameter,
      diameterUnit: diameterUnit || undefined,
      flowRate,
      flowUnit: flowUnit || undefined,
    }));
  } else {
    io.out('Invalid choice.');
    return;
  }
  io.out('');
  for (const line of lines) io.out(line);
}

async function pressureCalculator(prompter: Prompter, io: CliIO): Promise<void> {
  io.out('');
  io.out('--- Pressure Drop Calculator ---');
  const flowRate = await requiredNumber(prompter, 'Enter flow rate: ', 'flow rate');
  const flowUnit = await required(prompter, 'Flow unit (m3h, gpm, lpm, ...) [m3h]: ');
  const diameter = await requiredNumber(prompter, 'Enter pipe diameter: ', 'diameter');
  const diameterUnit = await required(prompter, 'Diameter unit (m, cm, mm, in, ft) [mm]: ');
  const length = await requiredNumber(prompter, 'Enter pipe length (m): ', 'length');
  const roughness = await optionalNumber(
    prompter,
    'Enter pipe roughness in mm (press Enter for default 0.045): ',
    'roughness',
  );

  const result = runPressureDropCalculation({
    flowRate,
    flowUnit: flowUnit || undefined,
    diameter,
    diameterUnit: diameterUnit || 'mm',
    length,
    roughness,
  });
  io.out('');
  for (const line of [...formatPressureDrop(result), ...formatNotes(result.notes)]) io.out(line);
}

async function gasReport(prompter: Prompter, io: CliIO): Promise<void> {
  io.out('');
  io.out('--- Gas Properties Report ---');
  const pressureBarg = await requiredNumber(prompter, 'Enter line pressure (barg): ', 'pressure');
  const temperatureC = await requiredNumber(prompter, 'Enter line temperature (°C): ', 'temperature');
  const composition = await required(prompter, 'Enter composition (e.g. methane=95 ethane=5): ');

  const report = runGasReport({
    composition: parseComposition(composition.split(/\s+/).filter(Boolean)),
    pressureBarg,
    temperatureC,
  });
  for (const line of [...formatGasReport(report), ...formatNotes(report.notes)]) io.out(line);
}

const ACTIONS: ReadonlyMap<string, (prompter: Prompter, io: CliIO) => Promise<void>> = new Map([
  ['1', unitConverter],
  ['2', flowCalculator],
  ['3', pressureCalculator],
  ['4', gasReport],
]);

export async function runInteractive(prompter: Prompter, io: CliIO = consoleIO): Promise<void> {
  io.out(`${CLI_NAME} v${CLI_VERSION} – Metering Engineer Tool Suite`);

  try {
    for (;;) {
      io.out('');
      io.out(MENU_RULE);
      io.out('Select a function:');
      io.out('1. Unit Converter');
      io.out('2. Flow Calculator');
      io.out('3. Pressure Drop Calculator');
      io.out('4. Gas Properties Report');
      io.out('5. Exit');
      io.out(MENU_RULE);

      const choice = await prompter.ask('Enter your choice (1-5): ');
      if (choice === undefined || choice.trim() === '5') break;

      const action = ACTIONS.get(choice.trim());
      if (!action) {
        io.out('');
        io.out('Invalid choice. Please enter 1, 2, 3, 4, or 5.');
        continue;
      }

      try {
        await action(prompter, io);
      } catch (err) {
        if (err instanceof UsageError || isCalculationError(err)) {
          io.out(`Error: ${err.message}`);
        } else {
          throw err;
        }
      }
    }
  } catch (err) {
    if (!(err instanceof EndOfInput)) throw err;
  } finally {
    prompter.close();
  }

  io.out('');
  io.out(`Thank you for using ${CLI_NAME}!`);
}
