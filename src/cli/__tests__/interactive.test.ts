import { Readable, Writable } from 'node:stream';
import { describe, it, expect } from 'vitest';
import { readlinePrompter, runInteractive } from '../interactive';
import type { Prompter } from '../interactive';

interface ScriptedPrompter extends Prompter {
  questions: string[];
  closed: boolean;
}

function scripted(answers: string[]): ScriptedPrompter {
  const queue = [...answers];
  const prompter: ScriptedPrompter = {
    questions: [],
    closed: false,
    ask: async question => {
      prompter.questions.push(question);
      return queue.shift();
    },
    close: () => {
      prompter.closed = true;
    },
  };
  return prompter;
}

async function session(answers: string[]): Promise<{ out: string[]; prompter: ScriptedPrompter }> {
  const out: string[] = [];
  const prompter = scripted(answers);
  await runInteractive(prompter, { out: line => out.push(line), err: line => out.push(line) });
  return { out, prompter };
}

describe('runInteractive', () => {
  it('converts a value and exits on 5', async () => {
    const { out, prompter } = await session(['1', 'flow', '100', 'gpm', 'lpm', '5']);
    expect(out).toContain('Result: 100 gpm = 378.5412 lpm');
    expect(out.at(-1)).toBe('Thank you for using meter-calc!');
    expect(prompter.closed).toBe(true);
  });

  it('solves velocity from flow rate with unit defaults', async () => {
    const { out } = await session(['2', '0.1', '', '2', '36', '', '5']);
    expect(out).toContain('  Velocity: 1.27 m/s');
    expect(out).toContain('  Flow Rate: 36.00 m³/h (158.50 GPM)');
  });

  it('uses the default units and roughness when none are entered', async () => {
    const { out, prompter } = await session(['3', '36', '', '100', '', '100', '', '5']);
    expect(out).toContain('  Friction Factor: 0.019599');
    expect(prompter.questions).toContain('Diameter unit (m, cm, mm, in, ft) [mm]: ');
  });

  it('takes the pressure-drop flow and diameter units from the prompts', async () => {
    const { out } = await session(['3', '36', 'm3h', '0.1', 'm', '100', '', '5']);
    expect(out).toContain('  Friction Factor: 0.019599');
    expect(out).toContain('  Velocity: 1.27 m/s');
  });

  it('reports bad input and returns to the menu', async () => {
    const { out, prompter } = await session(['2', 'abc', '9', '5']);
    expect(out).toContain("Error: Invalid number for diameter: 'abc'");
    expect(out).toContain('Invalid choice. Please enter 1, 2, 3, 4, or 5.');
    expect(prompter.questions.filter(q => q === 'Enter your choice (1-5): ')).toHaveLength(3);
  });

  it('rejects an unknown unit type without asking for a value', async () => {
    const { out, prompter } = await session(['1', 'mass', '5']);
    expect(out).toContain('Invalid unit type. Please use: flow, pressure, temperature, length, velocity');
    expect(prompter.questions).toEqual(['Enter your choice (1-5): ', 'Enter unit type: ', 'Enter your choice (1-5): ']);
  });

  it('ends cleanly when input runs out mid-dialogue', async () => {
    const { out, prompter } = await session(['1', 'flow']);
    expect(out.at(-1)).toBe('Thank you for using meter-calc!');
    expect(prompter.closed).toBe(true);
  });
});

function collecting(): { stream: Writable; text: () => string } {
  const chunks: string[] = [];
  const stream = new Writable({
    write(chunk, _encoding, callback) {
      chunks.push(String(chunk));
      callback();
    },
  });
  return { stream, text: () => chunks.join('') };
}

async function streamSession(chunks: string[]): Promise<{ out: string[]; prompts: string }> {
  const out: string[] = [];
  const output = collecting();
  const prompter = readlinePrompter(Readable.from(chunks), output.stream);
  await runInteractive(prompter, { out: line => out.push(line), err: line => out.push(line) });
  return { out, prompts: output.text() };
}

describe('readlinePrompter', () => {
  it('answers every prompt from input piped in one chunk', async () => {
    const { out, prompts } = await streamSession(['1\nflow\n100\ngpm\nlpm\n5\n']);
    expect(out).toContain('Result: 100 gpm = 378.5412 lpm');
    expect(out.at(-1)).toBe('Thank you for using meter-calc!');
    expect(prompts).toBe(
      'Enter your choice (1-5): Enter unit type: Enter value to convert: ' +
      'Enter from unit: Enter to unit: Enter your choice (1-5): ',
    );
  });

  it('joins lines split across chunks, including a last line without a newline', async () => {
    const { out } = await streamSession(['2\n0.1\n\n2', '\n36\n\n5']);
    expect(out).toContain('  Velocity: 1.27 m/s');
    expect(out.at(-1)).toBe('Thank you for using meter-calc!');
  });

  it('ends the session when input runs out', async () => {
    const { out, prompts } = await streamSession(['1\nflow\n']);
    expect(out.some(line => line.startsWith('Result:'))).toBe(false);
    expect(out.at(-1)).toBe('Thank you for using meter-calc!');
    expect(prompts.endsWith('Enter value to convert: ')).toBe(true);
  });
});
