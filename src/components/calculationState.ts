import { InvalidInputError, isCalculationError } from '../engine/errors';

/**
 * Outcome of running a calculator from form state. `empty` means a required
 * field is still blank, which the panels show as a prompt rather than an error.
 */
export type CalculationState<T> =
  | { status: 'empty' }
  | { status: 'ok'; result: T }
  | { status: 'error'; message: string };

export function evaluate<T>(compute: () => T | undefined): CalculationState<T> {
  try {
    const result = compute();
    return result === undefined ? { status: 'empty' } : { status: 'ok', result };
  } catch (err) {
    if (isCalculationError(err)) return { status: 'error', message: err.message };
    throw err;
  }
}

/** Text-field value → number; blank → undefined; anything else unparsable → NaN. */
export function parseField(raw: string): number | undefined {
  const trimmed = raw.trim();
  return trimmed === '' ? undefined : Number(trimmed);
}

/**
 * `methane=94.5` / `ethane 3.2` lines (commas, newlines or semicolons between
 * entries) → component id → mol %.
 */
export function parseCompositionText(text: string): Record<string, number> {
  const composition: Record<string, number> = {};
  for (const entry of text.split(/[\n,;]+/)) {
    const trimmed = entry.trim();
    if (trimmed === '') continue;
    const match = /^([a-z_-]+)\s*[=:\s]\s*([-+]?[\d.]+(?:e[-+]?\d+)?)$/i.exec(trimmed);
    if (!match) {
      throw new InvalidInputError(`Cannot read composition entry '${trimmed}'; expected <component>=<mol%>`, 'composition');
    }
    composition[match[1].toLowerCase()] = Number(match[2]);
  }
  return composition;
}
