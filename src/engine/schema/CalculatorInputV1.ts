/**
 * CalculatorInputV1 – unit-bearing inputs accepted at the calculator boundary.
 *
 * The schemas check shape and numeric finiteness only. Unit membership and
 * physical ranges are checked by the engines themselves, so a bad unit still
 * surfaces as UnknownUnitError / KindMismatchError and a bad dimension as
 * InvalidInputError.
 */

import { z } from 'zod';
import { QUANTITY_KINDS } from '../../contracts/units.ids';

const finite = z.number().finite();

/** Unit symbols are matched case-insensitively and without surrounding blanks. */
const unitSymbol = z.string().trim().toLowerCase();

export const ConversionInputSchema = z.object({
  value: finite,
  from: unitSymbol,
  to: unitSymbol,
  kind: z.enum(QUANTITY_KINDS),
});

export const FlowInputSchema = z.object({
  diameter: finite,
  diameterUnit: unitSymbol.default('m'),
  velocity: finite.optional(),
  velocityUnit: unitSymbol.default('mps'),
  flowRate: finite.optional(),
  flowUnit: unitSymbol.default('m3h'),
});

export const PressureDropInputSchema = z.object({
  flowRate: finite,
  flowUnit: unitSymbol.default('m3h'),
  diameter: finite,
  diameterUnit: unitSymbol.default('m'),
  length: finite,
  lengthUnit: unitSymbol.default('m'),
  roughness: finite.optional(),
  roughnessUnit: unitSymbol.default('mm'),
  /** kg/m³ */
  density: finite.optional(),
  /** m²/s */
  kinematicViscosity: finite.optional(),
  /** Pa·s */
  dynamicViscosity: finite.optional(),
});

const componentId = (id: string): string => id.trim().toLowerCase();

/** Component ids are matched case-insensitively, so `Methane` and `methane` may not both appear. */
const composition = z
  .record(z.string(), finite)
  .superRefine((mix, ctx) => {
    const seen = new Set<string>();
    for (const id of Object.keys(mix)) {
      if (seen.has(componentId(id))) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: `component '${componentId(id)}' is given more than once` });
      }
      seen.add(componentId(id));
    }
  })
  .transform(mix => Object.fromEntries(Object.entries(mix).map(([id, molPct]) => [componentId(id), molPct])));

export const GasReportInputSchema = z.object({
  composition,
  pressureBarg: finite,
  temperatureC: finite,
});

export type ConversionInput = z.input<typeof ConversionInputSchema>;
export type FlowInput = z.input<typeof FlowInputSchema>;
export type PressureDropInput = z.input<typeof PressureDropInputSchema>;
export type GasReportInputV1 = z.input<typeof GasReportInputSchema>;
