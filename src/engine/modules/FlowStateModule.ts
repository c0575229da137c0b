/**
 * FlowStateModule
 *
 * Continuity relation for incompressible flow in a full circular pipe:
 *   Q = V × A   where A = π × d² / 4
 *
 * All values are SI: d in m, A in m², V in m/s, Q in m³/s.
 */

import { InvalidInputError, requireNonNegative, requirePositive } from '../errors';

export interface FlowState {
  diameterM: number;
  areaM2: number;
  velocityMps: number;
  flowM3s: number;
}

/** The known half of a flow state. Exactly one field must be set. */
export interface FlowStateKnowns {
  velocityMps?: number;
  flowM3s?: number;
}

/**
 * Internal cross-sectional area (m²) of a pipe of bore `diameterM`.
 */
export function pipeAreaM2(diameterM: number): number {
  requirePositive(diameterM, 'diameter');
  return (Math.PI * diameterM ** 2) / 4;
}

/**
 * Derive the missing half of {flow, velocity} for a pipe of bore `diameterM`.
 *
 * @throws InvalidInputError when the diameter is not positive, when both or
 *         neither of velocity/flow are given, or when the given value is
 *         negative.
 */
export function solveFlowState(diameterM: number, known: FlowStateKnowns): FlowState {
  const hasVelocity = known.velocityMps !== undefined;
  const hasFlow = known.flowM3s !== undefined;

  if (hasVelocity === hasFlow) {
    throw new InvalidInputError(
      hasVelocity
        ? 'Supply either velocity or flow rate, not both'
        : 'Either velocity or flow rate must be supplied',
    );
  }

  const areaM2 = pipeAreaM2(diameterM);

  if (known.velocityMps !== undefined) {
    requireNonNegative(known.velocityMps, 'velocity');
    return {
      diameterM,
      areaM2,
      velocityMps: known.velocityMps,
      flowM3s: known.velocityMps * areaM2,
    };
  }

  const flowM3s = known.flowM3s ?? 0;
  requireNonNegative(flowM3s, 'flow rate');
  return {
    diameterM,
    areaM2,
    velocityMps: flowM3s / areaM2,
    flowM3s,
  };
}
