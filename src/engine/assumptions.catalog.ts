import type { AssumptionId } from '../contracts/assumptions.ids';
import type { AssumptionV1 } from '../contracts/CalculationOutputV1';
import { COMMERCIAL_STEEL_ROUGHNESS_M, WATER_20C } from './fluids';

export const ASSUMPTION_CATALOG: Record<AssumptionId, Omit<AssumptionV1, 'id'>> = {
  'fluid.density_defaulted': {
    title: 'Fluid density not provided',
    detail: `Water at 20 °C (${WATER_20C.densityKgM3} kg/m³) has been assumed.`,
    severity: 'info',
    improveBy: 'Pass the density of the metered fluid at line conditions.',
  },
  'fluid.viscosity_defaulted': {
    title: 'Fluid viscosity not provided',
    detail: `Water at 20 °C (ν = ${WATER_20C.kinematicViscosityM2s} m²/s) has been assumed.`,
    severity: 'info',
    improveBy: 'Pass the kinematic or dynamic viscosity of the metered fluid.',
  },
  'fluid.viscosity_from_kinematic': {
    title: 'Dynamic viscosity derived',
    detail: 'Dynamic viscosity has been taken as density × kinematic viscosity.',
    severity: 'info',
  },
  'pipe.roughness_defaulted': {
    title: 'Pipe roughness not provided',
    detail: `New commercial steel (ε = ${(COMMERCIAL_STEEL_ROUGHNESS_M * 1000).toFixed(3)} mm) has been assumed.`,
    severity: 'info',
    improveBy: 'Pass the absolute roughness for the actual pipe material and condition.',
  },
  'friction.swamee_jain': {
    title: 'Explicit friction-factor estimate',
    detail: 'The turbulent friction factor comes from the Swamee-Jain approximation of Colebrook-White (typically within 1–2 %).',
    severity: 'info',
  },
  'friction.transitional_estimate': {
    title: 'Transitional flow',
    detail: 'Reynolds number lies between 2300 and 4000. No closed form is agreed for this band; the turbulent estimate has been applied.',
    severity: 'warn',
    improveBy: 'Treat the pressure drop as indicative only, or change the pipe size to leave the transitional band.',
  },
  'gas.composition_normalised': {
    title: 'Composition normalised',
    detail: 'The supplied mole percentages did not sum to 100 % and have been scaled proportionally.',
    severity: 'warn',
    improveBy: 'Check the gas analysis totals.',
  },
  'gas.peng_robinson_estimate': {
    title: 'Compressibility estimated',
    detail: 'Z is estimated from the Peng-Robinson equation on pseudo-critical properties (Kay’s rule), not from a full AGA8 detail characterisation.',
    severity: 'info',
  },
};
