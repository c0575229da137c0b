export const ASSUMPTION_IDS = {
  // Fluid
  FLUID_DENSITY_DEFAULTED: 'fluid.density_defaulted',
  FLUID_VISCOSITY_DEFAULTED: 'fluid.viscosity_defaulted',
  FLUID_VISCOSITY_FROM_KINEMATIC: 'fluid.viscosity_from_kinematic',

  // Pipe
  PIPE_ROUGHNESS_DEFAULTED: 'pipe.roughness_defaulted',

  // Friction model
  FRICTION_SWAMEE_JAIN: 'friction.swamee_jain',
  FRICTION_TRANSITIONAL_ESTIMATE: 'friction.transitional_estimate',

  // Gas
  GAS_COMPOSITION_NORMALISED: 'gas.composition_normalised',
  GAS_PENG_ROBINSON: 'gas.peng_robinson_estimate',
} as const;

export type AssumptionId = typeof ASSUMPTION_IDS[keyof typeof ASSUMPTION_IDS];
