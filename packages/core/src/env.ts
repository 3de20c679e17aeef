import { z } from 'zod';

import { ConfigurationError } from './errors.js';

/**
 * Environment Variable Validation
 *
 * Only the calculation defaults are read here. Logger variables
 * (LOG_LEVEL, NODE_ENV, SERVICE_NAME) are read by the logger itself, so a
 * bad value there never blocks loading cutting defaults.
 */

/**
 * Optional numeric env var with a default. Empty strings count as unset.
 */
function numberWithDefault(defaultValue: number) {
  return z
    .string()
    .optional()
    .transform((v) => (v !== undefined && v.trim() !== '' ? Number(v) : defaultValue))
    .pipe(z.number().finite('Must be a number'));
}

// Calculation defaults - configuration, not physics
export const CuttingEnvSchema = z.object({
  /** Chip load per tooth per revolution, as a fraction of tool diameter */
  CHIP_LOAD_RATIO: numberWithDefault(0.005).pipe(z.number().positive()),
  /** Fraction of rated machine power to plan for */
  SPINDLE_SAFETY_MARGIN: numberWithDefault(0.5).pipe(z.number().gt(0).max(1)),
  /** Fraction of motor power that reaches the cutter */
  TRANSMISSION_EFFICIENCY: numberWithDefault(0.75).pipe(z.number().gt(0).max(1)),
  /** Axial depth grid ceiling as a multiple of tool diameter */
  DOC_MAX_DIAMETER_MULTIPLE: numberWithDefault(1.5).pipe(z.number().positive()),
  /** Axial depth grid step */
  DOC_STEP: numberWithDefault(0.01).pipe(z.number().positive()),
  DOC_STEP_UNIT: z.string().min(1).default('in'),
});

export type CuttingEnv = z.infer<typeof CuttingEnvSchema>;

/**
 * Calculation defaults used when a catalog leaves settings out
 */
export interface CuttingDefaults {
  chipLoadRatio: number;
  safetyMargin: number;
  transmissionEfficiency: number;
  depthOfCut: {
    maxDiameterMultiple: number;
    step: { value: number; unit: string };
  };
}

/**
 * Validate the calculation variables of an environment
 */
export function validateCuttingEnv(source: NodeJS.ProcessEnv = process.env): CuttingEnv {
  const result = CuttingEnvSchema.safeParse(source);

  if (!result.success) {
    const fieldErrors: Record<string, string[]> = {};
    for (const [field, messages] of Object.entries(result.error.flatten().fieldErrors)) {
      fieldErrors[field] = messages ?? [];
    }
    const errorMessages = Object.entries(fieldErrors)
      .map(([field, messages]) => `  ${field}: ${messages.join(', ')}`)
      .join('\n');

    throw new ConfigurationError(`Environment validation failed:\n${errorMessages}`, fieldErrors);
  }

  return result.data;
}

/**
 * Read calculation defaults from the environment
 */
export function loadCuttingDefaults(source: NodeJS.ProcessEnv = process.env): CuttingDefaults {
  const env = validateCuttingEnv(source);

  return {
    chipLoadRatio: env.CHIP_LOAD_RATIO,
    safetyMargin: env.SPINDLE_SAFETY_MARGIN,
    transmissionEfficiency: env.TRANSMISSION_EFFICIENCY,
    depthOfCut: {
      maxDiameterMultiple: env.DOC_MAX_DIAMETER_MULTIPLE,
      step: { value: env.DOC_STEP, unit: env.DOC_STEP_UNIT },
    },
  };
}
