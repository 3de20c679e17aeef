/**
 * Machining catalog schemas: machines, tools, work materials and the
 * calculation settings that go with them.
 *
 * Values are validated for shape and sign here; dimensional checks happen
 * when the domain turns them into quantities.
 */
import { z } from 'zod';

import { CatalogNameSchema, FractionSchema, QuantityInputSchema, UnitExpressionSchema } from './common.js';

// =============================================================================
// SPINDLE CAPABILITY
// =============================================================================

/**
 * Variable-speed spindle: anything up to `maxSpeed` is achievable
 */
export const ContinuousSpindleSchema = z.object({
  kind: z.literal('continuous'),
  maxSpeed: QuantityInputSchema,
});

/**
 * Stepped gearbox: only the listed speeds are achievable
 */
export const DiscreteSpindleSchema = z.object({
  kind: z.literal('discrete'),
  unit: UnitExpressionSchema,
  speeds: z.array(z.number().finite()).min(1, 'At least one spindle speed is required'),
});

export const SpindleCapabilitySchema = z.discriminatedUnion('kind', [
  ContinuousSpindleSchema,
  DiscreteSpindleSchema,
]);

// =============================================================================
// CATALOG RECORDS
// =============================================================================

export const MachineSchema = z.object({
  name: CatalogNameSchema,
  ratedPower: QuantityInputSchema,
  maxFeedRate: QuantityInputSchema,
  spindle: SpindleCapabilitySchema,
});

export const ToolSchema = z.object({
  /** Lookup key; derived from the tool description when omitted */
  id: CatalogNameSchema.optional(),
  diameter: QuantityInputSchema,
  toothCount: z.number().int('Tooth count must be an integer'),
  material: CatalogNameSchema,
});

export const WorkMaterialSchema = z.object({
  name: CatalogNameSchema,
  surfaceSpeed: QuantityInputSchema,
  specificCuttingPower: QuantityInputSchema,
});

// =============================================================================
// SETTINGS
// =============================================================================

/**
 * Calculation constants. Every field is optional in a catalog; missing
 * values are filled from environment defaults.
 */
export const CuttingSettingsSchema = z.object({
  /** Linear advance per tooth per revolution, as a fraction of tool diameter */
  chipLoadRatio: z.number().positive().optional(),
  /** Fraction of rated machine power to plan for */
  safetyMargin: FractionSchema.optional(),
  /** Fraction of motor power that reaches the cutter */
  transmissionEfficiency: FractionSchema.optional(),
  /** Tool material class -> surface speed multiplier */
  surfaceSpeedMultipliers: z.record(CatalogNameSchema, z.number().positive()).default({}),
});

export const DepthSamplingSchema = z.object({
  maxDiameterMultiple: z.number().positive().optional(),
  step: QuantityInputSchema.optional(),
  start: QuantityInputSchema.optional(),
});

export const MachiningCatalogSchema = z.object({
  machines: z.array(MachineSchema).default([]),
  tools: z.array(ToolSchema).default([]),
  materials: z.array(WorkMaterialSchema).default([]),
  settings: CuttingSettingsSchema.default({}),
  sampling: DepthSamplingSchema.default({}),
});

export type ContinuousSpindleInput = z.infer<typeof ContinuousSpindleSchema>;
export type DiscreteSpindleInput = z.infer<typeof DiscreteSpindleSchema>;
export type SpindleCapabilityInput = z.infer<typeof SpindleCapabilitySchema>;
export type MachineInput = z.infer<typeof MachineSchema>;
export type ToolInput = z.infer<typeof ToolSchema>;
export type WorkMaterialInput = z.infer<typeof WorkMaterialSchema>;
export type CuttingSettingsInput = z.infer<typeof CuttingSettingsSchema>;
export type DepthSamplingInput = z.infer<typeof DepthSamplingSchema>;
export type MachiningCatalogInput = z.input<typeof MachiningCatalogSchema>;
export type MachiningCatalog = z.infer<typeof MachiningCatalogSchema>;
