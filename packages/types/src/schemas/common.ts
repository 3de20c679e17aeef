/**
 * Common schemas shared across the catalog
 */
import { z } from 'zod';

/**
 * Unit expression such as `in`, `ft/min` or `hp/(in^3/min)`
 */
export const UnitExpressionSchema = z
  .string()
  .trim()
  .min(1, 'Unit expression is required')
  .max(64)
  .describe('Unit expression, e.g. ft/min or hp/(in^3/min)');

/**
 * A magnitude tagged with its unit
 */
export const QuantityInputSchema = z
  .object({
    value: z.number().finite(),
    unit: UnitExpressionSchema,
  })
  .describe('Dimensioned value');

/**
 * Display name / lookup key
 */
export const CatalogNameSchema = z
  .string()
  .trim()
  .min(1, 'Name is required')
  .max(120)
  .describe('Catalog entry name');

/**
 * Ratio in the half-open interval (0, 1]
 */
export const FractionSchema = z
  .number()
  .gt(0, 'Must be greater than 0')
  .max(1, 'Must be at most 1')
  .describe('Fraction in (0, 1]');

export type UnitExpression = z.infer<typeof UnitExpressionSchema>;
export type QuantityInput = z.infer<typeof QuantityInputSchema>;
export type CatalogName = z.infer<typeof CatalogNameSchema>;
export type Fraction = z.infer<typeof FractionSchema>;
