/**
 * @fileoverview Cutting Settings
 *
 * Shop-wide calculation constants. Defaults come from the environment
 * (see `loadCuttingDefaults` in core); nothing here hard-codes them.
 *
 * @module domain/machining/entities/cutting-settings
 */

import { DomainError } from '../../shared/types.js';

// ============================================================================
// ERRORS
// ============================================================================

export class InvalidCuttingSettingsError extends DomainError {
  constructor(
    public readonly setting: string,
    reason: string
  ) {
    super('INVALID_CUTTING_SETTINGS', `Invalid cutting setting "${setting}": ${reason}`, {
      setting,
    });
    this.name = 'InvalidCuttingSettingsError';
  }
}

/**
 * No surface-speed multiplier is configured for a tool material
 */
export class MissingSurfaceSpeedMultiplierError extends DomainError {
  constructor(public readonly toolMaterial: string) {
    super(
      'MISSING_SURFACE_SPEED_MULTIPLIER',
      `No surface speed multiplier configured for tool material "${toolMaterial}"`,
      { toolMaterial }
    );
    this.name = 'MissingSurfaceSpeedMultiplierError';
  }
}

// ============================================================================
// TYPES
// ============================================================================

export interface CuttingSettings {
  /** Chip load per tooth per revolution as a fraction of tool diameter */
  readonly chipLoadRatio: number;
  /** Fraction of rated power to plan for, in (0, 1] */
  readonly safetyMargin: number;
  /** Fraction of motor power reaching the cutter, in (0, 1] */
  readonly transmissionEfficiency: number;
  /** Tool material -> multiplier on the work material's surface speed */
  readonly surfaceSpeedMultipliers: ReadonlyMap<string, number>;
}

export interface CreateCuttingSettingsInput {
  chipLoadRatio: number;
  safetyMargin: number;
  transmissionEfficiency: number;
  surfaceSpeedMultipliers: Readonly<Record<string, number>>;
}

// ============================================================================
// FACTORY & VALIDATION
// ============================================================================

function assertFraction(setting: string, value: number): void {
  if (!Number.isFinite(value) || value <= 0 || value > 1) {
    throw new InvalidCuttingSettingsError(setting, `must be in (0, 1], got ${value}`);
  }
}

export function assertValidCuttingSettings(settings: CuttingSettings): void {
  if (!Number.isFinite(settings.chipLoadRatio) || settings.chipLoadRatio <= 0) {
    throw new InvalidCuttingSettingsError(
      'chipLoadRatio',
      `must be greater than 0, got ${settings.chipLoadRatio}`
    );
  }
  assertFraction('safetyMargin', settings.safetyMargin);
  assertFraction('transmissionEfficiency', settings.transmissionEfficiency);

  for (const [toolMaterial, multiplier] of settings.surfaceSpeedMultipliers) {
    if (!Number.isFinite(multiplier) || multiplier <= 0) {
      throw new InvalidCuttingSettingsError(
        `surfaceSpeedMultipliers.${toolMaterial}`,
        `must be greater than 0, got ${multiplier}`
      );
    }
  }
}

export function createCuttingSettings(input: CreateCuttingSettingsInput): CuttingSettings {
  const settings: CuttingSettings = Object.freeze({
    chipLoadRatio: input.chipLoadRatio,
    safetyMargin: input.safetyMargin,
    transmissionEfficiency: input.transmissionEfficiency,
    surfaceSpeedMultipliers: new Map(Object.entries(input.surfaceSpeedMultipliers)),
  });

  assertValidCuttingSettings(settings);
  return settings;
}

/**
 * Multiplier for a tool material; exact, case-sensitive match
 */
export function surfaceSpeedMultiplierFor(settings: CuttingSettings, toolMaterial: string): number {
  const multiplier = settings.surfaceSpeedMultipliers.get(toolMaterial);
  if (multiplier === undefined) {
    throw new MissingSurfaceSpeedMultiplierError(toolMaterial);
  }
  return multiplier;
}
