/**
 * @fileoverview Machining Catalog
 *
 * Turns raw catalog data (already loaded by the caller) into validated
 * domain entities. Settings the catalog leaves out come from the
 * environment-backed defaults.
 *
 * @module domain/machining/catalog
 */

import { loadCuttingDefaults, type CuttingDefaults } from '@chipload/core';
import {
  MachiningCatalogSchema,
  type MachineInput,
  type QuantityInput,
  type ToolInput,
  type WorkMaterialInput,
} from '@chipload/types';

import { DomainError, ValidationError } from '../shared/types.js';
import { Quantity, parseUnit, type Unit } from '../shared-kernel/value-objects/index.js';
import {
  continuousSpindle,
  createMachine,
  discreteSpindle,
  type Machine,
  type SpindleCapability,
} from './entities/machine.js';
import { createTool, type Tool } from './entities/tool.js';
import { createWorkMaterial, type WorkMaterial } from './entities/work-material.js';
import { createCuttingSettings, type CuttingSettings } from './entities/cutting-settings.js';
import { assertValidSamplingSpec, type DepthSamplingSpec } from './services/stepover-curve.js';

// ============================================================================
// TYPES
// ============================================================================

export interface ParsedMachiningCatalog {
  readonly machines: readonly Machine[];
  readonly tools: readonly Tool[];
  readonly materials: readonly WorkMaterial[];
  readonly settings: CuttingSettings;
  readonly sampling: DepthSamplingSpec;
}

// ============================================================================
// HELPERS
// ============================================================================

/**
 * Re-raise unit and quantity errors as field-level validation errors
 */
function atPath<T>(path: string, build: () => T): T {
  try {
    return build();
  } catch (error) {
    if (
      error instanceof DomainError &&
      (error.code === 'UNKNOWN_UNIT' || error.code === 'INVALID_QUANTITY')
    ) {
      throw new ValidationError('Invalid machining catalog', { [path]: [error.message] });
    }
    throw error;
  }
}

function toUnit(expression: string, path: string): Unit {
  return atPath(path, () => parseUnit(expression));
}

function toQuantity(input: QuantityInput, path: string): Quantity {
  return atPath(path, () => Quantity.of(input.value, toUnit(input.unit, `${path}.unit`)));
}

function assertUniqueKeys(collection: string, keys: readonly string[], label: string): void {
  const fieldErrors: Record<string, string[]> = {};
  const seen = new Set<string>();

  keys.forEach((key, index) => {
    if (seen.has(key)) {
      fieldErrors[`${collection}.${index}`] = [`Duplicate ${label}: ${key}`];
    }
    seen.add(key);
  });

  if (Object.keys(fieldErrors).length > 0) {
    throw new ValidationError('Invalid machining catalog', fieldErrors);
  }
}

function toSpindle(input: MachineInput['spindle'], path: string): SpindleCapability {
  if (input.kind === 'continuous') {
    return continuousSpindle(toQuantity(input.maxSpeed, `${path}.maxSpeed`));
  }
  const unit = toUnit(input.unit, `${path}.unit`);
  return discreteSpindle(
    input.speeds.map((speed, index) => atPath(`${path}.speeds.${index}`, () => Quantity.of(speed, unit)))
  );
}

function toMachine(input: MachineInput, index: number): Machine {
  const path = `machines.${index}`;
  return createMachine({
    name: input.name,
    ratedPower: toQuantity(input.ratedPower, `${path}.ratedPower`),
    maxFeedRate: toQuantity(input.maxFeedRate, `${path}.maxFeedRate`),
    spindle: toSpindle(input.spindle, `${path}.spindle`),
  });
}

function toTool(input: ToolInput, index: number): Tool {
  return createTool({
    id: input.id,
    diameter: toQuantity(input.diameter, `tools.${index}.diameter`),
    toothCount: input.toothCount,
    material: input.material,
  });
}

function toWorkMaterial(input: WorkMaterialInput, index: number): WorkMaterial {
  const path = `materials.${index}`;
  return createWorkMaterial({
    name: input.name,
    surfaceSpeed: toQuantity(input.surfaceSpeed, `${path}.surfaceSpeed`),
    specificCuttingPower: toQuantity(input.specificCuttingPower, `${path}.specificCuttingPower`),
  });
}

// ============================================================================
// PARSER
// ============================================================================

/**
 * Validate raw catalog data and build the entities it describes
 *
 * @throws ValidationError on schema failures, unknown units or duplicate keys
 * @throws DomainError subclasses for physically invalid records
 */
export function parseMachiningCatalog(
  raw: unknown,
  defaults: CuttingDefaults = loadCuttingDefaults()
): ParsedMachiningCatalog {
  const parsed = MachiningCatalogSchema.safeParse(raw);
  if (!parsed.success) {
    throw ValidationError.fromZodError(parsed.error, 'Invalid machining catalog');
  }
  const catalog = parsed.data;

  const machines = catalog.machines.map(toMachine);
  const tools = catalog.tools.map(toTool);
  const materials = catalog.materials.map(toWorkMaterial);

  assertUniqueKeys('machines', machines.map((machine) => machine.name), 'machine name');
  assertUniqueKeys('tools', tools.map((tool) => tool.id), 'tool id');
  assertUniqueKeys('materials', materials.map((material) => material.name), 'material name');

  const settings = createCuttingSettings({
    chipLoadRatio: catalog.settings.chipLoadRatio ?? defaults.chipLoadRatio,
    safetyMargin: catalog.settings.safetyMargin ?? defaults.safetyMargin,
    transmissionEfficiency: catalog.settings.transmissionEfficiency ?? defaults.transmissionEfficiency,
    surfaceSpeedMultipliers: catalog.settings.surfaceSpeedMultipliers,
  });

  const step = catalog.sampling.step
    ? toQuantity(catalog.sampling.step, 'sampling.step')
    : toQuantity(defaults.depthOfCut.step, 'sampling.step');
  const sampling: DepthSamplingSpec = {
    maxDiameterMultiple: catalog.sampling.maxDiameterMultiple ?? defaults.depthOfCut.maxDiameterMultiple,
    step,
    start: catalog.sampling.start ? toQuantity(catalog.sampling.start, 'sampling.start') : undefined,
  };
  assertValidSamplingSpec(sampling);

  return Object.freeze({
    machines: Object.freeze(machines),
    tools: Object.freeze(tools),
    materials: Object.freeze(materials),
    settings,
    sampling: Object.freeze(sampling),
  });
}
