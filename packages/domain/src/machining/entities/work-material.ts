/**
 * @fileoverview Work Material Entity
 *
 * Reference data for a material being cut: the surface speed it sustains
 * with a baseline tool and the power needed per unit of removal rate.
 *
 * @module domain/machining/entities/work-material
 */

import { DomainError } from '../../shared/types.js';
import { Dimensions, Quantity } from '../../shared-kernel/value-objects/index.js';

/**
 * Error thrown when work-material reference data is unusable
 */
export class InvalidMaterialSpecError extends DomainError {
  constructor(
    public readonly materialName: string,
    reason: string
  ) {
    super('INVALID_MATERIAL_SPEC', `Invalid material "${materialName}": ${reason}`, {
      materialName,
    });
    this.name = 'InvalidMaterialSpecError';
  }
}

export interface WorkMaterial {
  /** Unique key */
  readonly name: string;
  /** Maximum sustainable surface speed (SFM) for the baseline tool material */
  readonly surfaceSpeed: Quantity;
  /** Power per volumetric removal rate, e.g. hp/(in^3/min) */
  readonly specificCuttingPower: Quantity;
}

export type CreateWorkMaterialInput = WorkMaterial;

export function assertValidWorkMaterial(material: WorkMaterial): void {
  if (material.name.trim() === '') {
    throw new InvalidMaterialSpecError(material.name, 'name is required');
  }

  material.surfaceSpeed.requireDimension(Dimensions.VELOCITY, `material "${material.name}" surface speed`);
  material.specificCuttingPower.requireDimension(
    Dimensions.SPECIFIC_CUTTING_POWER,
    `material "${material.name}" specific cutting power`
  );

  if (!material.surfaceSpeed.isPositive()) {
    throw new InvalidMaterialSpecError(
      material.name,
      `surface speed must be greater than 0, got ${material.surfaceSpeed.toString()}`
    );
  }
  if (!material.specificCuttingPower.isPositive()) {
    throw new InvalidMaterialSpecError(
      material.name,
      `specific cutting power must be greater than 0, got ${material.specificCuttingPower.toString()}`
    );
  }
}

export function createWorkMaterial(input: CreateWorkMaterialInput): WorkMaterial {
  const material: WorkMaterial = Object.freeze({
    name: input.name.trim(),
    surfaceSpeed: input.surfaceSpeed,
    specificCuttingPower: input.specificCuttingPower,
  });

  assertValidWorkMaterial(material);
  return material;
}
