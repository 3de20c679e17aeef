/**
 * @fileoverview Tool Entity
 *
 * An end mill: diameter, flute count and the tool material class that
 * selects its surface-speed multiplier.
 *
 * @module domain/machining/entities/tool
 */

import { DomainError } from '../../shared/types.js';
import { Dimensions, Quantity } from '../../shared-kernel/value-objects/index.js';

// ============================================================================
// ERRORS
// ============================================================================

/**
 * Error thrown when a tool's diameter or tooth count is not usable
 */
export class InvalidToolGeometryError extends DomainError {
  constructor(
    public readonly toolId: string,
    reason: string
  ) {
    super('INVALID_TOOL_GEOMETRY', `Invalid tool geometry for "${toolId}": ${reason}`, {
      toolId,
    });
    this.name = 'InvalidToolGeometryError';
  }
}

// ============================================================================
// TYPES
// ============================================================================

export interface Tool {
  /** Lookup key, unique within a catalog */
  readonly id: string;
  readonly diameter: Quantity;
  /** Flutes; a positive integer */
  readonly toothCount: number;
  /** Tool material class, e.g. "HSS", "Carbide" */
  readonly material: string;
}

export interface CreateToolInput {
  id?: string | undefined;
  diameter: Quantity;
  toothCount: number;
  material: string;
}

// ============================================================================
// FACTORY & VALIDATION
// ============================================================================

/**
 * Short description used as the default id, e.g. `0.75in 4FL Carbide`
 */
export function describeTool(input: Pick<Tool, 'diameter' | 'toothCount' | 'material'>): string {
  const diameter = Number(input.diameter.magnitude.toFixed(4));
  return `${diameter}${input.diameter.unit.symbol} ${input.toothCount}FL ${input.material}`;
}

/**
 * Throws if the tool cannot be used in a calculation
 */
export function assertValidTool(tool: Tool): void {
  tool.diameter.requireDimension(Dimensions.LENGTH, `tool "${tool.id}" diameter`);

  if (!tool.diameter.isPositive()) {
    throw new InvalidToolGeometryError(
      tool.id,
      `diameter must be greater than 0, got ${tool.diameter.toString()}`
    );
  }
  if (!Number.isInteger(tool.toothCount) || tool.toothCount <= 0) {
    throw new InvalidToolGeometryError(
      tool.id,
      `tooth count must be a positive integer, got ${tool.toothCount}`
    );
  }
}

/**
 * Create a validated, immutable tool
 */
export function createTool(input: CreateToolInput): Tool {
  const material = input.material.trim();
  const id = input.id?.trim() || describeTool({ ...input, material });

  const tool: Tool = Object.freeze({
    id,
    diameter: input.diameter,
    toothCount: input.toothCount,
    material,
  });

  assertValidTool(tool);
  return tool;
}
