/**
 * @fileoverview Stepover Curve Generator
 *
 * Builds the axial depth-of-cut grid for a tool and runs the calculator
 * over it.
 *
 * @module domain/machining/services/stepover-curve
 */

import { Dimensions, Quantity } from '../../shared-kernel/value-objects/index.js';
import { InvalidCuttingSettingsError } from '../entities/cutting-settings.js';
import type { Machine } from '../entities/machine.js';
import { assertValidTool, type Tool } from '../entities/tool.js';
import type { WorkMaterial } from '../entities/work-material.js';
import type { CuttingParameterCalculator, CuttingResult } from './cutting-parameter-calculator.js';

// ============================================================================
// TYPES
// ============================================================================

export interface DepthSamplingSpec {
  /** Grid ceiling as a multiple of tool diameter */
  readonly maxDiameterMultiple: number;
  readonly step: Quantity;
  /** First depth; defaults to one step */
  readonly start?: Quantity | undefined;
}

/**
 * Finite, restartable, ascending sequence of depths
 */
export interface DepthOfCutGrid extends Iterable<Quantity> {
  readonly size: number;
  readonly start: Quantity;
  readonly end: Quantity;
  readonly step: Quantity;
}

/** Slack on the inclusive upper bound, in steps */
const GRID_BOUND_TOLERANCE = 1e-9;

// ============================================================================
// DEPTH GRID
// ============================================================================

export function assertValidSamplingSpec(spec: DepthSamplingSpec): void {
  if (!Number.isFinite(spec.maxDiameterMultiple) || spec.maxDiameterMultiple <= 0) {
    throw new InvalidCuttingSettingsError(
      'maxDiameterMultiple',
      `must be greater than 0, got ${spec.maxDiameterMultiple}`
    );
  }

  spec.step.requireDimension(Dimensions.LENGTH, 'depth step');
  if (!spec.step.isPositive()) {
    throw new InvalidCuttingSettingsError('step', `must be greater than 0, got ${spec.step.toString()}`);
  }

  if (spec.start !== undefined) {
    spec.start.requireDimension(Dimensions.LENGTH, 'depth start');
    if (spec.start.isNegative()) {
      throw new InvalidCuttingSettingsError(
        'start',
        `must not be negative, got ${spec.start.toString()}`
      );
    }
  }
}

/**
 * Depth grid from `start` to `maxDiameterMultiple x diameter`, inclusive
 *
 * Values are `start + i x step` in the step's unit.
 */
export function createDepthOfCutGrid(toolDiameter: Quantity, spec: DepthSamplingSpec): DepthOfCutGrid {
  assertValidSamplingSpec(spec);
  toolDiameter.requireDimension(Dimensions.LENGTH, 'tool diameter');

  const unit = spec.step.unit;
  const step = spec.step.magnitude;
  const start = (spec.start ?? spec.step).valueIn(unit);
  const end = toolDiameter.multiply(spec.maxDiameterMultiple).valueIn(unit);

  const size = end < start ? 0 : Math.floor((end - start) / step + GRID_BOUND_TOLERANCE) + 1;

  return Object.freeze({
    size,
    start: Quantity.of(start, unit),
    end: Quantity.of(end, unit),
    step: spec.step,
    *[Symbol.iterator](): Iterator<Quantity> {
      for (let index = 0; index < size; index++) {
        yield Quantity.of(start + index * step, unit);
      }
    },
  });
}

// ============================================================================
// GENERATOR
// ============================================================================

export interface StepoverCurveRequest {
  machine: Machine;
  tool: Tool;
  material: WorkMaterial;
}

/**
 * Stepover Curve Generator
 */
export class StepoverCurveGenerator {
  constructor(
    private readonly calculator: CuttingParameterCalculator,
    public readonly sampling: DepthSamplingSpec
  ) {
    assertValidSamplingSpec(sampling);
  }

  depthGrid(tool: Tool): DepthOfCutGrid {
    assertValidTool(tool);
    return createDepthOfCutGrid(tool.diameter, this.sampling);
  }

  generate(request: StepoverCurveRequest): CuttingResult {
    return this.calculator.calculate({
      ...request,
      axialDepths: this.depthGrid(request.tool),
    });
  }
}

export function createStepoverCurveGenerator(
  calculator: CuttingParameterCalculator,
  sampling: DepthSamplingSpec
): StepoverCurveGenerator {
  return new StepoverCurveGenerator(calculator, sampling);
}
