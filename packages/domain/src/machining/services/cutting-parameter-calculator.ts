/**
 * @fileoverview Cutting Parameter Calculator
 *
 * Speed, feed and stepover-versus-depth for one (machine, tool, material)
 * combination. Every formula runs on Quantity, so a mis-dimensioned input
 * fails with DimensionMismatchError before anything is computed.
 *
 * Pipeline:
 *   1. effective surface speed = material SFM x tool-material multiplier
 *   2. ideal spindle speed     = SFM / (pi x D / 1 rev)
 *   3. achieved spindle speed  = envelope resolution of the ideal
 *   4. feed                    = chip-load ratio x D x speed x teeth/rev
 *   5. feed clamped to the machine maximum
 *   6. target power            = rated x safety margin x efficiency
 *   7. MRR budget              = target power / specific cutting power
 *   8. per axial depth         radial = MRR / (feed x depth)
 *
 * @module domain/machining/services/cutting-parameter-calculator
 */

import { createLogger } from '@chipload/core';

import {
  DimensionMismatchError,
  Dimensions,
  InvalidQuantityError,
  Quantity,
  Unit,
  Units,
  describeDimension,
  sameDimension,
  type Dimension,
} from '../../shared-kernel/value-objects/index.js';
import { assertValidMachine, type Machine } from '../entities/machine.js';
import { assertValidTool, type Tool } from '../entities/tool.js';
import { assertValidWorkMaterial, type WorkMaterial } from '../entities/work-material.js';
import {
  assertValidCuttingSettings,
  surfaceSpeedMultiplierFor,
  type CuttingSettings,
} from '../entities/cutting-settings.js';
import { resolveSpindleSpeed } from './spindle-envelope.js';

const logger = createLogger({ name: 'cutting-parameter-calculator' });

// ============================================================================
// TYPES
// ============================================================================

/**
 * One length shown in two display units
 */
export interface DualUnitLength {
  readonly primary: Quantity;
  readonly secondary: Quantity;
}

export interface StepoverSample {
  readonly axialDepth: DualUnitLength;
  readonly radialDepth: DualUnitLength;
  /** Radial depth as a percentage of tool diameter; not clamped */
  readonly stepoverPercent: number;
}

export interface PowerBudget {
  readonly ratedPower: Quantity;
  readonly safetyMargin: number;
  readonly transmissionEfficiency: number;
  readonly targetSpindlePower: Quantity;
}

export interface CuttingResult {
  readonly machine: string;
  readonly tool: string;
  readonly material: string;
  readonly effectiveSurfaceSpeed: Quantity;
  readonly idealSpindleSpeed: Quantity;
  readonly spindleSpeed: Quantity;
  /** True when the envelope changed the ideal speed */
  readonly spindleSpeedAdjusted: boolean;
  readonly feedRate: Quantity;
  /** True when feed was clamped to the machine maximum */
  readonly feedRateLimited: boolean;
  readonly powerBudget: PowerBudget;
  readonly materialRemovalRate: Quantity;
  /** Ascending by axial depth */
  readonly samples: readonly StepoverSample[];
}

export interface CuttingRequest {
  machine: Machine;
  tool: Tool;
  material: WorkMaterial;
  axialDepths: Iterable<Quantity>;
}

/**
 * Input to the stepover step on its own
 */
export interface StepoverInput {
  materialRemovalRate: Quantity;
  feedRate: Quantity;
  toolDiameter: Quantity;
  axialDepths: Iterable<Quantity>;
}

/**
 * Units results are expressed in
 */
export interface ResultUnits {
  surfaceSpeed: Unit;
  spindleSpeed: Unit;
  feedRate: Unit;
  power: Unit;
  materialRemovalRate: Unit;
  primaryLength: Unit;
  secondaryLength: Unit;
}

export const DEFAULT_RESULT_UNITS: Readonly<ResultUnits> = Object.freeze({
  surfaceSpeed: Units.feetPerMinute,
  spindleSpeed: Units.revolutionsPerMinute,
  feedRate: Units.inchesPerMinute,
  power: Units.horsepower,
  materialRemovalRate: Units.cubicInchesPerMinute,
  primaryLength: Units.inch,
  secondaryLength: Units.millimeter,
});

export interface CuttingParameterCalculatorOptions {
  units?: Partial<ResultUnits>;
}

const RESULT_UNIT_DIMENSIONS: readonly (readonly [keyof ResultUnits, Dimension])[] = [
  ['surfaceSpeed', Dimensions.VELOCITY],
  ['spindleSpeed', Dimensions.ANGULAR_VELOCITY],
  ['feedRate', Dimensions.VELOCITY],
  ['power', Dimensions.POWER],
  ['materialRemovalRate', Dimensions.VOLUMETRIC_FLOW_RATE],
  ['primaryLength', Dimensions.LENGTH],
  ['secondaryLength', Dimensions.LENGTH],
];

const ONE_REVOLUTION = Quantity.of(1, Units.revolution);
const PER_TOOTH = Unit.ONE.divide(Units.tooth);
const TEETH_PER_REVOLUTION = Units.tooth.divide(Units.revolution);

// ============================================================================
// CALCULATOR
// ============================================================================

/**
 * A limit expressed in another unit, never comparing greater than the limit
 *
 * Conversion can round up by one float step; step down until it doesn't.
 */
function limitIn(limit: Quantity, unit: Unit): Quantity {
  let value = limit.convertTo(unit);
  while (value.isGreaterThan(limit)) {
    value = Quantity.of(value.magnitude - Math.abs(value.magnitude) * Number.EPSILON, unit);
  }
  return value;
}

/**
 * Cutting Parameter Calculator
 *
 * Stateless apart from its settings; safe to share across requests.
 *
 * @example
 * ```typescript
 * const calculator = createCuttingParameterCalculator(settings);
 * const result = calculator.calculate({ machine, tool, material, axialDepths });
 * result.spindleSpeed.toString(); // "1527.887 rev/min"
 * ```
 */
export class CuttingParameterCalculator {
  private readonly units: ResultUnits;

  constructor(
    public readonly settings: CuttingSettings,
    options: CuttingParameterCalculatorOptions = {}
  ) {
    assertValidCuttingSettings(settings);
    this.units = { ...DEFAULT_RESULT_UNITS, ...options.units };

    for (const [key, expected] of RESULT_UNIT_DIMENSIONS) {
      const unit = this.units[key];
      if (!sameDimension(unit.dimension, expected)) {
        throw new DimensionMismatchError(
          describeDimension(expected),
          describeDimension(unit.dimension),
          `result unit "${key}"`
        );
      }
    }
  }

  /**
   * Full cutting result for one combination
   */
  calculate(request: CuttingRequest): CuttingResult {
    const { machine, tool, material } = request;
    const { settings, units } = this;

    assertValidMachine(machine);
    assertValidTool(tool);
    assertValidWorkMaterial(material);

    const multiplier = surfaceSpeedMultiplierFor(settings, tool.material);
    const effectiveSurfaceSpeed = material.surfaceSpeed
      .multiply(multiplier)
      .convertTo(units.surfaceSpeed);

    const idealSpindleSpeed = this.idealSpindleSpeed(effectiveSurfaceSpeed, tool.diameter);
    const resolvedSpeed = resolveSpindleSpeed(idealSpindleSpeed, machine.spindle).convertTo(
      units.spindleSpeed
    );
    const spindleSpeed =
      machine.spindle.kind === 'continuous' &&
      resolvedSpeed.isGreaterThan(machine.spindle.maxSpeed)
        ? limitIn(machine.spindle.maxSpeed, units.spindleSpeed)
        : resolvedSpeed;
    const spindleSpeedAdjusted = !spindleSpeed.equals(idealSpindleSpeed);

    const uncappedFeed = Quantity.of(settings.chipLoadRatio, PER_TOOTH)
      .multiply(tool.diameter)
      .multiply(spindleSpeed)
      .multiply(Quantity.of(tool.toothCount, TEETH_PER_REVOLUTION))
      .convertTo(units.feedRate);
    const feedRateLimited = uncappedFeed.isGreaterThan(machine.maxFeedRate);
    const feedRate = feedRateLimited ? limitIn(machine.maxFeedRate, units.feedRate) : uncappedFeed;

    const ratedPower = machine.ratedPower.convertTo(units.power);
    const targetSpindlePower = ratedPower
      .multiply(settings.safetyMargin)
      .multiply(settings.transmissionEfficiency);
    const materialRemovalRate = targetSpindlePower
      .divide(material.specificCuttingPower)
      .convertTo(units.materialRemovalRate);

    if (spindleSpeedAdjusted || feedRateLimited) {
      logger.debug(
        {
          machine: machine.name,
          tool: tool.id,
          material: material.name,
          idealSpindleSpeed: idealSpindleSpeed.toString(),
          spindleSpeed: spindleSpeed.toString(),
          uncappedFeed: uncappedFeed.toString(),
          feedRate: feedRate.toString(),
        },
        'Machine limits changed cutting parameters'
      );
    }

    const samples = this.computeStepover({
      materialRemovalRate,
      feedRate,
      toolDiameter: tool.diameter,
      axialDepths: request.axialDepths,
    });

    return Object.freeze({
      machine: machine.name,
      tool: tool.id,
      material: material.name,
      effectiveSurfaceSpeed,
      idealSpindleSpeed,
      spindleSpeed,
      spindleSpeedAdjusted,
      feedRate,
      feedRateLimited,
      powerBudget: Object.freeze({
        ratedPower,
        safetyMargin: settings.safetyMargin,
        transmissionEfficiency: settings.transmissionEfficiency,
        targetSpindlePower,
      }),
      materialRemovalRate,
      samples,
    });
  }

  /**
   * Spindle speed that puts the cutting edge at the given surface speed
   */
  idealSpindleSpeed(surfaceSpeed: Quantity, toolDiameter: Quantity): Quantity {
    surfaceSpeed.requireDimension(Dimensions.VELOCITY, 'surface speed');
    toolDiameter.requireDimension(Dimensions.LENGTH, 'tool diameter');

    const circumferencePerRevolution = toolDiameter.multiply(Math.PI).divide(ONE_REVOLUTION);
    return surfaceSpeed.divide(circumferencePerRevolution).convertTo(this.units.spindleSpeed);
  }

  /**
   * Stepover samples for the given depths
   *
   * Non-positive depths, and depths too small for a finite radial depth,
   * are dropped; the rest are sorted ascending.
   */
  computeStepover(input: StepoverInput): readonly StepoverSample[] {
    const mrr = input.materialRemovalRate.requireDimension(
      Dimensions.VOLUMETRIC_FLOW_RATE,
      'material removal rate'
    );
    const feed = input.feedRate.requireDimension(Dimensions.VELOCITY, 'feed rate');
    const diameter = input.toolDiameter.requireDimension(Dimensions.LENGTH, 'tool diameter');

    const depths = [...input.axialDepths]
      .map((depth) => depth.requireDimension(Dimensions.LENGTH, 'axial depth'))
      .filter((depth) => depth.isPositive())
      .sort((a, b) => a.compareTo(b));

    const samples: StepoverSample[] = [];
    for (const depth of depths) {
      const sample = this.sampleAt(depth, mrr, feed, diameter);
      if (sample !== undefined) {
        samples.push(sample);
      }
    }

    return Object.freeze(samples);
  }

  /**
   * One stepover sample, or undefined when the depth is so small that the
   * radial depth is not a finite number
   */
  private sampleAt(
    depth: Quantity,
    mrr: Quantity,
    feed: Quantity,
    diameter: Quantity
  ): StepoverSample | undefined {
    try {
      const radial = mrr.divide(feed.multiply(depth));
      const stepoverPercent = radial.divide(diameter).toNumber() * 100;
      if (!Number.isFinite(stepoverPercent)) {
        return undefined;
      }
      return Object.freeze({
        axialDepth: this.dualLength(depth),
        radialDepth: this.dualLength(radial),
        stepoverPercent,
      });
    } catch (error) {
      if (error instanceof InvalidQuantityError) {
        return undefined;
      }
      throw error;
    }
  }

  private dualLength(length: Quantity): DualUnitLength {
    return Object.freeze({
      primary: length.convertTo(this.units.primaryLength),
      secondary: length.convertTo(this.units.secondaryLength),
    });
  }
}

/**
 * Factory function for creating a calculator
 */
export function createCuttingParameterCalculator(
  settings: CuttingSettings,
  options?: CuttingParameterCalculatorOptions
): CuttingParameterCalculator {
  return new CuttingParameterCalculator(settings, options);
}
