/**
 * @fileoverview Cutting Parameter Calculator Tests
 */

import { describe, it, expect } from 'vitest';
import * as fc from 'fast-check';
import {
  CuttingParameterCalculator,
  InvalidCuttingSettingsError,
  InvalidMachineSpecError,
  InvalidMaterialSpecError,
  InvalidToolGeometryError,
  MissingSurfaceSpeedMultiplierError,
  continuousSpindle,
  createCuttingParameterCalculator,
  isWithinEnvelope,
} from '../machining/index.js';
import { DimensionMismatchError, Quantity, Units } from '../shared-kernel/index.js';
import {
  continuousMachine,
  inches,
  steppedMachine,
  testMaterial,
  testSettings,
  testTool,
} from './helpers/machining-fixtures.js';

describe('CuttingParameterCalculator', () => {
  const calculator = createCuttingParameterCalculator(testSettings());

  // ============================================================================
  // SPEED AND FEED
  // ============================================================================

  describe('speed and feed', () => {
    it('should run a continuous spindle at the ideal speed', () => {
      const result = calculator.calculate({
        machine: continuousMachine(),
        tool: testTool(),
        material: testMaterial(),
        axialDepths: [],
      });

      expect(result.effectiveSurfaceSpeed.toString()).toBe('300.000 ft/min');
      expect(result.idealSpindleSpeed.magnitude).toBeCloseTo(1527.887, 3);
      expect(result.spindleSpeed.magnitude).toBeCloseTo(1527.887, 3);
      expect(result.spindleSpeed.unit.symbol).toBe('rev/min');
      expect(result.spindleSpeedAdjusted).toBe(false);
      expect(result.feedRate.magnitude).toBeCloseTo(22.918, 3);
      expect(result.feedRate.unit.symbol).toBe('in/min');
      expect(result.feedRateLimited).toBe(false);
    });

    it('should snap to the nearest stepped speed', () => {
      const result = calculator.calculate({
        machine: steppedMachine(),
        tool: testTool(),
        material: testMaterial(),
        axialDepths: [],
      });

      expect(result.spindleSpeed.magnitude).toBe(1750);
      expect(result.spindleSpeedAdjusted).toBe(true);
      expect(result.feedRate.magnitude).toBeCloseTo(26.25, 9);
    });

    it('should clamp the spindle speed to a continuous ceiling', () => {
      const result = calculator.calculate({
        machine: continuousMachine({
          spindle: continuousSpindle(Quantity.of(1000, Units.revolutionsPerMinute)),
        }),
        tool: testTool(),
        material: testMaterial(),
        axialDepths: [],
      });

      expect(result.spindleSpeed.magnitude).toBe(1000);
      expect(result.spindleSpeedAdjusted).toBe(true);
      expect(result.feedRate.magnitude).toBeCloseTo(15, 9);
    });

    it('should apply the tool-material multiplier', () => {
      const result = calculator.calculate({
        machine: continuousMachine(),
        tool: testTool({ material: 'Carbide' }),
        material: testMaterial(),
        axialDepths: [],
      });

      expect(result.effectiveSurfaceSpeed.magnitude).toBe(600);
      expect(result.idealSpindleSpeed.magnitude).toBeCloseTo(3055.775, 3);
      expect(result.spindleSpeed.magnitude).toBe(3000);
    });

    it('should clamp feed to the machine maximum', () => {
      const result = calculator.calculate({
        machine: continuousMachine({ maxFeedRate: Quantity.of(20, Units.inchesPerMinute) }),
        tool: testTool(),
        material: testMaterial(),
        axialDepths: [],
      });

      expect(result.feedRate.magnitude).toBe(20);
      expect(result.feedRateLimited).toBe(true);
    });
  });

  // ============================================================================
  // POWER BUDGET
  // ============================================================================

  describe('power budget', () => {
    it('should derive the removal-rate budget from derated power', () => {
      const result = calculator.calculate({
        machine: continuousMachine(),
        tool: testTool(),
        material: testMaterial(),
        axialDepths: [],
      });

      expect(result.powerBudget.ratedPower.toString()).toBe('1.000 hp');
      expect(result.powerBudget.safetyMargin).toBe(0.5);
      expect(result.powerBudget.transmissionEfficiency).toBe(0.75);
      expect(result.powerBudget.targetSpindlePower.magnitude).toBe(0.375);
      expect(result.materialRemovalRate.magnitude).toBeCloseTo(1.5, 12);
      expect(result.materialRemovalRate.unit.symbol).toBe('in^3/min');
    });

    it('should accept rated power in kilowatts', () => {
      const result = calculator.calculate({
        machine: continuousMachine({ ratedPower: Quantity.of(1, Units.kilowatt) }),
        tool: testTool(),
        material: testMaterial(),
        axialDepths: [],
      });

      expect(result.powerBudget.ratedPower.magnitude).toBeCloseTo(1.341, 3);
    });
  });

  // ============================================================================
  // STEPOVER SAMPLES
  // ============================================================================

  describe('stepover samples', () => {
    it('should drop non-positive depths and sort the rest', () => {
      const result = calculator.calculate({
        machine: continuousMachine(),
        tool: testTool(),
        material: testMaterial(),
        axialDepths: [inches(0.5), inches(0), inches(-0.1), inches(0.25)],
      });

      expect(result.samples).toHaveLength(2);
      expect(result.samples.map((sample) => sample.axialDepth.primary.magnitude)).toEqual([
        0.25, 0.5,
      ]);
    });

    it('should report depths in both display units', () => {
      const result = calculator.calculate({
        machine: continuousMachine(),
        tool: testTool(),
        material: testMaterial(),
        axialDepths: [inches(0.25), inches(0.5)],
      });
      const [shallow, deep] = result.samples;

      expect(shallow?.axialDepth.secondary.magnitude).toBeCloseTo(6.35, 12);
      expect(shallow?.axialDepth.secondary.unit.symbol).toBe('mm');
      expect(shallow?.radialDepth.primary.magnitude).toBeCloseTo(0.2618, 4);
      expect(shallow?.stepoverPercent).toBeCloseTo(34.907, 3);
      expect(deep?.radialDepth.primary.magnitude).toBeCloseTo(0.1309, 4);
      expect(deep?.radialDepth.secondary.magnitude).toBeCloseTo(3.325, 3);
      expect(deep?.stepoverPercent).toBeCloseTo(17.453, 3);
    });

    it('should accept metric depths', () => {
      const result = calculator.calculate({
        machine: continuousMachine(),
        tool: testTool(),
        material: testMaterial(),
        axialDepths: [Quantity.of(12.7, Units.millimeter)],
      });

      expect(result.samples[0]?.axialDepth.primary.magnitude).toBeCloseTo(0.5, 12);
      expect(result.samples[0]?.stepoverPercent).toBeCloseTo(17.453, 3);
    });

    it('should not clamp stepover above 100%', () => {
      const result = calculator.calculate({
        machine: continuousMachine(),
        tool: testTool(),
        material: testMaterial(),
        axialDepths: [inches(0.01)],
      });

      expect(result.samples[0]?.stepoverPercent).toBeCloseTo(872.665, 3);
    });

    it('should compute stepover from removal rate, feed and depth', () => {
      const [sample] = calculator.computeStepover({
        materialRemovalRate: Quantity.of(1, Units.cubicInchesPerMinute),
        feedRate: Quantity.of(10, Units.inchesPerMinute),
        toolDiameter: inches(0.75),
        axialDepths: [inches(0.5)],
      });

      expect(sample?.radialDepth.primary.magnitude).toBeCloseTo(0.2, 12);
      expect(sample?.radialDepth.primary.unit.symbol).toBe('in');
      expect(sample?.stepoverPercent).toBeCloseTo(26.667, 3);
    });

    it('should drop a depth too small for a finite radial depth', () => {
      const samples = calculator.computeStepover({
        materialRemovalRate: Quantity.of(1, Units.cubicInchesPerMinute),
        feedRate: Quantity.of(10, Units.inchesPerMinute),
        toolDiameter: inches(0.75),
        axialDepths: [inches(1e-310), inches(0.5)],
      });

      expect(samples).toHaveLength(1);
      expect(samples[0]?.axialDepth.primary.magnitude).toBe(0.5);
    });

    it('should reject depths that are not lengths', () => {
      expect(() =>
        calculator.computeStepover({
          materialRemovalRate: Quantity.of(1, Units.cubicInchesPerMinute),
          feedRate: Quantity.of(10, Units.inchesPerMinute),
          toolDiameter: inches(0.75),
          axialDepths: [Quantity.of(1, Units.minute)],
        })
      ).toThrow('axial depth: expected length, got time');
    });
  });

  // ============================================================================
  // VALIDATION
  // ============================================================================

  describe('validation', () => {
    it('should fail for a tool material without a multiplier', () => {
      expect(() =>
        calculator.calculate({
          machine: continuousMachine(),
          tool: testTool({ material: 'Cobalt' }),
          material: testMaterial(),
          axialDepths: [],
        })
      ).toThrow(MissingSurfaceSpeedMultiplierError);
    });

    it('should reject invalid tool geometry', () => {
      expect(() =>
        calculator.calculate({
          machine: continuousMachine(),
          tool: testTool({ toothCount: 0 }),
          material: testMaterial(),
          axialDepths: [],
        })
      ).toThrow(InvalidToolGeometryError);
    });

    it('should reject invalid material data', () => {
      expect(() =>
        calculator.calculate({
          machine: continuousMachine(),
          tool: testTool(),
          material: testMaterial({ specificCuttingPower: Quantity.of(0, 'hp/(in^3/min)') }),
          axialDepths: [],
        })
      ).toThrow(InvalidMaterialSpecError);
    });

    it('should reject invalid machine data', () => {
      expect(() =>
        calculator.calculate({
          machine: continuousMachine({ ratedPower: Quantity.of(0, Units.horsepower) }),
          tool: testTool(),
          material: testMaterial(),
          axialDepths: [],
        })
      ).toThrow(InvalidMachineSpecError);
    });

    it('should reject a surface speed given in the wrong dimension', () => {
      expect(() =>
        calculator.calculate({
          machine: continuousMachine(),
          tool: testTool(),
          material: testMaterial({ surfaceSpeed: Quantity.of(300, Units.foot) }),
          axialDepths: [],
        })
      ).toThrow(DimensionMismatchError);
    });

    it('should reject invalid settings at construction', () => {
      expect(() => new CuttingParameterCalculator(testSettings({ safetyMargin: 0 }))).toThrow(
        InvalidCuttingSettingsError
      );
    });
  });

  // ============================================================================
  // RESULT UNITS
  // ============================================================================

  describe('result units', () => {
    it('should express results in the configured units', () => {
      const metric = createCuttingParameterCalculator(testSettings(), {
        units: { feedRate: Units.millimetersPerMinute, primaryLength: Units.millimeter },
      });
      const result = metric.calculate({
        machine: continuousMachine(),
        tool: testTool(),
        material: testMaterial(),
        axialDepths: [inches(0.5)],
      });

      expect(result.feedRate.unit.symbol).toBe('mm/min');
      expect(result.feedRate.magnitude).toBeCloseTo(582.125, 3);
      expect(result.samples[0]?.axialDepth.primary.magnitude).toBeCloseTo(12.7, 12);
    });

    it('should reject a result unit of the wrong dimension', () => {
      expect(() =>
        createCuttingParameterCalculator(testSettings(), { units: { feedRate: Units.inch } })
      ).toThrow('result unit "feedRate": expected velocity, got length');
    });
  });
});

describe('Cutting Parameter Property-Based Tests', () => {
  const calculator = createCuttingParameterCalculator(testSettings());

  it('should never exceed the machine feed limit', () => {
    fc.assert(
      fc.property(
        fc.double({ min: 0.01, max: 2, noNaN: true }),
        fc.integer({ min: 1, max: 8 }),
        fc.double({ min: 10, max: 2000, noNaN: true }),
        fc.double({ min: 1, max: 500, noNaN: true }),
        fc.double({ min: 100, max: 30_000, noNaN: true }),
        (diameter, toothCount, surfaceSpeed, maxFeed, maxSpindle) => {
          const machine = continuousMachine({
            maxFeedRate: Quantity.of(maxFeed, Units.inchesPerMinute),
            spindle: continuousSpindle(Quantity.of(maxSpindle, Units.revolutionsPerMinute)),
          });
          const result = calculator.calculate({
            machine,
            tool: testTool({ diameter: inches(diameter), toothCount }),
            material: testMaterial({ surfaceSpeed: Quantity.of(surfaceSpeed, 'sfm') }),
            axialDepths: [],
          });

          expect(result.feedRate.isGreaterThan(machine.maxFeedRate)).toBe(false);
        }
      ),
      { numRuns: 200 }
    );
  });

  it('should keep a clamped feed at or under a limit given in another unit', () => {
    const metricCalculator = createCuttingParameterCalculator(testSettings(), {
      units: { feedRate: Units.millimetersPerMinute },
    });

    fc.assert(
      fc.property(fc.double({ min: 1e-6, max: 40, noNaN: true }), (maxFeed) => {
        const machine = continuousMachine({
          maxFeedRate: Quantity.of(maxFeed, Units.inchesPerMinute),
        });
        const result = metricCalculator.calculate({
          machine,
          tool: testTool(),
          material: testMaterial({ surfaceSpeed: Quantity.of(2000, 'sfm') }),
          axialDepths: [],
        });

        expect(result.feedRateLimited).toBe(true);
        expect(result.feedRate.unit).toBe(Units.millimetersPerMinute);
        expect(result.feedRate.isGreaterThan(machine.maxFeedRate)).toBe(false);
        expect(result.feedRate.equals(machine.maxFeedRate)).toBe(true);
      }),
      { numRuns: 500 }
    );
  });

  it('should keep a clamped spindle speed inside a ceiling given in another unit', () => {
    fc.assert(
      fc.property(fc.double({ min: 1, max: 300, noNaN: true }), (ceiling) => {
        const spindle = continuousSpindle(Quantity.of(ceiling, 'rad/s'));
        const result = calculator.calculate({
          machine: continuousMachine({ spindle }),
          tool: testTool(),
          material: testMaterial({ surfaceSpeed: Quantity.of(20_000, 'sfm') }),
          axialDepths: [],
        });

        expect(result.spindleSpeedAdjusted).toBe(true);
        expect(result.spindleSpeed.unit).toBe(Units.revolutionsPerMinute);
        expect(result.spindleSpeed.isGreaterThan(spindle.maxSpeed)).toBe(false);
        expect(isWithinEnvelope(result.spindleSpeed, spindle)).toBe(true);
      }),
      { numRuns: 500 }
    );
  });

  it('should give non-increasing stepover as depth grows', () => {
    fc.assert(
      fc.property(
        fc.array(
          fc.oneof(
            fc.double({ min: -1, max: 0, noNaN: true }),
            fc.double({ min: 1e-3, max: 3, noNaN: true })
          ),
          { maxLength: 30 }
        ),
        (depths) => {
          const samples = calculator.computeStepover({
            materialRemovalRate: Quantity.of(1, Units.cubicInchesPerMinute),
            feedRate: Quantity.of(10, Units.inchesPerMinute),
            toolDiameter: inches(0.75),
            axialDepths: depths.map(inches),
          });

          expect(samples).toHaveLength(depths.filter((depth) => depth > 0).length);
          for (const sample of samples) {
            expect(sample.axialDepth.primary.isPositive()).toBe(true);
          }
          for (let index = 1; index < samples.length; index++) {
            const previous = samples[index - 1];
            const current = samples[index];
            if (previous && current) {
              expect(current.stepoverPercent).toBeLessThanOrEqual(previous.stepoverPercent);
            }
          }
        }
      ),
      { numRuns: 200 }
    );
  });
});
