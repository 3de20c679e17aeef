/**
 * @fileoverview Quantity Value Object Tests
 */

import { describe, it, expect } from 'vitest';
import {
  DimensionMismatchError,
  Dimensions,
  InvalidQuantityError,
  Quantity,
  Units,
} from '../shared-kernel/index.js';

describe('Quantity', () => {
  // ============================================================================
  // CONSTRUCTION
  // ============================================================================

  describe('of', () => {
    it('should accept a unit expression', () => {
      const speed = Quantity.of(300, 'sfm');
      expect(speed.magnitude).toBe(300);
      expect(speed.unit.symbol).toBe('sfm');
      expect(speed.hasDimension(Dimensions.VELOCITY)).toBe(true);
    });

    it('should reject non-finite magnitudes', () => {
      expect(() => Quantity.of(Number.NaN, Units.inch)).toThrow(InvalidQuantityError);
      expect(() => Quantity.of(Number.POSITIVE_INFINITY, Units.inch)).toThrow(
        'Magnitude must be a finite number, got Infinity'
      );
    });

    it('should be immutable', () => {
      const length = Quantity.of(1, Units.inch);
      expect(Object.isFrozen(length)).toBe(true);
    });
  });

  it('should round-trip through JSON', () => {
    const speed = Quantity.fromJSON({ value: 300, unit: 'ft/min' });
    expect(speed.toJSON()).toEqual({ value: 300, unit: 'ft/min' });
  });

  // ============================================================================
  // CONVERSION
  // ============================================================================

  describe('convertTo', () => {
    it('should convert between units of the same dimension', () => {
      expect(Quantity.of(12, Units.inch).convertTo(Units.foot).magnitude).toBeCloseTo(1, 12);
      expect(Quantity.of(1, 'in').valueIn('mm')).toBeCloseTo(25.4, 12);
    });

    it('should convert aliases', () => {
      expect(Quantity.of(1000, 'rpm').valueIn(Units.revolutionsPerMinute)).toBe(1000);
    });

    it('should reject a different dimension', () => {
      expect(() => Quantity.of(1, Units.inch).convertTo(Units.minute)).toThrow(
        'Cannot convert in to min: expected length, got time'
      );
    });
  });

  describe('toNumber', () => {
    it('should return the value of a dimensionless ratio', () => {
      const ratio = Quantity.of(3, Units.inch).divide(Quantity.of(6, Units.inch));
      expect(ratio.toNumber()).toBe(0.5);
    });

    it('should reject dimensioned quantities', () => {
      expect(() => Quantity.of(3, Units.inch).toNumber()).toThrow(DimensionMismatchError);
    });
  });

  // ============================================================================
  // ARITHMETIC
  // ============================================================================

  describe('arithmetic', () => {
    it('should add in the unit of the left operand', () => {
      const sum = Quantity.of(1, Units.foot).add(Quantity.of(6, Units.inch));
      expect(sum.unit.symbol).toBe('ft');
      expect(sum.magnitude).toBeCloseTo(1.5, 12);
    });

    it('should subtract', () => {
      expect(Quantity.of(1, Units.inch).subtract(Quantity.of(25.4, 'mm')).magnitude).toBeCloseTo(
        0,
        12
      );
    });

    it('should reject adding different dimensions', () => {
      expect(() => Quantity.of(1, Units.inch).add(Quantity.of(1, Units.minute))).toThrow(
        'Cannot add: expected length, got time'
      );
    });

    it('should compose dimensions on multiply and divide', () => {
      const removal = Quantity.of(10, Units.inchesPerMinute)
        .multiply(Quantity.of(0.5, Units.inch))
        .multiply(Quantity.of(0.2, Units.inch));
      expect(removal.hasDimension(Dimensions.VOLUMETRIC_FLOW_RATE)).toBe(true);
      expect(removal.valueIn(Units.cubicInchesPerMinute)).toBeCloseTo(1, 12);
    });

    it('should scale by plain numbers', () => {
      expect(Quantity.of(300, 'sfm').multiply(2).magnitude).toBe(600);
      expect(Quantity.of(300, 'sfm').divide(4).magnitude).toBe(75);
    });

    it('should reject division by zero', () => {
      expect(() => Quantity.of(5, Units.inch).divide(0)).toThrow('Division by zero: 5.000 in / 0');
      expect(() => Quantity.of(5, Units.inch).divide(Quantity.of(0, Units.minute))).toThrow(
        InvalidQuantityError
      );
    });

    it('should negate and take absolute values', () => {
      const negative = Quantity.of(2, Units.inch).negate();
      expect(negative.magnitude).toBe(-2);
      expect(negative.isNegative()).toBe(true);
      expect(negative.abs().magnitude).toBe(2);
    });

    it('should derive spindle speed from surface speed', () => {
      const circumference = Quantity.of(0.75, Units.inch)
        .multiply(Math.PI)
        .divide(Quantity.of(1, Units.revolution));
      const rpm = Quantity.of(300, 'sfm').divide(circumference).convertTo(Units.revolutionsPerMinute);

      expect(rpm.magnitude).toBeCloseTo(1527.887, 3);
      expect(rpm.toString()).toBe('1527.887 rev/min');
    });
  });

  // ============================================================================
  // COMPARISON
  // ============================================================================

  describe('comparison', () => {
    it('should compare across units', () => {
      expect(Quantity.of(1, Units.foot).compareTo(Quantity.of(10, Units.inch))).toBe(1);
      expect(Quantity.of(10, Units.inch).isLessThan(Quantity.of(1, Units.foot))).toBe(true);
      expect(Quantity.of(2, Units.inch).compareTo(Quantity.of(2, Units.inch))).toBe(0);
    });

    it('should pick min and max', () => {
      const foot = Quantity.of(1, Units.foot);
      const tenInches = Quantity.of(10, Units.inch);
      expect(Quantity.min(foot, tenInches)).toBe(tenInches);
      expect(Quantity.max(foot, tenInches)).toBe(foot);
    });

    it('should reject comparing different dimensions', () => {
      expect(() => Quantity.of(1, Units.inch).compareTo(Quantity.of(1, Units.revolution))).toThrow(
        DimensionMismatchError
      );
    });

    it('should treat equal physical amounts as equal', () => {
      expect(Quantity.of(1, Units.inch).equals(Quantity.of(25.4, 'mm'))).toBe(true);
      expect(Quantity.of(1, Units.inch).equals(Quantity.of(26, 'mm'))).toBe(false);
      expect(Quantity.of(1, Units.inch).equals(Quantity.of(1, Units.revolution))).toBe(false);
    });
  });

  describe('requireDimension', () => {
    it('should return the same quantity when the dimension matches', () => {
      const length = Quantity.of(1, Units.inch);
      expect(length.requireDimension(Dimensions.LENGTH)).toBe(length);
    });

    it('should name the quantity in the error', () => {
      expect(() =>
        Quantity.of(1, Units.minute).requireDimension(Dimensions.LENGTH, 'tool diameter')
      ).toThrow('tool diameter: expected length, got time');
    });
  });

  describe('toString', () => {
    it('should omit the unit of pure numbers', () => {
      expect(Quantity.dimensionless(0.5).toString()).toBe('0.500');
    });

    it('should honor the requested precision', () => {
      expect(Quantity.of(0.1875, Units.inch).toString(4)).toBe('0.1875 in');
    });
  });
});
