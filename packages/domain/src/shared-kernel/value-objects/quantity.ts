/**
 * @fileoverview Quantity Value Object
 *
 * A finite magnitude tagged with a unit. Every formula in the machining
 * services goes through this type, so mixing, say, a feed rate with a
 * spindle speed is a runtime DimensionMismatchError instead of a silently
 * wrong number.
 *
 * Rules:
 * - add / subtract / compare require identical dimensions
 * - multiply / divide accept any dimensions and compose the result
 * - conversion only between units of the same dimension
 * - results are always finite; division by zero is rejected
 *
 * @module domain/shared-kernel/value-objects/quantity
 */

import { DomainError } from '../../shared/types.js';
import { describeDimension, sameDimension, type Dimension } from './dimension.js';
import { Unit, parseUnit } from './unit.js';

// ============================================================================
// ERRORS
// ============================================================================

/**
 * Error thrown when an operation mixes incompatible dimensions
 */
export class DimensionMismatchError extends DomainError {
  constructor(
    public readonly expected: string,
    public readonly actual: string,
    context?: string
  ) {
    super(
      'DIMENSION_MISMATCH',
      `${context ? `${context}: ` : ''}expected ${expected}, got ${actual}`,
      { expected, actual, context }
    );
    this.name = 'DimensionMismatchError';
  }
}

/**
 * Error thrown when a quantity would not be a finite number
 */
export class InvalidQuantityError extends DomainError {
  constructor(message: string, details?: Record<string, unknown>) {
    super('INVALID_QUANTITY', message, details);
    this.name = 'InvalidQuantityError';
  }
}

// ============================================================================
// TYPES
// ============================================================================

/**
 * Serialized form of a Quantity
 */
export interface QuantityDTO {
  value: number;
  unit: string;
}

const DEFAULT_RELATIVE_TOLERANCE = 1e-9;

// ============================================================================
// QUANTITY VALUE OBJECT
// ============================================================================

/**
 * Quantity Value Object
 *
 * @example
 * ```typescript
 * const sfm = Quantity.of(300, Units.feetPerMinute);
 * const diameter = Quantity.of(0.75, Units.inch);
 *
 * const rpm = sfm
 *   .divide(diameter.multiply(Math.PI).divide(Quantity.of(1, Units.revolution)))
 *   .convertTo(Units.revolutionsPerMinute);
 *
 * rpm.toString(); // "1527.887 rev/min"
 * ```
 */
export class Quantity {
  private constructor(
    public readonly magnitude: number,
    public readonly unit: Unit
  ) {
    Object.freeze(this);
  }

  // ============================================================================
  // FACTORY METHODS
  // ============================================================================

  /**
   * Create a quantity from a magnitude and a unit (or unit expression)
   */
  static of(magnitude: number, unit: Unit | string): Quantity {
    const resolved = typeof unit === 'string' ? parseUnit(unit) : unit;
    if (!Number.isFinite(magnitude)) {
      throw new InvalidQuantityError(`Magnitude must be a finite number, got ${magnitude}`, {
        unit: resolved.symbol,
      });
    }
    return new Quantity(magnitude, resolved);
  }

  /**
   * A pure number
   */
  static dimensionless(value: number): Quantity {
    return Quantity.of(value, Unit.ONE);
  }

  /**
   * Rehydrate from the serialized form
   */
  static fromJSON(dto: QuantityDTO): Quantity {
    return Quantity.of(dto.value, dto.unit);
  }

  /**
   * Smallest of the given quantities; all must share a dimension
   */
  static min(first: Quantity, ...rest: Quantity[]): Quantity {
    return rest.reduce((best, candidate) => (candidate.isLessThan(best) ? candidate : best), first);
  }

  /**
   * Largest of the given quantities; all must share a dimension
   */
  static max(first: Quantity, ...rest: Quantity[]): Quantity {
    return rest.reduce(
      (best, candidate) => (candidate.isGreaterThan(best) ? candidate : best),
      first
    );
  }

  // ============================================================================
  // ACCESSORS
  // ============================================================================

  get dimension(): Dimension {
    return this.unit.dimension;
  }

  /**
   * Magnitude expressed in SI base units
   */
  get baseMagnitude(): number {
    return this.magnitude * this.unit.scale;
  }

  hasDimension(dimension: Dimension): boolean {
    return sameDimension(this.dimension, dimension);
  }

  /**
   * Throw DimensionMismatchError unless this quantity has the given dimension
   */
  requireDimension(dimension: Dimension, label?: string): this {
    if (!this.hasDimension(dimension)) {
      throw new DimensionMismatchError(
        describeDimension(dimension),
        describeDimension(this.dimension),
        label
      );
    }
    return this;
  }

  isDimensionless(): boolean {
    return this.unit.isDimensionless();
  }

  isZero(): boolean {
    return this.magnitude === 0;
  }

  isPositive(): boolean {
    return this.magnitude > 0;
  }

  isNegative(): boolean {
    return this.magnitude < 0;
  }

  // ============================================================================
  // CONVERSION
  // ============================================================================

  /**
   * Equivalent quantity in another unit of the same dimension
   */
  convertTo(target: Unit | string): Quantity {
    const unit = typeof target === 'string' ? parseUnit(target) : target;
    this.assertCompatible(unit.dimension, `convert ${this.unit.symbol} to ${unit.symbol}`);
    if (unit.scale === this.unit.scale) {
      return new Quantity(this.magnitude, unit);
    }
    return Quantity.of((this.magnitude * this.unit.scale) / unit.scale, unit);
  }

  /**
   * Magnitude in the given unit
   */
  valueIn(target: Unit | string): number {
    return this.convertTo(target).magnitude;
  }

  /**
   * Plain number value of a dimensionless quantity (e.g. in/in -> 1)
   */
  toNumber(): number {
    if (!this.isDimensionless()) {
      throw new DimensionMismatchError('dimensionless', describeDimension(this.dimension), 'toNumber');
    }
    return this.baseMagnitude;
  }

  // ============================================================================
  // ARITHMETIC
  // ============================================================================

  add(other: Quantity): Quantity {
    this.assertCompatible(other.dimension, 'add');
    return Quantity.of(this.magnitude + other.valueIn(this.unit), this.unit);
  }

  subtract(other: Quantity): Quantity {
    this.assertCompatible(other.dimension, 'subtract');
    return Quantity.of(this.magnitude - other.valueIn(this.unit), this.unit);
  }

  multiply(factor: Quantity | number): Quantity {
    if (typeof factor === 'number') {
      return Quantity.of(this.magnitude * factor, this.unit);
    }
    return Quantity.of(this.magnitude * factor.magnitude, this.unit.multiply(factor.unit));
  }

  divide(divisor: Quantity | number): Quantity {
    const divisorMagnitude = typeof divisor === 'number' ? divisor : divisor.magnitude;
    if (divisorMagnitude === 0) {
      throw new InvalidQuantityError(`Division by zero: ${this.toString()} / 0`, {
        dividend: this.toJSON(),
      });
    }
    if (typeof divisor === 'number') {
      return Quantity.of(this.magnitude / divisor, this.unit);
    }
    return Quantity.of(this.magnitude / divisor.magnitude, this.unit.divide(divisor.unit));
  }

  abs(): Quantity {
    return this.magnitude < 0 ? this.negate() : this;
  }

  negate(): Quantity {
    return new Quantity(-this.magnitude, this.unit);
  }

  // ============================================================================
  // COMPARISON
  // ============================================================================

  /**
   * -1, 0 or 1; exact comparison in SI base units
   */
  compareTo(other: Quantity): -1 | 0 | 1 {
    this.assertCompatible(other.dimension, 'compare');
    const a = this.baseMagnitude;
    const b = other.baseMagnitude;
    if (a < b) return -1;
    if (a > b) return 1;
    return 0;
  }

  isLessThan(other: Quantity): boolean {
    return this.compareTo(other) < 0;
  }

  isGreaterThan(other: Quantity): boolean {
    return this.compareTo(other) > 0;
  }

  /**
   * Equality within a relative tolerance (default 1e-9)
   */
  equals(other: Quantity, relativeTolerance = DEFAULT_RELATIVE_TOLERANCE): boolean {
    if (!sameDimension(this.dimension, other.dimension)) {
      return false;
    }
    const a = this.baseMagnitude;
    const b = other.baseMagnitude;
    return Math.abs(a - b) <= relativeTolerance * Math.max(Math.abs(a), Math.abs(b));
  }

  // ============================================================================
  // SERIALIZATION
  // ============================================================================

  toJSON(): QuantityDTO {
    return { value: this.magnitude, unit: this.unit.symbol };
  }

  /**
   * e.g. `1527.887 rev/min`; dimensionless quantities print without a unit
   */
  toString(fractionDigits = 3): string {
    const value = this.magnitude.toFixed(fractionDigits);
    return this.unit.symbol === '1' ? value : `${value} ${this.unit.symbol}`;
  }

  private assertCompatible(dimension: Dimension, operation: string): void {
    if (!sameDimension(this.dimension, dimension)) {
      throw new DimensionMismatchError(
        describeDimension(this.dimension),
        describeDimension(dimension),
        `Cannot ${operation}`
      );
    }
  }
}
