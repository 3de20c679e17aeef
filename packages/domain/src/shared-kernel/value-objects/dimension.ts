/**
 * @fileoverview Physical Dimension
 *
 * A dimension is an exponent vector over the base dimensions. Angle and
 * count are kept as base dimensions so that rev/min never silently becomes
 * 1/min and a tooth count cannot stand in for a plain number.
 *
 * @module domain/shared-kernel/value-objects/dimension
 */

// ============================================================================
// TYPES
// ============================================================================

export const BASE_DIMENSIONS = ['length', 'mass', 'time', 'angle', 'count'] as const;

export type BaseDimension = (typeof BASE_DIMENSIONS)[number];

export type Dimension = Readonly<Record<BaseDimension, number>>;

const BASE_SYMBOLS: Record<BaseDimension, string> = {
  length: 'L',
  mass: 'M',
  time: 'T',
  angle: 'A',
  count: 'N',
};

// ============================================================================
// ALGEBRA
// ============================================================================

/**
 * Build a dimension from the non-zero exponents
 */
export function dimension(exponents: Partial<Record<BaseDimension, number>> = {}): Dimension {
  return Object.freeze({
    length: exponents.length ?? 0,
    mass: exponents.mass ?? 0,
    time: exponents.time ?? 0,
    angle: exponents.angle ?? 0,
    count: exponents.count ?? 0,
  });
}

export function multiplyDimensions(a: Dimension, b: Dimension): Dimension {
  return dimension({
    length: a.length + b.length,
    mass: a.mass + b.mass,
    time: a.time + b.time,
    angle: a.angle + b.angle,
    count: a.count + b.count,
  });
}

export function divideDimensions(a: Dimension, b: Dimension): Dimension {
  return dimension({
    length: a.length - b.length,
    mass: a.mass - b.mass,
    time: a.time - b.time,
    angle: a.angle - b.angle,
    count: a.count - b.count,
  });
}

export function powDimension(d: Dimension, exponent: number): Dimension {
  return dimension({
    length: d.length * exponent,
    mass: d.mass * exponent,
    time: d.time * exponent,
    angle: d.angle * exponent,
    count: d.count * exponent,
  });
}

export function sameDimension(a: Dimension, b: Dimension): boolean {
  return BASE_DIMENSIONS.every((base) => a[base] === b[base]);
}

export function isDimensionless(d: Dimension): boolean {
  return BASE_DIMENSIONS.every((base) => d[base] === 0);
}

// ============================================================================
// NAMED DIMENSIONS
// ============================================================================

export const Dimensions = {
  DIMENSIONLESS: dimension(),
  LENGTH: dimension({ length: 1 }),
  MASS: dimension({ mass: 1 }),
  TIME: dimension({ time: 1 }),
  ANGLE: dimension({ angle: 1 }),
  COUNT: dimension({ count: 1 }),
  VELOCITY: dimension({ length: 1, time: -1 }),
  ANGULAR_VELOCITY: dimension({ angle: 1, time: -1 }),
  POWER: dimension({ mass: 1, length: 2, time: -3 }),
  /** Power per volumetric removal rate: W / (m^3/s) */
  SPECIFIC_CUTTING_POWER: dimension({ mass: 1, length: -1, time: -2 }),
  VOLUME: dimension({ length: 3 }),
  VOLUMETRIC_FLOW_RATE: dimension({ length: 3, time: -1 }),
  COUNT_PER_REVOLUTION: dimension({ count: 1, angle: -1 }),
} as const;

export type DimensionName = keyof typeof Dimensions;

const DIMENSION_LABELS: readonly (readonly [Dimension, string])[] = [
  [Dimensions.DIMENSIONLESS, 'dimensionless'],
  [Dimensions.LENGTH, 'length'],
  [Dimensions.MASS, 'mass'],
  [Dimensions.TIME, 'time'],
  [Dimensions.ANGLE, 'angle'],
  [Dimensions.COUNT, 'count'],
  [Dimensions.VELOCITY, 'velocity'],
  [Dimensions.ANGULAR_VELOCITY, 'angular velocity'],
  [Dimensions.POWER, 'power'],
  [Dimensions.SPECIFIC_CUTTING_POWER, 'specific cutting power'],
  [Dimensions.VOLUME, 'volume'],
  [Dimensions.VOLUMETRIC_FLOW_RATE, 'volumetric flow rate'],
  [Dimensions.COUNT_PER_REVOLUTION, 'count per revolution'],
];

/**
 * Exponent formula, e.g. `L^3·T^-1`
 */
export function formatDimension(d: Dimension): string {
  const parts = BASE_DIMENSIONS.filter((base) => d[base] !== 0).map((base) =>
    d[base] === 1 ? BASE_SYMBOLS[base] : `${BASE_SYMBOLS[base]}^${d[base]}`
  );
  return parts.length > 0 ? parts.join('·') : '1';
}

/**
 * Human-readable name of a dimension, falling back to its formula
 */
export function describeDimension(d: Dimension): string {
  const named = DIMENSION_LABELS.find(([candidate]) => sameDimension(candidate, d));
  return named ? named[1] : formatDimension(d);
}
