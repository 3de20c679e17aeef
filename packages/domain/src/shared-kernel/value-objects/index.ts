/**
 * @fileoverview Value Objects
 *
 * Immutable, self-validating domain primitives.
 *
 * @module domain/shared-kernel/value-objects
 */

export {
  BASE_DIMENSIONS,
  Dimensions,
  dimension,
  multiplyDimensions,
  divideDimensions,
  powDimension,
  sameDimension,
  isDimensionless,
  formatDimension,
  describeDimension,
  type BaseDimension,
  type Dimension,
  type DimensionName,
} from './dimension.js';

export { Unit, Units, UnknownUnitError, findUnit, parseUnit } from './unit.js';

export {
  Quantity,
  DimensionMismatchError,
  InvalidQuantityError,
  type QuantityDTO,
} from './quantity.js';
