/**
 * @fileoverview Unit Value Object
 *
 * A unit is a symbol, a dimension and a scale factor to SI base units
 * (metre, kilogram, second, radian, count). Units compose by
 * multiplication, division and integer powers; the composed symbol parses
 * back to an equal unit.
 *
 * @module domain/shared-kernel/value-objects/unit
 */

import { DomainError } from '../../shared/types.js';
import {
  Dimensions,
  divideDimensions,
  isDimensionless,
  multiplyDimensions,
  powDimension,
  sameDimension,
  type Dimension,
} from './dimension.js';

// ============================================================================
// ERRORS
// ============================================================================

/**
 * Error thrown when a unit symbol or expression cannot be resolved
 */
export class UnknownUnitError extends DomainError {
  constructor(
    public readonly expression: string,
    reason: string
  ) {
    super('UNKNOWN_UNIT', `Cannot parse unit "${expression}": ${reason}`, { expression });
    this.name = 'UnknownUnitError';
  }
}

// ============================================================================
// UNIT
// ============================================================================

function isCompound(symbol: string): boolean {
  return /[/·^]/.test(symbol);
}

function wrap(symbol: string, when: (symbol: string) => boolean): string {
  return when(symbol) ? `(${symbol})` : symbol;
}

/**
 * Unit Value Object
 *
 * Immutable. Two units are equal when they share dimension and scale; the
 * symbol is presentation only.
 */
export class Unit {
  private constructor(
    public readonly symbol: string,
    public readonly dimension: Dimension,
    public readonly scale: number
  ) {
    Object.freeze(this);
  }

  /** The pure number 1 */
  static readonly ONE = new Unit('1', Dimensions.DIMENSIONLESS, 1);

  /**
   * Define a unit by its SI scale factor
   */
  static define(symbol: string, dimension: Dimension, scale: number): Unit {
    if (!Number.isFinite(scale) || scale <= 0) {
      throw new UnknownUnitError(symbol, 'scale must be a positive finite number');
    }
    return new Unit(symbol, dimension, scale);
  }

  multiply(other: Unit): Unit {
    if (this.isOne()) return other;
    if (other.isOne()) return this;
    const symbol = `${wrap(this.symbol, (s) => s.includes('/'))}·${wrap(other.symbol, (s) => s.includes('/'))}`;
    return new Unit(
      symbol,
      multiplyDimensions(this.dimension, other.dimension),
      this.scale * other.scale
    );
  }

  divide(other: Unit): Unit {
    if (other.isOne()) return this;
    const numerator = wrap(this.symbol, (s) => s.includes('/'));
    const symbol = `${numerator}/${wrap(other.symbol, isCompound)}`;
    return new Unit(
      symbol,
      divideDimensions(this.dimension, other.dimension),
      this.scale / other.scale
    );
  }

  pow(exponent: number): Unit {
    if (!Number.isInteger(exponent)) {
      throw new UnknownUnitError(`${this.symbol}^${exponent}`, 'exponent must be an integer');
    }
    if (exponent === 0) return Unit.ONE;
    if (exponent === 1) return this;
    return new Unit(
      `${wrap(this.symbol, isCompound)}^${exponent}`,
      powDimension(this.dimension, exponent),
      Math.pow(this.scale, exponent)
    );
  }

  /**
   * Same unit under a different symbol (e.g. `rpm` for `rev/min`)
   */
  withSymbol(symbol: string): Unit {
    return new Unit(symbol, this.dimension, this.scale);
  }

  isCompatibleWith(other: Unit): boolean {
    return sameDimension(this.dimension, other.dimension);
  }

  equals(other: Unit): boolean {
    return (
      this.isCompatibleWith(other) &&
      Math.abs(this.scale - other.scale) <= 1e-12 * Math.max(this.scale, other.scale)
    );
  }

  isDimensionless(): boolean {
    return isDimensionless(this.dimension);
  }

  toString(): string {
    return this.symbol;
  }

  private isOne(): boolean {
    return this.symbol === '1' && this.isDimensionless() && this.scale === 1;
  }
}

// ============================================================================
// REGISTRY
// ============================================================================

const meter = Unit.define('m', Dimensions.LENGTH, 1);
const kilogram = Unit.define('kg', Dimensions.MASS, 1);
const second = Unit.define('s', Dimensions.TIME, 1);
const radian = Unit.define('rad', Dimensions.ANGLE, 1);
const minute = Unit.define('min', Dimensions.TIME, 60);
const revolution = Unit.define('rev', Dimensions.ANGLE, 2 * Math.PI);
const millimeter = Unit.define('mm', Dimensions.LENGTH, 0.001);
const inch = Unit.define('in', Dimensions.LENGTH, 0.0254);
const foot = Unit.define('ft', Dimensions.LENGTH, 0.3048);
const watt = Unit.define('W', Dimensions.POWER, 1);

/**
 * Shop-floor units
 *
 * Horsepower is mechanical horsepower (550 ft·lbf/s).
 */
export const Units = {
  one: Unit.ONE,
  // length
  meter,
  centimeter: Unit.define('cm', Dimensions.LENGTH, 0.01),
  millimeter,
  inch,
  foot,
  // mass
  kilogram,
  // time
  second,
  minute,
  hour: Unit.define('h', Dimensions.TIME, 3600),
  // angle
  radian,
  revolution,
  // count
  tooth: Unit.define('tooth', Dimensions.COUNT, 1),
  // power
  watt,
  kilowatt: Unit.define('kW', Dimensions.POWER, 1000),
  horsepower: Unit.define('hp', Dimensions.POWER, 745.69987158227022),
  // common derived units
  revolutionsPerMinute: revolution.divide(minute),
  inchesPerMinute: inch.divide(minute),
  millimetersPerMinute: millimeter.divide(minute),
  feetPerMinute: foot.divide(minute),
  metersPerMinute: meter.divide(minute),
  cubicInchesPerMinute: inch.pow(3).divide(minute),
} as const;

const SYMBOL_TABLE: ReadonlyMap<string, Unit> = new Map<string, Unit>([
  ['1', Units.one],
  ['m', Units.meter],
  ['cm', Units.centimeter],
  ['mm', Units.millimeter],
  ['in', Units.inch],
  ['inch', Units.inch],
  ['ft', Units.foot],
  ['kg', Units.kilogram],
  ['s', Units.second],
  ['min', Units.minute],
  ['h', Units.hour],
  ['rad', Units.radian],
  ['rev', Units.revolution],
  ['tooth', Units.tooth],
  ['W', Units.watt],
  ['kW', Units.kilowatt],
  ['hp', Units.horsepower],
  ['rpm', Units.revolutionsPerMinute.withSymbol('rpm')],
  ['sfm', Units.feetPerMinute.withSymbol('sfm')],
  ['ipm', Units.inchesPerMinute.withSymbol('ipm')],
]);

/**
 * Look up a single registered symbol or alias
 */
export function findUnit(symbol: string): Unit | undefined {
  return SYMBOL_TABLE.get(symbol);
}

// ============================================================================
// EXPRESSION PARSER
// ============================================================================

type Token =
  | { kind: 'symbol'; text: string }
  | { kind: 'integer'; value: number }
  | { kind: 'op'; text: '*' | '/' | '^' | '(' | ')' };

function tokenize(expression: string): Token[] {
  const tokens: Token[] = [];
  const pattern = /\s*(?:([A-Za-z]+)|(-?\d+)|([*·/^()]))/y;
  let index = 0;

  while (index < expression.length) {
    if (expression.slice(index).trim() === '') break;
    pattern.lastIndex = index;
    const match = pattern.exec(expression);
    if (!match) {
      throw new UnknownUnitError(expression, `unexpected character at position ${index}`);
    }
    const [, symbol, integer, op] = match;
    if (symbol !== undefined) {
      tokens.push({ kind: 'symbol', text: symbol });
    } else if (integer !== undefined) {
      tokens.push({ kind: 'integer', value: Number(integer) });
    } else if (op === '*' || op === '·') {
      tokens.push({ kind: 'op', text: '*' });
    } else if (op === '/' || op === '^' || op === '(' || op === ')') {
      tokens.push({ kind: 'op', text: op });
    }
    index = pattern.lastIndex;
  }

  return tokens;
}

/**
 * Parse a unit expression such as `ft/min`, `in^3/min` or `hp/(in^3/min)`
 *
 * Grammar:
 *   expr   := term (('*' | '·' | '/') term)*
 *   term   := factor ('^' integer)?
 *   factor := symbol | '1' | '(' expr ')'
 */
export function parseUnit(expression: string): Unit {
  const tokens = tokenize(expression);
  let position = 0;

  const fail = (reason: string): never => {
    throw new UnknownUnitError(expression, reason);
  };

  const peek = (): Token | undefined => tokens[position];

  const parseFactor = (): Unit => {
    const token = peek();
    if (!token) return fail('unexpected end of expression');
    position++;

    if (token.kind === 'symbol') {
      return findUnit(token.text) ?? fail(`unknown symbol "${token.text}"`);
    }
    if (token.kind === 'integer' && token.value === 1) {
      return Unit.ONE;
    }
    if (token.kind === 'op' && token.text === '(') {
      const inner = parseExpression();
      const closing = peek();
      if (!closing || closing.kind !== 'op' || closing.text !== ')') {
        return fail('missing closing parenthesis');
      }
      position++;
      return inner;
    }
    return fail(`unexpected token at position ${position - 1}`);
  };

  const parseTerm = (): Unit => {
    const base = parseFactor();
    const next = peek();
    if (next?.kind === 'op' && next.text === '^') {
      position++;
      const exponent = peek();
      if (exponent?.kind !== 'integer') {
        return fail('exponent must be an integer');
      }
      position++;
      return base.pow(exponent.value);
    }
    return base;
  };

  const parseExpression = (): Unit => {
    let result = parseTerm();
    for (;;) {
      const next = peek();
      if (next?.kind !== 'op' || (next.text !== '*' && next.text !== '/')) {
        return result;
      }
      position++;
      const rhs = parseTerm();
      result = next.text === '*' ? result.multiply(rhs) : result.divide(rhs);
    }
  };

  if (tokens.length === 0) {
    return fail('expression is empty');
  }

  const unit = parseExpression();
  if (position < tokens.length) {
    return fail(`unexpected token at position ${position}`);
  }

  return unit;
}
