/**
 * @fileoverview Machine Entity
 *
 * A milling machine: spindle power, feed ceiling and the spindle speeds it
 * can actually run.
 *
 * @module domain/machining/entities/machine
 */

import { DomainError } from '../../shared/types.js';
import { Dimensions, Quantity } from '../../shared-kernel/value-objects/index.js';

// ============================================================================
// ERRORS
// ============================================================================

/**
 * Error thrown when a machine definition is unusable
 */
export class InvalidMachineSpecError extends DomainError {
  constructor(
    public readonly machineName: string,
    reason: string
  ) {
    super('INVALID_MACHINE_SPEC', `Invalid machine "${machineName}": ${reason}`, {
      machineName,
    });
    this.name = 'InvalidMachineSpecError';
  }
}

// ============================================================================
// TYPES
// ============================================================================

/**
 * Continuously variable spindle, from standstill up to a ceiling
 */
export interface ContinuousSpindle {
  readonly kind: 'continuous';
  readonly maxSpeed: Quantity;
}

/**
 * Step-pulley or gearbox spindle; speeds are sorted ascending, no duplicates
 */
export interface DiscreteSpindle {
  readonly kind: 'discrete';
  readonly speeds: readonly Quantity[];
}

export type SpindleCapability = ContinuousSpindle | DiscreteSpindle;

export interface Machine {
  /** Unique key */
  readonly name: string;
  /** Rated spindle motor power */
  readonly ratedPower: Quantity;
  readonly maxFeedRate: Quantity;
  readonly spindle: SpindleCapability;
}

export type CreateMachineInput = Machine;

// ============================================================================
// SPINDLE FACTORIES
// ============================================================================

export function continuousSpindle(maxSpeed: Quantity): ContinuousSpindle {
  return Object.freeze({ kind: 'continuous', maxSpeed });
}

/**
 * Normalizes the speed set: ascending order, duplicates removed
 */
export function discreteSpindle(speeds: readonly Quantity[]): DiscreteSpindle {
  const sorted = [...speeds].sort((a, b) => a.compareTo(b));
  const unique = sorted.filter((speed, index) => {
    const previous = sorted[index - 1];
    return previous === undefined || !speed.equals(previous);
  });
  return Object.freeze({ kind: 'discrete', speeds: Object.freeze(unique) });
}

// ============================================================================
// VALIDATION
// ============================================================================

function assertValidSpindle(name: string, spindle: SpindleCapability): void {
  switch (spindle.kind) {
    case 'continuous':
      spindle.maxSpeed.requireDimension(Dimensions.ANGULAR_VELOCITY, `machine "${name}" max spindle speed`);
      if (!spindle.maxSpeed.isPositive()) {
        throw new InvalidMachineSpecError(name, 'max spindle speed must be greater than 0');
      }
      return;
    case 'discrete':
      if (spindle.speeds.length === 0) {
        throw new InvalidMachineSpecError(name, 'discrete spindle needs at least one speed');
      }
      for (const speed of spindle.speeds) {
        speed.requireDimension(Dimensions.ANGULAR_VELOCITY, `machine "${name}" spindle speed`);
        if (!speed.isPositive()) {
          throw new InvalidMachineSpecError(
            name,
            `spindle speeds must be greater than 0, got ${speed.toString()}`
          );
        }
      }
      return;
  }
}

/**
 * Throws if the machine cannot be used in a calculation
 */
export function assertValidMachine(machine: Machine): void {
  if (machine.name.trim() === '') {
    throw new InvalidMachineSpecError(machine.name, 'name is required');
  }

  machine.ratedPower.requireDimension(Dimensions.POWER, `machine "${machine.name}" rated power`);
  machine.maxFeedRate.requireDimension(Dimensions.VELOCITY, `machine "${machine.name}" max feed rate`);

  if (!machine.ratedPower.isPositive()) {
    throw new InvalidMachineSpecError(machine.name, 'rated power must be greater than 0');
  }
  if (!machine.maxFeedRate.isPositive()) {
    throw new InvalidMachineSpecError(machine.name, 'max feed rate must be greater than 0');
  }

  assertValidSpindle(machine.name, machine.spindle);
}

/**
 * Create a validated, immutable machine
 */
export function createMachine(input: CreateMachineInput): Machine {
  const spindle =
    input.spindle.kind === 'discrete'
      ? discreteSpindle(input.spindle.speeds)
      : continuousSpindle(input.spindle.maxSpeed);

  const machine: Machine = Object.freeze({
    name: input.name.trim(),
    ratedPower: input.ratedPower,
    maxFeedRate: input.maxFeedRate,
    spindle,
  });

  assertValidMachine(machine);
  return machine;
}
