/**
 * Spindle Envelope
 *
 * Maps an ideal spindle speed onto what the machine can actually run.
 * Continuous spindles clamp to their ceiling. Discrete spindles take the
 * nearest available speed, the lower one on a tie.
 */
import type { Quantity } from '../../shared-kernel/value-objects/index.js';
import type { SpindleCapability } from '../entities/machine.js';

// =============================================================================
// Resolution
// =============================================================================

/**
 * Nearest speed in the set; ties keep the earlier entry
 *
 * Distances are taken in the unit of the first speed, so an exact midpoint
 * between two rev/min speeds stays an exact tie.
 */
function nearestSpeed(ideal: Quantity, speeds: readonly Quantity[], first: Quantity): Quantity {
  const target = ideal.valueIn(first.unit);
  let best = first;
  let bestDistance = Number.POSITIVE_INFINITY;

  for (const candidate of speeds) {
    const distance = Math.abs(candidate.valueIn(first.unit) - target);
    if (distance < bestDistance) {
      best = candidate;
      bestDistance = distance;
    }
  }

  return best;
}

/**
 * Achievable spindle speed for an ideal speed
 *
 * Expects a validated machine: angular-velocity speeds and a non-empty
 * discrete set. The ideal speed must be an angular velocity as well.
 *
 * A discrete set is held in ascending order (see `discreteSpindle`), so a
 * speed exactly between two entries resolves to the lower one whatever
 * order the caller listed them in.
 */
export function resolveSpindleSpeed(ideal: Quantity, spindle: SpindleCapability): Quantity {
  switch (spindle.kind) {
    case 'continuous':
      return ideal.isGreaterThan(spindle.maxSpeed) ? spindle.maxSpeed : ideal;
    case 'discrete': {
      const [first] = spindle.speeds;
      if (first === undefined) {
        return ideal;
      }
      first.requireDimension(ideal.dimension, 'spindle speed');
      return nearestSpeed(ideal, spindle.speeds, first);
    }
  }
}

/**
 * Whether the machine can run exactly this speed
 */
export function isWithinEnvelope(speed: Quantity, spindle: SpindleCapability): boolean {
  switch (spindle.kind) {
    case 'continuous':
      return !speed.isNegative() && !speed.isGreaterThan(spindle.maxSpeed);
    case 'discrete':
      return spindle.speeds.some((candidate) => candidate.equals(speed));
  }
}
