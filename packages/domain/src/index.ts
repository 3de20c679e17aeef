/**
 * @fileoverview Domain Package Exports
 *
 * Central export point for the cutting-parameter engine.
 *
 * @module @chipload/domain
 *
 * ## Architecture Overview
 *
 * ### Shared Kernel
 * - **Value Objects**: Dimension, Unit, Quantity (immutable, self-validating)
 *
 * ### Machining Bounded Context
 * - **Entities**: Machine, Tool, WorkMaterial, CuttingSettings
 * - **Services**: spindle envelope, cutting parameter calculator, stepover curve
 * - **Report**: every machine x tool x material combination
 * - **Catalog**: raw configuration records to validated entities
 *
 * @example
 * ```typescript
 * import { Quantity, Units, createMachiningService } from '@chipload/domain';
 *
 * const service = createMachiningService(catalogJson);
 * const report = service.buildReport();
 * for (const page of report.groupByMachineAndTool()) {
 *   // one chart per machine and tool
 * }
 * ```
 */

// ============================================================================
// SHARED
// ============================================================================

export * from './shared/index.js';

// ============================================================================
// SHARED KERNEL
// ============================================================================

export * from './shared-kernel/index.js';

// ============================================================================
// MACHINING
// ============================================================================

export * from './machining/index.js';
