/**
 * @fileoverview Cutting Report
 *
 * Evaluates every (machine, tool, material) combination and keeps the
 * results in input order, keyed by machine name, tool id and material name.
 *
 * @module domain/machining/cutting-report
 */

import { createLogger, generateCorrelationId, withCorrelationId } from '@chipload/core';

import { DuplicateEntryError } from '../shared/types.js';
import type { Machine } from './entities/machine.js';
import type { Tool } from './entities/tool.js';
import type { WorkMaterial } from './entities/work-material.js';
import type { CuttingResult } from './services/cutting-parameter-calculator.js';
import type { StepoverCurveGenerator } from './services/stepover-curve.js';

const logger = createLogger({ name: 'cutting-report' });

// ============================================================================
// TYPES
// ============================================================================

export interface CuttingReportKey {
  readonly machine: string;
  readonly tool: string;
  readonly material: string;
}

export interface CuttingReportEntry {
  readonly key: CuttingReportKey;
  readonly result: CuttingResult;
}

/**
 * All curves for one machine and tool, one per material
 */
export interface CuttingReportPage {
  readonly machine: Machine;
  readonly tool: Tool;
  readonly curves: readonly CuttingResult[];
}

export interface CuttingReportInput {
  machines: readonly Machine[];
  tools: readonly Tool[];
  materials: readonly WorkMaterial[];
}

export interface BuildCuttingReportOptions {
  correlationId?: string;
}

function keyOf(machine: string, tool: string, material: string): string {
  return JSON.stringify([machine, tool, material]);
}

function assertUnique<T>(entryType: string, items: readonly T[], keyFn: (item: T) => string): void {
  const seen = new Set<string>();
  for (const item of items) {
    const key = keyFn(item);
    if (seen.has(key)) {
      throw new DuplicateEntryError(entryType, key);
    }
    seen.add(key);
  }
}

// ============================================================================
// REPORT
// ============================================================================

export class CuttingReport implements Iterable<CuttingReportEntry> {
  private readonly index: ReadonlyMap<string, CuttingResult>;

  private constructor(
    public readonly correlationId: string,
    private readonly orderedEntries: readonly CuttingReportEntry[],
    private readonly orderedPages: readonly CuttingReportPage[]
  ) {
    this.index = new Map(
      orderedEntries.map((entry) => [
        keyOf(entry.key.machine, entry.key.tool, entry.key.material),
        entry.result,
      ])
    );
  }

  /**
   * Run the generator once per combination, machine -> tool -> material
   */
  static build(
    input: CuttingReportInput,
    generator: StepoverCurveGenerator,
    options: BuildCuttingReportOptions = {}
  ): CuttingReport {
    assertUnique('machine', input.machines, (machine) => machine.name);
    assertUnique('tool', input.tools, (tool) => tool.id);
    assertUnique('material', input.materials, (material) => material.name);

    const correlationId = options.correlationId ?? generateCorrelationId();
    const entries: CuttingReportEntry[] = [];
    const pages: CuttingReportPage[] = [];

    for (const machine of input.machines) {
      for (const tool of input.tools) {
        const curves: CuttingResult[] = [];
        for (const material of input.materials) {
          const result = generator.generate({ machine, tool, material });
          curves.push(result);
          entries.push(
            Object.freeze({
              key: Object.freeze({ machine: machine.name, tool: tool.id, material: material.name }),
              result,
            })
          );
        }
        pages.push(Object.freeze({ machine, tool, curves: Object.freeze(curves) }));
      }
    }

    withCorrelationId(logger, correlationId).info(
      {
        machines: input.machines.length,
        tools: input.tools.length,
        materials: input.materials.length,
        entries: entries.length,
      },
      'Cutting report built'
    );

    return new CuttingReport(correlationId, Object.freeze(entries), Object.freeze(pages));
  }

  get size(): number {
    return this.orderedEntries.length;
  }

  get(machine: string, tool: string, material: string): CuttingResult | undefined {
    return this.index.get(keyOf(machine, tool, material));
  }

  has(machine: string, tool: string, material: string): boolean {
    return this.index.has(keyOf(machine, tool, material));
  }

  entries(): readonly CuttingReportEntry[] {
    return this.orderedEntries;
  }

  /**
   * (machine, tool) pages in input order
   */
  groupByMachineAndTool(): readonly CuttingReportPage[] {
    return this.orderedPages;
  }

  [Symbol.iterator](): Iterator<CuttingReportEntry> {
    return this.orderedEntries[Symbol.iterator]();
  }
}

export function buildCuttingReport(
  input: CuttingReportInput,
  generator: StepoverCurveGenerator,
  options?: BuildCuttingReportOptions
): CuttingReport {
  return CuttingReport.build(input, generator, options);
}
