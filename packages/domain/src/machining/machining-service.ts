/**
 * @fileoverview Machining Service
 *
 * Facade over a parsed catalog: look up entries by key, calculate one
 * combination, or build the full report.
 *
 * @module domain/machining/machining-service
 */

import type { CuttingDefaults } from '@chipload/core';

import { NotFoundError } from '../shared/types.js';
import { parseMachiningCatalog, type ParsedMachiningCatalog } from './catalog.js';
import { buildCuttingReport, type BuildCuttingReportOptions, type CuttingReport } from './cutting-report.js';
import type { Machine } from './entities/machine.js';
import type { Tool } from './entities/tool.js';
import type { WorkMaterial } from './entities/work-material.js';
import {
  CuttingParameterCalculator,
  type CuttingParameterCalculatorOptions,
  type CuttingResult,
} from './services/cutting-parameter-calculator.js';
import { StepoverCurveGenerator, type DepthOfCutGrid } from './services/stepover-curve.js';

export interface MachiningServiceOptions extends CuttingParameterCalculatorOptions {
  /** Settings fallback for catalogs that leave them out */
  defaults?: CuttingDefaults;
}

function findByKey<T>(
  items: readonly T[],
  keyFn: (item: T) => string,
  key: string,
  entryType: string
): T {
  const found = items.find((item) => keyFn(item) === key);
  if (found === undefined) {
    throw new NotFoundError(entryType, key);
  }
  return found;
}

/**
 * Machining Service
 *
 * @example
 * ```typescript
 * const service = createMachiningService(catalogJson);
 * const result = service.calculate('Bench Mill', '0.75in 4FL HSS', 'Aluminum 6061');
 * const report = service.buildReport();
 * ```
 */
export class MachiningService {
  private readonly generator: StepoverCurveGenerator;

  constructor(
    public readonly catalog: ParsedMachiningCatalog,
    options: CuttingParameterCalculatorOptions = {}
  ) {
    const calculator = new CuttingParameterCalculator(catalog.settings, options);
    this.generator = new StepoverCurveGenerator(calculator, catalog.sampling);
  }

  getMachine(name: string): Machine {
    return findByKey(this.catalog.machines, (machine) => machine.name, name, 'Machine');
  }

  getTool(id: string): Tool {
    return findByKey(this.catalog.tools, (tool) => tool.id, id, 'Tool');
  }

  getMaterial(name: string): WorkMaterial {
    return findByKey(this.catalog.materials, (material) => material.name, name, 'Material');
  }

  depthGrid(toolId: string): DepthOfCutGrid {
    return this.generator.depthGrid(this.getTool(toolId));
  }

  calculate(machineName: string, toolId: string, materialName: string): CuttingResult {
    return this.generator.generate({
      machine: this.getMachine(machineName),
      tool: this.getTool(toolId),
      material: this.getMaterial(materialName),
    });
  }

  buildReport(options?: BuildCuttingReportOptions): CuttingReport {
    return buildCuttingReport(this.catalog, this.generator, options);
  }
}

/**
 * Parse a raw catalog and wrap it in a service
 */
export function createMachiningService(
  raw: unknown,
  options: MachiningServiceOptions = {}
): MachiningService {
  const { defaults, ...calculatorOptions } = options;
  const catalog =
    defaults === undefined ? parseMachiningCatalog(raw) : parseMachiningCatalog(raw, defaults);
  return new MachiningService(catalog, calculatorOptions);
}
