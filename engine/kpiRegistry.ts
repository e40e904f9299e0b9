// engine/kpiRegistry.ts
// Format name → KPI calculator. Mirrors the Format Registry's ordering.

import type { KpiCalculator } from './kpis/kpiCore';
import { EngineError, ErrorCodes } from './errorCodes';

export interface KpiRegistry {
  readonly names: readonly string[];
  get(formatName: string): KpiCalculator | undefined;
  /** Throws E203 when the format has no calculator. */
  require(formatName: string): KpiCalculator;
}

export function createKpiRegistry(calculators: readonly KpiCalculator[]): KpiRegistry {
  const byFormat = new Map<string, KpiCalculator>();
  for (const calculator of calculators) {
    if (byFormat.has(calculator.formatName)) {
      throw new EngineError(
        ErrorCodes.REGISTRY_MISCONFIGURED,
        `KPI calculator for "${calculator.formatName}" is registered twice.`,
        { format: calculator.formatName }
      );
    }
    byFormat.set(calculator.formatName, calculator);
  }

  const names = Object.freeze(calculators.map((c) => c.formatName));

  return Object.freeze({
    names,

    get(formatName: string): KpiCalculator | undefined {
      return byFormat.get(formatName);
    },

    require(formatName: string): KpiCalculator {
      const calculator = byFormat.get(formatName);
      if (!calculator) {
        throw new EngineError(ErrorCodes.CALCULATOR_MISSING, `No KPI calculator registered for "${formatName}".`, {
          format: formatName
        });
      }
      return calculator;
    }
  });
}
