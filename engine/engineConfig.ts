// engine/engineConfig.ts
// Builds the immutable EngineConfig handed to the pipeline entry point.
//
// Each descriptor in data/format_descriptors.json must have exactly one
// plugin (processor + calculator pair) and vice versa. Anything unpaired is a
// startup error (E701), never a request-time surprise.

import {
  loadEngineSettings,
  loadFormatDescriptors,
  type EngineSettings,
  type FormatDescriptor
} from './config';
import { EngineError, ErrorCodes } from './errorCodes';
import { createFormatRegistry, type FormatRegistry } from './formatRegistry';
import { createKpiRegistry, type KpiRegistry } from './kpiRegistry';
import type { FormatProcessor } from './formats/formatProcessor';
import type { KpiCalculator } from './kpis/kpiCore';
import { createMonthlyT12Processor, MONTHLY_T12_FORMAT } from './formats/monthlyT12Processor';
import { createStandardT12Processor, STANDARD_T12_FORMAT } from './formats/standardT12Processor';
import { createDatabaseT12Processor, DATABASE_T12_FORMAT } from './formats/databaseT12Processor';
import { createMonthlyT12Calculator } from './kpis/monthlyT12Calculator';
import { createStandardT12Calculator } from './kpis/standardT12Calculator';
import { createDatabaseT12Calculator } from './kpis/databaseT12Calculator';
import { logEngineInfo } from './logger';

export interface EngineConfig {
  readonly settings: Readonly<EngineSettings>;
  readonly formats: FormatRegistry;
  readonly kpis: KpiRegistry;
}

export interface FormatPlugin {
  createProcessor(descriptor: FormatDescriptor): FormatProcessor;
  createCalculator(descriptor: FormatDescriptor): KpiCalculator;
}

export const BUILTIN_PLUGINS: Readonly<Record<string, FormatPlugin>> = Object.freeze({
  [MONTHLY_T12_FORMAT]: {
    createProcessor: createMonthlyT12Processor,
    createCalculator: createMonthlyT12Calculator
  },
  [STANDARD_T12_FORMAT]: {
    createProcessor: createStandardT12Processor,
    createCalculator: createStandardT12Calculator
  },
  [DATABASE_T12_FORMAT]: {
    createProcessor: createDatabaseT12Processor,
    createCalculator: createDatabaseT12Calculator
  }
});

function misconfigured(message: string, format?: string): never {
  throw new EngineError(ErrorCodes.REGISTRY_MISCONFIGURED, message, format ? { format } : {});
}

/**
 * Assemble registries from explicit processor / calculator lists.
 * Processor order becomes detection order; both lists must name the same formats.
 */
export function assembleEngineConfig(
  settings: EngineSettings,
  processors: readonly FormatProcessor[],
  calculators: readonly KpiCalculator[]
): EngineConfig {
  const calculatorNames = new Set(calculators.map((c) => c.formatName));
  const processorNames = new Set(processors.map((p) => p.name));

  for (const processor of processors) {
    if (processor.descriptor.name !== processor.name) {
      misconfigured(`Processor "${processor.name}" carries descriptor "${processor.descriptor.name}".`, processor.name);
    }
    if (!calculatorNames.has(processor.name)) {
      misconfigured(`Format "${processor.name}" has no KPI calculator.`, processor.name);
    }
  }
  for (const calculator of calculators) {
    if (!processorNames.has(calculator.formatName)) {
      misconfigured(`KPI calculator "${calculator.formatName}" has no format processor.`, calculator.formatName);
    }
  }

  const formats = createFormatRegistry(processors, settings.detectionThreshold);
  const kpis = createKpiRegistry(calculators);

  return Object.freeze({
    settings: Object.freeze({ ...settings, requiredSections: Object.freeze([...settings.requiredSections]) }),
    formats,
    kpis
  });
}

export interface BuildEngineConfigOptions {
  descriptors?: ReadonlyMap<string, FormatDescriptor>;
  settings?: EngineSettings;
  plugins?: Readonly<Record<string, FormatPlugin>>;
}

/** Descriptor file order is registration order. */
export function buildEngineConfig(options: BuildEngineConfigOptions = {}): EngineConfig {
  const descriptors = options.descriptors ?? loadFormatDescriptors();
  const settings = options.settings ?? loadEngineSettings();
  const plugins = options.plugins ?? BUILTIN_PLUGINS;

  for (const name of Object.keys(plugins)) {
    if (!descriptors.has(name)) misconfigured(`Plugin "${name}" has no format descriptor.`, name);
  }

  const processors: FormatProcessor[] = [];
  const calculators: KpiCalculator[] = [];
  for (const descriptor of descriptors.values()) {
    const plugin = plugins[descriptor.name];
    if (!plugin) misconfigured(`Format descriptor "${descriptor.name}" has no processor/calculator plugin.`, descriptor.name);
    processors.push(plugin.createProcessor(descriptor));
    calculators.push(plugin.createCalculator(descriptor));
  }

  const config = assembleEngineConfig(settings, processors, calculators);
  logEngineInfo('engine_config_built', {
    formats: config.formats.names,
    detection_threshold: settings.detectionThreshold
  });
  return config;
}

let defaultConfig: EngineConfig | null = null;

/** Process-wide config, built once; each handler module requests it as it loads. */
export function getDefaultEngineConfig(): EngineConfig {
  if (!defaultConfig) defaultConfig = buildEngineConfig();
  return defaultConfig;
}
