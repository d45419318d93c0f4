import { Operation, cloneOperation } from '../../ir/graph';
import { getEntryFunction, collectOps, verifyModule } from '../../ir/utils';
import { DEFAULT_SIMULATOR_CONFIG, type SimulatorConfig } from './config';
import { type ConversionStats, ConversionTarget, applyConversion, debugLog } from './conversion';
import { type LoweringContext, populateSimulatorPatterns } from './patterns';
import { type RuntimeSymbols, declareRuntimeFunctions } from './runtime-functions';
import { allocateMeasurementBuffer, createSimulatorState, insertStateInitialize, measurementCapacity } from './state';
import { type LoweringDiagnostic, SimulatorTypeConverter } from './type-converter';

export interface LoweringOptions {
  config?: SimulatorConfig;
  /** Overrides for the runtime's external symbol names. */
  symbols?: RuntimeSymbols;
  stateSymbol?: string;
  maxIterations?: number;
}

export type LoweringResult =
  | { success: true; module: Operation; stats: ConversionStats; diagnostics: LoweringDiagnostic[] }
  | { success: false; errors: LoweringDiagnostic[] };

const emptyStats = (): ConversionStats => ({ iterations: 0, rewrites: 0, materializations: 0, patterns: {} });

/** Synchronization carries no meaning on the simulator; its qubit operands would pin the declarations. */
function stripSynchronizeOperands(module: Operation) {
  for (const op of collectOps(module, 'qcs.synchronize')) op.setOperands([]);
}

function symbolAllocator(module: Operation): (prefix: string) => string {
  const taken = new Set<string>();
  module.walk(op => {
    if (op.attrs.sym_name) taken.add(op.attrs.sym_name);
  });
  const counters = new Map<string, number>();
  return prefix => {
    let n = counters.get(prefix) ?? 0;
    let name = `${prefix}_${n}`;
    while (taken.has(name)) name = `${prefix}_${++n}`;
    counters.set(prefix, n + 1);
    taken.add(name);
    return name;
  };
}

/**
 * Lowers a circuit module to simulator runtime calls.
 *
 * Works on a copy: the input is never modified, and a failed lowering
 * produces no partial output. A module with nothing left to lower comes
 * back unchanged.
 */
export function lowerToSimulator(input: Operation, options: LoweringOptions = {}): LoweringResult {
  const module = cloneOperation(input);
  const entry = getEntryFunction(module);
  const converter = new SimulatorTypeConverter();
  const target = new ConversionTarget(converter);

  if (target.illegalOps(module).length === 0) {
    debugLog('nothing to lower');
    return { success: true, module, stats: emptyStats(), diagnostics: [...converter.diagnostics] };
  }

  stripSynchronizeOperands(module);
  const table = declareRuntimeFunctions(module, options.symbols);
  const state = createSimulatorState(module, entry, table, options.stateSymbol);
  insertStateInitialize(module, state, table);
  const buffer = allocateMeasurementBuffer(entry, measurementCapacity(module));

  const ctx: LoweringContext = {
    table,
    state,
    buffer,
    converter,
    config: options.config ?? DEFAULT_SIMULATOR_CONFIG,
    uniqueSymbol: symbolAllocator(module),
  };

  const outcome = applyConversion(module, populateSimulatorPatterns(), target, ctx, {
    maxIterations: options.maxIterations,
  });

  if (!outcome.success) {
    const errors: LoweringDiagnostic[] = outcome.illegal.map(op => ({
      opName: op.name,
      message: `failed to legalize operation '${op.name}': ${outcome.reason}`,
      severity: 'error',
    }));
    return { success: false, errors: [...converter.diagnostics, ...errors] };
  }

  const problems = verifyModule(module);
  if (problems.length > 0) {
    return {
      success: false,
      errors: [...converter.diagnostics, ...problems.map((message): LoweringDiagnostic => ({ message, severity: 'error' }))],
    };
  }

  debugLog(`lowered in ${outcome.stats.iterations} sweeps, ${outcome.stats.rewrites} rewrites`);
  return { success: true, module, stats: outcome.stats, diagnostics: [...converter.diagnostics] };
}
