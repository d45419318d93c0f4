import { OpBuilder, Operation, Value } from '../../ir/graph';
import { type FunctionType, type IRType, f64Type, functionTypeToString, intType, ptrType, typeToString, typesEqual } from '../../ir/types';
import { bodyBlock } from '../../ir/utils';

// ------------------------------------------------------------------
// Runtime ABI
// ------------------------------------------------------------------

// Declaration order.
export const RUNTIME_FUNCTION_NAMES = [
  'state-create',
  'state-configure',
  'allocate-qubits',
  'state-initialize',
  'apply-single-qubit-gate',
  'apply-two-qubit-gate',
  'apply-measure',
  'state-finalize',
] as const;

export type RuntimeFunctionName = typeof RUNTIME_FUNCTION_NAMES[number];

/** Opaque simulator state; strings share the same byte-pointer shape. */
export const HANDLE_TYPE: IRType = ptrType(intType(8));
export const STRING_TYPE: IRType = ptrType(intType(8));
export const I64: IRType = intType(64);

/**
 * Signatures of the linked simulation runtime. Argument order is part of
 * the ABI.
 */
export const RUNTIME_SIGNATURES: Record<RuntimeFunctionName, FunctionType> = {
  'state-create': { inputs: [], results: [HANDLE_TYPE], variadic: true },
  'state-configure': { inputs: [HANDLE_TYPE, STRING_TYPE, STRING_TYPE], results: [] },
  'allocate-qubits': { inputs: [HANDLE_TYPE, I64], results: [I64] },
  'state-initialize': { inputs: [HANDLE_TYPE], results: [HANDLE_TYPE] },
  'apply-single-qubit-gate': { inputs: [HANDLE_TYPE, I64, f64Type(), f64Type(), f64Type()], results: [] },
  'apply-two-qubit-gate': { inputs: [HANDLE_TYPE, I64, I64], results: [] },
  'apply-measure': { inputs: [HANDLE_TYPE, ptrType(I64), I64], results: [I64] },
  'state-finalize': { inputs: [HANDLE_TYPE], results: [] },
};

/** External symbols of the runtime's C API. */
export const DEFAULT_RUNTIME_SYMBOLS: Record<RuntimeFunctionName, string> = {
  'state-create': 'aer_state',
  'state-configure': 'aer_state_configure',
  'allocate-qubits': 'aer_allocate_qubits',
  'state-initialize': 'aer_state_initialize',
  'apply-single-qubit-gate': 'aer_apply_u3',
  'apply-two-qubit-gate': 'aer_apply_cx',
  'apply-measure': 'aer_apply_measure',
  'state-finalize': 'aer_state_finalize',
};

export type RuntimeSymbols = Partial<Record<RuntimeFunctionName, string>>;

export interface RuntimeFunction {
  name: RuntimeFunctionName;
  symbol: string;
  type: FunctionType;
  decl: Operation;
}

// ------------------------------------------------------------------
// Function Table
// ------------------------------------------------------------------

export class RuntimeFunctionTable {
  constructor(private readonly entries: ReadonlyMap<RuntimeFunctionName, RuntimeFunction>) { }

  get(name: RuntimeFunctionName): RuntimeFunction {
    const fn = this.entries.get(name);
    if (!fn) throw new Error(`Runtime function '${name}' was not declared`);
    return fn;
  }

  get size(): number {
    return this.entries.size;
  }

  /** True if `args` match the declared parameter list exactly (or its prefix, for variadics). */
  accepts(name: RuntimeFunctionName, args: Value[]): boolean {
    const { type } = this.get(name);
    if (type.variadic ? args.length < type.inputs.length : args.length !== type.inputs.length) return false;
    return type.inputs.every((t, i) => typesEqual(t, args[i].type));
  }

  /** Emits an `llvm.call` to a runtime entry point. */
  call(builder: OpBuilder, name: RuntimeFunctionName, args: Value[]): Operation {
    const fn = this.get(name);
    if (!this.accepts(name, args)) {
      const got = args.map(a => typeToString(a.type)).join(', ');
      throw new Error(`Bad call to runtime '${name}': expected ${functionTypeToString(fn.type)}, got (${got})`);
    }
    return builder.create('llvm.call', {
      operands: args,
      resultTypes: fn.type.results,
      attrs: { callee: fn.symbol },
    });
  }
}

/**
 * Declares every runtime entry point at the start of the module. Bodies
 * come from the linked runtime; only shapes are declared here.
 */
export function declareRuntimeFunctions(module: Operation, symbols: RuntimeSymbols = {}): RuntimeFunctionTable {
  const builder = OpBuilder.atBlockStart(bodyBlock(module));
  const entries = new Map<RuntimeFunctionName, RuntimeFunction>();

  for (const name of RUNTIME_FUNCTION_NAMES) {
    const symbol = symbols[name] ?? DEFAULT_RUNTIME_SYMBOLS[name];
    const type = RUNTIME_SIGNATURES[name];
    const decl = builder.create('llvm.func', {
      attrs: { sym_name: symbol, function_type: type },
    });
    entries.set(name, { name, symbol, type, decl });
  }

  return new RuntimeFunctionTable(entries);
}
