// ------------------------------------------------------------------
// Types
// ------------------------------------------------------------------
// Abstract (source-layer) types are produced by the circuit front end.
// Physical types are what the simulator target understands.
export type IRType =
  | { kind: 'qubit'; width: number }
  | { kind: 'cbit'; width: number }
  | { kind: 'angle'; width?: number }
  | { kind: 'duration' }
  | { kind: 'index' }
  | { kind: 'int'; width: number }
  | { kind: 'f64' }
  | { kind: 'ptr'; pointee: IRType }
  | { kind: 'void' };

export interface FunctionType {
  inputs: IRType[];
  results: IRType[];
  variadic?: boolean;
}

// Shorthands used all over the lowering code.
export const qubitType = (width = 1): IRType => ({ kind: 'qubit', width });
export const cbitType = (width: number): IRType => ({ kind: 'cbit', width });
export const angleType = (width?: number): IRType => (width === undefined ? { kind: 'angle' } : { kind: 'angle', width });
export const durationType = (): IRType => ({ kind: 'duration' });
export const indexType = (): IRType => ({ kind: 'index' });
export const intType = (width: number): IRType => ({ kind: 'int', width });
export const f64Type = (): IRType => ({ kind: 'f64' });
export const ptrType = (pointee: IRType): IRType => ({ kind: 'ptr', pointee });
export const voidType = (): IRType => ({ kind: 'void' });

export const isPhysicalType = (t: IRType): boolean => {
  switch (t.kind) {
    case 'int':
    case 'f64':
    case 'index':
    case 'void':
      return true;
    case 'ptr':
      return isPhysicalType(t.pointee);
    default:
      return false;
  }
};

export const typesEqual = (a: IRType, b: IRType): boolean => {
  switch (a.kind) {
    case 'qubit':
    case 'cbit':
    case 'int':
      return b.kind === a.kind && b.width === a.width;
    case 'angle':
      return b.kind === 'angle' && b.width === a.width;
    case 'ptr':
      return b.kind === 'ptr' && typesEqual(a.pointee, b.pointee);
    default:
      return a.kind === b.kind;
  }
};

export const typeToString = (t: IRType): string => {
  switch (t.kind) {
    case 'qubit': return `!quir.qubit<${t.width}>`;
    case 'cbit': return `!quir.cbit<${t.width}>`;
    case 'angle': return t.width === undefined ? '!quir.angle' : `!quir.angle<${t.width}>`;
    case 'duration': return '!quir.duration';
    case 'index': return 'index';
    case 'int': return `i${t.width}`;
    case 'f64': return 'f64';
    case 'ptr': return `!llvm.ptr<${typeToString(t.pointee)}>`;
    case 'void': return '!llvm.void';
  }
};

export const functionTypeToString = (fn: FunctionType): string => {
  const inputs = fn.inputs.map(typeToString);
  if (fn.variadic) inputs.push('...');
  const results = fn.results.map(typeToString);
  return `(${inputs.join(', ')}) -> ${results.length === 1 ? results[0] : `(${results.join(', ')})`}`;
};

// ------------------------------------------------------------------
// Attributes
// ------------------------------------------------------------------
export type DurationUnit = 'dt' | 'ns' | 'us' | 'ms' | 's';

export type ConstantValue =
  | { kind: 'angle'; value: number; width?: number }
  | { kind: 'duration'; value: number; unit: DurationUnit }
  | { kind: 'int'; value: number; width: number }
  | { kind: 'float'; value: number }
  | { kind: 'string'; value: string };

export type Linkage = 'private' | 'weak' | 'external';

/**
 * Attributes carried by operations. Each op kind reads the subset
 * described in its catalogue entry (see builtin-schemas.ts).
 */
export interface Attributes {
  /** Qubit declaration id. */
  id?: number;
  sym_name?: string;
  callee?: string;
  global_name?: string;
  entry_point?: string;
  function_type?: FunctionType;
  value?: ConstantValue;
  /** Element type of globals and stack allocations. */
  type?: IRType;
  /** Bit position for classical-bit accessors. */
  index?: number;
  linkage?: Linkage;
  alignment?: number;
}

export const constantValueToString = (value: ConstantValue): string => {
  switch (value.kind) {
    case 'angle': return `#quir.angle<${value.value}>`;
    case 'duration': return `#quir.duration<${value.value}${value.unit}>`;
    case 'int': return `${value.value} : i${value.width}`;
    case 'float': return `${Number.isInteger(value.value) ? value.value.toFixed(1) : value.value} : f64`;
    case 'string': return JSON.stringify(value.value);
  }
};

// ------------------------------------------------------------------
// Circuit Document (serialized form)
// ------------------------------------------------------------------
export interface CircuitDocument {
  version: string;
  meta: Metadata;
  entryPoint: string; // ID of the function the simulator runs
  functions: FunctionDoc[];
}

export interface Metadata {
  name: string;
  description?: string;
}

export interface PortDef {
  id: string;
  type: IRType;
}

export interface FunctionDoc {
  id: string;
  inputs: PortDef[];
  outputs: IRType[];
  body: OpDoc[];
  comment?: string;
}

/**
 * One operation. `operands` name values defined earlier in the function
 * (results or inputs); `regions` hold nested op lists, one block each.
 */
export interface OpDoc {
  op: string;
  operands?: string[];
  results?: PortDef[];
  attrs?: Attributes;
  regions?: OpDoc[][];
  comment?: string;
}
