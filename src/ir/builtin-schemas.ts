import { z } from 'zod';
import type { ConstantValue, FunctionType, IRType } from './types';

// ------------------------------------------------------------------
// Base Schemas
// ------------------------------------------------------------------

const WidthSchema = z.number().int().positive();

export const IRTypeSchema: z.ZodType<IRType> = z.lazy(() => z.discriminatedUnion('kind', [
  z.object({ kind: z.literal('qubit'), width: WidthSchema }),
  z.object({ kind: z.literal('cbit'), width: WidthSchema }),
  z.object({ kind: z.literal('angle'), width: WidthSchema.optional() }),
  z.object({ kind: z.literal('duration') }),
  z.object({ kind: z.literal('index') }),
  z.object({ kind: z.literal('int'), width: WidthSchema }),
  z.object({ kind: z.literal('f64') }),
  z.object({ kind: z.literal('ptr'), pointee: IRTypeSchema }),
  z.object({ kind: z.literal('void') }),
]));

export const FunctionTypeSchema: z.ZodType<FunctionType> = z.object({
  inputs: z.array(IRTypeSchema),
  results: z.array(IRTypeSchema),
  variadic: z.boolean().optional(),
});

export const ConstantValueSchema: z.ZodType<ConstantValue> = z.discriminatedUnion('kind', [
  z.object({ kind: z.literal('angle'), value: z.number(), width: WidthSchema.optional() }),
  z.object({ kind: z.literal('duration'), value: z.number().nonnegative(), unit: z.enum(['dt', 'ns', 'us', 'ms', 's']) }),
  z.object({ kind: z.literal('int'), value: z.number().int(), width: WidthSchema }),
  z.object({ kind: z.literal('float'), value: z.number() }),
  z.object({ kind: z.literal('string'), value: z.string() }),
]);

export const AttributesSchema = z.object({
  id: z.number().int().nonnegative().optional(),
  sym_name: z.string().optional(),
  callee: z.string().optional(),
  global_name: z.string().optional(),
  entry_point: z.string().optional(),
  function_type: FunctionTypeSchema.optional(),
  value: ConstantValueSchema.optional(),
  type: IRTypeSchema.optional(),
  index: z.number().int().nonnegative().optional(),
  linkage: z.enum(['private', 'weak', 'external']).optional(),
  alignment: z.number().int().positive().optional(),
}).strict();

// ------------------------------------------------------------------
// Op Definitions
// ------------------------------------------------------------------

export type Arity = number | 'variadic';

/**
 * How an operation reports qubit usage.
 * - 'operands': the declarations its qubit operands resolve to (a
 *   declaration reports its own id).
 * - 'regions': whatever its nested content operates on.
 */
export type QubitClaim = 'operands' | 'regions';

export interface OpDef {
  doc: string;
  operands: Arity;
  results: Arity;
  regions?: Arity;
  /** Required attributes, checked when a document is loaded. */
  attrs?: z.ZodTypeAny;
  qubits?: QubitClaim;
  isTerminator?: boolean;
}

/**
 * Helper to define an op with its docstring and arity.
 */
export function defineOp(def: OpDef): OpDef {
  return def;
}

const Sym = z.object({ sym_name: z.string().min(1) });
const Callee = z.object({ callee: z.string().min(1) });

export const OpDefs = {
  // Structural
  'builtin.module': defineOp({ doc: 'Compiled unit; one region, one block', operands: 0, results: 0, regions: 1 }),
  'func.func': defineOp({ doc: 'Function definition', operands: 0, results: 0, regions: 1, attrs: Sym.extend({ function_type: FunctionTypeSchema }) }),
  'func.return': defineOp({ doc: 'Return from function', operands: 'variadic', results: 0, isTerminator: true }),
  'func.call': defineOp({ doc: 'Direct call to a function in the unit', operands: 'variadic', results: 'variadic', attrs: Callee }),
  'scf.if': defineOp({ doc: 'Structured conditional', operands: 1, results: 'variadic', regions: 2 }),
  'scf.for': defineOp({ doc: 'Structured counted loop (lb, ub, step, iter args...)', operands: 'variadic', results: 'variadic', regions: 1 }),
  'scf.yield': defineOp({ doc: 'Structured region terminator', operands: 'variadic', results: 0, isTerminator: true }),

  // Arithmetic
  'arith.constant': defineOp({ doc: 'Physical constant', operands: 0, results: 1, attrs: z.object({ value: ConstantValueSchema }) }),
  'arith.trunci': defineOp({ doc: 'Integer truncation', operands: 1, results: 1 }),
  'arith.extui': defineOp({ doc: 'Integer zero extension', operands: 1, results: 1 }),
  'arith.shrui': defineOp({ doc: 'Logical shift right', operands: 2, results: 1 }),
  'arith.uitofp': defineOp({ doc: 'Unsigned integer to float', operands: 1, results: 1 }),
  'arith.fptosi': defineOp({ doc: 'Float to signed integer', operands: 1, results: 1 }),

  // Target primitives
  'llvm.func': defineOp({ doc: 'External function declaration', operands: 0, results: 0, attrs: Sym.extend({ function_type: FunctionTypeSchema }) }),
  'llvm.mlir.global': defineOp({ doc: 'Global slot or string', operands: 0, results: 0, attrs: Sym.extend({ type: IRTypeSchema }) }),
  'llvm.mlir.addressof': defineOp({ doc: 'Address of a global', operands: 0, results: 1, attrs: z.object({ global_name: z.string().min(1) }) }),
  'llvm.load': defineOp({ doc: 'Load through a pointer', operands: 1, results: 1 }),
  'llvm.store': defineOp({ doc: 'Store (value, address)', operands: 2, results: 0 }),
  'llvm.alloca': defineOp({ doc: 'Stack allocation of `count` elements', operands: 1, results: 1, attrs: z.object({ type: IRTypeSchema }) }),
  'llvm.call': defineOp({ doc: 'Call to a declared function', operands: 'variadic', results: 'variadic', attrs: Callee }),

  // System control
  'qcs.init': defineOp({ doc: 'Initialize the control system', operands: 0, results: 0 }),
  'qcs.shot_init': defineOp({ doc: 'Start of a shot', operands: 0, results: 0 }),
  'qcs.finalize': defineOp({ doc: 'Tear down the control system', operands: 0, results: 0 }),
  'qcs.synchronize': defineOp({ doc: 'Synchronize the listed qubits', operands: 'variadic', results: 0 }),

  // Classical bits
  'oq3.cast': defineOp({ doc: 'Type cast between classical and physical values', operands: 1, results: 1 }),
  'oq3.cbit_extractbit': defineOp({ doc: 'Read one bit of a classical register', operands: 1, results: 1, attrs: z.object({ index: z.number().int().nonnegative() }) }),

  // Quantum circuit
  'quir.declare_qubit': defineOp({ doc: 'Declare a qubit with a unique id', operands: 0, results: 1, attrs: z.object({ id: z.number().int().nonnegative() }), qubits: 'operands' }),
  'quir.constant': defineOp({ doc: 'Angle or duration constant', operands: 0, results: 1, attrs: z.object({ value: ConstantValueSchema }) }),
  'quir.builtin_U': defineOp({ doc: 'U(theta, phi, lambda) on one qubit', operands: 4, results: 0, qubits: 'operands' }),
  'quir.builtin_CX': defineOp({ doc: 'Controlled X (control, target)', operands: 2, results: 0, qubits: 'operands' }),
  'quir.measure': defineOp({ doc: 'Measure qubits into bits', operands: 'variadic', results: 'variadic', qubits: 'operands' }),
  'quir.barrier': defineOp({ doc: 'Scheduling barrier', operands: 'variadic', results: 0, qubits: 'operands' }),
  'quir.delay': defineOp({ doc: 'Delay (duration, qubits...)', operands: 'variadic', results: 0, qubits: 'operands' }),
  'quir.call_gate': defineOp({ doc: 'Call a user-defined gate', operands: 'variadic', results: 0, attrs: Callee, qubits: 'operands' }),
  'quir.switch': defineOp({ doc: 'Switch on a classical flag; one region per case', operands: 1, results: 0, regions: 'variadic', qubits: 'regions' }),
  'quir.yield': defineOp({ doc: 'Switch case terminator', operands: 'variadic', results: 0, isTerminator: true }),
} satisfies Record<string, OpDef>;

export type OpName = keyof typeof OpDefs;

export const isKnownOp = (name: string): name is OpName => Object.prototype.hasOwnProperty.call(OpDefs, name);

export const getOpDef = (name: string): OpDef | undefined => (isKnownOp(name) ? OpDefs[name] : undefined);

// ------------------------------------------------------------------
// Layers
// ------------------------------------------------------------------

/** Structural and target-primitive dialects the simulator target accepts. */
export const TARGET_DIALECTS = ['builtin', 'func', 'arith', 'scf', 'llvm'] as const;

export const arityMatches = (arity: Arity, count: number): boolean =>
  arity === 'variadic' || arity === count;
