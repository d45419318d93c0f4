import { OpBuilder, Operation, Value } from '../../ir/graph';
import { type IRType, intType, typesEqual } from '../../ir/types';
import { functionTypeOf, isEntryFunction } from '../../ir/utils';
import { type SimulatorConfig, configurationEntries } from './config';
import { I64, RuntimeFunctionTable, STRING_TYPE } from './runtime-functions';
import { type MeasurementBuffer, SimulatorState } from './state';
import { SimulatorTypeConverter } from './type-converter';

/**
 * Everything a rule may read while rewriting. Threaded explicitly through
 * every invocation; rules never reach for module-level state.
 */
export interface LoweringContext {
  readonly table: RuntimeFunctionTable;
  readonly state: SimulatorState;
  readonly buffer: MeasurementBuffer;
  readonly converter: SimulatorTypeConverter;
  readonly config: SimulatorConfig;
  /** A module-unique symbol starting with `prefix`. */
  uniqueSymbol(prefix: string): string;
}

export interface RewriteResult {
  /** One entry per result of the matched op; `undefined` drops the result. */
  replacements: (Value | undefined)[];
  /** Module-level ops (globals) placed at the start of the module. */
  hoisted?: Operation[];
  /** Moves the matched op's regions into `into`, retyping the entry block arguments. */
  adoptRegions?: { into: Operation; entryArgTypes: IRType[] };
}

/**
 * A rewrite rule. Ops built through `builder` are placed before the matched
 * op when the rule succeeds and discarded when it returns null. `operands`
 * are the matched op's operands with materialization casts looked through.
 */
export interface RewritePattern {
  name: string;
  root: string;
  benefit: number;
  matchAndRewrite(op: Operation, operands: Value[], builder: OpBuilder, ctx: LoweringContext): RewriteResult | null;
}

const erased: RewriteResult = { replacements: [] };

const constantI64 = (builder: OpBuilder, value: number): Value =>
  builder.value('arith.constant', {
    resultTypes: [I64],
    attrs: { value: { kind: 'int', value, width: 64 } },
  });

/** Removes ops that have no meaning on the simulator. */
const erasePattern = (root: string): RewritePattern => ({
  name: `erase(${root})`,
  root,
  benefit: 1,
  matchAndRewrite: () => erased,
});

// ------------------------------------------------------------------
// System control
// ------------------------------------------------------------------

const stringGlobal = (ctx: LoweringContext, prefix: string, value: string): Operation =>
  new Operation('llvm.mlir.global', {
    attrs: {
      sym_name: ctx.uniqueSymbol(prefix),
      type: intType(8),
      value: { kind: 'string', value },
      linkage: 'private',
    },
  });

export const InitLowering: RewritePattern = {
  name: 'init',
  root: 'qcs.init',
  benefit: 1,
  matchAndRewrite(_op, _operands, builder, ctx) {
    const hoisted: Operation[] = [];
    const handle = ctx.state.load(builder);
    const addressOf = (global: Operation) =>
      builder.value('llvm.mlir.addressof', {
        resultTypes: [STRING_TYPE],
        attrs: { global_name: global.attrs.sym_name },
      });

    for (const [key, value] of configurationEntries(ctx.config)) {
      const keyGlobal = stringGlobal(ctx, `sim_conf_${key}_key`, key);
      const valueGlobal = stringGlobal(ctx, `sim_conf_${key}_value`, value);
      hoisted.push(keyGlobal, valueGlobal);
      ctx.table.call(builder, 'state-configure', [handle, addressOf(keyGlobal), addressOf(valueGlobal)]);
    }
    return { replacements: [], hoisted };
  },
};

export const FinalizeLowering: RewritePattern = {
  name: 'finalize',
  root: 'qcs.finalize',
  benefit: 1,
  matchAndRewrite(_op, _operands, builder, ctx) {
    ctx.table.call(builder, 'state-finalize', [ctx.state.load(builder)]);
    return erased;
  },
};

// ------------------------------------------------------------------
// Quantum ops
// ------------------------------------------------------------------

export const DeclareQubitLowering: RewritePattern = {
  name: 'declare-qubit',
  root: 'quir.declare_qubit',
  benefit: 1,
  matchAndRewrite(op, _operands, builder, ctx) {
    const type = op.result?.type;
    if (!type || type.kind !== 'qubit') return null;
    if (type.width !== 1) {
      throw new Error(`Only single qubit declarations are supported (qubit ${op.attrs.id ?? '?'} has width ${type.width})`);
    }
    const count = constantI64(builder, 1);
    const handle = ctx.state.load(builder);
    const call = ctx.table.call(builder, 'allocate-qubits', [handle, count]);
    return { replacements: [call.result] };
  },
};

const gatePattern = (root: string, runtime: 'apply-single-qubit-gate' | 'apply-two-qubit-gate'): RewritePattern => ({
  name: runtime,
  root,
  benefit: 1,
  matchAndRewrite(_op, operands, builder, ctx) {
    const args = [ctx.state.load(builder), ...operands];
    if (!ctx.table.accepts(runtime, args)) return null;
    ctx.table.call(builder, runtime, args);
    return erased;
  },
});

export const BuiltinULowering = gatePattern('quir.builtin_U', 'apply-single-qubit-gate');
export const BuiltinCXLowering = gatePattern('quir.builtin_CX', 'apply-two-qubit-gate');

export const MeasureLowering: RewritePattern = {
  name: 'measure',
  root: 'quir.measure',
  benefit: 1,
  matchAndRewrite(op, operands, builder, ctx) {
    if (operands.length !== 1) {
      throw new Error(`Only single qubit measurements are supported (got ${operands.length} qubits)`);
    }
    const [qubit] = operands;
    if (!typesEqual(qubit.type, I64)) return null;

    builder.create('llvm.store', { operands: [qubit, ctx.buffer.pointer] });
    const count = constantI64(builder, 1);
    const handle = ctx.state.load(builder);
    const outcome = ctx.table.call(builder, 'apply-measure', [handle, ctx.buffer.pointer, count]).result;
    if (!outcome) return null;
    const bit = builder.value('arith.trunci', { operands: [outcome], resultTypes: [intType(1)] });
    return { replacements: op.results.map(() => bit) };
  },
};

export const ConstantLowering: RewritePattern = {
  name: 'constant',
  root: 'quir.constant',
  benefit: 1,
  matchAndRewrite(op, _operands, builder, ctx) {
    const value = op.attrs.value;
    const type = op.result?.type;
    if (!value || !type) return null;

    switch (value.kind) {
      case 'duration':
        return { replacements: [undefined] };
      case 'angle': {
        const converted = ctx.converter.convertType(type);
        if (!converted || converted.kind !== 'f64') return null;
        const res = builder.value('arith.constant', {
          resultTypes: [converted],
          attrs: { value: { kind: 'float', value: value.value } },
        });
        return { replacements: [res] };
      }
      default:
        return null;
    }
  },
};

// ------------------------------------------------------------------
// Classical values
// ------------------------------------------------------------------

const castValue = (builder: OpBuilder, value: Value, to: IRType): Value | undefined => {
  const from = value.type;
  if (typesEqual(from, to)) return value;
  if (from.kind === 'int' && to.kind === 'int') {
    const name = from.width > to.width ? 'arith.trunci' : 'arith.extui';
    return builder.value(name, { operands: [value], resultTypes: [to] });
  }
  // Registers are unsigned, matching the zero extension above
  if (from.kind === 'int' && to.kind === 'f64') {
    return builder.value('arith.uitofp', { operands: [value], resultTypes: [to] });
  }
  if (from.kind === 'f64' && to.kind === 'int') {
    return builder.value('arith.fptosi', { operands: [value], resultTypes: [to] });
  }
  return undefined;
};

export const CastLowering: RewritePattern = {
  name: 'cast',
  root: 'oq3.cast',
  benefit: 1,
  matchAndRewrite(op, [input], builder, ctx) {
    const type = op.result?.type;
    if (!input || !type) return null;
    const to = ctx.converter.convertType(type);
    if (!to) return null;
    const res = castValue(builder, input, to);
    return res ? { replacements: [res] } : null;
  },
};

export const ExtractBitLowering: RewritePattern = {
  name: 'extract-bit',
  root: 'oq3.cbit_extractbit',
  benefit: 1,
  matchAndRewrite(op, [register], builder) {
    if (!register || register.type.kind !== 'int') return null;
    const { width } = register.type;
    if (width === 1) return { replacements: [register] };

    const index = op.attrs.index ?? 0;
    if (index >= width) return null;
    const shift = builder.value('arith.constant', {
      resultTypes: [register.type],
      attrs: { value: { kind: 'int', value: index, width } },
    });
    const shifted = builder.value('arith.shrui', { operands: [register, shift], resultTypes: [register.type] });
    const bit = builder.value('arith.trunci', { operands: [shifted], resultTypes: [intType(1)] });
    return { replacements: [bit] };
  },
};

// ------------------------------------------------------------------
// Functions
// ------------------------------------------------------------------

/** Gate definitions and helpers are inlined before lowering; only the entry function survives. */
export const FunctionErasure: RewritePattern = {
  name: 'erase-function',
  root: 'func.func',
  benefit: 1,
  matchAndRewrite(op) {
    return isEntryFunction(op) ? null : erased;
  },
};

export const EntrySignatureConversion: RewritePattern = {
  name: 'entry-signature',
  root: 'func.func',
  benefit: 1,
  matchAndRewrite(op, _operands, builder, ctx) {
    if (!isEntryFunction(op)) return null;
    const signature = functionTypeOf(op);
    if (ctx.converter.isSignatureLegal(signature)) return null;
    const converted = ctx.converter.convertSignature(signature);
    if (!converted) return null;

    const into = builder.create('func.func', {
      attrs: { ...op.attrs, function_type: converted },
      regions: op.regions.length,
    });
    return { replacements: [], adoptRegions: { into, entryArgTypes: converted.inputs } };
  },
};

// ------------------------------------------------------------------
// Pattern set
// ------------------------------------------------------------------

export function populateSimulatorPatterns(): RewritePattern[] {
  return [
    InitLowering,
    erasePattern('qcs.shot_init'),
    erasePattern('qcs.synchronize'),
    FinalizeLowering,
    DeclareQubitLowering,
    BuiltinULowering,
    BuiltinCXLowering,
    MeasureLowering,
    ConstantLowering,
    erasePattern('quir.barrier'),
    erasePattern('quir.delay'),
    erasePattern('quir.call_gate'),
    CastLowering,
    ExtractBitLowering,
    FunctionErasure,
    EntrySignatureConversion,
  ];
}
