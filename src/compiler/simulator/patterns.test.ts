import { describe, it, expect, vi, afterEach } from 'vitest';
import { Block, OpBuilder, Operation, Value } from '../../ir/graph';
import { type IRType, angleType, cbitType, durationType, f64Type, intType, qubitType } from '../../ir/types';
import { bodyBlock } from '../../ir/utils';
import { DEFAULT_SIMULATOR_CONFIG, type SimulatorConfig } from './config';
import {
  BuiltinCXLowering,
  BuiltinULowering,
  CastLowering,
  ConstantLowering,
  DeclareQubitLowering,
  EntrySignatureConversion,
  ExtractBitLowering,
  FinalizeLowering,
  FunctionErasure,
  InitLowering,
  type LoweringContext,
  MeasureLowering,
  type RewritePattern,
  populateSimulatorPatterns,
} from './patterns';
import { I64, declareRuntimeFunctions } from './runtime-functions';
import { allocateMeasurementBuffer, createSimulatorState } from './state';
import { SimulatorTypeConverter } from './type-converter';

const setup = (config: SimulatorConfig = DEFAULT_SIMULATOR_CONFIG) => {
  const module = new Operation('builtin.module', { regions: 1, attrs: { entry_point: 'main' } });
  module.regions[0].appendBlock(new Block());
  const moduleBody = OpBuilder.atBlockEnd(bodyBlock(module));
  const helper = moduleBody.create('func.func', {
    regions: 1,
    attrs: { sym_name: 'helper', function_type: { inputs: [], results: [] } },
  });
  helper.regions[0].appendBlock(new Block());
  const main = moduleBody.create('func.func', {
    regions: 1,
    attrs: { sym_name: 'main', function_type: { inputs: [qubitType()], results: [cbitType(1)] } },
  });
  main.regions[0].appendBlock(new Block([qubitType()]));

  const table = declareRuntimeFunctions(module);
  const state = createSimulatorState(module, main, table);
  const buffer = allocateMeasurementBuffer(main, 1);
  let counter = 0;
  const ctx: LoweringContext = {
    table,
    state,
    buffer,
    converter: new SimulatorTypeConverter(),
    config,
    uniqueSymbol: prefix => `${prefix}_${counter++}`,
  };
  // Values the patterns receive as already-converted operands
  const scratch = OpBuilder.atBlockEnd(new Block());
  const physical = (type: IRType): Value => scratch.value('llvm.call', { resultTypes: [type], attrs: { callee: 'src' } });
  return { module, main, helper, ctx, scratch, physical };
};

const rewrite = (pattern: RewritePattern, op: Operation, operands: Value[], ctx: LoweringContext) => {
  const builder = OpBuilder.detached();
  const result = pattern.matchAndRewrite(op, operands, builder, ctx);
  return { result, created: builder.created, names: builder.created.map(o => o.name) };
};

describe('Simulator Patterns', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe('qcs.init', () => {
    it('should configure method, device and precision from string globals', () => {
      const { ctx } = setup({ method: 'statevector', device: 'gpu', precision: 'single' });
      const { result, created, names } = rewrite(InitLowering, new Operation('qcs.init'), [], ctx);

      expect(names.slice(0, 2)).toEqual(['llvm.mlir.addressof', 'llvm.load']);
      const calls = created.filter(op => op.name === 'llvm.call');
      expect(calls).toHaveLength(3);
      expect(calls.every(op => op.attrs.callee === 'aer_state_configure')).toBe(true);

      const hoisted = result?.hoisted ?? [];
      expect(hoisted.map(g => g.attrs.value)).toEqual([
        { kind: 'string', value: 'method' },
        { kind: 'string', value: 'statevector' },
        { kind: 'string', value: 'device' },
        { kind: 'string', value: 'GPU' },
        { kind: 'string', value: 'precision' },
        { kind: 'string', value: 'single' },
      ]);
      expect(hoisted[0].attrs.sym_name).toBe('sim_conf_method_key_0');
      expect(hoisted[3].attrs.sym_name).toBe('sim_conf_device_value_3');

      // Each call reads its key and value through their globals
      const [, key, value] = calls[1].operands;
      expect(key.definingOp?.attrs.global_name).toBe(hoisted[2].attrs.sym_name);
      expect(value.definingOp?.attrs.global_name).toBe(hoisted[3].attrs.sym_name);
    });
  });

  describe('qcs.finalize', () => {
    it('should call the finalize entry point with the loaded handle', () => {
      const { ctx } = setup();
      const { result, names, created } = rewrite(FinalizeLowering, new Operation('qcs.finalize'), [], ctx);
      expect(names).toEqual(['llvm.mlir.addressof', 'llvm.load', 'llvm.call']);
      expect(created[2].attrs.callee).toBe('aer_state_finalize');
      expect(created[2].operands[0]).toBe(created[1].result);
      expect(result?.replacements).toEqual([]);
    });
  });

  describe('quir.declare_qubit', () => {
    it('should allocate one qubit and replace the declaration', () => {
      const { ctx } = setup();
      const decl = new Operation('quir.declare_qubit', { resultTypes: [qubitType()], attrs: { id: 0 } });
      const { result, created, names } = rewrite(DeclareQubitLowering, decl, [], ctx);

      expect(names).toEqual(['arith.constant', 'llvm.mlir.addressof', 'llvm.load', 'llvm.call']);
      expect(created[0].attrs.value).toEqual({ kind: 'int', value: 1, width: 64 });
      expect(created[3].attrs.callee).toBe('aer_allocate_qubits');
      expect(result?.replacements).toEqual([created[3].result]);
    });

    it('should refuse multi-qubit declarations', () => {
      const { ctx } = setup();
      const decl = new Operation('quir.declare_qubit', { resultTypes: [qubitType(2)], attrs: { id: 4 } });
      expect(() => rewrite(DeclareQubitLowering, decl, [], ctx)).toThrow(
        'Only single qubit declarations are supported (qubit 4 has width 2)'
      );
    });
  });

  describe('gates', () => {
    it('should pass the handle and the operands positionally', () => {
      const { ctx, physical } = setup();
      const operands = [physical(I64), physical(f64Type()), physical(f64Type()), physical(f64Type())];
      const { result, created } = rewrite(BuiltinULowering, new Operation('quir.builtin_U'), operands, ctx);

      const call = created[created.length - 1];
      expect(call.attrs.callee).toBe('aer_apply_u3');
      expect(call.operands.slice(1)).toEqual(operands);
      expect(result?.replacements).toEqual([]);
    });

    it('should lower two-qubit gates', () => {
      const { ctx, physical } = setup();
      const operands = [physical(I64), physical(I64)];
      const { created } = rewrite(BuiltinCXLowering, new Operation('quir.builtin_CX'), operands, ctx);
      expect(created.map(o => o.attrs.callee ?? o.name)).toEqual(['llvm.mlir.addressof', 'llvm.load', 'aer_apply_cx']);
    });

    it('should not match while operands are still abstract', () => {
      const { ctx, physical } = setup();
      const { result } = rewrite(BuiltinCXLowering, new Operation('quir.builtin_CX'), [physical(qubitType()), physical(I64)], ctx);
      expect(result).toBeNull();
    });
  });

  describe('quir.measure', () => {
    it('should go through the scratch buffer and truncate to one bit', () => {
      const { ctx, physical } = setup();
      const qubit = physical(I64);
      const op = new Operation('quir.measure', { resultTypes: [cbitType(1)] });
      const { result, created, names } = rewrite(MeasureLowering, op, [qubit], ctx);

      expect(names).toEqual(['llvm.store', 'arith.constant', 'llvm.mlir.addressof', 'llvm.load', 'llvm.call', 'arith.trunci']);
      expect(created[0].operands[0]).toBe(qubit);
      expect(created[0].operands[1]).toBe(ctx.buffer.pointer);
      expect(created[4].attrs.callee).toBe('aer_apply_measure');
      expect(created[4].operands[1]).toBe(ctx.buffer.pointer);
      expect(created[4].operands[2]).toBe(created[1].result);
      expect(created[5].result?.type).toEqual(intType(1));
      expect(result?.replacements).toEqual([created[5].result]);
    });

    it('should refuse multi-qubit measurements', () => {
      const { ctx, physical } = setup();
      const op = new Operation('quir.measure', { resultTypes: [cbitType(1), cbitType(1)] });
      expect(() => rewrite(MeasureLowering, op, [physical(I64), physical(I64)], ctx)).toThrow(
        'Only single qubit measurements are supported (got 2 qubits)'
      );
    });
  });

  describe('quir.constant', () => {
    it('should turn angles into float constants', () => {
      const { ctx } = setup();
      const op = new Operation('quir.constant', {
        resultTypes: [angleType(64)],
        attrs: { value: { kind: 'angle', value: 0.25, width: 64 } },
      });
      const { result, created } = rewrite(ConstantLowering, op, [], ctx);
      expect(created).toHaveLength(1);
      expect(created[0].attrs.value).toEqual({ kind: 'float', value: 0.25 });
      expect(created[0].result?.type).toEqual(f64Type());
      expect(result?.replacements).toEqual([created[0].result]);
    });

    it('should drop durations', () => {
      const { ctx } = setup();
      const op = new Operation('quir.constant', {
        resultTypes: [durationType()],
        attrs: { value: { kind: 'duration', value: 10, unit: 'dt' } },
      });
      const { result, created } = rewrite(ConstantLowering, op, [], ctx);
      expect(created).toHaveLength(0);
      expect(result?.replacements).toEqual([undefined]);
    });

    it('should not match angles with no width', () => {
      vi.spyOn(console, 'warn').mockImplementation(() => { });
      const { ctx } = setup();
      const op = new Operation('quir.constant', {
        resultTypes: [angleType()],
        attrs: { value: { kind: 'angle', value: 1 } },
      });
      expect(rewrite(ConstantLowering, op, [], ctx).result).toBeNull();
      expect(ctx.converter.diagnostics.map(d => d.message)).toEqual(['Cannot lower an angle with no width!']);
    });
  });

  describe('oq3.cast', () => {
    const cast = (to: IRType) => new Operation('oq3.cast', { resultTypes: [to] });

    it('should fold casts whose types already agree', () => {
      const { ctx, physical } = setup();
      const input = physical(f64Type());
      const { result, created } = rewrite(CastLowering, cast(angleType(64)), [input], ctx);
      expect(created).toHaveLength(0);
      expect(result?.replacements).toEqual([input]);
    });

    it('should pick the arithmetic conversion', () => {
      const { ctx, physical } = setup();
      expect(rewrite(CastLowering, cast(cbitType(1)), [physical(intType(8))], ctx).names).toEqual(['arith.trunci']);
      expect(rewrite(CastLowering, cast(cbitType(16)), [physical(intType(8))], ctx).names).toEqual(['arith.extui']);
      expect(rewrite(CastLowering, cast(angleType(32)), [physical(intType(4))], ctx).names).toEqual(['arith.uitofp']);
      expect(rewrite(CastLowering, cast(cbitType(4)), [physical(f64Type())], ctx).names).toEqual(['arith.fptosi']);
    });

    it('should read a measured bit as an unsigned value when casting to an angle', () => {
      const { ctx, physical } = setup();
      const bit = physical(intType(1));
      const { result, created } = rewrite(CastLowering, cast(angleType(64)), [bit], ctx);
      expect(created.map(o => o.name)).toEqual(['arith.uitofp']);
      expect(created[0].operands[0]).toBe(bit);
      expect(created[0].result?.type).toEqual(f64Type());
      expect(result?.replacements).toEqual([created[0].result]);
    });

    it('should not match unconvertible result types', () => {
      vi.spyOn(console, 'warn').mockImplementation(() => { });
      const { ctx, physical } = setup();
      expect(rewrite(CastLowering, cast(cbitType(128)), [physical(intType(8))], ctx).result).toBeNull();
    });
  });

  describe('oq3.cbit_extractbit', () => {
    it('should shift and truncate', () => {
      const { ctx, physical } = setup();
      const register = physical(intType(4));
      const op = new Operation('oq3.cbit_extractbit', { resultTypes: [cbitType(1)], attrs: { index: 2 } });
      const { result, created, names } = rewrite(ExtractBitLowering, op, [register], ctx);

      expect(names).toEqual(['arith.constant', 'arith.shrui', 'arith.trunci']);
      expect(created[0].attrs.value).toEqual({ kind: 'int', value: 2, width: 4 });
      expect(created[1].operands[0]).toBe(register);
      expect(result?.replacements).toEqual([created[2].result]);
    });

    it('should fold single-bit registers and reject out-of-range bits', () => {
      const { ctx, physical } = setup();
      const bit = physical(intType(1));
      const op = new Operation('oq3.cbit_extractbit', { resultTypes: [cbitType(1)], attrs: { index: 0 } });
      expect(rewrite(ExtractBitLowering, op, [bit], ctx).result?.replacements).toEqual([bit]);

      const outOfRange = new Operation('oq3.cbit_extractbit', { resultTypes: [cbitType(1)], attrs: { index: 8 } });
      expect(rewrite(ExtractBitLowering, outOfRange, [physical(intType(4))], ctx).result).toBeNull();
    });
  });

  describe('functions', () => {
    it('should erase only non-entry functions', () => {
      const { ctx, main, helper } = setup();
      expect(rewrite(FunctionErasure, helper, [], ctx).result).toEqual({ replacements: [] });
      expect(rewrite(FunctionErasure, main, [], ctx).result).toBeNull();
    });

    it('should rebuild the entry function with a converted signature', () => {
      const { ctx, main } = setup();
      const { result, created } = rewrite(EntrySignatureConversion, main, [], ctx);

      expect(created).toHaveLength(1);
      expect(created[0].attrs.sym_name).toBe('main');
      expect(created[0].attrs.function_type).toEqual({ inputs: [I64], results: [intType(1)] });
      expect(created[0].regions).toHaveLength(1);
      expect(result?.adoptRegions?.into).toBe(created[0]);
      expect(result?.adoptRegions?.entryArgTypes).toEqual([I64]);
    });
  });

  it('should register one pattern per lowered op kind', () => {
    const roots = populateSimulatorPatterns().map(p => p.root);
    expect(new Set(roots)).toEqual(new Set([
      'qcs.init', 'qcs.shot_init', 'qcs.synchronize', 'qcs.finalize',
      'quir.declare_qubit', 'quir.builtin_U', 'quir.builtin_CX', 'quir.measure', 'quir.constant',
      'quir.barrier', 'quir.delay', 'quir.call_gate',
      'oq3.cast', 'oq3.cbit_extractbit', 'func.func',
    ]));
    expect(roots.filter(r => r === 'func.func')).toHaveLength(2);
    expect(roots).not.toContain('quir.switch');
  });
});
