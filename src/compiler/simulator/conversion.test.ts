import { describe, it, expect } from 'vitest';
import { TARGET_DIALECTS } from '../../ir/builtin-schemas';
import { Block, OpBuilder, Operation, Value } from '../../ir/graph';
import { angleType, f64Type, intType, qubitType } from '../../ir/types';
import { bodyBlock } from '../../ir/utils';
import { DEFAULT_SIMULATOR_CONFIG } from './config';
import { ConversionTarget, applyConversion } from './conversion';
import { ConstantLowering, type LoweringContext, type RewritePattern } from './patterns';
import { declareRuntimeFunctions } from './runtime-functions';
import { allocateMeasurementBuffer, createSimulatorState } from './state';
import { SimulatorTypeConverter } from './type-converter';

const setup = () => {
  const module = new Operation('builtin.module', { regions: 1, attrs: { entry_point: 'main' } });
  module.regions[0].appendBlock(new Block());
  const main = OpBuilder.atBlockEnd(bodyBlock(module)).create('func.func', {
    regions: 1,
    attrs: { sym_name: 'main', function_type: { inputs: [], results: [] } },
  });
  main.regions[0].appendBlock(new Block());

  const table = declareRuntimeFunctions(module);
  const converter = new SimulatorTypeConverter();
  const ctx: LoweringContext = {
    table,
    state: createSimulatorState(module, main, table),
    buffer: allocateMeasurementBuffer(main, 1),
    converter,
    config: DEFAULT_SIMULATOR_CONFIG,
    uniqueSymbol: prefix => prefix,
  };
  const target = new ConversionTarget(converter);
  return { module, main, body: OpBuilder.atBlockEnd(bodyBlock(main)), ctx, target };
};

const eraser = (root: string, name = `erase-${root}`, benefit = 1): RewritePattern => ({
  name,
  root,
  benefit,
  matchAndRewrite: () => ({ replacements: [] }),
});

const angleConstant = (b: OpBuilder, value: number): Value =>
  b.value('quir.constant', {
    resultTypes: [angleType(64)],
    attrs: { value: { kind: 'angle', value, width: 64 } },
  });

describe('Conversion Driver', () => {
  describe('ConversionTarget', () => {
    it('should classify ops by dialect', () => {
      const { target } = setup();
      expect(target.isLegal(new Operation('arith.constant'))).toBe(true);
      expect(target.isLegal(new Operation('llvm.call'))).toBe(true);
      expect(target.isLegal(new Operation('scf.if'))).toBe(true);
      expect(target.isLegal(new Operation('quir.barrier'))).toBe(false);
      expect(target.isLegal(new Operation('qcs.init'))).toBe(false);
      expect(target.isLegal(new Operation('oq3.cast'))).toBe(false);
    });

    it('should accept exactly the target dialects by default', () => {
      const { target } = setup();
      for (const dialect of TARGET_DIALECTS) {
        expect(target.isLegal(new Operation(`${dialect}.anything`))).toBe(true);
      }
      const narrow = new ConversionTarget(new SimulatorTypeConverter(), ['llvm']);
      expect(narrow.isLegal(new Operation('llvm.call'))).toBe(true);
      expect(narrow.isLegal(new Operation('arith.constant'))).toBe(false);
    });

    it('should only keep the entry function with a legal signature', () => {
      const { module, main, target } = setup();
      expect(target.isLegal(main)).toBe(true);

      const helper = OpBuilder.atBlockEnd(bodyBlock(module)).create('func.func', {
        regions: 1,
        attrs: { sym_name: 'helper', function_type: { inputs: [], results: [] } },
      });
      expect(target.isLegal(helper)).toBe(false);

      main.attrs.function_type = { inputs: [qubitType()], results: [] };
      expect(target.isLegal(main)).toBe(false);
    });

    it('should list illegal ops in program order', () => {
      const { module, body, target } = setup();
      const first = body.create('qcs.init');
      const sw = body.create('quir.switch', { regions: 1 });
      const nested = OpBuilder.atBlockEnd(sw.regions[0].appendBlock(new Block())).create('quir.yield');
      const last = body.create('qcs.finalize');
      expect(target.illegalOps(module)).toEqual([first, sw, nested, last]);
    });
  });

  it('should apply the highest-benefit pattern first', () => {
    const { module, body, ctx, target } = setup();
    body.create('quir.barrier');
    const outcome = applyConversion(
      module,
      [eraser('quir.barrier', 'low', 1), eraser('quir.barrier', 'high', 5)],
      target,
      ctx
    );
    expect(outcome.success).toBe(true);
    expect(outcome.stats.patterns).toEqual({ high: 1 });
    expect(outcome.stats.iterations).toBe(1);
  });

  it('should fail when nothing applies to the remaining ops', () => {
    const { module, body, ctx, target } = setup();
    body.create('quir.barrier');
    const stuck = body.create('quir.delay');
    const outcome = applyConversion(module, [eraser('quir.barrier')], target, ctx);

    expect(outcome.success).toBe(false);
    if (outcome.success) return;
    expect(outcome.reason).toBe('no pattern applies to the remaining operations');
    expect(outcome.illegal).toEqual([stuck]);
    expect(outcome.stats.rewrites).toBe(1);
    expect(outcome.stats.iterations).toBe(2);
  });

  it('should stop after the iteration limit', () => {
    const { module, body, ctx, target } = setup();
    body.create('quir.barrier');
    const regrow: RewritePattern = {
      name: 'regrow',
      root: 'quir.barrier',
      benefit: 1,
      matchAndRewrite: (_op, _operands, builder) => {
        builder.create('quir.barrier');
        return { replacements: [] };
      },
    };
    const outcome = applyConversion(module, [regrow], target, ctx, { maxIterations: 3 });

    expect(outcome.success).toBe(false);
    if (outcome.success) return;
    expect(outcome.reason).toBe('did not converge within 3 iterations');
    expect(outcome.stats.iterations).toBe(3);
    expect(outcome.illegal.map(op => op.name)).toEqual(['quir.barrier']);
  });

  it('should discard the ops of a pattern that does not match', () => {
    const { module, body, ctx, target } = setup();
    const input = body.value('arith.constant', { resultTypes: [intType(64)], attrs: { value: { kind: 'int', value: 3, width: 64 } } });
    body.create('quir.barrier', { operands: [input] });
    const refuse: RewritePattern = {
      name: 'refuse',
      root: 'quir.barrier',
      benefit: 2,
      matchAndRewrite: (_op, operands, builder) => {
        builder.create('arith.trunci', { operands, resultTypes: [intType(1)] });
        return null;
      },
    };
    const outcome = applyConversion(module, [refuse, eraser('quir.barrier')], target, ctx);

    expect(outcome.success).toBe(true);
    expect(input.hasUses()).toBe(false);
    expect(outcome.stats.patterns).toEqual({ 'erase-quir.barrier': 1 });
  });

  describe('value replacement', () => {
    it('should bridge unconverted consumers and look through the bridge', () => {
      const { module, body, ctx, target } = setup();
      const theta = angleConstant(body, 0.5);
      body.create('quir.barrier', { operands: [theta, theta] });

      const seen: Value[][] = [];
      const capture: RewritePattern = {
        name: 'capture',
        root: 'quir.barrier',
        benefit: 1,
        matchAndRewrite: (_op, operands) => {
          seen.push(operands);
          return { replacements: [] };
        },
      };
      const outcome = applyConversion(module, [ConstantLowering, capture], target, ctx);

      expect(outcome.success).toBe(true);
      expect(outcome.stats.materializations).toBe(1);
      expect(seen).toHaveLength(1);
      expect(seen[0][0].type).toEqual(f64Type());
      expect(seen[0][0].definingOp?.name).toBe('arith.constant');
      expect(seen[0][1]).toBe(seen[0][0]);
      // The bridging cast is gone once nothing reads it
      expect(target.illegalOps(module)).toEqual([]);
      expect(bodyBlock(module).operations.some(op => op.nestedOperations().some(n => n.name === 'oq3.cast'))).toBe(false);
    });

    it('should hand legal consumers the physical value', () => {
      const { module, main, body, ctx, target } = setup();
      const theta = angleConstant(body, 1.25);
      const ret = body.create('func.return', { operands: [theta] });
      const outcome = applyConversion(module, [ConstantLowering], target, ctx);

      expect(outcome.success).toBe(true);
      expect(outcome.stats.materializations).toBe(0);
      expect(ret.operands[0].type).toEqual(f64Type());
      expect(ret.operands[0].definingOp?.attrs.value).toEqual({ kind: 'float', value: 1.25 });
      expect(ret.parent).toBe(bodyBlock(main));
    });
  });

  it('should place hoisted ops at module start and new ops before the rewritten one', () => {
    const { module, body, ctx, target } = setup();
    body.create('qcs.init');
    const after = body.create('func.return');
    const pattern: RewritePattern = {
      name: 'hoist',
      root: 'qcs.init',
      benefit: 1,
      matchAndRewrite: (_op, _operands, builder) => {
        builder.create('llvm.mlir.addressof', { resultTypes: [intType(8)], attrs: { global_name: 'g' } });
        return {
          replacements: [],
          hoisted: [new Operation('llvm.mlir.global', { attrs: { sym_name: 'g', type: intType(8) } })],
        };
      },
    };
    expect(applyConversion(module, [pattern], target, ctx).success).toBe(true);

    expect(bodyBlock(module).operations[0].attrs.sym_name).toBe('g');
    const prev = after.getPrevNode();
    expect(prev?.name).toBe('llvm.mlir.addressof');
  });
});
