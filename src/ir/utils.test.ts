import { describe, it, expect } from 'vitest';
import { Block, OpBuilder, Operation, cloneOperation } from './graph';
import { intType, qubitType } from './types';
import { bodyBlock, collectOps, getEntryFunction, isEntryFunction, verifyModule } from './utils';

const moduleWith = (entryPoint: string | undefined, names: string[]) => {
  const module = new Operation('builtin.module', { regions: 1, attrs: entryPoint ? { entry_point: entryPoint } : {} });
  const body = OpBuilder.atBlockEnd(module.regions[0].appendBlock(new Block()));
  const funcs = names.map(name => {
    const fn = body.create('func.func', { regions: 1, attrs: { sym_name: name, function_type: { inputs: [], results: [] } } });
    fn.regions[0].appendBlock(new Block());
    return fn;
  });
  return { module, funcs };
};

describe('IR utils', () => {
  describe('getEntryFunction', () => {
    it('should find the function named by the module', () => {
      const { module, funcs } = moduleWith('run', ['helper', 'run']);
      expect(getEntryFunction(module)).toBe(funcs[1]);
      expect(isEntryFunction(funcs[1])).toBe(true);
      expect(isEntryFunction(funcs[0])).toBe(false);
    });

    it('should default to main', () => {
      const { module, funcs } = moduleWith(undefined, ['main']);
      expect(getEntryFunction(module)).toBe(funcs[0]);
    });

    it('should throw when the entry function is missing', () => {
      const { module } = moduleWith('run', ['helper']);
      expect(() => getEntryFunction(module)).toThrow("Entry point function 'run' not found");
    });

    it('should not treat detached functions as entries', () => {
      const fn = new Operation('func.func', { regions: 1, attrs: { sym_name: 'main' } });
      expect(isEntryFunction(fn)).toBe(false);
    });
  });

  describe('collectOps', () => {
    it('should collect nested ops in pre-order', () => {
      const { module, funcs } = moduleWith('main', ['main']);
      const b = OpBuilder.atBlockEnd(bodyBlock(funcs[0]));
      const outer = b.create('scf.if', { regions: 1 });
      const inner = OpBuilder.atBlockEnd(outer.regions[0].appendBlock(new Block())).create('arith.constant');
      const tail = b.create('arith.constant');

      expect(collectOps(module, 'arith.constant')).toEqual([inner, tail]);
      expect(collectOps(funcs[0]).map(op => op.name)).toEqual(['func.func', 'scf.if', 'arith.constant', 'arith.constant']);
    });
  });

  describe('verifyModule', () => {
    it('should report uses of erased values', () => {
      const { module, funcs } = moduleWith('main', ['main']);
      const b = OpBuilder.atBlockEnd(bodyBlock(funcs[0]));
      const decl = b.create('quir.declare_qubit', { resultTypes: [qubitType()], attrs: { id: 0 } });
      b.create('func.return', { operands: decl.results });
      expect(verifyModule(module)).toEqual([]);

      decl.erase();
      expect(verifyModule(module)).toEqual(["'func.return' operand #0 uses a value produced by erased 'quir.declare_qubit'"]);
    });
  });

  describe('cloneOperation', () => {
    it('should copy the tree and remap internal values', () => {
      const { module, funcs } = moduleWith('main', ['main']);
      const b = OpBuilder.atBlockEnd(bodyBlock(funcs[0]));
      const c = b.value('arith.constant', { resultTypes: [intType(64)], attrs: { value: { kind: 'int', value: 7, width: 64 } } });
      b.create('func.return', { operands: [c] });

      const copy = cloneOperation(module);
      const ops = bodyBlock(getEntryFunction(copy)).operations;
      expect(ops.map(op => op.name)).toEqual(['arith.constant', 'func.return']);
      expect(ops[1].operands[0]).toBe(ops[0].result);
      expect(ops[0].result).not.toBe(c);

      // Attributes are copied, not shared
      ops[0].attrs.value = { kind: 'int', value: 8, width: 64 };
      expect(c.definingOp?.attrs.value).toEqual({ kind: 'int', value: 7, width: 64 });
      expect(c.uses).toHaveLength(1);
    });
  });
});
