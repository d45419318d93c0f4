import { Operation } from './graph';
import type { FunctionType } from './types';

export const DEFAULT_ENTRY_POINT = 'main';

/** The single block of a module (or any single-region op). */
export function bodyBlock(op: Operation) {
  const block = op.regions[0]?.entryBlock;
  if (!block) throw new Error(`'${op.name}' has no body block`);
  return block;
}

/**
 * Returns the designated entry function of a module: the `func.func` named
 * by the module's `entry_point` attribute, or `main` when unset.
 */
export function getEntryFunction(module: Operation): Operation {
  const name = module.attrs.entry_point ?? DEFAULT_ENTRY_POINT;
  const entry = bodyBlock(module).operations.find(op => op.name === 'func.func' && op.attrs.sym_name === name);
  if (!entry) throw new Error(`Entry point function '${name}' not found`);
  return entry;
}

export const isEntryFunction = (op: Operation): boolean => {
  if (op.name !== 'func.func') return false;
  const module = op.parentOp;
  if (!module || module.name !== 'builtin.module') return false;
  return op.attrs.sym_name === (module.attrs.entry_point ?? DEFAULT_ENTRY_POINT);
};

export function functionTypeOf(op: Operation): FunctionType {
  const type = op.attrs.function_type;
  if (!type) throw new Error(`'${op.name}' @${op.attrs.sym_name ?? '?'} has no function type`);
  return type;
}

/** All ops (the root included) matching `name`, in pre-order. */
export function collectOps(root: Operation, name?: string): Operation[] {
  const ops: Operation[] = [];
  root.walk(op => {
    if (name === undefined || op.name === name) ops.push(op);
  });
  return ops;
}

/**
 * Structural checks on a module after rewriting. Reports live operations
 * that still use values whose producer was erased.
 */
export function verifyModule(module: Operation): string[] {
  const problems: string[] = [];
  module.walk(op => {
    op.operands.forEach((operand, i) => {
      if (operand.isDead()) {
        const producer = operand.definingOp?.name ?? 'block argument';
        problems.push(`'${op.name}' operand #${i} uses a value produced by erased '${producer}'`);
      }
    });
  });
  return problems;
}
