import { OpBuilder, Operation, Value } from '../../ir/graph';
import { ptrType } from '../../ir/types';
import { bodyBlock, collectOps } from '../../ir/utils';
import { HANDLE_TYPE, I64, RuntimeFunctionTable } from './runtime-functions';

export const DEFAULT_STATE_SYMBOL = 'aer_state_handler';

/**
 * The simulator state slot of a compiled unit.
 *
 * One weak global holds the handle returned by `state-create`. Every
 * runtime call reads it through `load()`. The slot is written exactly once,
 * by `initialize()`.
 */
export class SimulatorState {
  private initialized = false;

  constructor(readonly global: Operation) { }

  get symbol(): string {
    const name = this.global.attrs.sym_name;
    if (!name) throw new Error('Simulator state global has no symbol');
    return name;
  }

  get isInitialized(): boolean {
    return this.initialized;
  }

  address(builder: OpBuilder): Value {
    return builder.value('llvm.mlir.addressof', {
      resultTypes: [ptrType(HANDLE_TYPE)],
      attrs: { global_name: this.symbol },
    });
  }

  load(builder: OpBuilder): Value {
    const addr = this.address(builder);
    return builder.value('llvm.load', { operands: [addr], resultTypes: [HANDLE_TYPE], attrs: { alignment: 8 } });
  }

  /** Emits `state-create` immediately followed by the store into the slot. */
  initialize(builder: OpBuilder, table: RuntimeFunctionTable): Value {
    if (this.initialized) throw new Error(`Simulator state '${this.symbol}' is already initialized`);
    const addr = this.address(builder);
    const created = table.call(builder, 'state-create', []).result;
    if (!created) throw new Error('state-create returned no handle');
    builder.create('llvm.store', { operands: [created, addr] });
    this.initialized = true;
    return created;
  }
}

/**
 * Declares the state global at module start and creates the state at the
 * start of the entry function.
 */
export function createSimulatorState(
  module: Operation,
  entry: Operation,
  table: RuntimeFunctionTable,
  symbol = DEFAULT_STATE_SYMBOL
): SimulatorState {
  const global = OpBuilder.atBlockStart(bodyBlock(module)).create('llvm.mlir.global', {
    attrs: { sym_name: symbol, type: HANDLE_TYPE, linkage: 'weak', alignment: 8 },
  });
  const state = new SimulatorState(global);
  state.initialize(OpBuilder.atBlockStart(bodyBlock(entry)), table);
  return state;
}

/** The declaration with the numerically highest qubit id. */
export function findLastQubitDeclaration(module: Operation): Operation | undefined {
  let last: Operation | undefined;
  for (const decl of collectOps(module, 'quir.declare_qubit')) {
    const id = decl.attrs.id ?? -1;
    if (!last || (last.attrs.id ?? -1) < id) last = decl;
  }
  return last;
}

/**
 * Inserts `state-initialize` right after the last qubit declaration.
 * Declarations carry unique ids and the last one has the largest.
 */
export function insertStateInitialize(module: Operation, state: SimulatorState, table: RuntimeFunctionTable): Operation {
  const last = findLastQubitDeclaration(module);
  if (!last) throw new Error('At least one qubit must be declared.');
  const builder = OpBuilder.after(last);
  const handle = state.load(builder);
  return table.call(builder, 'state-initialize', [handle]);
}

// ------------------------------------------------------------------
// Measurement Buffer
// ------------------------------------------------------------------

export interface MeasurementBuffer {
  pointer: Value;
  capacity: number;
}

/** Widest measurement in the unit, and never less than one. */
export function measurementCapacity(module: Operation): number {
  return collectOps(module, 'quir.measure').reduce((max, op) => Math.max(max, op.operands.length), 1);
}

/**
 * Allocates the buffer the runtime's measure entry point reads qubit
 * handles from, once, at the start of the entry function.
 */
export function allocateMeasurementBuffer(entry: Operation, capacity: number): MeasurementBuffer {
  const builder = OpBuilder.atBlockStart(bodyBlock(entry));
  const size = builder.value('arith.constant', {
    resultTypes: [I64],
    attrs: { value: { kind: 'int', value: capacity, width: 64 } },
  });
  const pointer = builder.value('llvm.alloca', {
    operands: [size],
    resultTypes: [ptrType(I64)],
    attrs: { type: I64, alignment: 8 },
  });
  return { pointer, capacity };
}
