import type { Attributes, IRType } from './types';

/**
 * In-memory operation graph.
 *
 * A module is an `Operation` (`builtin.module`) with one region holding one
 * block. Operations own their results and regions; blocks own their
 * arguments and keep their operations in program order. Values track their
 * uses so rewrites can redirect consumers.
 */

// ------------------------------------------------------------------
// Values
// ------------------------------------------------------------------
export class OpOperand {
  constructor(readonly owner: Operation, private current: Value) {
    current.addUse(this);
  }

  get value(): Value {
    return this.current;
  }

  set(next: Value) {
    if (next === this.current) return;
    this.current.removeUse(this);
    this.current = next;
    next.addUse(this);
  }

  drop() {
    this.current.removeUse(this);
  }
}

export class Value {
  private readonly useSet = new Set<OpOperand>();

  constructor(
    public type: IRType,
    readonly owner: Operation | Block,
    readonly index: number
  ) { }

  get definingOp(): Operation | undefined {
    return this.owner instanceof Operation ? this.owner : undefined;
  }

  get uses(): OpOperand[] {
    return [...this.useSet];
  }

  /** Distinct operations consuming this value, in no particular order. */
  get users(): Operation[] {
    return [...new Set(this.uses.map(u => u.owner))];
  }

  hasUses(): boolean {
    return this.useSet.size > 0;
  }

  replaceAllUsesWith(next: Value) {
    for (const use of this.uses) use.set(next);
  }

  /** True when the producer (op or block owner) has been erased. */
  isDead(): boolean {
    if (this.owner instanceof Operation) return this.owner.erased;
    const parent = this.owner.parentOp;
    return parent ? parent.erased : false;
  }

  addUse(use: OpOperand) {
    this.useSet.add(use);
  }

  removeUse(use: OpOperand) {
    this.useSet.delete(use);
  }
}

// ------------------------------------------------------------------
// Operations
// ------------------------------------------------------------------
export interface OperationState {
  operands?: Value[];
  resultTypes?: IRType[];
  attrs?: Attributes;
  regions?: number;
}

export type WalkResult = 'advance' | 'skip' | 'interrupt';

export class Operation {
  readonly results: Value[];
  readonly regions: Region[];
  attrs: Attributes;
  parent?: Block;
  erased = false;
  private operandList: OpOperand[];

  constructor(readonly name: string, state: OperationState = {}) {
    this.operandList = (state.operands ?? []).map(v => new OpOperand(this, v));
    this.results = (state.resultTypes ?? []).map((t, i) => new Value(t, this, i));
    this.attrs = { ...(state.attrs ?? {}) };
    this.regions = Array.from({ length: state.regions ?? 0 }, () => new Region(this));
  }

  get dialect(): string {
    return this.name.split('.')[0];
  }

  get operands(): Value[] {
    return this.operandList.map(o => o.value);
  }

  get operandUses(): readonly OpOperand[] {
    return this.operandList;
  }

  get result(): Value | undefined {
    return this.results[0];
  }

  get parentOp(): Operation | undefined {
    return this.parent?.parentOp;
  }

  setOperands(values: Value[]) {
    this.operandList.forEach(o => o.drop());
    this.operandList = values.map(v => new OpOperand(this, v));
  }

  getNextNode(): Operation | undefined {
    const block = this.parent;
    if (!block) return undefined;
    return block.operations[block.indexOf(this) + 1];
  }

  getPrevNode(): Operation | undefined {
    const block = this.parent;
    if (!block) return undefined;
    const idx = block.indexOf(this);
    return idx > 0 ? block.operations[idx - 1] : undefined;
  }

  /** True if both ops share a block and this one comes strictly first. */
  isBeforeInBlock(other: Operation): boolean {
    const block = this.parent;
    if (!block || block !== other.parent) return false;
    return block.indexOf(this) < block.indexOf(other);
  }

  /** Every operation nested in this one's regions, in pre-order. */
  nestedOperations(): Operation[] {
    const out: Operation[] = [];
    for (const region of this.regions) {
      for (const block of region.blocks) {
        for (const op of block.operations) {
          out.push(op);
          out.push(...op.nestedOperations());
        }
      }
    }
    return out;
  }

  /**
   * Pre-order walk over this op and everything nested in it. 'skip'
   * prevents descending into the current op's regions, 'interrupt' stops.
   */
  walk(callback: (op: Operation) => WalkResult | void): WalkResult {
    const stack: Operation[] = [this];
    for (let op = stack.pop(); op; op = stack.pop()) {
      const res = callback(op) ?? 'advance';
      if (res === 'interrupt') return 'interrupt';
      if (res === 'skip') continue;
      const children: Operation[] = [];
      for (const region of op.regions) {
        for (const block of region.blocks) children.push(...block.operations);
      }
      for (let i = children.length - 1; i >= 0; i--) stack.push(children[i]);
    }
    return 'advance';
  }

  /**
   * Detaches this op from its block and marks it and its nested ops erased.
   * Operand uses are dropped; remaining uses of its results are left for
   * the caller to resolve.
   */
  erase() {
    this.walk(op => {
      op.erased = true;
      op.operandList.forEach(o => o.drop());
    });
    this.parent?.remove(this);
  }

  /** Moves all regions' blocks of `source` into this op's regions, pairwise. */
  takeRegionsFrom(source: Operation) {
    source.regions.forEach((region, i) => {
      const target = this.regions[i];
      if (!target) throw new Error(`'${this.name}' has no region #${i} to take from '${source.name}'`);
      for (const block of region.blocks.splice(0)) target.appendBlock(block);
    });
  }
}

// ------------------------------------------------------------------
// Blocks & Regions
// ------------------------------------------------------------------
export class Block {
  readonly operations: Operation[] = [];
  readonly arguments: Value[] = [];
  parent?: Region;

  constructor(argTypes: IRType[] = []) {
    argTypes.forEach(t => this.addArgument(t));
  }

  get parentOp(): Operation | undefined {
    return this.parent?.parentOp;
  }

  addArgument(type: IRType): Value {
    const arg = new Value(type, this, this.arguments.length);
    this.arguments.push(arg);
    return arg;
  }

  indexOf(op: Operation): number {
    return this.operations.indexOf(op);
  }

  insert(index: number, op: Operation) {
    if (op.parent) op.parent.remove(op);
    this.operations.splice(index, 0, op);
    op.parent = this;
  }

  push(op: Operation) {
    this.insert(this.operations.length, op);
  }

  remove(op: Operation) {
    const idx = this.indexOf(op);
    if (idx >= 0) this.operations.splice(idx, 1);
    op.parent = undefined;
  }
}

export class Region {
  readonly blocks: Block[] = [];

  constructor(readonly parentOp: Operation) { }

  appendBlock(block: Block): Block {
    this.blocks.push(block);
    block.parent = this;
    return block;
  }

  get entryBlock(): Block | undefined {
    return this.blocks[0];
  }
}

// ------------------------------------------------------------------
// Builder
// ------------------------------------------------------------------
/**
 * Creates operations either at an insertion point inside a block or, when
 * detached, into a list the caller places later.
 */
export class OpBuilder {
  readonly created: Operation[] = [];

  private constructor(private block?: Block, private index = 0) { }

  static detached(): OpBuilder {
    return new OpBuilder();
  }

  static atBlockStart(block: Block): OpBuilder {
    return new OpBuilder(block, 0);
  }

  static atBlockEnd(block: Block): OpBuilder {
    return new OpBuilder(block, block.operations.length);
  }

  static before(op: Operation): OpBuilder {
    const block = op.parent;
    if (!block) throw new Error(`Cannot insert before detached op '${op.name}'`);
    return new OpBuilder(block, block.indexOf(op));
  }

  static after(op: Operation): OpBuilder {
    const block = op.parent;
    if (!block) throw new Error(`Cannot insert after detached op '${op.name}'`);
    return new OpBuilder(block, block.indexOf(op) + 1);
  }

  create(name: string, state: OperationState = {}): Operation {
    return this.insert(new Operation(name, state));
  }

  insert(op: Operation): Operation {
    if (this.block) {
      this.block.insert(this.index, op);
      this.index++;
    }
    this.created.push(op);
    return op;
  }

  /** Creates a single-result op and returns the result. */
  value(name: string, state: OperationState): Value {
    const res = this.create(name, state).result;
    if (!res) throw new Error(`'${name}' was built without a result`);
    return res;
  }
}

// ------------------------------------------------------------------
// Cloning
// ------------------------------------------------------------------
export type ValueMapping = Map<Value, Value>;

const cloneBlockInto = (block: Block, target: Region, mapping: ValueMapping) => {
  const copy = target.appendBlock(new Block());
  block.arguments.forEach(arg => mapping.set(arg, copy.addArgument(arg.type)));
  for (const op of block.operations) copy.push(cloneOperation(op, mapping));
};

/**
 * Deep-copies an operation. Operands defined outside the cloned tree keep
 * pointing at the original values unless `mapping` says otherwise.
 */
export function cloneOperation(op: Operation, mapping: ValueMapping = new Map()): Operation {
  const copy = new Operation(op.name, {
    operands: op.operands.map(v => mapping.get(v) ?? v),
    resultTypes: op.results.map(r => r.type),
    attrs: structuredClone(op.attrs),
    regions: op.regions.length,
  });
  op.results.forEach((r, i) => mapping.set(r, copy.results[i]));
  op.regions.forEach((region, i) => {
    for (const block of region.blocks) cloneBlockInto(block, copy.regions[i], mapping);
  });
  return copy;
}
