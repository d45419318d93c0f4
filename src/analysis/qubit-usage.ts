import { Operation, Value } from '../ir/graph';
import { getOpDef, type QubitClaim } from '../ir/builtin-schemas';

/**
 * Qubit usage analysis.
 *
 * Answers "which physical qubits does this operation touch?" so schedulers
 * can tell independent operations apart: two ops with disjoint qubit sets
 * may be reordered or run in parallel. Everything here is read-only and
 * recomputed on demand; results are never cached across rewrites.
 */

export type QubitSet = ReadonlySet<number>;

export const qubitClaim = (op: Operation): QubitClaim | undefined => getOpDef(op.name)?.qubits;

/** True if the op reports qubit usage (a gate, declaration, measurement, switch...). */
export const isQubitOp = (op: Operation): boolean => qubitClaim(op) !== undefined;

/** Id of the declaration a qubit value comes from, if it comes from one. */
export const qubitIdOf = (value: Value): number | undefined => {
  const def = value.definingOp;
  if (!def || def.name !== 'quir.declare_qubit') return undefined;
  return def.attrs.id;
};

const operandQubits = (op: Operation, into: Set<number>) => {
  if (op.name === 'quir.declare_qubit') {
    if (op.attrs.id !== undefined) into.add(op.attrs.id);
    return;
  }
  for (const operand of op.operands) {
    const id = qubitIdOf(operand);
    if (id !== undefined) into.add(id);
  }
};

/**
 * Collects the qubits operated on by `op` and everything nested in it.
 *
 * The outermost op that claims qubits wins: its claim is taken and its
 * regions are not descended further. Ops that claim through their regions
 * are transparent, their content is visited in their place. With
 * `ignoreSelf`, the root's own claim is skipped and only descendants count.
 */
export function operatedQubits(op: Operation, ignoreSelf = false): Set<number> {
  const qubits = new Set<number>();
  const stack: Operation[] = [op];

  for (let cur = stack.pop(); cur; cur = stack.pop()) {
    const claim = ignoreSelf && cur === op ? undefined : qubitClaim(cur);
    if (claim === 'operands') {
      operandQubits(cur, qubits);
      continue;
    }
    for (const region of cur.regions) {
      for (const block of region.blocks) stack.push(...block.operations);
    }
  }
  return qubits;
}

/** First following sibling that reports qubit usage. */
export function nextQubitOp(op: Operation): Operation | undefined {
  for (let next = op.getNextNode(); next; next = next.getNextNode()) {
    if (isQubitOp(next)) return next;
  }
  return undefined;
}

// ------------------------------------------------------------------
// Set algebra
// ------------------------------------------------------------------

const asSet = (x: QubitSet | Operation): QubitSet => (x instanceof Operation ? operatedQubits(x) : x);

export function sharedQubits(first: QubitSet, second: QubitSet): Set<number>;
export function sharedQubits(first: Operation, second: Operation): Set<number>;
export function sharedQubits(first: QubitSet | Operation, second: QubitSet | Operation): Set<number> {
  const a = asSet(first);
  const b = asSet(second);
  const shared = new Set<number>();
  for (const q of a) {
    if (b.has(q)) shared.add(q);
  }
  return shared;
}

export function unionQubits(first: QubitSet, second: QubitSet): Set<number>;
export function unionQubits(first: Operation, second: Operation): Set<number>;
export function unionQubits(first: QubitSet | Operation, second: QubitSet | Operation): Set<number> {
  return new Set([...asSet(first), ...asSet(second)]);
}

export const qubitSetsOverlap = (first: QubitSet, second: QubitSet): boolean =>
  sharedQubits(first, second).size > 0;

export const opsShareQubits = (first: Operation, second: Operation): boolean =>
  sharedQubits(first, second).size > 0;

/**
 * Union of the qubits touched by every op strictly between `first` and
 * `second` in their block.
 *
 * Returns an empty set when `first` does not precede `second` in the same
 * block, so callers must not read an empty result as "nothing in between".
 * Once the ordering check passes, the forward scan always meets `second`;
 * the trailing return only satisfies the compiler.
 */
export function qubitsBetween(first: Operation, second: Operation): Set<number> {
  if (!first.isBeforeInBlock(second)) return new Set();

  const accumulated = new Set<number>();
  for (let cur = first.getNextNode(); cur; cur = cur.getNextNode()) {
    if (cur === second) return accumulated;
    for (const q of operatedQubits(cur)) accumulated.add(q);
  }
  return new Set();
}
