import { OpBuilder, Operation, Value } from '../../ir/graph';
import { TARGET_DIALECTS } from '../../ir/builtin-schemas';
import { typesEqual } from '../../ir/types';
import { bodyBlock, isEntryFunction } from '../../ir/utils';
import type { LoweringContext, RewritePattern, RewriteResult } from './patterns';
import { SimulatorTypeConverter } from './type-converter';

const isLoweringDebugEnabled = () => {
  try {
    return typeof process !== 'undefined' && !!process.env && !!process.env.LOWERING_DEBUG;
  } catch (e) {
    return false;
  }
};

export const debugLog = (...args: unknown[]) => {
  if (isLoweringDebugEnabled()) console.log('[Lowering]', ...args);
};

// ------------------------------------------------------------------
// Legality
// ------------------------------------------------------------------

/**
 * Decides which ops may remain in the output. Target dialects are legal;
 * `func.func` additionally needs a legal signature and must be the entry
 * function. Everything else (the qcs, oq3 and quir layers) is illegal.
 */
export class ConversionTarget {
  private readonly legalDialects: ReadonlySet<string>;

  constructor(private readonly converter: SimulatorTypeConverter, dialects: readonly string[] = TARGET_DIALECTS) {
    this.legalDialects = new Set(dialects);
  }

  isLegal(op: Operation): boolean {
    if (op.name === 'func.func') {
      const type = op.attrs.function_type;
      return !!type && isEntryFunction(op) && this.converter.isSignatureLegal(type);
    }
    return this.legalDialects.has(op.dialect);
  }

  /** Illegal ops under `root`, in program (pre-order) order. */
  illegalOps(root: Operation): Operation[] {
    const out: Operation[] = [];
    root.walk(op => {
      if (op !== root && !this.isLegal(op)) out.push(op);
    });
    return out;
  }
}

// ------------------------------------------------------------------
// Driver
// ------------------------------------------------------------------

export interface ConversionStats {
  /** Sweeps over the illegal set. */
  iterations: number;
  rewrites: number;
  materializations: number;
  /** Successful applications per pattern name. */
  patterns: Record<string, number>;
}

export type ConversionOutcome =
  | { success: true; stats: ConversionStats }
  | { success: false; stats: ConversionStats; illegal: Operation[]; reason: string };

export interface ConversionOptions {
  maxIterations?: number;
}

export const DEFAULT_MAX_ITERATIONS = 32;

/**
 * Rewrites illegal ops until none remain. Each sweep visits the ops that
 * were illegal when it started, in program order, and applies the first
 * matching pattern by descending benefit. Fails when a sweep changes
 * nothing or the iteration limit is reached.
 */
export class ConversionDriver {
  private readonly patterns = new Map<string, RewritePattern[]>();
  private readonly materialized = new Set<Operation>();
  private readonly stats: ConversionStats = { iterations: 0, rewrites: 0, materializations: 0, patterns: {} };

  constructor(
    private readonly module: Operation,
    patterns: RewritePattern[],
    private readonly target: ConversionTarget,
    private readonly ctx: LoweringContext
  ) {
    for (const pattern of patterns) {
      const list = this.patterns.get(pattern.root) ?? [];
      list.push(pattern);
      this.patterns.set(pattern.root, list);
    }
    // Stable, so equal benefits keep registration order
    for (const list of this.patterns.values()) list.sort((a, b) => b.benefit - a.benefit);
  }

  run(options: ConversionOptions = {}): ConversionOutcome {
    const maxIterations = options.maxIterations ?? DEFAULT_MAX_ITERATIONS;

    for (let i = 0; ; i++) {
      this.eraseDeadMaterializations();
      const illegal = this.target.illegalOps(this.module);
      if (illegal.length === 0) return { success: true, stats: this.stats };
      if (i >= maxIterations) {
        return this.fail(illegal, `did not converge within ${maxIterations} iterations`);
      }

      this.stats.iterations++;
      debugLog(`sweep ${i + 1}: ${illegal.length} illegal ops`);
      const changed = this.sweep(illegal);
      if (!changed) {
        return this.fail(this.target.illegalOps(this.module), 'no pattern applies to the remaining operations');
      }
    }
  }

  private fail(illegal: Operation[], reason: string): ConversionOutcome {
    debugLog(`failed: ${reason}`);
    return { success: false, stats: this.stats, illegal, reason };
  }

  private sweep(illegal: Operation[]): boolean {
    let changed = false;
    for (const op of illegal) {
      if (op.erased || this.target.isLegal(op)) continue;
      if (this.tryRewrite(op)) changed = true;
    }
    return changed;
  }

  private tryRewrite(op: Operation): boolean {
    const candidates = this.patterns.get(op.name) ?? [];
    const operands = op.operands.map(v => this.lookThrough(v));

    for (const pattern of candidates) {
      const builder = OpBuilder.detached();
      const result = pattern.matchAndRewrite(op, operands, builder, this.ctx);
      if (!result) {
        builder.created.forEach(created => created.erase());
        continue;
      }
      this.apply(op, result, builder.created);
      this.stats.rewrites++;
      this.stats.patterns[pattern.name] = (this.stats.patterns[pattern.name] ?? 0) + 1;
      debugLog(`${pattern.name}: rewrote '${op.name}' into ${builder.created.length} ops`);
      return true;
    }
    return false;
  }

  private apply(op: Operation, result: RewriteResult, created: Operation[]) {
    const hoist = OpBuilder.atBlockStart(bodyBlock(this.module));
    for (const global of result.hoisted ?? []) hoist.insert(global);

    const insert = OpBuilder.before(op);
    for (const newOp of created) insert.insert(newOp);

    op.results.forEach((res, i) => {
      const replacement = result.replacements[i];
      // Dropped results keep their uses; the verifier reports any that survive.
      if (replacement) this.replaceValue(op, res, replacement);
    });

    if (result.adoptRegions) {
      const { into, entryArgTypes } = result.adoptRegions;
      into.takeRegionsFrom(op);
      into.regions[0]?.entryBlock?.arguments.forEach((arg, i) => {
        const type = entryArgTypes[i];
        if (type) arg.type = type;
      });
    }

    op.erase();
  }

  /**
   * Legal consumers take the physical value directly; consumers still
   * waiting for conversion get a materialization of the original type.
   */
  private replaceValue(op: Operation, from: Value, to: Value) {
    if (typesEqual(from.type, to.type)) {
      from.replaceAllUsesWith(to);
      return;
    }

    let bridge: Value | undefined;
    for (const use of from.uses) {
      if (this.target.isLegal(use.owner)) {
        use.set(to);
        continue;
      }
      if (!bridge) {
        bridge = this.ctx.converter.materializeSource(OpBuilder.before(op), from.type, to) ?? to;
        const producer = bridge.definingOp;
        if (bridge !== to && producer) {
          this.materialized.add(producer);
          this.stats.materializations++;
        }
      }
      use.set(bridge);
    }
  }

  private lookThrough(value: Value): Value {
    const producer = value.definingOp;
    if (!producer || !this.materialized.has(producer)) return value;
    return producer.operands[0] ?? value;
  }

  private eraseDeadMaterializations() {
    for (const op of [...this.materialized]) {
      if (op.erased) {
        this.materialized.delete(op);
      } else if (!op.results.some(r => r.hasUses())) {
        op.erase();
        this.materialized.delete(op);
      }
    }
  }
}

export function applyConversion(
  module: Operation,
  patterns: RewritePattern[],
  target: ConversionTarget,
  ctx: LoweringContext,
  options: ConversionOptions = {}
): ConversionOutcome {
  return new ConversionDriver(module, patterns, target, ctx).run(options);
}
