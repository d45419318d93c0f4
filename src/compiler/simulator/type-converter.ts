import { OpBuilder, Value } from '../../ir/graph';
import { type FunctionType, type IRType, f64Type, intType, isPhysicalType, typesEqual } from '../../ir/types';

export interface LoweringDiagnostic {
  opName?: string;
  message: string;
  severity: 'error' | 'warning';
}

/**
 * A conversion rule. Returns the converted type, `null` when the type is
 * recognised but has no legal conversion, or `undefined` to let the next
 * rule try.
 */
export type TypeConversion = (t: IRType, report: (message: string) => void) => IRType | null | undefined;

/**
 * Rebuilds an abstract-typed value from its physical form, for consumers
 * that have not been converted yet.
 */
export type SourceMaterialization = (builder: OpBuilder, type: IRType, value: Value) => Value | undefined;

const MAX_CBIT_WIDTH = 64;

const convertQubitType: TypeConversion = t => (t.kind === 'qubit' ? intType(64) : undefined);

const convertCBitType: TypeConversion = (t, report) => {
  if (t.kind !== 'cbit') return undefined;
  if (t.width <= MAX_CBIT_WIDTH) return intType(t.width);
  report(`Classical bit width ${t.width} exceeds ${MAX_CBIT_WIDTH} bits`);
  return null;
};

const convertAngleType: TypeConversion = (t, report) => {
  if (t.kind !== 'angle') return undefined;
  if (t.width === undefined) {
    report('Cannot lower an angle with no width!');
    return null;
  }
  return f64Type();
};

// Physical values must map to themselves so function signatures built from
// them stay legal across repeated passes. Pointers count only when their
// pointee does.
const keepPhysicalType: TypeConversion = t => (isPhysicalType(t) ? t : undefined);

const convertDurationType: TypeConversion = t => (t.kind === 'duration' ? intType(64) : undefined);

const identityMaterialization: SourceMaterialization = (_builder, type, value) =>
  type.kind === 'qubit' || type.kind === 'duration' ? value : undefined;

const angleMaterialization: SourceMaterialization = (builder, type, value) => {
  if (type.kind !== 'angle') return undefined;
  return builder.value('oq3.cast', { operands: [value], resultTypes: [type] });
};

/**
 * Maps source-layer types onto the simulator's physical types.
 * Rules run in registration order; the first one that answers wins.
 */
export class SimulatorTypeConverter {
  readonly diagnostics: LoweringDiagnostic[] = [];
  private readonly conversions: TypeConversion[] = [];
  private readonly materializations: SourceMaterialization[] = [];

  constructor() {
    this.addConversion(convertQubitType);
    this.addConversion(convertCBitType);
    this.addConversion(convertAngleType);
    this.addConversion(keepPhysicalType);
    this.addConversion(convertDurationType);
    this.addSourceMaterialization(identityMaterialization);
    this.addSourceMaterialization(angleMaterialization);
  }

  addConversion(fn: TypeConversion) {
    this.conversions.push(fn);
  }

  addSourceMaterialization(fn: SourceMaterialization) {
    this.materializations.push(fn);
  }

  convertType(t: IRType): IRType | undefined {
    const report = (message: string) => this.report(message);
    for (const fn of this.conversions) {
      const res = fn(t, report);
      if (res === null) return undefined;
      if (res !== undefined) return res;
    }
    return undefined;
  }

  /** Converts every type, or returns undefined if any of them fails. */
  convertTypes(types: IRType[]): IRType[] | undefined {
    const out: IRType[] = [];
    for (const t of types) {
      const converted = this.convertType(t);
      if (!converted) return undefined;
      out.push(converted);
    }
    return out;
  }

  isLegal(t: IRType): boolean {
    const converted = this.convertType(t);
    return converted !== undefined && typesEqual(converted, t);
  }

  isSignatureLegal(fn: FunctionType): boolean {
    return fn.inputs.every(t => this.isLegal(t)) && fn.results.every(t => this.isLegal(t));
  }

  convertSignature(fn: FunctionType): FunctionType | undefined {
    const inputs = this.convertTypes(fn.inputs);
    const results = this.convertTypes(fn.results);
    if (!inputs || !results) return undefined;
    return { ...fn, inputs, results };
  }

  materializeSource(builder: OpBuilder, type: IRType, value: Value): Value | undefined {
    for (const fn of this.materializations) {
      const res = fn(builder, type, value);
      if (res) return res;
    }
    return undefined;
  }

  private report(message: string) {
    if (this.diagnostics.some(d => d.message === message)) return;
    console.warn(`[TypeConverter] ${message}`);
    this.diagnostics.push({ message, severity: 'error' });
  }
}
