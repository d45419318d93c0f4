import * as fs from 'fs';
import { z } from 'zod';
import type { CircuitDocument, FunctionDoc, OpDoc, Attributes } from './types';
import { AttributesSchema, IRTypeSchema, arityMatches, getOpDef } from './builtin-schemas';
import { Block, Operation, Region, Value } from './graph';

// ------------------------------------------------------------------
// Validation Types
// ------------------------------------------------------------------

export interface ValidationError {
  path: string[];
  message: string;
  code: string;
}

export type ParseResult =
  | { success: true; module: Operation; doc: CircuitDocument }
  | { success: false; errors: ValidationError[] };

// ------------------------------------------------------------------
// Zod Schemas
// ------------------------------------------------------------------

const MetaDataSchema = z.object({
  name: z.string(),
  description: z.string().optional(),
});

const PortDefSchema = z.object({
  id: z.string().min(1),
  type: IRTypeSchema,
});

const OpDocSchema: z.ZodType<OpDoc> = z.lazy(() => z.object({
  op: z.string().min(1),
  operands: z.array(z.string()).optional(),
  results: z.array(PortDefSchema).optional(),
  attrs: AttributesSchema.optional(),
  regions: z.array(z.array(OpDocSchema)).optional(),
  comment: z.string().optional(),
}));

const FunctionDocSchema = z.object({
  id: z.string().min(1),
  inputs: z.array(PortDefSchema),
  outputs: z.array(IRTypeSchema),
  body: z.array(OpDocSchema),
  comment: z.string().optional(),
});

export const CircuitDocumentSchema = z.object({
  version: z.string(),
  meta: MetaDataSchema,
  entryPoint: z.string(),
  functions: z.array(FunctionDocSchema),
});

// ------------------------------------------------------------------
// Builder
// ------------------------------------------------------------------

type Scope = Map<string, Value>;

class ModuleBuilder {
  readonly errors: ValidationError[] = [];
  private readonly qubitIds = new Map<number, string>();

  buildFunction(func: FunctionDoc, path: string[]): Operation {
    const op = new Operation('func.func', {
      regions: 1,
      attrs: {
        sym_name: func.id,
        function_type: { inputs: func.inputs.map(i => i.type), results: func.outputs },
      },
    });
    const block = op.regions[0].appendBlock(new Block(func.inputs.map(i => i.type)));
    const scope: Scope = new Map();
    func.inputs.forEach((input, i) => this.define(scope, input.id, block.arguments[i], [...path, 'inputs', i.toString(), 'id']));
    this.buildBlock(func.body, block, scope, [...path, 'body']);
    return op;
  }

  private buildBlock(docs: OpDoc[], block: Block, scope: Scope, path: string[]) {
    docs.forEach((doc, i) => {
      const op = this.buildOp(doc, scope, [...path, i.toString()]);
      if (op) block.push(op);
    });
  }

  private buildOp(doc: OpDoc, scope: Scope, path: string[]): Operation | undefined {
    const def = getOpDef(doc.op);
    if (!def) {
      this.error(path.concat('op'), `Unknown operation '${doc.op}'.`, 'unknown_op');
      return undefined;
    }
    if (doc.op === 'builtin.module' || doc.op === 'func.func') {
      this.error(path.concat('op'), `'${doc.op}' cannot appear inside a function body.`, 'semantic_error');
      return undefined;
    }

    const operandNames = doc.operands ?? [];
    const results = doc.results ?? [];
    const regions = doc.regions ?? [];
    let ok = true;

    if (!arityMatches(def.operands, operandNames.length)) {
      ok = this.error(path.concat('operands'), `'${doc.op}' expects ${def.operands} operands, got ${operandNames.length}.`, 'arity');
    }
    if (!arityMatches(def.results, results.length)) {
      ok = this.error(path.concat('results'), `'${doc.op}' expects ${def.results} results, got ${results.length}.`, 'arity');
    }
    if (!arityMatches(def.regions ?? 0, regions.length)) {
      ok = this.error(path.concat('regions'), `'${doc.op}' expects ${def.regions ?? 0} regions, got ${regions.length}.`, 'arity');
    }
    if (def.attrs) {
      const checked = def.attrs.safeParse(doc.attrs ?? {});
      if (!checked.success) {
        checked.error.issues.forEach(issue => {
          ok = this.error([...path, 'attrs', ...issue.path.map(String)], issue.message, issue.code);
        });
      }
    }

    const operands: Value[] = [];
    operandNames.forEach((name, i) => {
      const value = scope.get(name);
      if (!value) {
        ok = this.error([...path, 'operands', i.toString()], `Operand '${name}' is not defined before use.`, 'undefined_value');
      } else {
        operands.push(value);
      }
    });

    if (doc.op === 'quir.declare_qubit' && doc.attrs?.id !== undefined) {
      const previous = this.qubitIds.get(doc.attrs.id);
      if (previous) {
        ok = this.error([...path, 'attrs', 'id'], `Qubit id ${doc.attrs.id} is already declared by '${previous}'.`, 'duplicate_qubit');
      } else {
        this.qubitIds.set(doc.attrs.id, results[0]?.id ?? `#${doc.attrs.id}`);
      }
    }

    if (!ok) return undefined;

    const attrs: Attributes = doc.attrs ?? {};
    const op = new Operation(doc.op, {
      operands,
      resultTypes: results.map(r => r.type),
      attrs,
      regions: regions.length,
    });
    results.forEach((r, i) => this.define(scope, r.id, op.results[i], [...path, 'results', i.toString(), 'id']));
    regions.forEach((ops, i) => {
      const region: Region = op.regions[i];
      const block = region.appendBlock(new Block());
      // Values defined inside a region stay local to it.
      this.buildBlock(ops, block, new Map(scope), [...path, 'regions', i.toString()]);
    });
    return op;
  }

  private define(scope: Scope, name: string, value: Value, path: string[]) {
    if (scope.has(name)) {
      this.error(path, `Value '${name}' is defined more than once.`, 'duplicate_value');
      return;
    }
    scope.set(name, value);
  }

  private error(path: string[], message: string, code: string): false {
    this.errors.push({ path, message, code });
    return false;
  }
}

// ------------------------------------------------------------------
// Parser
// ------------------------------------------------------------------

/**
 * Validates a circuit document and builds its module.
 *
 * 1. Structural validation (zod).
 * 2. Semantic validation while building: known op kinds, arity, required
 *    attributes, SSA names, unique function ids and qubit ids, entry point.
 */
export function parseCircuit(json: unknown): ParseResult {
  const result = CircuitDocumentSchema.safeParse(json);

  if (!result.success) {
    const errors: ValidationError[] = result.error.issues.map(err => ({
      path: err.path.map(String),
      message: err.message,
      code: err.code
    }));
    return { success: false, errors };
  }

  const doc: CircuitDocument = result.data;
  const builder = new ModuleBuilder();
  const functionIds = new Set<string>();

  const module = new Operation('builtin.module', { regions: 1, attrs: { entry_point: doc.entryPoint } });
  const body = module.regions[0].appendBlock(new Block());

  doc.functions.forEach((func, fIdx) => {
    const path = ['functions', fIdx.toString()];
    if (functionIds.has(func.id)) {
      builder.errors.push({
        path: [...path, 'id'],
        message: `Duplicate Function ID '${func.id}'.`,
        code: 'semantic_error'
      });
      return;
    }
    functionIds.add(func.id);
    body.push(builder.buildFunction(func, path));
  });

  if (!functionIds.has(doc.entryPoint)) {
    builder.errors.push({
      path: ['entryPoint'],
      message: `Entry Point function '${doc.entryPoint}' not found.`,
      code: 'semantic_error'
    });
  }

  if (builder.errors.length > 0) {
    return { success: false, errors: builder.errors };
  }
  return { success: true, module, doc };
}

/** Reads and validates a circuit document from a JSON file. */
export function loadCircuit(file: string): ParseResult {
  const raw = fs.readFileSync(file, 'utf-8');
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (e) {
    throw new Error(`Circuit '${file}' is not valid JSON: ${e instanceof Error ? e.message : String(e)}`);
  }
  return parseCircuit(json);
}
