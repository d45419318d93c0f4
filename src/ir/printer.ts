import { Operation, Value } from './graph';
import { constantValueToString, functionTypeToString, typeToString } from './types';

export interface IRLine {
  op?: Operation; // Op this line opens or represents
  indent: number;
  text: string;
}

class Printer {
  readonly lines: IRLine[] = [];
  private readonly names = new Map<Value, string>();
  private nextId = 0;

  private name(value: Value): string {
    let name = this.names.get(value);
    if (!name) {
      name = `%${this.nextId++}`;
      this.names.set(value, name);
    }
    return name;
  }

  emit(op: Operation, indent: number) {
    if (op.name === 'builtin.module') {
      const entry = op.attrs.entry_point;
      this.lines.push({ op, indent, text: entry ? `module attributes {entry_point = "${entry}"} {` : 'module {' });
      this.emitRegionBody(op, indent + 1);
      this.lines.push({ indent, text: '}' });
      return;
    }

    if (op.name === 'func.func' || op.name === 'llvm.func') {
      this.emitFunction(op, indent);
      return;
    }

    const parts: string[] = [];
    if (op.results.length > 0) {
      parts.push(`${op.results.map(r => this.name(r)).join(', ')} = `);
    }
    parts.push(op.name);

    const symbol = op.attrs.sym_name ?? op.attrs.callee ?? op.attrs.global_name;
    if (symbol !== undefined) parts.push(` @${symbol}`);

    const operands = op.operands.map(v => this.name(v));
    if (op.name === 'llvm.call' || op.name === 'func.call' || op.name === 'quir.call_gate') {
      parts.push(`(${operands.join(', ')})`);
    } else if (operands.length > 0) {
      parts.push(` ${operands.join(', ')}`);
    }

    const dict = this.attrDictionary(op);
    if (dict) parts.push(` ${dict}`);

    if (op.results.length > 0) {
      parts.push(` : ${op.results.map(r => typeToString(r.type)).join(', ')}`);
    }

    if (op.regions.length === 0) {
      this.lines.push({ op, indent, text: parts.join('') });
      return;
    }

    this.lines.push({ op, indent, text: `${parts.join('')} {` });
    op.regions.forEach((region, i) => {
      if (i > 0) this.lines.push({ indent, text: '} {' });
      for (const block of region.blocks) {
        for (const inner of block.operations) this.emit(inner, indent + 1);
      }
    });
    this.lines.push({ indent, text: '}' });
  }

  private emitFunction(op: Operation, indent: number) {
    const type = op.attrs.function_type;
    const sym = op.attrs.sym_name ?? '?';
    const block = op.regions[0]?.entryBlock;

    if (!block) {
      // Declaration only
      const signature = type ? functionTypeToString(type) : '()';
      const linkage = op.attrs.linkage ? ` ${op.attrs.linkage}` : '';
      this.lines.push({ op, indent, text: `${op.name}${linkage} @${sym}${signature}` });
      return;
    }

    const args = block.arguments.map((arg, i) => {
      const name = `%arg${i}`;
      this.names.set(arg, name);
      return `${name}: ${typeToString(arg.type)}`;
    });
    const results = type?.results ?? [];
    const ret = results.length === 0 ? '' : ` -> ${results.length === 1 ? typeToString(results[0]) : `(${results.map(typeToString).join(', ')})`}`;
    this.lines.push({ op, indent, text: `${op.name} @${sym}(${args.join(', ')})${ret} {` });
    this.emitRegionBody(op, indent + 1);
    this.lines.push({ indent, text: '}' });
  }

  private emitRegionBody(op: Operation, indent: number) {
    for (const region of op.regions) {
      for (const block of region.blocks) {
        for (const inner of block.operations) this.emit(inner, indent);
      }
    }
  }

  // sym_name, callee, global_name and function_type are printed in the op head.
  private attrDictionary(op: Operation): string | undefined {
    const entries: string[] = [];
    const { attrs } = op;
    if (attrs.id !== undefined) entries.push(`id = ${attrs.id}`);
    if (attrs.index !== undefined) entries.push(`index = ${attrs.index}`);
    if (attrs.value !== undefined) entries.push(`value = ${constantValueToString(attrs.value)}`);
    if (attrs.type !== undefined) entries.push(`type = ${typeToString(attrs.type)}`);
    if (attrs.linkage !== undefined) entries.push(`linkage = ${attrs.linkage}`);
    if (attrs.alignment !== undefined) entries.push(`alignment = ${attrs.alignment}`);
    return entries.length > 0 ? `{${entries.join(', ')}}` : undefined;
  }
}

/** Renders a module (or any op) as indented lines, one per op head. */
export function printLines(root: Operation): IRLine[] {
  const printer = new Printer();
  printer.emit(root, 0);
  return printer.lines;
}

export function printModule(root: Operation): string {
  return printLines(root).map(l => '  '.repeat(l.indent) + l.text).join('\n');
}
