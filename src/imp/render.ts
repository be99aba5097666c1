import { type ImpNode, type ImpOperation, isExpression } from './ast.js';
import { operatorSymbol, typeName } from './types.js';

export interface RenderOptions {
  /** Spaces per nesting level. */
  indentWidth?: number;
}

const DEFAULT_INDENT_WIDTH = 2;

/**
 * Renders a node at the given nesting depth. Statements come back with their
 * own indentation and terminator; expressions are rendered inline.
 */
export function render(node: ImpNode, depth = 0, options: RenderOptions = {}): string {
  const width = options.indentWidth ?? DEFAULT_INDENT_WIDTH;
  const pad = ' '.repeat(width * depth);

  switch (node.kind) {
    case 'Nop':
      return '';
    case 'Variable':
    case 'Constant':
    case 'Operation':
    case 'Comparison':
    case 'BoolOperation':
    case 'Parenthesis':
    case 'UnaryMinus':
    case 'Cast':
    case 'FunCall':
    case 'ArrayIndex':
    case 'Address':
    case 'Reference':
    case 'ExpressionList':
      return `${pad}${inline(node, options)}`;
    case 'VarDecl': {
      const init = node.init ? ` = ${inline(node.init, options)}` : '';
      return `${pad}${labelPrefix(node.label)}${typeName(node.type)} ${node.name}${init};`;
    }
    case 'ArrayDecl':
      return `${pad}${labelPrefix(node.label)}${typeName(node.type)} ${node.name}[${node.size}];`;
    case 'Declaration':
      return node.bindings.map(binding => render(binding, depth, options)).join('\n');
    case 'Assignment': {
      const value = inline(node.value, options);
      return `${pad}${inline(node.target, options)} = ${node.coerced ? widen(value) : value};`;
    }
    case 'Block':
      return node.lines
        .filter(line => line.kind !== 'Nop')
        .map(line => (line.kind === 'Block' ? nestedBlock(line, depth, options) : renderStatement(line, depth, options)))
        .join('\n');
    case 'Conditional': {
      const out = [`${pad}if (${inline(node.condition, options)}) {`];
      pushBody(out, node.accepted, depth + 1, options);
      if (node.rejected) {
        out.push(`${pad}} else {`);
        pushBody(out, node.rejected, depth + 1, options);
      }
      out.push(`${pad}}`);
      return out.join('\n');
    }
    case 'Loop': {
      const header = `${clause(node.init, options)}; ${inline(node.test, options)}; ${clause(node.update, options)}`;
      const out = [`${pad}for (${header}) {`];
      pushBody(out, node.body, depth + 1, options);
      out.push(`${pad}}`);
      return out.join('\n');
    }
    case 'ParamList':
      return node.params.map(param => `${typeName(param.type)} ${param.name}`).join(', ');
    case 'Fun': {
      const params = node.params ? render(node.params, 0, options) : '';
      const header = `${pad}${typeName(node.type)} ${node.name}(${params})`;
      if (!node.body) return `${header};`;
      const out = [`${header} {`];
      pushBody(out, node.body, depth + 1, options);
      out.push(`${pad}}`);
      return out.join('\n');
    }
    case 'Return':
      return node.operand ? `${pad}return ${inline(node.operand, options)};` : `${pad}return;`;
  }
}

/** Renders a node where a statement is expected; bare expressions get a terminator. */
export function renderStatement(node: ImpNode, depth = 0, options: RenderOptions = {}): string {
  const text = render(node, depth, options);
  return isExpression(node) ? `${text};` : text;
}

export function renderProgram(nodes: ImpNode[], options: RenderOptions = {}): string {
  return nodes
    .filter(node => node.kind !== 'Nop')
    .map(node => renderStatement(node, 0, options))
    .join('\n');
}

function inline(node: ImpNode, options: RenderOptions): string {
  switch (node.kind) {
    case 'Variable':
      return node.name;
    case 'Constant':
      return node.text;
    case 'Operation':
    case 'Comparison':
    case 'BoolOperation':
    case 'Parenthesis':
    case 'UnaryMinus':
    case 'Cast':
      return inlineOperation(node, options);
    case 'FunCall': {
      const args = node.args.expressions.map((arg, i) => {
        const text = inline(arg, options);
        return node.coerced[i] ? widen(text) : text;
      });
      return `${node.name}(${args.join(', ')})`;
    }
    case 'ArrayIndex':
      return `${node.name}[${inline(node.index, options)}]`;
    case 'Address':
      return `&${inline(node.lvalue, options)}`;
    case 'Reference':
      return `*${inline(node.lvalue, options)}`;
    case 'ExpressionList':
      return node.expressions.map(expression => inline(expression, options)).join(', ');
    default:
      // a statement in expression position still renders, without its terminator
      return render(node, 0, options).replace(/;$/, '');
  }
}

function inlineOperation(node: ImpOperation, options: RenderOptions): string {
  const operands = node.children.map((child, i) => {
    const text = inline(child, options);
    return node.coerced[i] ? widen(text) : text;
  });

  switch (node.kind) {
    case 'Parenthesis':
      return `(${operands.join('')})`;
    case 'UnaryMinus':
      return `(-${operands.join('')})`;
    case 'Cast':
      return `([${typeName(node.type)}] ${operands.join('')})`;
    default: {
      const symbol = operatorSymbol(node.op);
      if (operands.length === 1) return `(${symbol}${operands[0]})`;
      return `(${operands.join(` ${symbol} `)})`;
    }
  }
}

const widen = (text: string) => `([float] ${text})`;

const labelPrefix = (label: string) => (label === 'var' ? '' : `${label} `);

function clause(node: ImpNode, options: RenderOptions): string {
  return render(node, 0, options).replace(/;$/, '');
}

// A block inside a block keeps its braces; bodies get theirs from the owning statement.
function nestedBlock(block: ImpNode, depth: number, options: RenderOptions): string {
  const pad = ' '.repeat((options.indentWidth ?? DEFAULT_INDENT_WIDTH) * depth);
  const out = [`${pad}{`];
  pushBody(out, block, depth + 1, options);
  out.push(`${pad}}`);
  return out.join('\n');
}

function pushBody(out: string[], body: ImpNode, depth: number, options: RenderOptions): void {
  const text = renderStatement(body, depth, options);
  if (text.length > 0) out.push(text);
}
