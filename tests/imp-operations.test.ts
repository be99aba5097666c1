import {
  createBoolOperation,
  createCast,
  createComparison,
  createConstant,
  createNop,
  createOperation,
  createParenthesis,
  createSemanticContext,
  createTypedOperation,
  createUnaryMinus,
  createVariable,
  type SemanticContext,
} from '../src/imp/actions.js';
import { render } from '../src/imp/render.js';

function setup(): SemanticContext {
  const ctx = createSemanticContext();
  ctx.scope.declare('i', 'int');
  ctx.scope.declare('f', 'float');
  ctx.scope.declare('b', 'bool');
  return ctx;
}

const messages = (ctx: SemanticContext) => ctx.diagnostics.getDiagnostics().map(d => d.message);

describe('Operation', () => {
  test('same-typed operands keep their type', () => {
    const ctx = setup();
    const node = createOperation(ctx, 'PLUS', createVariable(ctx, 'i'), createVariable(ctx, 'i'));
    expect(node.type).toBe('int');
    expect(node.failed).toBe(false);
    expect(render(node)).toBe('(i + i)');
  });

  test('widens an int operand on either side', () => {
    const ctx = setup();
    const left = createOperation(ctx, 'PLUS', createVariable(ctx, 'i'), createVariable(ctx, 'f'));
    const right = createOperation(ctx, 'TIMES', createVariable(ctx, 'f'), createVariable(ctx, 'i'));

    expect(left.type).toBe('float');
    expect(left.coerced).toEqual([true, false]);
    expect(render(left)).toBe('(([float] i) + f)');
    expect(right.type).toBe('float');
    expect(right.coerced).toEqual([false, true]);
    expect(render(right)).toBe('(f * ([float] i))');
    expect(ctx.diagnostics.hasErrors()).toBe(false);
  });

  test('widens every earlier int operand of a chain', () => {
    const ctx = setup();
    const node = createOperation(
      ctx,
      'PLUS',
      createVariable(ctx, 'i'),
      createConstant(ctx, 'int', '2'),
      createVariable(ctx, 'f')
    );
    expect(node.type).toBe('float');
    expect(render(node)).toBe('(([float] i) + ([float] 2) + f)');
  });

  test('reports incompatible operands and becomes any', () => {
    const ctx = setup();
    ctx.diagnostics.lines.advanceTo(4);
    const node = createOperation(ctx, 'PLUS', createVariable(ctx, 'i'), createVariable(ctx, 'b'));

    expect(node.failed).toBe(true);
    expect(node.type).toBe('any');
    expect(ctx.diagnostics.format()).toEqual([
      '[Line 4] semantic error: addition operation expected integer but received boolean',
    ]);
  });

  test('a failed operand fails the parent silently', () => {
    const ctx = setup();
    const bad = createOperation(ctx, 'PLUS', createVariable(ctx, 'i'), createVariable(ctx, 'b'));
    const parent = createOperation(ctx, 'TIMES', bad, createVariable(ctx, 'i'));
    const grandparent = createParenthesis(ctx, parent);

    expect(parent.failed).toBe(true);
    expect(grandparent.failed).toBe(true);
    expect(ctx.diagnostics.count()).toBe(1);
  });

  test('an undeclared operand reports once', () => {
    const ctx = setup();
    const node = createOperation(ctx, 'MINUS', createVariable(ctx, 'missing'), createVariable(ctx, 'i'));
    expect(node.failed).toBe(true);
    expect(messages(ctx)).toEqual(['undeclared variable missing']);
  });

  test('void operands are rejected', () => {
    const ctx = setup();
    createOperation(ctx, 'PLUS', createNop(ctx), createVariable(ctx, 'i'));
    createOperation(ctx, 'PLUS', createVariable(ctx, 'i'), createNop(ctx));
    expect(messages(ctx)).toEqual([
      'addition operation expected any but received void',
      'addition operation expected integer but received void',
    ]);
  });

  test('a typed operation checks its first operand too', () => {
    const ctx = setup();
    const node = createTypedOperation(ctx, 'PLUS', 'float', createVariable(ctx, 'i'), createVariable(ctx, 'f'));
    expect(node.type).toBe('float');
    expect(node.coerced).toEqual([true, false]);

    createTypedOperation(ctx, 'MINUS', 'int', createVariable(ctx, 'f'));
    expect(messages(ctx)).toEqual(['subtraction operation expected integer but received float']);
  });
});

describe('Comparison and boolean operations', () => {
  test('comparisons are boolean and widen their operands', () => {
    const ctx = setup();
    const node = createComparison(ctx, 'LESS_THAN', createVariable(ctx, 'i'), createVariable(ctx, 'f'));
    expect(node.kind).toBe('Comparison');
    expect(node.type).toBe('bool');
    expect(render(node)).toBe('(([float] i) < f)');
  });

  test('comparing mismatched operands is reported', () => {
    const ctx = setup();
    const node = createComparison(ctx, 'EQUAL', createVariable(ctx, 'i'), createVariable(ctx, 'b'));
    expect(node.failed).toBe(true);
    expect(messages(ctx)).toEqual(['equal operation expected integer but received boolean']);
  });

  test('boolean operators require bool operands', () => {
    const ctx = setup();
    const and = createBoolOperation(ctx, 'AND', createVariable(ctx, 'b'), createVariable(ctx, 'b'));
    const not = createBoolOperation(ctx, 'NOT', createVariable(ctx, 'b'));
    expect(and.type).toBe('bool');
    expect(render(and)).toBe('(b & b)');
    expect(render(not)).toBe('(!b)');

    const or = createBoolOperation(ctx, 'OR', createVariable(ctx, 'b'), createVariable(ctx, 'i'));
    expect(or.failed).toBe(true);
    expect(messages(ctx)).toEqual(['or operation expected boolean but received integer']);
  });
});

describe('Unary forms', () => {
  test('parenthesis, unary minus and cast', () => {
    const ctx = setup();
    const paren = createParenthesis(ctx, createVariable(ctx, 'i'));
    const minus = createUnaryMinus(ctx, createVariable(ctx, 'f'));
    const cast = createCast(ctx, 'float', createVariable(ctx, 'i'));

    expect(paren.type).toBe('int');
    expect(render(paren)).toBe('(i)');
    expect(minus.type).toBe('float');
    expect(render(minus)).toBe('(-f)');
    expect(cast.type).toBe('float');
    expect(render(cast)).toBe('([float] i)');
  });

  test('rendering is stable across calls', () => {
    const ctx = setup();
    const node = createOperation(ctx, 'DIVIDE', createVariable(ctx, 'f'), createUnaryMinus(ctx, createVariable(ctx, 'i')));
    expect(render(node)).toBe('(f / ([float] (-i)))');
    expect(render(node)).toBe(render(node));
  });
});
