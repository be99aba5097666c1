import {
  createAddress,
  createArrayDecl,
  createArrayIndex,
  createAssignment,
  createConstant,
  createReference,
  createSemanticContext,
  createVariable,
  type SemanticContext,
} from '../src/imp/actions.js';
import { render } from '../src/imp/render.js';

function setup(): SemanticContext {
  const ctx = createSemanticContext();
  createArrayDecl(ctx, 'int', 'v', '8');
  ctx.scope.declare('i', 'int');
  return ctx;
}

const messages = (ctx: SemanticContext) => ctx.diagnostics.getDiagnostics().map(d => d.message);

describe('ArrayIndex', () => {
  test('indexing an array yields its element type', () => {
    const ctx = setup();
    const node = createArrayIndex(ctx, 'v', createConstant(ctx, 'int', '2'));
    expect(node.type).toBe('int');
    expect(node.failed).toBe(false);
    expect(render(node)).toBe('v[2]');
  });

  test('an element can be assigned', () => {
    const ctx = setup();
    const target = createArrayIndex(ctx, 'v', createVariable(ctx, 'i'));
    expect(render(createAssignment(ctx, target, createConstant(ctx, 'int', '3')))).toBe('v[i] = 3;');
    expect(ctx.diagnostics.hasErrors()).toBe(false);
  });

  test('only arrays can be indexed', () => {
    const ctx = setup();
    const node = createArrayIndex(ctx, 'i', createConstant(ctx, 'int', '0'));
    expect(node.type).toBe('any');
    expect(node.failed).toBe(true);
    expect(messages(ctx)).toEqual(['index operator expects an array']);
  });

  test('the index must be an int', () => {
    const ctx = setup();
    const node = createArrayIndex(ctx, 'v', createConstant(ctx, 'float', '1.5'));
    expect(node.failed).toBe(true);
    expect(messages(ctx)).toEqual(['index operator expects integer but received float']);
  });

  test('an unknown array is undeclared', () => {
    const ctx = setup();
    createArrayIndex(ctx, 'w', createConstant(ctx, 'int', '0'));
    expect(messages(ctx)).toEqual(['undeclared variable w']);
  });

  test('a failed index is not reported again', () => {
    const ctx = setup();
    const node = createArrayIndex(ctx, 'v', createVariable(ctx, 'missing'));
    expect(node.failed).toBe(true);
    expect(messages(ctx)).toEqual(['undeclared variable missing']);
  });
});

describe('Address and Reference', () => {
  test('render with their prefix and keep the operand type', () => {
    const ctx = setup();
    const address = createAddress(ctx, createVariable(ctx, 'i'));
    const reference = createReference(ctx, createVariable(ctx, 'i'));

    expect(address.shape).toBe('pointer');
    expect(address.type).toBe('int');
    expect(render(address)).toBe('&i');
    expect(reference.shape).toBe('reference');
    expect(render(reference)).toBe('*i');
  });

  test('propagate failure without reporting', () => {
    const ctx = setup();
    const address = createAddress(ctx, createVariable(ctx, 'nope'));
    expect(address.failed).toBe(true);
    expect(ctx.diagnostics.count()).toBe(1);
  });
});
