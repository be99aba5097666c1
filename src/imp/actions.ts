import {
  type ImpAddress,
  type ImpArrayDecl,
  type ImpArrayIndex,
  type ImpAssignment,
  type ImpBlock,
  type ImpConditional,
  type ImpConstant,
  type ImpDeclaration,
  type ImpExpressionList,
  type ImpFun,
  type ImpFunCall,
  type ImpLoop,
  type ImpNode,
  type ImpNop,
  type ImpOperation,
  type ImpParamList,
  type ImpReference,
  type ImpReturn,
  type ImpVarDecl,
  type ImpVariable,
  type OperationKind,
} from './ast.js';
import { DiagnosticReporter, type SemanticError } from './diagnostics.js';
import { type FunctionParam, type FunctionSignature, ScopeStack, type SymbolScope } from './scope.js';
import {
  type BoolOperator,
  type ComparisonOperator,
  type DeclarableType,
  type ImpType,
  type Literal,
  type Operator,
  canCoerce,
  isAssignable,
  typeMatches,
} from './types.js';

/**
 * How `FunCall` treats several mismatched arguments: report each of them, or
 * stop after the first one.
 */
export type ParamCheckPolicy = 'all' | 'first';

export interface SemanticOptions {
  paramCheck: ParamCheckPolicy;
}

export interface SemanticContext {
  scope: SymbolScope;
  diagnostics: DiagnosticReporter;
  options: SemanticOptions;
}

export const defaultSemanticOptions: SemanticOptions = {
  paramCheck: 'all',
};

export function createSemanticContext(
  overrides: { scope?: SymbolScope; diagnostics?: DiagnosticReporter; options?: Partial<SemanticOptions> } = {}
): SemanticContext {
  return {
    scope: overrides.scope ?? new ScopeStack(),
    diagnostics: overrides.diagnostics ?? new DiagnosticReporter(),
    options: { ...defaultSemanticOptions, ...overrides.options },
  };
}

const report = (ctx: SemanticContext, error: SemanticError) => {
  ctx.diagnostics.report(error);
};


// --- Leaves ---

export function createNop(ctx: SemanticContext): ImpNop {
  return { kind: 'Nop', type: 'void', failed: false };
}

export function createVariable(ctx: SemanticContext, name: string): ImpVariable {
  const binding = ctx.scope.lookup(name);
  if (!binding) {
    report(ctx, { kind: 'UNDECLARED_VARIABLE', name });
    return { kind: 'Variable', name, shape: 'scalar', type: 'any', failed: true };
  }
  return { kind: 'Variable', name, shape: binding.shape, type: binding.type, failed: false };
}

export function createConstant(ctx: SemanticContext, type: ImpType, text: string): ImpConstant {
  return { kind: 'Constant', text, type, failed: false };
}

export function constantFromLiteral(ctx: SemanticContext, literal: Literal): ImpConstant {
  return createConstant(ctx, literal.type, literal.text);
}

// --- Declarations ---

function initializerFailed(ctx: SemanticContext, declared: DeclarableType, init: ImpNode | null): boolean {
  if (!init) return false;
  if (init.failed) return true;
  if (!typeMatches(declared, init.type)) {
    report(ctx, { kind: 'INCOMPATIBLE_ASSIGNMENT', expected: declared, actual: init.type });
    return true;
  }
  return false;
}

export function createVarDecl(
  ctx: SemanticContext,
  type: DeclarableType,
  name: string,
  init: ImpNode | null = null,
  label = 'var'
): ImpVarDecl {
  const redeclared = ctx.scope.declare(name, type, 'scalar') === 'already-declared';
  if (redeclared) {
    report(ctx, { kind: 'MULTIPLE_DEFINITION', name });
  }
  const badInit = initializerFailed(ctx, type, init);
  return {
    kind: 'VarDecl',
    type,
    label,
    name,
    init,
    redeclared,
    failed: redeclared || badInit,
  };
}

export function createArrayDecl(
  ctx: SemanticContext,
  type: DeclarableType,
  name: string,
  size: string,
  label = 'var'
): ImpArrayDecl {
  const redeclared = ctx.scope.declare(name, type, 'array') === 'already-declared';
  if (redeclared) {
    report(ctx, { kind: 'MULTIPLE_DEFINITION', name });
  }
  return { kind: 'ArrayDecl', type, label, name, size, redeclared, failed: redeclared };
}

export function createDeclaration(ctx: SemanticContext, type: DeclarableType, label = 'var'): ImpDeclaration {
  return { kind: 'Declaration', type, label, bindings: [], failed: false };
}

function isLiteral(value: ImpNode | Literal): value is Literal {
  return !('kind' in value);
}

/** Adds a scalar binding; a raw literal initializer becomes a Constant. */
export function addBinding(
  ctx: SemanticContext,
  declaration: ImpDeclaration,
  name: string,
  init?: ImpNode | Literal
): ImpVarDecl {
  const initNode = init === undefined ? null : isLiteral(init) ? constantFromLiteral(ctx, init) : init;
  const binding = createVarDecl(ctx, declaration.type, name, initNode, declaration.label);
  declaration.bindings.push(binding);
  declaration.failed = declaration.failed || binding.failed;
  return binding;
}

export function addArrayBinding(
  ctx: SemanticContext,
  declaration: ImpDeclaration,
  name: string,
  size: string
): ImpArrayDecl {
  const binding = createArrayDecl(ctx, declaration.type, name, size, declaration.label);
  declaration.bindings.push(binding);
  declaration.failed = declaration.failed || binding.failed;
  return binding;
}

// --- Operations ---

interface OperandCheck {
  type: ImpType;
  failed: boolean;
  coerced: boolean[];
}

function checkOperands(
  ctx: SemanticContext,
  op: Operator,
  children: ImpNode[],
  explicitType?: ImpType
): OperandCheck {
  let expected: ImpType = explicitType ?? children[0]?.type ?? 'void';
  let failed = false;
  const coerced = children.map(() => false);

  for (let i = 0; i < children.length && !failed; i++) {
    const child = children[i];
    if (child.failed || child.type === 'any') {
      failed = true;
    } else if (child.type === 'void') {
      report(ctx, {
        kind: 'INCOMPATIBLE_OPERANDS',
        op,
        expected: expected === 'void' ? 'any' : expected,
        actual: 'void',
      });
      failed = true;
    } else if (canCoerce(expected, child.type)) {
      coerced[i] = true;
    } else if (explicitType === undefined && canCoerce(child.type, expected)) {
      // int operands seen so far widen along with the running type
      for (let j = 0; j < i; j++) coerced[j] = true;
      expected = child.type;
    } else if (!typeMatches(expected, child.type)) {
      report(ctx, { kind: 'INCOMPATIBLE_OPERANDS', op, expected, actual: child.type });
      failed = true;
    }
  }

  return { type: failed ? 'any' : expected, failed, coerced };
}

function buildOperation(
  ctx: SemanticContext,
  kind: OperationKind,
  op: Operator,
  children: ImpNode[],
  explicitType?: ImpType
): ImpOperation {
  const check = checkOperands(ctx, op, children, explicitType);
  return {
    kind,
    op,
    children,
    coerced: check.coerced,
    type: check.type,
    failed: check.failed,
  };
}

/** Generic n-ary operator; the first operand sets the expected type. */
export function createOperation(ctx: SemanticContext, op: Operator, first: ImpNode, ...rest: ImpNode[]): ImpOperation {
  return buildOperation(ctx, 'Operation', op, [first, ...rest]);
}

/** Every operand, the first included, is checked against `type`. */
export function createTypedOperation(
  ctx: SemanticContext,
  op: Operator,
  type: ImpType,
  ...children: ImpNode[]
): ImpOperation {
  return buildOperation(ctx, 'Operation', op, children, type);
}

export function createComparison(
  ctx: SemanticContext,
  op: ComparisonOperator,
  first: ImpNode,
  ...rest: ImpNode[]
): ImpOperation {
  const node = buildOperation(ctx, 'Comparison', op, [first, ...rest]);
  node.type = 'bool';
  return node;
}

export function createBoolOperation(
  ctx: SemanticContext,
  op: BoolOperator,
  ...children: ImpNode[]
): ImpOperation {
  return buildOperation(ctx, 'BoolOperation', op, children, 'bool');
}

export function createParenthesis(ctx: SemanticContext, operand: ImpNode): ImpOperation {
  return buildOperation(ctx, 'Parenthesis', 'PAR', [operand]);
}

export function createUnaryMinus(ctx: SemanticContext, operand: ImpNode): ImpOperation {
  return buildOperation(ctx, 'UnaryMinus', 'UNARY_MINUS', [operand]);
}

export function createCast(ctx: SemanticContext, target: DeclarableType, operand: ImpNode): ImpOperation {
  const node = buildOperation(ctx, 'Cast', 'CAST', [operand]);
  node.type = target;
  return node;
}

// --- Statements ---

export function createAssignment(ctx: SemanticContext, target: ImpNode, value: ImpNode): ImpAssignment {
  const node: ImpAssignment = {
    kind: 'Assignment',
    type: 'void',
    target,
    value,
    coerced: false,
    failed: false,
  };
  if (target.failed || value.failed) {
    node.failed = true;
  } else if (!isAssignable(target.type, value.type)) {
    report(ctx, { kind: 'INCOMPATIBLE_ASSIGNMENT', expected: target.type, actual: value.type });
    node.failed = true;
  } else {
    node.coerced = canCoerce(target.type, value.type);
  }
  return node;
}

export function createBlock(ctx: SemanticContext): ImpBlock {
  return { kind: 'Block', type: 'void', lines: [], failed: false };
}

export function appendLine(block: ImpBlock, line: ImpNode): ImpBlock {
  block.lines.push(line);
  block.failed = block.failed || line.failed;
  return block;
}

function testFailed(ctx: SemanticContext, test: ImpNode): boolean {
  if (test.failed) return true;
  if (test.type !== 'bool') {
    report(ctx, { kind: 'INCOMPATIBLE_TEST', actual: test.type });
    return true;
  }
  return false;
}

export function createConditional(
  ctx: SemanticContext,
  condition: ImpNode,
  accepted: ImpNode,
  rejected: ImpNode | null = null
): ImpConditional {
  const failed = testFailed(ctx, condition) || accepted.failed || (rejected?.failed ?? false);
  return { kind: 'Conditional', type: 'void', condition, accepted, rejected, failed };
}

export function createLoop(
  ctx: SemanticContext,
  init: ImpNode,
  test: ImpNode,
  update: ImpNode,
  body: ImpNode
): ImpLoop {
  const failed = testFailed(ctx, test) || init.failed || update.failed || body.failed;
  return { kind: 'Loop', type: 'void', init, test, update, body, failed };
}

// --- Functions ---

export function createParamList(ctx: SemanticContext): ImpParamList {
  return { kind: 'ParamList', type: 'void', params: [], failed: false };
}

export function addParam(list: ImpParamList, type: ImpType, name: string): ImpParamList {
  list.params.push({ type, name });
  return list;
}

export function createFun(ctx: SemanticContext, returnType: ImpType, name: string): ImpFun {
  return { kind: 'Fun', type: returnType, name, params: null, body: null, failed: false };
}

function sameSignature(signature: FunctionSignature, params: FunctionParam[], returnType: ImpType): boolean {
  return (
    signature.returnType === returnType &&
    signature.params.length === params.length &&
    signature.params.every((param, i) => param.type === params[i].type)
  );
}

/**
 * Attaches the signature (and, for a definition, the body) and registers the
 * function. A forward declaration may be completed once by a matching definition.
 */
export function bindFunction(ctx: SemanticContext, fun: ImpFun, params: ImpParamList, body: ImpBlock | null = null): ImpFun {
  fun.params = params;
  if (body) {
    fun.body = body;
    fun.failed = fun.failed || body.failed;
  }

  const previous = ctx.scope.lookupFunction(fun.name);
  if (ctx.scope.declareFunction(fun.name, params.params, fun.type) === 'already-declared') {
    const conflicting =
      !previous || !sameSignature(previous, params.params, fun.type) || (previous.defined && body !== null);
    if (conflicting) {
      report(ctx, { kind: 'MULTIPLE_DEFINITION_FN', name: fun.name });
      fun.failed = true;
      return fun;
    }
  }
  if (body) ctx.scope.markDefined(fun.name);
  return fun;
}

/** Appends to the body of a definition; a forward declaration is left as is. */
export function injectStatement(fun: ImpFun, statement: ImpNode): ImpFun {
  if (!fun.body) return fun;
  appendLine(fun.body, statement);
  fun.failed = fun.failed || statement.failed;
  return fun;
}

export function createReturn(ctx: SemanticContext, operand: ImpNode | null = null): ImpReturn {
  return {
    kind: 'Return',
    operand,
    type: operand?.type ?? 'void',
    failed: operand?.failed ?? false,
  };
}

export function createExpressionList(ctx: SemanticContext): ImpExpressionList {
  return { kind: 'ExpressionList', type: 'void', expressions: [], failed: false };
}

export function appendExpression(list: ImpExpressionList, expression: ImpNode): ImpExpressionList {
  list.expressions.push(expression);
  list.failed = list.failed || expression.failed;
  return list;
}

export function expressionCount(list: ImpExpressionList): number {
  return list.expressions.length;
}

export function createFunCall(ctx: SemanticContext, name: string, args: ImpExpressionList): ImpFunCall {
  const node: ImpFunCall = {
    kind: 'FunCall',
    name,
    args,
    coerced: args.expressions.map(() => false),
    type: 'any',
    failed: true,
  };

  const signature = ctx.scope.lookupFunction(name);
  if (!signature) {
    report(ctx, { kind: 'UNDECLARED_VARIABLE', name });
    return node;
  }

  const expected = signature.params.length;
  const actual = expressionCount(args);
  if (expected !== actual) {
    report(ctx, { kind: 'WRONG_PARAM_COUNT', name, expected, actual });
    return node;
  }

  node.type = signature.returnType;
  node.failed = args.failed;
  for (let i = 0; i < actual; i++) {
    const arg = args.expressions[i];
    const param = signature.params[i];
    if (arg.failed || typeMatches(param.type, arg.type)) continue;
    if (canCoerce(param.type, arg.type)) {
      node.coerced[i] = true;
      continue;
    }
    report(ctx, { kind: 'INCOMPATIBLE_PARAM', name: param.name, expected: param.type, actual: arg.type });
    node.failed = true;
    if (ctx.options.paramCheck === 'first') break;
  }
  return node;
}

// --- Storage ---

export function createArrayIndex(ctx: SemanticContext, name: string, index: ImpNode): ImpArrayIndex {
  const node: ImpArrayIndex = { kind: 'ArrayIndex', name, index, type: 'any', failed: false };

  const binding = ctx.scope.lookup(name);
  if (!binding) {
    report(ctx, { kind: 'UNDECLARED_VARIABLE', name });
    node.failed = true;
  } else if (binding.shape !== 'array') {
    report(ctx, { kind: 'NON_ARRAY_INDEX' });
    node.failed = true;
  } else {
    node.type = binding.type;
  }

  if (index.failed) {
    node.failed = true;
  } else if (index.type !== 'int') {
    report(ctx, { kind: 'INCOMPATIBLE_INDEX', expected: 'int', actual: index.type });
    node.failed = true;
  }
  return node;
}

export function createAddress(ctx: SemanticContext, lvalue: ImpNode): ImpAddress {
  return { kind: 'Address', shape: 'pointer', lvalue, type: lvalue.type, failed: lvalue.failed };
}

export function createReference(ctx: SemanticContext, lvalue: ImpNode): ImpReference {
  return { kind: 'Reference', shape: 'reference', lvalue, type: lvalue.type, failed: lvalue.failed };
}
