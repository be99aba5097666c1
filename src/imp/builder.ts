import {
  type SemanticContext,
  type SemanticOptions,
  addArrayBinding,
  addBinding,
  addParam,
  appendExpression,
  appendLine,
  bindFunction,
  createAddress,
  createArrayIndex,
  createAssignment,
  createBlock,
  createBoolOperation,
  createCast,
  createComparison,
  createConditional,
  createConstant,
  createDeclaration,
  createExpressionList,
  createFun,
  createFunCall,
  createLoop,
  createNop,
  createOperation,
  createParamList,
  createParenthesis,
  createReference,
  createReturn,
  createSemanticContext,
  createUnaryMinus,
  createVariable,
  injectStatement,
} from './actions.js';
import { type ImpBlock, type ImpFun, type ImpNode } from './ast.js';
import { DiagnosticReporter } from './diagnostics.js';
import {
  type SyntaxBinary,
  type SyntaxBlock,
  type SyntaxBinaryOperator,
  type SyntaxExpr,
  type SyntaxFunction,
  type SyntaxLvalue,
  type SyntaxProgram,
  type SyntaxStatement,
} from './parser.js';
import { ScopeStack } from './scope.js';
import { type ArithmeticOperator, type ComparisonOperator } from './types.js';

export interface BuildContext extends SemanticContext {
  scope: ScopeStack;
}

export function createBuildContext(
  options: Partial<SemanticOptions> = {},
  diagnostics: DiagnosticReporter = new DiagnosticReporter()
): BuildContext {
  const scope = new ScopeStack();
  const ctx = createSemanticContext({ scope, diagnostics, options });
  return { ...ctx, scope };
}

/** Builds the semantic tree of a whole program; the top level becomes one block. */
export function buildProgram(program: SyntaxProgram, ctx: BuildContext = createBuildContext()): ImpBlock {
  advance(ctx, program.line);
  const block = createBlock(ctx);
  for (const stmt of program.body) {
    appendLine(block, buildStatement(stmt, ctx));
  }
  return block;
}

function advance(ctx: BuildContext, line: number): void {
  ctx.diagnostics.lines.advanceTo(line);
}

export function buildStatement(stmt: SyntaxStatement, ctx: BuildContext): ImpNode {
  advance(ctx, stmt.line);
  switch (stmt.type) {
    case 'Declaration': {
      const declaration = createDeclaration(ctx, stmt.declType, stmt.label);
      for (const item of stmt.items) {
        advance(ctx, item.line);
        if (item.size !== null) {
          addArrayBinding(ctx, declaration, item.name, item.size);
        } else {
          addBinding(ctx, declaration, item.name, item.init ? buildExpr(item.init, ctx) : undefined);
        }
      }
      return declaration;
    }
    case 'Function':
      return buildFunction(stmt, ctx);
    case 'Block':
      return buildBlock(stmt, ctx);
    case 'If': {
      const condition = buildExpr(stmt.test, ctx);
      const accepted = buildBlock(stmt.consequent, ctx);
      const rejected = stmt.alternate ? buildStatement(stmt.alternate, ctx) : null;
      return createConditional(ctx, condition, accepted, rejected);
    }
    case 'For': {
      const init = stmt.init ? buildStatement(stmt.init, ctx) : createNop(ctx);
      const test = buildExpr(stmt.test, ctx);
      const update = stmt.update ? buildStatement(stmt.update, ctx) : createNop(ctx);
      const body = buildBlock(stmt.body, ctx);
      return createLoop(ctx, init, test, update, body);
    }
    case 'While': {
      const test = buildExpr(stmt.test, ctx);
      const body = buildBlock(stmt.body, ctx);
      return createLoop(ctx, createNop(ctx), test, createNop(ctx), body);
    }
    case 'Return':
      return createReturn(ctx, stmt.value ? buildExpr(stmt.value, ctx) : null);
    case 'Assign': {
      const target = buildLvalue(stmt.target, ctx);
      const value = buildExpr(stmt.value, ctx);
      return createAssignment(ctx, target, value);
    }
    case 'ExprStmt':
      return buildExpr(stmt.expr, ctx);
  }
}

function buildBlock(block: SyntaxBlock, ctx: BuildContext): ImpBlock {
  advance(ctx, block.line);
  const node = createBlock(ctx);
  ctx.scope.enterScope();
  for (const stmt of block.body) {
    appendLine(node, buildStatement(stmt, ctx));
  }
  ctx.scope.exitScope();
  return node;
}

function buildFunction(stmt: SyntaxFunction, ctx: BuildContext): ImpFun {
  const fun = createFun(ctx, stmt.returnType, stmt.name);
  const params = createParamList(ctx);
  for (const param of stmt.params) {
    addParam(params, param.paramType, param.name);
  }
  // registered before the body so recursive calls resolve
  bindFunction(ctx, fun, params, stmt.body ? createBlock(ctx) : null);
  if (!stmt.body) return fun;

  ctx.scope.enterScope();
  for (const param of stmt.params) {
    if (ctx.scope.declare(param.name, param.paramType) === 'already-declared') {
      ctx.diagnostics.report({ kind: 'MULTIPLE_DEFINITION', name: param.name });
      fun.failed = true;
    }
  }
  for (const inner of stmt.body.body) {
    injectStatement(fun, buildStatement(inner, ctx));
  }
  ctx.scope.exitScope();
  return fun;
}

const arithmeticOperators: Record<'+' | '-' | '*' | '/', ArithmeticOperator> = {
  '+': 'PLUS',
  '-': 'MINUS',
  '*': 'TIMES',
  '/': 'DIVIDE',
};

const comparisonOperators: Record<'==' | '!=' | '<' | '>' | '<=' | '>=', ComparisonOperator> = {
  '==': 'EQUAL',
  '!=': 'NOT_EQUAL',
  '<': 'LESS_THAN',
  '>': 'GREATER_THAN',
  '<=': 'LESS_EQUAL_THAN',
  '>=': 'GREATER_EQUAL_THAN',
};

export function buildExpr(expr: SyntaxExpr, ctx: BuildContext): ImpNode {
  advance(ctx, expr.line);
  switch (expr.type) {
    case 'Literal':
      return createConstant(ctx, expr.literalType, expr.text);
    case 'Binary':
      return buildBinary(expr, ctx);
    case 'Unary': {
      const operand = buildExpr(expr.operand, ctx);
      return expr.op === '!' ? createBoolOperation(ctx, 'NOT', operand) : createUnaryMinus(ctx, operand);
    }
    case 'Cast':
      return createCast(ctx, expr.target, buildExpr(expr.operand, ctx));
    case 'Paren':
      return createParenthesis(ctx, buildExpr(expr.expr, ctx));
    case 'Call': {
      const args = createExpressionList(ctx);
      for (const arg of expr.args) {
        appendExpression(args, buildExpr(arg, ctx));
      }
      return createFunCall(ctx, expr.name, args);
    }
    case 'Address':
      return createAddress(ctx, buildLvalue(expr.target, ctx));
    case 'Identifier':
    case 'Index':
    case 'Deref':
      return buildLvalue(expr, ctx);
  }
}

function buildBinary(expr: SyntaxBinary, ctx: BuildContext): ImpNode {
  const [first, ...rest] = expr.operands.map(operand => buildExpr(operand, ctx));
  const op: SyntaxBinaryOperator = expr.op;
  switch (op) {
    case '|':
      return createBoolOperation(ctx, 'OR', first, ...rest);
    case '&':
      return createBoolOperation(ctx, 'AND', first, ...rest);
    case '==':
    case '!=':
    case '<':
    case '>':
    case '<=':
    case '>=':
      return createComparison(ctx, comparisonOperators[op], first, ...rest);
    case '+':
    case '-':
    case '*':
    case '/':
      return createOperation(ctx, arithmeticOperators[op], first, ...rest);
  }
}

function buildLvalue(lvalue: SyntaxLvalue, ctx: BuildContext): ImpNode {
  advance(ctx, lvalue.line);
  switch (lvalue.type) {
    case 'Identifier':
      return createVariable(ctx, lvalue.name);
    case 'Index':
      return createArrayIndex(ctx, lvalue.name, buildExpr(lvalue.index, ctx));
    case 'Deref':
      return createReference(ctx, buildLvalue(lvalue.target, ctx));
  }
}
