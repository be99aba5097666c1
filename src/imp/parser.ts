import { type CompiledGrammar, loadImpGrammar } from '../grammar/index.js';
import { type ParseError, isRecord, parseInput } from '../parser/index.js';
import { type Location } from '../utils/index.js';

export type SyntaxTypeName = 'int' | 'float' | 'bool';

interface SyntaxBase {
  line: number;
}

export interface SyntaxProgram extends SyntaxBase {
  type: 'Program';
  body: SyntaxStatement[];
}

export interface SyntaxDeclItem extends SyntaxBase {
  name: string;
  init: SyntaxExpr | null;
  size: string | null;
}

export interface SyntaxDeclaration extends SyntaxBase {
  type: 'Declaration';
  label: 'var' | 'const';
  declType: SyntaxTypeName;
  items: SyntaxDeclItem[];
}

export interface SyntaxParam {
  paramType: SyntaxTypeName;
  name: string;
}

export interface SyntaxFunction extends SyntaxBase {
  type: 'Function';
  returnType: SyntaxTypeName | 'void';
  name: string;
  params: SyntaxParam[];
  body: SyntaxBlock | null;
}

export interface SyntaxBlock extends SyntaxBase {
  type: 'Block';
  body: SyntaxStatement[];
}

export interface SyntaxIf extends SyntaxBase {
  type: 'If';
  test: SyntaxExpr;
  consequent: SyntaxBlock;
  alternate: SyntaxBlock | SyntaxIf | null;
}

export interface SyntaxFor extends SyntaxBase {
  type: 'For';
  init: SyntaxAssign | null;
  test: SyntaxExpr;
  update: SyntaxAssign | null;
  body: SyntaxBlock;
}

export interface SyntaxWhile extends SyntaxBase {
  type: 'While';
  test: SyntaxExpr;
  body: SyntaxBlock;
}

export interface SyntaxReturn extends SyntaxBase {
  type: 'Return';
  value: SyntaxExpr | null;
}

export interface SyntaxAssign extends SyntaxBase {
  type: 'Assign';
  target: SyntaxLvalue;
  value: SyntaxExpr;
}

export interface SyntaxExprStmt extends SyntaxBase {
  type: 'ExprStmt';
  expr: SyntaxExpr;
}

export type SyntaxStatement =
  | SyntaxDeclaration
  | SyntaxFunction
  | SyntaxBlock
  | SyntaxIf
  | SyntaxFor
  | SyntaxWhile
  | SyntaxReturn
  | SyntaxAssign
  | SyntaxExprStmt;

export type SyntaxBinaryOperator = '|' | '&' | '==' | '!=' | '<' | '>' | '<=' | '>=' | '+' | '-' | '*' | '/';

export interface SyntaxBinary extends SyntaxBase {
  type: 'Binary';
  op: SyntaxBinaryOperator;
  operands: SyntaxExpr[];
}

export interface SyntaxUnary extends SyntaxBase {
  type: 'Unary';
  op: '-' | '!';
  operand: SyntaxExpr;
}

export interface SyntaxCast extends SyntaxBase {
  type: 'Cast';
  target: SyntaxTypeName;
  operand: SyntaxExpr;
}

export interface SyntaxParen extends SyntaxBase {
  type: 'Paren';
  expr: SyntaxExpr;
}

export interface SyntaxLiteral extends SyntaxBase {
  type: 'Literal';
  literalType: SyntaxTypeName;
  text: string;
}

export interface SyntaxCall extends SyntaxBase {
  type: 'Call';
  name: string;
  args: SyntaxExpr[];
}

export interface SyntaxAddress extends SyntaxBase {
  type: 'Address';
  target: SyntaxLvalue;
}

export interface SyntaxIdentifier extends SyntaxBase {
  type: 'Identifier';
  name: string;
}

export interface SyntaxIndex extends SyntaxBase {
  type: 'Index';
  name: string;
  index: SyntaxExpr;
}

export interface SyntaxDeref extends SyntaxBase {
  type: 'Deref';
  target: SyntaxLvalue;
}

export type SyntaxLvalue = SyntaxIdentifier | SyntaxIndex | SyntaxDeref;

export type SyntaxExpr =
  | SyntaxBinary
  | SyntaxUnary
  | SyntaxCast
  | SyntaxParen
  | SyntaxLiteral
  | SyntaxCall
  | SyntaxAddress
  | SyntaxLvalue;

export interface ImpParseOptions {
  grammarSource?: string;
  grammar?: CompiledGrammar;
}

export class ImpSyntaxError extends Error {
  location?: Location;
  expected?: string[];
  found?: string | null;
  input?: string;
  details: ParseError;

  constructor(message: string, details: ParseError) {
    super(message);
    this.name = 'ImpSyntaxError';
    this.location = details.location;
    this.expected = details.expected;
    this.found = details.found ?? null;
    this.input = details.input;
    this.details = details;
  }
}

function isSyntaxProgram(value: unknown): value is SyntaxProgram {
  return isRecord(value) && value.type === 'Program' && Array.isArray(value.body);
}

export function parseImp(input: string, options: ImpParseOptions = {}): SyntaxProgram {
  const grammar = options.grammar ?? loadImpGrammar();
  const result = parseInput(grammar, input, { grammarSource: options.grammarSource });
  if (result.success) {
    if (!isSyntaxProgram(result.result)) {
      throw new Error('Imp grammar did not produce a Program node');
    }
    return result.result;
  }
  const loc = result.location?.start;
  const source = options.grammarSource ?? 'input';
  const suffix = loc ? ` at ${source}:${loc.line}:${loc.column}` : ` at ${source}`;
  throw new ImpSyntaxError(`[Imp Syntax Error] ${result.error}${suffix}`, result);
}
