export type ImpType = 'int' | 'float' | 'bool' | 'void' | 'any';

/** Types a value can be declared with (`void` is only a return type). */
export type DeclarableType = 'int' | 'float' | 'bool';

export type Shape = 'scalar' | 'array' | 'pointer' | 'reference';

export type Operator =
  | 'EQUAL'
  | 'NOT_EQUAL'
  | 'GREATER_THAN'
  | 'LESS_THAN'
  | 'GREATER_EQUAL_THAN'
  | 'LESS_EQUAL_THAN'
  | 'AND'
  | 'OR'
  | 'NOT'
  | 'PLUS'
  | 'MINUS'
  | 'TIMES'
  | 'DIVIDE'
  | 'UNARY_MINUS'
  | 'ASSIGN'
  | 'PAR'
  | 'CAST'
  | 'TEST';

export type ComparisonOperator =
  | 'EQUAL'
  | 'NOT_EQUAL'
  | 'GREATER_THAN'
  | 'LESS_THAN'
  | 'GREATER_EQUAL_THAN'
  | 'LESS_EQUAL_THAN';

export type BoolOperator = 'AND' | 'OR' | 'NOT';

export type ArithmeticOperator = 'PLUS' | 'MINUS' | 'TIMES' | 'DIVIDE';

export interface Literal {
  text: string;
  type: ImpType;
}

const typeNames: Record<ImpType, string> = {
  int: 'int',
  float: 'float',
  bool: 'bool',
  void: 'void',
  any: 'any',
};

const printableTypeNames: Record<ImpType, string> = {
  int: 'integer',
  float: 'float',
  bool: 'boolean',
  void: 'void',
  any: 'any',
};

// Markers (PAR, CAST, TEST, ASSIGN) have no glyph of their own.
const operatorSymbols: Record<Operator, string> = {
  EQUAL: '==',
  NOT_EQUAL: '!=',
  GREATER_THAN: '>',
  LESS_THAN: '<',
  GREATER_EQUAL_THAN: '>=',
  LESS_EQUAL_THAN: '<=',
  AND: '&',
  OR: '|',
  NOT: '!',
  PLUS: '+',
  MINUS: '-',
  TIMES: '*',
  DIVIDE: '/',
  UNARY_MINUS: '-',
  ASSIGN: '=',
  PAR: '',
  CAST: '',
  TEST: '',
};

const printableOperatorNames: Record<Operator, string> = {
  EQUAL: 'equal',
  NOT_EQUAL: 'different',
  GREATER_THAN: 'greater than',
  LESS_THAN: 'less than',
  GREATER_EQUAL_THAN: 'greater or equal than',
  LESS_EQUAL_THAN: 'less or equal than',
  AND: 'and',
  OR: 'or',
  NOT: 'negation',
  PLUS: 'addition',
  MINUS: 'subtraction',
  TIMES: 'multiplication',
  DIVIDE: 'division',
  UNARY_MINUS: 'unary minus',
  ASSIGN: 'attribution',
  PAR: 'parenthesis',
  CAST: 'cast',
  TEST: 'test',
};

export const typeName = (type: ImpType): string => typeNames[type];

export const printableType = (type: ImpType): string => printableTypeNames[type];

export const operatorSymbol = (op: Operator): string => operatorSymbols[op];

export const printableOperator = (op: Operator): string => printableOperatorNames[op];

/** Implicit widening is one-directional: an int may stand where a float is expected. */
export function canCoerce(target: ImpType, source: ImpType): boolean {
  return target === 'float' && source === 'int';
}

export function typeMatches(target: ImpType, source: ImpType): boolean {
  return target === source;
}

export function isAssignable(target: ImpType, source: ImpType): boolean {
  return typeMatches(target, source) || canCoerce(target, source);
}

export function isDeclarableType(value: string): value is DeclarableType {
  return value === 'int' || value === 'float' || value === 'bool';
}

export function isImpType(value: string): value is ImpType {
  return Object.hasOwn(typeNames, value);
}
