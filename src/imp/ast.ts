import { type FunctionParam } from './scope.js';
import { type DeclarableType, type ImpType, type Operator, type Shape } from './types.js';

export interface ImpNodeBase {
  type: ImpType;
  failed: boolean;
}

export interface ImpNop extends ImpNodeBase {
  kind: 'Nop';
}

export interface ImpVariable extends ImpNodeBase {
  kind: 'Variable';
  name: string;
  shape: Shape;
}

export interface ImpConstant extends ImpNodeBase {
  kind: 'Constant';
  text: string;
}

export interface ImpVarDecl extends ImpNodeBase {
  kind: 'VarDecl';
  type: DeclarableType;
  label: string;
  name: string;
  init: ImpNode | null;
  redeclared: boolean;
}

export interface ImpArrayDecl extends ImpNodeBase {
  kind: 'ArrayDecl';
  type: DeclarableType;
  label: string;
  name: string;
  size: string;
  redeclared: boolean;
}

export interface ImpDeclaration extends ImpNodeBase {
  kind: 'Declaration';
  type: DeclarableType;
  label: string;
  bindings: Array<ImpVarDecl | ImpArrayDecl>;
}

export type OperationKind =
  | 'Operation'
  | 'Comparison'
  | 'BoolOperation'
  | 'Parenthesis'
  | 'UnaryMinus'
  | 'Cast';

export interface ImpOperation extends ImpNodeBase {
  kind: OperationKind;
  op: Operator;
  children: ImpNode[];
  /** Per child: whether the renderer must widen it with an explicit cast. */
  coerced: boolean[];
}

export interface ImpAssignment extends ImpNodeBase {
  kind: 'Assignment';
  type: 'void';
  target: ImpNode;
  value: ImpNode;
  coerced: boolean;
}

export interface ImpBlock extends ImpNodeBase {
  kind: 'Block';
  type: 'void';
  lines: ImpNode[];
}

export interface ImpConditional extends ImpNodeBase {
  kind: 'Conditional';
  type: 'void';
  condition: ImpNode;
  accepted: ImpNode;
  rejected: ImpNode | null;
}

export interface ImpLoop extends ImpNodeBase {
  kind: 'Loop';
  type: 'void';
  init: ImpNode;
  test: ImpNode;
  update: ImpNode;
  body: ImpNode;
}

export interface ImpParamList extends ImpNodeBase {
  kind: 'ParamList';
  type: 'void';
  params: FunctionParam[];
}

export interface ImpFun extends ImpNodeBase {
  kind: 'Fun';
  name: string;
  params: ImpParamList | null;
  body: ImpBlock | null;
}

export interface ImpReturn extends ImpNodeBase {
  kind: 'Return';
  operand: ImpNode | null;
}

export interface ImpExpressionList extends ImpNodeBase {
  kind: 'ExpressionList';
  type: 'void';
  expressions: ImpNode[];
}

export interface ImpFunCall extends ImpNodeBase {
  kind: 'FunCall';
  name: string;
  args: ImpExpressionList;
  coerced: boolean[];
}

export interface ImpArrayIndex extends ImpNodeBase {
  kind: 'ArrayIndex';
  name: string;
  index: ImpNode;
}

export interface ImpAddress extends ImpNodeBase {
  kind: 'Address';
  shape: 'pointer';
  lvalue: ImpNode;
}

export interface ImpReference extends ImpNodeBase {
  kind: 'Reference';
  shape: 'reference';
  lvalue: ImpNode;
}

export type ImpNode =
  | ImpNop
  | ImpVariable
  | ImpConstant
  | ImpVarDecl
  | ImpArrayDecl
  | ImpDeclaration
  | ImpOperation
  | ImpAssignment
  | ImpBlock
  | ImpConditional
  | ImpLoop
  | ImpParamList
  | ImpFun
  | ImpReturn
  | ImpExpressionList
  | ImpFunCall
  | ImpArrayIndex
  | ImpAddress
  | ImpReference;

export type ImpNodeKind = ImpNode['kind'];

const expressionKinds: ReadonlySet<ImpNodeKind> = new Set<ImpNodeKind>([
  'Variable',
  'Constant',
  'Operation',
  'Comparison',
  'BoolOperation',
  'Parenthesis',
  'UnaryMinus',
  'Cast',
  'FunCall',
  'ArrayIndex',
  'Address',
  'Reference',
  'ExpressionList',
]);

export function isExpression(node: ImpNode): boolean {
  return expressionKinds.has(node.kind);
}

export function hasBody(fun: ImpFun): boolean {
  return fun.body !== null;
}
