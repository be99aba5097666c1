import { type ImpType, type Operator, printableOperator, printableType } from './types.js';

export type ErrorKind =
  | 'MULTIPLE_DEFINITION'
  | 'MULTIPLE_DEFINITION_FN'
  | 'UNDECLARED_VARIABLE'
  | 'INCOMPATIBLE_OPERANDS'
  | 'INCOMPATIBLE_ASSIGNMENT'
  | 'INCOMPATIBLE_TEST'
  | 'DECLARED_BUT_NEVER_DEFINED'
  | 'WRONG_PARAM_COUNT'
  | 'INCOMPATIBLE_PARAM'
  | 'INCOMPATIBLE_INDEX'
  | 'NON_ARRAY_INDEX';

export type SemanticError =
  | { kind: 'MULTIPLE_DEFINITION'; name: string }
  | { kind: 'MULTIPLE_DEFINITION_FN'; name: string }
  | { kind: 'UNDECLARED_VARIABLE'; name: string }
  | { kind: 'INCOMPATIBLE_OPERANDS'; op: Operator; expected: ImpType; actual: ImpType }
  | { kind: 'INCOMPATIBLE_ASSIGNMENT'; expected: ImpType; actual: ImpType }
  | { kind: 'INCOMPATIBLE_TEST'; actual: ImpType }
  | { kind: 'DECLARED_BUT_NEVER_DEFINED'; name: string }
  | { kind: 'WRONG_PARAM_COUNT'; name: string; expected: number; actual: number }
  | { kind: 'INCOMPATIBLE_PARAM'; name: string; expected: ImpType; actual: ImpType }
  | { kind: 'INCOMPATIBLE_INDEX'; expected: ImpType; actual: ImpType }
  | { kind: 'NON_ARRAY_INDEX' };

export interface ImpDiagnostic {
  kind: ErrorKind;
  severity: 'error';
  line: number;
  message: string;
  source: 'impc';
}

export type DiagnosticListener = (diagnostic: ImpDiagnostic) => void;

/**
 * Current source line, shared by the scanner side (which advances it) and the
 * reporter (which stamps it on every diagnostic). It never moves backwards.
 */
export class LineCounter {
  private current: number;

  constructor(start = 1) {
    this.current = start;
  }

  get value(): number {
    return this.current;
  }

  increment(): LineCounter {
    this.current += 1;
    return this;
  }

  advanceTo(line: number): LineCounter {
    if (line > this.current) this.current = line;
    return this;
  }
}

const operandsMessage = (op: Operator, expected: ImpType, actual: ImpType) =>
  `${printableOperator(op)} operation expected ${printableType(expected)} but received ${printableType(actual)}`;

export function describeError(error: SemanticError): string {
  switch (error.kind) {
    case 'MULTIPLE_DEFINITION':
      return `re-declaration of variable ${error.name}`;
    case 'MULTIPLE_DEFINITION_FN':
      return `re-declaration of function ${error.name}`;
    case 'UNDECLARED_VARIABLE':
      return `undeclared variable ${error.name}`;
    case 'INCOMPATIBLE_OPERANDS':
      return operandsMessage(error.op, error.expected, error.actual);
    case 'INCOMPATIBLE_ASSIGNMENT':
      return operandsMessage('ASSIGN', error.expected, error.actual);
    case 'INCOMPATIBLE_TEST':
      return operandsMessage('TEST', 'bool', error.actual);
    case 'DECLARED_BUT_NEVER_DEFINED':
      return `function ${error.name} is declared but never defined`;
    case 'WRONG_PARAM_COUNT':
      return `function ${error.name} expects ${error.expected} parameters but received ${error.actual}`;
    case 'INCOMPATIBLE_PARAM':
      return `parameter ${error.name} expected ${printableType(error.expected)} but received ${printableType(error.actual)}`;
    case 'INCOMPATIBLE_INDEX':
      return `index operator expects ${printableType(error.expected)} but received ${printableType(error.actual)}`;
    case 'NON_ARRAY_INDEX':
      return 'index operator expects an array';
  }
}

export function formatDiagnostic(diagnostic: ImpDiagnostic): string {
  return `[Line ${diagnostic.line}] semantic error: ${diagnostic.message}`;
}

// Diagnostic sink handed to every validating constructor.
export class DiagnosticReporter {
  private diagnostics: ImpDiagnostic[] = [];
  private listeners: DiagnosticListener[] = [];

  constructor(readonly lines: LineCounter = new LineCounter()) {}

  report(error: SemanticError): ImpDiagnostic {
    const diagnostic: ImpDiagnostic = {
      kind: error.kind,
      severity: 'error',
      line: this.lines.value,
      message: describeError(error),
      source: 'impc',
    };
    this.diagnostics.push(diagnostic);
    this.listeners.forEach(listener => listener(diagnostic));
    return diagnostic;
  }

  onReport(listener: DiagnosticListener): () => void {
    this.listeners.push(listener);
    return () => {
      this.listeners = this.listeners.filter(l => l !== listener);
    };
  }

  getDiagnostics(): ImpDiagnostic[] {
    return [...this.diagnostics];
  }

  count(kind?: ErrorKind): number {
    if (!kind) return this.diagnostics.length;
    return this.diagnostics.filter(d => d.kind === kind).length;
  }

  hasErrors(): boolean {
    return this.diagnostics.length > 0;
  }

  format(): string[] {
    return this.diagnostics.map(formatDiagnostic);
  }

  clear(): void {
    this.diagnostics = [];
  }
}
