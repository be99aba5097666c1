import { type ImpBlock, type ImpFun, type ImpNode, hasBody } from './ast.js';
import { type BuildContext, buildProgram, createBuildContext } from './builder.js';
import { DiagnosticReporter, type ImpDiagnostic } from './diagnostics.js';
import { parseImp } from './parser.js';
import { render } from './render.js';
import { type ParamCheckPolicy } from './actions.js';

export interface CompileOptions {
  /** Spaces per nesting level in the rendered code. */
  indent?: number;
  paramCheck?: ParamCheckPolicy;
  /** File name used in syntax error messages. */
  fileName?: string;
  onDiagnostic?: (diagnostic: ImpDiagnostic) => void;
}

export interface CompileResult {
  program: ImpBlock;
  diagnostics: ImpDiagnostic[];
  code: string;
  ok: boolean;
}

/**
 * Parses, checks and renders one source text. Syntax errors throw
 * `ImpSyntaxError`; semantic errors are collected in `diagnostics`.
 */
export function compile(source: string, options: CompileOptions = {}): CompileResult {
  const syntax = parseImp(source, { grammarSource: options.fileName });
  const diagnostics = new DiagnosticReporter();
  const unsubscribe = options.onDiagnostic ? diagnostics.onReport(options.onDiagnostic) : undefined;

  const ctx = createBuildContext({ paramCheck: options.paramCheck ?? 'all' }, diagnostics);
  const program = buildProgram(syntax, ctx);
  checkUndefinedFunctions(ctx, program, lastLine(source));
  unsubscribe?.();

  return {
    program,
    diagnostics: diagnostics.getDiagnostics(),
    code: render(program, 0, { indentWidth: options.indent }),
    ok: !diagnostics.hasErrors(),
  };
}

function lastLine(source: string): number {
  return source.split('\n').length;
}

/** Functions anywhere in the tree; a definition may sit inside a nested block. */
function collectFunctions(node: ImpNode, found: ImpFun[] = []): ImpFun[] {
  switch (node.kind) {
    case 'Fun':
      found.push(node);
      if (node.body) collectFunctions(node.body, found);
      break;
    case 'Block':
      node.lines.forEach(line => collectFunctions(line, found));
      break;
    case 'Conditional':
      collectFunctions(node.accepted, found);
      if (node.rejected) collectFunctions(node.rejected, found);
      break;
    case 'Loop':
      collectFunctions(node.body, found);
      break;
    default:
      break;
  }
  return found;
}

// A definition rejected as a re-declaration still counts as written.
function checkUndefinedFunctions(ctx: BuildContext, program: ImpBlock, line: number): void {
  const written = new Set(collectFunctions(program).filter(hasBody).map(fun => fun.name));
  ctx.diagnostics.lines.advanceTo(line);
  for (const signature of ctx.scope.getFunctions()) {
    if (!written.has(signature.name)) {
      ctx.diagnostics.report({ kind: 'DECLARED_BUT_NEVER_DEFINED', name: signature.name });
    }
  }
}
