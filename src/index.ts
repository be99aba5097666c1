// src/index.ts
// ============================================
// 🌐 impc Public API
// ============================================

// 🧠 Grammar + parsing
export { compileGrammar, loadImpGrammar, type CompiledGrammar } from './grammar/index.js';
export { parseInput, type ParseResult, type ParseError } from './parser/index.js';
export { parseImp, ImpSyntaxError } from './imp/parser.js';
export type {
  ImpParseOptions,
  SyntaxProgram,
  SyntaxStatement,
  SyntaxExpr,
  SyntaxLvalue,
} from './imp/parser.js';

// 🌳 Semantic tree
export * from './imp/types.js';
export * from './imp/ast.js';
export * from './imp/actions.js';
export * from './imp/diagnostics.js';
export { ScopeStack } from './imp/scope.js';
export type {
  SymbolScope,
  VariableBinding,
  FunctionParam,
  FunctionSignature,
  DeclareResult,
} from './imp/scope.js';
export { render, renderStatement, renderProgram, type RenderOptions } from './imp/render.js';

// 🔧 Pipeline
export { buildProgram, buildStatement, buildExpr, createBuildContext, type BuildContext } from './imp/builder.js';
export { compile, type CompileOptions, type CompileResult } from './imp/compile.js';
export { loadConfig, validateConfig, defaultConfig, ImpConfigError, type ImpConfig } from './config.js';

// 🛠️ Utilities
export * from './utils/index.js';
