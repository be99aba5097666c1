// utils/index.ts
// ==========================
// 📦 Utility Exports
// ==========================

export {
  toParseError,
  formatError,
  formatErrorWithColors,
  formatAnyError,
  formatCompilationError,
  formatLocation,
  formatSemanticDiagnostic,
  formatDiagnosticSummary,
} from './format.js';
export { highlightSnippet, highlightLine } from './highlight.js';
export { createLogger } from './logger.js';
export type { Logger, LoggerOptions } from './logger.js';
export type { Location, Position } from './types.js';
