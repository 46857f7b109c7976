// @relgate/parser - language handlers, complexity counting and code analysis

// =============================================================================
// TYPES
// =============================================================================

export type {
  FileRecord,
  ComponentKind,
  ComponentRecord,
  HandlerResult,
  AnalysisStatus,
  FileAnalysis,
  ComplexitySummary,
  CodeAnalysisSummary,
  CodeAnalysis,
} from './types.js';

// =============================================================================
// LANGUAGES
// =============================================================================

export type { LanguageHandler } from './languages/types.js';
export { LanguageRegistry, createDefaultRegistry } from './languages/registry.js';
export { PythonHandler } from './languages/python.js';
export { JavaScriptHandler } from './languages/javascript.js';
export { JavaHandler } from './languages/java.js';
export { CppHandler } from './languages/cpp.js';
export { GoHandler } from './languages/go.js';
export { PatternLanguageHandler } from './languages/patterns.js';
export type { ComponentPattern } from './languages/patterns.js';
export { extractFallbackComponents } from './languages/fallback.js';

// =============================================================================
// AST
// =============================================================================

export { parseAST, clearParserCache } from './ast/parser.js';
export type { ASTParseResult, GrammarLanguage } from './ast/parser.js';
export { calculateComplexity } from './ast/complexity/cyclomatic.js';
export type { DecisionPoints } from './ast/complexity/cyclomatic.js';

// =============================================================================
// ANALYSIS
// =============================================================================

export { CodeAnalyzer, summarize } from './code-analyzer.js';
export type { CodeAnalyzerOptions, AnalyzeOptions } from './code-analyzer.js';
