// src/index.ts
// Bramble compiler - Public API
//
// Clean interface for editor tooling, build scripts and the bramblec CLI.

// ═══════════════════════════════════════════════════════════════════════════════
// LEXER
// ═══════════════════════════════════════════════════════════════════════════════

export { Lexer, tokenize } from "./core/lexer/lexer";
export {
  KEYWORDS,
  TYPE_KINDS,
  formatToken,
  isTypeKind,
  makeToken,
  type Token,
  type TokenKind,
  type TypeKind,
} from "./core/lexer/token";

// ═══════════════════════════════════════════════════════════════════════════════
// SYNTAX TREE & PARSER
// ═══════════════════════════════════════════════════════════════════════════════

export * from "./core/ast/nodes";
export { accept, acceptExpr, acceptStmt, isExpr, type AstVisitor } from "./core/ast/visitor";
export { AstPrinter, formatExpr, printAst } from "./core/ast/printer";
export { ParseError, Parser, type ParserOptions } from "./core/parser/parser";

// ═══════════════════════════════════════════════════════════════════════════════
// CODE GENERATION
// ═══════════════════════════════════════════════════════════════════════════════

export { CodeGenerator, MAIN_SYMBOL, type CodeGeneratorOptions } from "./core/codegen/codegen";
export * as ir from "./core/ir";

// ═══════════════════════════════════════════════════════════════════════════════
// BACKEND & PIPELINE
// ═══════════════════════════════════════════════════════════════════════════════

export {
  Backend,
  DEFAULT_BACKEND_CONFIG,
  binaryPathFor,
  irPathFor,
  optimizedPathFor,
  type BackendConfig,
  type BackendResult,
  type OptLevel,
} from "./core/backend/backend";
export { runCommand, type CommandResult, type CommandRunner } from "./core/backend/commandRunner";
export {
  STAGES,
  buildExecutable,
  compileSource,
  dumpAst,
  isStage,
  lexSource,
  parseSource,
  type BuildResult,
  type CompileResult,
  type ParseResult,
  type Stage,
} from "./core/pipeline/compile";

// ═══════════════════════════════════════════════════════════════════════════════
// DIAGNOSTICS & CONFIG
// ═══════════════════════════════════════════════════════════════════════════════

export { DiagnosticsContext, type DiagnosticsOptions } from "./diagnostics/context";
export { Logger, createMemorySink, type LogLevel, type LogSink } from "./diagnostics/logger";
export { ExpressionTrace } from "./diagnostics/trace";
export { formatDiagnostic, isError, type Diagnostic, type DiagnosticSeverity, type Span } from "./outcome/diagnostic";
export { DIAGNOSTIC_CODES, makeDiagnostic, type DiagnosticCode } from "./outcome/codes";
export * from "./core/config";
