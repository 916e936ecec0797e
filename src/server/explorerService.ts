/**
 * Explorer Service - contract for inspecting the compiler pipeline
 *
 * Editor tooling talks to the explorer to see what each stage makes of a
 * document: the token stream, the syntax tree and the generated IR.
 * Everything here is JSON-serializable.
 */

import type { Diagnostic } from '../outcome/diagnostic';
import type { Stmt } from '../core/ast/nodes';
import type { Token } from '../core/lexer/token';
import { isStage, type Stage } from '../core/pipeline/compile';

// ============================================================
// SERVICE TYPES
// ============================================================

export type { Stage };

export interface DocumentInfo {
  id: string;
  name?: string;
  /** Bumped on every update */
  version: number;
  /** Whether the document compiles to IR without errors */
  ok: boolean;
  errorCount: number;
}

export interface DocumentSnapshot extends DocumentInfo {
  source: string;
}

export type StageResult =
  | { stage: 'tokens'; tokens: Token[]; truncated: boolean }
  | { stage: 'ast'; ok: boolean; statements: Stmt[]; text: string }
  | { stage: 'ir'; ok: boolean; ir?: string; verification: string[] };

export interface CompileResponse {
  result: StageResult;
  diagnostics: Diagnostic[];
}

// ============================================================
// SERVICE INTERFACE
// ============================================================

export interface IExplorerService {
  /** One-off compile of a source string up to the given stage */
  compile(source: string, stage: Stage): Promise<CompileResponse>;

  createDocument(source: string, name?: string): Promise<string>;
  listDocuments(): Promise<DocumentInfo[]>;
  getDocument(id: string): Promise<DocumentSnapshot>;
  updateDocument(id: string, source: string): Promise<DocumentInfo>;
  closeDocument(id: string): Promise<void>;

  /** Compile a stored document up to the given stage */
  inspect(id: string, stage: Stage): Promise<CompileResponse>;
}

// ============================================================
// WEBSOCKET PROTOCOL
// ============================================================

/**
 * Events the server sends to clients
 */
export type ServerEvent =
  | { type: 'compiled'; document: string; version: number; response: CompileResponse }
  | { type: 'closed'; document: string }
  | { type: 'error'; error: { message: string } };

/**
 * Commands the client sends to server
 */
export type ClientCommand =
  | { type: 'update'; source: string }
  | { type: 'compile'; stage: Stage };

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Validates a decoded client message. */
export function parseClientCommand(data: unknown): ClientCommand {
  if (!isRecord(data)) throw new Error('Command must be a JSON object');

  switch (data.type) {
    case 'update':
      if (typeof data.source !== 'string') throw new Error('update needs a string "source"');
      return { type: 'update', source: data.source };
    case 'compile': {
      const stage = data.stage ?? 'ir';
      if (typeof stage !== 'string' || !isStage(stage)) throw new Error(`Unknown stage: ${String(stage)}`);
      return { type: 'compile', stage };
    }
    default:
      throw new Error(`Unknown command: ${String(data.type)}`);
  }
}

/** Reads `{ source, name?, stage? }` from a request body. */
export function parseSourceRequest(body: unknown): { source: string; name?: string; stage: Stage } {
  if (!isRecord(body) || typeof body.source !== 'string') {
    throw new Error('Request body needs a string "source"');
  }
  const stage = body.stage ?? 'ir';
  if (typeof stage !== 'string' || !isStage(stage)) {
    throw new Error(`Unknown stage: ${String(stage)}`);
  }
  const name = typeof body.name === 'string' ? body.name : undefined;
  return name === undefined ? { source: body.source, stage } : { source: body.source, name, stage };
}
