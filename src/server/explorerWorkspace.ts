/**
 * Explorer Workspace - the documents an explorer server holds open
 *
 * Every compile runs against a fresh DiagnosticsContext whose log lines go
 * to a memory sink, so requests never write to the server's console and
 * diagnostics never leak between documents.
 */

import { DiagnosticsContext } from '../diagnostics/context';
import { createMemorySink } from '../diagnostics/logger';
import { makeDiagnostic } from '../outcome/codes';
import { isError } from '../outcome/diagnostic';
import { compileSource, dumpAst, lexSource, type Stage } from '../core/pipeline/compile';
import type { CompileResponse, DocumentInfo, DocumentSnapshot, StageResult } from './explorerService';

let documentCounter = 0;

export function newDocumentId(): string {
  return `doc_${++documentCounter}_${Date.now().toString(36)}`;
}

interface ExplorerDocument {
  id: string;
  name?: string;
  source: string;
  version: number;
}

export class ExplorerWorkspace {
  private documents = new Map<string, ExplorerDocument>();

  constructor(private readonly tokenLimit = 500) {}

  // ─────────────────────────────────────────────────────────────
  // COMPILATION
  // ─────────────────────────────────────────────────────────────

  compile(source: string, stage: Stage): CompileResponse {
    const ctx = new DiagnosticsContext({ level: 'DEBUG', sink: createMemorySink() });
    let result: StageResult;

    switch (stage) {
      case 'tokens': {
        const tokens = lexSource(source, this.tokenLimit);
        for (const t of tokens) {
          if (t.kind !== 'ERROR') continue;
          ctx.report(makeDiagnostic('E0001', { message: t.lexeme }, { startLine: t.line, startCol: t.column }));
        }
        const last = tokens[tokens.length - 1];
        result = { stage, tokens, truncated: last !== undefined && last.kind !== 'END_OF_FILE' };
        break;
      }
      case 'ast': {
        const parsed = dumpAst(source, { diagnostics: ctx });
        result = { stage, ok: parsed.ok, statements: parsed.statements, text: parsed.text };
        break;
      }
      case 'ir': {
        const compiled = compileSource(source, { diagnostics: ctx });
        result = compiled.ir === undefined
          ? { stage, ok: compiled.ok, verification: compiled.verification }
          : { stage, ok: compiled.ok, ir: compiled.ir, verification: compiled.verification };
        break;
      }
    }

    return { result, diagnostics: ctx.diagnostics() };
  }

  // ─────────────────────────────────────────────────────────────
  // DOCUMENTS
  // ─────────────────────────────────────────────────────────────

  create(source: string, name?: string): string {
    const id = newDocumentId();
    this.documents.set(id, name === undefined ? { id, source, version: 1 } : { id, name, source, version: 1 });
    return id;
  }

  has(id: string): boolean {
    return this.documents.has(id);
  }

  get size(): number {
    return this.documents.size;
  }

  list(): DocumentInfo[] {
    return [...this.documents.values()].map((doc) => this.describe(doc));
  }

  snapshot(id: string): DocumentSnapshot {
    const doc = this.require(id);
    return { ...this.describe(doc), source: doc.source };
  }

  update(id: string, source: string): DocumentInfo {
    const doc = this.require(id);
    doc.source = source;
    doc.version++;
    return this.describe(doc);
  }

  close(id: string): void {
    if (!this.documents.delete(id)) throw new Error(`Document not found: ${id}`);
  }

  inspect(id: string, stage: Stage): CompileResponse {
    return this.compile(this.require(id).source, stage);
  }

  version(id: string): number {
    return this.require(id).version;
  }

  private require(id: string): ExplorerDocument {
    const doc = this.documents.get(id);
    if (!doc) throw new Error(`Document not found: ${id}`);
    return doc;
  }

  private describe(doc: ExplorerDocument): DocumentInfo {
    const { result, diagnostics } = this.compile(doc.source, 'ir');
    const info: DocumentInfo = {
      id: doc.id,
      version: doc.version,
      ok: result.stage === 'ir' && result.ok,
      errorCount: diagnostics.filter(isError).length,
    };
    if (doc.name !== undefined) info.name = doc.name;
    return info;
  }
}
