/**
 * Explorer Server - HTTP + WebSocket server for inspecting compiler stages
 *
 * Exposes the pipeline through:
 * - REST API for one-off compiles and document management
 * - WebSocket for recompiling a document as it is edited
 */

import express, { Request, Response, NextFunction } from 'express';
import { WebSocketServer, WebSocket } from 'ws';
import { createServer } from 'http';
import type { AddressInfo } from 'net';
import { Logger } from '../diagnostics/logger';
import { isStage, type Stage } from '../core/pipeline/compile';
import {
  parseClientCommand,
  parseSourceRequest,
  type ClientCommand,
  type CompileResponse,
  type DocumentInfo,
  type DocumentSnapshot,
  type IExplorerService,
  type ServerEvent,
} from './explorerService';
import { ExplorerWorkspace } from './explorerWorkspace';

export interface ExplorerServerOptions {
  /** 0 picks a free port; see `address()` */
  port?: number;
  tokenLimit?: number;
  logger?: Logger;
}

function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}

// ============================================================
// EXPLORER SERVER IMPLEMENTATION
// ============================================================

export class ExplorerServer implements IExplorerService {
  private app: express.Application;
  private server: ReturnType<typeof createServer>;
  private wss: WebSocketServer;
  private workspace: ExplorerWorkspace;
  private clients = new Map<string, Set<WebSocket>>();
  private port: number;
  private logger: Logger;

  constructor(options: ExplorerServerOptions = {}) {
    this.port = options.port ?? 3457;
    this.logger = options.logger ?? new Logger();
    this.workspace = new ExplorerWorkspace(options.tokenLimit);

    this.app = express();
    this.app.use(express.json());
    this.app.use(this.corsMiddleware);

    this.server = createServer(this.app);
    this.wss = new WebSocketServer({ server: this.server, path: '/ws' });

    this.setupRoutes();
    this.setupWebSocket();
  }

  // ─────────────────────────────────────────────────────────────
  // MIDDLEWARE
  // ─────────────────────────────────────────────────────────────

  private corsMiddleware = (req: Request, res: Response, next: NextFunction) => {
    res.header('Access-Control-Allow-Origin', '*');
    res.header('Access-Control-Allow-Methods', 'GET, POST, PUT, DELETE, OPTIONS');
    res.header('Access-Control-Allow-Headers', 'Content-Type');
    if (req.method === 'OPTIONS') {
      res.sendStatus(200);
      return;
    }
    next();
  };

  // ─────────────────────────────────────────────────────────────
  // HTTP ROUTES
  // ─────────────────────────────────────────────────────────────

  private setupRoutes() {
    const app = this.app;

    // Health check
    app.get('/health', (_req, res) => {
      res.json({ status: 'ok', documents: this.workspace.size });
    });

    app.post('/compile', async (req, res) => {
      try {
        const { source, stage } = parseSourceRequest(req.body);
        res.json(await this.compile(source, stage));
      } catch (e) {
        res.status(400).json({ error: errorMessage(e) });
      }
    });

    // ─── Document Management ───
    app.post('/document', async (req, res) => {
      try {
        const { source, name } = parseSourceRequest(req.body);
        const id = await this.createDocument(source, name);
        res.json({ id });
      } catch (e) {
        res.status(400).json({ error: errorMessage(e) });
      }
    });

    app.get('/documents', async (_req, res) => {
      res.json(await this.listDocuments());
    });

    app.get('/document/:id', async (req, res) => {
      try {
        res.json(await this.getDocument(req.params.id));
      } catch (e) {
        res.status(404).json({ error: errorMessage(e) });
      }
    });

    app.put('/document/:id', async (req, res) => {
      if (!this.workspace.has(req.params.id)) {
        res.status(404).json({ error: `Document not found: ${req.params.id}` });
        return;
      }
      try {
        const { source } = parseSourceRequest(req.body);
        res.json(await this.updateDocument(req.params.id, source));
      } catch (e) {
        res.status(400).json({ error: errorMessage(e) });
      }
    });

    app.delete('/document/:id', async (req, res) => {
      try {
        await this.closeDocument(req.params.id);
        res.json({ success: true });
      } catch (e) {
        res.status(404).json({ error: errorMessage(e) });
      }
    });

    // ─── Stage Inspection ───
    app.get('/document/:id/:stage', async (req, res) => {
      const stage = req.params.stage;
      if (!isStage(stage)) {
        res.status(400).json({ error: `Unknown stage: ${stage}` });
        return;
      }
      try {
        res.json(await this.inspect(req.params.id, stage));
      } catch (e) {
        res.status(404).json({ error: errorMessage(e) });
      }
    });
  }

  // ─────────────────────────────────────────────────────────────
  // WEBSOCKET
  // ─────────────────────────────────────────────────────────────

  private setupWebSocket() {
    this.wss.on('connection', (ws, req) => {
      // Parse document ID from query string: /ws?document=xxx
      const url = new URL(req.url ?? '', `http://${req.headers.host}`);
      const documentId = url.searchParams.get('document');

      if (!documentId || !this.workspace.has(documentId)) {
        ws.close(4404, 'Document not found');
        return;
      }

      const clients = this.clients.get(documentId) ?? new Set<WebSocket>();
      this.clients.set(documentId, clients);
      clients.add(ws);

      // Send the current IR
      this.send(ws, this.compiledEvent(documentId, 'ir'));

      ws.on('message', (data) => {
        try {
          const decoded: unknown = JSON.parse(data.toString());
          this.handleWebSocketCommand(documentId, parseClientCommand(decoded), ws);
        } catch (e) {
          this.send(ws, { type: 'error', error: { message: errorMessage(e) } });
        }
      });

      ws.on('close', () => {
        clients.delete(ws);
      });
    });
  }

  private handleWebSocketCommand(documentId: string, cmd: ClientCommand, ws: WebSocket) {
    switch (cmd.type) {
      case 'update':
        // Every client of the document sees the edit
        this.workspace.update(documentId, cmd.source);
        this.broadcastToDocument(documentId, this.compiledEvent(documentId, 'ir'));
        return;
      case 'compile':
        this.send(ws, this.compiledEvent(documentId, cmd.stage));
        return;
    }
  }

  private compiledEvent(documentId: string, stage: Stage): ServerEvent {
    return {
      type: 'compiled',
      document: documentId,
      version: this.workspace.version(documentId),
      response: this.workspace.inspect(documentId, stage),
    };
  }

  private send(ws: WebSocket, event: ServerEvent) {
    ws.send(JSON.stringify(event));
  }

  private broadcastToDocument(documentId: string, event: ServerEvent) {
    const clients = this.clients.get(documentId);
    if (!clients) return;

    const message = JSON.stringify(event);
    for (const client of clients) {
      if (client.readyState === WebSocket.OPEN) {
        client.send(message);
      }
    }
  }

  // ─────────────────────────────────────────────────────────────
  // SERVICE IMPLEMENTATION
  // ─────────────────────────────────────────────────────────────

  async compile(source: string, stage: Stage): Promise<CompileResponse> {
    return this.workspace.compile(source, stage);
  }

  async createDocument(source: string, name?: string): Promise<string> {
    return this.workspace.create(source, name);
  }

  async listDocuments(): Promise<DocumentInfo[]> {
    return this.workspace.list();
  }

  async getDocument(id: string): Promise<DocumentSnapshot> {
    return this.workspace.snapshot(id);
  }

  async updateDocument(id: string, source: string): Promise<DocumentInfo> {
    const info = this.workspace.update(id, source);
    this.broadcastToDocument(id, this.compiledEvent(id, 'ir'));
    return info;
  }

  async closeDocument(id: string): Promise<void> {
    this.workspace.close(id);
    this.broadcastToDocument(id, { type: 'closed', document: id });
    for (const client of this.clients.get(id) ?? []) client.close(1000, 'Document closed');
    this.clients.delete(id);
  }

  async inspect(id: string, stage: Stage): Promise<CompileResponse> {
    return this.workspace.inspect(id, stage);
  }

  // ─────────────────────────────────────────────────────────────
  // SERVER LIFECYCLE
  // ─────────────────────────────────────────────────────────────

  /** The bound port once started. */
  address(): number {
    const addr: AddressInfo | string | null = this.server.address();
    return addr !== null && typeof addr === 'object' ? addr.port : this.port;
  }

  start(): Promise<void> {
    return new Promise((resolve, reject) => {
      this.server.once('error', reject);
      this.server.listen(this.port, () => {
        const port = this.address();
        this.logger.info(`Explorer server running at http://localhost:${port}`);
        this.logger.info(`WebSocket: ws://localhost:${port}/ws?document=<id>`);
        this.logger.info(`Health: http://localhost:${port}/health`);
        resolve();
      });
    });
  }

  stop(): Promise<void> {
    return new Promise((resolve) => {
      for (const client of this.wss.clients) client.terminate();
      this.wss.close();
      this.server.close(() => resolve());
    });
  }
}
