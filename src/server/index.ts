/**
 * Explorer server public API.
 *
 * TYPES (for consumers):
 *   - IExplorerService      - The service interface contract
 *   - DocumentInfo          - Summary of an open document
 *   - DocumentSnapshot      - Document summary plus its source
 *   - StageResult           - Tokens, AST or IR of one compile
 *   - CompileResponse       - A stage result plus its diagnostics
 *   - ServerEvent           - WebSocket events (server -> client)
 *   - ClientCommand         - WebSocket commands (client -> server)
 *
 * IMPLEMENTATION (for running the server):
 *   - ExplorerServer        - The HTTP/WebSocket server
 *   - ExplorerWorkspace     - Documents and per-stage compiles, no network
 *   - startExplorerServer() - Quick start function
 */

// ============================================================
// PUBLIC TYPE EXPORTS - The Contract
// ============================================================

export type {
  IExplorerService,
  DocumentInfo,
  DocumentSnapshot,
  StageResult,
  CompileResponse,
  ServerEvent,
  ClientCommand,
} from './explorerService';

export { parseClientCommand, parseSourceRequest } from './explorerService';

// ============================================================
// PUBLIC CLASS EXPORTS - The Implementation
// ============================================================

export { ExplorerServer, type ExplorerServerOptions } from './explorerServer';
export { ExplorerWorkspace } from './explorerWorkspace';

// ============================================================
// CONVENIENCE FUNCTIONS
// ============================================================

import { ExplorerServer, type ExplorerServerOptions } from './explorerServer';

/**
 * Start an explorer server on the specified port.
 *
 * @example
 * ```typescript
 * import { startExplorerServer } from 'bramble/server';
 *
 * const server = await startExplorerServer(3457);
 * // Server now running at http://localhost:3457
 * // WebSocket at ws://localhost:3457/ws?document=<id>
 * ```
 */
export async function startExplorerServer(
  port = 3457,
  options: Omit<ExplorerServerOptions, 'port'> = {}
): Promise<ExplorerServer> {
  const server = new ExplorerServer({ ...options, port });
  await server.start();
  return server;
}

// ============================================================
// API DOCUMENTATION
// ============================================================

/**
 * # Explorer Server API
 *
 * ## REST Endpoints
 *
 * - GET    /health                   - Liveness and open document count
 * - POST   /compile                  - Compile once (body: { source, stage? })
 *
 * ### Documents
 * - POST   /document                 - Open a document (body: { source, name? })
 * - GET    /documents                - List documents
 * - GET    /document/:id             - Document info and source
 * - PUT    /document/:id             - Replace source (body: { source })
 * - DELETE /document/:id             - Close document
 * - GET    /document/:id/tokens      - Token stream
 * - GET    /document/:id/ast         - Syntax tree
 * - GET    /document/:id/ir          - Generated IR
 *
 * ## WebSocket Protocol
 *
 * Connect to: ws://localhost:PORT/ws?document=DOCUMENT_ID
 *
 * ### Server Events (ServerEvent)
 * - { type: 'compiled', document, version, response: CompileResponse }
 * - { type: 'closed', document }
 * - { type: 'error', error: { message } }
 *
 * ### Client Commands (ClientCommand)
 * - { type: 'update', source: string }
 * - { type: 'compile', stage: 'tokens' | 'ast' | 'ir' }
 */
