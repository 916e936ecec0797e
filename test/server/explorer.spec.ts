// test/server/explorer.spec.ts
// Explorer workspace, protocol validation and the HTTP/WebSocket surface

import { afterAll, beforeAll, describe, it, expect } from "vitest";
import WebSocket from "ws";
import { ExplorerServer, ExplorerWorkspace, parseClientCommand, parseSourceRequest } from "../../src/server";
import { Logger, createMemorySink } from "../../src/diagnostics/logger";

const PROGRAM = "func main() -> i32 { return 7; }";

function field(value: unknown, key: string): unknown {
  return typeof value === "object" && value !== null && key in value
    ? Object.entries(value).find(([k]) => k === key)?.[1]
    : undefined;
}

describe("ExplorerWorkspace", () => {
  it("returns tokens with lexical diagnostics", () => {
    const { result, diagnostics } = new ExplorerWorkspace().compile('x "abc', "tokens");
    expect(result).toMatchObject({ stage: "tokens", truncated: false });
    expect(diagnostics).toHaveLength(1);
    expect(diagnostics[0]).toMatchObject({
      code: "E0001",
      message: "Unterminated string",
      span: { startLine: 1, startCol: 7 },
    });
  });

  it("marks a token stream cut at the limit", () => {
    const { result } = new ExplorerWorkspace(2).compile("a b c", "tokens");
    expect(result.stage === "tokens" && result.truncated).toBe(true);
  });

  it("returns the AST text and the IR", () => {
    const ws = new ExplorerWorkspace();
    expect(ws.compile("a;", "ast").result).toMatchObject({ stage: "ast", ok: true, text: "ExpressionStmt:\n  Identifier: a" });

    const { result } = ws.compile(PROGRAM, "ir");
    expect(result).toMatchObject({ stage: "ir", ok: true, verification: [] });
    expect(result.stage === "ir" ? result.ir : undefined).toContain("define i32 @main(i32 %argc, ptr %argv)");
  });

  it("returns no IR and the diagnostics for a failing program", () => {
    const { result, diagnostics } = new ExplorerWorkspace().compile("func main() -> i32 { return y; }", "ir");
    expect(result).toEqual({ stage: "ir", ok: false, verification: [] });
    expect(diagnostics.map((d) => d.code)).toEqual(["E0100"]);
  });

  it("tracks document versions and status", () => {
    const ws = new ExplorerWorkspace();
    const id = ws.create(PROGRAM, "main.bm");
    expect(id).toMatch(/^doc_\d+_[0-9a-z]+$/);
    expect(ws.list()).toEqual([{ id, name: "main.bm", version: 1, ok: true, errorCount: 0 }]);

    expect(ws.update(id, "func main() -> i32 { return q; }")).toEqual({
      id,
      name: "main.bm",
      version: 2,
      ok: false,
      errorCount: 1,
    });
    expect(ws.snapshot(id).source).toBe("func main() -> i32 { return q; }");

    ws.close(id);
    expect(ws.has(id)).toBe(false);
    expect(() => ws.snapshot(id)).toThrow(`Document not found: ${id}`);
  });
});

describe("protocol validation", () => {
  it("accepts well-formed client commands", () => {
    expect(parseClientCommand({ type: "update", source: "x" })).toEqual({ type: "update", source: "x" });
    expect(parseClientCommand({ type: "compile" })).toEqual({ type: "compile", stage: "ir" });
  });

  it("rejects malformed client commands", () => {
    expect(() => parseClientCommand("nope")).toThrow("Command must be a JSON object");
    expect(() => parseClientCommand({ type: "compile", stage: "asm" })).toThrow("Unknown stage: asm");
    expect(() => parseClientCommand({ type: "launch" })).toThrow("Unknown command: launch");
  });

  it("reads source requests", () => {
    expect(parseSourceRequest({ source: "a", name: "n" })).toEqual({ source: "a", name: "n", stage: "ir" });
    expect(() => parseSourceRequest({})).toThrow('Request body needs a string "source"');
  });
});

describe("ExplorerServer", () => {
  let server: ExplorerServer;
  let base: string;

  beforeAll(async () => {
    server = new ExplorerServer({ port: 0, logger: new Logger({ sink: createMemorySink() }) });
    await server.start();
    base = `127.0.0.1:${server.address()}`;
  });

  afterAll(async () => {
    await server.stop();
  });

  const post = (route: string, body: unknown, method = "POST") =>
    fetch(`http://${base}${route}`, {
      method,
      headers: { "Content-Type": "application/json" },
      body: JSON.stringify(body),
    });

  it("answers health checks", async () => {
    const res = await fetch(`http://${base}/health`);
    expect(await res.json()).toEqual({ status: "ok", documents: 0 });
  });

  it("compiles one-off sources", async () => {
    const res = await post("/compile", { source: "a;", stage: "ast" });
    expect(res.status).toBe(200);
    expect(field(await res.json(), "result")).toMatchObject({ text: "ExpressionStmt:\n  Identifier: a" });

    const bad = await post("/compile", { stage: "ir" });
    expect(bad.status).toBe(400);
  });

  it("manages documents and their stages", async () => {
    const created = await post("/document", { source: PROGRAM });
    const id = field(await created.json(), "id");
    if (typeof id !== "string") throw new Error("no document id");

    const ir = await fetch(`http://${base}/document/${id}/ir`);
    expect(field(await ir.json(), "result")).toMatchObject({ stage: "ir", ok: true });

    expect((await fetch(`http://${base}/document/${id}/asm`)).status).toBe(400);
    expect((await fetch(`http://${base}/document/doc_missing`)).status).toBe(404);

    const updated = await post(`/document/${id}`, { source: "x;" }, "PUT");
    expect(await updated.json()).toMatchObject({ id, version: 2, ok: false });

    expect((await fetch(`http://${base}/document/${id}`, { method: "DELETE" })).status).toBe(200);
    expect((await fetch(`http://${base}/document/${id}`)).status).toBe(404);
  });

  it("pushes recompiles to WebSocket clients", async () => {
    const id = await server.createDocument(PROGRAM);
    const ws = new WebSocket(`ws://${base}/ws?document=${id}`);
    const messages: unknown[] = [];
    const next = (count: number) =>
      new Promise<void>((resolve) => {
        const check = () => {
          if (messages.length >= count) resolve();
          else setTimeout(check, 5);
        };
        check();
      });
    ws.on("message", (data) => messages.push(JSON.parse(data.toString())));

    await next(1);
    expect(messages[0]).toMatchObject({ type: "compiled", document: id, version: 1 });

    ws.send(JSON.stringify({ type: "update", source: "func main() { }" }));
    await next(2);
    expect(messages[1]).toMatchObject({ type: "compiled", version: 2, response: { result: { stage: "ir", ok: true } } });

    ws.send(JSON.stringify({ type: "compile", stage: "elf" }));
    await next(3);
    expect(messages[2]).toEqual({ type: "error", error: { message: "Unknown stage: elf" } });

    ws.close();
  });

  it("closes sockets for unknown documents", async () => {
    const ws = new WebSocket(`ws://${base}/ws?document=doc_missing`);
    const code = await new Promise<number>((resolve) => ws.on("close", (c) => resolve(c)));
    expect(code).toBe(4404);
  });
});
