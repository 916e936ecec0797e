// src/diagnostics/trace.ts
// Bounded ring buffer of the most recently generated expressions

export interface TraceEntry {
  /** Where the expression was generated, usually the enclosing function. */
  context: string;
  expression: string;
}

export const DEFAULT_TRACE_CAPACITY = 100;
export const DEFAULT_TRACEBACK_LIMIT = 15;

export class ExpressionTrace {
  private readonly slots: Array<TraceEntry | undefined>;
  private next = 0;
  private count = 0;

  constructor(
    readonly capacity = DEFAULT_TRACE_CAPACITY,
    readonly limit = DEFAULT_TRACEBACK_LIMIT
  ) {
    if (capacity < 1) throw new Error(`Trace capacity must be at least 1, got ${capacity}`);
    this.slots = new Array<TraceEntry | undefined>(capacity).fill(undefined);
  }

  get length(): number {
    return this.count;
  }

  push(context: string, expression: string): void {
    this.slots[this.next] = { context, expression };
    this.next = (this.next + 1) % this.capacity;
    if (this.count < this.capacity) this.count++;
  }

  /** Most recent entries, oldest first. */
  recent(n = this.limit): TraceEntry[] {
    const take = Math.min(n, this.count);
    const out: TraceEntry[] = [];
    for (let i = take; i > 0; i--) {
      const entry = this.slots[(this.next - i + this.capacity) % this.capacity];
      if (entry) out.push(entry);
    }
    return out;
  }

  clear(): void {
    this.slots.fill(undefined);
    this.next = 0;
    this.count = 0;
  }

  formatTraceback(): string[] {
    const entries = this.recent();
    if (entries.length === 0) return [];
    return [
      "Expressions traceback:",
      ...entries.map((e, i) => `  #${i + 1} [${e.context}] ${e.expression}`),
    ];
  }
}
