export interface RequestRecord {
  timestamp: number;
  provider: string;
  model: string;
  tokens: number;
  cached: boolean;
  durationMs: number;
  streamed: boolean;
  toolCalls: number;
}

export interface HistoryTotals {
  totalRequests: number;
  cachedResponses: number;
  totalTokens: number;
  providersUsed: Record<string, number>;
  modelsUsed: Record<string, number>;
}

/**
 * Fixed-size ring of recent requests; once full, new records overwrite the
 * oldest. Totals cover every request ever recorded, not just retained ones.
 */
export class RequestHistory {
  private buffer: Array<RequestRecord | undefined>;
  private head = 0; // next write position
  private count = 0;
  private totals: HistoryTotals = emptyTotals();

  constructor(private readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError('RequestHistory capacity must be an integer >= 1');
    }
    this.buffer = new Array<RequestRecord | undefined>(capacity);
  }

  push(record: RequestRecord): void {
    this.buffer[this.head] = record;
    this.head = (this.head + 1) % this.capacity;
    if (this.count < this.capacity) this.count++;

    this.totals.totalRequests++;
    if (record.cached) this.totals.cachedResponses++;
    this.totals.totalTokens += record.tokens;
    this.totals.providersUsed[record.provider] = (this.totals.providersUsed[record.provider] ?? 0) + 1;
    this.totals.modelsUsed[record.model] = (this.totals.modelsUsed[record.model] ?? 0) + 1;
  }

  /** Retained records, oldest first. */
  toArray(): RequestRecord[] {
    const result: RequestRecord[] = [];
    const start = this.count < this.capacity ? 0 : this.head;
    for (let i = 0; i < this.count; i++) {
      const record = this.buffer[(start + i) % this.capacity];
      if (record) result.push(record);
    }
    return result;
  }

  latest(): RequestRecord | undefined {
    if (this.count === 0) return undefined;
    return this.buffer[(this.head - 1 + this.capacity) % this.capacity];
  }

  getTotals(): HistoryTotals {
    return {
      ...this.totals,
      providersUsed: { ...this.totals.providersUsed },
      modelsUsed: { ...this.totals.modelsUsed },
    };
  }

  get length(): number {
    return this.count;
  }

  clear(): void {
    this.buffer = new Array<RequestRecord | undefined>(this.capacity);
    this.head = 0;
    this.count = 0;
    this.totals = emptyTotals();
  }
}

function emptyTotals(): HistoryTotals {
  return { totalRequests: 0, cachedResponses: 0, totalTokens: 0, providersUsed: {}, modelsUsed: {} };
}
