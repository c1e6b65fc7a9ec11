import { nanoid } from 'nanoid';
import { ConversationConfigSchema, type ConversationConfig, type ConversationConfigInput } from '../core/types.js';
import type { Message, MessageRole } from '../providers/types.js';
import { estimateTokens, truncate } from '../utils/tokens.js';

export interface ConversationMessage {
  id: string;
  role: MessageRole;
  content: string;
  tokens: number;
  timestamp: number;
}

export interface ConversationStats {
  messages: number;
  totalTokens: number;
  droppedMessages: number;
  hasSummary: boolean;
  maxMessages: number;
  contextWindow: number;
}

/** Folds dropped messages into the running summary. */
export type Summarizer = (dropped: ConversationMessage[], previous: string | null) => string;

/** What the orchestrator needs from a conversation store. */
export interface ConversationStore {
  addMessage(role: MessageRole, content: string, tokens?: number): void;
  getMessages(lastN?: number): Message[];
  clear(): void;
  getStats(): ConversationStats;
}

const SUMMARY_LINE_CHARS = 200;
const SUMMARY_MAX_CHARS = 2000;

export const defaultSummarizer: Summarizer = (dropped, previous) => {
  const lines = dropped.map(m => `${m.role}: ${truncate(m.content.replace(/\s+/g, ' '), SUMMARY_LINE_CHARS)}`);
  const body = [previous, ...lines].filter((line): line is string => Boolean(line)).join('\n');
  // keep the most recent part when the summary outgrows its budget
  return body.length > SUMMARY_MAX_CHARS ? body.slice(body.length - SUMMARY_MAX_CHARS) : body;
};

/**
 * Rolling chat history bounded by message count and token window. The oldest
 * messages are dropped first; with summarization on, they are folded into a
 * summary that is replayed as a leading system message.
 */
export class ConversationContext implements ConversationStore {
  readonly config: Readonly<ConversationConfig>;

  private messages: ConversationMessage[] = [];
  private summary: string | null = null;
  private dropped = 0;
  private readonly summarize: Summarizer;

  constructor(config: ConversationConfigInput = {}, options: { summarizer?: Summarizer } = {}) {
    this.config = Object.freeze(ConversationConfigSchema.parse(config));
    this.summarize = options.summarizer ?? defaultSummarizer;
  }

  addMessage(role: MessageRole, content: string, tokens: number = estimateTokens(content)): void {
    this.messages.push({ id: nanoid(8), role, content, tokens, timestamp: Date.now() });
    this.trim();
  }

  /** Messages to send, oldest first; `lastN` keeps only the most recent ones. */
  getMessages(lastN?: number): Message[] {
    const kept = lastN === undefined ? this.messages : lastN > 0 ? this.messages.slice(-lastN) : [];
    const result: Message[] = kept.map(m => ({ role: m.role, content: m.content }));
    if (this.summary) {
      result.unshift({ role: 'system', content: `Summary of the earlier conversation:\n${this.summary}` });
    }
    return result;
  }

  get history(): readonly ConversationMessage[] {
    return [...this.messages];
  }

  get totalTokens(): number {
    return this.messages.reduce((sum, m) => sum + m.tokens, 0);
  }

  getSummary(): string | null {
    return this.summary;
  }

  clear(): void {
    this.messages = [];
    this.summary = null;
    this.dropped = 0;
  }

  getStats(): ConversationStats {
    return {
      messages: this.messages.length,
      totalTokens: this.totalTokens,
      droppedMessages: this.dropped,
      hasSummary: this.summary !== null,
      maxMessages: this.config.maxMessages,
      contextWindow: this.config.contextWindow,
    };
  }

  private trim(): void {
    const removed: ConversationMessage[] = [];
    let tokens = this.totalTokens;

    // system messages and the newest message always stay, even if that overflows the window
    while (this.messages.length > this.config.maxMessages || tokens > this.config.contextWindow) {
      const index = this.messages.findIndex(
        (m, i) => m.role !== 'system' && i < this.messages.length - 1,
      );
      if (index === -1) break;
      const [oldest] = this.messages.splice(index, 1);
      tokens -= oldest.tokens;
      removed.push(oldest);
    }

    if (removed.length === 0) return;
    this.dropped += removed.length;
    if (this.config.summarizeOldMessages) {
      this.summary = this.summarize(removed, this.summary);
    }
  }
}
