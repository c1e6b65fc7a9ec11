/**
 * Scripted providers for testing
 */

import { BaseProvider, type BackendRequest, type ProviderRuntime } from '../../src/providers/base.js';
import type { BackendReply, Message, ProviderSettings } from '../../src/providers/types.js';

/** One scripted outcome: a reply to return or an error to throw. */
export type ChatStep = Partial<BackendReply> | Error;

/** One scripted stream: the fragments to yield, optionally failing after them. */
export interface StreamStep {
  fragments: string[];
  failWith?: Error;
}

export function providerSettings(overrides: Partial<ProviderSettings> = {}): ProviderSettings {
  return {
    name: 'mock',
    type: 'mock',
    baseUrl: 'http://mock.invalid',
    defaultModel: 'mock-model',
    priority: 100,
    timeoutMs: 1000,
    maxRetries: 3,
    backoffFactor: 1.5,
    ...overrides,
  };
}

/**
 * Provider whose backend replays a script. The last chat step repeats once
 * the script runs out.
 */
export class ScriptedProvider extends BaseProvider {
  readonly calls: Array<{ messages: Message[]; request: BackendRequest }> = [];
  private chatSteps: ChatStep[];
  private streamSteps: StreamStep[];
  private available = true;

  constructor(
    settings: Partial<ProviderSettings> = {},
    script: { chat?: ChatStep[]; stream?: StreamStep[] } = {},
    runtime: ProviderRuntime = {},
  ) {
    super(providerSettings(settings), { sleep: async () => {}, ...runtime });
    this.chatSteps = script.chat ?? [{}];
    this.streamSteps = script.stream ?? [{ fragments: ['Hello', ' world'] }];
  }

  setAvailable(available: boolean): void {
    this.available = available;
  }

  protected async sendChat(messages: Message[], request: BackendRequest): Promise<BackendReply> {
    this.calls.push({ messages, request });
    const step = this.next(this.chatSteps);
    if (step instanceof Error) throw step;
    return {
      content: `Response from ${this.name}`,
      model: request.model,
      tokensUsed: 30,
      ...step,
    };
  }

  protected async *sendStream(messages: Message[], request: BackendRequest): AsyncIterable<string> {
    this.calls.push({ messages, request });
    const step = this.next(this.streamSteps);
    for (const fragment of step.fragments) {
      yield fragment;
    }
    if (step.failWith) throw step.failWith;
  }

  protected async checkAvailability(): Promise<boolean> {
    return this.available;
  }

  private next<T>(steps: T[]): T {
    const step = steps.length > 1 ? steps.shift() : steps[0];
    if (step === undefined) throw new Error('Script is empty');
    return step;
  }
}

/**
 * Provider whose backend yields `fragments` with `gapMs` between them, then
 * hangs until its attempt is aborted. With `stall: false` it finishes
 * normally instead. Chat calls hang until aborted.
 */
export class StallingProvider extends BaseProvider {
  readonly signals: AbortSignal[] = [];

  constructor(
    settings: Partial<ProviderSettings>,
    private readonly plan: { fragments: string[]; gapMs?: number; stall?: boolean },
  ) {
    super(providerSettings(settings), { sleep: async () => {} });
  }

  protected sendChat(_messages: Message[], _request: BackendRequest, signal: AbortSignal): Promise<BackendReply> {
    this.signals.push(signal);
    return untilAborted(signal);
  }

  protected async *sendStream(_messages: Message[], _request: BackendRequest, signal: AbortSignal): AsyncIterable<string> {
    this.signals.push(signal);
    for (const fragment of this.plan.fragments) {
      if (this.plan.gapMs) await new Promise(resolve => setTimeout(resolve, this.plan.gapMs));
      yield fragment;
    }
    if (this.plan.stall ?? true) {
      await untilAborted(signal);
    }
  }

  protected async checkAvailability(): Promise<boolean> {
    return true;
  }
}

function untilAborted(signal: AbortSignal): Promise<never> {
  return new Promise((_resolve, reject) => {
    signal.addEventListener('abort', () => reject(signal.reason), { once: true });
  });
}

/** Records the waits a provider would have slept through. */
export function sleepRecorder(): { sleep: (ms: number) => Promise<void>; delays: number[] } {
  const delays: number[] = [];
  return {
    delays,
    sleep: async (ms: number) => {
      delays.push(ms);
    },
  };
}
