import { EventEmitter } from 'eventemitter3';
import type { PromptgateEvents } from './types.js';

/** One single-payload listener per event name. */
export type PromptgateListeners = {
  [K in keyof PromptgateEvents]: (data: PromptgateEvents[K]) => void;
};

/**
 * Process-local bus shared by providers, the cost controller, the tool
 * executor, the cache and the orchestrator. Event names and payloads are
 * checked against `PromptgateEvents`.
 */
export class EventBus extends EventEmitter<PromptgateListeners> {}
