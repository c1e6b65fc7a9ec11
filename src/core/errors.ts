export class PromptgateError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly cause?: Error,
  ) {
    super(message);
    this.name = 'PromptgateError';
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      ...(this.cause ? { cause: this.cause.message } : {}),
    };
  }
}

export class ConfigError extends PromptgateError {
  constructor(message: string, cause?: Error) {
    super(message, 'CONFIG_ERROR', cause);
    this.name = 'ConfigError';
  }
}

export class InvalidInputError extends PromptgateError {
  constructor(message: string, cause?: Error) {
    super(message, 'INVALID_INPUT', cause);
    this.name = 'InvalidInputError';
  }
}

// ── Provider errors ─────────────────────────────────────────────────────────

export type ProviderErrorKind =
  | 'rate_limit'
  | 'timeout'
  | 'connection'
  | 'client'
  | 'api'
  | 'unexpected';

export class ProviderError extends PromptgateError {
  constructor(
    message: string,
    public readonly provider: string,
    public readonly kind: ProviderErrorKind,
    public readonly status?: number,
    cause?: Error,
  ) {
    super(message, 'PROVIDER_ERROR', cause);
    this.name = 'ProviderError';
  }

  /** Transient failures that a backoff-and-retry may get past. */
  get retryable(): boolean {
    return this.kind === 'rate_limit' || this.kind === 'timeout' || this.kind === 'connection' || this.kind === 'api';
  }

  override toJSON(): Record<string, unknown> {
    return { ...super.toJSON(), provider: this.provider, kind: this.kind, status: this.status };
  }
}

export class ProviderRateLimitError extends ProviderError {
  constructor(message: string, provider: string, status = 429, cause?: Error) {
    super(message, provider, 'rate_limit', status, cause);
    this.name = 'ProviderRateLimitError';
  }
}

export class ProviderTimeoutError extends ProviderError {
  constructor(message: string, provider: string, cause?: Error) {
    super(message, provider, 'timeout', undefined, cause);
    this.name = 'ProviderTimeoutError';
  }
}

export class ProviderConnectionError extends ProviderError {
  constructor(message: string, provider: string, cause?: Error) {
    super(message, provider, 'connection', undefined, cause);
    this.name = 'ProviderConnectionError';
  }
}

/** 4xx other than 429: the request itself is wrong, retrying cannot help. */
export class ProviderClientError extends ProviderError {
  constructor(message: string, provider: string, status: number, cause?: Error) {
    super(message, provider, 'client', status, cause);
    this.name = 'ProviderClientError';
  }
}

/** 5xx or a malformed backend reply. */
export class ProviderApiError extends ProviderError {
  constructor(message: string, provider: string, status?: number, cause?: Error) {
    super(message, provider, 'api', status, cause);
    this.name = 'ProviderApiError';
  }
}

export class ProviderUnexpectedError extends ProviderError {
  constructor(message: string, provider: string, cause?: Error) {
    super(message, provider, 'unexpected', undefined, cause);
    this.name = 'ProviderUnexpectedError';
  }
}

export class ProviderExhaustedError extends PromptgateError {
  constructor(
    public readonly provider: string,
    public readonly attempts: number,
    public readonly lastError: ProviderError,
  ) {
    super(
      `Provider "${provider}" failed after ${attempts} attempt${attempts === 1 ? '' : 's'}: ${lastError.message}`,
      'PROVIDER_EXHAUSTED',
      lastError,
    );
    this.name = 'ProviderExhaustedError';
  }

  get kind(): ProviderErrorKind {
    return this.lastError.kind;
  }
}

export interface ProviderFailure {
  provider: string;
  error: Error;
}

export class AllProvidersFailedError extends PromptgateError {
  constructor(public readonly failures: ProviderFailure[]) {
    super(
      `All ${failures.length} providers failed: ${failures.map(f => `${f.provider}: ${f.error.message}`).join('; ')}`,
      'ALL_PROVIDERS_FAILED',
      failures.length > 0 ? failures[failures.length - 1].error : undefined,
    );
    this.name = 'AllProvidersFailedError';
  }

  get providers(): string[] {
    return this.failures.map(f => f.provider);
  }
}

// ── Budget ──────────────────────────────────────────────────────────────────

export type BudgetWindow = 'hourly_tokens' | 'daily_tokens' | 'hourly_cost';

const WINDOW_LABELS: Record<BudgetWindow, string> = {
  hourly_tokens: 'Hourly token budget',
  daily_tokens: 'Daily token budget',
  hourly_cost: 'Hourly cost budget',
};

export class BudgetExceededError extends PromptgateError {
  constructor(
    public readonly window: BudgetWindow,
    public readonly requested: number,
    public readonly used: number,
    public readonly limit: number,
  ) {
    super(
      `${WINDOW_LABELS[window]} exceeded: ${formatAmount(window, used)} used + ${formatAmount(window, requested)} requested > ${formatAmount(window, limit)}`,
      'BUDGET_EXCEEDED',
    );
    this.name = 'BudgetExceededError';
  }
}

function formatAmount(window: BudgetWindow, value: number): string {
  return window === 'hourly_cost' ? `$${value.toFixed(4)}` : `${value}`;
}

// ── Tools ───────────────────────────────────────────────────────────────────

export class ToolError extends PromptgateError {
  constructor(message: string, public readonly tool: string, code = 'TOOL_ERROR', cause?: Error) {
    super(message, code, cause);
    this.name = 'ToolError';
  }
}

export class ToolNotFoundError extends ToolError {
  constructor(tool: string, available: string[]) {
    super(
      `Tool "${tool}" not found. Available: ${available.length > 0 ? available.join(', ') : '(none)'}`,
      tool,
      'TOOL_NOT_FOUND',
    );
    this.name = 'ToolNotFoundError';
  }
}

export class ToolExecutionError extends ToolError {
  constructor(
    tool: string,
    cause?: Error,
    message = `Tool "${tool}" failed: ${cause?.message ?? 'unknown error'}`,
    code = 'TOOL_EXECUTION_FAILED',
  ) {
    super(message, tool, code, cause);
    this.name = 'ToolExecutionError';
  }
}

/** The arguments did not fit the tool; a kind of execution failure. */
export class ToolValidationError extends ToolExecutionError {
  constructor(tool: string, public readonly issues: string[], cause?: Error) {
    super(tool, cause, `Invalid arguments for tool "${tool}": ${issues.join('; ')}`, 'TOOL_VALIDATION_FAILED');
    this.name = 'ToolValidationError';
  }
}

// ── Prompts ─────────────────────────────────────────────────────────────────

export class PromptTemplateError extends PromptgateError {
  constructor(message: string, public readonly missing: string[] = []) {
    super(message, 'TEMPLATE_ERROR');
    this.name = 'PromptTemplateError';
  }
}

/** A model reply did not have the shape the caller asked for. */
export class ResponseFormatError extends PromptgateError {
  constructor(message: string, public readonly response: string, cause?: Error) {
    super(message, 'INVALID_RESPONSE', cause);
    this.name = 'ResponseFormatError';
  }
}

export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}
