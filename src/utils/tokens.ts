/**
 * Estimate token count from text (rough heuristic: ~4 chars per token).
 * Used for budget admission, not billing; providers report the real count.
 */
export function estimateTokens(text: string): number {
  if (!text) return 0;
  // code tokenizes denser than prose
  const isCode = /[{}\[\]();=><!&|]/.test(text);
  const charsPerToken = isCode ? 3.5 : 4;
  return Math.ceil(text.length / charsPerToken);
}

export function estimateMessageTokens(messages: ReadonlyArray<{ content: string }>): number {
  return messages.reduce((sum, m) => sum + estimateTokens(m.content), 0);
}

export function formatTokens(count: number): string {
  if (count < 1000) return `${count}`;
  if (count < 1000000) return `${(count / 1000).toFixed(1)}K`;
  return `${(count / 1000000).toFixed(2)}M`;
}

export function formatCost(cost: number): string {
  if (cost < 0.01) return `$${cost.toFixed(4)}`;
  if (cost < 1) return `$${cost.toFixed(3)}`;
  return `$${cost.toFixed(2)}`;
}

export function truncate(text: string, maxChars: number): string {
  return text.length <= maxChars ? text : `${text.slice(0, maxChars - 3)}...`;
}
