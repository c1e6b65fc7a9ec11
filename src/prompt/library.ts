import { PromptTemplateError, ResponseFormatError, toError } from '../core/errors.js';
import { isRecord } from '../utils/guards.js';
import {
  EXTRACT_FIELDS_TEMPLATE,
  HTML_TAILWIND_TEMPLATE,
  SALES_ANALYSIS_TEMPLATE,
  SUMMARIZE_TEMPLATE,
  TRAFFIC_ANALYSIS_TEMPLATE,
  TRANSLATE_TEMPLATE,
} from './templates.js';

export type TemplateParams = Record<string, string | number>;

const PLACEHOLDER = /\{(\w+)\}/g;

export function placeholders(template: string): string[] {
  return [...new Set(Array.from(template.matchAll(PLACEHOLDER), m => m[1]))];
}

/**
 * Substitute `{name}` placeholders. Every placeholder must have a value;
 * values themselves are inserted verbatim and never re-expanded.
 */
export function render(template: string, params: TemplateParams = {}): string {
  const missing = placeholders(template).filter(name => !(name in params));
  if (missing.length > 0) {
    throw new PromptTemplateError(`Missing template parameter${missing.length > 1 ? 's' : ''}: ${missing.join(', ')}`, missing);
  }
  return template.replace(PLACEHOLDER, (_match, name: string) => String(params[name]));
}

export const PromptLibrary = {
  SUMMARIZE: SUMMARIZE_TEMPLATE,
  TRANSLATE: TRANSLATE_TEMPLATE,
  EXTRACT_FIELDS: EXTRACT_FIELDS_TEMPLATE,
  HTML_TAILWIND: HTML_TAILWIND_TEMPLATE,
  SALES_ANALYSIS: SALES_ANALYSIS_TEMPLATE,
  TRAFFIC_ANALYSIS: TRAFFIC_ANALYSIS_TEMPLATE,

  render,

  summarize(text: string, maxSentences = 3): string {
    return render(SUMMARIZE_TEMPLATE, { text, maxSentences });
  },

  translate(text: string, language: string): string {
    return render(TRANSLATE_TEMPLATE, { text, language });
  },

  extractFields(input: string, fields: string[]): string {
    return render(EXTRACT_FIELDS_TEMPLATE, { input, fields: fields.join(', ') });
  },

  htmlTailwind(description: string): string {
    return render(HTML_TAILWIND_TEMPLATE, { description });
  },

  salesAnalysis(data: string): string {
    return render(SALES_ANALYSIS_TEMPLATE, { data });
  },

  trafficAnalysis(data: string): string {
    return render(TRAFFIC_ANALYSIS_TEMPLATE, { data });
  },
} as const;

/**
 * Parse a JSON object out of a model reply, tolerating a surrounding
 * markdown code fence.
 */
export function parseJsonResponse(response: string): Record<string, unknown> {
  const fenced = /```(?:json)?\s*([\s\S]*?)```/i.exec(response);
  const text = (fenced ? fenced[1] : response).trim();

  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (err) {
    throw new ResponseFormatError('Failed to parse model response as JSON', response, toError(err));
  }
  if (!isRecord(parsed)) {
    throw new ResponseFormatError('Model response is JSON but not an object', response);
  }
  return parsed;
}
