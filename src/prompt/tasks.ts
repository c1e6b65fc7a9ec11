/**
 * Ready-made tasks: render a library prompt, send it, post-process the reply.
 */

import type { ChatOptions, OrchestratorResponse } from '../orchestrator/types.js';
import { parseJsonResponse, PromptLibrary } from './library.js';

export interface ChatClient {
  chat(prompt: string, options?: ChatOptions): Promise<OrchestratorResponse>;
}

export async function summarize(client: ChatClient, text: string, options?: ChatOptions): Promise<string> {
  return (await client.chat(PromptLibrary.summarize(text), options)).content;
}

export async function translate(
  client: ChatClient,
  text: string,
  language: string,
  options?: ChatOptions,
): Promise<string> {
  return (await client.chat(PromptLibrary.translate(text, language), options)).content;
}

export async function generateHtmlTailwind(
  client: ChatClient,
  description: string,
  options?: ChatOptions,
): Promise<string> {
  return (await client.chat(PromptLibrary.htmlTailwind(description), options)).content;
}

/**
 * Extract `fields` from free text. Every requested field is present in the
 * result; anything the model left out or returned as a non-string is null.
 */
export async function fillFormFields(
  client: ChatClient,
  input: string,
  fields: string[],
  options?: ChatOptions,
): Promise<Record<string, string | null>> {
  const response = await client.chat(PromptLibrary.extractFields(input, fields), options);
  const parsed = parseJsonResponse(response.content);

  const result: Record<string, string | null> = {};
  for (const field of fields) {
    const value = parsed[field];
    result[field] = typeof value === 'string' ? value : typeof value === 'number' ? String(value) : null;
  }
  return result;
}

export async function analyzeSalesData(client: ChatClient, data: string, options?: ChatOptions): Promise<string> {
  return (await client.chat(PromptLibrary.salesAnalysis(data), options)).content;
}

export async function analyzeTrafficData(client: ChatClient, data: string, options?: ChatOptions): Promise<string> {
  return (await client.chat(PromptLibrary.trafficAnalysis(data), options)).content;
}
