import { describe, it, expect } from 'vitest';
import { PromptTemplateError, ResponseFormatError } from '../../../src/core/errors.js';
import { PromptLibrary, parseJsonResponse, placeholders, render } from '../../../src/prompt/library.js';

describe('render', () => {
  it('should substitute every placeholder', () => {
    expect(render('Hello {name}, you are {age}', { name: 'Ada', age: 36 })).toBe('Hello Ada, you are 36');
  });

  it('should list missing parameters', () => {
    const error = (() => {
      try {
        render('{a} {b} {c}', { b: 'x' });
        return null;
      } catch (err) {
        return err;
      }
    })();
    expect(error).toBeInstanceOf(PromptTemplateError);
    expect(error instanceof PromptTemplateError && error.message).toBe('Missing template parameters: a, c');
    expect(error instanceof PromptTemplateError && error.missing).toEqual(['a', 'c']);
  });

  it('should not expand placeholders inside values', () => {
    expect(render('{a}', { a: '{b}' })).toBe('{b}');
  });

  it('should list each placeholder once', () => {
    expect(placeholders(PromptLibrary.EXTRACT_FIELDS)).toEqual(['fields', 'input']);
  });
});

describe('PromptLibrary', () => {
  it('should build a summarization prompt', () => {
    expect(PromptLibrary.summarize('Some text')).toBe(
      'Summarize the following text in at most 3 sentences.\nKeep the key facts and drop repetition.\n\nText:\nSome text\n\nSummary:',
    );
  });

  it('should build a translation prompt', () => {
    expect(PromptLibrary.translate('Good morning', 'French')).toBe(
      'Translate the following text into French.\nReturn only the translation, without notes or explanations.\n\nText:\nGood morning',
    );
  });

  it('should name the fields twice in the extraction prompt', () => {
    const prompt = PromptLibrary.extractFields('I am Ada', ['name', 'email']);
    expect(prompt.split('\n').slice(0, 2)).toEqual([
      'From the user input below, extract values for these fields: name, email.',
      'Return ONLY a JSON object whose keys are exactly: name, email.',
    ]);
    expect(prompt.endsWith('"I am Ada"')).toBe(true);
  });

  it('should embed data in the analysis prompts', () => {
    expect(PromptLibrary.salesAnalysis('Q1: 100').split('\n')[2]).toBe('Q1: 100');
    expect(PromptLibrary.trafficAnalysis('/home: 5000').split('\n')[2]).toBe('/home: 5000');
    expect(PromptLibrary.htmlTailwind('a pricing card').split('\n')[0]).toBe(
      'Generate HTML styled with Tailwind CSS for: a pricing card',
    );
  });
});

describe('parseJsonResponse', () => {
  it('should parse a bare JSON object', () => {
    expect(parseJsonResponse('{"name": "Ada"}')).toEqual({ name: 'Ada' });
  });

  it('should strip a markdown code fence', () => {
    expect(parseJsonResponse('Here you go:\n```json\n{"name": "Ada"}\n```\nDone.')).toEqual({ name: 'Ada' });
  });

  it('should reject text that is not JSON', () => {
    expect(() => parseJsonResponse('no json here')).toThrow(ResponseFormatError);
  });

  it('should reject JSON that is not an object', () => {
    expect(() => parseJsonResponse('[1, 2]')).toThrow('Model response is JSON but not an object');
  });
});
