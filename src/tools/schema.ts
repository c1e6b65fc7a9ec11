import { z } from 'zod';
import type { ToolArgs, ToolParameters, ToolProperty } from './types.js';

/**
 * Compile the JSON-schema subset tools declare into a zod validator.
 * Unknown argument names are rejected; optional properties with a default
 * are filled in.
 */
export function compileToolSchema(parameters: ToolParameters): z.ZodType<ToolArgs> {
  return objectSchema(parameters.properties, parameters.required ?? []);
}

function objectSchema(properties: Record<string, ToolProperty>, required: string[]): z.ZodType<ToolArgs> {
  const shape: Record<string, z.ZodTypeAny> = {};
  for (const [key, prop] of Object.entries(properties)) {
    const base = propertySchema(prop);
    if (required.includes(key)) {
      shape[key] = base;
    } else if (prop.default !== undefined) {
      shape[key] = base.default(prop.default);
    } else {
      shape[key] = base.optional();
    }
  }
  return z.object(shape).strict();
}

function propertySchema(prop: ToolProperty): z.ZodTypeAny {
  const schema = baseSchema(prop);
  const allowed = prop.enum;
  if (!allowed || allowed.length === 0) return schema;
  return schema.refine(
    (value: unknown) => allowed.some(option => option === value),
    { message: `Expected one of: ${allowed.join(', ')}` },
  );
}

function baseSchema(prop: ToolProperty): z.ZodTypeAny {
  switch (prop.type) {
    case 'string':
      return z.string();
    case 'number':
    case 'integer': {
      let num = prop.type === 'integer' ? z.number().int() : z.number();
      if (prop.minimum !== undefined) num = num.min(prop.minimum);
      if (prop.maximum !== undefined) num = num.max(prop.maximum);
      return num;
    }
    case 'boolean':
      return z.boolean();
    case 'array':
      return z.array(prop.items ? propertySchema(prop.items) : z.unknown());
    case 'object':
      return prop.properties ? objectSchema(prop.properties, prop.required ?? []) : z.record(z.unknown());
  }
}

export function formatIssues(error: z.ZodError): string[] {
  return error.issues.map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
}
