import { z } from 'zod';
import { zodToJsonSchema } from 'zod-to-json-schema';
import type { CortexClient } from '../cortex/cortex-client.js';
import { ToolError } from '../errors.js';
import type { QueryResultPayload, SessionParameters } from '../types.js';

/**
 * What a tool may do while it runs. SQL only reaches the warehouse through
 * `runStatement`, which classifies it and checks the permission policy first.
 */
export interface ToolContext {
  toolName: string;
  signal?: AbortSignal;
  runStatement(sql: string, parameters?: SessionParameters): Promise<QueryResultPayload>;
  cortex: CortexClient;
}

export interface ToolDefinition {
  name: string;
  description: string;
  schema: z.ZodTypeAny;
  run(input: unknown, context: ToolContext): Promise<unknown>;
}

export interface ToolSpec<S extends z.ZodTypeAny> {
  name: string;
  description: string;
  schema: S;
  handler(args: z.output<S>, context: ToolContext): Promise<unknown>;
}

export function defineTool<S extends z.ZodTypeAny>(spec: ToolSpec<S>): ToolDefinition {
  return {
    name: spec.name,
    description: spec.description,
    schema: spec.schema,
    run: (input, context) => spec.handler(parseArguments(spec.name, spec.schema, input), context),
  };
}

export function parseArguments<S extends z.ZodTypeAny>(toolName: string, schema: S, input: unknown): z.output<S> {
  const parsed = schema.safeParse(input ?? {});
  if (!parsed.success) {
    const issues = parsed.error.errors.map(e => (e.path.length > 0 ? `${e.path.join('.')}: ${e.message}` : e.message));
    throw new ToolError('ValidationError', `Invalid arguments for ${toolName}: ${issues.join('; ')}`, { issues });
  }
  return parsed.data;
}

export interface ToolInputSchema {
  [key: string]: unknown;
  type: 'object';
  properties: Record<string, unknown>;
  required?: string[];
}

export function toInputSchema(schema: z.ZodTypeAny): ToolInputSchema {
  const json: unknown = zodToJsonSchema(schema, { $refStrategy: 'none' });
  const properties = isRecord(json) && isRecord(json.properties) ? json.properties : {};
  const required =
    isRecord(json) && Array.isArray(json.required)
      ? json.required.filter((key): key is string => typeof key === 'string')
      : [];

  return {
    type: 'object',
    properties,
    ...(required.length > 0 ? { required } : {}),
    additionalProperties: false,
  };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export const identifierSchema = z.string().trim().min(1).max(255);

export const contextSchema = {
  database: identifierSchema.optional().describe('Database containing the object'),
  schema: identifierSchema.optional().describe('Schema containing the object'),
};
