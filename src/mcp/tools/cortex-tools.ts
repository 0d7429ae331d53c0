import { z } from 'zod';
import type { AnalystServiceDefinition, SearchServiceDefinition } from '../catalog/service-catalog.js';
import { defineTool, type ToolDefinition } from './tool-definition.js';

function columnSchema(columns: readonly string[] | undefined) {
  if (columns && columns.length > 0) {
    const [first, ...rest] = columns;
    const values: [string, ...string[]] = [first, ...rest];
    return z.enum(values);
  }
  return z.string().trim().min(1);
}

export function searchSchema(service: SearchServiceDefinition) {
  return z
    .object({
      query: z.string().trim().min(1).describe('Search text'),
      columns: z.array(columnSchema(service.columns)).min(1).optional().describe('Columns to return'),
      filter: z.record(z.unknown()).optional().describe('Cortex Search filter object, e.g. {"@eq": {"REGION": "EU"}}'),
      limit: z
        .number()
        .int()
        .min(1)
        .max(service.limit)
        .optional()
        .describe(`Maximum number of results (default and maximum ${service.limit})`),
    })
    .strict();
}

export function searchTool(service: SearchServiceDefinition): ToolDefinition {
  return defineTool({
    name: service.name,
    description: service.description || `Cortex Search service ${service.databaseName}.${service.schemaName}.${service.name}`,
    schema: searchSchema(service),
    handler: (args, context) =>
      context.cortex.search(
        {
          databaseName: service.databaseName,
          schemaName: service.schemaName,
          serviceName: service.name,
          query: args.query,
          limit: args.limit ?? service.limit,
          ...(args.columns ? { columns: args.columns } : service.columns ? { columns: service.columns } : {}),
          ...(args.filter ? { filter: args.filter } : {}),
        },
        context.signal
      ),
  });
}

const AnalystSchema = z
  .object({
    query: z.string().trim().min(1).describe('Question in natural language'),
  })
  .strict();

export function analystTool(service: AnalystServiceDefinition): ToolDefinition {
  const model =
    service.semanticModel.kind === 'semantic_view' ? service.semanticModel.identifier : service.semanticModel.path;

  return defineTool({
    name: service.name,
    description: service.description || `Cortex Analyst over ${model}`,
    schema: AnalystSchema,
    handler: (args, context) =>
      context.cortex.analyst({ semanticModel: service.semanticModel, question: args.query }, context.signal),
  });
}
