import { z } from 'zod';
import { dottedName, qualifiedName, quoteIdentifier, quoteLiteral } from '../sql-gate/identifiers.js';
import { contextSchema, defineTool, identifierSchema, type ToolDefinition } from './tool-definition.js';

const SemanticViewSchema = z
  .object({
    name: identifierSchema.describe('Semantic view name'),
    ...contextSchema,
  })
  .strict();

type SemanticViewArguments = z.infer<typeof SemanticViewSchema>;

const ListSemanticViewsSchema = z
  .object({
    ...contextSchema,
    like: z.string().min(1).optional(),
  })
  .strict();

const dottedNames = z.array(z.string().trim().min(1)).min(1);

const QuerySemanticViewSchema = z
  .object({
    name: identifierSchema.describe('Semantic view name'),
    ...contextSchema,
    dimensions: dottedNames.optional().describe('Dimensions such as customer.region'),
    metrics: dottedNames.optional().describe('Metrics such as orders.total_revenue'),
    facts: dottedNames.optional().describe('Facts such as orders.amount'),
    where: z.string().trim().min(1).optional().describe('Filter expression over dimensions'),
    limit: z.number().int().min(1).max(10_000).optional(),
  })
  .strict()
  .refine(args => args.dimensions !== undefined || args.metrics !== undefined || args.facts !== undefined, {
    message: 'At least one of dimensions, metrics or facts is required',
  });

export type QuerySemanticViewArguments = z.infer<typeof QuerySemanticViewSchema>;

function semanticViewName({ name, database, schema }: SemanticViewArguments): string {
  return qualifiedName(database, schema, name);
}

export function buildSemanticQuery(args: QuerySemanticViewArguments): string {
  const clauses = [semanticViewName(args)];
  if (args.dimensions) {
    clauses.push(`DIMENSIONS ${args.dimensions.map(dottedName).join(', ')}`);
  }
  if (args.metrics) {
    clauses.push(`METRICS ${args.metrics.map(dottedName).join(', ')}`);
  }
  if (args.facts) {
    clauses.push(`FACTS ${args.facts.map(dottedName).join(', ')}`);
  }
  if (args.where) {
    clauses.push(`WHERE ${args.where}`);
  }
  const sql = `SELECT * FROM SEMANTIC_VIEW(${clauses.join(' ')})`;
  return args.limit !== undefined ? `${sql} LIMIT ${args.limit}` : sql;
}

export function buildListSemanticViews(args: z.infer<typeof ListSemanticViewsSchema>): string {
  let sql = 'SHOW SEMANTIC VIEWS';
  if (args.like !== undefined) {
    sql += ` LIKE ${quoteLiteral(args.like)}`;
  }
  if (args.schema) {
    return `${sql} IN SCHEMA ${qualifiedName(args.database, args.schema)}`;
  }
  return args.database ? `${sql} IN DATABASE ${quoteIdentifier(args.database)}` : sql;
}

export const semanticManagerTools: readonly ToolDefinition[] = [
  defineTool({
    name: 'list_semantic_views',
    description: 'List semantic views, optionally within a database or schema.',
    schema: ListSemanticViewsSchema,
    handler: (args, context) => context.runStatement(buildListSemanticViews(args)),
  }),
  defineTool({
    name: 'describe_semantic_view',
    description: 'Describe the tables, relationships, dimensions and metrics of a semantic view.',
    schema: SemanticViewSchema,
    handler: (args, context) => context.runStatement(`DESCRIBE SEMANTIC VIEW ${semanticViewName(args)}`),
  }),
  defineTool({
    name: 'show_semantic_dimensions',
    description: 'List the dimensions of a semantic view.',
    schema: SemanticViewSchema,
    handler: (args, context) => context.runStatement(`SHOW SEMANTIC DIMENSIONS IN ${semanticViewName(args)}`),
  }),
  defineTool({
    name: 'show_semantic_metrics',
    description: 'List the metrics of a semantic view.',
    schema: SemanticViewSchema,
    handler: (args, context) => context.runStatement(`SHOW SEMANTIC METRICS IN ${semanticViewName(args)}`),
  }),
  defineTool({
    name: 'get_semantic_view_ddl',
    description: 'Return the CREATE SEMANTIC VIEW statement of a semantic view.',
    schema: SemanticViewSchema,
    handler: (args, context) =>
      context.runStatement(`SELECT GET_DDL('SEMANTIC_VIEW', ${quoteLiteral(semanticViewName(args))}) AS DDL`),
  }),
  defineTool({
    name: 'query_semantic_view',
    description: 'Query a semantic view by dimensions, metrics or facts.',
    schema: QuerySemanticViewSchema,
    handler: (args, context) => context.runStatement(buildSemanticQuery(args)),
  }),
];
