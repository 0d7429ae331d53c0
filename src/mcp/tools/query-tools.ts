import { z } from 'zod';
import { classifyStatement } from '../sql-gate/statement-classifier.js';
import { hasTopLevelKeyword, splitStatements } from '../sql-gate/sql-lexer.js';
import { defineTool, identifierSchema, type ToolDefinition } from './tool-definition.js';

export const MAX_QUERY_LIMIT = 10_000;

const RunQuerySchema = z
  .object({
    statement: z.string().trim().min(1).describe('A single SQL statement'),
    limit: z
      .number()
      .int()
      .min(1)
      .max(MAX_QUERY_LIMIT)
      .optional()
      .describe('Row limit appended to SELECT statements that have none'),
    warehouse: identifierSchema.optional().describe('Warehouse to run the statement on'),
    database: identifierSchema.optional().describe('Database to use for the statement'),
    schema: identifierSchema.optional().describe('Schema to use for the statement'),
    role: identifierSchema.optional().describe('Role to run the statement as'),
  })
  .strict();

export type RunQueryArguments = z.infer<typeof RunQuerySchema>;

/**
 * Appends `LIMIT n` to a lone SELECT that has no top-level LIMIT. Anything
 * else, including multi-statement text, is returned unchanged for the gate to
 * judge.
 */
export function applyRowLimit(statement: string, limit: number | undefined): string {
  if (limit === undefined) {
    return statement;
  }
  const statements = splitStatements(statement);
  if (statements.length !== 1) {
    return statement;
  }
  const [single] = statements;
  if (classifyStatement(single) !== 'Select' || hasTopLevelKeyword(single, 'LIMIT')) {
    return statement;
  }
  return `${single} LIMIT ${limit}`;
}

export const runSnowflakeQueryTool: ToolDefinition = defineTool({
  name: 'run_snowflake_query',
  description:
    'Run a single SQL statement. The statement category must be enabled in sql_statement_permissions.',
  schema: RunQuerySchema,
  handler: ({ statement, limit, warehouse, database, schema, role }, context) =>
    context.runStatement(applyRowLimit(statement, limit), { warehouse, database, schema, role }),
});
