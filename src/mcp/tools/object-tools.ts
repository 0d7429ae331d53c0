import { z } from 'zod';
import { ToolError } from '../errors.js';
import { classifyStatement } from '../sql-gate/statement-classifier.js';
import { splitStatements } from '../sql-gate/sql-lexer.js';
import {
  assertDataType,
  assertDefaultExpression,
  qualifiedName,
  quoteIdentifier,
  quoteLiteral,
  renderLiteral,
} from '../sql-gate/identifiers.js';
import { contextSchema, defineTool, identifierSchema, type ToolDefinition } from './tool-definition.js';

export const OBJECT_TYPES = ['database', 'schema', 'table', 'view', 'warehouse', 'role', 'stage'] as const;
export type ObjectType = (typeof OBJECT_TYPES)[number];

const DESCRIBABLE_TYPES = ['database', 'schema', 'table', 'view', 'warehouse', 'stage'] as const;
const CASCADING_TYPES: ReadonlySet<ObjectType> = new Set(['database', 'schema', 'table']);

export const WAREHOUSE_SIZES = [
  'XSMALL',
  'SMALL',
  'MEDIUM',
  'LARGE',
  'XLARGE',
  'XXLARGE',
  'XXXLARGE',
  'X4LARGE',
  'X5LARGE',
  'X6LARGE',
] as const;

const KEYWORDS: Record<ObjectType, { singular: string; plural: string }> = {
  database: { singular: 'DATABASE', plural: 'DATABASES' },
  schema: { singular: 'SCHEMA', plural: 'SCHEMAS' },
  table: { singular: 'TABLE', plural: 'TABLES' },
  view: { singular: 'VIEW', plural: 'VIEWS' },
  warehouse: { singular: 'WAREHOUSE', plural: 'WAREHOUSES' },
  role: { singular: 'ROLE', plural: 'ROLES' },
  stage: { singular: 'STAGE', plural: 'STAGES' },
};

export interface ObjectReference {
  objectType: ObjectType;
  name: string;
  database?: string;
  schema?: string;
}

/**
 * Fully qualified name for an object. Account-level objects take no
 * database or schema; a schema takes only a database.
 */
export function objectName({ objectType, name, database, schema }: ObjectReference): string {
  switch (objectType) {
    case 'database':
    case 'warehouse':
    case 'role':
      if (database || schema) {
        throw new ToolError('ValidationError', `A ${objectType} is not qualified by database or schema`);
      }
      return qualifiedName(name);
    case 'schema':
      if (schema) {
        throw new ToolError('ValidationError', 'Use database to qualify a schema, not schema');
      }
      return qualifiedName(database, name);
    case 'table':
    case 'view':
    case 'stage':
      if (schema === undefined && database !== undefined) {
        throw new ToolError('ValidationError', `A ${objectType} qualified by database also needs schema`);
      }
      return qualifiedName(database, schema, name);
  }
}

const ColumnSchema = z
  .object({
    name: identifierSchema,
    type: z.string().trim().min(1).describe('Column data type, e.g. VARCHAR(100) or NUMBER(38,0)'),
    nullable: z.boolean().default(true),
    default: z
      .union([z.string(), z.number(), z.boolean(), z.null()])
      .optional()
      .describe('Literal default value; strings are quoted'),
    default_expression: z
      .string()
      .trim()
      .min(1)
      .optional()
      .describe('Unquoted default such as CURRENT_TIMESTAMP() or orders_seq.NEXTVAL'),
    comment: z.string().optional(),
  })
  .strict()
  .refine(column => column.default === undefined || column.default_expression === undefined, {
    path: ['default_expression'],
    message: 'default and default_expression are mutually exclusive',
  });

export type ColumnDefinition = z.infer<typeof ColumnSchema>;

const CreateObjectSchema = z
  .object({
    object_type: z.enum(OBJECT_TYPES),
    name: identifierSchema,
    ...contextSchema,
    replace: z.boolean().default(false).describe('CREATE OR REPLACE'),
    if_not_exists: z.boolean().default(false).describe('CREATE ... IF NOT EXISTS'),
    comment: z.string().optional(),
    columns: z.array(ColumnSchema).min(1).optional().describe('Table columns'),
    query: z.string().trim().min(1).optional().describe('SELECT statement a view is defined by'),
    warehouse_size: z.enum(WAREHOUSE_SIZES).optional(),
  })
  .strict()
  .superRefine((args, ctx) => {
    if (args.replace && args.if_not_exists) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'replace and if_not_exists are mutually exclusive' });
    }
    if ((args.object_type === 'table') !== (args.columns !== undefined)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['columns'],
        message: 'columns is required for tables and only allowed for tables',
      });
    }
    if ((args.object_type === 'view') !== (args.query !== undefined)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['query'],
        message: 'query is required for views and only allowed for views',
      });
    }
    if (args.warehouse_size !== undefined && args.object_type !== 'warehouse') {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['warehouse_size'],
        message: 'warehouse_size is only allowed for warehouses',
      });
    }
  });

export type CreateObjectArguments = z.infer<typeof CreateObjectSchema>;

const DropObjectSchema = z
  .object({
    object_type: z.enum(OBJECT_TYPES),
    name: identifierSchema,
    ...contextSchema,
    if_exists: z.boolean().default(true),
    cascade: z.boolean().default(false).describe('Also drop dependent objects (database, schema, table)'),
  })
  .strict()
  .refine(args => !args.cascade || CASCADING_TYPES.has(args.object_type), {
    path: ['cascade'],
    message: 'cascade is only allowed for databases, schemas and tables',
  });

export type DropObjectArguments = z.infer<typeof DropObjectSchema>;

const DescribeObjectSchema = z
  .object({
    object_type: z.enum(DESCRIBABLE_TYPES),
    name: identifierSchema,
    ...contextSchema,
  })
  .strict();

const ListObjectsSchema = z
  .object({
    object_type: z.enum(OBJECT_TYPES),
    ...contextSchema,
    like: z.string().min(1).optional().describe("Case-insensitive name pattern with SQL wildcards, e.g. 'ORDERS%'"),
  })
  .strict();

export type ListObjectsArguments = z.infer<typeof ListObjectsSchema>;

export function columnDefinition(column: ColumnDefinition): string {
  let sql = `${quoteIdentifier(column.name)} ${assertDataType(column.type)}`;
  if (!column.nullable) {
    sql += ' NOT NULL';
  }
  if (column.default_expression !== undefined) {
    sql += ` DEFAULT ${assertDefaultExpression(column.default_expression)}`;
  } else if (column.default !== undefined) {
    sql += ` DEFAULT ${renderLiteral(column.default)}`;
  }
  if (column.comment !== undefined) {
    sql += ` COMMENT ${quoteLiteral(column.comment)}`;
  }
  return sql;
}

export function buildCreateStatement(args: CreateObjectArguments): string {
  const keyword = KEYWORDS[args.object_type].singular;
  const target = objectName({ objectType: args.object_type, name: args.name, database: args.database, schema: args.schema });

  let sql = `CREATE ${args.replace ? 'OR REPLACE ' : ''}${keyword} ${args.if_not_exists ? 'IF NOT EXISTS ' : ''}${target}`;

  if (args.columns) {
    sql += ` (${args.columns.map(columnDefinition).join(', ')})`;
  }
  if (args.warehouse_size) {
    sql += ` WAREHOUSE_SIZE = '${args.warehouse_size}'`;
  }
  if (args.comment !== undefined) {
    sql += ` COMMENT = ${quoteLiteral(args.comment)}`;
  }
  if (args.query !== undefined) {
    sql += ` AS ${viewQuery(args.query)}`;
  }
  return sql;
}

function viewQuery(query: string): string {
  const statements = splitStatements(query);
  if (statements.length !== 1 || classifyStatement(statements[0]) !== 'Select') {
    throw new ToolError('ValidationError', 'A view query must be a single SELECT statement');
  }
  return statements[0];
}

export function buildDropStatement(args: DropObjectArguments): string {
  const keyword = KEYWORDS[args.object_type].singular;
  const target = objectName({ objectType: args.object_type, name: args.name, database: args.database, schema: args.schema });
  return `DROP ${keyword} ${args.if_exists ? 'IF EXISTS ' : ''}${target}${args.cascade ? ' CASCADE' : ''}`;
}

export function buildListStatement(args: ListObjectsArguments): string {
  let sql = `SHOW ${KEYWORDS[args.object_type].plural}`;
  if (args.like !== undefined) {
    sql += ` LIKE ${quoteLiteral(args.like)}`;
  }

  switch (args.object_type) {
    case 'database':
    case 'warehouse':
    case 'role':
      if (args.database || args.schema) {
        throw new ToolError('ValidationError', `Listing ${KEYWORDS[args.object_type].plural} takes no database or schema`);
      }
      return sql;
    case 'schema':
      if (args.schema) {
        throw new ToolError('ValidationError', 'Listing schemas takes database, not schema');
      }
      return args.database ? `${sql} IN DATABASE ${quoteIdentifier(args.database)}` : sql;
    case 'table':
    case 'view':
    case 'stage':
      if (args.schema) {
        return `${sql} IN SCHEMA ${qualifiedName(args.database, args.schema)}`;
      }
      return args.database ? `${sql} IN DATABASE ${quoteIdentifier(args.database)}` : sql;
  }
}

export const objectManagerTools: readonly ToolDefinition[] = [
  defineTool({
    name: 'create_object',
    description:
      'Create a database, schema, table, view, warehouse, role or stage. Column defaults are literals ' +
      '(default) or a function call or sequence reference (default_expression).',
    schema: CreateObjectSchema,
    handler: (args, context) => context.runStatement(buildCreateStatement(args)),
  }),
  defineTool({
    name: 'drop_object',
    description: 'Drop a database, schema, table, view, warehouse, role or stage.',
    schema: DropObjectSchema,
    handler: (args, context) => context.runStatement(buildDropStatement(args)),
  }),
  defineTool({
    name: 'describe_object',
    description: 'Describe the columns or properties of an object.',
    schema: DescribeObjectSchema,
    handler: (args, context) =>
      context.runStatement(
        `DESCRIBE ${KEYWORDS[args.object_type].singular} ${objectName({
          objectType: args.object_type,
          name: args.name,
          database: args.database,
          schema: args.schema,
        })}`
      ),
  }),
  defineTool({
    name: 'list_objects',
    description: 'List objects of one type, optionally within a database or schema.',
    schema: ListObjectsSchema,
    handler: (args, context) => context.runStatement(buildListStatement(args)),
  }),
];
