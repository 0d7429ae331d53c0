import { describe, it } from 'node:test';
import assert from 'node:assert';
import { objectManagerTools } from '../../tools/object-tools.js';
import { applyRowLimit, runSnowflakeQueryTool } from '../../tools/query-tools.js';
import { semanticManagerTools } from '../../tools/semantic-tools.js';
import type { ToolDefinition } from '../../tools/tool-definition.js';
import type { SessionParameters } from '../../types.js';
import { FakeCortex } from '../helpers/fake-cortex.js';

interface GeneratedStatement {
  sql: string;
  parameters?: SessionParameters;
}

async function generate(tools: readonly ToolDefinition[], name: string, input: unknown): Promise<GeneratedStatement> {
  const tool = tools.find(candidate => candidate.name === name);
  if (!tool) {
    throw new Error(`no tool ${name}`);
  }
  const generated: GeneratedStatement[] = [];
  await tool.run(input, {
    toolName: name,
    cortex: new FakeCortex(),
    runStatement: async (sql, parameters) => {
      generated.push({ sql, parameters });
      return { metadata: { columns: [], rowCount: 0 }, data: [] };
    },
  });
  assert.strictEqual(generated.length, 1);
  return generated[0];
}

async function objectSql(name: string, input: unknown): Promise<string> {
  return (await generate(objectManagerTools, name, input)).sql;
}

async function semanticSql(name: string, input: unknown): Promise<string> {
  return (await generate(semanticManagerTools, name, input)).sql;
}

describe('Object manager statements', () => {
  it('creates a table with column definitions', async () => {
    const sql = await objectSql('create_object', {
      object_type: 'table',
      name: 'orders',
      database: 'SALES',
      schema: 'PUBLIC',
      columns: [
        { name: 'id', type: 'number(38,0)', nullable: false },
        { name: 'note', type: 'varchar', default: 'n/a', comment: "customer's note" },
      ],
      comment: 'Orders',
    });
    assert.strictEqual(
      sql,
      "CREATE TABLE SALES.PUBLIC.orders (id NUMBER(38,0) NOT NULL, note VARCHAR DEFAULT 'n/a' COMMENT 'customer''s note') COMMENT = 'Orders'"
    );
  });

  it('renders a column default expression unquoted', async () => {
    const sql = await objectSql('create_object', {
      object_type: 'table',
      name: 'events',
      columns: [
        { name: 'id', type: 'number', default_expression: 'events_seq.NEXTVAL' },
        { name: 'created_at', type: 'timestamp_ltz', default_expression: ' CURRENT_TIMESTAMP(3) ' },
      ],
    });
    assert.strictEqual(
      sql,
      'CREATE TABLE events (id NUMBER DEFAULT events_seq.NEXTVAL, created_at TIMESTAMP_LTZ DEFAULT CURRENT_TIMESTAMP(3))'
    );
  });

  it('refuses a default expression that is not a call or sequence reference', async () => {
    await assert.rejects(
      objectSql('create_object', {
        object_type: 'table',
        name: 'events',
        columns: [{ name: 'id', type: 'number', default_expression: 'CURRENT_TIMESTAMP(); DROP TABLE t' }],
      }),
      { kind: 'ValidationError', message: "Unsupported column default expression 'CURRENT_TIMESTAMP(); DROP TABLE t'" }
    );
    await assert.rejects(
      objectSql('create_object', {
        object_type: 'table',
        name: 'events',
        columns: [{ name: 'id', type: 'number', default: 0, default_expression: 'events_seq.NEXTVAL' }],
      }),
      {
        kind: 'ValidationError',
        message:
          'Invalid arguments for create_object: columns.0.default_expression: default and default_expression are mutually exclusive',
      }
    );
  });

  it('creates or replaces a view from a single SELECT', async () => {
    const sql = await objectSql('create_object', {
      object_type: 'view',
      name: 'recent_orders',
      schema: 'PUBLIC',
      replace: true,
      query: 'SELECT * FROM orders;',
    });
    assert.strictEqual(sql, 'CREATE OR REPLACE VIEW PUBLIC.recent_orders AS SELECT * FROM orders');
  });

  it('creates a sized warehouse if it does not exist', async () => {
    const sql = await objectSql('create_object', {
      object_type: 'warehouse',
      name: 'etl_wh',
      if_not_exists: true,
      warehouse_size: 'XSMALL',
    });
    assert.strictEqual(sql, "CREATE WAREHOUSE IF NOT EXISTS etl_wh WAREHOUSE_SIZE = 'XSMALL'");
  });

  it('quotes names that are not plain identifiers', async () => {
    const sql = await objectSql('create_object', { object_type: 'database', name: 'x; DROP DATABASE prod' });
    assert.strictEqual(sql, 'CREATE DATABASE "x; DROP DATABASE prod"');
  });

  it('refuses a view query that is not a single SELECT', async () => {
    await assert.rejects(
      objectSql('create_object', { object_type: 'view', name: 'v', query: 'DELETE FROM orders' }),
      { kind: 'ValidationError', message: 'A view query must be a single SELECT statement' }
    );
    await assert.rejects(
      objectSql('create_object', { object_type: 'view', name: 'v', query: 'SELECT 1; DROP TABLE orders' }),
      { kind: 'ValidationError', message: 'A view query must be a single SELECT statement' }
    );
  });

  it('rejects argument combinations that do not fit the object type', async () => {
    await assert.rejects(objectSql('create_object', { object_type: 'table', name: 't' }), {
      kind: 'ValidationError',
      message: 'Invalid arguments for create_object: columns: columns is required for tables and only allowed for tables',
    });
    await assert.rejects(
      objectSql('create_object', { object_type: 'database', name: 'd', replace: true, if_not_exists: true }),
      {
        kind: 'ValidationError',
        message: 'Invalid arguments for create_object: replace and if_not_exists are mutually exclusive',
      }
    );
    await assert.rejects(objectSql('create_object', { object_type: 'database', name: 'd', owner: 'x' }), {
      kind: 'ValidationError',
      message: "Invalid arguments for create_object: Unrecognized key(s) in object: 'owner'",
    });
  });

  it('drops objects with IF EXISTS by default', async () => {
    assert.strictEqual(
      await objectSql('drop_object', { object_type: 'schema', name: 'staging', database: 'SALES', cascade: true }),
      'DROP SCHEMA IF EXISTS SALES.staging CASCADE'
    );
    assert.strictEqual(
      await objectSql('drop_object', { object_type: 'role', name: 'tmp', if_exists: false }),
      'DROP ROLE tmp'
    );
    await assert.rejects(objectSql('drop_object', { object_type: 'view', name: 'v', cascade: true }), {
      kind: 'ValidationError',
      message: 'Invalid arguments for drop_object: cascade: cascade is only allowed for databases, schemas and tables',
    });
  });

  it('describes objects by qualified name', async () => {
    assert.strictEqual(
      await objectSql('describe_object', { object_type: 'table', name: 'orders', database: 'SALES', schema: 'PUBLIC' }),
      'DESCRIBE TABLE SALES.PUBLIC.orders'
    );
    await assert.rejects(objectSql('describe_object', { object_type: 'table', name: 'orders', database: 'SALES' }), {
      kind: 'ValidationError',
      message: 'A table qualified by database also needs schema',
    });
    await assert.rejects(objectSql('describe_object', { object_type: 'warehouse', name: 'wh', schema: 'PUBLIC' }), {
      kind: 'ValidationError',
      message: 'A warehouse is not qualified by database or schema',
    });
  });

  it('lists objects within a scope', async () => {
    assert.strictEqual(
      await objectSql('list_objects', { object_type: 'table', database: 'SALES', schema: 'PUBLIC', like: 'ORD%' }),
      "SHOW TABLES LIKE 'ORD%' IN SCHEMA SALES.PUBLIC"
    );
    assert.strictEqual(
      await objectSql('list_objects', { object_type: 'schema', database: 'SALES' }),
      'SHOW SCHEMAS IN DATABASE SALES'
    );
    assert.strictEqual(await objectSql('list_objects', { object_type: 'role' }), 'SHOW ROLES');
    await assert.rejects(objectSql('list_objects', { object_type: 'warehouse', database: 'SALES' }), {
      kind: 'ValidationError',
      message: 'Listing WAREHOUSES takes no database or schema',
    });
  });
});

describe('Semantic manager statements', () => {
  it('queries a semantic view by dimensions and metrics', async () => {
    const sql = await semanticSql('query_semantic_view', {
      name: 'revenue',
      database: 'SALES',
      schema: 'PUBLIC',
      dimensions: ['customer.region'],
      metrics: ['orders.total_revenue'],
      where: "customer.region = 'EU'",
      limit: 10,
    });
    assert.strictEqual(
      sql,
      "SELECT * FROM SEMANTIC_VIEW(SALES.PUBLIC.revenue DIMENSIONS customer.region METRICS orders.total_revenue WHERE customer.region = 'EU') LIMIT 10"
    );
  });

  it('queries facts alone', async () => {
    assert.strictEqual(
      await semanticSql('query_semantic_view', { name: 'revenue', facts: ['orders.amount'] }),
      'SELECT * FROM SEMANTIC_VIEW(revenue FACTS orders.amount)'
    );
  });

  it('requires dimensions, metrics or facts', async () => {
    await assert.rejects(semanticSql('query_semantic_view', { name: 'revenue' }), {
      kind: 'ValidationError',
      message: 'Invalid arguments for query_semantic_view: At least one of dimensions, metrics or facts is required',
    });
  });

  it('inspects semantic views', async () => {
    const view = { name: 'revenue', database: 'SALES', schema: 'PUBLIC' };
    assert.strictEqual(await semanticSql('list_semantic_views', {}), 'SHOW SEMANTIC VIEWS');
    assert.strictEqual(
      await semanticSql('list_semantic_views', { database: 'SALES', like: 'REV%' }),
      "SHOW SEMANTIC VIEWS LIKE 'REV%' IN DATABASE SALES"
    );
    assert.strictEqual(await semanticSql('describe_semantic_view', view), 'DESCRIBE SEMANTIC VIEW SALES.PUBLIC.revenue');
    assert.strictEqual(
      await semanticSql('show_semantic_dimensions', view),
      'SHOW SEMANTIC DIMENSIONS IN SALES.PUBLIC.revenue'
    );
    assert.strictEqual(await semanticSql('show_semantic_metrics', view), 'SHOW SEMANTIC METRICS IN SALES.PUBLIC.revenue');
    assert.strictEqual(
      await semanticSql('get_semantic_view_ddl', view),
      "SELECT GET_DDL('SEMANTIC_VIEW', 'SALES.PUBLIC.revenue') AS DDL"
    );
  });
});

describe('Query manager', () => {
  it('appends a row limit to a lone SELECT without one', () => {
    assert.strictEqual(applyRowLimit('SELECT * FROM t', 5), 'SELECT * FROM t LIMIT 5');
    assert.strictEqual(applyRowLimit('SELECT * FROM t;', 5), 'SELECT * FROM t LIMIT 5');
    assert.strictEqual(
      applyRowLimit('SELECT * FROM (SELECT * FROM t LIMIT 2)', 5),
      'SELECT * FROM (SELECT * FROM t LIMIT 2) LIMIT 5'
    );
  });

  it('leaves everything else unchanged', () => {
    assert.strictEqual(applyRowLimit('SELECT * FROM t LIMIT 2', 5), 'SELECT * FROM t LIMIT 2');
    assert.strictEqual(applyRowLimit('DELETE FROM t', 5), 'DELETE FROM t');
    assert.strictEqual(applyRowLimit('SELECT 1; SELECT 2', 5), 'SELECT 1; SELECT 2');
    assert.strictEqual(applyRowLimit('SELECT * FROM t', undefined), 'SELECT * FROM t');
  });

  it('passes session parameters through with the statement', async () => {
    const generated = await generate([runSnowflakeQueryTool], 'run_snowflake_query', {
      statement: 'SELECT 1',
      limit: 3,
      warehouse: 'REPORTING_WH',
    });
    assert.deepStrictEqual(generated, {
      sql: 'SELECT 1 LIMIT 3',
      parameters: { warehouse: 'REPORTING_WH', database: undefined, schema: undefined, role: undefined },
    });
  });

  it('rejects limits outside the allowed range', async () => {
    await assert.rejects(generate([runSnowflakeQueryTool], 'run_snowflake_query', { statement: 'SELECT 1', limit: 0 }), {
      kind: 'ValidationError',
      message: 'Invalid arguments for run_snowflake_query: limit: Number must be greater than or equal to 1',
    });
  });
});
