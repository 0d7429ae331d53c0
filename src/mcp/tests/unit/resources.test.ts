import { describe, it } from 'node:test';
import assert from 'node:assert';
import { connectionInfo, queryExamples } from '../../resources.js';
import { PermissionPolicy } from '../../sql-gate/permission-policy.js';
import type { ServerConfig } from '../../types.js';

const CONFIG: ServerConfig = {
  connection: {
    account: 'myorg-acct',
    user: 'svc_user',
    auth: { method: 'password', password: 'test-secret' },
    defaults: { warehouse: 'WH' },
  },
  pool: { min: 0, max: 4, acquireTimeoutMs: 30_000, idleTimeoutMs: 300_000 },
  statementTimeoutMs: 120_000,
  serviceTimeoutMs: 60_000,
  serviceConfigFile: 'services.yaml',
  queryTag: 'nightly',
  logLevel: 'info',
};

describe('Resources', () => {
  it('describes the connection without credentials', () => {
    const pool = { size: 1, idle: 1, borrowed: 0, pending: 0, min: 0, max: 4 };
    const info = connectionInfo(CONFIG, PermissionPolicy.allowing('Select'), pool, ['run_snowflake_query']);

    assert.deepStrictEqual(info, {
      account: 'myorg-acct',
      user: 'svc_user',
      authentication: 'password',
      defaults: { warehouse: 'WH' },
      queryTag: 'nightly',
      permittedCategories: ['Select'],
      tools: ['run_snowflake_query'],
      pool,
      configured: true,
    });
  });

  it('marks which example statements the policy permits', () => {
    const { examples } = queryExamples(PermissionPolicy.allowing('Select'));

    assert.deepStrictEqual(examples, [
      { description: 'Show warehouses', query: 'SHOW WAREHOUSES', category: 'Command', permitted: false },
      {
        description: 'Current database and schema',
        query: 'SELECT CURRENT_DATABASE(), CURRENT_SCHEMA()',
        category: 'Select',
        permitted: true,
      },
      { description: 'List tables in the current schema', query: 'SHOW TABLES', category: 'Command', permitted: false },
      {
        description: 'Sample rows from a table',
        query: 'SELECT * FROM table_name LIMIT 10',
        category: 'Select',
        permitted: true,
      },
      {
        description: 'Table DDL',
        query: "SELECT GET_DDL('TABLE', 'database.schema.table_name')",
        category: 'Select',
        permitted: true,
      },
      {
        description: 'Describe a table',
        query: 'DESCRIBE TABLE database.schema.table_name',
        category: 'Describe',
        permitted: false,
      },
      {
        description: 'Grants held by the current user',
        query: 'SHOW GRANTS TO USER CURRENT_USER()',
        category: 'Command',
        permitted: false,
      },
    ]);
  });
});
