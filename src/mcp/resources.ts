import type { PoolStats } from './session/connection-pool.js';
import { classifyStatement, type PermissionPolicy } from './sql-gate/index.js';
import type { ServerConfig } from './types.js';

export const CONNECTION_INFO_URI = 'snowflake://connection-info';
export const QUERY_EXAMPLES_URI = 'snowflake://query-examples';

export interface ResourceDescriptor {
  [key: string]: unknown;
  uri: string;
  name: string;
  description: string;
  mimeType: string;
}

export const RESOURCES: readonly ResourceDescriptor[] = [
  {
    uri: CONNECTION_INFO_URI,
    name: 'Connection info',
    description: 'Account, user, default session parameters, permitted statement categories and pool statistics',
    mimeType: 'application/json',
  },
  {
    uri: QUERY_EXAMPLES_URI,
    name: 'Query examples',
    description: 'Example statements with their category and whether the policy permits them',
    mimeType: 'application/json',
  },
];

const EXAMPLES = [
  { description: 'Show warehouses', query: 'SHOW WAREHOUSES' },
  { description: 'Current database and schema', query: 'SELECT CURRENT_DATABASE(), CURRENT_SCHEMA()' },
  { description: 'List tables in the current schema', query: 'SHOW TABLES' },
  { description: 'Sample rows from a table', query: 'SELECT * FROM table_name LIMIT 10' },
  { description: 'Table DDL', query: "SELECT GET_DDL('TABLE', 'database.schema.table_name')" },
  { description: 'Describe a table', query: 'DESCRIBE TABLE database.schema.table_name' },
  { description: 'Grants held by the current user', query: 'SHOW GRANTS TO USER CURRENT_USER()' },
];

/**
 * Connection parameters without credentials.
 */
export function connectionInfo(
  config: ServerConfig,
  policy: PermissionPolicy,
  pool: PoolStats,
  tools: readonly string[]
): Record<string, unknown> {
  const { connection } = config;
  return {
    account: connection.account,
    user: connection.user,
    authentication: connection.auth.method,
    defaults: connection.defaults,
    ...(config.queryTag ? { queryTag: config.queryTag } : {}),
    permittedCategories: policy.allowedCategories(),
    tools,
    pool,
    configured: Boolean(connection.account && connection.user),
  };
}

export function queryExamples(policy: PermissionPolicy): Record<string, unknown> {
  return {
    examples: EXAMPLES.map(example => {
      const category = classifyStatement(example.query);
      return { ...example, category, permitted: policy.isAllowed(category) };
    }),
  };
}
