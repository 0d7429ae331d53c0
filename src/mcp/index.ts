#!/usr/bin/env node
import * as dotenv from 'dotenv';
import { Command } from 'commander';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { MarkdownAuditLogger } from './audit/audit-logger.js';
import { loadServiceConfigurationFile } from './catalog/service-catalog.js';
import { loadServerConfig, type CliOptions } from './config.js';
import { CortexRestClient } from './cortex/cortex-client.js';
import { createRestAuthenticator } from './cortex/rest-auth.js';
import { ToolDispatcher } from './dispatcher.js';
import { errorMessage } from './errors.js';
import { logger, setLogLevel } from './logger.js';
import { CONNECTION_INFO_URI, QUERY_EXAMPLES_URI, connectionInfo, queryExamples } from './resources.js';
import { SERVER_NAME, SERVER_VERSION, createBridgeServer } from './server.js';
import { SessionManager } from './session/session-manager.js';
import { createSnowflakeConnectionFactory } from './session/snowflake-connection.js';

dotenv.config();

async function main(options: CliOptions): Promise<void> {
  const config = loadServerConfig(options);
  setLogLevel(config.logLevel);

  const { catalog, policy } = loadServiceConfigurationFile(config.serviceConfigFile);

  const sessions = new SessionManager({
    factory: createSnowflakeConnectionFactory(config.connection),
    pool: config.pool,
    defaults: config.connection.defaults,
    statementTimeoutMs: config.statementTimeoutMs,
  });

  const cortex = new CortexRestClient({
    account: config.connection.account,
    authenticator: createRestAuthenticator(config.connection),
    timeoutMs: config.serviceTimeoutMs,
  });

  const dispatcher = new ToolDispatcher({
    catalog,
    policy,
    sessions,
    cortex,
    audit: config.auditLogFile ? new MarkdownAuditLogger(config.auditLogFile) : undefined,
    queryTag: config.queryTag,
  });

  const server = createBridgeServer({
    dispatcher,
    readResource: uri => {
      switch (uri) {
        case CONNECTION_INFO_URI:
          return connectionInfo(config, policy, sessions.stats(), catalog.toolNames());
        case QUERY_EXAMPLES_URI:
          return queryExamples(policy);
        default:
          return undefined;
      }
    },
  });

  await sessions.prime();

  const transport = new StdioServerTransport();
  await server.connect(transport);

  logger.info(`${SERVER_NAME} running on stdio`, {
    tools: catalog.toolNames(),
    permittedCategories: policy.allowedCategories(),
    auth: config.connection.auth.method,
    pool: { min: config.pool.min, max: config.pool.max },
  });

  const shutdown = async (signal: string) => {
    logger.info('Shutting down', { signal });
    await server.close();
    await sessions.close();
  };

  for (const signal of ['SIGINT', 'SIGTERM'] as const) {
    process.once(signal, () => {
      shutdown(signal).then(
        () => process.exit(0),
        (error: unknown) => {
          logger.error('Shutdown failed', { error: errorMessage(error) });
          process.exit(1);
        }
      );
    });
  }
}

const program = new Command()
  .name(SERVER_NAME)
  .description('MCP server exposing Snowflake SQL, Cortex Search, Cortex Analyst and semantic views')
  .version(SERVER_VERSION)
  .option('--account <account>', 'Snowflake account identifier (SNOWFLAKE_ACCOUNT)')
  .option('--user <user>', 'Snowflake user (SNOWFLAKE_USER)')
  .option('--password <password>', 'Password or programmatic access token (SNOWFLAKE_PASSWORD)')
  .option('--private-key-file <path>', 'PEM private key for key-pair authentication (SNOWFLAKE_PRIVATE_KEY_FILE)')
  .option('--private-key-passphrase <passphrase>', 'Passphrase of the private key (SNOWFLAKE_PRIVATE_KEY_PASSPHRASE)')
  .option('--warehouse <warehouse>', 'Default warehouse (SNOWFLAKE_WAREHOUSE)')
  .option('--database <database>', 'Default database (SNOWFLAKE_DATABASE)')
  .option('--schema <schema>', 'Default schema (SNOWFLAKE_SCHEMA)')
  .option('--role <role>', 'Default role (SNOWFLAKE_ROLE)')
  .option('--service-config-file <path>', 'Service configuration YAML (SERVICE_CONFIG_FILE)')
  .option('--audit-log-file <path>', 'Markdown audit log of SQL execution attempts (AUDIT_LOG_FILE)')
  .option('--log-level <level>', 'Log level written to stderr (LOG_LEVEL)')
  .action(async () => {
    await main(program.opts<CliOptions>());
  });

program.parseAsync().catch((error: unknown) => {
  logger.error('Failed to start server', { error: errorMessage(error) });
  process.exit(1);
});
