import { randomUUID } from 'crypto';
import snowflake from 'snowflake-sdk';
import type { Connection, ConnectionOptions } from 'snowflake-sdk';
import { ToolError } from '../errors.js';
import { logger } from '../logger.js';
import type { ConnectionConfig, Row } from '../types.js';
import type { BackendConnection, ConnectionFactory, ExecuteOptions } from './backend-connection.js';

const APPLICATION_NAME = 'warehouse-mcp-bridge';

export function buildConnectionOptions(config: ConnectionConfig): ConnectionOptions {
  const base: ConnectionOptions = {
    account: config.account,
    username: config.user,
    application: APPLICATION_NAME,
    clientSessionKeepAlive: false,
    ...(config.defaults.warehouse ? { warehouse: config.defaults.warehouse } : {}),
    ...(config.defaults.database ? { database: config.defaults.database } : {}),
    ...(config.defaults.schema ? { schema: config.defaults.schema } : {}),
    ...(config.defaults.role ? { role: config.defaults.role } : {}),
  };

  if (config.auth.method === 'keypair') {
    return {
      ...base,
      authenticator: 'SNOWFLAKE_JWT',
      privateKeyPath: config.auth.privateKeyFile,
      ...(config.auth.passphrase ? { privateKeyPass: config.auth.passphrase } : {}),
    };
  }

  return { ...base, password: config.auth.password };
}

class SnowflakeBackendConnection implements BackendConnection {
  readonly id = randomUUID();

  constructor(private readonly connection: Connection) {}

  execute(sqlText: string, options: ExecuteOptions = {}): Promise<Row[]> {
    const { binds, signal } = options;

    return new Promise((resolve, reject) => {
      if (signal?.aborted) {
        reject(signal.reason);
        return;
      }

      const statement = this.connection.execute({
        sqlText,
        ...(binds && binds.length > 0 ? { binds: [...binds] } : {}),
        complete: (err, _stmt, rows) => {
          signal?.removeEventListener('abort', onAbort);
          if (err) {
            reject(new ToolError('BackendError', `Statement failed: ${err.message}`, {
              ...(err.code !== undefined ? { backendCode: err.code } : {}),
              ...(err.sqlState ? { sqlState: err.sqlState } : {}),
            }));
          } else {
            resolve(rows ?? []);
          }
        },
      });

      const onAbort = () => {
        statement.cancel(err => {
          if (err) {
            logger.warn('Failed to cancel statement', { statementId: statement.getStatementId(), error: err.message });
          }
        });
      };
      signal?.addEventListener('abort', onAbort, { once: true });
    });
  }

  isUp(): boolean {
    return this.connection.isUp();
  }

  close(): Promise<void> {
    return new Promise((resolve, reject) => {
      this.connection.destroy(err => {
        if (err) {
          reject(new ToolError('BackendError', `Failed to close connection: ${err.message}`));
        } else {
          resolve();
        }
      });
    });
  }
}

export function createSnowflakeConnectionFactory(config: ConnectionConfig): ConnectionFactory {
  const options = buildConnectionOptions(config);

  return () =>
    new Promise<BackendConnection>((resolve, reject) => {
      const connection = snowflake.createConnection(options);
      connection.connect(err => {
        if (err) {
          reject(new ToolError('BackendError', `Snowflake connection failed: ${err.message}`));
        } else {
          resolve(new SnowflakeBackendConnection(connection));
        }
      });
    });
}
