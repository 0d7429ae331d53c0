export const STATEMENT_CATEGORIES = [
  'Select',
  'Describe',
  'Insert',
  'Update',
  'Delete',
  'Merge',
  'TruncateTable',
  'Create',
  'Alter',
  'Drop',
  'Transaction',
  'Commit',
  'Rollback',
  'Use',
  'Command',
  'Comment',
  'Unknown',
] as const;

export type StatementCategory = (typeof STATEMENT_CATEGORIES)[number];

export type ErrorKind =
  | 'ConfigurationError'
  | 'NotFound'
  | 'ValidationError'
  | 'PolicyDenied'
  | 'ResourceExhausted'
  | 'BackendError'
  | 'InternalError';

export type Row = Record<string, unknown>;

export type BindValue = string | number;

export interface SessionParameters {
  warehouse?: string;
  database?: string;
  schema?: string;
  role?: string;
  queryTag?: string;
}

export type AuthConfig =
  | { method: 'password'; password: string }
  | { method: 'keypair'; privateKeyFile: string; passphrase?: string };

export interface ConnectionConfig {
  account: string;
  user: string;
  auth: AuthConfig;
  defaults: SessionParameters;
}

export interface PoolConfig {
  min: number;
  max: number;
  acquireTimeoutMs: number;
  idleTimeoutMs: number;
}

export interface ServerConfig {
  connection: ConnectionConfig;
  pool: PoolConfig;
  statementTimeoutMs: number;
  serviceTimeoutMs: number;
  serviceConfigFile: string;
  queryTag?: string;
  auditLogFile?: string;
  logLevel: string;
}

export interface ColumnInfo {
  name: string;
  type: string;
  nullable?: boolean;
}

export interface QueryResultPayload {
  metadata: {
    columns: ColumnInfo[];
    rowCount: number;
  };
  data: Row[];
}

export interface ToolInvocationRequest {
  name: string;
  arguments?: Record<string, unknown>;
  statement?: string;
}

export interface ErrorDescriptor {
  kind: ErrorKind;
  code: string;
  message: string;
  details?: Record<string, unknown>;
}

export type ToolInvocationResult =
  | { success: true; payload: unknown }
  | { success: false; error: ErrorDescriptor };
