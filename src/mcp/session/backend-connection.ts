import type { BindValue, Row } from '../types.js';

export interface ExecuteOptions {
  binds?: readonly BindValue[];
  signal?: AbortSignal;
}

/**
 * One authenticated warehouse connection. Implementations cancel the running
 * statement when `signal` aborts.
 */
export interface BackendConnection {
  readonly id: string;
  execute(sqlText: string, options?: ExecuteOptions): Promise<Row[]>;
  isUp(): boolean;
  close(): Promise<void>;
}

export type ConnectionFactory = () => Promise<BackendConnection>;
