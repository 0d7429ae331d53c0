import { runWithDeadline } from '../deadline.js';
import { ToolError, errorMessage } from '../errors.js';
import { logger } from '../logger.js';
import { qualifiedName, quoteIdentifier } from '../sql-gate/identifiers.js';
import { changesSessionState } from '../sql-gate/statement-classifier.js';
import type { BindValue, PoolConfig, Row, SessionParameters, StatementCategory } from '../types.js';
import type { BackendConnection, ConnectionFactory } from './backend-connection.js';
import { BoundedPool, type PoolStats } from './connection-pool.js';

/**
 * A leased connection, bound to the session parameters it was acquired with.
 * Held by exactly one invocation until released.
 */
export interface ConnectionSession {
  readonly id: string;
  readonly parameters: Readonly<SessionParameters>;
}

export interface SessionManagerOptions {
  factory: ConnectionFactory;
  pool: PoolConfig;
  /** Parameters every connection opens with; requested values override them. */
  defaults?: SessionParameters;
  statementTimeoutMs: number;
}

export interface StatementOptions {
  binds?: readonly BindValue[];
  signal?: AbortSignal;
  /** Classified from the statement text when absent. */
  category?: StatementCategory;
}

interface PooledConnection {
  connection: BackendConnection;
  applied: SessionParameters;
}

interface Lease {
  pooled: PooledConnection;
  broken: boolean;
  /** A statement may have left session state behind; never pooled again. */
  tainted: boolean;
}

// Role first: switching role can change which warehouses and databases resolve.
const CONTEXT_PARAMETERS = ['role', 'warehouse', 'database', 'schema'] as const;

export class SessionManager {
  private readonly pool: BoundedPool<PooledConnection>;
  private readonly leases = new Map<ConnectionSession, Lease>();
  private readonly defaults: SessionParameters;

  constructor(private readonly options: SessionManagerOptions) {
    this.defaults = compact(options.defaults ?? {});
    this.pool = new BoundedPool<PooledConnection>(
      {
        create: async () => ({ connection: await options.factory(), applied: { ...this.defaults } }),
        destroy: pooled => pooled.connection.close(),
        validate: pooled => pooled.connection.isUp(),
      },
      options.pool
    );
  }

  resolveParameters(requested: SessionParameters = {}): SessionParameters {
    return { ...this.defaults, ...compact(requested) };
  }

  async acquire(requested: SessionParameters = {}, signal?: AbortSignal): Promise<ConnectionSession> {
    const target = this.resolveParameters(requested);
    if (signal?.aborted) {
      throw cancelledBeforeLease();
    }

    let pooled = await this.pool.acquire(signal);
    for (let attempt = 0; carriesUnresettableState(pooled.applied, target) && attempt < this.options.pool.max; attempt++) {
      logger.debug('Recycling pooled connection with stale session context', { connectionId: pooled.connection.id });
      await this.pool.destroy(pooled);
      pooled = await this.pool.acquire(signal);
    }

    if (signal?.aborted) {
      await this.pool.release(pooled);
      throw cancelledBeforeLease();
    }

    try {
      await this.applyParameters(pooled, target, signal);
    } catch (error) {
      await this.pool.destroy(pooled);
      throw asBackendError(error, 'Failed to apply session parameters');
    }

    const session: ConnectionSession = {
      id: pooled.connection.id,
      parameters: Object.freeze({ ...target }),
    };
    this.leases.set(session, { pooled, broken: false, tainted: false });
    return session;
  }

  async release(session: ConnectionSession): Promise<void> {
    const lease = this.leases.get(session);
    if (!lease) {
      return;
    }
    this.leases.delete(session);

    if (lease.broken) {
      logger.debug('Discarding failed session', { sessionId: session.id });
      await this.pool.destroy(lease.pooled);
    } else if (lease.tainted) {
      logger.debug('Discarding session whose state a statement changed', { sessionId: session.id });
      await this.pool.destroy(lease.pooled);
    } else {
      await this.pool.release(lease.pooled);
    }
  }

  /**
   * Runs one statement on a leased session. A failure, timeout or cancellation
   * marks the session broken. A statement that can change session state, such
   * as USE or BEGIN, marks it tainted. Either way the connection is destroyed
   * on release instead of pooled.
   */
  async execute(session: ConnectionSession, sqlText: string, options: StatementOptions = {}): Promise<Row[]> {
    const lease = this.leases.get(session);
    if (!lease) {
      throw new ToolError('InternalError', `Session ${session.id} is not leased`);
    }
    if (lease.broken) {
      throw new ToolError('InternalError', `Session ${session.id} failed earlier and cannot run more statements`);
    }

    if (changesSessionState(sqlText, options.category)) {
      lease.tainted = true;
    }

    try {
      return await this.run(lease.pooled, sqlText, options);
    } catch (error) {
      lease.broken = true;
      throw asBackendError(error, 'Statement failed');
    }
  }

  async withSession<T>(
    requested: SessionParameters,
    work: (session: ConnectionSession) => Promise<T>,
    signal?: AbortSignal
  ): Promise<T> {
    const session = await this.acquire(requested, signal);
    try {
      return await work(session);
    } finally {
      await this.release(session);
    }
  }

  stats(): PoolStats {
    return this.pool.stats();
  }

  prime(): Promise<void> {
    return this.pool.prime();
  }

  close(): Promise<void> {
    return this.pool.close();
  }

  private run(pooled: PooledConnection, sqlText: string, { binds, signal }: StatementOptions): Promise<Row[]> {
    return runWithDeadline(
      deadlineSignal => pooled.connection.execute(sqlText, { binds, signal: deadlineSignal }),
      { timeoutMs: this.options.statementTimeoutMs, label: 'Statement', signal }
    );
  }

  private async applyParameters(pooled: PooledConnection, target: SessionParameters, signal?: AbortSignal): Promise<void> {
    for (const key of CONTEXT_PARAMETERS) {
      const value = target[key];
      if (value === undefined) {
        continue;
      }
      await this.run(pooled, useStatement(key, value, target.database), { signal });
      pooled.applied[key] = value;
    }

    if (target.queryTag !== undefined) {
      await this.run(pooled, 'ALTER SESSION SET QUERY_TAG = ?', { binds: [target.queryTag], signal });
    } else if (pooled.applied.queryTag !== undefined) {
      await this.run(pooled, 'ALTER SESSION UNSET QUERY_TAG', { signal });
    }

    pooled.applied = { ...target };
  }
}

function useStatement(key: (typeof CONTEXT_PARAMETERS)[number], value: string, database?: string): string {
  switch (key) {
    case 'role':
      return `USE ROLE ${quoteIdentifier(value)}`;
    case 'warehouse':
      return `USE WAREHOUSE ${quoteIdentifier(value)}`;
    case 'database':
      return `USE DATABASE ${quoteIdentifier(value)}`;
    case 'schema':
      return `USE SCHEMA ${qualifiedName(database, value)}`;
  }
}

// A context value set by an earlier lease that this lease leaves unset cannot
// be cleared with USE; the connection has to be replaced.
function carriesUnresettableState(applied: SessionParameters, target: SessionParameters): boolean {
  return CONTEXT_PARAMETERS.some(key => applied[key] !== undefined && target[key] === undefined);
}

function compact(parameters: SessionParameters): SessionParameters {
  const result: SessionParameters = {};
  for (const key of [...CONTEXT_PARAMETERS, 'queryTag'] as const) {
    const value = parameters[key]?.trim();
    if (value) {
      result[key] = value;
    }
  }
  return result;
}

function cancelledBeforeLease(): ToolError {
  return new ToolError('BackendError', 'Invocation was cancelled before a session was leased', { reason: 'cancelled' });
}

function asBackendError(error: unknown, prefix: string): ToolError {
  if (error instanceof ToolError) {
    return error;
  }
  return new ToolError('BackendError', `${prefix}: ${errorMessage(error)}`);
}
