import { describe, it, beforeEach, afterEach } from 'node:test';
import assert from 'node:assert';
import { setTimeout as sleep } from 'timers/promises';
import { SessionManager } from '../../session/session-manager.js';
import { FakeBackend, hang } from '../helpers/fake-backend.js';

describe('Session Manager', () => {
  let backend: FakeBackend;
  let manager: SessionManager;

  function createManager(overrides: { max?: number; statementTimeoutMs?: number } = {}): SessionManager {
    return new SessionManager({
      factory: backend.factory,
      pool: { min: 0, max: overrides.max ?? 1, acquireTimeoutMs: 30, idleTimeoutMs: 0 },
      defaults: { warehouse: 'WH' },
      statementTimeoutMs: overrides.statementTimeoutMs ?? 1000,
    });
  }

  beforeEach(() => {
    backend = new FakeBackend();
    manager = createManager();
  });

  afterEach(async () => {
    await manager.close();
  });

  it('overlays requested parameters on the defaults', () => {
    assert.deepStrictEqual(manager.resolveParameters({ warehouse: ' ', database: ' SALES ' }), {
      warehouse: 'WH',
      database: 'SALES',
    });
  });

  it('applies session parameters before handing out a session', async () => {
    backend.responder = () => [{ ONE: 1 }];
    const session = await manager.acquire({
      role: 'ANALYST',
      database: 'SALES',
      schema: 'PUBLIC',
      queryTag: '{"tool":"run_snowflake_query"}',
    });

    assert.strictEqual(session.id, 'conn-1');
    assert.deepStrictEqual(session.parameters, {
      role: 'ANALYST',
      warehouse: 'WH',
      database: 'SALES',
      schema: 'PUBLIC',
      queryTag: '{"tool":"run_snowflake_query"}',
    });
    assert.deepStrictEqual(backend.statements, [
      'USE ROLE ANALYST',
      'USE WAREHOUSE WH',
      'USE DATABASE SALES',
      'USE SCHEMA SALES.PUBLIC',
      'ALTER SESSION SET QUERY_TAG = ?',
    ]);
    assert.deepStrictEqual(await manager.execute(session, 'SELECT 1'), [{ ONE: 1 }]);
    await manager.release(session);
  });

  it('quotes identifiers that are not plain names', async () => {
    await manager.withSession({ database: 'my db' }, async () => undefined);
    assert.deepStrictEqual(backend.statements, ['USE WAREHOUSE WH', 'USE DATABASE "my db"']);
  });

  it('does not leak one lease\'s schema into the next', async () => {
    await manager.withSession({ database: 'A', schema: 'S1' }, async () => undefined);
    await manager.withSession({ database: 'B', schema: 'S2' }, async () => undefined);

    assert.strictEqual(backend.connections.length, 1);
    assert.deepStrictEqual(backend.connections[0].state, { warehouse: 'WH', database: 'B', schema: 'S2' });
  });

  it('replaces a connection whose context the next lease cannot reset', async () => {
    await manager.withSession({ database: 'A', schema: 'S1' }, async () => undefined);
    const session = await manager.acquire({ database: 'A' });

    assert.strictEqual(session.id, 'conn-2');
    assert.strictEqual(backend.connections[0].closed, true);
    assert.deepStrictEqual(backend.connections[1].state, { warehouse: 'WH', database: 'A' });
    await manager.release(session);
  });

  it('unsets a query tag left by an earlier lease', async () => {
    await manager.withSession({ queryTag: 'first' }, async () => undefined);
    const before = backend.statements.length;
    await manager.withSession({}, async () => undefined);

    assert.deepStrictEqual(backend.statements.slice(before), ['USE WAREHOUSE WH', 'ALTER SESSION UNSET QUERY_TAG']);
    assert.deepStrictEqual(backend.connections[0].state, { warehouse: 'WH' });
  });

  it('fails with ResourceExhausted when every connection is leased', async () => {
    const held = await manager.acquire();

    await assert.rejects(manager.acquire(), {
      kind: 'ResourceExhausted',
      message: 'No warehouse connection available within 30ms (pool max 1)',
    });
    assert.strictEqual(backend.connections.length, 1);
    await manager.release(held);
  });

  it('hands a released connection to a queued caller', async () => {
    const held = await manager.acquire({ database: 'A' });
    const waiting = manager.acquire({ database: 'B' });
    await manager.release(held);

    const session = await waiting;
    assert.strictEqual(session.id, 'conn-1');
    assert.strictEqual(backend.connections[0].state.database, 'B');
    await manager.release(session);
  });

  it('never reuses a session whose statement failed', async () => {
    backend.responder = sql => {
      if (sql === 'SELECT bad') {
        throw new Error('SQL compilation error');
      }
      return [];
    };
    const session = await manager.acquire();

    await assert.rejects(manager.execute(session, 'SELECT bad'), {
      kind: 'BackendError',
      message: 'Statement failed: SQL compilation error',
    });
    await assert.rejects(manager.execute(session, 'SELECT 1'), {
      kind: 'InternalError',
      message: 'Session conn-1 failed earlier and cannot run more statements',
    });
    await manager.release(session);

    assert.strictEqual(backend.connections[0].closed, true);
    const next = await manager.acquire();
    assert.strictEqual(next.id, 'conn-2');
    await manager.release(next);
  });

  it('times out a statement and cancels it on the backend', async () => {
    await manager.close();
    manager = createManager({ statementTimeoutMs: 20 });
    backend.responder = () => hang();
    const session = await manager.acquire();

    await assert.rejects(manager.execute(session, 'SELECT slow'), {
      kind: 'BackendError',
      message: 'Statement timed out after 20ms',
      details: { reason: 'timeout', timeoutMs: 20 },
    });
    assert.deepStrictEqual(backend.cancelled, ['SELECT slow']);

    await manager.release(session);
    assert.strictEqual(backend.connections[0].closed, true);
    assert.strictEqual(manager.stats().size, 0);
  });

  it('cancels a running statement when the caller aborts', async () => {
    backend.responder = () => hang();
    const controller = new AbortController();
    const session = await manager.acquire();

    const pending = manager.execute(session, 'SELECT slow', { signal: controller.signal });
    controller.abort();

    await assert.rejects(pending, {
      kind: 'BackendError',
      message: 'Statement was cancelled',
      details: { reason: 'cancelled' },
    });
    assert.deepStrictEqual(backend.cancelled, ['SELECT slow']);
    await manager.release(session);
  });

  it('does not open a connection when the caller aborted before the lease', async () => {
    const controller = new AbortController();
    controller.abort();

    await assert.rejects(manager.acquire({}, controller.signal), {
      kind: 'BackendError',
      message: 'Invocation was cancelled before a session was leased',
      details: { reason: 'cancelled' },
    });
    assert.strictEqual(backend.connections.length, 0);
    assert.deepStrictEqual(manager.stats(), { size: 0, idle: 0, borrowed: 0, pending: 0, min: 0, max: 1 });
  });

  it('stops waiting for a connection when the caller aborts', async () => {
    const held = await manager.acquire();
    const controller = new AbortController();
    const waiting = manager.acquire({}, controller.signal);
    controller.abort();

    await assert.rejects(waiting, {
      kind: 'BackendError',
      message: 'Invocation was cancelled while waiting for a warehouse connection',
      details: { reason: 'cancelled' },
    });
    assert.strictEqual(manager.stats().pending, 0);

    await manager.release(held);
    assert.deepStrictEqual(manager.stats(), { size: 1, idle: 1, borrowed: 0, pending: 0, min: 0, max: 1 });
  });

  it('gives up on a connection that takes too long to open', async () => {
    let open = (): void => undefined;
    backend.connectGate = new Promise<void>(resolve => {
      open = resolve;
    });

    await assert.rejects(manager.acquire(), {
      kind: 'BackendError',
      message: 'Opening a warehouse connection timed out after 30ms',
      details: { reason: 'timeout', timeoutMs: 30 },
    });
    assert.strictEqual(manager.stats().size, 0);

    backend.connectGate = undefined;
    open();
    await sleep(10);
    assert.strictEqual(backend.connections[0].closed, true);

    const session = await manager.acquire();
    assert.strictEqual(session.id, 'conn-2');
    await manager.release(session);
  });

  it('replaces a connection after a statement changes its session context', async () => {
    const session = await manager.acquire();
    await manager.execute(session, 'USE SCHEMA SALES.X');
    await manager.release(session);

    assert.deepStrictEqual(manager.stats(), { size: 0, idle: 0, borrowed: 0, pending: 0, min: 0, max: 1 });
    assert.strictEqual(backend.connections[0].closed, true);

    const next = await manager.acquire();
    assert.strictEqual(next.id, 'conn-2');
    assert.deepStrictEqual(backend.connections[1].state, { warehouse: 'WH' });
    await manager.release(next);
  });

  it('replaces a connection after a transaction starts or a session parameter changes', async () => {
    const first = await manager.acquire();
    await manager.execute(first, 'BEGIN TRANSACTION');
    await manager.release(first);

    const second = await manager.acquire();
    await manager.execute(second, "ALTER SESSION SET TIMEZONE = 'UTC'", { category: 'Alter' });
    await manager.release(second);

    const third = await manager.acquire();
    assert.strictEqual(third.id, 'conn-3');
    assert.deepStrictEqual(
      backend.connections.map(connection => connection.closed),
      [true, true, false]
    );
    await manager.release(third);
  });

  it('keeps a connection after read-only statements', async () => {
    const session = await manager.acquire();
    await manager.execute(session, 'SELECT 1');
    await manager.execute(session, 'SHOW TABLES');
    await manager.release(session);

    assert.deepStrictEqual(manager.stats(), { size: 1, idle: 1, borrowed: 0, pending: 0, min: 0, max: 1 });
    const next = await manager.acquire();
    assert.strictEqual(next.id, 'conn-1');
    await manager.release(next);
  });

  it('destroys a connection whose session parameters cannot be applied', async () => {
    backend.failSessionStatement = /^USE DATABASE/;

    await assert.rejects(manager.acquire({ database: 'MISSING' }), {
      kind: 'BackendError',
      message: 'Failed to apply session parameters: cannot apply USE DATABASE MISSING',
    });
    assert.strictEqual(backend.connections[0].closed, true);
    assert.strictEqual(manager.stats().size, 0);
  });

  it('fails fast when a connection cannot be opened', async () => {
    backend.failConnect = true;

    await assert.rejects(manager.acquire(), { message: 'connection refused' });
    assert.strictEqual(manager.stats().size, 0);
  });

  it('discards pooled connections that went down while idle', async () => {
    await manager.withSession({}, async () => undefined);
    backend.connections[0].up = false;

    const session = await manager.acquire();
    assert.strictEqual(session.id, 'conn-2');
    assert.strictEqual(backend.connections[0].closed, true);
    await manager.release(session);
  });

  it('treats a second release as a no-op', async () => {
    const session = await manager.acquire();
    await manager.release(session);
    await manager.release(session);

    assert.deepStrictEqual(manager.stats(), { size: 1, idle: 1, borrowed: 0, pending: 0, min: 0, max: 1 });
  });

  it('refuses statements on a session it did not lease', async () => {
    await assert.rejects(manager.execute({ id: 'conn-9', parameters: {} }, 'SELECT 1'), {
      kind: 'InternalError',
      message: 'Session conn-9 is not leased',
    });
  });

  it('releases the session when the work fails', async () => {
    await assert.rejects(
      manager.withSession({}, async () => {
        throw new Error('boom');
      }),
      { message: 'boom' }
    );
    assert.strictEqual(manager.stats().borrowed, 0);
  });
});
