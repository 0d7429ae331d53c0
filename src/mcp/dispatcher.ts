import type { AuditEntry, AuditSink } from './audit/audit-logger.js';
import type { ServiceCatalog } from './catalog/service-catalog.js';
import type { CortexClient } from './cortex/cortex-client.js';
import { PolicyDeniedError, ToolError, errorMessage, toErrorResult } from './errors.js';
import { logger } from './logger.js';
import { normalizeRows } from './session/result-normalizer.js';
import type { SessionManager } from './session/session-manager.js';
import { classifyStatement, splitStatements, type PermissionPolicy } from './sql-gate/index.js';
import { buildToolRegistry, toInputSchema, type ToolContext, type ToolDefinition } from './tools/index.js';
import type {
  QueryResultPayload,
  SessionParameters,
  ToolInvocationRequest,
  ToolInvocationResult,
} from './types.js';

export const QUERY_TAG_ORIGIN = 'warehouse-mcp-bridge';

export interface ToolDispatcherOptions {
  catalog: ServiceCatalog;
  policy: PermissionPolicy;
  sessions: SessionManager;
  cortex: CortexClient;
  audit?: AuditSink;
  /** Configured query tag: a JSON object merged into every tag, or plain text kept under `tag`. */
  queryTag?: string;
}

export interface ListedTool {
  [key: string]: unknown;
  name: string;
  description: string;
  inputSchema: ReturnType<typeof toInputSchema>;
}

/**
 * Resolves invocations against the catalog and runs them. Every SQL
 * statement, hand-written or generated, passes the classifier and the
 * permission policy before a session is leased.
 */
export class ToolDispatcher {
  private readonly tools: ReadonlyMap<string, ToolDefinition>;
  private readonly queryTagFields: Record<string, unknown>;

  constructor(private readonly options: ToolDispatcherOptions) {
    this.tools = buildToolRegistry(options.catalog);
    this.queryTagFields = parseQueryTag(options.queryTag);
  }

  listTools(): ListedTool[] {
    return [...this.tools.values()].map(tool => ({
      name: tool.name,
      description: tool.description,
      inputSchema: toInputSchema(tool.schema),
    }));
  }

  async invoke(request: ToolInvocationRequest, signal?: AbortSignal): Promise<ToolInvocationResult> {
    try {
      const service = this.options.catalog.resolve(request.name);
      const tool = this.tools.get(request.name);
      if (!tool) {
        throw new ToolError('InternalError', `Service '${service.name}' has no tool named '${request.name}'`);
      }

      const input =
        service.kind === 'query_manager' && request.statement !== undefined
          ? { statement: request.statement, ...request.arguments }
          : request.arguments ?? {};

      const payload = await tool.run(input, this.contextFor(request.name, signal));
      return { success: true, payload };
    } catch (error) {
      if (!(error instanceof ToolError)) {
        logger.error('Unexpected failure while invoking tool', {
          tool: request.name,
          error: errorMessage(error),
          stack: error instanceof Error ? error.stack : undefined,
        });
      }
      return toErrorResult(error);
    }
  }

  queryTagFor(toolName: string): string {
    return JSON.stringify({ ...this.queryTagFields, origin: QUERY_TAG_ORIGIN, tool: toolName });
  }

  /**
   * The raw-SQL path: single statement, classify, policy check, then lease a
   * session and execute.
   */
  async executeStatement(
    toolName: string,
    sql: string,
    parameters: SessionParameters = {},
    signal?: AbortSignal
  ): Promise<QueryResultPayload> {
    const statements = splitStatements(sql);
    if (statements.length === 0) {
      throw new ToolError('ValidationError', 'Statement is empty');
    }
    if (statements.length > 1) {
      throw new ToolError('ValidationError', `Expected a single SQL statement, got ${statements.length}`, {
        statementCount: statements.length,
      });
    }

    const [statement] = statements;
    const category = classifyStatement(statement);

    if (!this.options.policy.isAllowed(category)) {
      logger.warn('Statement denied by sql_statement_permissions', { tool: toolName, category });
      await this.record({ toolName, sql: statement, category, status: 'denied' });
      throw new PolicyDeniedError(category);
    }

    const { sessions } = this.options;
    const startedAt = Date.now();
    try {
      const rows = await sessions.withSession(
        { ...parameters, queryTag: this.queryTagFor(toolName) },
        session => sessions.execute(session, statement, { signal, category }),
        signal
      );
      const result = normalizeRows(rows);
      await this.record({
        toolName,
        sql: statement,
        category,
        status: 'executed',
        columns: result.metadata.columns,
        rowCount: result.metadata.rowCount,
        executionTimeMs: Date.now() - startedAt,
      });
      return result;
    } catch (error) {
      logger.error('Statement execution failed', { tool: toolName, category, error: errorMessage(error) });
      await this.record({
        toolName,
        sql: statement,
        category,
        status: 'failed',
        executionTimeMs: Date.now() - startedAt,
        error: errorMessage(error),
      });
      throw error;
    }
  }

  private contextFor(toolName: string, signal?: AbortSignal): ToolContext {
    return {
      toolName,
      signal,
      cortex: this.options.cortex,
      runStatement: (sql, parameters) => this.executeStatement(toolName, sql, parameters, signal),
    };
  }

  private async record(entry: AuditEntry): Promise<void> {
    if (this.options.audit) {
      await this.options.audit.record(entry);
    }
  }
}

function parseQueryTag(configured: string | undefined): Record<string, unknown> {
  if (!configured) {
    return {};
  }
  try {
    const parsed: unknown = JSON.parse(configured);
    if (isRecord(parsed)) {
      return { ...parsed };
    }
  } catch {
    logger.debug('Configured query tag is not JSON; keeping it as text', { queryTag: configured });
  }
  return { tag: configured };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
