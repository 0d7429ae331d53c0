import { z } from 'zod';
import type { SemanticModelReference } from '../catalog/service-catalog.js';
import { runWithDeadline } from '../deadline.js';
import { ToolError, errorMessage } from '../errors.js';
import { logger } from '../logger.js';
import type { Row } from '../types.js';
import type { RestAuthenticator } from './rest-auth.js';

export interface SearchRequest {
  databaseName: string;
  schemaName: string;
  serviceName: string;
  query: string;
  columns?: readonly string[];
  filter?: Record<string, unknown>;
  limit: number;
}

export interface SearchResponse {
  results: Row[];
  requestId?: string;
}

export interface AnalystRequest {
  semanticModel: SemanticModelReference;
  question: string;
}

export interface AnalystResponse {
  text: string;
  sql?: string;
  suggestions: string[];
  warnings: string[];
  requestId?: string;
}

/**
 * The external AI services. Each call is one opaque request/response with its
 * own deadline.
 */
export interface CortexClient {
  search(request: SearchRequest, signal?: AbortSignal): Promise<SearchResponse>;
  analyst(request: AnalystRequest, signal?: AbortSignal): Promise<AnalystResponse>;
}

export type FetchFunction = (input: string, init: RequestInit) => Promise<Response>;

export interface CortexRestClientOptions {
  account: string;
  authenticator: RestAuthenticator;
  timeoutMs: number;
  /** Overrides `https://<account>.snowflakecomputing.com`. */
  baseUrl?: string;
  fetch?: FetchFunction;
}

const SearchResponseSchema = z.object({
  results: z.array(z.record(z.unknown())),
  request_id: z.string().optional(),
});

const AnalystContentSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('text'), text: z.string() }),
  z.object({ type: z.literal('sql'), statement: z.string() }),
  z.object({ type: z.literal('suggestions'), suggestions: z.array(z.string()) }),
]);

const AnalystResponseSchema = z.object({
  message: z.object({
    content: z.array(z.unknown()),
  }),
  request_id: z.string().optional(),
  warnings: z.array(z.object({ message: z.string() })).optional(),
});

export function accountUrl(account: string): string {
  return `https://${account.toLowerCase().replace(/_/g, '-')}.snowflakecomputing.com`;
}

export class CortexRestClient implements CortexClient {
  private readonly baseUrl: string;
  private readonly fetchFn: FetchFunction;

  constructor(private readonly options: CortexRestClientOptions) {
    this.baseUrl = (options.baseUrl ?? accountUrl(options.account)).replace(/\/+$/, '');
    this.fetchFn = options.fetch ?? fetch;
  }

  async search(request: SearchRequest, signal?: AbortSignal): Promise<SearchResponse> {
    const path = [
      '/api/v2/databases',
      encodeURIComponent(request.databaseName),
      'schemas',
      encodeURIComponent(request.schemaName),
      'cortex-search-services',
      `${encodeURIComponent(request.serviceName)}:query`,
    ].join('/');

    const body = await this.post(
      path,
      {
        query: request.query,
        limit: request.limit,
        ...(request.columns ? { columns: request.columns } : {}),
        ...(request.filter ? { filter: request.filter } : {}),
      },
      'Cortex Search request',
      signal
    );

    const parsed = SearchResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw new ToolError('BackendError', 'Unexpected Cortex Search response shape');
    }
    return {
      results: parsed.data.results,
      ...(parsed.data.request_id ? { requestId: parsed.data.request_id } : {}),
    };
  }

  async analyst(request: AnalystRequest, signal?: AbortSignal): Promise<AnalystResponse> {
    const model =
      request.semanticModel.kind === 'semantic_view'
        ? { semantic_view: request.semanticModel.identifier }
        : { semantic_model_file: request.semanticModel.path };

    const body = await this.post(
      '/api/v2/cortex/analyst/message',
      {
        messages: [{ role: 'user', content: [{ type: 'text', text: request.question }] }],
        ...model,
        stream: false,
      },
      'Cortex Analyst request',
      signal
    );

    const parsed = AnalystResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw new ToolError('BackendError', 'Unexpected Cortex Analyst response shape');
    }

    const text: string[] = [];
    const suggestions: string[] = [];
    let sql: string | undefined;
    for (const item of parsed.data.message.content) {
      const content = AnalystContentSchema.safeParse(item);
      if (!content.success) {
        continue;
      }
      switch (content.data.type) {
        case 'text':
          text.push(content.data.text);
          break;
        case 'sql':
          sql = content.data.statement;
          break;
        case 'suggestions':
          suggestions.push(...content.data.suggestions);
          break;
      }
    }

    return {
      text: text.join('\n'),
      ...(sql !== undefined ? { sql } : {}),
      suggestions,
      warnings: (parsed.data.warnings ?? []).map(w => w.message),
      ...(parsed.data.request_id ? { requestId: parsed.data.request_id } : {}),
    };
  }

  private post(path: string, payload: unknown, label: string, signal?: AbortSignal): Promise<unknown> {
    const url = `${this.baseUrl}${path}`;

    return runWithDeadline(
      async deadlineSignal => {
        let response: Response;
        try {
          response = await this.fetchFn(url, {
            method: 'POST',
            headers: {
              'Content-Type': 'application/json',
              Accept: 'application/json',
              ...this.options.authenticator.headers(),
            },
            body: JSON.stringify(payload),
            signal: deadlineSignal,
          });
        } catch (error) {
          throw new ToolError('BackendError', `${label} failed: ${errorMessage(error)}`);
        }

        const text = await response.text();
        if (!response.ok) {
          const detail = extractMessage(text) ?? response.statusText;
          logger.error(`${label} returned HTTP ${response.status}`, { url, detail });
          throw new ToolError(
            response.status === 404 ? 'NotFound' : 'BackendError',
            `${label} failed with HTTP ${response.status}: ${detail}`,
            { status: response.status }
          );
        }

        try {
          return JSON.parse(text);
        } catch (error) {
          throw new ToolError('BackendError', `${label} returned invalid JSON: ${errorMessage(error)}`);
        }
      },
      { timeoutMs: this.options.timeoutMs, label, signal }
    );
  }
}

const ErrorBodySchema = z.object({ message: z.string() });

function extractMessage(text: string): string | undefined {
  try {
    const parsed = ErrorBodySchema.safeParse(JSON.parse(text));
    return parsed.success ? parsed.data.message : text.trim() || undefined;
  } catch {
    return text.trim() || undefined;
  }
}
