import type { ErrorDescriptor, ErrorKind, StatementCategory, ToolInvocationResult } from './types.js';

const ERROR_CODES: Record<ErrorKind, string> = {
  ConfigurationError: 'E1000',
  NotFound: 'E1001',
  ValidationError: 'E1002',
  PolicyDenied: 'E1003',
  ResourceExhausted: 'E1004',
  BackendError: 'E1005',
  InternalError: 'E1006',
};

export class ToolError extends Error {
  constructor(
    readonly kind: ErrorKind,
    message: string,
    readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'ToolError';
  }

  get code(): string {
    return ERROR_CODES[this.kind];
  }

  toDescriptor(): ErrorDescriptor {
    return {
      kind: this.kind,
      code: this.code,
      message: this.message,
      ...(this.details ? { details: this.details } : {}),
    };
  }
}

/**
 * Raised while loading configuration. Never converted into a tool result:
 * it aborts startup.
 */
export class ConfigurationError extends ToolError {
  constructor(message: string, details?: Record<string, unknown>) {
    super('ConfigurationError', message, details);
    this.name = 'ConfigurationError';
  }
}

export class PolicyDeniedError extends ToolError {
  constructor(readonly category: StatementCategory) {
    super(
      'PolicyDenied',
      `Statement category '${category}' is not permitted by sql_statement_permissions`,
      { category }
    );
    this.name = 'PolicyDeniedError';
  }
}

export function createErrorResponse(
  kind: ErrorKind,
  message: string,
  details?: Record<string, unknown>
): ToolInvocationResult {
  return { success: false, error: new ToolError(kind, message, details).toDescriptor() };
}

export function toErrorResult(error: unknown): ToolInvocationResult {
  if (error instanceof ToolError) {
    return { success: false, error: error.toDescriptor() };
  }
  const message = error instanceof Error ? error.message : String(error);
  return createErrorResponse('InternalError', message);
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
