/**
 * Centralized Error Types
 *
 * Typed, categorized errors for the tool client, the provider registry and
 * the conversation engine. Every error carries a stable `kind` so that the
 * engine can report what went wrong to the observability sink without
 * inspecting messages.
 *
 * Error Categories:
 * - TRANSIENT: timeouts, dropped connections - retryable
 * - PERMANENT: bad binary path, unknown provider - not retryable
 * - VALIDATION: malformed identifiers or configuration
 * - DEPENDENCY: the tool server or model backend reported a failure
 * - CANCELLED: the caller withdrew the operation
 *
 * @example
 * ```typescript
 * throw new ToolExecutionError('Tool failed: not found', 'get_me', { code: -32602 });
 * ```
 */

// =============================================================================
// ERROR CATEGORIES
// =============================================================================

export enum ErrorCategory {
  /** May resolve on retry (timeout, connection reset) */
  TRANSIENT = 'TRANSIENT',

  /** Will not resolve on retry */
  PERMANENT = 'PERMANENT',

  /** Invalid input or configuration */
  VALIDATION = 'VALIDATION',

  /** External dependency (tool server, model backend) failed */
  DEPENDENCY = 'DEPENDENCY',

  /** Unexpected internal failure */
  INTERNAL = 'INTERNAL',

  /** Operation was cancelled */
  CANCELLED = 'CANCELLED',
}

/**
 * Stable identifiers for each error class.
 */
export type ErrorKind =
  | 'ConfigurationError'
  | 'InvalidModelIdentifier'
  | 'UnknownProvider'
  | 'ProtocolError'
  | 'RequestTimeout'
  | 'ToolExecutionError'
  | 'ProcessLifecycleError'
  | 'LoopLimitExceeded'
  | 'ProviderError'
  | 'Cancelled'
  | 'Internal';

// =============================================================================
// BASE ERROR CLASS
// =============================================================================

/**
 * Base class for all toolbridge errors.
 */
export class AgentError extends Error {
  readonly kind: ErrorKind;
  readonly category: ErrorCategory;
  readonly recoverable: boolean;
  readonly timestamp: Date;
  readonly context: Record<string, unknown>;
  override readonly cause?: Error;

  constructor(
    message: string,
    kind: ErrorKind,
    category: ErrorCategory,
    recoverable: boolean,
    context?: Record<string, unknown>,
    cause?: Error
  ) {
    super(message);
    this.name = 'AgentError';
    this.kind = kind;
    this.category = category;
    this.recoverable = recoverable;
    this.timestamp = new Date();
    this.context = context ?? {};
    this.cause = cause;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  /**
   * Serializable representation of the error.
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      kind: this.kind,
      message: this.message,
      category: this.category,
      recoverable: this.recoverable,
      timestamp: this.timestamp.toISOString(),
      context: this.context,
      cause: this.cause?.message,
    };
  }

  toLogString(): string {
    const parts = [`[${this.name}]`, `(${this.category})`, this.message];

    if (Object.keys(this.context).length > 0) {
      parts.push(`context=${JSON.stringify(this.context)}`);
    }

    return parts.join(' ');
  }
}

// =============================================================================
// CONFIGURATION AND IDENTIFIERS
// =============================================================================

/**
 * Missing or invalid provider credentials / settings.
 */
export class ConfigurationError extends AgentError {
  readonly missing: string[];

  constructor(message: string, missing: string[] = [], context?: Record<string, unknown>) {
    super(message, 'ConfigurationError', ErrorCategory.VALIDATION, false, { ...context, missing });
    this.name = 'ConfigurationError';
    this.missing = missing;
  }

  static forProvider(provider: string, missing: string[]): ConfigurationError {
    const detail = missing.length > 0 ? ` Please check ${missing.join(' and ')}.` : '';
    return new ConfigurationError(
      `Invalid ${provider} configuration.${detail}`,
      missing,
      { provider }
    );
  }
}

/**
 * Malformed "provider:model" identifier.
 */
export class InvalidModelIdentifierError extends AgentError {
  readonly identifier: string;

  constructor(identifier: string, reason: string) {
    super(
      `Invalid model identifier "${identifier}": ${reason}. Expected format: 'provider:model' (e.g., 'azure:gpt-4o', 'ollama:llama3.2')`,
      'InvalidModelIdentifier',
      ErrorCategory.VALIDATION,
      false,
      { identifier }
    );
    this.name = 'InvalidModelIdentifierError';
    this.identifier = identifier;
  }
}

/**
 * Provider key with no registered adapter.
 */
export class UnknownProviderError extends AgentError {
  readonly provider: string;
  readonly available: string[];

  constructor(provider: string, available: string[]) {
    super(
      `Unsupported provider: ${provider}. Available: ${available.join(', ') || '(none)'}`,
      'UnknownProvider',
      ErrorCategory.VALIDATION,
      false,
      { provider, available }
    );
    this.name = 'UnknownProviderError';
    this.provider = provider;
    this.available = available;
  }
}

// =============================================================================
// TOOL SERVER PROTOCOL
// =============================================================================

/**
 * Malformed JSON-RPC line, unexpected response, or failed handshake.
 */
export class ProtocolError extends AgentError {
  readonly serverName: string;
  readonly method?: string;

  constructor(
    message: string,
    serverName: string,
    context?: Record<string, unknown>,
    cause?: Error,
    kind: ErrorKind = 'ProtocolError',
    category: ErrorCategory = ErrorCategory.DEPENDENCY,
    recoverable = false
  ) {
    super(message, kind, category, recoverable, { ...context, server: serverName }, cause);
    this.name = 'ProtocolError';
    this.serverName = serverName;
    const method = context?.method;
    this.method = typeof method === 'string' ? method : undefined;
  }

  static malformedLine(serverName: string, line: string, cause?: Error): ProtocolError {
    const preview = line.length > 100 ? line.substring(0, 100) + '...' : line;
    return new ProtocolError(`Invalid JSON response: ${preview}`, serverName, { preview }, cause);
  }

  static handshakeFailed(serverName: string, method: string, error: RpcErrorPayload): ProtocolError {
    return new ProtocolError(
      `${method} failed: ${error.message} (code ${error.code})`,
      serverName,
      { method, code: error.code }
    );
  }
}

/**
 * No response line arrived within the configured bound.
 */
export class RequestTimeoutError extends ProtocolError {
  readonly timeoutMs: number;

  constructor(serverName: string, method: string, timeoutMs: number) {
    super(
      `Request timeout: ${method} got no response within ${timeoutMs}ms`,
      serverName,
      { method, timeoutMs },
      undefined,
      'RequestTimeout',
      ErrorCategory.TRANSIENT,
      true
    );
    this.name = 'RequestTimeoutError';
    this.timeoutMs = timeoutMs;
  }
}

/**
 * JSON-RPC error object as carried in a response.
 */
export interface RpcErrorPayload {
  code: number;
  message: string;
  data?: unknown;
}

/**
 * Tool server returned an `error` payload, or the tool is unknown.
 */
export class ToolExecutionError extends AgentError {
  readonly toolName: string;
  readonly rpcError?: RpcErrorPayload;

  constructor(message: string, toolName: string, rpcError?: RpcErrorPayload, context?: Record<string, unknown>) {
    super(message, 'ToolExecutionError', ErrorCategory.DEPENDENCY, false, { ...context, tool: toolName, code: rpcError?.code });
    this.name = 'ToolExecutionError';
    this.toolName = toolName;
    this.rpcError = rpcError;
  }

  static fromRpcError(toolName: string, error: RpcErrorPayload): ToolExecutionError {
    return new ToolExecutionError(
      `Tool call failed: ${error.message || 'no message'} (code ${error.code})`,
      toolName,
      error
    );
  }

  static unknownTool(toolName: string, available: string[]): ToolExecutionError {
    return new ToolExecutionError(
      `Tool '${toolName}' not found. Available tools: ${available.join(', ') || '(none)'}`,
      toolName,
      undefined,
      { available: available.length }
    );
  }
}

/**
 * Binary missing, process not running, unexpected exit, or kill timeout.
 */
export class ProcessLifecycleError extends AgentError {
  readonly serverName: string;

  constructor(message: string, serverName: string, context?: Record<string, unknown>, cause?: Error) {
    super(message, 'ProcessLifecycleError', ErrorCategory.PERMANENT, false, { ...context, server: serverName }, cause);
    this.name = 'ProcessLifecycleError';
    this.serverName = serverName;
  }

  static binaryNotFound(serverName: string, path: string): ProcessLifecycleError {
    return new ProcessLifecycleError(`Tool server binary not found at ${path}`, serverName, { path });
  }

  static notStarted(serverName: string): ProcessLifecycleError {
    return new ProcessLifecycleError(`Tool server "${serverName}" is not running. Call start() first.`, serverName);
  }

  static exited(serverName: string, code: number | null, signal: string | null): ProcessLifecycleError {
    return new ProcessLifecycleError(
      `Tool server "${serverName}" exited unexpectedly (code: ${code}, signal: ${signal})`,
      serverName,
      { code, signal }
    );
  }

  static killTimeout(serverName: string, pid: number | undefined, waitedMs: number): ProcessLifecycleError {
    return new ProcessLifecycleError(
      `Tool server "${serverName}" (pid ${pid}) did not exit ${waitedMs}ms after SIGKILL`,
      serverName,
      { pid, waitedMs }
    );
  }
}

// =============================================================================
// ENGINE AND PROVIDERS
// =============================================================================

/**
 * The model kept requesting tools past the iteration ceiling.
 */
export class LoopLimitExceededError extends AgentError {
  readonly limit: number;

  constructor(limit: number) {
    super(
      `Loop limit exceeded: the model was still requesting tools after ${limit} iterations`,
      'LoopLimitExceeded',
      ErrorCategory.PERMANENT,
      false,
      { limit }
    );
    this.name = 'LoopLimitExceededError';
    this.limit = limit;
  }
}

export type ProviderErrorCode =
  | 'AUTHENTICATION_FAILED'
  | 'RATE_LIMITED'
  | 'CONTEXT_LENGTH_EXCEEDED'
  | 'INVALID_REQUEST'
  | 'INVALID_RESPONSE'
  | 'SERVER_ERROR'
  | 'NETWORK_ERROR'
  | 'UNKNOWN';

/**
 * Model backend call failed.
 */
export class ProviderError extends AgentError {
  readonly providerName: string;
  readonly code: ProviderErrorCode;
  readonly statusCode?: number;

  constructor(message: string, providerName: string, code: ProviderErrorCode, statusCode?: number, cause?: Error) {
    const transient = code === 'RATE_LIMITED' || code === 'SERVER_ERROR' || code === 'NETWORK_ERROR';
    super(
      message,
      'ProviderError',
      transient ? ErrorCategory.TRANSIENT : ErrorCategory.DEPENDENCY,
      transient,
      { provider: providerName, code, statusCode },
      cause
    );
    this.name = 'ProviderError';
    this.providerName = providerName;
    this.code = code;
    this.statusCode = statusCode;
  }

  /**
   * Map an HTTP status and body to a provider error.
   */
  static fromStatus(providerName: string, label: string, status: number, body: string): ProviderError {
    let code: ProviderErrorCode = 'UNKNOWN';

    if (status === 401 || status === 403) code = 'AUTHENTICATION_FAILED';
    else if (status === 429) code = 'RATE_LIMITED';
    else if (status === 400) {
      code = body.includes('context_length') || body.includes('maximum context length')
        ? 'CONTEXT_LENGTH_EXCEEDED'
        : 'INVALID_REQUEST';
    } else if (status === 404) code = 'INVALID_REQUEST';
    else if (status >= 500) code = 'SERVER_ERROR';

    return new ProviderError(`${label} API error (${status}): ${body}`, providerName, code, status);
  }
}

/**
 * The caller cancelled the operation (or a turn timeout fired).
 */
export class CancellationError extends AgentError {
  readonly reason: string;

  constructor(reason: string = 'Operation cancelled') {
    super(reason, 'Cancelled', ErrorCategory.CANCELLED, false, { reason });
    this.name = 'CancellationError';
    this.reason = reason;
  }
}

// =============================================================================
// ERROR UTILITIES
// =============================================================================

/**
 * Wrap an unknown thrown value as an AgentError.
 */
export function wrapError(error: unknown, context?: Record<string, unknown>): AgentError {
  if (error instanceof AgentError) {
    return error;
  }

  const err = error instanceof Error ? error : new Error(String(error));
  return new AgentError(err.message, 'Internal', ErrorCategory.INTERNAL, false, context, err);
}

export function isAgentError(error: unknown): error is AgentError {
  return error instanceof AgentError;
}

export function isRecoverable(error: unknown): boolean {
  return error instanceof AgentError && error.recoverable;
}

export function isCancellationError(error: unknown): error is CancellationError {
  return error instanceof CancellationError;
}

/**
 * Format error for display to the user.
 */
export function formatError(error: unknown): string {
  if (error instanceof AgentError) {
    return `${error.name}: ${error.message}`;
  }
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}

/**
 * Format error for logging with full details.
 */
export function formatErrorForLog(error: unknown): string {
  if (error instanceof AgentError) {
    return error.toLogString();
  }
  if (error instanceof Error) {
    return `[Error] ${error.message}`;
  }
  return `[Unknown] ${String(error)}`;
}
