/**
 * JSON-over-HTTP helper shared by the adapters.
 *
 * One POST, no retries. Non-2xx statuses map to ProviderError codes;
 * transport failures become NETWORK_ERROR unless the token was cancelled.
 */

import { CancellationError, ProviderError } from '../../errors/index.js';
import { isPlainObject } from '../../types.js';
import { toAbortSignal, type CancellationToken } from '../../utilities/cancellation.js';

export interface PostJsonOptions {
  provider: string;
  /** Used in error messages, e.g. "Azure OpenAI" */
  label: string;
  url: string;
  headers: Record<string, string>;
  body: unknown;
  token: CancellationToken;
}

export async function postJson(options: PostJsonOptions): Promise<unknown> {
  const { token } = options;
  token.throwIfCancellationRequested();

  const abort = toAbortSignal(token);
  try {
    return await send(options, abort.signal);
  } finally {
    abort.dispose();
  }
}

async function send(options: PostJsonOptions, signal: AbortSignal): Promise<unknown> {
  const { provider, label, url, headers, body, token } = options;

  let response: Response;
  try {
    response = await fetch(url, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json', ...headers },
      body: JSON.stringify(body),
      signal,
    });
  } catch (err) {
    if (token.isCancellationRequested) {
      throw new CancellationError(token.cancellationReason);
    }
    const cause = err instanceof Error ? err : new Error(String(err));
    throw new ProviderError(`${label} request failed: ${cause.message}`, provider, 'NETWORK_ERROR', undefined, cause);
  }

  if (!response.ok) {
    const text = await response.text();
    throw ProviderError.fromStatus(provider, label, response.status, text);
  }

  try {
    const data: unknown = await response.json();
    return data;
  } catch (err) {
    const cause = err instanceof Error ? err : new Error(String(err));
    throw new ProviderError(`${label} returned invalid JSON: ${cause.message}`, provider, 'INVALID_RESPONSE', response.status, cause);
  }
}

/**
 * Strip trailing slashes so paths can be appended.
 */
export function normalizeEndpoint(endpoint: string): string {
  return endpoint.replace(/\/+$/, '');
}

/**
 * Tool call arguments arrive as a JSON string; empty means no arguments.
 */
export function parseArguments(raw: string, toolName: string, provider: string): Record<string, unknown> {
  if (raw.trim() === '') return {};

  let value: unknown;
  try {
    value = JSON.parse(raw);
  } catch (err) {
    throw new ProviderError(
      `Invalid arguments for tool call '${toolName}': ${err instanceof Error ? err.message : String(err)}`,
      provider,
      'INVALID_RESPONSE'
    );
  }

  if (!isPlainObject(value)) {
    throw new ProviderError(`Arguments for tool call '${toolName}' are not an object`, provider, 'INVALID_RESPONSE');
  }
  return value;
}
