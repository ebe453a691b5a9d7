/**
 * Tool Listing
 *
 * Starts each configured tool server just long enough to read its tool
 * list. No model provider is involved, so this works without provider
 * settings.
 */

import type { ToolServerConfig } from '../config/tool-servers.js';
import { ConfigurationError } from '../errors/index.js';
import { isPlainObject, type ToolDefinition } from '../types.js';
import type { CancellationToken } from '../utilities/cancellation.js';
import { withToolClient, type ProcessToolClientOptions } from './process-tool-client.js';

export interface ServerToolListing {
  server: string;
  tools: ToolDefinition[];
}

export interface ListToolsOptions extends ProcessToolClientOptions {
  /** Only this server */
  server?: string;
  token?: CancellationToken;
}

const NO_DESCRIPTION = 'No description available';

/**
 * The configured servers to list, narrowed to one when `server` is given.
 */
export function selectServers(configs: readonly ToolServerConfig[], server?: string): ToolServerConfig[] {
  if (server === undefined) return [...configs];

  const match = configs.filter((config) => config.name === server);
  if (match.length === 0) {
    const available = configs.map((config) => config.name).join(', ') || '(none)';
    throw new ConfigurationError(
      `Tool server '${server}' is not configured or is disabled. Available: ${available}`,
      [],
      { server }
    );
  }
  return match;
}

/**
 * List tools server by server. Each server is stopped before the next starts.
 */
export async function listServerTools(
  configs: readonly ToolServerConfig[],
  options: ListToolsOptions = {}
): Promise<ServerToolListing[]> {
  const { server, ...clientOptions } = options;
  const listings: ServerToolListing[] = [];

  for (const config of selectServers(configs, server)) {
    const perServer = { ...clientOptions, requestTimeoutMs: config.requestTimeoutMs ?? clientOptions.requestTimeoutMs };
    const tools = await withToolClient(config, perServer, async (client) => [...client.tools]);
    listings.push({ server: config.name, tools });
  }
  return listings;
}

// =============================================================================
// FORMATTING
// =============================================================================

/**
 * `name: type` for each property of a tool's input schema; required ones
 * are marked with `*`.
 */
export function describeParameters(inputSchema: Record<string, unknown>): string[] {
  const properties = inputSchema['properties'];
  if (!isPlainObject(properties)) return [];

  const requiredList = inputSchema['required'];
  const required = new Set(
    Array.isArray(requiredList) ? requiredList.filter((key): key is string => typeof key === 'string') : []
  );

  return Object.entries(properties).map(([key, schema]) => {
    const type = isPlainObject(schema) && typeof schema['type'] === 'string' ? schema['type'] : 'unknown';
    return `${key}${required.has(key) ? '*' : ''}: ${type}`;
  });
}

export function formatToolListing(listings: readonly ServerToolListing[], detailed = false): string {
  const total = listings.reduce((sum, listing) => sum + listing.tools.length, 0);
  const lines = [`Found ${total} tool(s) on ${listings.length} server(s)`];

  for (const listing of listings) {
    lines.push('', `${listing.server} (${listing.tools.length})`);
    if (listing.tools.length === 0) {
      lines.push('  (no tools)');
      continue;
    }

    const width = Math.max(...listing.tools.map((tool) => tool.name.length));
    for (const tool of listing.tools) {
      const description = tool.description || NO_DESCRIPTION;
      if (!detailed) {
        lines.push(`  ${tool.name.padEnd(width)}  ${description}`);
        continue;
      }
      const parameters = describeParameters(tool.inputSchema);
      lines.push(`  ${tool.name}`, `    ${description}`, `    Parameters: ${parameters.join(', ') || 'none'}`);
    }
  }

  return lines.join('\n');
}

export interface ToolListingJson {
  total_tools: number;
  servers: Array<{
    server: string;
    total_tools: number;
    tools: Array<{ name: string; description: string; schema?: Record<string, unknown> }>;
  }>;
}

export function toolListingToJson(listings: readonly ServerToolListing[], detailed = false): ToolListingJson {
  return {
    total_tools: listings.reduce((sum, listing) => sum + listing.tools.length, 0),
    servers: listings.map((listing) => ({
      server: listing.server,
      total_tools: listing.tools.length,
      tools: listing.tools.map((tool) => ({
        name: tool.name,
        description: tool.description || NO_DESCRIPTION,
        ...(detailed ? { schema: tool.inputSchema } : {}),
      })),
    })),
  };
}
