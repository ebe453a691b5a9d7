/**
 * Tool Catalog
 *
 * The tools discovered from one or more tool servers, keyed by name.
 * The engine resolves and invokes tool calls through it; the provider
 * registry reads its schemas to bind them into the model request.
 */

import { ToolExecutionError } from '../errors/index.js';
import type { ToolDefinition, ToolSchema } from '../types.js';
import { NONE_TOKEN, type CancellationToken } from '../utilities/cancellation.js';
import { createComponentLogger } from '../utilities/logger.js';
import { renderToolContent, type ToolCallResult } from './jsonrpc.js';

const log = createComponentLogger('ToolCatalog');

/**
 * What the catalog needs from a tool source. ProcessToolClient satisfies it.
 */
export interface ToolSource {
  readonly serverName: string;
  readonly tools: readonly ToolDefinition[];
  call(name: string, args: Record<string, unknown>, token?: CancellationToken): Promise<ToolCallResult>;
}

export interface ToolCatalogEntry {
  definition: ToolDefinition;
  source: ToolSource;
}

/**
 * Rendered outcome of one invocation, ready for a tool-role message.
 */
export interface ToolInvocationOutput {
  content: string;
  isError: boolean;
}

export class ToolCatalog {
  private entries: Map<string, ToolCatalogEntry> = new Map();

  constructor(sources: readonly ToolSource[] = []) {
    for (const source of sources) {
      this.addSource(source);
    }
  }

  /**
   * Register every tool of a source. On a name clash the first source keeps it.
   */
  addSource(source: ToolSource): void {
    for (const definition of source.tools) {
      const existing = this.entries.get(definition.name);
      if (existing) {
        log.warn('Duplicate tool name, keeping first', {
          tool: definition.name,
          kept: existing.source.serverName,
          ignored: source.serverName,
        });
        continue;
      }
      this.entries.set(definition.name, { definition, source });
    }
  }

  get(name: string): ToolCatalogEntry | undefined {
    return this.entries.get(name);
  }

  has(name: string): boolean {
    return this.entries.has(name);
  }

  list(): string[] {
    return Array.from(this.entries.keys());
  }

  get size(): number {
    return this.entries.size;
  }

  definitions(): ToolDefinition[] {
    return Array.from(this.entries.values(), (entry) => entry.definition);
  }

  /**
   * OpenAI-style function schemas for the model request.
   */
  toSchemas(): ToolSchema[] {
    return this.definitions().map((definition) => ({
      type: 'function',
      function: {
        name: definition.name,
        description: definition.description,
        parameters: definition.inputSchema,
      },
    }));
  }

  /**
   * Invoke a tool by name and render its content as text.
   */
  async invoke(
    name: string,
    args: Record<string, unknown>,
    token: CancellationToken = NONE_TOKEN
  ): Promise<ToolInvocationOutput> {
    const entry = this.entries.get(name);
    if (!entry) {
      throw ToolExecutionError.unknownTool(name, this.list());
    }

    const result = await entry.source.call(name, args, token);
    return { content: renderToolContent(result.content), isError: result.isError };
  }
}
