/**
 * Prompt template source.
 *
 * Loads the system prompt and named query templates from a YAML file.
 * Templates use `{name}` placeholders.
 */

import { existsSync, readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import YAML from 'yaml';
import { z } from 'zod';
import { ConfigurationError } from '../errors/index.js';

const PromptFileSchema = z.object({
  system: z.object({
    base: z.string().min(1),
  }),
  queries: z.record(z.string(), z.string()).default({}),
  examples: z.array(z.string()).default([]),
});

export type PromptFile = z.infer<typeof PromptFileSchema>;

/** Bundled prompt file, resolved from both src/prompts and dist/prompts */
export const DEFAULT_PROMPTS_PATH = fileURLToPath(new URL('../../prompts/agent-prompts.yaml', import.meta.url));

const PLACEHOLDER = /\{(\w+)\}/g;

export class PromptLoader {
  private readonly prompts: PromptFile;

  constructor(prompts: PromptFile) {
    this.prompts = prompts;
  }

  static fromFile(path: string = DEFAULT_PROMPTS_PATH): PromptLoader {
    if (!existsSync(path)) {
      throw new ConfigurationError(`Prompt file not found: ${path}`, [], { path });
    }

    let raw: unknown;
    try {
      raw = YAML.parse(readFileSync(path, 'utf-8'));
    } catch (err) {
      throw new ConfigurationError(
        `Error parsing prompt file ${path}: ${err instanceof Error ? err.message : String(err)}`,
        [],
        { path }
      );
    }
    return PromptLoader.fromObject(raw, path);
  }

  static fromObject(raw: unknown, source = '(inline)'): PromptLoader {
    const result = PromptFileSchema.safeParse(raw);
    if (!result.success) {
      const details = result.error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`);
      throw new ConfigurationError(`Invalid prompt file ${source}: ${details.join(', ')}`, [], { source });
    }
    return new PromptLoader(result.data);
  }

  getSystemMessage(): string {
    return this.prompts.system.base.trim();
  }

  getQueryTemplate(name: string): string {
    const template = this.prompts.queries[name];
    if (template === undefined) {
      throw new ConfigurationError(
        `Unknown query type: ${name}. Available: ${this.listQueries().join(', ')}`,
        [],
        { query: name }
      );
    }
    return template;
  }

  /**
   * Fill a named template. Every placeholder needs a value.
   */
  formatQuery(name: string, values: Record<string, string | number> = {}): string {
    const template = this.getQueryTemplate(name);
    const missing = [...template.matchAll(PLACEHOLDER)]
      .map((match) => match[1])
      .filter((key): key is string => key !== undefined && values[key] === undefined);

    if (missing.length > 0) {
      throw new ConfigurationError(
        `Query '${name}' is missing values for: ${[...new Set(missing)].join(', ')}`,
        missing,
        { query: name }
      );
    }

    return template.replace(PLACEHOLDER, (_, key: string) => String(values[key]));
  }

  listQueries(): string[] {
    return Object.keys(this.prompts.queries);
  }

  getExampleQueries(): string[] {
    return [...this.prompts.examples];
  }
}
