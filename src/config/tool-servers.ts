/**
 * Tool server registry loader.
 *
 * Reads `tool-servers.json`:
 *
 *   {
 *     "servers": {
 *       "github": {
 *         "command": "./bin/github-mcp-server",
 *         "args": ["stdio"],
 *         "credentials": ["GITHUB_PERSONAL_ACCESS_TOKEN"],
 *         "optionalCredentials": ["GITHUB_HOST"],
 *         "env": { "LOG_LEVEL": "${LOG_LEVEL}" }
 *       }
 *     }
 *   }
 *
 * Relative commands (`./`, `../`) resolve against the file's directory.
 * `${NAME}` references expand from settings.
 */

import { existsSync, readFileSync } from 'node:fs';
import { dirname, isAbsolute, resolve } from 'node:path';
import { ConfigurationError } from '../errors/index.js';
import { ToolServersFileSchema, type ToolServerEntry } from './schema.js';
import type { Settings } from './settings.js';

export interface ToolServerConfig {
  /** Registry key, used in logs and errors */
  name: string;
  command: string;
  args: string[];
  /** Added on top of the parent environment when spawning */
  env: Record<string, string>;
  cwd?: string;
  requestTimeoutMs?: number;
}

/**
 * Load and validate the registry, returning enabled servers in file order.
 * Missing files, invalid JSON, schema violations and missing credentials
 * all raise ConfigurationError before any process is spawned.
 */
export function loadToolServerConfigs(filePath: string, settings: Settings): ToolServerConfig[] {
  const absolutePath = resolve(filePath);
  if (!existsSync(absolutePath)) {
    throw new ConfigurationError(`Tool server configuration file not found: ${absolutePath}`, [], { path: absolutePath });
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(readFileSync(absolutePath, 'utf-8'));
  } catch (err) {
    throw new ConfigurationError(
      `Invalid JSON in tool server configuration ${absolutePath}: ${err instanceof Error ? err.message : String(err)}`,
      [],
      { path: absolutePath }
    );
  }

  const result = ToolServersFileSchema.safeParse(parsed);
  if (!result.success) {
    const details = result.error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`);
    throw new ConfigurationError(
      `Invalid tool server configuration ${absolutePath}: ${details.join(', ')}`,
      [],
      { path: absolutePath }
    );
  }

  const baseDir = dirname(absolutePath);
  const configs: ToolServerConfig[] = [];
  for (const [name, entry] of Object.entries(result.data.servers)) {
    if (entry.enabled === false) continue;
    configs.push(resolveServerEntry(name, entry, baseDir, settings));
  }
  return configs;
}

/**
 * Turn one registry entry into a spawnable config.
 */
export function resolveServerEntry(
  name: string,
  entry: ToolServerEntry,
  baseDir: string,
  settings: Settings
): ToolServerConfig {
  const missing = settings.missing(entry.credentials ?? []);
  if (missing.length > 0) {
    throw new ConfigurationError(
      `Tool server "${name}" requires ${missing.join(', ')}`,
      missing,
      { server: name }
    );
  }

  const env: Record<string, string> = {};
  for (const key of [...(entry.credentials ?? []), ...(entry.optionalCredentials ?? [])]) {
    const value = settings.get(key);
    if (value !== undefined) env[key] = value;
  }
  for (const [key, value] of Object.entries(entry.env ?? {})) {
    env[key] = expandSettings(value, settings);
  }

  const command = expandSettings(entry.command, settings);
  const cwd = entry.cwd ? expandSettings(entry.cwd, settings) : undefined;

  return {
    name,
    command: isRelativePath(command) ? resolve(baseDir, command) : command,
    args: (entry.args ?? []).map((arg) => expandSettings(arg, settings)),
    env,
    cwd: cwd && !isAbsolute(cwd) ? resolve(baseDir, cwd) : cwd,
    requestTimeoutMs: entry.requestTimeoutMs,
  };
}

/**
 * Replace ${NAME} with the setting's value (empty when absent).
 */
export function expandSettings(value: string, settings: Settings): string {
  return value.replace(/\$\{(\w+)\}/g, (_, key: string) => settings.get(key) ?? '');
}

function isRelativePath(command: string): boolean {
  return command.startsWith('./') || command.startsWith('../');
}
