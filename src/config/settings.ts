/**
 * Settings provider.
 *
 * Named configuration values looked up by key; an absent or blank value is
 * `undefined`. Built once at startup (after `dotenv` has populated the
 * environment) and passed by reference through the AppContext.
 */

import { RuntimeSettingsSchema, type RuntimeSettings } from './schema.js';

const TRUE_VALUES = new Set(['1', 'true', 'yes', 'on']);

export class Settings {
  private readonly values: ReadonlyMap<string, string>;

  constructor(values: Record<string, string | undefined> = {}) {
    const entries: Array<[string, string]> = [];
    for (const [key, value] of Object.entries(values)) {
      const trimmed = value?.trim();
      if (trimmed) entries.push([key, trimmed]);
    }
    this.values = new Map(entries);
  }

  /**
   * Snapshot of an environment object (defaults to `process.env`).
   */
  static fromEnv(env: NodeJS.ProcessEnv = process.env): Settings {
    return new Settings({ ...env });
  }

  get(name: string): string | undefined {
    return this.values.get(name);
  }

  has(name: string): boolean {
    return this.values.has(name);
  }

  getBoolean(name: string): boolean {
    const value = this.values.get(name);
    return value !== undefined && TRUE_VALUES.has(value.toLowerCase());
  }

  /** Names from `names` that have no value */
  missing(names: readonly string[]): string[] {
    return names.filter((name) => !this.values.has(name));
  }

  /** Copy with some values replaced; `undefined` overrides are ignored */
  with(overrides: Record<string, string | undefined>): Settings {
    const merged: Record<string, string | undefined> = Object.fromEntries(this.values);
    for (const [key, value] of Object.entries(overrides)) {
      if (value !== undefined) merged[key] = value;
    }
    return new Settings(merged);
  }
}

export interface RuntimeSettingsResult {
  runtime: RuntimeSettings;
  /** Non-fatal problems; the offending keys fall back to defaults */
  warnings: string[];
}

/**
 * Resolve the runtime knobs from settings, validated with Zod.
 * Invalid values are reported as warnings and replaced by defaults.
 */
export function resolveRuntimeSettings(settings: Settings): RuntimeSettingsResult {
  const keys = Object.keys(RuntimeSettingsSchema.shape);
  const raw: Record<string, string> = {};
  for (const key of keys) {
    const value = settings.get(key);
    if (value !== undefined) raw[key] = value;
  }

  const result = RuntimeSettingsSchema.safeParse(raw);
  if (result.success) {
    return { runtime: result.data, warnings: [] };
  }

  const warnings: string[] = [];
  const invalid = new Set<string>();
  for (const issue of result.error.issues) {
    const key = issue.path.length > 0 ? String(issue.path[0]) : '(root)';
    invalid.add(key);
    warnings.push(`settings: ${key}: ${issue.message}`);
  }

  const cleaned = Object.fromEntries(Object.entries(raw).filter(([key]) => !invalid.has(key)));
  return { runtime: RuntimeSettingsSchema.parse(cleaned), warnings };
}
