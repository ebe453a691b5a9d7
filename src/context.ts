/**
 * Application context.
 *
 * Built once at startup and passed by reference to every session:
 * settings, runtime knobs, logger, tracer, prompts and the provider
 * registry. `dispose()` releases what the context owns.
 */

import { Settings, resolveRuntimeSettings } from './config/settings.js';
import type { RuntimeSettings } from './config/schema.js';
import { Tracer } from './observability/tracer.js';
import { PromptLoader } from './prompts/prompt-loader.js';
import { ModelProviderRegistry, createDefaultRegistry } from './providers/registry.js';
import type { ProviderAdapter } from './providers/types.js';
import { createComponentLogger, type StructuredLogger } from './utilities/logger.js';

export interface AppContext {
  readonly settings: Settings;
  readonly runtime: RuntimeSettings;
  readonly logger: StructuredLogger;
  readonly tracer: Tracer;
  readonly prompts: PromptLoader;
  readonly registry: ModelProviderRegistry;
  dispose(): void;
}

export interface AppContextOptions {
  /** Defaults to a snapshot of process.env */
  settings?: Settings;
  logger?: StructuredLogger;
  tracer?: Tracer;
  prompts?: PromptLoader;
  /** Registered on top of the built-in adapters */
  adapters?: ProviderAdapter[];
}

export function createAppContext(options: AppContextOptions = {}): AppContext {
  const settings = options.settings ?? Settings.fromEnv();
  const logger = options.logger ?? createComponentLogger('toolbridge');

  const { runtime, warnings } = resolveRuntimeSettings(settings);
  for (const warning of warnings) {
    logger.warn(warning);
  }

  const tracer = options.tracer ?? new Tracer();
  const prompts = options.prompts ?? PromptLoader.fromFile(runtime.PROMPTS_FILE);
  const registry = createDefaultRegistry(settings, tracer);
  for (const adapter of options.adapters ?? []) {
    registry.register(adapter);
  }

  let disposed = false;
  return {
    settings,
    runtime,
    logger,
    tracer,
    prompts,
    registry,
    dispose: () => {
      if (disposed) return;
      disposed = true;
      tracer.clear();
      logger.debug('Application context disposed');
    },
  };
}
