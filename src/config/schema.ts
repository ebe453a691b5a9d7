/**
 * Zod schemas for configuration.
 *
 * Two sources are validated here: the runtime settings read from the
 * environment (after `.env` is loaded), and the tool-server registry file
 * (`tool-servers.json`) that describes which stdio servers to spawn.
 */

import { z } from 'zod';

// =============================================================================
// RUNTIME SETTINGS
// =============================================================================

const positiveInt = z.coerce.number().int().positive();

/**
 * Runtime knobs read from the environment. Credentials are not listed here:
 * they are looked up by name through `Settings.get()`.
 */
export const RuntimeSettingsSchema = z.object({
  MODEL_NAME: z.string().min(1).default('azure:gpt-4o'),
  AGENT_MAX_ITERATIONS: positiveInt.default(25),
  TOOL_REQUEST_TIMEOUT_MS: positiveInt.default(30000),
  TOOL_SHUTDOWN_GRACE_MS: positiveInt.default(2000),
  TURN_TIMEOUT_MS: positiveInt.optional(),
  TOOL_SERVERS_CONFIG: z.string().min(1).default('tool-servers.json'),
  PROMPTS_FILE: z.string().min(1).optional(),
  LOG_LEVEL: z.string().optional(),
  LOG_FILE: z.string().min(1).optional(),
});

export type RuntimeSettings = z.infer<typeof RuntimeSettingsSchema>;

// =============================================================================
// TOOL SERVER REGISTRY
// =============================================================================

const ServerEntrySchema = z
  .object({
    command: z.string().min(1),
    args: z.array(z.string()).optional(),
    /** Extra environment; values may reference settings as ${NAME} */
    env: z.record(z.string(), z.string()).optional(),
    cwd: z.string().optional(),
    enabled: z.boolean().optional(),
    /** Settings forwarded into the server environment; must be present */
    credentials: z.array(z.string()).optional(),
    /** Settings forwarded when present */
    optionalCredentials: z.array(z.string()).optional(),
    requestTimeoutMs: z.number().int().positive().optional(),
  })
  .strict();

export const ToolServersFileSchema = z
  .object({
    servers: z.record(z.string(), ServerEntrySchema),
  })
  .passthrough();

export type ToolServerEntry = z.infer<typeof ServerEntrySchema>;
export type ToolServersFile = z.infer<typeof ToolServersFileSchema>;
