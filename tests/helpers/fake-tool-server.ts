/**
 * Config for the stand-in tool server in tests/fixtures.
 */

import { fileURLToPath } from 'node:url';
import type { ToolServerConfig } from '../../src/config/tool-servers.js';

export const FAKE_SERVER_SCRIPT = fileURLToPath(new URL('../fixtures/fake-tool-server.mjs', import.meta.url));

export type FakeServerMode = 'normal' | 'init-error' | 'silent' | 'ignore-sigterm';

export function fakeServer(
  mode: FakeServerMode = 'normal',
  env: Record<string, string> = {},
  name = 'fake'
): ToolServerConfig {
  return {
    name,
    command: process.execPath,
    args: [FAKE_SERVER_SCRIPT],
    env: { FAKE_MODE: mode, ...env },
  };
}

/** True while a process with this pid exists */
export function isProcessRunning(pid: number): boolean {
  try {
    process.kill(pid, 0);
    return true;
  } catch {
    return false;
  }
}
