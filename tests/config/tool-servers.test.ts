/**
 * Tool server registry loader tests
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { Settings } from '../../src/config/settings.js';
import { expandSettings, loadToolServerConfigs, resolveServerEntry } from '../../src/config/tool-servers.js';
import { ConfigurationError } from '../../src/errors/index.js';

describe('loadToolServerConfigs', () => {
  let tempDir: string;

  const writeConfig = (content: unknown): string => {
    const path = join(tempDir, 'tool-servers.json');
    writeFileSync(path, typeof content === 'string' ? content : JSON.stringify(content));
    return path;
  };

  beforeEach(() => {
    tempDir = mkdtempSync(join(tmpdir(), 'toolbridge-config-'));
  });

  afterEach(() => {
    rmSync(tempDir, { recursive: true, force: true });
  });

  it('should load servers in file order and skip disabled ones', () => {
    const path = writeConfig({
      servers: {
        github: { command: '/usr/local/bin/github-mcp-server', args: ['stdio'] },
        disabled: { command: 'nothing', enabled: false },
        files: { command: 'files-server' },
      },
    });

    const configs = loadToolServerConfigs(path, new Settings());

    expect(configs.map((c) => c.name)).toEqual(['github', 'files']);
    expect(configs[0]).toEqual({
      name: 'github',
      command: '/usr/local/bin/github-mcp-server',
      args: ['stdio'],
      env: {},
      cwd: undefined,
      requestTimeoutMs: undefined,
    });
    expect(configs[1]?.args).toEqual([]);
  });

  it('should resolve relative commands against the file directory', () => {
    const path = writeConfig({ servers: { github: { command: './bin/github-mcp-server', cwd: 'work' } } });

    const [config] = loadToolServerConfigs(path, new Settings());

    expect(config?.command).toBe(join(tempDir, 'bin', 'github-mcp-server'));
    expect(config?.cwd).toBe(join(tempDir, 'work'));
  });

  it('should forward credentials and expand env references', () => {
    const path = writeConfig({
      servers: {
        github: {
          command: 'github-mcp-server',
          credentials: ['GITHUB_PERSONAL_ACCESS_TOKEN'],
          optionalCredentials: ['GITHUB_HOST'],
          env: { GITHUB_TOOLSETS: '${TOOLSETS}', STATIC: 'yes' },
          requestTimeoutMs: 5000,
        },
      },
    });
    const settings = new Settings({ GITHUB_PERSONAL_ACCESS_TOKEN: 'test-secret', TOOLSETS: 'repos,users' });

    const [config] = loadToolServerConfigs(path, settings);

    expect(config?.env).toEqual({
      GITHUB_PERSONAL_ACCESS_TOKEN: 'test-secret',
      GITHUB_TOOLSETS: 'repos,users',
      STATIC: 'yes',
    });
    expect(config?.requestTimeoutMs).toBe(5000);
  });

  it('should fail when a required credential is missing', () => {
    const path = writeConfig({
      servers: { github: { command: 'github-mcp-server', credentials: ['GITHUB_PERSONAL_ACCESS_TOKEN'] } },
    });

    const error = (() => {
      try {
        loadToolServerConfigs(path, new Settings());
        return undefined;
      } catch (err) {
        return err;
      }
    })();

    expect(error).toBeInstanceOf(ConfigurationError);
    expect(error).toHaveProperty('message', 'Tool server "github" requires GITHUB_PERSONAL_ACCESS_TOKEN');
    expect(error).toHaveProperty('missing', ['GITHUB_PERSONAL_ACCESS_TOKEN']);
  });

  it('should fail for a missing file', () => {
    const path = join(tempDir, 'absent.json');

    expect(() => loadToolServerConfigs(path, new Settings())).toThrow(
      `Tool server configuration file not found: ${path}`
    );
  });

  it('should fail for invalid JSON', () => {
    const path = writeConfig('{ "servers": ');

    expect(() => loadToolServerConfigs(path, new Settings())).toThrow(/^Invalid JSON in tool server configuration/);
  });

  it('should fail for entries that do not match the schema', () => {
    const path = writeConfig({ servers: { github: { args: ['stdio'] } } });

    expect(() => loadToolServerConfigs(path, new Settings())).toThrow(ConfigurationError);
    expect(() => loadToolServerConfigs(path, new Settings())).toThrow(/servers\.github\.command/);
  });

  it('should reject unknown entry keys', () => {
    const path = writeConfig({ servers: { github: { command: 'x', comand: 'typo' } } });

    expect(() => loadToolServerConfigs(path, new Settings())).toThrow(ConfigurationError);
  });
});

describe('resolveServerEntry', () => {
  it('should leave bare commands for PATH lookup', () => {
    const config = resolveServerEntry('github', { command: 'docker', args: ['run', '-i'] }, '/etc/toolbridge', new Settings());

    expect(config.command).toBe('docker');
    expect(config.args).toEqual(['run', '-i']);
  });

  it('should expand settings in args', () => {
    const config = resolveServerEntry(
      'github',
      { command: 'github-mcp-server', args: ['--host', '${GITHUB_HOST}'] },
      '/etc/toolbridge',
      new Settings({ GITHUB_HOST: 'github.example.com' })
    );

    expect(config.args).toEqual(['--host', 'github.example.com']);
  });
});

describe('expandSettings', () => {
  it('should substitute empty strings for absent settings', () => {
    expect(expandSettings('a-${MISSING}-b', new Settings())).toBe('a--b');
  });
});
