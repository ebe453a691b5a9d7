/**
 * Tool Listing Tests
 */

import { describe, it, expect } from 'vitest';
import { ConfigurationError } from '../../src/errors/index.js';
import {
  describeParameters,
  formatToolListing,
  listServerTools,
  selectServers,
  toolListingToJson,
  type ServerToolListing,
} from '../../src/mcp/tool-listing.js';
import { MemorySink, StructuredLogger } from '../../src/utilities/logger.js';
import { fakeServer } from '../helpers/fake-tool-server.js';

const LISTINGS: ServerToolListing[] = [
  {
    server: 'github',
    tools: [
      {
        name: 'get_me',
        description: 'Get the authenticated user',
        inputSchema: { type: 'object', properties: {} },
      },
      {
        name: 'list_branches',
        description: '',
        inputSchema: {
          type: 'object',
          properties: { owner: { type: 'string' }, page: { type: 'number' } },
          required: ['owner'],
        },
      },
    ],
  },
  { server: 'empty', tools: [] },
];

// =============================================================================
// SERVERS
// =============================================================================

describe('listServerTools', () => {
  const logger = () => new StructuredLogger({ level: 'debug', sinks: [new MemorySink()] });

  it('should read the tools of every configured server', async () => {
    const listings = await listServerTools([fakeServer()], { logger: logger(), shutdownGraceMs: 500 });

    expect(listings).toHaveLength(1);
    expect(listings[0]?.server).toBe('fake');
    expect(listings[0]?.tools).toHaveLength(12);
    expect(listings[0]?.tools[0]?.name).toBe('get_me');
  });

  it('should list only the named server', async () => {
    const configs = [fakeServer('normal', {}, 'a'), fakeServer('normal', {}, 'b')];

    const listings = await listServerTools(configs, { server: 'b', logger: logger(), shutdownGraceMs: 500 });

    expect(listings.map((listing) => listing.server)).toEqual(['b']);
  });

  it('should reject a server that is not configured', async () => {
    await expect(listServerTools([fakeServer()], { server: 'nope' })).rejects.toThrow(
      "Tool server 'nope' is not configured or is disabled. Available: fake"
    );
  });
});

describe('selectServers', () => {
  it('should keep every server without a name', () => {
    const configs = [fakeServer('normal', {}, 'a'), fakeServer('normal', {}, 'b')];

    expect(selectServers(configs).map((config) => config.name)).toEqual(['a', 'b']);
  });

  it('should throw ConfigurationError when nothing is configured', () => {
    expect(() => selectServers([], 'github')).toThrow(ConfigurationError);
    expect(() => selectServers([], 'github')).toThrow(
      "Tool server 'github' is not configured or is disabled. Available: (none)"
    );
  });
});

// =============================================================================
// FORMATTING
// =============================================================================

describe('describeParameters', () => {
  it('should mark required parameters', () => {
    expect(describeParameters(LISTINGS[0]?.tools[1]?.inputSchema ?? {})).toEqual(['owner*: string', 'page: number']);
  });

  it('should fall back to unknown for untyped properties', () => {
    expect(describeParameters({ properties: { query: {} } })).toEqual(['query: unknown']);
    expect(describeParameters({ type: 'object' })).toEqual([]);
  });
});

describe('formatToolListing', () => {
  it('should align tool names per server', () => {
    expect(formatToolListing(LISTINGS)).toBe(
      [
        'Found 2 tool(s) on 2 server(s)',
        '',
        'github (2)',
        '  get_me         Get the authenticated user',
        '  list_branches  No description available',
        '',
        'empty (0)',
        '  (no tools)',
      ].join('\n')
    );
  });

  it('should include parameters when detailed', () => {
    expect(formatToolListing(LISTINGS.slice(0, 1), true)).toBe(
      [
        'Found 2 tool(s) on 1 server(s)',
        '',
        'github (2)',
        '  get_me',
        '    Get the authenticated user',
        '    Parameters: none',
        '  list_branches',
        '    No description available',
        '    Parameters: owner*: string, page: number',
      ].join('\n')
    );
  });
});

describe('toolListingToJson', () => {
  it('should count tools per server and overall', () => {
    expect(toolListingToJson(LISTINGS)).toEqual({
      total_tools: 2,
      servers: [
        {
          server: 'github',
          total_tools: 2,
          tools: [
            { name: 'get_me', description: 'Get the authenticated user' },
            { name: 'list_branches', description: 'No description available' },
          ],
        },
        { server: 'empty', total_tools: 0, tools: [] },
      ],
    });
  });

  it('should carry input schemas when detailed', () => {
    const json = toolListingToJson(LISTINGS, true);

    expect(json.servers[0]?.tools[0]?.schema).toEqual({ type: 'object', properties: {} });
  });
});
