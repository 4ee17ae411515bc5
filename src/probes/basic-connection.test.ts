import { afterEach, describe, expect, it } from 'vitest';
import { runProbe } from '../runner/dispatcher.js';
import {
  DEFAULT_RESOURCE,
  startHttpServer,
  type MockServer
} from '../test-utils/mock-mcp-server.js';
import { probeRequest } from '../test-utils/requests.js';

describe('basic_connection', () => {
  let server: MockServer | undefined;

  afterEach(async () => {
    await server?.close();
    server = undefined;
  });

  it('initializes and lists tools and resources', async () => {
    server = await startHttpServer({ resources: [DEFAULT_RESOURCE] });
    const result = await runProbe(probeRequest(server.url, 'basic_connection'));

    expect(result.success).toBe(true);
    expect(result.error).toBeUndefined();
    expect(result.results).toEqual({
      connected: true,
      initialized: true,
      tools_found: 1,
      resources_accessible: 1,
      messages_exchanged: 6,
      errors_encountered: 0
    });
    expect(result.issues).toEqual([]);
    expect(result.compatibility.features).toEqual({ http_transport: true });
    expect(server.requests.map((request) => request.method)).toEqual([
      'initialize',
      'tools/list',
      'resources/list'
    ]);
  });

  it('treats a server without resources as informational', async () => {
    server = await startHttpServer();
    const result = await runProbe(probeRequest(server.url, 'basic_connection'));

    expect(result.success).toBe(true);
    expect(result.results.messages_exchanged).toBe(6);
    expect(result.results.resources_accessible).toBe(0);
    expect(result.issues).toEqual([
      {
        severity: 'info',
        category: 'resources',
        description: 'Server does not expose resources'
      }
    ]);
  });

  it('fails on a malformed tools/list reply', async () => {
    server = await startHttpServer({
      resources: [],
      tools: 'nope'
    });
    const result = await runProbe(probeRequest(server.url, 'basic_connection'));

    expect(result.success).toBe(false);
    expect(result.error).toBe('Connection test failed');
    expect(result.issues).toEqual([
      {
        severity: 'error',
        category: 'tools',
        description: 'Invalid tools/list response (HTTP 200)'
      }
    ]);
    expect(result.results.messages_exchanged).toBe(4);
  });
});
