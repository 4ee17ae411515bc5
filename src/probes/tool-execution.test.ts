import { afterEach, describe, expect, it } from 'vitest';
import { runProbe } from '../runner/dispatcher.js';
import {
  startHttpServer,
  type MockServer
} from '../test-utils/mock-mcp-server.js';
import { probeRequest } from '../test-utils/requests.js';
import { synthesizeArguments } from './tool-execution.js';

describe('synthesizeArguments', () => {
  it('uses defaults first, then a placeholder per primitive type', () => {
    const args = synthesizeArguments({
      name: 'search',
      inputSchema: {
        type: 'object',
        properties: {
          query: { type: 'string' },
          limit: { type: 'integer' },
          ratio: { type: 'number' },
          exact: { type: 'boolean' },
          lang: { type: 'string', default: 'en' },
          filters: { type: 'object' },
          tags: { type: 'array' },
          nickname: { type: ['null', 'string'] }
        }
      }
    });

    expect(args).toEqual({
      query: 'test',
      limit: 0,
      ratio: 0,
      exact: false,
      lang: 'en',
      nickname: 'test'
    });
  });

  it('returns no arguments for a tool without an input schema', () => {
    expect(synthesizeArguments({ name: 'ping' })).toEqual({});
  });

  it('keeps falsy defaults', () => {
    expect(
      synthesizeArguments({
        name: 'toggle',
        inputSchema: { properties: { enabled: { type: 'boolean', default: true }, count: { type: 'number', default: 0 } } }
      })
    ).toEqual({ enabled: true, count: 0 });
  });
});

describe('tool_execution', () => {
  let server: MockServer | undefined;

  afterEach(async () => {
    await server?.close();
    server = undefined;
  });

  it('calls the first tool with synthesized arguments', async () => {
    server = await startHttpServer({
      tools: [
        {
          name: 'greet',
          inputSchema: {
            type: 'object',
            properties: {
              name: { type: 'string' },
              times: { type: 'integer' },
              shout: { type: 'boolean', default: true },
              extra: { type: 'object' }
            }
          }
        },
        { name: 'other' }
      ]
    });
    const result = await runProbe(probeRequest(server.url, 'tool_execution'));

    expect(result.success).toBe(true);
    expect(result.results.tools_found).toBe(2);
    expect(result.results.messages_exchanged).toBe(6);
    expect(result.issues).toEqual([]);
    expect(server.requests[2]).toEqual({
      method: 'tools/call',
      params: { name: 'greet', arguments: { name: 'test', times: 0, shout: true } },
      sessionId: undefined
    });
  });

  it('warns, and does not pass, when the server has no tools', async () => {
    server = await startHttpServer({ tools: [] });
    const result = await runProbe(probeRequest(server.url, 'tool_execution'));

    expect(result.success).toBe(false);
    expect(result.error).toBe('Tool execution test failed');
    expect(result.results.errors_encountered).toBe(0);
    expect(result.results.messages_exchanged).toBe(4);
    expect(result.issues).toEqual([
      { severity: 'warning', category: 'tools', description: 'No tools found on server' }
    ]);
  });

  it('counts a tool error reply against the run', async () => {
    server = await startHttpServer({ toolCall: 'error' });
    const result = await runProbe(probeRequest(server.url, 'tool_execution'));

    expect(result.success).toBe(false);
    expect(result.results.errors_encountered).toBe(1);
    expect(result.issues).toEqual([
      {
        severity: 'warning',
        category: 'tool_execution',
        description: 'Tool execution error: boom'
      }
    ]);
  });

  it('fails a reply with neither result nor error', async () => {
    server = await startHttpServer({ toolCall: 'no-result' });
    const result = await runProbe(probeRequest(server.url, 'tool_execution'));

    expect(result.success).toBe(false);
    expect(result.issues).toEqual([
      {
        severity: 'error',
        category: 'tool_execution',
        description: 'Invalid tool execution response format'
      }
    ]);
  });

  it('notes a tool result flagged as an error without failing', async () => {
    server = await startHttpServer({ toolCall: 'is-error' });
    const result = await runProbe(probeRequest(server.url, 'tool_execution'));

    expect(result.success).toBe(true);
    expect(result.issues).toEqual([
      {
        severity: 'warning',
        category: 'tool_execution',
        description: 'Tool echo reported an error result'
      }
    ]);
  });
});
