import { afterEach, describe, expect, it } from 'vitest';
import { runProbe } from '../runner/dispatcher.js';
import {
  startHttpServer,
  startWebSocketServer,
  type MockServer
} from '../test-utils/mock-mcp-server.js';
import { probeRequest } from '../test-utils/requests.js';

describe('error_handling', () => {
  let server: MockServer | undefined;

  afterEach(async () => {
    await server?.close();
    server = undefined;
  });

  it('passes a server that answers every case with the right code', async () => {
    server = await startHttpServer();
    const result = await runProbe(probeRequest(server.url, 'error_handling'));

    expect(result.success).toBe(true);
    expect(result.issues).toEqual([]);
    expect(result.results.messages_exchanged).toBe(12);
    expect(server.requests).toHaveLength(6);
  });

  it('accepts HTTP 400 as a rejection of the malformed body', async () => {
    server = await startHttpServer({ malformed: 'http-400' });
    const result = await runProbe(probeRequest(server.url, 'error_handling'));

    expect(result.success).toBe(true);
    expect(result.issues).toEqual([]);
  });

  it('downgrades wrong error codes to warnings and scores the run', async () => {
    server = await startHttpServer({ errorCodes: 'wrong' });
    const result = await runProbe(probeRequest(server.url, 'error_handling'));

    expect(result.success).toBe(false);
    expect(result.error).toBe('Error handling test failed');
    expect(result.results.errors_encountered).toBe(0);
    expect(result.issues.map((issue) => issue.description)).toEqual([
      'Wrong error code for invalid JSON-RPC version: -32000',
      'Wrong error code for missing method: -32000',
      'Wrong error code for unknown method: -32000',
      'Wrong error code for missing required parameter: -32000',
      'Error handling score: 20.0% (1/5 tests passed)'
    ]);
    expect(result.issues.every((issue) => issue.severity === 'warning')).toBe(true);
  });

  it('fails every adversarial input the server accepts', async () => {
    server = await startHttpServer({ errorCodes: 'accept', malformed: 'accept' });
    const result = await runProbe(probeRequest(server.url, 'error_handling'));

    expect(result.success).toBe(false);
    expect(result.results.errors_encountered).toBe(5);
    expect(result.issues).toEqual([
      { severity: 'error', category: 'error_handling', description: 'Server accepted invalid JSON-RPC version' },
      { severity: 'error', category: 'error_handling', description: 'Server accepted request without method' },
      { severity: 'error', category: 'error_handling', description: 'Server accepted unknown method' },
      { severity: 'error', category: 'error_handling', description: 'Server accepted tools/call without a tool name' },
      { severity: 'error', category: 'error_handling', description: 'Server accepted malformed JSON' },
      { severity: 'warning', category: 'error_handling', description: 'Error handling score: 0.0% (0/5 tests passed)' }
    ]);
  });

  it('passes at exactly the default threshold', async () => {
    server = await startHttpServer({ malformed: 'wrong-code' });
    const result = await runProbe(probeRequest(server.url, 'error_handling'));

    expect(result.success).toBe(true);
    expect(result.issues).toEqual([
      {
        severity: 'warning',
        category: 'error_handling',
        description: 'Wrong error code for parse error: -32600'
      }
    ]);
  });

  it('honors a stricter pass threshold', async () => {
    server = await startHttpServer({ malformed: 'wrong-code' });
    const result = await runProbe(
      probeRequest(server.url, 'error_handling', { pass_threshold: 0.9 })
    );

    expect(result.success).toBe(false);
    expect(result.issues.map((issue) => issue.description)).toEqual([
      'Wrong error code for parse error: -32600',
      'Error handling score: 80.0% (4/5 tests passed)'
    ]);
  });

  it('runs the same cases over a WebSocket', async () => {
    server = await startWebSocketServer();
    const result = await runProbe(probeRequest(server.url, 'error_handling'));

    expect(result.success).toBe(true);
    expect(result.issues).toEqual([]);
    expect(result.results.messages_exchanged).toBe(12);
    expect(result.compatibility.features).toEqual({ websocket_transport: true });
  });

  it('does not credit a malformed body that was never sent', async () => {
    server = await startWebSocketServer({ silentMethods: ['tools/call'] });
    const result = await runProbe(
      probeRequest(server.url, 'error_handling', {}, 0.5)
    );

    expect(result.success).toBe(false);
    expect(result.issues.map((issue) => issue.description)).toEqual([
      'No response for missing required parameter: Request timed out after 500ms',
      'Malformed message not sent: WebSocket is not open',
      'Error handling score: 60.0% (3/5 tests passed)'
    ]);
    expect(server.requests.map((request) => request.method)).toEqual([
      'initialize',
      'tools/list',
      undefined,
      'unknown/method',
      'tools/call'
    ]);
  });
});
