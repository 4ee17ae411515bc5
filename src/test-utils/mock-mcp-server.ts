import http from 'http';
import express, { Request, Response } from 'express';
import { WebSocketServer } from 'ws';

export interface MockServerBehavior {
  initialize?: 'ok' | 'error' | 'http-500' | 'no-result';
  /** Delay before answering initialize. */
  initializeDelayMs?: number;
  protocolVersion?: string;
  /** Leave serverInfo out of the initialize result. */
  omitServerInfo?: boolean;
  /** Value of the tools/list result's `tools` field. */
  tools?: unknown;
  toolCall?: 'ok' | 'error' | 'is-error' | 'no-result';
  /** Leave undefined to answer resources/list with "method not found". */
  resources?: unknown[];
  resourceContents?: unknown;
  subscribe?: 'ok' | 'not-found' | 'error';
  /** How adversarial requests are answered. */
  errorCodes?: 'correct' | 'wrong' | 'accept';
  malformed?: 'parse-error' | 'wrong-code' | 'http-400' | 'accept';
  /** Serve a streaming endpoint at GET /sse. */
  sse?: boolean;
  /** Answer POSTs with text/event-stream instead of JSON. */
  eventStream?: boolean;
  sessionId?: string;
  /** WebSocket only: methods that never get a reply. */
  silentMethods?: string[];
}

export interface RecordedRequest {
  method?: string;
  params?: unknown;
  sessionId?: string;
}

type JsonRpcMessage = Record<string, unknown>;

const GREETING_URI = 'file:///greeting.txt';

export const DEFAULT_TOOL = {
  name: 'echo',
  description: 'Echo a message',
  inputSchema: {
    type: 'object',
    properties: {
      message: { type: 'string' }
    }
  }
};

export const DEFAULT_RESOURCE = { uri: GREETING_URI, name: 'greeting' };

function isMessage(value: unknown): value is JsonRpcMessage {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function result(id: unknown, value: unknown): JsonRpcMessage {
  return { jsonrpc: '2.0', id: id ?? null, result: value };
}

function failure(id: unknown, code: number, message: string): JsonRpcMessage {
  return { jsonrpc: '2.0', id: id ?? null, error: { code, message } };
}

/**
 * JSON-RPC behavior shared by the HTTP and WebSocket mocks. Returns the
 * response to send, or undefined for a notification.
 */
export function answer(
  message: unknown,
  behavior: MockServerBehavior
): JsonRpcMessage | undefined {
  if (!isMessage(message)) {
    return failure(null, -32600, 'Invalid Request');
  }
  const { id, method } = message;
  const params = isMessage(message.params) ? message.params : {};
  const adversarial = behavior.errorCodes ?? 'correct';

  const reject = (code: number, text: string) => {
    if (adversarial === 'accept') return result(id, {});
    return failure(id, adversarial === 'wrong' ? -32000 : code, text);
  };

  if (message.jsonrpc !== '2.0') {
    return reject(-32600, 'Invalid Request');
  }
  if (typeof method !== 'string') {
    return reject(-32600, 'Invalid Request');
  }
  if (id === undefined) {
    return undefined;
  }

  switch (method) {
    case 'initialize':
      if (behavior.initialize === 'error') {
        return failure(id, -32603, 'not ready');
      }
      if (behavior.initialize === 'no-result') {
        return { jsonrpc: '2.0', id };
      }
      return result(id, {
        protocolVersion: behavior.protocolVersion ?? '2024-11-05',
        capabilities: { tools: {}, resources: {} },
        ...(!behavior.omitServerInfo && {
          serverInfo: { name: 'mock-server', version: '1.0.0' }
        })
      });
    case 'tools/list':
      return result(id, { tools: behavior.tools ?? [DEFAULT_TOOL] });
    case 'tools/call': {
      if (typeof params.name !== 'string') {
        return reject(-32602, 'Missing tool name');
      }
      switch (behavior.toolCall ?? 'ok') {
        case 'error':
          return failure(id, -32603, 'boom');
        case 'no-result':
          return { jsonrpc: '2.0', id };
        case 'is-error':
          return result(id, {
            content: [{ type: 'text', text: 'failed' }],
            isError: true
          });
        default:
          return result(id, { content: [{ type: 'text', text: 'ok' }] });
      }
    }
    case 'resources/list':
      if (!behavior.resources) {
        return failure(id, -32601, 'Method not found');
      }
      return result(id, { resources: behavior.resources });
    case 'resources/read':
      return result(id, {
        contents: behavior.resourceContents ?? [
          { uri: params.uri, mimeType: 'text/plain', text: 'hello' }
        ]
      });
    case 'resources/subscribe':
      switch (behavior.subscribe ?? 'not-found') {
        case 'ok':
          return result(id, {});
        case 'error':
          return failure(id, -32603, 'subscriptions are broken');
        default:
          return failure(id, -32601, 'Method not found');
      }
  }
  return reject(-32601, 'Method not found');
}

function parseErrorReply(behavior: MockServerBehavior): JsonRpcMessage {
  return failure(
    null,
    behavior.malformed === 'wrong-code' ? -32600 : -32700,
    'Parse error'
  );
}

export interface MockServer {
  url: string;
  requests: RecordedRequest[];
  close(): Promise<void>;
}

function listen(server: http.Server): Promise<number> {
  return new Promise((resolve, reject) => {
    server.on('error', reject);
    server.listen(0, '127.0.0.1', () => {
      const address = server.address();
      if (address && typeof address === 'object') {
        resolve(address.port);
      } else {
        reject(new Error('Failed to get server address'));
      }
    });
  });
}

function shutdown(server: http.Server): Promise<void> {
  return new Promise((resolve, reject) => {
    server.closeAllConnections();
    server.close((err) => (err ? reject(err) : resolve()));
  });
}

/** JSON-RPC over HTTP POST at `/`, with an optional streaming endpoint at `/sse`. */
export async function startHttpServer(
  behavior: MockServerBehavior = {}
): Promise<MockServer> {
  const requests: RecordedRequest[] = [];
  const app = express();
  app.use(express.text({ type: '*/*' }));

  const send = (res: Response, message: JsonRpcMessage) => {
    if (behavior.eventStream) {
      res.status(200).type('text/event-stream');
      res.write(
        `event: message\ndata: ${JSON.stringify({
          jsonrpc: '2.0',
          method: 'notifications/message',
          params: { level: 'info', data: 'working' }
        })}\n\n`
      );
      res.end(`event: message\ndata: ${JSON.stringify(message)}\n\n`);
    } else {
      res.status(200).json(message);
    }
  };

  app.post('/', (req: Request, res: Response) => {
    const raw: unknown = req.body;
    const headerSession = req.get('mcp-session-id');
    let message: unknown;
    try {
      message = JSON.parse(typeof raw === 'string' ? raw : '');
    } catch {
      requests.push({ sessionId: headerSession });
      if (behavior.malformed === 'http-400') {
        res.status(400).type('text/plain').send('Bad Request');
      } else if (behavior.malformed === 'accept') {
        send(res, result(null, {}));
      } else {
        send(res, parseErrorReply(behavior));
      }
      return;
    }

    const method =
      isMessage(message) && typeof message.method === 'string'
        ? message.method
        : undefined;
    requests.push({
      method,
      params: isMessage(message) ? message.params : undefined,
      sessionId: headerSession
    });

    if (method === 'initialize') {
      if (behavior.initialize === 'http-500') {
        res.status(500).type('text/plain').send('Internal Server Error');
        return;
      }
      if (behavior.sessionId) {
        res.set('mcp-session-id', behavior.sessionId);
      }
    }

    const reply = answer(message, behavior);
    const respond = () => {
      if (reply) {
        send(res, reply);
      } else {
        res.status(202).end();
      }
    };
    if (method === 'initialize' && behavior.initializeDelayMs) {
      setTimeout(respond, behavior.initializeDelayMs);
    } else {
      respond();
    }
  });

  if (behavior.sse) {
    app.get('/sse', (req: Request, res: Response) => {
      res.status(200).type('text/event-stream');
      res.write(': connected\n\n');
      req.on('close', () => res.end());
    });
  }

  const server = http.createServer(app);
  const port = await listen(server);
  return {
    url: `http://127.0.0.1:${port}`,
    requests,
    close: () => shutdown(server)
  };
}

/**
 * JSON-RPC over WebSocket. A log notification precedes each initialize
 * reply.
 */
export async function startWebSocketServer(
  behavior: MockServerBehavior = {}
): Promise<MockServer> {
  const requests: RecordedRequest[] = [];
  const server = http.createServer();
  const wss = new WebSocketServer({ server });

  wss.on('connection', (socket) => {
    socket.on('message', (data) => {
      let message: unknown;
      try {
        message = JSON.parse(data.toString());
      } catch {
        requests.push({});
        socket.send(JSON.stringify(parseErrorReply(behavior)));
        return;
      }
      const method =
        isMessage(message) && typeof message.method === 'string'
          ? message.method
          : undefined;
      requests.push({ method });

      if (method === 'initialize') {
        socket.send(
          JSON.stringify({
            jsonrpc: '2.0',
            method: 'notifications/message',
            params: { level: 'info', data: 'hello' }
          })
        );
      }
      if (method && behavior.silentMethods?.includes(method)) {
        return;
      }
      const reply = answer(message, behavior);
      if (reply) {
        socket.send(JSON.stringify(reply));
      }
    });
  });

  const port = await listen(server);
  return {
    url: `ws://127.0.0.1:${port}`,
    requests,
    close: async () => {
      for (const client of wss.clients) {
        client.terminate();
      }
      await new Promise<void>((resolve, reject) =>
        wss.close((err) => (err ? reject(err) : resolve()))
      );
      await shutdown(server);
    }
  };
}
