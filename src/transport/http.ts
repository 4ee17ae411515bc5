import { EventSourceParserStream } from 'eventsource-parser/stream';
import { RequestTimeoutError, errorMessage } from '../errors.js';
import type { JsonRpcChannel } from './channel.js';
import { isResponse, parseJson, type ChannelReply } from './jsonrpc.js';

const SESSION_HEADER = 'mcp-session-id';

function isTimeout(error: unknown): boolean {
  return (
    typeof error === 'object' &&
    error !== null &&
    'name' in error &&
    error.name === 'TimeoutError'
  );
}

/**
 * JSON-RPC over HTTP POST to a single endpoint. Streamable HTTP servers may
 * answer with `text/event-stream`; the first JSON-RPC response event is the
 * reply.
 */
export class HttpChannel implements JsonRpcChannel {
  readonly kind = 'http';
  private sessionId: string | undefined;

  constructor(
    private readonly serverUrl: string,
    private readonly timeoutMs: number
  ) {}

  request(message: object): Promise<ChannelReply> {
    return this.post(JSON.stringify(message));
  }

  requestRaw(payload: string): Promise<ChannelReply> {
    return this.post(payload);
  }

  async close(): Promise<void> {
    this.sessionId = undefined;
  }

  private async post(body: string): Promise<ChannelReply> {
    try {
      const response = await fetch(this.serverUrl, {
        method: 'POST',
        headers: {
          'Content-Type': 'application/json',
          Accept: 'application/json, text/event-stream',
          ...(this.sessionId && { [SESSION_HEADER]: this.sessionId })
        },
        body,
        signal: AbortSignal.timeout(this.timeoutMs)
      });

      const sessionId = response.headers.get(SESSION_HEADER);
      if (sessionId) {
        this.sessionId = sessionId;
      }

      const contentType = response.headers.get('content-type');
      if (contentType?.includes('text/event-stream')) {
        return await readEventStreamReply(response);
      }

      const raw = await response.text();
      return { status: response.status, body: parseJson(raw), raw };
    } catch (error) {
      if (isTimeout(error)) {
        throw new RequestTimeoutError(this.timeoutMs);
      }
      throw error;
    }
  }
}

async function readEventStreamReply(response: Response): Promise<ChannelReply> {
  if (!response.body) {
    return { status: response.status, body: undefined, raw: '' };
  }

  const reader = response.body
    .pipeThrough(new TextDecoderStream())
    .pipeThrough(new EventSourceParserStream())
    .getReader();

  try {
    while (true) {
      const { value: event, done } = await reader.read();
      if (done) {
        break;
      }
      const parsed = parseJson(event.data);
      if (isResponse(parsed)) {
        return { status: response.status, body: parsed, raw: event.data };
      }
    }
  } finally {
    await reader.cancel().catch(() => undefined);
  }

  return { status: response.status, body: undefined, raw: '' };
}

/**
 * Opens a GET against a streaming endpoint and reports whether it answered
 * 200. The stream is abandoned as soon as the headers arrive.
 */
export async function probeStreamingEndpoint(
  url: string,
  timeoutMs: number
): Promise<{ available: boolean; status?: number; reason?: string }> {
  const controller = new AbortController();
  const timer = setTimeout(() => controller.abort(), timeoutMs);
  try {
    const response = await fetch(url, {
      method: 'GET',
      headers: { Accept: 'text/event-stream' },
      signal: controller.signal
    });
    await response.body?.cancel().catch(() => undefined);
    return { available: response.status === 200, status: response.status };
  } catch (error) {
    return { available: false, reason: errorMessage(error) };
  } finally {
    clearTimeout(timer);
    controller.abort();
  }
}
