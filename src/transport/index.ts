import { ProbeError } from '../errors.js';
import { classifyTransport, type JsonRpcChannel } from './channel.js';
import { HttpChannel } from './http.js';
import { StdioChannel } from './stdio.js';
import { WebSocketChannel } from './websocket.js';

export * from './channel.js';
export * from './jsonrpc.js';
export { HttpChannel, probeStreamingEndpoint } from './http.js';
export { StdioChannel, parseStdioAddress } from './stdio.js';
export { WebSocketChannel } from './websocket.js';

/** Opens a channel chosen by the address scheme. */
export async function openChannel(
  serverUrl: string,
  timeoutMs: number
): Promise<JsonRpcChannel> {
  switch (classifyTransport(serverUrl)) {
    case 'http':
      return new HttpChannel(serverUrl, timeoutMs);
    case 'websocket':
      return WebSocketChannel.open(serverUrl, timeoutMs);
    case 'stdio':
      return StdioChannel.open(serverUrl, timeoutMs);
    case 'unknown':
      throw new ProbeError('transport', `Unknown transport type for ${serverUrl}`);
  }
}
