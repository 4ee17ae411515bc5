import type { ChannelReply } from './jsonrpc.js';

export type TransportKind = 'http' | 'websocket' | 'stdio' | 'unknown';

export type ChannelKind = Exclude<TransportKind, 'unknown'>;

/** One JSON-RPC conversation with a server, over whichever transport its address names. */
export interface JsonRpcChannel {
  readonly kind: ChannelKind;
  request(message: object): Promise<ChannelReply>;
  /** Sends `payload` verbatim, for bodies that are deliberately not valid JSON. */
  requestRaw(payload: string): Promise<ChannelReply>;
  close(): Promise<void>;
}

export function classifyTransport(serverUrl: string): TransportKind {
  if (serverUrl.startsWith('http://') || serverUrl.startsWith('https://')) {
    return 'http';
  }
  if (serverUrl.startsWith('ws://') || serverUrl.startsWith('wss://')) {
    return 'websocket';
  }
  if (serverUrl.startsWith('stdio://')) {
    return 'stdio';
  }
  return 'unknown';
}
