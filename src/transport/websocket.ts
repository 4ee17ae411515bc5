import WebSocket from 'ws';
import {
  ChannelNotOpenError,
  ConnectionClosedError,
  errorMessage
} from '../errors.js';
import { withTimeout } from '../process.js';
import type { JsonRpcChannel } from './channel.js';
import type { ChannelReply } from './jsonrpc.js';
import { ReplyQueue } from './reply-queue.js';

/** JSON-RPC over one persistent WebSocket connection. */
export class WebSocketChannel implements JsonRpcChannel {
  readonly kind = 'websocket';
  private readonly replies = new ReplyQueue();

  private constructor(
    private readonly socket: WebSocket,
    private readonly timeoutMs: number
  ) {
    socket.on('message', (data) => {
      this.replies.push(data.toString());
    });
    socket.on('close', () => {
      this.replies.fail(new ConnectionClosedError('WebSocket closed'));
    });
    socket.on('error', (error) => {
      this.replies.fail(new ConnectionClosedError(errorMessage(error)));
    });
  }

  static async open(
    serverUrl: string,
    timeoutMs: number
  ): Promise<WebSocketChannel> {
    const socket = new WebSocket(serverUrl);
    const opened = new Promise<void>((resolve, reject) => {
      socket.once('open', () => resolve());
      socket.once('error', reject);
    });
    await withTimeout(opened, timeoutMs, () => socket.terminate(), 'Connect');
    return new WebSocketChannel(socket, timeoutMs);
  }

  request(message: object): Promise<ChannelReply> {
    return this.send(JSON.stringify(message));
  }

  requestRaw(payload: string): Promise<ChannelReply> {
    return this.send(payload);
  }

  async close(): Promise<void> {
    if (this.socket.readyState === WebSocket.CLOSED) {
      return;
    }
    const closed = new Promise<boolean>((resolve) => {
      const timer = setTimeout(() => resolve(false), this.timeoutMs);
      this.socket.once('close', () => {
        clearTimeout(timer);
        resolve(true);
      });
    });
    this.socket.close();
    if (!(await closed)) {
      this.socket.terminate();
    }
  }

  private async send(payload: string): Promise<ChannelReply> {
    if (this.replies.closed || this.socket.readyState !== WebSocket.OPEN) {
      throw new ChannelNotOpenError('WebSocket is not open');
    }
    await new Promise<void>((resolve, reject) => {
      this.socket.send(payload, (error) => (error ? reject(error) : resolve()));
    });
    return this.replies.next(this.timeoutMs, () => this.socket.terminate());
  }
}
