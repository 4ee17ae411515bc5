import { ConnectionClosedError } from '../errors.js';
import { withTimeout } from '../process.js';
import { isResponse, parseJson, type ChannelReply } from './jsonrpc.js';

interface Waiter {
  resolve: (reply: ChannelReply) => void;
  reject: (error: Error) => void;
}

/**
 * Pairs inbound messages on a duplex channel with the request awaiting them.
 * Exchanges are strictly sequential, so the next response is the reply.
 */
export class ReplyQueue {
  private readonly buffered: ChannelReply[] = [];
  private waiter: Waiter | null = null;
  private closedWith: Error | null = null;

  push(raw: string): void {
    const body = parseJson(raw);
    if (!isResponse(body)) {
      // Non-JSON output, or a request/notification the server initiated
      return;
    }
    const reply: ChannelReply = { status: 200, body, raw };
    if (this.waiter) {
      const { resolve } = this.waiter;
      this.waiter = null;
      resolve(reply);
    } else {
      this.buffered.push(reply);
    }
  }

  fail(error: Error = new ConnectionClosedError()): void {
    if (this.closedWith) {
      return;
    }
    this.closedWith = error;
    if (this.waiter) {
      const { reject } = this.waiter;
      this.waiter = null;
      reject(error);
    }
  }

  get closed(): boolean {
    return this.closedWith !== null;
  }

  next(timeoutMs: number, onTimeout: () => void): Promise<ChannelReply> {
    const ready = this.buffered.shift();
    if (ready) {
      return Promise.resolve(ready);
    }
    if (this.closedWith) {
      return Promise.reject(this.closedWith);
    }
    const pending = new Promise<ChannelReply>((resolve, reject) => {
      this.waiter = { resolve, reject };
    });
    return withTimeout(pending, timeoutMs, () => {
      this.waiter = null;
      onTimeout();
    });
  }
}
