import { spawn, type ChildProcess } from 'child_process';
import {
  ChannelNotOpenError,
  ConnectionClosedError,
  ProbeError,
  errorMessage
} from '../errors.js';
import { OWN_PROCESS_GROUP, OutputBuffer, terminate } from '../process.js';
import type { JsonRpcChannel } from './channel.js';
import type { ChannelReply } from './jsonrpc.js';
import { ReplyQueue } from './reply-queue.js';

const SHUTDOWN_TIMEOUT_MS = 2000;

/** `stdio://node server.js --flag` → `['node', 'server.js', '--flag']` */
export function parseStdioAddress(serverUrl: string): string[] {
  return serverUrl
    .slice('stdio://'.length)
    .trim()
    .split(/\s+/)
    .filter((part) => part.length > 0);
}

/** Line-delimited JSON-RPC over a child process's stdin and stdout. */
export class StdioChannel implements JsonRpcChannel {
  readonly kind = 'stdio';
  private readonly replies = new ReplyQueue();
  private readonly stderr = new OutputBuffer();
  private pending = '';

  private constructor(
    private readonly child: ChildProcess,
    private readonly timeoutMs: number
  ) {
    child.stdout?.on('data', (chunk: Buffer) => this.onData(chunk.toString()));
    child.stderr?.on('data', (chunk: Buffer) => this.stderr.append(chunk));
    // stdout has been read to the end by 'close'
    child.on('close', (code, signal) => {
      this.replies.fail(
        new ConnectionClosedError(
          `Server process exited (code ${code ?? 'none'}, signal ${signal ?? 'none'})`
        )
      );
    });
    child.on('error', (error) => {
      this.replies.fail(new ConnectionClosedError(errorMessage(error)));
    });
    child.stdin?.on('error', (error) => {
      this.replies.fail(new ConnectionClosedError(errorMessage(error)));
    });
  }

  static async open(serverUrl: string, timeoutMs: number): Promise<StdioChannel> {
    const [command, ...args] = parseStdioAddress(serverUrl);
    if (!command) {
      throw new ProbeError('connection', `No command in stdio address: ${serverUrl}`);
    }

    const child = spawn(command, args, {
      stdio: ['pipe', 'pipe', 'pipe'],
      detached: OWN_PROCESS_GROUP
    });
    await new Promise<void>((resolve, reject) => {
      child.once('spawn', () => resolve());
      child.once('error', (error) =>
        reject(
          new ProbeError(
            'connection',
            `Failed to spawn ${command}: ${errorMessage(error)}`
          )
        )
      );
    });
    return new StdioChannel(child, timeoutMs);
  }

  get errorOutput(): string {
    return this.stderr.toString();
  }

  request(message: object): Promise<ChannelReply> {
    return this.send(JSON.stringify(message));
  }

  requestRaw(payload: string): Promise<ChannelReply> {
    return this.send(payload);
  }

  async close(): Promise<void> {
    this.child.stdin?.end();
    await terminate(this.child, SHUTDOWN_TIMEOUT_MS);
  }

  private async send(payload: string): Promise<ChannelReply> {
    const stdin = this.child.stdin;
    if (this.replies.closed || !stdin || stdin.destroyed) {
      throw new ChannelNotOpenError('Server process is not running');
    }
    await new Promise<void>((resolve, reject) => {
      stdin.write(`${payload}\n`, (error) => (error ? reject(error) : resolve()));
    });
    return this.replies.next(this.timeoutMs, () => {
      terminate(this.child, SHUTDOWN_TIMEOUT_MS).catch(() => undefined);
    });
  }

  private onData(text: string): void {
    this.pending += text;
    let newline = this.pending.indexOf('\n');
    while (newline !== -1) {
      const line = this.pending.slice(0, newline).replace(/\r$/, '');
      this.pending = this.pending.slice(newline + 1);
      if (line.trim()) {
        this.replies.push(line);
      }
      newline = this.pending.indexOf('\n');
    }
  }
}
