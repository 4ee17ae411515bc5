import { describe, expect, it, vi } from 'vitest';
import { ConnectionClosedError, RequestTimeoutError } from '../errors.js';
import { ReplyQueue } from './reply-queue.js';

describe('ReplyQueue', () => {
  it('hands a buffered reply to the next waiter', async () => {
    const queue = new ReplyQueue();
    queue.push('{"jsonrpc":"2.0","id":1,"result":{}}');

    await expect(queue.next(1000, () => undefined)).resolves.toEqual({
      status: 200,
      body: { jsonrpc: '2.0', id: 1, result: {} },
      raw: '{"jsonrpc":"2.0","id":1,"result":{}}'
    });
  });

  it('skips server-initiated messages and non-JSON output', async () => {
    const queue = new ReplyQueue();
    const reply = queue.next(1000, () => undefined);
    queue.push('starting up...');
    queue.push('{"jsonrpc":"2.0","method":"notifications/message","params":{}}');
    queue.push('{"jsonrpc":"2.0","method":"sampling/createMessage","id":9}');
    queue.push('{"jsonrpc":"2.0","id":2,"error":{"code":-32601,"message":"nope"}}');

    await expect(reply).resolves.toMatchObject({
      body: { id: 2, error: { code: -32601 } }
    });
  });

  it('rejects the waiter when the channel closes', async () => {
    const queue = new ReplyQueue();
    const reply = queue.next(1000, () => undefined);
    queue.fail(new ConnectionClosedError('gone'));

    await expect(reply).rejects.toThrow('gone');
    expect(queue.closed).toBe(true);
    await expect(queue.next(1000, () => undefined)).rejects.toThrow('gone');
  });

  it('keeps the first close reason', async () => {
    const queue = new ReplyQueue();
    queue.fail(new ConnectionClosedError('first'));
    queue.fail(new ConnectionClosedError('second'));

    await expect(queue.next(1000, () => undefined)).rejects.toThrow('first');
  });

  it('times out and runs the cleanup hook', async () => {
    const queue = new ReplyQueue();
    const onTimeout = vi.fn();

    await expect(queue.next(20, onTimeout)).rejects.toBeInstanceOf(
      RequestTimeoutError
    );
    expect(onTimeout).toHaveBeenCalledTimes(1);
  });
});
