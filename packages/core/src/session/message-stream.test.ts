import { describe, expect, it } from 'vitest';
import { EdgeError } from '../errors/edge-error.js';
import { MessageStream } from './message-stream.js';

const bytes = (...values: number[]) => new Uint8Array(values);

async function collect(stream: AsyncIterable<Uint8Array>): Promise<Uint8Array[]> {
  const out: Uint8Array[] = [];
  for await (const message of stream) out.push(message);
  return out;
}

describe('MessageStream', () => {
  it('should yield queued messages then end', async () => {
    const stream = new MessageStream();
    stream.push(bytes(1));
    stream.push(bytes(2));
    stream.end();

    expect(await collect(stream)).toEqual([bytes(1), bytes(2)]);
  });

  it('should resume a waiting consumer', async () => {
    const stream = new MessageStream();
    const next = stream.next();
    stream.push(bytes(9));
    expect(await next).toEqual({ value: bytes(9), done: false });
  });

  it('should end waiting consumers', async () => {
    const stream = new MessageStream();
    const next = stream.next();
    stream.end();
    expect(await next).toEqual({ value: undefined, done: true });
    expect(stream.isFinished).toBe(true);
  });

  it('should ignore messages after the end', async () => {
    const stream = new MessageStream();
    stream.end();
    stream.push(bytes(1));
    expect(stream.pending).toBe(0);
    expect(await collect(stream)).toEqual([]);
  });

  it('should throw a failure once, after queued messages', async () => {
    const stream = new MessageStream();
    const failure = new EdgeError('SESSION_FAILED', 'Session failed: retry-exhausted');
    stream.push(bytes(1));
    stream.fail(failure);

    expect(await stream.next()).toEqual({ value: bytes(1), done: false });
    await expect(stream.next()).rejects.toBe(failure);
    expect(await stream.next()).toEqual({ value: undefined, done: true });
  });

  it('should reject only the first of several waiting consumers', async () => {
    const stream = new MessageStream();
    const first = stream.next();
    const second = stream.next();
    stream.fail(new EdgeError('SESSION_FAILED', 'Session failed: setup-timeout'));

    await expect(first).rejects.toMatchObject({ code: 'SESSION_FAILED' });
    expect(await second).toEqual({ value: undefined, done: true });
  });

  it('should keep the first terminal outcome', async () => {
    const stream = new MessageStream();
    stream.end();
    stream.fail(new EdgeError('SESSION_FAILED', 'late'));
    expect(await stream.next()).toEqual({ value: undefined, done: true });
  });
});
