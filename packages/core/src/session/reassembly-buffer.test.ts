import { describe, expect, it } from 'vitest';
import { FrameFlags } from '../codec/constants.js';
import { ReassemblyBuffer } from './reassembly-buffer.js';

const END = FrameFlags.END_OF_MESSAGE;
const START = FrameFlags.START_OF_MESSAGE;
const bytes = (...values: number[]) => new Uint8Array(values);

describe('ReassemblyBuffer', () => {
  it('should release messages in sequence order', () => {
    const buffer = new ReassemblyBuffer(16);

    expect(buffer.accept(2, END, bytes(2)).events).toEqual([]);
    expect(buffer.accept(3, END, bytes(3)).events).toEqual([]);
    expect(buffer.bufferedCount).toBe(2);

    expect(buffer.accept(1, END, bytes(1)).events).toEqual([
      { type: 'message', data: bytes(1) },
      { type: 'message', data: bytes(2) },
      { type: 'message', data: bytes(3) },
    ]);
    expect(buffer.nextSequence).toBe(4);
    expect(buffer.bufferedCount).toBe(0);
  });

  it('should join fragments up to the end-of-message flag', () => {
    const buffer = new ReassemblyBuffer(16);
    expect(buffer.accept(1, 0, bytes(1, 2)).events).toEqual([]);
    expect(buffer.accept(2, END, bytes(3)).events).toEqual([{ type: 'message', data: bytes(1, 2, 3) }]);
  });

  it('should deliver an empty message', () => {
    const buffer = new ReassemblyBuffer(16);
    expect(buffer.accept(1, END, bytes()).events).toEqual([{ type: 'message', data: bytes() }]);
  });

  it('should report duplicates, delivered or buffered', () => {
    const buffer = new ReassemblyBuffer(16);
    buffer.accept(1, END, bytes(1));
    buffer.accept(3, END, bytes(3));

    expect(buffer.accept(1, END, bytes(1)).status).toBe('duplicate');
    expect(buffer.accept(3, END, bytes(3)).status).toBe('duplicate');
    expect(buffer.accept(2, END, bytes(2)).events).toHaveLength(2);
  });

  it('should drop frames beyond the window', () => {
    const buffer = new ReassemblyBuffer(4);
    expect(buffer.accept(5, END, bytes(5)).status).toBe('out-of-window');
    expect(buffer.accept(4, END, bytes(4)).status).toBe('accepted');
    expect(buffer.bufferedCount).toBe(1);
  });

  it('should emit close after the last message', () => {
    const buffer = new ReassemblyBuffer(16);
    buffer.accept(2, FrameFlags.CLOSE, bytes());
    expect(buffer.accept(1, END, bytes(7)).events).toEqual([
      { type: 'message', data: bytes(7) },
      { type: 'close' },
    ]);
  });

  it('should hold a CLOSE frame beyond the window until missing sequences are given up', () => {
    const buffer = new ReassemblyBuffer(4);
    expect(buffer.accept(2, START | END, bytes(2)).events).toEqual([]);
    expect(buffer.accept(9, FrameFlags.CLOSE, bytes()).status).toBe('accepted');
    expect(buffer.pendingClose).toBe(9);

    expect(buffer.skipMissing()).toEqual([
      { type: 'lost', sequence: 1 },
      { type: 'message', data: bytes(2) },
      { type: 'lost', sequence: 3 },
      { type: 'lost', sequence: 4 },
      { type: 'lost', sequence: 5 },
      { type: 'lost', sequence: 6 },
      { type: 'lost', sequence: 7 },
      { type: 'lost', sequence: 8 },
      { type: 'close' },
    ]);
    expect(buffer.pendingClose).toBeNull();
    expect(buffer.nextSequence).toBe(10);
  });

  it('should drop a message that lost one of its fragments', () => {
    const buffer = new ReassemblyBuffer(16);
    buffer.accept(1, START, bytes(1));
    buffer.accept(3, END, bytes(3));
    buffer.accept(4, START, bytes(4));
    buffer.accept(5, END, bytes(5));
    buffer.accept(6, FrameFlags.CLOSE, bytes());

    expect(buffer.skipMissing()).toEqual([
      { type: 'lost', sequence: 2 },
      { type: 'message', data: bytes(4, 5) },
      { type: 'close' },
    ]);
  });

  it('should skip nothing without a CLOSE frame', () => {
    const buffer = new ReassemblyBuffer(16);
    buffer.accept(2, START | END, bytes(2));
    expect(buffer.skipMissing()).toEqual([]);
    expect(buffer.nextSequence).toBe(1);
  });
});
