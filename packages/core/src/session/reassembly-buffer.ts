import { concatBytes } from '../crypto/hex.js';
import { FrameFlags } from '../codec/constants.js';

export type ReassemblyEvent =
  | { type: 'message'; data: Uint8Array }
  | { type: 'lost'; sequence: number }
  | { type: 'close' };

export type AcceptStatus = 'accepted' | 'duplicate' | 'out-of-window';

export interface AcceptResult {
  status: AcceptStatus;
  events: ReassemblyEvent[];
}

interface BufferedFrame {
  flags: number;
  fragment: Uint8Array;
}

/**
 * Puts inbound frames back in sequence order and joins fragments into messages. Nothing is
 * released while an earlier sequence number is missing, unless the peer has closed and the
 * missing sequences are given up with `skipMissing`.
 *
 * The CLOSE frame is the last sequence a peer sends, so it is buffered even beyond the window.
 */
export class ReassemblyBuffer {
  private nextExpected: number;
  private window: number;
  private buffered = new Map<number, BufferedFrame>();
  private partial: Uint8Array[] = [];
  /** Set after a lost sequence; fragments are discarded until the next message start. */
  private resyncing = false;
  private closeSequence: number | null = null;

  constructor(window: number, firstSequence = 1) {
    this.window = window;
    this.nextExpected = firstSequence;
  }

  accept(sequence: number, flags: number, fragment: Uint8Array): AcceptResult {
    if (sequence < this.nextExpected || this.buffered.has(sequence)) {
      return { status: 'duplicate', events: [] };
    }
    const closing = (flags & FrameFlags.CLOSE) !== 0;
    if (!closing && sequence >= this.nextExpected + this.window) {
      return { status: 'out-of-window', events: [] };
    }

    this.buffered.set(sequence, { flags, fragment });
    if (closing) this.closeSequence = sequence;
    return { status: 'accepted', events: this.drain(this.nextExpected) };
  }

  get nextSequence(): number {
    return this.nextExpected;
  }

  get bufferedCount(): number {
    return this.buffered.size;
  }

  /** Sequence of a received CLOSE frame still waiting behind missing sequences, if any. */
  get pendingClose(): number | null {
    return this.closeSequence !== null && this.closeSequence >= this.nextExpected ? this.closeSequence : null;
  }

  /**
   * Marks every missing sequence below a pending CLOSE as lost and releases what follows. A
   * message that lost any of its fragments is dropped as a whole.
   */
  skipMissing(): ReassemblyEvent[] {
    const until = this.pendingClose;
    return until === null ? [] : this.drain(until);
  }

  private drain(lostBefore: number): ReassemblyEvent[] {
    const events: ReassemblyEvent[] = [];
    for (;;) {
      const sequence = this.nextExpected;
      const frame = this.buffered.get(sequence);
      if (!frame) {
        if (sequence >= lostBefore) break;
        events.push({ type: 'lost', sequence });
        this.partial = [];
        this.resyncing = true;
        this.nextExpected++;
        continue;
      }
      this.buffered.delete(sequence);
      this.nextExpected++;

      if (frame.flags & FrameFlags.START_OF_MESSAGE) {
        this.partial = [];
        this.resyncing = false;
      }
      if (!this.resyncing) {
        if (frame.fragment.length > 0) this.partial.push(frame.fragment);
        if (frame.flags & FrameFlags.END_OF_MESSAGE) {
          events.push({ type: 'message', data: concatBytes(...this.partial) });
          this.partial = [];
        }
      }
      if (frame.flags & FrameFlags.CLOSE) {
        events.push({ type: 'close' });
      }
    }
    return events;
  }
}
