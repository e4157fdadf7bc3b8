/**
 * Frame Codec
 *
 * Text framing shared by both ends of the link:
 *
 *   IN:5:1|OUT_TO:3[85][95]:1| |OUT_SH:SM1-SH1$0x24$R6$G14:fr|
 *
 *   - every message is terminated by '|'
 *   - a lone space is a heartbeat; spaces are stripped before splitting
 *   - a message without its trailing '|' is held back until the
 *     delimiter arrives, possibly several socket reads later
 */

import { FramingError } from '../errors';

export const FRAME_DELIMITER = '|';
export const HEARTBEAT = ' ';

/** Reject messages that would break framing on the receiving side */
export function validateMessage(message: string): void {
  if (message.length === 0) {
    throw new FramingError('Cannot frame an empty message');
  }
  if (message.includes(FRAME_DELIMITER)) {
    throw new FramingError(`Message contains the frame delimiter: ${message}`);
  }
  if (message.includes(HEARTBEAT)) {
    throw new FramingError(`Message contains heartbeat padding: ${message}`);
  }
}

/** Append the delimiter to a message */
export function encodeFrame(message: string): string {
  validateMessage(message);
  return message + FRAME_DELIMITER;
}

/**
 * Reassembles frames from a stream of text chunks. One per link;
 * reset on every reconnect so a half-received frame never survives.
 */
export class FrameAssembler {
  private pending = '';

  /**
   * Feed a decoded chunk. Returns the complete, non-empty frames it
   * finished, in arrival order.
   */
  feed(chunk: string): string[] {
    this.pending += chunk.split(HEARTBEAT).join('');

    const lastDelimiter = this.pending.lastIndexOf(FRAME_DELIMITER);
    if (lastDelimiter === -1) return [];

    const complete = this.pending.slice(0, lastDelimiter);
    this.pending = this.pending.slice(lastDelimiter + 1);

    return complete.split(FRAME_DELIMITER).filter((frame) => frame.length > 0);
  }

  /** Discard any partial frame */
  reset(): void {
    this.pending = '';
  }

  /** Characters held back waiting for a delimiter */
  get buffered(): string {
    return this.pending;
  }
}
