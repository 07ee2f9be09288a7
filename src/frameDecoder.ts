import { Security } from './security';

/**
 * Incremental 8370 decoder. Reads from the socket may split a frame or
 * carry several; the decoder keeps the incomplete tail between calls.
 */
export class FrameDecoder {
  private buffer = Buffer.alloc(0);

  constructor(private readonly security: Security) {}

  /**
   * Appends `data` and returns every frame body completed by it
   */
  feed(data: Buffer): Buffer[] {
    const [frames, leftover] = this.security.decode8370(Buffer.concat([this.buffer, data]));
    this.buffer = Buffer.from(leftover);
    return frames;
  }

  /** Bytes waiting for the rest of their frame */
  get pending(): number {
    return this.buffer.length;
  }

  reset(): void {
    this.buffer = Buffer.alloc(0);
  }
}
