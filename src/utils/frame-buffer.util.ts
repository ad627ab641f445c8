/**
 * Accumulates PCM16 bytes and hands them out in fixed-size frames, so the AI
 * peer receives a few ~300ms sends instead of one per 20ms telephony packet.
 */
export class FrameBuffer {
  private chunks: Buffer[] = [];
  private buffered = 0;

  constructor(readonly frameBytes: number) {
    if (!Number.isInteger(frameBytes) || frameBytes <= 0 || frameBytes % 2 !== 0) {
      throw new RangeError(`frameBytes must be a positive even integer, got ${frameBytes}`);
    }
  }

  get size(): number {
    return this.buffered;
  }

  push(bytes: Uint8Array): void {
    if (bytes.length === 0) return;
    this.chunks.push(Buffer.from(bytes));
    this.buffered += bytes.length;
  }

  /** Returns one full frame and keeps the remainder, or null below the threshold. */
  drain(): Buffer | null {
    if (this.buffered < this.frameBytes) return null;

    const all = this.chunks.length === 1 ? this.chunks[0] : Buffer.concat(this.chunks, this.buffered);
    const frame = all.subarray(0, this.frameBytes);
    const rest = all.subarray(this.frameBytes);

    this.chunks = rest.length > 0 ? [rest] : [];
    this.buffered = rest.length;
    return frame;
  }

  clear(): void {
    this.chunks = [];
    this.buffered = 0;
  }
}
