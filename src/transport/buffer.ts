/**
 * Response buffer shared by all stream transports.
 *
 * Accumulates incoming chunks and extracts either terminator-delimited lines or
 * fixed-size byte blocks. Chunks are only consolidated when extracting, which
 * avoids a Buffer.concat on every 'data' event.
 */
export class ResponseBuffer {
  /** Chunks received since the last extraction */
  private chunks: Buffer[] = [];
  /** Total length of pending chunks */
  private pendingLength = 0;
  /** Consolidated bytes not yet handed out */
  private buffer: Buffer = Buffer.alloc(0);

  append(data: Buffer): void {
    if (data.length === 0) return;
    this.chunks.push(data);
    this.pendingLength += data.length;
  }

  /** Number of buffered bytes not yet extracted */
  get length(): number {
    return this.buffer.length + this.pendingLength;
  }

  private consolidate(): void {
    if (this.chunks.length === 0) return;

    const newData = Buffer.concat(this.chunks, this.pendingLength);
    this.chunks.length = 0;
    this.pendingLength = 0;

    this.buffer = this.buffer.length > 0 ? Buffer.concat([this.buffer, newData]) : newData;
  }

  /**
   * Removes and returns the bytes of the first complete line, terminator excluded.
   * Returns null while no terminator has arrived; the partial line stays buffered.
   */
  takeLine(terminator: Buffer): Buffer | null {
    this.consolidate();

    const end = this.buffer.indexOf(terminator);
    if (end === -1) return null;

    const line = this.buffer.subarray(0, end);
    this.buffer = this.buffer.subarray(end + terminator.length);
    return line;
  }

  /**
   * Removes and returns exactly `count` bytes, or null while fewer are buffered.
   */
  takeBytes(count: number): Buffer | null {
    this.consolidate();

    if (this.buffer.length < count) return null;

    // Copy so the caller's block does not pin the rest of the buffer
    const block = Buffer.from(this.buffer.subarray(0, count));
    this.buffer = this.buffer.subarray(count);
    return block;
  }

  reset(): void {
    this.chunks.length = 0;
    this.pendingLength = 0;
    this.buffer = Buffer.alloc(0);
  }
}
