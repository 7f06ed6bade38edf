const NEWLINE = 0x0a;

export type Frame = { kind: 'line'; line: string } | { kind: 'overflow'; bytes: number };

/**
 * Splits a byte stream into newline-terminated UTF-8 lines.
 *
 * The pending buffer never grows past `maxLineBytes`: once a line is known to be
 * too long an `overflow` frame is emitted and the remainder of that line, up to
 * and including its newline, is dropped.
 */
export class LineFramer {
  private pending: Buffer[] = [];
  private pendingBytes = 0;
  private discarding = false;
  private discardedBytes = 0;

  constructor(private readonly maxLineBytes: number) {}

  public get bufferedBytes(): number {
    return this.pendingBytes;
  }

  public push(chunk: Buffer): Frame[] {
    const frames: Frame[] = [];
    let offset = 0;
    while (offset < chunk.length) {
      const newlineAt = chunk.indexOf(NEWLINE, offset);
      const end = newlineAt === -1 ? chunk.length : newlineAt;
      const slice = chunk.subarray(offset, end);

      if (this.discarding) {
        this.discardedBytes += slice.length;
      } else if (this.pendingBytes + slice.length > this.maxLineBytes) {
        this.discarding = true;
        this.discardedBytes = this.pendingBytes + slice.length;
        this.pending = [];
        this.pendingBytes = 0;
        frames.push({ kind: 'overflow', bytes: this.discardedBytes });
      } else if (slice.length > 0) {
        this.pending.push(Buffer.from(slice));
        this.pendingBytes += slice.length;
      }

      if (newlineAt === -1) {
        break;
      }
      if (this.discarding) {
        this.discarding = false;
        this.discardedBytes = 0;
      } else {
        frames.push({ kind: 'line', line: this.takeLine() });
      }
      offset = newlineAt + 1;
    }
    return frames;
  }

  private takeLine(): string {
    const line = Buffer.concat(this.pending, this.pendingBytes).toString('utf8');
    this.pending = [];
    this.pendingBytes = 0;
    return line.endsWith('\r') ? line.slice(0, -1) : line;
  }
}
