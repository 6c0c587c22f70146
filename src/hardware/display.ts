/** Byte sink for the output traps. Nothing is guaranteed visible before `flush`. */
export interface DisplayDevice {
  write(data: number[]): void;
  flush(): void;
}

/** Collects output in memory, keeping flushed and pending bytes apart. */
export class BufferedDisplay implements DisplayDevice {
  private pending: number[] = [];
  private readonly flushed: number[] = [];
  public flushCount = 0;

  public write(data: number[]): void {
    for (const byte of data) {
      this.pending.push(byte & 0xff);
    }
  }

  public flush(): void {
    this.flushed.push(...this.pending);
    this.pending = [];
    this.flushCount++;
  }

  /** Flushed output decoded as text */
  public get text(): string {
    return Buffer.from(this.flushed).toString('latin1');
  }

  public get pendingText(): string {
    return Buffer.from(this.pending).toString('latin1');
  }
}
