import { BYTES_PER_SAMPLE } from './pcm';

/** Re-cuts an arbitrary byte stream into fixed-size PCM frames. */
export class PcmFramer {
  private buffered: Buffer = Buffer.alloc(0);

  public constructor(private readonly frameBytes: number) {
    if (frameBytes < BYTES_PER_SAMPLE || frameBytes % BYTES_PER_SAMPLE !== 0) {
      throw new Error(`Frame size must be a positive whole number of samples, got ${frameBytes} bytes`);
    }
  }

  public pendingBytes(): number {
    return this.buffered.length;
  }

  public push(data: Buffer): Buffer[] {
    if (data.length === 0) {
      return [];
    }

    const joined = this.buffered.length > 0 ? Buffer.concat([this.buffered, data]) : Buffer.from(data);
    const frames: Buffer[] = [];
    let offset = 0;

    while (joined.length - offset >= this.frameBytes) {
      frames.push(joined.subarray(offset, offset + this.frameBytes));
      offset += this.frameBytes;
    }

    this.buffered = Buffer.from(joined.subarray(offset));
    return frames;
  }

  /** Returns what is left as one short frame, trimmed to whole samples. */
  public drain(): Buffer | undefined {
    const usable = this.buffered.length - (this.buffered.length % BYTES_PER_SAMPLE);
    const tail = usable > 0 ? this.buffered.subarray(0, usable) : undefined;
    this.buffered = Buffer.alloc(0);
    return tail;
  }
}
