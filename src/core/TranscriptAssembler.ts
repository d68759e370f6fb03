import type { TranscriptCleaner } from '../services/text/TranscriptCleaner';
import type { TranscriptionResult } from '../types';

export interface AssembledPart {
  seq: number;
  text: string;
  failed: boolean;
}

export interface TranscriptAssemblerOptions {
  /** `{seq}` is replaced by the chunk number. */
  gapMarker: string;
  cleaner?: TranscriptCleaner;
}

/**
 * Holds results that arrive out of order and releases them strictly by `seq`.
 */
export class TranscriptAssembler {
  private held = new Map<number, TranscriptionResult>();
  private cursor = 0;
  private parts: AssembledPart[] = [];

  public constructor(private readonly options: TranscriptAssemblerOptions) {}

  public nextExpectedSeq(): number {
    return this.cursor;
  }

  public heldCount(): number {
    return this.held.size;
  }

  public appendedCount(): number {
    return this.parts.length;
  }

  public failedCount(): number {
    return this.parts.filter((part) => part.failed).length;
  }

  /**
   * Stores `result` and returns the parts that became appendable, in order.
   * Duplicates and results behind the cursor are ignored.
   */
  public accept(result: TranscriptionResult): AssembledPart[] {
    if (result.seq < this.cursor || this.held.has(result.seq)) {
      return [];
    }

    this.held.set(result.seq, result);

    const appended: AssembledPart[] = [];
    let next = this.held.get(this.cursor);
    while (next) {
      this.held.delete(this.cursor);
      const part = this.render(next);
      this.parts.push(part);
      appended.push(part);
      this.cursor += 1;
      next = this.held.get(this.cursor);
    }

    return appended;
  }

  public transcript(): string {
    return joinParts(this.parts);
  }

  public clear(): void {
    this.held = new Map();
    this.cursor = 0;
    this.parts = [];
  }

  private render(result: TranscriptionResult): AssembledPart {
    if (result.status === 'FAILED') {
      return {
        seq: result.seq,
        text: this.options.gapMarker.split('{seq}').join(String(result.seq)),
        failed: true
      };
    }

    const text = this.options.cleaner ? this.options.cleaner.clean(result.text).text : result.text;
    return { seq: result.seq, text: text.trim(), failed: false };
  }
}

export const joinParts = (parts: AssembledPart[]): string =>
  parts
    .map((part) => part.text)
    .filter((text) => text.length > 0)
    .join(' ');
