import { bytesToMs, measureFrame, msToBytes } from '../audio/pcm';
import type { BoundaryReason, ChunkPolicy, EnergyMetric, SealedAudio } from '../types';

export interface ChunkerOptions extends ChunkPolicy {
  threshold: number;
  energyMetric: EnergyMetric;
}

/**
 * Boundary policy over a live PCM stream. Frames go in, sealed chunks come out;
 * sequence numbers are contiguous from 0 and chunk times are derived from the
 * sample count, so the same input always yields the same boundaries.
 */
export class Chunker {
  private policy: ChunkPolicy;
  private seq = 0;
  private capturedBytes = 0;
  private chunkStartByte = 0;
  private parts: Buffer[] = [];
  private openBytes = 0;
  private voicedBytes = 0;
  private hasVoice = false;
  private silenceStartOffset: number | undefined;
  private silenceBytes = 0;

  public constructor(private readonly options: ChunkerOptions) {
    this.policy = {
      chunkSplitIntervalMs: options.chunkSplitIntervalMs,
      minSilenceMs: options.minSilenceMs
    };
  }

  public getPolicy(): ChunkPolicy {
    return { ...this.policy };
  }

  public setPolicy(policy: ChunkPolicy): void {
    this.policy = { ...policy };
  }

  public nextSeq(): number {
    return this.seq;
  }

  public openDurationMs(): number {
    return bytesToMs(this.openBytes);
  }

  public push(frame: Buffer): SealedAudio[] {
    const sealed: SealedAudio[] = [];
    if (frame.length === 0) {
      return sealed;
    }

    const energy = measureFrame(frame);
    const level = this.options.energyMetric === 'rms' ? energy.rms : energy.peak;
    const silent = level < this.options.threshold;
    const maxBytes = Math.max(2, msToBytes(this.policy.chunkSplitIntervalMs));
    const minSilenceBytes = Math.max(2, msToBytes(this.policy.minSilenceMs));

    let remaining = frame;
    while (remaining.length > 0) {
      if (this.openBytes >= maxBytes) {
        sealed.push(this.sealAll('MAX_DURATION'));
        continue;
      }

      const maxRoom = maxBytes - this.openBytes;
      const silenceRoom =
        silent && this.hasVoice ? minSilenceBytes - this.silenceBytes : Number.POSITIVE_INFINITY;
      const take = Math.min(remaining.length, maxRoom, Math.max(silenceRoom, 2));

      this.append(remaining.subarray(0, take), silent);
      remaining = remaining.subarray(take);

      // Max duration is checked first; whichever fires resets the accumulators.
      if (this.openBytes >= maxBytes) {
        sealed.push(this.sealAll('MAX_DURATION'));
      } else if (silent && this.hasVoice && this.silenceBytes >= minSilenceBytes) {
        sealed.push(this.sealAtSilenceOnset());
      }
    }

    return sealed;
  }

  /** Seals whatever is open, regardless of duration or silence state. */
  public flush(): SealedAudio | undefined {
    if (this.openBytes === 0) {
      return undefined;
    }

    return this.sealAll('FORCED_STOP');
  }

  /** Drops the open chunk and restarts numbering at the current capture position. */
  public reset(): void {
    this.seq = 0;
    this.chunkStartByte = this.capturedBytes;
    this.clearOpen();
  }

  private append(buffer: Buffer, silent: boolean): void {
    if (silent) {
      if (this.silenceStartOffset === undefined) {
        this.silenceStartOffset = this.openBytes;
      }
      this.silenceBytes += buffer.length;
    } else {
      this.silenceStartOffset = undefined;
      this.silenceBytes = 0;
      this.voicedBytes += buffer.length;
      this.hasVoice = true;
    }

    this.parts.push(Buffer.from(buffer));
    this.openBytes += buffer.length;
    this.capturedBytes += buffer.length;
  }

  private sealAll(reason: BoundaryReason): SealedAudio {
    const pcm = Buffer.concat(this.parts, this.openBytes);
    const chunk = this.describe(pcm, this.voicedBytes, reason);

    this.chunkStartByte += pcm.length;
    this.clearOpen();
    return chunk;
  }

  private sealAtSilenceOnset(): SealedAudio {
    const onset = this.silenceStartOffset ?? this.openBytes;
    const pcm = Buffer.concat(this.parts, this.openBytes);
    const chunk = this.describe(pcm.subarray(0, onset), this.voicedBytes, 'SILENCE');
    const leadIn = Buffer.from(pcm.subarray(onset));

    this.chunkStartByte += onset;
    this.clearOpen();

    // The silence already heard stays as lead-in of the next chunk.
    if (leadIn.length > 0) {
      this.parts = [leadIn];
      this.openBytes = leadIn.length;
      this.silenceStartOffset = 0;
      this.silenceBytes = leadIn.length;
    }

    return chunk;
  }

  private describe(pcm: Buffer, voicedBytes: number, reason: BoundaryReason): SealedAudio {
    const startMs = bytesToMs(this.chunkStartByte);
    const chunk: SealedAudio = {
      seq: this.seq,
      startMs,
      endMs: startMs + bytesToMs(pcm.length),
      voicedMs: bytesToMs(voicedBytes),
      boundaryReason: reason,
      pcm
    };

    this.seq += 1;
    return chunk;
  }

  private clearOpen(): void {
    this.parts = [];
    this.openBytes = 0;
    this.voicedBytes = 0;
    this.hasVoice = false;
    this.silenceStartOffset = undefined;
    this.silenceBytes = 0;
  }
}
