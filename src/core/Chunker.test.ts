import { describe, expect, it } from 'vitest';
import { msToBytes } from '../audio/pcm';
import type { SealedAudio } from '../types';
import { Chunker } from './Chunker';

const tone = (ms: number, amplitude = 4000): Buffer => {
  const pcm = Buffer.alloc(msToBytes(ms));
  for (let offset = 0; offset < pcm.length; offset += 2) {
    pcm.writeInt16LE(offset % 4 === 0 ? amplitude : -amplitude, offset);
  }
  return pcm;
};

const silence = (ms: number): Buffer => Buffer.alloc(msToBytes(ms));

const createChunker = (chunkSplitIntervalMs = 60000, minSilenceMs = 1500): Chunker =>
  new Chunker({ threshold: 500, energyMetric: 'peak', chunkSplitIntervalMs, minSilenceMs });

const pushFrames = (chunker: Chunker, frame: Buffer, count: number): SealedAudio[] => {
  const sealed: SealedAudio[] = [];
  for (let index = 0; index < count; index += 1) {
    sealed.push(...chunker.push(frame));
  }
  return sealed;
};

const describeChunk = (chunk: SealedAudio | undefined) =>
  chunk && {
    seq: chunk.seq,
    startMs: chunk.startMs,
    endMs: chunk.endMs,
    voicedMs: chunk.voicedMs,
    boundaryReason: chunk.boundaryReason
  };

describe('Chunker', () => {
  it('seals 90 seconds of continuous speech into 0-60s and 60-90s', () => {
    const chunker = createChunker();
    const sealed = pushFrames(chunker, tone(100), 900);
    const tail = chunker.flush();

    expect(sealed.map(describeChunk)).toEqual([
      { seq: 0, startMs: 0, endMs: 60000, voicedMs: 60000, boundaryReason: 'MAX_DURATION' }
    ]);
    expect(describeChunk(tail)).toEqual({
      seq: 1,
      startMs: 60000,
      endMs: 90000,
      voicedMs: 30000,
      boundaryReason: 'FORCED_STOP'
    });
  });

  it('splits exactly at the duration boundary when it falls inside a frame', () => {
    const chunker = createChunker(1000);
    const sealed = pushFrames(chunker, tone(300), 4);

    expect(sealed).toHaveLength(1);
    expect(describeChunk(sealed[0])).toEqual({
      seq: 0,
      startMs: 0,
      endMs: 1000,
      voicedMs: 1000,
      boundaryReason: 'MAX_DURATION'
    });
    expect(sealed[0]?.pcm.length).toBe(msToBytes(1000));
    expect(chunker.openDurationMs()).toBe(200);
  });

  it('seals at the silence onset and keeps the silence as lead-in of the next chunk', () => {
    const chunker = createChunker();
    expect(pushFrames(chunker, tone(100), 20)).toEqual([]);
    expect(pushFrames(chunker, silence(100), 14)).toEqual([]);

    const sealed = chunker.push(silence(100));
    expect(sealed.map(describeChunk)).toEqual([
      { seq: 0, startMs: 0, endMs: 2000, voicedMs: 2000, boundaryReason: 'SILENCE' }
    ]);
    expect(sealed[0]?.pcm.length).toBe(msToBytes(2000));

    chunker.push(silence(100));
    expect(describeChunk(chunker.flush())).toEqual({
      seq: 1,
      startMs: 2000,
      endMs: 3600,
      voicedMs: 0,
      boundaryReason: 'FORCED_STOP'
    });
  });

  it('does not seal on silence when the open chunk holds no speech', () => {
    const chunker = createChunker();
    expect(pushFrames(chunker, silence(100), 30)).toEqual([]);

    expect(describeChunk(chunker.flush())).toEqual({
      seq: 0,
      startMs: 0,
      endMs: 3000,
      voicedMs: 0,
      boundaryReason: 'FORCED_STOP'
    });
  });

  it('treats frames below the threshold as silence', () => {
    const chunker = createChunker(60000, 200);
    chunker.push(tone(100));
    const sealed = pushFrames(chunker, tone(100, 499), 2);

    expect(sealed.map((chunk) => chunk.boundaryReason)).toEqual(['SILENCE']);
    expect(sealed[0]?.endMs).toBe(100);
  });

  it('restarts numbering at the current capture position after reset', () => {
    const chunker = createChunker();
    pushFrames(chunker, tone(100), 10);
    chunker.reset();
    pushFrames(chunker, tone(100), 5);

    expect(chunker.nextSeq()).toBe(0);
    expect(describeChunk(chunker.flush())).toEqual({
      seq: 0,
      startMs: 1000,
      endMs: 1500,
      voicedMs: 500,
      boundaryReason: 'FORCED_STOP'
    });
  });

  it('returns nothing from flush when no audio is open', () => {
    const chunker = createChunker();
    expect(chunker.flush()).toBeUndefined();
  });

  it('keeps sequence numbers contiguous across mixed boundaries', () => {
    const chunker = createChunker(2000, 300);
    const sealed = [
      ...pushFrames(chunker, tone(100), 25),
      ...pushFrames(chunker, silence(100), 4),
      ...pushFrames(chunker, tone(100), 3)
    ];
    const tail = chunker.flush();
    const all = tail ? [...sealed, tail] : sealed;

    expect(all.map((chunk) => chunk.seq)).toEqual(all.map((_chunk, index) => index));
    expect(all.map((chunk) => chunk.boundaryReason)).toEqual(['MAX_DURATION', 'SILENCE', 'FORCED_STOP']);
    for (let index = 1; index < all.length; index += 1) {
      expect(all[index]?.startMs).toBe(all[index - 1]?.endMs);
    }
  });
});
