import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { encodeWav, msToBytes } from '../audio/pcm';
import type { CommandRunner } from '../services/process/runCommand';
import type { AsrResult } from '../types';
import { ChunkStore } from './ChunkStore';
import { StaticFileTranscriber, StaticJobAbortedError, transcriptPathFor } from './StaticFileTranscriber';
import { TranscriptionQueue, type SpeechModel } from './TranscriptionQueue';

const tone = (ms: number): Buffer => {
  const pcm = Buffer.alloc(msToBytes(ms));
  for (let offset = 0; offset < pcm.length; offset += 2) {
    pcm.writeInt16LE(offset % 4 === 0 ? 3000 : -3000, offset);
  }
  return pcm;
};

/** Stands in for ffmpeg: writes `pcm` as WAV to the output path, the last argument. */
const fakeFfmpeg = (pcm: Buffer): CommandRunner => async (_command, args) => {
  await fs.writeFile(args[args.length - 1], encodeWav(pcm));
  return { stdout: '', stderr: '' };
};

const seqOf = (audioPath: string): string => /-c(\d+)\.wav$/.exec(audioPath)?.[1] ?? '?';

const options = {
  ffmpegBin: 'ffmpeg',
  frameMs: 100,
  gapMarker: '[gap {seq}]',
  threshold: 500,
  energyMetric: 'peak' as const,
  chunkSplitIntervalMs: 1000,
  minSilenceMs: 300
};

describe('transcriptPathFor', () => {
  it('writes the transcript beside the source', () => {
    expect(transcriptPathFor('/media/talk.mp4')).toBe('/media/talk.txt');
    expect(transcriptPathFor('/media/notes.txt')).toBe('/media/notes.transcript.txt');
  });
});

describe('StaticFileTranscriber', () => {
  let directory: string;
  let store: ChunkStore;

  beforeEach(async () => {
    directory = await fs.mkdtemp(path.join(os.tmpdir(), 'longscribe-static-'));
    store = new ChunkStore(path.join(directory, 'chunks'));
  });

  afterEach(async () => {
    await fs.rm(directory, { recursive: true, force: true });
  });

  it('converts, chunks and writes the ordered transcript', async () => {
    const model: SpeechModel = {
      transcribe: async (audioPath, language): Promise<AsrResult> => ({ text: `part${seqOf(audioPath)}-${language}` })
    };
    const queue = new TranscriptionQueue(model, { concurrency: 2 });
    const transcriber = new StaticFileTranscriber(options, { queue, store, runner: fakeFfmpeg(tone(2500)) });
    const sourcePath = path.join(directory, 'talk.m4a');

    const result = await transcriber.transcribe(sourcePath, 'en');

    expect(result).toEqual({
      sourcePath,
      outputPath: path.join(directory, 'talk.txt'),
      transcript: 'part0-en part1-en part2-en',
      chunkCount: 3,
      failedChunks: 0
    });
    expect(await fs.readFile(result.outputPath, 'utf8')).toBe('part0-en part1-en part2-en\n');
    expect((await fs.readdir(path.join(directory, 'chunks'))).sort()).toEqual([
      'longscribe-static-c0.wav',
      'longscribe-static-c1.wav',
      'longscribe-static-c2.wav'
    ]);
    expect(transcriber.isBusy()).toBe(false);
  });

  it('marks chunks that keep failing as gaps', async () => {
    const model: SpeechModel = {
      transcribe: async (audioPath): Promise<AsrResult> => {
        if (seqOf(audioPath) === '1') {
          throw new Error('model crashed');
        }
        return { text: 'ok' };
      }
    };
    const queue = new TranscriptionQueue(model);
    const transcriber = new StaticFileTranscriber(options, { queue, store, runner: fakeFfmpeg(tone(3000)) });

    const result = await transcriber.transcribe(path.join(directory, 'lecture.wav'), 'el');

    expect(result.transcript).toBe('ok [gap 1] ok');
    expect(result.failedChunks).toBe(1);
  });

  it('fails the job and frees the transcriber when chunks cannot be queued', async () => {
    class ClosedQueue extends TranscriptionQueue {
      public override enqueue(): void {
        throw new Error('queue closed');
      }
    }
    const model: SpeechModel = { transcribe: async (): Promise<AsrResult> => ({ text: 'unused' }) };
    const transcriber = new StaticFileTranscriber(options, {
      queue: new ClosedQueue(model),
      store,
      runner: fakeFfmpeg(tone(1500))
    });

    await expect(transcriber.transcribe(path.join(directory, 'memo.ogg'), 'en')).rejects.toThrow('queue closed');
    expect(transcriber.isBusy()).toBe(false);
    await expect(fs.access(path.join(directory, 'memo.txt'))).rejects.toThrow();
  });

  it('rejects a second job while one is running and stops on abort', async () => {
    let markStarted: () => void = () => undefined;
    const started = new Promise<void>((resolve) => {
      markStarted = resolve;
    });
    const model: SpeechModel = {
      transcribe: () => {
        markStarted();
        return new Promise<AsrResult>(() => undefined);
      }
    };
    const queue = new TranscriptionQueue(model);
    const transcriber = new StaticFileTranscriber(options, { queue, store, runner: fakeFfmpeg(tone(2000)) });
    const sourcePath = path.join(directory, 'long.mp3');

    const running = transcriber.transcribe(sourcePath, 'en');
    expect(transcriber.isBusy()).toBe(true);
    await expect(transcriber.transcribe(sourcePath, 'en')).rejects.toThrow(
      `A static transcription is already running for '${sourcePath}'`
    );

    await started;
    transcriber.abort();

    await expect(running).rejects.toBeInstanceOf(StaticJobAbortedError);
    expect(transcriber.isBusy()).toBe(false);
    expect(queue.size()).toBe(0);
    await expect(fs.access(path.join(directory, 'chunks', 'longscribe-static-source.wav'))).rejects.toThrow();
  });
});
