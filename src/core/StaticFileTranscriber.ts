import fs from 'node:fs/promises';
import path from 'node:path';
import { AUDIO_SAMPLE_RATE, decodeWavPcm, msToBytes } from '../audio/pcm';
import { describeError, errorCode } from '../errors';
import type { StructuredLogger } from '../logging/StructuredLogger';
import { type CommandRunner, runCommand } from '../services/process/runCommand';
import type { TranscriptCleaner } from '../services/text/TranscriptCleaner';
import type { Chunk, SealedAudio, TranscriptionResult } from '../types';
import type { ChunkStore } from './ChunkStore';
import { Chunker, type ChunkerOptions } from './Chunker';
import { TranscriptAssembler } from './TranscriptAssembler';
import type { TranscriptionQueue } from './TranscriptionQueue';

/** Session id reserved for static jobs; live sessions start at 1. */
export const STATIC_SESSION_ID = 0;
const CONVERTED_SOURCE_FILE = 'longscribe-static-source.wav';
const CONVERT_TIMEOUT_MS = 10 * 60 * 1000;

export interface StaticFileTranscriberOptions extends ChunkerOptions {
  ffmpegBin: string;
  frameMs: number;
  gapMarker: string;
  cleaner?: TranscriptCleaner;
}

export interface StaticFileTranscriberDependencies {
  queue: TranscriptionQueue;
  store: ChunkStore;
  runner?: CommandRunner;
}

export interface StaticTranscriptionResult {
  sourcePath: string;
  outputPath: string;
  transcript: string;
  chunkCount: number;
  failedChunks: number;
}

export class StaticJobAbortedError extends Error {
  public constructor(sourcePath: string) {
    super(`Static transcription of '${sourcePath}' was aborted`);
    this.name = 'StaticJobAbortedError';
  }
}

/** `talk.mp4` becomes `talk.txt` in the same directory. */
export const transcriptPathFor = (sourcePath: string): string => {
  const parsed = path.parse(sourcePath);
  const candidate = path.join(parsed.dir, `${parsed.name}.txt`);
  return candidate === sourcePath ? path.join(parsed.dir, `${parsed.name}.transcript.txt`) : candidate;
};

interface ActiveJob {
  id: number;
  sourcePath: string;
  abort: () => void;
}

/**
 * Transcribes an existing audio or video file outside the live session. The
 * file is converted to 16 kHz mono with ffmpeg, cut with the live boundary
 * policy and fed through the shared worker pool.
 */
export class StaticFileTranscriber {
  private readonly runner: CommandRunner;
  private active: ActiveJob | undefined;
  private nextJobId = 1;

  public constructor(
    private readonly options: StaticFileTranscriberOptions,
    private readonly deps: StaticFileTranscriberDependencies,
    private readonly logger?: StructuredLogger
  ) {
    this.runner = deps.runner ?? runCommand;
  }

  public isBusy(): boolean {
    return Boolean(this.active);
  }

  public abort(): void {
    const job = this.active;
    if (!job) {
      return;
    }

    const cancelled = this.deps.queue.cancel(
      (chunk) => chunk.sessionId === STATIC_SESSION_ID && chunk.generation === job.id
    );
    this.logger?.info('Static transcription aborted', { sourcePath: job.sourcePath, cancelled });
    job.abort();
  }

  public async transcribe(sourcePath: string, language: string): Promise<StaticTranscriptionResult> {
    if (this.active) {
      throw new Error(`A static transcription is already running for '${this.active.sourcePath}'`);
    }

    const jobId = this.nextJobId;
    this.nextJobId += 1;

    let aborted = false;
    let rejectAborted: (reason: Error) => void = () => undefined;
    const abortSignal = new Promise<never>((_resolve, reject) => {
      rejectAborted = reject;
    });
    // An abort after the last race must not surface as an unhandled rejection.
    abortSignal.catch(() => undefined);

    this.active = {
      id: jobId,
      sourcePath,
      abort: () => {
        aborted = true;
        rejectAborted(new StaticJobAbortedError(sourcePath));
      }
    };

    const startedAt = Date.now();
    this.logger?.info('Static transcription started', { sourcePath, language, jobId });

    try {
      await this.deps.store.purgeStatic();

      const pcm = await Promise.race([this.convert(sourcePath), abortSignal]);
      const sealed = this.split(pcm);
      const assembler = new TranscriptAssembler({
        gapMarker: this.options.gapMarker,
        cleaner: this.options.cleaner
      });

      const transcript = await Promise.race([
        this.transcribeChunks(jobId, sealed, language, assembler, () => aborted),
        abortSignal
      ]);

      const outputPath = transcriptPathFor(sourcePath);
      await fs.writeFile(outputPath, `${transcript}\n`, 'utf8');

      const result: StaticTranscriptionResult = {
        sourcePath,
        outputPath,
        transcript,
        chunkCount: sealed.length,
        failedChunks: assembler.failedCount()
      };

      this.logger?.info('Static transcription completed', {
        sourcePath,
        outputPath,
        chunkCount: result.chunkCount,
        failedChunks: result.failedChunks,
        elapsedMs: Date.now() - startedAt
      });

      return result;
    } finally {
      this.active = undefined;
      await fs.unlink(this.convertedPath()).catch((error: unknown) => {
        if (errorCode(error) !== 'ENOENT') {
          this.logger?.warn('Failed to delete converted static source', { detail: describeError(error) });
        }
      });
    }
  }

  private convertedPath(): string {
    return path.join(this.deps.store.getDirectory(), CONVERTED_SOURCE_FILE);
  }

  private async convert(sourcePath: string): Promise<Buffer> {
    const target = this.convertedPath();
    await fs.mkdir(path.dirname(target), { recursive: true });
    await this.runner(
      this.options.ffmpegBin,
      [
        '-y',
        '-hide_banner',
        '-loglevel',
        'error',
        '-i',
        sourcePath,
        '-vn',
        '-ac',
        '1',
        '-ar',
        String(AUDIO_SAMPLE_RATE),
        '-acodec',
        'pcm_s16le',
        target
      ],
      { timeoutMs: CONVERT_TIMEOUT_MS }
    );

    return decodeWavPcm(await fs.readFile(target));
  }

  private split(pcm: Buffer): SealedAudio[] {
    const chunker = new Chunker(this.options);
    const frameBytes = Math.max(2, msToBytes(this.options.frameMs));
    const sealed: SealedAudio[] = [];

    for (let offset = 0; offset < pcm.length; offset += frameBytes) {
      sealed.push(...chunker.push(pcm.subarray(offset, Math.min(pcm.length, offset + frameBytes))));
    }

    const tail = chunker.flush();
    if (tail) {
      sealed.push(tail);
    }

    return sealed;
  }

  private async transcribeChunks(
    jobId: number,
    sealed: SealedAudio[],
    language: string,
    assembler: TranscriptAssembler,
    isAborted: () => boolean
  ): Promise<string> {
    if (sealed.length === 0) {
      return '';
    }

    return new Promise<string>((resolve, reject) => {
      const accept = (result: TranscriptionResult): void => {
        assembler.accept(result);
        if (assembler.appendedCount() === sealed.length) {
          resolve(assembler.transcript());
        }
      };

      const submitAll = async (): Promise<void> => {
        for (const audio of sealed) {
          if (isAborted()) {
            return;
          }

          let storagePath: string;
          try {
            storagePath = await this.deps.store.writeStaticChunk(audio.seq, audio.pcm);
          } catch (error) {
            this.logger?.error('Failed to persist static chunk; recording a gap', {
              seq: audio.seq,
              detail: describeError(error)
            });
            accept({
              sessionId: STATIC_SESSION_ID,
              generation: jobId,
              seq: audio.seq,
              text: '',
              status: 'FAILED',
              attempts: 0,
              error: describeError(error)
            });
            continue;
          }

          const chunk: Chunk = {
            sessionId: STATIC_SESSION_ID,
            generation: jobId,
            seq: audio.seq,
            startMs: audio.startMs,
            endMs: audio.endMs,
            voicedMs: audio.voicedMs,
            boundaryReason: audio.boundaryReason,
            storagePath,
            language
          };

          this.deps.queue.enqueue({
            chunk,
            onResult: (result) => {
              if (!isAborted()) {
                accept(result);
              }
            }
          });
        }
      };

      submitAll().catch((error: unknown) => {
        this.logger?.error('Static chunk submission failed', { jobId, detail: describeError(error) });
        reject(error);
      });
    });
  }
}
