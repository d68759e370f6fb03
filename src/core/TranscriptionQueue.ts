import { ChunkTranscriptionFailure, describeError } from '../errors';
import type { StructuredLogger } from '../logging/StructuredLogger';
import type { AsrResult, Chunk, TranscriptionResult } from '../types';

export interface SpeechModel {
  transcribe: (audioPath: string, language: string) => Promise<AsrResult>;
  warmup?: () => Promise<void>;
  shutdown?: () => Promise<void>;
}

export interface JobTiming {
  queueMs: number;
  modelMs: number;
  audioMs: number;
}

export interface TranscriptionJob {
  chunk: Chunk;
  onResult: (result: TranscriptionResult, timing: JobTiming) => void;
}

export interface TranscriptionQueueOptions {
  concurrency: number;
  maxAttempts: number;
}

interface QueuedJob extends TranscriptionJob {
  enqueuedAt: number;
  cancelled: boolean;
}

const DEFAULT_OPTIONS: TranscriptionQueueOptions = {
  concurrency: 1,
  maxAttempts: 2
};

/**
 * FIFO of chunk jobs drained by a fixed number of workers. Workers run beside
 * capture; nothing here blocks the caller. Results are handed back through
 * each job's `onResult`, in completion order.
 */
export class TranscriptionQueue {
  private readonly options: TranscriptionQueueOptions;
  private waiting: QueuedJob[] = [];
  private readonly inFlight = new Set<QueuedJob>();
  private readonly running = new Set<Promise<void>>();
  private idleWaiters: Array<() => void> = [];

  public constructor(
    private readonly model: SpeechModel,
    options: Partial<TranscriptionQueueOptions> = {},
    private readonly logger?: StructuredLogger
  ) {
    this.options = { ...DEFAULT_OPTIONS, ...options };
  }

  public size(): number {
    return this.waiting.length;
  }

  public activeCount(): number {
    return this.inFlight.size;
  }

  public enqueue(job: TranscriptionJob): void {
    this.waiting.push({ ...job, enqueuedAt: Date.now(), cancelled: false });
    this.pump();
  }

  /**
   * Drops waiting jobs that match and silences matching in-flight ones: their
   * model call is left to finish, but no retry runs and `onResult` is skipped.
   */
  public cancel(predicate: (chunk: Chunk) => boolean = () => true): number {
    const kept: QueuedJob[] = [];
    let cancelled = 0;

    for (const job of this.waiting) {
      if (predicate(job.chunk)) {
        cancelled += 1;
      } else {
        kept.push(job);
      }
    }
    this.waiting = kept;

    for (const job of this.inFlight) {
      if (!job.cancelled && predicate(job.chunk)) {
        job.cancelled = true;
        cancelled += 1;
      }
    }

    this.notifyIdle();
    return cancelled;
  }

  /** Resolves once nothing is waiting and no uncancelled job is running. */
  public onIdle(): Promise<void> {
    if (this.isIdle()) {
      return Promise.resolve();
    }

    return new Promise<void>((resolve) => {
      this.idleWaiters.push(resolve);
    });
  }

  /** Waits for every started worker, cancelled ones included. */
  public async settled(): Promise<void> {
    while (this.running.size > 0) {
      await Promise.all(this.running);
    }
  }

  private isIdle(): boolean {
    if (this.waiting.length > 0) {
      return false;
    }

    for (const job of this.inFlight) {
      if (!job.cancelled) {
        return false;
      }
    }

    return true;
  }

  private pump(): void {
    while (this.inFlight.size < this.options.concurrency && this.waiting.length > 0) {
      const job = this.waiting.shift();
      if (!job) {
        break;
      }

      this.inFlight.add(job);
      const worker = this.run(job).finally(() => {
        this.inFlight.delete(job);
        this.running.delete(worker);
        this.pump();
        this.notifyIdle();
      });
      this.running.add(worker);
    }
  }

  private async run(job: QueuedJob): Promise<void> {
    const { chunk } = job;
    const startedAt = Date.now();
    const audioMs = chunk.endMs - chunk.startMs;
    let attempts = 0;
    let text: string | undefined;
    let lastError = '';

    if (chunk.voicedMs <= 0) {
      this.logger?.debug('Skipping model call for silent chunk', {
        sessionId: chunk.sessionId,
        seq: chunk.seq,
        audioMs
      });
      text = '';
    }

    while (text === undefined && attempts < this.options.maxAttempts && !job.cancelled) {
      attempts += 1;

      try {
        const result = await this.model.transcribe(chunk.storagePath, chunk.language);
        text = result.text;
      } catch (error) {
        lastError = describeError(error);
        this.logger?.warn('Chunk transcription attempt failed', {
          sessionId: chunk.sessionId,
          seq: chunk.seq,
          attempt: attempts,
          detail: lastError
        });
      }
    }

    if (job.cancelled) {
      this.logger?.debug('Discarding result of cancelled chunk', {
        sessionId: chunk.sessionId,
        generation: chunk.generation,
        seq: chunk.seq
      });
      return;
    }

    const result: TranscriptionResult =
      text !== undefined
        ? {
            sessionId: chunk.sessionId,
            generation: chunk.generation,
            seq: chunk.seq,
            text,
            status: 'OK',
            attempts
          }
        : {
            sessionId: chunk.sessionId,
            generation: chunk.generation,
            seq: chunk.seq,
            text: '',
            status: 'FAILED',
            attempts,
            error: new ChunkTranscriptionFailure(chunk.seq, attempts, lastError).message
          };

    if (result.status === 'FAILED') {
      this.logger?.error('Chunk transcription failed; recording a gap', {
        sessionId: chunk.sessionId,
        seq: chunk.seq,
        attempts,
        detail: lastError
      });
    }

    try {
      job.onResult(result, {
        queueMs: Math.max(0, startedAt - job.enqueuedAt),
        modelMs: Date.now() - startedAt,
        audioMs
      });
    } catch (error) {
      this.logger?.error('Transcription result handler failed', {
        seq: chunk.seq,
        detail: describeError(error)
      });
    }
  }

  private notifyIdle(): void {
    if (!this.isIdle() || this.idleWaiters.length === 0) {
      return;
    }

    const waiters = this.idleWaiters;
    this.idleWaiters = [];
    for (const resolve of waiters) {
      resolve();
    }
  }
}
