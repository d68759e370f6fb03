import { EventEmitter } from 'node:events';
import { DeviceError, InvalidCommandError, describeError } from '../errors';
import type { StructuredLogger } from '../logging/StructuredLogger';
import { LatencyTracker } from '../perf/LatencyTracker';
import type { AudioRecorder } from '../services/capture/AudioRecorder';
import { parseCommand } from '../services/commands/parseCommand';
import type { CommandRunner } from '../services/process/runCommand';
import { TranscriptCleaner } from '../services/text/TranscriptCleaner';
import type {
  AppConfig,
  AudioSource,
  Chunk,
  ChunkPolicy,
  Command,
  CommandOutcome,
  EngineState,
  SealedAudio,
  Session,
  SessionSummary,
  TranscriptionResult,
  UiRequestKind
} from '../types';
import type { ChunkStore } from './ChunkStore';
import { Chunker } from './Chunker';
import { StaticFileTranscriber, type StaticTranscriptionResult } from './StaticFileTranscriber';
import { type AssembledPart, TranscriptAssembler, joinParts } from './TranscriptAssembler';
import { type JobTiming, type SpeechModel, TranscriptionQueue } from './TranscriptionQueue';

export type EngineOptions = Pick<
  AppConfig,
  | 'ffmpegBin'
  | 'microphoneInput'
  | 'systemAudioInput'
  | 'frameMs'
  | 'threshold'
  | 'energyMetric'
  | 'minSilenceMs'
  | 'chunkSplitIntervalMs'
  | 'realtimeSplitIntervalMs'
  | 'realtimeMinSilenceMs'
  | 'workers'
  | 'languages'
  | 'autoType'
  | 'autoEnter'
  | 'gapMarker'
  | 'hallucinationPatterns'
>;

export interface TextOutput {
  inject: (text: string) => Promise<void>;
  pressEnter: () => Promise<void>;
}

export interface LongformEngineDependencies {
  recorder: AudioRecorder;
  model: SpeechModel;
  injector: TextOutput;
  store: ChunkStore;
  commandRunner?: CommandRunner;
}

interface Deferred<T> {
  promise: Promise<T>;
  resolve: (value: T) => void;
}

const createDeferred = <T>(): Deferred<T> => {
  let resolve: (value: T) => void = () => undefined;
  const promise = new Promise<T>((res) => {
    resolve = res;
  });
  return { promise, resolve };
};

export declare interface LongformEngine {
  on(event: 'stateChanged', listener: (state: EngineState) => void): this;
  on(event: 'transcriptReady', listener: (summary: SessionSummary) => void): this;
  on(event: 'sessionCompleted', listener: (summary: SessionSummary) => void): this;
  on(event: 'sessionAborted', listener: (detail: string) => void): this;
  on(event: 'sessionDiscarded', listener: (sessionId: number) => void): this;
  on(event: 'uiRequested', listener: (kind: UiRequestKind) => void): this;
  on(event: 'staticCompleted', listener: (result: StaticTranscriptionResult) => void): this;
  on(event: 'staticFailed', listener: (detail: string) => void): this;
  on(event: 'commandRejected', listener: (error: InvalidCommandError) => void): this;
  on(event: 'terminated', listener: () => void): this;
}

/**
 * The one recording engine of the process. Every command runs on a single
 * serial chain; model calls happen on the worker pool and report back through
 * `handleResult`, which discards anything from an older session or generation.
 */
export class LongformEngine extends EventEmitter {
  private state: EngineState = 'IDLE';
  private session: Session | undefined;
  private chunker: Chunker | undefined;
  private readonly assembler: TranscriptAssembler;
  private readonly queue: TranscriptionQueue;
  private readonly staticTranscriber: StaticFileTranscriber;
  private readonly latencyTracker = new LatencyTracker();
  private commandChain: Promise<void> = Promise.resolve();
  private writeChain: Promise<void> = Promise.resolve();
  private typingChain: Promise<void> = Promise.resolve();
  private delivery: Promise<void> = Promise.resolve();
  private completion: Deferred<SessionSummary | undefined> | undefined;
  private staticJob: Promise<void> | undefined;
  private nextSessionId = 1;
  private languageIndex = 0;
  private autoTypeEnabled: boolean;
  private autoEnterEnabled: boolean;
  private realtimeEnabled = false;
  private audioSource: AudioSource = 'microphone';
  private acceptingAudio = false;
  private typedParts = 0;
  private finishing = false;
  private terminated = false;

  public constructor(
    private readonly deps: LongformEngineDependencies,
    private readonly options: EngineOptions,
    private readonly logger?: StructuredLogger
  ) {
    super();
    this.autoTypeEnabled = options.autoType;
    this.autoEnterEnabled = options.autoEnter;

    const cleaner = new TranscriptCleaner(options.hallucinationPatterns);
    this.assembler = new TranscriptAssembler({ gapMarker: options.gapMarker, cleaner });
    this.queue = new TranscriptionQueue(
      deps.model,
      { concurrency: options.workers, maxAttempts: 2 },
      logger?.child('queue')
    );
    this.staticTranscriber = new StaticFileTranscriber(
      {
        ffmpegBin: options.ffmpegBin,
        frameMs: options.frameMs,
        threshold: options.threshold,
        energyMetric: options.energyMetric,
        chunkSplitIntervalMs: options.chunkSplitIntervalMs,
        minSilenceMs: options.minSilenceMs,
        gapMarker: options.gapMarker,
        cleaner
      },
      { queue: this.queue, store: deps.store, runner: deps.commandRunner },
      logger?.child('static')
    );
  }

  public getState(): EngineState {
    return this.state;
  }

  public getSession(): Readonly<Session> | undefined {
    return this.session ? { ...this.session } : undefined;
  }

  public getLanguage(): string {
    return this.options.languages[this.languageIndex] ?? 'en';
  }

  public getAudioSource(): AudioSource {
    return this.audioSource;
  }

  public isRealtimeEnabled(): boolean {
    return this.realtimeEnabled;
  }

  public isTerminated(): boolean {
    return this.terminated;
  }

  /** Seeds session ids from chunk files left on disk and warms the model. */
  public async init(): Promise<void> {
    this.nextSessionId = Math.max(this.nextSessionId, await this.deps.store.nextSessionId());

    try {
      await this.deps.model.warmup?.();
    } catch (error) {
      this.logger?.warn('Speech model warmup failed; the first chunk will pay the startup cost', {
        detail: describeError(error)
      });
    }

    this.logger?.info('Engine ready', {
      nextSessionId: this.nextSessionId,
      language: this.getLanguage(),
      workers: this.options.workers
    });
  }

  /**
   * Queues one command line behind every command received before it. Never
   * rejects: failures come back as an outcome with `ok: false`.
   */
  public dispatch(line: string): Promise<CommandOutcome> {
    const run = this.commandChain.then(() => this.execute(line));
    this.commandChain = run.then(
      () => undefined,
      (error: unknown) => {
        this.logger?.error('Command chain failure', { detail: describeError(error) });
      }
    );
    return run;
  }

  /** Same as `QUIT`, for callers that hold the engine directly. */
  public async teardown(): Promise<void> {
    await this.dispatch('QUIT');
  }

  private async execute(line: string): Promise<CommandOutcome> {
    let command: Command | undefined;

    try {
      command = parseCommand(line);

      if (this.terminated) {
        throw new InvalidCommandError(command.name, 'engine has been shut down');
      }

      const detail = await this.handle(command);
      const outcome: CommandOutcome = { ok: true, command: command.name, state: this.state, detail };
      if (command.name === 'STOP_AND_TRANSCRIBE' && this.completion) {
        outcome.completion = this.completion.promise;
      }

      this.logger?.debug('Command accepted', { command: command.name, state: this.state, detail });
      return outcome;
    } catch (error) {
      const name = command?.name ?? line.trim();
      const detail = describeError(error);

      if (error instanceof InvalidCommandError) {
        this.logger?.warn('Command rejected', { command: name, state: this.state, detail });
        this.emit('commandRejected', error);
      } else {
        this.logger?.error('Command failed', { command: name, state: this.state, detail });
      }

      return { ok: false, command: name, state: this.state, detail };
    }
  }

  private async handle(command: Command): Promise<string | undefined> {
    switch (command.name) {
      case 'START_RECORDING':
        return this.startRecording();
      case 'STOP_AND_TRANSCRIBE':
        return this.stopAndTranscribe();
      case 'RESET_TRANSCRIPTION':
        return this.resetTranscription();
      case 'TOGGLE_LANGUAGE':
        return this.selectLanguage((this.languageIndex + 1) % this.options.languages.length);
      case 'SET_LANGUAGE':
        return this.setLanguage(command.argument);
      case 'TOGGLE_ENTER':
        this.autoEnterEnabled = !this.autoEnterEnabled;
        if (this.session) {
          this.session.autoEnterEnabled = this.autoEnterEnabled;
        }
        return `autoEnter=${this.autoEnterEnabled ? 'on' : 'off'}`;
      case 'TOGGLE_AUTO_TYPE':
        this.autoTypeEnabled = !this.autoTypeEnabled;
        if (this.session) {
          this.session.autoTypeEnabled = this.autoTypeEnabled;
        }
        return `autoType=${this.autoTypeEnabled ? 'on' : 'off'}`;
      case 'TOGGLE_REALTIME_TRANSCRIPTION':
        this.realtimeEnabled = !this.realtimeEnabled;
        return this.session
          ? `realtime=${this.realtimeEnabled ? 'on' : 'off'} (from the next session)`
          : `realtime=${this.realtimeEnabled ? 'on' : 'off'}`;
      case 'TOGGLE_AUDIO_SOURCE':
        return this.toggleAudioSource();
      case 'OPEN_LANGUAGE_MENU':
        return this.requestUi('language-menu');
      case 'OPEN_CONFIG_DIALOG':
        return this.requestUi('config-dialog');
      case 'OPEN_AUDIO_SOURCE_MENU':
        return this.requestUi('audio-source-menu');
      case 'TRANSCRIBE_STATIC':
        return command.argument ? this.startStatic(command.argument) : this.requestUi('static-file-picker');
      case 'QUIT':
        return this.quit();
    }
  }

  private async startRecording(): Promise<string> {
    if (this.state === 'RECORDING' || this.state === 'STOPPING') {
      throw new InvalidCommandError(
        'START_RECORDING',
        `session ${this.session?.sessionId ?? '?'} is still ${this.state.toLowerCase()}`
      );
    }

    if (this.state === 'TERMINAL') {
      await this.delivery;
    }

    await this.purgePreviousChunks();

    const realtime = this.realtimeEnabled;
    const session: Session = {
      sessionId: this.nextSessionId,
      state: 'RECORDING',
      generation: 0,
      nextChunkSeq: 0,
      pendingChunks: 0,
      language: this.getLanguage(),
      autoTypeEnabled: this.autoTypeEnabled,
      autoEnterEnabled: this.autoEnterEnabled,
      realtime,
      discarded: false,
      startedAt: Date.now()
    };
    this.nextSessionId += 1;

    const chunker = new Chunker({
      threshold: this.options.threshold,
      energyMetric: this.options.energyMetric,
      ...this.policyFor(realtime)
    });

    this.session = session;
    this.chunker = chunker;
    this.assembler.clear();
    this.latencyTracker.reset();
    this.typedParts = 0;
    this.typingChain = Promise.resolve();
    this.finishing = false;
    this.completion = createDeferred<SessionSummary | undefined>();
    this.acceptingAudio = true;

    const inputDevice =
      this.audioSource === 'system' ? this.options.systemAudioInput : this.options.microphoneInput;

    try {
      await this.deps.recorder.startStreaming({
        inputDevice,
        frameDurationMs: this.options.frameMs,
        onFrame: (frame) => {
          this.handleFrame(session, chunker, frame);
        },
        onError: (error) => {
          this.dispatchInternal(() => this.abortSession(session, error));
        }
      });
    } catch (error) {
      const deviceError = error instanceof DeviceError ? error : new DeviceError(describeError(error));
      await this.abortSession(session, deviceError);
      throw deviceError;
    }

    this.setState('RECORDING');
    this.logger?.info('Recording started', {
      sessionId: session.sessionId,
      language: session.language,
      realtime,
      audioSource: this.audioSource,
      inputDevice
    });

    return `session ${session.sessionId}`;
  }

  private async stopAndTranscribe(): Promise<string> {
    const session = this.session;
    if (this.state !== 'RECORDING' || !session) {
      throw new InvalidCommandError('STOP_AND_TRANSCRIBE', `not recording (state ${this.state})`);
    }

    await this.stopCapture(session);

    const tail = this.chunker?.flush();
    if (tail) {
      this.submitChunk(session, tail);
    }

    this.setState('STOPPING');
    this.logger?.info('Recording stopped; draining transcription queue', {
      sessionId: session.sessionId,
      chunks: session.nextChunkSeq,
      pendingChunks: session.pendingChunks
    });

    this.maybeFinish();
    return `session ${session.sessionId}: ${session.pendingChunks} chunk(s) pending`;
  }

  private resetTranscription(): string {
    const session = this.session;
    if (!session || (this.state !== 'RECORDING' && this.state !== 'STOPPING')) {
      throw new InvalidCommandError('RESET_TRANSCRIPTION', `no active session (state ${this.state})`);
    }

    const discardedChunks = session.nextChunkSeq;
    session.generation += 1;
    const cancelled = this.queue.cancel((chunk) => chunk.sessionId === session.sessionId);
    this.assembler.clear();
    this.latencyTracker.reset();
    this.typedParts = 0;
    session.nextChunkSeq = 0;
    session.pendingChunks = 0;

    if (this.state === 'RECORDING') {
      this.chunker?.reset();
    } else {
      session.discarded = true;
    }

    this.logger?.info('Transcription reset', {
      sessionId: session.sessionId,
      generation: session.generation,
      discardedChunks,
      cancelledJobs: cancelled,
      state: this.state
    });

    this.maybeFinish();
    return `session ${session.sessionId}: discarded ${discardedChunks} chunk(s)`;
  }

  private selectLanguage(index: number): string {
    this.languageIndex = index;
    const language = this.getLanguage();
    if (this.session) {
      this.session.language = language;
    }

    this.logger?.info('Language changed', { language });
    return `language=${language}`;
  }

  private setLanguage(code: string | undefined): string {
    const index = code ? this.options.languages.indexOf(code) : -1;
    if (index === -1) {
      throw new InvalidCommandError(
        'SET_LANGUAGE',
        `expected one of ${this.options.languages.join(', ')}, got '${code ?? ''}'`
      );
    }

    return this.selectLanguage(index);
  }

  private toggleAudioSource(): string {
    if (this.audioSource === 'microphone' && !this.options.systemAudioInput.trim()) {
      throw new InvalidCommandError('TOGGLE_AUDIO_SOURCE', 'LONGSCRIBE_SYSTEM_AUDIO_INPUT is not configured');
    }

    this.audioSource = this.audioSource === 'microphone' ? 'system' : 'microphone';
    this.logger?.info('Audio source changed', { audioSource: this.audioSource });
    return `audioSource=${this.audioSource}`;
  }

  private requestUi(kind: UiRequestKind): string {
    this.emit('uiRequested', kind);
    return `requested ${kind}`;
  }

  private startStatic(sourcePath: string): string {
    if (this.staticTranscriber.isBusy()) {
      throw new InvalidCommandError('TRANSCRIBE_STATIC', 'a static transcription is already running');
    }

    this.staticJob = this.staticTranscriber.transcribe(sourcePath, this.getLanguage()).then(
      (result) => {
        this.emit('staticCompleted', result);
      },
      (error: unknown) => {
        const detail = describeError(error);
        this.logger?.error('Static transcription failed', { sourcePath, detail });
        this.emit('staticFailed', detail);
      }
    );

    return `transcribing ${sourcePath}`;
  }

  private async quit(): Promise<string> {
    if (this.state === 'TERMINAL') {
      await this.delivery;
    }

    const session = this.session;
    this.terminated = true;

    if (session && this.state === 'RECORDING') {
      await this.stopCapture(session);
      const tail = this.chunker?.flush();
      if (tail) {
        // Persisted for manual recovery; never transcribed.
        this.submitChunk(session, tail);
      }
    }

    await this.writeChain;

    const cancelled = this.queue.cancel();
    this.staticTranscriber.abort();
    await this.staticJob;

    try {
      await this.deps.model.shutdown?.();
    } catch (error) {
      this.logger?.warn('Speech model shutdown failed', { detail: describeError(error) });
    }

    this.session = undefined;
    this.chunker = undefined;
    this.assembler.clear();
    this.completion?.resolve(undefined);
    this.completion = undefined;
    this.setState('IDLE');

    this.logger?.info('Engine terminated', {
      sessionId: session?.sessionId,
      cancelledJobs: cancelled,
      inFlightJobs: this.queue.activeCount()
    });
    this.emit('terminated');

    return `cancelled ${cancelled} job(s)`;
  }

  private handleFrame(session: Session, chunker: Chunker, frame: Buffer): void {
    if (!this.acceptingAudio || this.session !== session || this.chunker !== chunker) {
      return;
    }

    for (const sealed of chunker.push(frame)) {
      this.submitChunk(session, sealed);
    }
  }

  /** Counts the chunk as pending, persists it and hands it to the worker pool. */
  private submitChunk(session: Session, sealed: SealedAudio): void {
    const { sessionId, generation, language } = session;
    session.nextChunkSeq = sealed.seq + 1;
    session.pendingChunks += 1;

    this.logger?.debug('Chunk sealed', {
      sessionId,
      generation,
      seq: sealed.seq,
      startMs: sealed.startMs,
      endMs: sealed.endMs,
      voicedMs: sealed.voicedMs,
      reason: sealed.boundaryReason
    });

    this.writeChain = this.writeChain.then(async () => {
      let storagePath: string;

      try {
        storagePath = await this.deps.store.writeSessionChunk({ sessionId, generation, seq: sealed.seq }, sealed.pcm);
      } catch (error) {
        this.logger?.error('Failed to persist chunk; recording a gap', {
          sessionId,
          seq: sealed.seq,
          detail: describeError(error)
        });
        this.handleResult({
          sessionId,
          generation,
          seq: sealed.seq,
          text: '',
          status: 'FAILED',
          attempts: 0,
          error: describeError(error)
        });
        return;
      }

      if (!this.isCurrent(sessionId, generation)) {
        return;
      }

      const chunk: Chunk = {
        sessionId,
        generation,
        seq: sealed.seq,
        startMs: sealed.startMs,
        endMs: sealed.endMs,
        voicedMs: sealed.voicedMs,
        boundaryReason: sealed.boundaryReason,
        storagePath,
        language
      };

      this.queue.enqueue({
        chunk,
        onResult: (result, timing) => {
          this.handleResult(result, timing);
        }
      });
    });
  }

  private handleResult(result: TranscriptionResult, timing?: JobTiming): void {
    const session = this.session;
    if (!session || !this.isCurrent(result.sessionId, result.generation)) {
      this.logger?.debug('Discarding stale transcription result', {
        sessionId: result.sessionId,
        generation: result.generation,
        seq: result.seq
      });
      return;
    }

    if (timing) {
      this.latencyTracker.push({ ...timing, attempts: result.attempts });
    }

    const appended = this.assembler.accept(result);
    session.pendingChunks -= appended.length;

    if (session.realtime && appended.length > 0) {
      this.typeIncrementally(session, appended);
    }

    this.maybeFinish();
  }

  private typeIncrementally(session: Session, parts: AssembledPart[]): void {
    const text = joinParts(parts);
    if (!text || !session.autoTypeEnabled) {
      return;
    }

    this.typedParts += 1;
    this.typingChain = this.typingChain
      .then(() => this.deps.injector.inject(`${text} `))
      .catch((error: unknown) => {
        this.logger?.warn('Incremental typing failed', { sessionId: session.sessionId, detail: describeError(error) });
      });
  }

  private maybeFinish(): void {
    const session = this.session;
    if (this.state !== 'STOPPING' || !session || session.pendingChunks > 0 || this.finishing) {
      return;
    }

    this.finishing = true;
    this.delivery = this.finishSession(session);
  }

  private async finishSession(session: Session): Promise<void> {
    this.setState('TERMINAL');

    if (session.discarded) {
      this.session = undefined;
      this.chunker = undefined;
      this.setState('IDLE');
      this.logger?.info('Session discarded', {
        sessionId: session.sessionId,
        generation: session.generation,
        elapsedMs: Date.now() - session.startedAt
      });
      this.emit('sessionDiscarded', session.sessionId);
      this.completion?.resolve(undefined);
      this.completion = undefined;
      return;
    }

    const transcript = this.assembler.transcript();
    const delivered = await this.deliver(session, transcript);
    const summary: SessionSummary = {
      sessionId: session.sessionId,
      transcript,
      chunkCount: this.assembler.appendedCount(),
      failedChunks: this.assembler.failedCount(),
      delivered
    };

    this.emit('transcriptReady', summary);
    this.logger?.info('Session completed', {
      sessionId: session.sessionId,
      generation: session.generation,
      chunkCount: summary.chunkCount,
      failedChunks: summary.failedChunks,
      transcriptLength: transcript.length,
      delivered,
      elapsedMs: Date.now() - session.startedAt,
      latencySummary: this.latencyTracker.summarize()
    });

    this.session = undefined;
    this.chunker = undefined;
    this.setState('IDLE');
    this.emit('sessionCompleted', summary);
    this.completion?.resolve(summary);
    this.completion = undefined;
  }

  private async deliver(session: Session, transcript: string): Promise<boolean> {
    try {
      if (session.realtime) {
        await this.typingChain;
        if (this.typedParts > 0 && session.autoEnterEnabled) {
          await this.deps.injector.pressEnter();
        }
        return this.typedParts > 0;
      }

      if (!session.autoTypeEnabled || !transcript) {
        return false;
      }

      await this.deps.injector.inject(transcript);
      if (session.autoEnterEnabled) {
        await this.deps.injector.pressEnter();
      }
      return true;
    } catch (error) {
      this.logger?.error('Transcript delivery failed', {
        sessionId: session.sessionId,
        detail: describeError(error)
      });
      return false;
    }
  }

  private async abortSession(session: Session, error: Error): Promise<void> {
    if (this.session !== session) {
      return;
    }

    const detail = describeError(error);
    this.acceptingAudio = false;
    await this.deps.recorder.stop().catch((stopError: unknown) => {
      this.logger?.warn('Recorder stop after device failure also failed', { detail: describeError(stopError) });
    });
    session.generation += 1;
    this.queue.cancel((chunk) => chunk.sessionId === session.sessionId);
    this.assembler.clear();
    this.session = undefined;
    this.chunker = undefined;
    this.completion?.resolve(undefined);
    this.completion = undefined;
    this.setState('IDLE');

    this.logger?.error('Session aborted', { sessionId: session.sessionId, detail });
    this.emit('sessionAborted', detail);
  }

  private async stopCapture(session: Session): Promise<void> {
    try {
      // Frames flushed by the recorder while stopping still reach the chunker.
      await this.deps.recorder.stop();
    } catch (error) {
      this.logger?.warn('Recorder did not stop cleanly', {
        sessionId: session.sessionId,
        detail: describeError(error)
      });
    } finally {
      this.acceptingAudio = false;
    }
  }

  private async purgePreviousChunks(): Promise<void> {
    try {
      await this.deps.store.purgeSessions();
    } catch (error) {
      this.logger?.warn('Could not purge chunk files of the previous session', { detail: describeError(error) });
    }
  }

  private isCurrent(sessionId: number, generation: number): boolean {
    return (
      !this.terminated &&
      this.session !== undefined &&
      this.session.sessionId === sessionId &&
      this.session.generation === generation
    );
  }

  private policyFor(realtime: boolean): ChunkPolicy {
    return realtime
      ? {
          chunkSplitIntervalMs: this.options.realtimeSplitIntervalMs,
          minSilenceMs: this.options.realtimeMinSilenceMs
        }
      : {
          chunkSplitIntervalMs: this.options.chunkSplitIntervalMs,
          minSilenceMs: this.options.minSilenceMs
        };
  }

  private dispatchInternal(fn: () => Promise<void>): void {
    this.commandChain = this.commandChain.then(fn).catch((error: unknown) => {
      this.logger?.error('Internal engine task failed', { detail: describeError(error) });
    });
  }

  private setState(state: EngineState): void {
    if (this.state === state) {
      return;
    }

    this.state = state;
    if (this.session) {
      this.session.state = state;
    }

    this.emit('stateChanged', state);
    this.logger?.debug('Engine state changed', { state });
  }
}
