export type EngineState = 'IDLE' | 'RECORDING' | 'STOPPING' | 'TERMINAL';
export type BoundaryReason = 'SILENCE' | 'MAX_DURATION' | 'FORCED_STOP';
export type TranscriptionStatus = 'OK' | 'FAILED';
export type EnergyMetric = 'peak' | 'rms';
export type AsrBackend = 'worker' | 'whisper-cpp';
export type AudioSource = 'microphone' | 'system';
export type UiRequestKind =
  | 'language-menu'
  | 'config-dialog'
  | 'audio-source-menu'
  | 'static-file-picker';

export type CommandName =
  | 'START_RECORDING'
  | 'STOP_AND_TRANSCRIBE'
  | 'TOGGLE_LANGUAGE'
  | 'SET_LANGUAGE'
  | 'OPEN_LANGUAGE_MENU'
  | 'TOGGLE_ENTER'
  | 'TOGGLE_AUTO_TYPE'
  | 'RESET_TRANSCRIPTION'
  | 'TOGGLE_REALTIME_TRANSCRIPTION'
  | 'TRANSCRIBE_STATIC'
  | 'OPEN_CONFIG_DIALOG'
  | 'OPEN_AUDIO_SOURCE_MENU'
  | 'TOGGLE_AUDIO_SOURCE'
  | 'QUIT';

export interface Command {
  name: CommandName;
  argument?: string;
}

export interface Session {
  sessionId: number;
  state: EngineState;
  generation: number;
  nextChunkSeq: number;
  pendingChunks: number;
  language: string;
  autoTypeEnabled: boolean;
  autoEnterEnabled: boolean;
  realtime: boolean;
  /** Set by a reset while stopping: the session ends without a transcript. */
  discarded: boolean;
  startedAt: number;
}

export interface ChunkPolicy {
  chunkSplitIntervalMs: number;
  minSilenceMs: number;
}

export interface SealedAudio {
  seq: number;
  startMs: number;
  endMs: number;
  voicedMs: number;
  boundaryReason: BoundaryReason;
  pcm: Buffer;
}

export interface Chunk {
  sessionId: number;
  generation: number;
  seq: number;
  startMs: number;
  endMs: number;
  voicedMs: number;
  boundaryReason: BoundaryReason;
  storagePath: string;
  language: string;
}

export interface TranscriptionResult {
  sessionId: number;
  generation: number;
  seq: number;
  text: string;
  status: TranscriptionStatus;
  attempts: number;
  error?: string;
}

export interface AsrResult {
  text: string;
  language?: string;
  durationSeconds?: number;
}

export interface CommandOutcome {
  ok: boolean;
  command: string;
  state: EngineState;
  detail?: string;
  completion?: Promise<SessionSummary | undefined>;
}

export interface SessionSummary {
  sessionId: number;
  transcript: string;
  chunkCount: number;
  failedChunks: number;
  delivered: boolean;
}

export interface AppConfig {
  host: string;
  port: number;
  chunkDir: string;
  logDir: string;
  ffmpegBin: string;
  ffmpegInputFormat: string;
  microphoneInput: string;
  systemAudioInput: string;
  frameMs: number;
  threshold: number;
  energyMetric: EnergyMetric;
  minSilenceMs: number;
  chunkSplitIntervalMs: number;
  realtimeSplitIntervalMs: number;
  realtimeMinSilenceMs: number;
  workers: number;
  asrBackend: AsrBackend;
  asrCommand: string;
  asrArgs: string[];
  asrTimeoutMs: number;
  whisperCppBin: string;
  whisperModelPath: string;
  languages: string[];
  autoType: boolean;
  autoEnter: boolean;
  gapMarker: string;
  hallucinationPatterns: string[];
  pasteDelayMs: number;
  injectionRetryCount: number;
  uiCommand: string;
  hotkeys: string[];
}
