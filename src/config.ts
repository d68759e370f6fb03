import path from 'node:path';
import type { AppConfig, AsrBackend, EnergyMetric } from './types';

const DEFAULT_PORT = 34909;
// \b is ASCII-only in JS, so Greek words are delimited with \p{L} lookarounds.
const DEFAULT_HALLUCINATION_PATTERNS = [
  '(?<!\\p{L})Υπότιτλοι\\s+AUTHORWAVE(?!\\p{L})[^\\p{L}\\p{N}]*',
  '(?<!\\p{L})Σας\\s+ευχαριστώ(?!\\p{L})[^\\p{L}\\p{N}]*'
];

const parseIntOrDefault = (value: string | undefined, fallback: number): number => {
  if (!value) {
    return fallback;
  }

  const parsed = Number.parseInt(value, 10);
  return Number.isNaN(parsed) ? fallback : parsed;
};

const parseBoolOrDefault = (value: string | undefined, fallback: boolean): boolean => {
  if (value === undefined) {
    return fallback;
  }

  return value.toLowerCase() === 'true';
};

const parseListOrDefault = (
  value: string | undefined,
  fallback: string[],
  separator: string | RegExp = ','
): string[] => {
  if (value === undefined) {
    return fallback;
  }

  return value
    .split(separator)
    .map((item) => item.trim())
    .filter(Boolean);
};

const resolveAsrBackend = (value: string | undefined): AsrBackend => {
  if (value === 'worker') {
    return 'worker';
  }

  return 'whisper-cpp';
};

const resolveEnergyMetric = (value: string | undefined): EnergyMetric => {
  if (value === 'rms') {
    return 'rms';
  }

  return 'peak';
};

const defaultInputFormat = (platform: NodeJS.Platform): string => {
  if (platform === 'darwin') {
    return 'avfoundation';
  }

  if (platform === 'win32') {
    return 'dshow';
  }

  return 'pulse';
};

const defaultMicrophoneInput = (platform: NodeJS.Platform): string => {
  if (platform === 'darwin') {
    return ':0';
  }

  if (platform === 'win32') {
    return 'audio=Microphone';
  }

  return 'default';
};

export const resolveConfig = (
  env: NodeJS.ProcessEnv = process.env,
  platform: NodeJS.Platform = process.platform
): AppConfig => {
  const rootDir = path.resolve(__dirname, '..');

  return {
    host: env.LONGSCRIBE_HOST ?? '127.0.0.1',
    port: parseIntOrDefault(env.LONGSCRIBE_PORT, DEFAULT_PORT),
    chunkDir: env.LONGSCRIBE_CHUNK_DIR ?? path.join(rootDir, 'chunks'),
    logDir: env.LONGSCRIBE_LOG_DIR ?? path.join(rootDir, 'logs'),
    ffmpegBin: env.LONGSCRIBE_FFMPEG_BIN ?? 'ffmpeg',
    ffmpegInputFormat: env.LONGSCRIBE_FFMPEG_INPUT_FORMAT ?? defaultInputFormat(platform),
    microphoneInput: env.LONGSCRIBE_MIC_INPUT ?? defaultMicrophoneInput(platform),
    systemAudioInput: env.LONGSCRIBE_SYSTEM_AUDIO_INPUT ?? '',
    frameMs: parseIntOrDefault(env.LONGSCRIBE_FRAME_MS, 64),
    threshold: parseIntOrDefault(env.LONGSCRIBE_THRESHOLD, 500),
    energyMetric: resolveEnergyMetric(env.LONGSCRIBE_ENERGY_METRIC),
    minSilenceMs: parseIntOrDefault(env.LONGSCRIBE_MIN_SILENCE_MS, 1500),
    chunkSplitIntervalMs: parseIntOrDefault(env.LONGSCRIBE_CHUNK_SPLIT_INTERVAL_MS, 60000),
    realtimeSplitIntervalMs: parseIntOrDefault(env.LONGSCRIBE_REALTIME_SPLIT_INTERVAL_MS, 5000),
    realtimeMinSilenceMs: parseIntOrDefault(env.LONGSCRIBE_REALTIME_MIN_SILENCE_MS, 400),
    workers: parseIntOrDefault(env.LONGSCRIBE_WORKERS, 1),
    asrBackend: resolveAsrBackend(env.LONGSCRIBE_ASR_BACKEND),
    asrCommand: env.LONGSCRIBE_ASR_COMMAND ?? '',
    asrArgs: parseListOrDefault(env.LONGSCRIBE_ASR_ARGS, [], /\s+/),
    asrTimeoutMs: parseIntOrDefault(env.LONGSCRIBE_ASR_TIMEOUT_MS, 300000),
    whisperCppBin: env.LONGSCRIBE_WHISPER_CPP_BIN ?? 'whisper-cli',
    whisperModelPath:
      env.LONGSCRIBE_WHISPER_MODEL_PATH ?? path.join(rootDir, 'models', 'ggml-large-v3.bin'),
    languages: parseListOrDefault(env.LONGSCRIBE_LANGUAGES, ['el', 'en']),
    autoType: parseBoolOrDefault(env.LONGSCRIBE_AUTO_TYPE, true),
    autoEnter: parseBoolOrDefault(env.LONGSCRIBE_AUTO_ENTER, false),
    gapMarker: env.LONGSCRIBE_GAP_MARKER ?? '[untranscribed audio: chunk {seq}]',
    hallucinationPatterns: parseListOrDefault(
      env.LONGSCRIBE_HALLUCINATION_PATTERNS,
      DEFAULT_HALLUCINATION_PATTERNS,
      '|||'
    ),
    pasteDelayMs: parseIntOrDefault(env.LONGSCRIBE_PASTE_DELAY_MS, 80),
    injectionRetryCount: parseIntOrDefault(env.LONGSCRIBE_INJECTION_RETRY_COUNT, 2),
    uiCommand: env.LONGSCRIBE_UI_COMMAND ?? '',
    hotkeys: parseListOrDefault(env.LONGSCRIBE_HOTKEYS, [])
  };
};

const isValidPattern = (source: string): boolean => {
  try {
    new RegExp(source, 'giu');
    return true;
  } catch {
    return false;
  }
};

export const validateConfig = (config: AppConfig): string[] => {
  const errors: string[] = [];

  if (!config.host.trim()) {
    errors.push('LONGSCRIBE_HOST must not be empty.');
  }

  if (config.port < 1 || config.port > 65535) {
    errors.push('LONGSCRIBE_PORT must be between 1 and 65535.');
  }

  if (!config.chunkDir.trim()) {
    errors.push('LONGSCRIBE_CHUNK_DIR must not be empty.');
  }

  if (!config.microphoneInput.trim()) {
    errors.push('LONGSCRIBE_MIC_INPUT must not be empty.');
  }

  if (config.frameMs < 10 || config.frameMs > 500) {
    errors.push('LONGSCRIBE_FRAME_MS must be between 10 and 500 milliseconds.');
  }

  if (config.threshold < 1 || config.threshold > 32767) {
    errors.push('LONGSCRIBE_THRESHOLD must be between 1 and 32767.');
  }

  if (config.minSilenceMs < config.frameMs || config.minSilenceMs > 30000) {
    errors.push('LONGSCRIBE_MIN_SILENCE_MS must be between LONGSCRIBE_FRAME_MS and 30000 milliseconds.');
  }

  if (config.chunkSplitIntervalMs < 1000 || config.chunkSplitIntervalMs > 600000) {
    errors.push('LONGSCRIBE_CHUNK_SPLIT_INTERVAL_MS must be between 1000 and 600000 milliseconds.');
  }

  if (config.realtimeSplitIntervalMs < 500 || config.realtimeSplitIntervalMs > config.chunkSplitIntervalMs) {
    errors.push(
      'LONGSCRIBE_REALTIME_SPLIT_INTERVAL_MS must be at least 500 and not above LONGSCRIBE_CHUNK_SPLIT_INTERVAL_MS.'
    );
  }

  if (config.realtimeMinSilenceMs < config.frameMs || config.realtimeMinSilenceMs > config.minSilenceMs) {
    errors.push(
      'LONGSCRIBE_REALTIME_MIN_SILENCE_MS must be between LONGSCRIBE_FRAME_MS and LONGSCRIBE_MIN_SILENCE_MS.'
    );
  }

  if (config.workers < 1 || config.workers > 8) {
    errors.push('LONGSCRIBE_WORKERS must be between 1 and 8.');
  }

  if (config.asrBackend === 'worker' && !config.asrCommand.trim()) {
    errors.push('LONGSCRIBE_ASR_COMMAND must not be empty when LONGSCRIBE_ASR_BACKEND=worker.');
  }

  if (config.asrBackend === 'whisper-cpp' && !config.whisperModelPath.trim()) {
    errors.push('LONGSCRIBE_WHISPER_MODEL_PATH must not be empty when LONGSCRIBE_ASR_BACKEND=whisper-cpp.');
  }

  if (config.asrTimeoutMs < 1000) {
    errors.push('LONGSCRIBE_ASR_TIMEOUT_MS must be at least 1000 milliseconds.');
  }

  if (config.languages.length === 0) {
    errors.push('LONGSCRIBE_LANGUAGES must list at least one language code.');
  }

  if (config.pasteDelayMs < 0 || config.pasteDelayMs > 2000) {
    errors.push('LONGSCRIBE_PASTE_DELAY_MS must be between 0 and 2000 milliseconds.');
  }

  if (config.injectionRetryCount < 1 || config.injectionRetryCount > 8) {
    errors.push('LONGSCRIBE_INJECTION_RETRY_COUNT must be between 1 and 8.');
  }

  for (const pattern of config.hallucinationPatterns) {
    if (!isValidPattern(pattern)) {
      errors.push(`LONGSCRIBE_HALLUCINATION_PATTERNS contains an invalid pattern: ${pattern}`);
    }
  }

  return errors;
};
