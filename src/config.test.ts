import { describe, expect, it } from 'vitest';
import { resolveConfig, validateConfig } from './config';

describe('resolveConfig', () => {
  it('uses defaults when nothing is set', () => {
    const config = resolveConfig({}, 'linux');

    expect(config.host).toBe('127.0.0.1');
    expect(config.port).toBe(34909);
    expect(config.ffmpegInputFormat).toBe('pulse');
    expect(config.microphoneInput).toBe('default');
    expect(config.chunkSplitIntervalMs).toBe(60000);
    expect(config.asrBackend).toBe('whisper-cpp');
    expect(config.languages).toEqual(['el', 'en']);
    expect(config.hotkeys).toEqual([]);
    expect(validateConfig(config)).toEqual([]);
  });

  it('picks the capture format for the platform', () => {
    expect(resolveConfig({}, 'darwin').ffmpegInputFormat).toBe('avfoundation');
    expect(resolveConfig({}, 'win32').microphoneInput).toBe('audio=Microphone');
  });

  it('reads values from the environment', () => {
    const config = resolveConfig(
      {
        LONGSCRIBE_PORT: '4100',
        LONGSCRIBE_LANGUAGES: 'en, de ,',
        LONGSCRIBE_ASR_BACKEND: 'worker',
        LONGSCRIBE_ASR_COMMAND: 'python3',
        LONGSCRIBE_ASR_ARGS: 'worker.py  --device cpu',
        LONGSCRIBE_AUTO_ENTER: 'TRUE',
        LONGSCRIBE_HALLUCINATION_PATTERNS: 'one|||two',
        LONGSCRIBE_HOTKEYS: 'F3=START_RECORDING,F4=STOP_AND_TRANSCRIBE',
        LONGSCRIBE_WORKERS: 'many'
      },
      'linux'
    );

    expect(config.port).toBe(4100);
    expect(config.languages).toEqual(['en', 'de']);
    expect(config.asrBackend).toBe('worker');
    expect(config.asrArgs).toEqual(['worker.py', '--device', 'cpu']);
    expect(config.autoEnter).toBe(true);
    expect(config.hallucinationPatterns).toEqual(['one', 'two']);
    expect(config.hotkeys).toEqual(['F3=START_RECORDING', 'F4=STOP_AND_TRANSCRIBE']);
    expect(config.workers).toBe(1);
  });
});

describe('validateConfig', () => {
  it('reports each invalid setting', () => {
    const config = {
      ...resolveConfig({}, 'linux'),
      port: 0,
      languages: [],
      asrBackend: 'worker' as const,
      asrCommand: ' ',
      hallucinationPatterns: ['(unclosed']
    };

    expect(validateConfig(config)).toEqual([
      'LONGSCRIBE_PORT must be between 1 and 65535.',
      'LONGSCRIBE_ASR_COMMAND must not be empty when LONGSCRIBE_ASR_BACKEND=worker.',
      'LONGSCRIBE_LANGUAGES must list at least one language code.',
      'LONGSCRIBE_HALLUCINATION_PATTERNS contains an invalid pattern: (unclosed'
    ]);
  });

  it('keeps the realtime policy inside the normal one', () => {
    const config = { ...resolveConfig({}, 'linux'), realtimeSplitIntervalMs: 90000 };

    expect(validateConfig(config)).toEqual([
      'LONGSCRIBE_REALTIME_SPLIT_INTERVAL_MS must be at least 500 and not above LONGSCRIBE_CHUNK_SPLIT_INTERVAL_MS.'
    ]);
  });
});
