import { describe, expect, it } from 'vitest';
import { captureArgs, describeCaptureFailure } from './FfmpegRecorder';

describe('FfmpegRecorder helpers', () => {
  it('asks ffmpeg for raw 16 kHz mono PCM on stdout', () => {
    expect(captureArgs('pulse', 'default')).toEqual([
      '-hide_banner',
      '-loglevel',
      'error',
      '-f',
      'pulse',
      '-i',
      'default',
      '-ac',
      '1',
      '-ar',
      '16000',
      '-f',
      's16le',
      '-acodec',
      'pcm_s16le',
      'pipe:1'
    ]);
  });

  it('explains common capture failures', () => {
    expect(describeCaptureFailure('[avfoundation] Operation not permitted')).toBe(
      'Audio input permission denied. Allow microphone access for the terminal running Longscribe.'
    );
    expect(describeCaptureFailure('default: No such file or directory', 1)).toBe(
      'Audio input device is unavailable. Check LONGSCRIBE_MIC_INPUT, LONGSCRIBE_SYSTEM_AUDIO_INPUT and LONGSCRIBE_FFMPEG_INPUT_FORMAT.'
    );
    expect(describeCaptureFailure('  codec exploded \n', 1)).toBe('Audio capture failed (exit code 1): codec exploded');
    expect(describeCaptureFailure('', null)).toBe('Audio capture failed.');
  });
});
