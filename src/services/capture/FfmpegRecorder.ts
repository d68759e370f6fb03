import { type ChildProcessByStdio, spawn } from 'node:child_process';
import type { Readable } from 'node:stream';
import { PcmFramer } from '../../audio/PcmFramer';
import { AUDIO_SAMPLE_RATE, msToBytes } from '../../audio/pcm';
import { DeviceError, describeError } from '../../errors';
import type { StructuredLogger } from '../../logging/StructuredLogger';
import type { AudioRecorder, CaptureOptions } from './AudioRecorder';

type CaptureProcess = ChildProcessByStdio<null, Readable, Readable>;

// ffmpeg can accept a device and die a moment later when it cannot open it.
const START_SETTLE_MS = 300;
const STOP_KILL_AFTER_MS = 3000;
const STDERR_TAIL_CHARS = 2000;

export const captureArgs = (inputFormat: string, inputDevice: string): string[] => [
  '-hide_banner',
  '-loglevel',
  'error',
  '-f',
  inputFormat,
  '-i',
  inputDevice,
  '-ac',
  '1',
  '-ar',
  String(AUDIO_SAMPLE_RATE),
  '-f',
  's16le',
  '-acodec',
  'pcm_s16le',
  'pipe:1'
];

/** Turns ffmpeg's stderr into a message the user can act on. */
export const describeCaptureFailure = (stderr: string, exitCode?: number | null): string => {
  const detail = stderr.trim();

  if (/Operation not permitted|not authorized|Permission denied/i.test(detail)) {
    return 'Audio input permission denied. Allow microphone access for the terminal running Longscribe.';
  }

  if (/Input\/output error|No such file|device not found|could not find|Connection refused/i.test(detail)) {
    return 'Audio input device is unavailable. Check LONGSCRIBE_MIC_INPUT, LONGSCRIBE_SYSTEM_AUDIO_INPUT and LONGSCRIBE_FFMPEG_INPUT_FORMAT.';
  }

  const suffix = exitCode === undefined || exitCode === null ? '' : ` (exit code ${exitCode})`;
  return detail ? `Audio capture failed${suffix}: ${detail}` : `Audio capture failed${suffix}.`;
};

interface ActiveCapture {
  child: CaptureProcess;
  framer: PcmFramer;
  onFrame: (frame: Buffer) => void;
  stopping: boolean;
}

/** Captures mono 16 kHz s16le through ffmpeg and hands it on in fixed frames. */
export class FfmpegRecorder implements AudioRecorder {
  private active: ActiveCapture | undefined;

  public constructor(
    private readonly ffmpegBin: string,
    private readonly inputFormat: string,
    private readonly logger?: StructuredLogger
  ) {}

  public isRecording(): boolean {
    return this.active !== undefined;
  }

  public async startStreaming(options: CaptureOptions): Promise<void> {
    if (this.active) {
      throw new DeviceError('Recorder is already capturing');
    }

    const framer = new PcmFramer(Math.max(2, msToBytes(options.frameDurationMs)));
    const child = spawn(this.ffmpegBin, captureArgs(this.inputFormat, options.inputDevice), {
      stdio: ['ignore', 'pipe', 'pipe']
    });
    const capture: ActiveCapture = { child, framer, onFrame: options.onFrame, stopping: false };
    let stderrTail = '';

    child.stderr.setEncoding('utf8');
    child.stderr.on('data', (text: string) => {
      stderrTail = `${stderrTail}${text}`.slice(-STDERR_TAIL_CHARS);
    });

    child.stdout.on('data', (data: Buffer) => {
      for (const frame of framer.push(data)) {
        this.deliver(capture, frame);
      }
    });

    await new Promise<void>((resolve, reject) => {
      const fail = (error: DeviceError): void => {
        clearTimeout(settleTimer);
        child.off('close', onEarlyClose);
        reject(error);
      };

      const onEarlyClose = (code: number | null): void => {
        fail(new DeviceError(describeCaptureFailure(stderrTail, code)));
      };

      const settleTimer = setTimeout(() => {
        child.off('close', onEarlyClose);
        child.off('error', onLaunchError);
        resolve();
      }, START_SETTLE_MS);

      const onLaunchError = (error: Error): void => {
        fail(new DeviceError(`Failed to launch ${this.ffmpegBin}: ${error.message}`));
      };

      child.once('error', onLaunchError);
      child.once('close', onEarlyClose);
    });

    this.active = capture;
    child.on('error', (error) => {
      this.logger?.warn('Capture process error', { detail: error.message });
    });
    child.once('close', (code) => {
      if (this.active !== capture || capture.stopping) {
        return;
      }

      this.active = undefined;
      this.logger?.error('Capture ended while recording', { code, stderr: stderrTail.trim() });
      options.onError(new DeviceError(describeCaptureFailure(stderrTail, code)));
    });

    this.logger?.info('Capture started', {
      inputFormat: this.inputFormat,
      inputDevice: options.inputDevice,
      frameBytes: msToBytes(options.frameDurationMs)
    });
  }

  /** Ends capture; audio still buffered in the pipe is delivered before this resolves. */
  public async stop(): Promise<void> {
    const capture = this.active;
    if (!capture) {
      return;
    }

    capture.stopping = true;
    const { child } = capture;

    const exit = await new Promise<{ code: number | null; signal: NodeJS.Signals | null }>((resolve) => {
      const killTimer = setTimeout(() => {
        child.kill('SIGKILL');
      }, STOP_KILL_AFTER_MS);

      child.once('close', (code, signal) => {
        clearTimeout(killTimer);
        resolve({ code, signal });
      });

      // SIGINT lets ffmpeg flush what it has already read from the device.
      child.kill('SIGINT');
    });

    const tail = capture.framer.drain();
    if (tail) {
      this.deliver(capture, tail);
    }
    this.active = undefined;

    if (exit.code !== null && exit.code !== 0 && exit.code !== 255 && exit.signal === null) {
      throw new DeviceError(`ffmpeg exited with code ${exit.code} while stopping`);
    }

    this.logger?.info('Capture stopped', { code: exit.code, signal: exit.signal });
  }

  private deliver(capture: ActiveCapture, frame: Buffer): void {
    try {
      capture.onFrame(frame);
    } catch (error) {
      this.logger?.warn('Frame handler failed', { detail: describeError(error) });
    }
  }
}
