import fs from 'node:fs/promises';
import os from 'node:os';
import { describeError, errorCode } from '../../errors';
import type { StructuredLogger } from '../../logging/StructuredLogger';
import type { AsrResult } from '../../types';
import { type CommandRunner, runCommand } from '../process/runCommand';
import type { SpeechModel } from '../../core/TranscriptionQueue';

export interface WhisperCppOptions {
  binaryPath: string;
  modelPath: string;
  timeoutMs: number;
  threads?: number;
}

/** Runs `whisper-cli` once per chunk and reads the text file it writes beside the audio. */
export class WhisperCppClient implements SpeechModel {
  public constructor(
    private readonly options: WhisperCppOptions,
    private readonly logger?: StructuredLogger,
    private readonly runner: CommandRunner = runCommand
  ) {}

  public async transcribe(audioPath: string, language: string): Promise<AsrResult> {
    const outputBase = audioPath.replace(/\.wav$/i, '');
    const textPath = `${outputBase}.txt`;
    const threads = this.options.threads ?? Math.min(os.cpus().length, 4);

    await this.runner(
      this.options.binaryPath,
      [
        '-m',
        this.options.modelPath,
        '-l',
        language,
        '--output-txt',
        '--no-timestamps',
        '--no-prints',
        '-of',
        outputBase,
        '-t',
        String(threads),
        audioPath
      ],
      { timeoutMs: this.options.timeoutMs }
    );

    let text = '';
    try {
      text = (await fs.readFile(textPath, 'utf8')).trim();
    } catch (error) {
      // No text file means no speech was detected.
      if (errorCode(error) !== 'ENOENT') {
        throw error;
      }
    }

    await fs.unlink(textPath).catch((error: unknown) => {
      if (errorCode(error) !== 'ENOENT') {
        this.logger?.warn('Failed to delete whisper output', { textPath, detail: describeError(error) });
      }
    });

    return { text, language };
  }
}
