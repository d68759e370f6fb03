import type { StructuredLogger } from '../../logging/StructuredLogger';
import type { AsrResult } from '../../types';
import type { SpeechModel } from '../../core/TranscriptionQueue';
import { PersistentJsonWorker } from '../process/PersistentJsonWorker';

const WARMUP_TIMEOUT_MS = 120000;

export interface WorkerSpeechModelOptions {
  command: string;
  args: string[];
  timeoutMs: number;
  env?: NodeJS.ProcessEnv;
}

/** Narrows a worker `result` payload; anything without a string `text` reads as silence. */
export const toAsrResult = (value: unknown): AsrResult => {
  if (typeof value !== 'object' || value === null) {
    return { text: '' };
  }

  const text = 'text' in value && typeof value.text === 'string' ? value.text : '';
  const language = 'language' in value && typeof value.language === 'string' ? value.language : undefined;
  const durationSeconds =
    'durationSeconds' in value && typeof value.durationSeconds === 'number' ? value.durationSeconds : undefined;

  return { text, language, durationSeconds };
};

/**
 * Speech model behind a persistent JSON-lines worker process:
 * `{"id","action":"transcribe","audio","language"}` in,
 * `{"id","ok","result":{"text"}}` out.
 */
export class WorkerSpeechModel implements SpeechModel {
  private readonly worker: PersistentJsonWorker;

  public constructor(
    private readonly options: WorkerSpeechModelOptions,
    logger?: StructuredLogger
  ) {
    this.worker = new PersistentJsonWorker({
      name: 'asr',
      command: options.command,
      args: options.args,
      env: options.env ?? { ...process.env },
      logger
    });
  }

  public async warmup(): Promise<void> {
    await this.worker.start();
    await this.worker.request({ action: 'warmup' }, WARMUP_TIMEOUT_MS);
  }

  public async transcribe(audioPath: string, language: string): Promise<AsrResult> {
    const response = await this.worker.request(
      {
        action: 'transcribe',
        audio: audioPath,
        language
      },
      this.options.timeoutMs
    );

    return toAsrResult(response);
  }

  public async shutdown(): Promise<void> {
    await this.worker.stop();
  }
}
