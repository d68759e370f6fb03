import type { SpeechModel } from '../../core/TranscriptionQueue';
import type { StructuredLogger } from '../../logging/StructuredLogger';
import type { AppConfig } from '../../types';
import { WhisperCppClient } from './WhisperCppClient';
import { WorkerSpeechModel } from './WorkerSpeechModel';

export const createSpeechModel = (config: AppConfig, logger?: StructuredLogger): SpeechModel => {
  if (config.asrBackend === 'worker') {
    return new WorkerSpeechModel(
      {
        command: config.asrCommand,
        args: config.asrArgs,
        timeoutMs: config.asrTimeoutMs
      },
      logger
    );
  }

  return new WhisperCppClient(
    {
      binaryPath: config.whisperCppBin,
      modelPath: config.whisperModelPath,
      timeoutMs: config.asrTimeoutMs
    },
    logger
  );
};
