import fs from 'node:fs';
import { constants as fsConstants } from 'node:fs';
import path from 'node:path';
import type { ChunkStore } from '../core/ChunkStore';
import { describeError } from '../errors';
import type { StructuredLogger } from '../logging/StructuredLogger';
import { type CommandRunner, runCommand } from '../services/process/runCommand';
import type { AppConfig } from '../types';

export interface StartupReport {
  warnings: string[];
}

const checkExecutable = async (
  runner: CommandRunner,
  command: string,
  args: string[],
  label: string
): Promise<string | undefined> => {
  if (path.isAbsolute(command)) {
    try {
      fs.accessSync(command, fsConstants.X_OK);
    } catch {
      return `${label} is not executable at '${command}'.`;
    }
  }

  try {
    await runner(command, args, { timeoutMs: 8000 });
    return undefined;
  } catch (error) {
    return `${label} check failed (${command}): ${describeError(error)}`;
  }
};

/**
 * A chunk directory that cannot be written is fatal. Missing tools and
 * models only produce warnings: commands that need them fail on their own.
 */
export const runStartupChecks = async (
  config: AppConfig,
  store: ChunkStore,
  logger: StructuredLogger,
  runner: CommandRunner = runCommand
): Promise<StartupReport> => {
  logger.info('Running startup checks');

  await store.ensureWritable();

  const warnings: string[] = [];
  const ffmpegWarning = await checkExecutable(runner, config.ffmpegBin, ['-version'], 'ffmpeg');
  if (ffmpegWarning) {
    warnings.push(ffmpegWarning);
  }

  if (config.asrBackend === 'whisper-cpp') {
    if (!fs.existsSync(path.resolve(config.whisperModelPath))) {
      warnings.push(
        `Whisper model not found at '${config.whisperModelPath}'. Update LONGSCRIBE_WHISPER_MODEL_PATH.`
      );
    }

    const whisperWarning = await checkExecutable(runner, config.whisperCppBin, ['--help'], 'whisper.cpp CLI');
    if (whisperWarning) {
      warnings.push(whisperWarning);
    }
  } else if (path.isAbsolute(config.asrCommand) && !fs.existsSync(config.asrCommand)) {
    warnings.push(`ASR worker command not found at '${config.asrCommand}'. Update LONGSCRIBE_ASR_COMMAND.`);
  }

  for (const warning of warnings) {
    logger.warn('Startup check warning', { detail: warning });
  }

  logger.info('Startup checks completed', { warnings: warnings.length, chunkDir: store.getDirectory() });
  return { warnings };
};
