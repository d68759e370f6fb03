#!/usr/bin/env node
import { resolveConfig, validateConfig } from './config';
import { runStartupChecks } from './bootstrap/startupChecks';
import { ChunkStore } from './core/ChunkStore';
import { LongformEngine } from './core/LongformEngine';
import { describeError } from './errors';
import { StructuredLogger } from './logging/StructuredLogger';
import { createSpeechModel } from './services/asr/createSpeechModel';
import { FfmpegRecorder } from './services/capture/FfmpegRecorder';
import { CommandServer } from './services/commands/CommandServer';
import { TextInjector } from './services/inject/TextInjector';
import { runCommand } from './services/process/runCommand';
import type { AppConfig, UiRequestKind } from './types';

let logger: StructuredLogger | undefined;

const runUiCommand = (config: AppConfig, appLogger: StructuredLogger, kind: UiRequestKind): void => {
  if (!config.uiCommand.trim()) {
    appLogger.info('UI requested but LONGSCRIBE_UI_COMMAND is not set', { kind });
    return;
  }

  const [command, ...args] = config.uiCommand.trim().split(/\s+/);
  runCommand(command, [...args, kind], { timeoutMs: 10 * 60 * 1000 }).catch((error: unknown) => {
    appLogger.warn('UI command failed', { kind, detail: describeError(error) });
  });
};

const bootstrap = async (): Promise<void> => {
  const config = resolveConfig();
  const configErrors = validateConfig(config);

  if (configErrors.length > 0) {
    throw new Error(`Invalid Longscribe configuration:\n- ${configErrors.join('\n- ')}`);
  }

  const appLogger = await StructuredLogger.create(config.logDir);
  logger = appLogger;
  appLogger.info('Longscribe bootstrap started', {
    logPath: appLogger.getLogPath(),
    asrBackend: config.asrBackend,
    chunkDir: config.chunkDir
  });

  const store = new ChunkStore(config.chunkDir, appLogger.child('store'));
  await runStartupChecks(config, store, appLogger);

  const engine = new LongformEngine(
    {
      recorder: new FfmpegRecorder(config.ffmpegBin, config.ffmpegInputFormat, appLogger.child('recorder')),
      model: createSpeechModel(config, appLogger.child('asr')),
      injector: new TextInjector({
        pasteDelayMs: config.pasteDelayMs,
        retryCount: config.injectionRetryCount,
        retryDelayMs: 120,
        logger: appLogger.child('inject')
      }),
      store
    },
    config,
    appLogger.child('engine')
  );

  const server = new CommandServer(engine, { host: config.host, port: config.port }, appLogger.child('server'));

  engine.on('uiRequested', (kind) => {
    runUiCommand(config, appLogger, kind);
  });

  engine.on('stateChanged', (state) => {
    process.stdout.write(`[Longscribe] state=${state}\n`);
  });

  engine.on('transcriptReady', (summary) => {
    process.stdout.write(
      `[Longscribe] session ${summary.sessionId}: ${summary.chunkCount} chunk(s), ${summary.failedChunks} gap(s)\n`
    );
  });

  engine.on('sessionDiscarded', (sessionId) => {
    process.stdout.write(`[Longscribe] session ${sessionId} discarded\n`);
  });

  engine.on('staticCompleted', (result) => {
    process.stdout.write(`[Longscribe] transcript written to ${result.outputPath}\n`);
  });

  engine.on('terminated', () => {
    server
      .stop()
      .then(() => appLogger.flush())
      .then(() => {
        process.exit(0);
      })
      .catch((error: unknown) => {
        process.stderr.write(`${describeError(error)}\n`);
        process.exit(1);
      });
  });

  await engine.init();
  await server.start();

  const requestQuit = (): void => {
    engine.dispatch('QUIT').catch((error: unknown) => {
      appLogger.error('Shutdown failed', { detail: describeError(error) });
      process.exit(1);
    });
  };

  process.on('SIGINT', requestQuit);
  process.on('SIGTERM', requestQuit);
};

bootstrap().catch(async (error: unknown) => {
  const detail = describeError(error);
  logger?.error('Fatal bootstrap failure', { detail });
  await logger?.flush();
  process.stderr.write(`Longscribe startup error: ${detail}\n`);
  process.exit(1);
});
