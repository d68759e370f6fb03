import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { msToBytes } from '../../audio/pcm';
import { ChunkStore } from '../../core/ChunkStore';
import { type EngineOptions, LongformEngine, type TextOutput } from '../../core/LongformEngine';
import type { SpeechModel } from '../../core/TranscriptionQueue';
import type { AsrResult, CommandOutcome, SessionSummary } from '../../types';
import type { AudioRecorder, CaptureOptions } from '../capture/AudioRecorder';
import { parseReplyLine, sendCommand } from './CommandClient';
import { CommandServer, type CommandDispatcher, toCompletionEvent } from './CommandServer';

class ScriptedDispatcher implements CommandDispatcher {
  public readonly lines: string[] = [];
  public finish: (summary: SessionSummary | undefined) => void = () => undefined;

  public async dispatch(line: string): Promise<CommandOutcome> {
    this.lines.push(line);

    if (line === 'STOP_AND_TRANSCRIBE') {
      const completion = new Promise<SessionSummary | undefined>((resolve) => {
        this.finish = resolve;
      });
      return { ok: true, command: line, state: 'STOPPING', detail: 'session 4: 2 chunk(s) pending', completion };
    }

    if (line === 'START_RECORDING') {
      return { ok: true, command: line, state: 'RECORDING', detail: 'session 4' };
    }

    return { ok: false, command: line, state: 'IDLE', detail: `${line}: unknown command` };
  }
}

describe('CommandServer', () => {
  let server: CommandServer | undefined;

  afterEach(async () => {
    await server?.stop();
    server = undefined;
  });

  const startServer = async (dispatcher: CommandDispatcher): Promise<number> => {
    server = new CommandServer(dispatcher, { host: '127.0.0.1', port: 0 });
    return server.start();
  };

  it('answers one command with one JSON line', async () => {
    const dispatcher = new ScriptedDispatcher();
    const port = await startServer(dispatcher);

    const result = await sendCommand('START_RECORDING', { host: '127.0.0.1', port });

    expect(result).toEqual({
      reply: { ok: true, command: 'START_RECORDING', state: 'RECORDING', detail: 'session 4' }
    });
    expect(dispatcher.lines).toEqual(['START_RECORDING']);
  });

  it('reports rejected commands', async () => {
    const port = await startServer(new ScriptedDispatcher());

    const result = await sendCommand('  DANCE  ', { host: '127.0.0.1', port });

    expect(result.reply).toEqual({ ok: false, command: 'DANCE', state: 'IDLE', detail: 'DANCE: unknown command' });
  });

  it('sends the completion line once the session is delivered', async () => {
    const dispatcher = new ScriptedDispatcher();
    const port = await startServer(dispatcher);

    const pending = sendCommand('STOP_AND_TRANSCRIBE', { host: '127.0.0.1', port, waitForCompletion: true });
    await expect.poll(() => dispatcher.lines).toEqual(['STOP_AND_TRANSCRIBE']);
    dispatcher.finish({ sessionId: 4, transcript: 'hello there', chunkCount: 2, failedChunks: 0, delivered: true });

    expect(await pending).toEqual({
      reply: { ok: true, command: 'STOP_AND_TRANSCRIBE', state: 'STOPPING', detail: 'session 4: 2 chunk(s) pending' },
      completion: { event: 'completed', sessionId: 4, length: 11 }
    });
  });

  it('returns the first reply without waiting when not asked to', async () => {
    const dispatcher = new ScriptedDispatcher();
    const port = await startServer(dispatcher);

    const result = await sendCommand('STOP_AND_TRANSCRIBE', { host: '127.0.0.1', port });

    expect(result.reply.state).toBe('STOPPING');
    expect(result.completion).toBeUndefined();
    dispatcher.finish(undefined);
  });

  it('fails fast when nothing listens', async () => {
    const port = await startServer(new ScriptedDispatcher());
    await server?.stop();
    server = undefined;

    await expect(sendCommand('QUIT', { host: '127.0.0.1', port })).rejects.toThrow('ECONNREFUSED');
  });
});

class StubRecorder implements AudioRecorder {
  private capture: CaptureOptions | undefined;

  public isRecording(): boolean {
    return this.capture !== undefined;
  }

  public async startStreaming(options: CaptureOptions): Promise<void> {
    this.capture = options;
  }

  public async stop(): Promise<void> {
    this.capture = undefined;
  }

  /** One second of loud audio. */
  public speak(): void {
    const frame = Buffer.alloc(msToBytes(100));
    for (let offset = 0; offset < frame.length; offset += 2) {
      frame.writeInt16LE(offset % 4 === 0 ? 4000 : -4000, offset);
    }
    for (let index = 0; index < 10; index += 1) {
      this.capture?.onFrame(frame);
    }
  }
}

class GatedModel implements SpeechModel {
  public readonly started: Array<(result: AsrResult) => void> = [];
  public gated = false;

  public transcribe(): Promise<AsrResult> {
    if (!this.gated) {
      return Promise.resolve({ text: 'hello there' });
    }

    return new Promise<AsrResult>((resolve) => {
      this.started.push(resolve);
    });
  }

  public releaseAll(): void {
    for (const resolve of this.started) {
      resolve({ text: 'late' });
    }
  }
}

class TypedText implements TextOutput {
  public readonly injected: string[] = [];

  public async inject(text: string): Promise<void> {
    this.injected.push(text);
  }

  public async pressEnter(): Promise<void> {
    this.injected.push('<enter>');
  }
}

const ENGINE_OPTIONS: EngineOptions = {
  ffmpegBin: 'ffmpeg',
  microphoneInput: 'default',
  systemAudioInput: '',
  frameMs: 100,
  threshold: 500,
  energyMetric: 'peak',
  minSilenceMs: 1500,
  chunkSplitIntervalMs: 60000,
  realtimeSplitIntervalMs: 1000,
  realtimeMinSilenceMs: 400,
  workers: 1,
  languages: ['en'],
  autoType: true,
  autoEnter: false,
  gapMarker: '[gap {seq}]',
  hallucinationPatterns: []
};

describe('CommandServer with the engine', () => {
  let directory: string;
  let recorder: StubRecorder;
  let model: GatedModel;
  let output: TypedText;
  let engine: LongformEngine;
  let server: CommandServer | undefined;
  let port: number;

  const send = (line: string, waitForCompletion = false) =>
    sendCommand(line, { host: '127.0.0.1', port, waitForCompletion });

  const stopWithWait = async () => {
    await send('START_RECORDING');
    recorder.speak();
    return send('STOP_AND_TRANSCRIBE', true);
  };

  beforeEach(async () => {
    directory = await fs.mkdtemp(path.join(os.tmpdir(), 'longscribe-channel-'));
    recorder = new StubRecorder();
    model = new GatedModel();
    output = new TypedText();
    engine = new LongformEngine(
      { recorder, model, injector: output, store: new ChunkStore(directory) },
      ENGINE_OPTIONS
    );
    server = new CommandServer(engine, { host: '127.0.0.1', port: 0 });
    port = await server.start();
  });

  afterEach(async () => {
    model.releaseAll();
    await server?.stop();
    server = undefined;
    await fs.rm(directory, { recursive: true, force: true });
  });

  it('sends the completed line after the transcript is typed', async () => {
    const result = await stopWithWait();

    expect(result).toEqual({
      reply: {
        ok: true,
        command: 'STOP_AND_TRANSCRIBE',
        state: 'STOPPING',
        detail: 'session 1: 1 chunk(s) pending'
      },
      completion: { event: 'completed', sessionId: 1, length: 11 }
    });
    expect(output.injected).toEqual(['hello there']);
  });

  it('sends the discarded line when the session is reset while stopping', async () => {
    model.gated = true;
    const waiting = stopWithWait();
    await expect.poll(() => model.started.length).toBe(1);

    const reset = await send('RESET_TRANSCRIPTION');

    expect(reset.reply).toEqual({
      ok: true,
      command: 'RESET_TRANSCRIPTION',
      state: 'IDLE',
      detail: 'session 1: discarded 1 chunk(s)'
    });
    expect((await waiting).completion).toEqual({ event: 'discarded' });
    expect(output.injected).toEqual([]);
  });

  it('answers QUIT and releases waiting clients before shutting down', async () => {
    let shutdown: Promise<void> | undefined;
    engine.on('terminated', () => {
      shutdown = server?.stop();
    });
    model.gated = true;
    const waiting = stopWithWait();
    await expect.poll(() => model.started.length).toBe(1);

    const quit = await send('QUIT');

    expect(quit.reply).toEqual({ ok: true, command: 'QUIT', state: 'IDLE', detail: 'cancelled 1 job(s)' });
    expect(await waiting).toEqual({
      reply: {
        ok: true,
        command: 'STOP_AND_TRANSCRIBE',
        state: 'STOPPING',
        detail: 'session 1: 1 chunk(s) pending'
      },
      completion: { event: 'discarded' }
    });
    await shutdown;
    await expect(send('START_RECORDING')).rejects.toThrow('ECONNREFUSED');
  });
});

describe('reply lines', () => {
  it('parses replies and completion events', () => {
    expect(parseReplyLine('{"ok":true,"command":"QUIT","state":"IDLE"}')).toEqual({
      ok: true,
      command: 'QUIT',
      state: 'IDLE',
      detail: undefined
    });
    expect(parseReplyLine('{"event":"discarded"}')).toEqual({
      event: 'discarded',
      sessionId: undefined,
      length: undefined
    });
    expect(() => parseReplyLine('{"ok":"yes"}')).toThrow('Unexpected reply: {"ok":"yes"}');
  });

  it('marks a discarded session', () => {
    expect(toCompletionEvent(undefined)).toEqual({ event: 'discarded' });
  });
});
