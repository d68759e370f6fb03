import net from 'node:net';
import type { CommandReply, CompletionEvent } from './CommandServer';

export interface SendCommandOptions {
  host: string;
  port: number;
  timeoutMs?: number;
  /** Keep the connection open for the completion line that follows an accepted stop. */
  waitForCompletion?: boolean;
}

export interface SendCommandResult {
  reply: CommandReply;
  completion?: CompletionEvent;
}

const DEFAULT_TIMEOUT_MS = 5000;

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

export const parseReplyLine = (line: string): CommandReply | CompletionEvent => {
  const parsed: unknown = JSON.parse(line);
  if (!isRecord(parsed)) {
    throw new Error(`Unexpected reply: ${line}`);
  }

  if (parsed.event === 'completed' || parsed.event === 'discarded') {
    return {
      event: parsed.event,
      sessionId: typeof parsed.sessionId === 'number' ? parsed.sessionId : undefined,
      length: typeof parsed.length === 'number' ? parsed.length : undefined
    };
  }

  if (typeof parsed.ok !== 'boolean' || typeof parsed.command !== 'string' || typeof parsed.state !== 'string') {
    throw new Error(`Unexpected reply: ${line}`);
  }

  return {
    ok: parsed.ok,
    command: parsed.command,
    state: parsed.state,
    detail: typeof parsed.detail === 'string' ? parsed.detail : undefined
  };
};

const isCompletionEvent = (value: CommandReply | CompletionEvent): value is CompletionEvent => 'event' in value;

/** Sends one command line and collects the reply (plus the completion line when asked for). */
export const sendCommand = (line: string, options: SendCommandOptions): Promise<SendCommandResult> =>
  new Promise((resolve, reject) => {
    const socket = net.createConnection({ host: options.host, port: options.port });
    const timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    let buffer = '';
    let reply: CommandReply | undefined;
    let settled = false;

    const finish = (error: Error | undefined, result?: SendCommandResult): void => {
      if (settled) {
        return;
      }

      settled = true;
      socket.destroy();
      if (error) {
        reject(error);
        return;
      }

      if (result) {
        resolve(result);
      }
    };

    if (timeoutMs > 0) {
      socket.setTimeout(timeoutMs, () => {
        finish(new Error(`No reply from ${options.host}:${options.port} within ${timeoutMs}ms`));
      });
    }

    socket.setEncoding('utf8');
    socket.on('connect', () => {
      socket.write(`${line.trim()}\n`);
    });

    socket.on('data', (chunk: string) => {
      buffer += chunk;

      let newlineIndex = buffer.indexOf('\n');
      while (newlineIndex !== -1) {
        const text = buffer.slice(0, newlineIndex).trim();
        buffer = buffer.slice(newlineIndex + 1);
        newlineIndex = buffer.indexOf('\n');

        if (!text) {
          continue;
        }

        let message: CommandReply | CompletionEvent;
        try {
          message = parseReplyLine(text);
        } catch (error) {
          finish(error instanceof Error ? error : new Error(String(error)));
          return;
        }

        if (isCompletionEvent(message)) {
          if (reply) {
            finish(undefined, { reply, completion: message });
          }
          continue;
        }

        reply = message;
        if (!options.waitForCompletion || !reply.ok || reply.command !== 'STOP_AND_TRANSCRIBE') {
          finish(undefined, { reply });
          return;
        }
      }
    });

    socket.on('end', () => {
      if (reply) {
        finish(undefined, { reply });
        return;
      }

      finish(new Error('Connection closed before a reply was received'));
    });

    socket.on('error', (error) => {
      finish(error);
    });
  });
