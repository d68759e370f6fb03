import net, { type AddressInfo, type Server, type Socket } from 'node:net';
import { describeError } from '../../errors';
import type { StructuredLogger } from '../../logging/StructuredLogger';
import type { CommandOutcome, SessionSummary } from '../../types';

const MAX_LINE_BYTES = 4096;
// Replies still being written when the server stops get this long to finish.
const RESPONSE_DRAIN_MS = 2000;
const SOCKET_CLOSE_GRACE_MS = 1000;

export interface CommandDispatcher {
  dispatch: (line: string) => Promise<CommandOutcome>;
}

export interface CommandServerOptions {
  host: string;
  port: number;
}

export interface CommandReply {
  ok: boolean;
  command: string;
  state: string;
  detail?: string;
}

export interface CompletionEvent {
  event: 'completed' | 'discarded';
  sessionId?: number;
  length?: number;
}

const isAddressInfo = (value: string | AddressInfo | null | undefined): value is AddressInfo =>
  typeof value === 'object' && value !== null;

export const toReply = (outcome: CommandOutcome): CommandReply => ({
  ok: outcome.ok,
  command: outcome.command,
  state: outcome.state,
  detail: outcome.detail
});

export const toCompletionEvent = (summary: SessionSummary | undefined): CompletionEvent =>
  summary
    ? { event: 'completed', sessionId: summary.sessionId, length: summary.transcript.length }
    : { event: 'discarded' };

/**
 * Loopback TCP endpoint: one command line per connection, one JSON reply line,
 * and for an accepted stop a second line once the transcript was delivered.
 */
export class CommandServer {
  private server: Server | undefined;
  private readonly sockets = new Set<Socket>();
  private readonly responses = new Set<Promise<void>>();

  public constructor(
    private readonly dispatcher: CommandDispatcher,
    private readonly options: CommandServerOptions,
    private readonly logger?: StructuredLogger
  ) {}

  public async start(): Promise<number> {
    if (this.server) {
      return this.getPort();
    }

    const server = net.createServer({ allowHalfOpen: true }, (socket) => {
      this.handleConnection(socket);
    });

    await new Promise<void>((resolve, reject) => {
      const onError = (error: Error): void => {
        reject(error);
      };

      server.once('error', onError);
      server.listen(this.options.port, this.options.host, () => {
        server.off('error', onError);
        resolve();
      });
    });

    server.on('error', (error) => {
      this.logger?.error('Command server error', { detail: error.message });
    });

    this.server = server;
    const port = this.getPort();
    this.logger?.info('Command server listening', { host: this.options.host, port });
    return port;
  }

  public getPort(): number {
    const address = this.server?.address();
    return isAddressInfo(address) ? address.port : this.options.port;
  }

  /**
   * Stops accepting connections, lets replies already in progress be written
   * (the QUIT reply and any completion lines it released), then closes.
   */
  public async stop(): Promise<void> {
    const server = this.server;
    if (!server) {
      return;
    }

    this.server = undefined;
    const closed = new Promise<void>((resolve) => {
      server.close(() => {
        resolve();
      });
    });

    await this.drainResponses();

    for (const socket of this.sockets) {
      if (!socket.writableEnded) {
        socket.end();
      }
    }

    const forceTimer = setTimeout(() => {
      for (const socket of this.sockets) {
        socket.destroy();
      }
    }, SOCKET_CLOSE_GRACE_MS);
    await closed;
    clearTimeout(forceTimer);

    this.logger?.info('Command server stopped');
  }

  private async drainResponses(): Promise<void> {
    if (this.responses.size === 0) {
      return;
    }

    let timer: NodeJS.Timeout | undefined;
    const grace = new Promise<void>((resolve) => {
      timer = setTimeout(resolve, RESPONSE_DRAIN_MS);
    });

    await Promise.race([Promise.all(this.responses), grace]);
    clearTimeout(timer);

    if (this.responses.size > 0) {
      this.logger?.warn('Command server stopped with replies still pending', { pending: this.responses.size });
    }
  }

  private handleConnection(socket: Socket): void {
    this.sockets.add(socket);
    socket.setEncoding('utf8');

    let buffer = '';
    let handled = false;

    const handleLine = (line: string): void => {
      if (handled) {
        return;
      }

      handled = true;
      const response = this.respond(socket, line)
        .catch((error: unknown) => {
          this.logger?.error('Command connection failed', { detail: describeError(error) });
          socket.destroy();
        })
        .finally(() => {
          this.responses.delete(response);
        });
      this.responses.add(response);
    };

    socket.on('data', (chunk: string) => {
      if (handled) {
        return;
      }

      buffer += chunk;
      const newlineIndex = buffer.indexOf('\n');
      if (newlineIndex !== -1) {
        handleLine(buffer.slice(0, newlineIndex));
        return;
      }

      if (Buffer.byteLength(buffer) > MAX_LINE_BYTES) {
        handled = true;
        this.writeLine(socket, { ok: false, command: '', state: 'UNKNOWN', detail: 'command line too long' });
        socket.end();
      }
    });

    socket.on('end', () => {
      if (handled) {
        return;
      }

      if (buffer.trim()) {
        handleLine(buffer);
        return;
      }

      handled = true;
      socket.end();
    });

    socket.on('error', (error) => {
      this.logger?.debug('Command client socket error', { detail: error.message });
    });

    socket.on('close', () => {
      this.sockets.delete(socket);
    });
  }

  private async respond(socket: Socket, line: string): Promise<void> {
    const outcome = await this.dispatcher.dispatch(line);
    this.writeLine(socket, toReply(outcome));

    if (outcome.completion) {
      const summary = await outcome.completion;
      this.writeLine(socket, toCompletionEvent(summary));
    }

    if (!socket.destroyed) {
      socket.end();
    }
  }

  private writeLine(socket: Socket, payload: CommandReply | CompletionEvent): void {
    if (socket.destroyed || !socket.writable) {
      return;
    }

    socket.write(`${JSON.stringify(payload)}\n`);
  }
}
