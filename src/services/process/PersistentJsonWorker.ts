import { type ChildProcessWithoutNullStreams, spawn } from 'node:child_process';
import { type Interface, createInterface } from 'node:readline';
import type { StructuredLogger } from '../../logging/StructuredLogger';

export interface WorkerResponse {
  id: string;
  ok: boolean;
  result: unknown;
  error?: string;
}

interface InFlightRequest {
  settle: (error: Error | undefined, result?: unknown) => void;
  timer: NodeJS.Timeout;
}

export interface PersistentJsonWorkerOptions {
  /** Used as the prefix of log lines and error messages. */
  name: string;
  command: string;
  args: string[];
  env?: NodeJS.ProcessEnv;
  logger?: StructuredLogger;
}

const STDERR_TAIL_CHARS = 4000;
const STOP_GRACE_MS = 1500;

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

/** Reads one stdout line; anything that is not a JSON object with an `id` is log noise. */
export const parseWorkerResponse = (line: string): WorkerResponse | undefined => {
  let parsed: unknown;
  try {
    parsed = JSON.parse(line);
  } catch {
    return undefined;
  }

  if (!isRecord(parsed) || typeof parsed.id !== 'string' || !parsed.id) {
    return undefined;
  }

  return {
    id: parsed.id,
    ok: parsed.ok !== false,
    result: parsed.result,
    error: typeof parsed.error === 'string' ? parsed.error : undefined
  };
};

/**
 * A long-lived child process speaking JSON lines: one request object per line
 * on stdin, one response per line on stdout, matched by `id`. The process is
 * spawned on first use and again after it exits.
 */
export class PersistentJsonWorker {
  private child: ChildProcessWithoutNullStreams | undefined;
  private lines: Interface | undefined;
  private spawning: Promise<ChildProcessWithoutNullStreams> | undefined;
  private readonly inFlight = new Map<string, InFlightRequest>();
  private requestCounter = 0;
  private stderrTail = '';
  private stopRequested = false;

  public constructor(private readonly options: PersistentJsonWorkerOptions) {}

  public isRunning(): boolean {
    return this.child !== undefined;
  }

  public async start(): Promise<void> {
    await this.ensureChild();
  }

  /** Resolves with the response's `result` field, unvalidated. */
  public async request(payload: Record<string, unknown>, timeoutMs: number): Promise<unknown> {
    const child = await this.ensureChild();
    this.requestCounter += 1;
    const id = `${process.pid}-${this.requestCounter}`;

    return new Promise<unknown>((resolve, reject) => {
      const timer = setTimeout(() => {
        this.inFlight.delete(id);
        reject(new Error(`${this.options.name} worker request timed out after ${timeoutMs}ms`));
      }, timeoutMs);

      this.inFlight.set(id, {
        timer,
        settle: (error, result) => {
          clearTimeout(timer);
          this.inFlight.delete(id);
          if (error) {
            reject(error);
          } else {
            resolve(result);
          }
        }
      });

      child.stdin.write(`${JSON.stringify({ ...payload, id })}\n`, (error) => {
        if (error) {
          this.inFlight.get(id)?.settle(error);
        }
      });
    });
  }

  public async stop(): Promise<void> {
    this.stopRequested = true;
    const child = this.child;
    if (!child) {
      return;
    }

    await new Promise<void>((resolve) => {
      const killTimer = setTimeout(() => {
        child.kill('SIGKILL');
        resolve();
      }, STOP_GRACE_MS);

      child.once('close', () => {
        clearTimeout(killTimer);
        resolve();
      });

      child.kill('SIGTERM');
    });

    this.detach();
  }

  private async ensureChild(): Promise<ChildProcessWithoutNullStreams> {
    if (this.child) {
      return this.child;
    }

    if (!this.spawning) {
      this.spawning = this.spawnChild().finally(() => {
        this.spawning = undefined;
      });
    }

    return this.spawning;
  }

  private spawnChild(): Promise<ChildProcessWithoutNullStreams> {
    this.stopRequested = false;
    this.stderrTail = '';

    return new Promise((resolve, reject) => {
      const child = spawn(this.options.command, this.options.args, {
        env: this.options.env,
        stdio: 'pipe'
      });

      child.once('error', reject);
      child.once('spawn', () => {
        child.off('error', reject);
        child.on('error', (error) => {
          this.options.logger?.warn(`${this.options.name} worker process error`, { detail: error.message });
        });

        this.attach(child);
        this.options.logger?.info(`${this.options.name} worker started`, {
          command: this.options.command,
          pid: child.pid
        });
        resolve(child);
      });
    });
  }

  private attach(child: ChildProcessWithoutNullStreams): void {
    this.child = child;
    this.lines = createInterface({ input: child.stdout });
    this.lines.on('line', (line) => {
      this.handleLine(line.trim());
    });

    child.stderr.setEncoding('utf8');
    child.stderr.on('data', (text: string) => {
      this.stderrTail = `${this.stderrTail}${text}`.slice(-STDERR_TAIL_CHARS);
      this.options.logger?.debug(`${this.options.name} worker stderr`, { detail: text.trim() });
    });

    child.once('close', (code, signal) => {
      const context = { code, signal, stderr: this.stderrTail.trim() };
      if (this.stopRequested) {
        this.options.logger?.info(`${this.options.name} worker stopped`, context);
      } else {
        this.options.logger?.warn(`${this.options.name} worker exited`, context);
      }

      if (this.child === child) {
        this.detach();
      }

      const exitError = new Error(`${this.options.name} worker exited (code=${code}, signal=${signal ?? 'none'})`);
      for (const request of Array.from(this.inFlight.values())) {
        request.settle(exitError);
      }
    });
  }

  private detach(): void {
    this.lines?.close();
    this.lines = undefined;
    this.child = undefined;
  }

  private handleLine(line: string): void {
    if (!line) {
      return;
    }

    const response = parseWorkerResponse(line);
    if (!response) {
      this.options.logger?.debug(`${this.options.name} worker emitted unrecognised line`, { line });
      return;
    }

    const request = this.inFlight.get(response.id);
    if (!request) {
      this.options.logger?.debug(`${this.options.name} worker answered an unknown request`, { id: response.id });
      return;
    }

    if (response.ok) {
      request.settle(undefined, response.result);
    } else {
      request.settle(new Error(response.error ?? `${this.options.name} worker request failed`));
    }
  }
}
