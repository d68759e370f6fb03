export type EngineErrorCode =
  | 'INVALID_COMMAND'
  | 'CHUNK_TRANSCRIPTION_FAILURE'
  | 'DEVICE_ERROR'
  | 'STORAGE_ERROR';

export abstract class EngineError extends Error {
  public abstract readonly code: EngineErrorCode;

  protected constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/** Unknown command, or a known command that is not legal in the current state. */
export class InvalidCommandError extends EngineError {
  public readonly code = 'INVALID_COMMAND';

  public constructor(
    public readonly command: string,
    reason: string
  ) {
    super(`${command}: ${reason}`);
  }
}

export class ChunkTranscriptionFailure extends EngineError {
  public readonly code = 'CHUNK_TRANSCRIPTION_FAILURE';

  public constructor(
    public readonly seq: number,
    public readonly attempts: number,
    detail: string
  ) {
    super(`Chunk ${seq} failed after ${attempts} attempts: ${detail}`);
  }
}

/** Audio input unavailable; aborts the whole session. */
export class DeviceError extends EngineError {
  public readonly code = 'DEVICE_ERROR';

  public constructor(message: string) {
    super(message);
  }
}

export class StorageError extends EngineError {
  public readonly code = 'STORAGE_ERROR';

  public constructor(
    public readonly storagePath: string,
    detail: string
  ) {
    super(`Failed to write '${storagePath}': ${detail}`);
  }
}

export const describeError = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);

export const errorCode = (error: unknown): string | undefined =>
  error instanceof Error && 'code' in error && typeof error.code === 'string' ? error.code : undefined;
