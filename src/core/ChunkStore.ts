import fs from 'node:fs/promises';
import path from 'node:path';
import { encodeWav } from '../audio/pcm';
import { StorageError, describeError, errorCode } from '../errors';
import type { StructuredLogger } from '../logging/StructuredLogger';

const FILE_PREFIX = 'longscribe-';
const SESSION_FILE_PATTERN = /^longscribe-s(\d+)-g(\d+)-c(\d+)\.wav$/;
const STATIC_FILE_PATTERN = /^longscribe-static-c(\d+)\.wav$/;

export interface ChunkKey {
  sessionId: number;
  generation: number;
  seq: number;
}

export const sessionChunkFileName = (key: ChunkKey): string =>
  `${FILE_PREFIX}s${key.sessionId}-g${key.generation}-c${key.seq}.wav`;

export const staticChunkFileName = (seq: number): string => `${FILE_PREFIX}static-c${seq}.wav`;

/**
 * Chunk files on disk. Files of a finished (or crashed) session stay until the
 * next session starts and calls `purgeSessions()`.
 */
export class ChunkStore {
  public constructor(
    private readonly directory: string,
    private readonly logger?: StructuredLogger
  ) {}

  public getDirectory(): string {
    return this.directory;
  }

  public async ensureWritable(): Promise<void> {
    const probe = path.join(this.directory, `${FILE_PREFIX}probe-${process.pid}.tmp`);

    try {
      await fs.mkdir(this.directory, { recursive: true });
      await fs.writeFile(probe, '');
      await fs.unlink(probe);
    } catch (error) {
      throw new StorageError(probe, describeError(error));
    }
  }

  public async writeSessionChunk(key: ChunkKey, pcm: Buffer): Promise<string> {
    return this.writeWav(path.join(this.directory, sessionChunkFileName(key)), pcm);
  }

  public async writeStaticChunk(seq: number, pcm: Buffer): Promise<string> {
    return this.writeWav(path.join(this.directory, staticChunkFileName(seq)), pcm);
  }

  public async listSessionFiles(): Promise<string[]> {
    const entries = await this.readDirectory();
    return entries.filter((name) => SESSION_FILE_PATTERN.test(name)).sort();
  }

  /** Highest session id left on disk plus one, so ids survive a restart. */
  public async nextSessionId(): Promise<number> {
    const names = await this.listSessionFiles();
    let highest = 0;

    for (const name of names) {
      const match = SESSION_FILE_PATTERN.exec(name);
      if (match) {
        highest = Math.max(highest, Number.parseInt(match[1], 10));
      }
    }

    return highest + 1;
  }

  public async purgeSessions(): Promise<number> {
    return this.purge(SESSION_FILE_PATTERN);
  }

  public async purgeStatic(): Promise<number> {
    return this.purge(STATIC_FILE_PATTERN);
  }

  private async purge(pattern: RegExp): Promise<number> {
    const names = (await this.readDirectory()).filter((name) => pattern.test(name));
    let removed = 0;

    for (const name of names) {
      try {
        await fs.unlink(path.join(this.directory, name));
        removed += 1;
      } catch (error) {
        if (errorCode(error) !== 'ENOENT') {
          this.logger?.warn('Failed to delete chunk file', { file: name, detail: describeError(error) });
        }
      }
    }

    if (removed > 0) {
      this.logger?.info('Deleted chunk files from previous run', { removed, directory: this.directory });
    }

    return removed;
  }

  private async readDirectory(): Promise<string[]> {
    try {
      return await fs.readdir(this.directory);
    } catch (error) {
      if (errorCode(error) === 'ENOENT') {
        return [];
      }

      throw error;
    }
  }

  private async writeWav(filePath: string, pcm: Buffer): Promise<string> {
    try {
      await fs.mkdir(this.directory, { recursive: true });
      await fs.writeFile(filePath, encodeWav(pcm));
      return filePath;
    } catch (error) {
      throw new StorageError(filePath, describeError(error));
    }
  }
}
