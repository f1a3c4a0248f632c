import { randomUUID } from 'crypto';
import { promises as fs } from 'fs';
import path from 'path';
import { durationMs } from '../audio/dsp';
import { encodeWavPcm16 } from '../audio/wavCodec';
import { errorMessage, fail, ok, type Result } from '../errors';
import { log } from '../log';
import { incArtifactsSwept } from '../metrics';
import type { Artifact, ResultStoreConfig, StoredArtifact } from './types';

const ARTIFACT_EXTENSION = '.wav';
const PARTIAL_SUFFIX = '.partial';
const KEY_PATTERN = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/;

function isErrno(error: unknown, code: string): boolean {
  return error instanceof Error && (error as NodeJS.ErrnoException).code === code;
}

/**
 * Synthesized waveforms on disk, one WAV per key. Files are written under a
 * temporary name and renamed, so a key only becomes visible once complete.
 */
export class ResultStore {
  private readonly index = new Map<string, StoredArtifact>();
  private readonly now: () => number;
  private sweepTimer: NodeJS.Timeout | undefined;
  private sweepInProgress: Promise<number> | null = null;

  constructor(
    private readonly config: ResultStoreConfig,
    options: { now?: () => number } = {},
  ) {
    this.now = options.now ?? Date.now;
  }

  public get size(): number {
    return this.index.size;
  }

  public async put(samples: Float32Array, sampleRateHz: number): Promise<StoredArtifact> {
    const key = randomUUID();
    const finalPath = this.pathFor(key);
    const partialPath = `${finalPath}${PARTIAL_SUFFIX}`;

    await fs.mkdir(this.config.storageDir, { recursive: true });
    try {
      await fs.writeFile(partialPath, encodeWavPcm16(samples, sampleRateHz));
      await fs.rename(partialPath, finalPath);
    } catch (error) {
      await fs.rm(partialPath, { force: true });
      throw error;
    }

    const createdAt = this.now();
    const artifact: StoredArtifact = {
      key,
      sampleRateHz,
      durationMs: durationMs(samples.length, sampleRateHz),
      createdAt,
      expiresAt: createdAt + this.config.ttlMs,
    };
    this.index.set(key, artifact);
    return artifact;
  }

  public async get(key: string): Promise<Result<Artifact>> {
    const entry = this.lookup(key);
    if (!entry) {
      return fail('not_found', `artifact not found: ${key}`);
    }

    try {
      const wav = await fs.readFile(this.pathFor(key));
      return ok({ ...entry, wav });
    } catch (error) {
      if (isErrno(error, 'ENOENT')) {
        this.index.delete(key);
        return fail('not_found', `artifact not found: ${key}`);
      }
      log.error({ event: 'artifact_read_failed', key, err: errorMessage(error) }, 'artifact read failed');
      return fail('storage_failure', 'artifact could not be read');
    }
  }

  public async delete(key: string): Promise<boolean> {
    if (!this.index.has(key)) {
      return false;
    }
    this.index.delete(key);
    await fs.rm(this.pathFor(key), { force: true });
    return true;
  }

  /** Removes expired artifacts and stale files from earlier processes. */
  public sweep(): Promise<number> {
    if (!this.sweepInProgress) {
      this.sweepInProgress = this.runSweep().finally(() => {
        this.sweepInProgress = null;
      });
    }
    return this.sweepInProgress;
  }

  public startSweeper(intervalMs: number): void {
    if (this.sweepTimer) {
      return;
    }
    this.sweepTimer = setInterval(() => {
      this.sweep().catch((error: unknown) => {
        log.error({ event: 'artifact_sweep_failed', err: errorMessage(error) }, 'artifact sweep failed');
      });
    }, intervalMs);
    this.sweepTimer.unref?.();
  }

  public stop(): void {
    if (this.sweepTimer) {
      clearInterval(this.sweepTimer);
      this.sweepTimer = undefined;
    }
  }

  private lookup(key: string): StoredArtifact | undefined {
    if (!KEY_PATTERN.test(key)) {
      return undefined;
    }
    const entry = this.index.get(key);
    if (!entry || entry.expiresAt <= this.now()) {
      return undefined;
    }
    return entry;
  }

  private pathFor(key: string): string {
    return path.join(this.config.storageDir, `${key}${ARTIFACT_EXTENSION}`);
  }

  private async runSweep(): Promise<number> {
    const now = this.now();
    let removed = 0;

    for (const [key, entry] of this.index) {
      if (entry.expiresAt > now) continue;
      this.index.delete(key);
      await fs.rm(this.pathFor(key), { force: true });
      removed += 1;
    }

    let entries: string[];
    try {
      entries = await fs.readdir(this.config.storageDir);
    } catch (error) {
      if (isErrno(error, 'ENOENT')) {
        return this.finishSweep(removed);
      }
      throw error;
    }

    for (const name of entries) {
      const isArtifact = name.endsWith(ARTIFACT_EXTENSION) || name.endsWith(PARTIAL_SUFFIX);
      if (!isArtifact) continue;
      const key = name.slice(0, name.indexOf('.'));
      if (this.index.has(key)) continue;

      const filePath = path.join(this.config.storageDir, name);
      try {
        const stats = await fs.stat(filePath);
        if (stats.isFile() && now - stats.mtimeMs >= this.config.ttlMs) {
          await fs.unlink(filePath);
          removed += 1;
        }
      } catch (error) {
        if (!isErrno(error, 'ENOENT')) {
          log.warn({ event: 'artifact_sweep_file_error', filePath, err: errorMessage(error) }, 'artifact sweep file error');
        }
      }
    }

    return this.finishSweep(removed);
  }

  private finishSweep(removed: number): number {
    incArtifactsSwept(removed);
    if (removed > 0) {
      log.info({ event: 'artifact_sweep_completed', removed }, 'artifact sweep completed');
    }
    return removed;
  }
}
