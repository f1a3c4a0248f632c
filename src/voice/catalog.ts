import { promises as fs } from 'fs';
import path from 'path';
import { z } from 'zod';
import { log } from '../log';
import type { CatalogEntry } from './types';

const CATALOG_FILE = 'catalog.json';

const CatalogManifestSchema = z.object({
  voices: z
    .array(
      z.object({
        name: z.string().regex(/^[a-z0-9_]+$/, 'catalog names are lowercase snake_case'),
        file: z.string().min(1),
        displayName: z.string().min(1),
        language: z.string().min(2),
      }),
    )
    .min(1),
});

export interface CatalogVoiceSummary {
  name: string;
  displayName: string;
}

/** Immutable name -> reference bytes mapping, fixed at startup. */
export class VoiceCatalog {
  private readonly entries: ReadonlyMap<string, CatalogEntry>;

  private constructor(entries: CatalogEntry[]) {
    const map = new Map<string, CatalogEntry>();
    for (const entry of entries) {
      if (map.has(entry.name)) {
        throw new Error(`duplicate catalog voice: ${entry.name}`);
      }
      map.set(entry.name, { ...entry, bytes: Buffer.from(entry.bytes) });
    }
    this.entries = map;
  }

  public static fromEntries(entries: CatalogEntry[]): VoiceCatalog {
    return new VoiceCatalog(entries);
  }

  public get(name: string): CatalogEntry | undefined {
    return this.entries.get(name);
  }

  public has(name: string): boolean {
    return this.entries.has(name);
  }

  public get size(): number {
    return this.entries.size;
  }

  public names(): string[] {
    return [...this.entries.keys()];
  }

  public byLanguage(): Record<string, CatalogVoiceSummary[]> {
    const grouped: Record<string, CatalogVoiceSummary[]> = {};
    for (const entry of this.entries.values()) {
      const voices = grouped[entry.language] ?? [];
      voices.push({ name: entry.name, displayName: entry.displayName });
      grouped[entry.language] = voices;
    }
    return grouped;
  }
}

/**
 * Reads `catalog.json` from the samples directory and loads every listed file.
 * The audio files are provided by the deployment; listed voices whose file is
 * missing are skipped and resolve to sample_not_found.
 */
export async function loadVoiceCatalog(samplesDir: string): Promise<VoiceCatalog> {
  const manifestPath = path.join(samplesDir, CATALOG_FILE);
  const raw = await fs.readFile(manifestPath, 'utf8');
  const result = CatalogManifestSchema.safeParse(JSON.parse(raw));
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join(', ');
    throw new Error(`Invalid voice catalog ${manifestPath}: ${issues}`);
  }

  const entries: CatalogEntry[] = [];
  for (const voice of result.data.voices) {
    const filePath = path.join(samplesDir, voice.file);
    try {
      const bytes = await fs.readFile(filePath);
      entries.push({ name: voice.name, displayName: voice.displayName, language: voice.language, bytes });
    } catch (error) {
      const code = (error as NodeJS.ErrnoException).code;
      if (code !== 'ENOENT') {
        throw error;
      }
      log.warn({ event: 'catalog_voice_missing', voice: voice.name, file: filePath }, 'catalog voice file missing');
    }
  }

  log.info({ event: 'catalog_loaded', voices: entries.length, listed: result.data.voices.length }, 'voice catalog loaded');
  return VoiceCatalog.fromEntries(entries);
}
