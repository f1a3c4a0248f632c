export type VoiceOrigin = 'catalog' | 'uploaded';

/** Normalized reference voice: mono, at the pipeline target rate, never all-silence. */
export interface VoiceReference {
  samples: Float32Array;
  sampleRateHz: number;
  origin: VoiceOrigin;
  /** Catalog name, or SHA-256 hex of the uploaded bytes. */
  identity: string;
  durationMs: number;
}

export type VoiceSource =
  | { kind: 'catalog'; name: string }
  | { kind: 'upload'; bytes: Buffer; mime: string };

export interface IngestConfig {
  targetSampleRateHz: number;
  silenceThresholdDb: number;
  silenceFrameMs: number;
  normalizePeak: number;
  minReferenceSeconds: number;
  maxReferenceSeconds: number;
  maxUploadBytes: number;
}

export interface CatalogEntry {
  name: string;
  displayName: string;
  language: string;
  bytes: Buffer;
}
