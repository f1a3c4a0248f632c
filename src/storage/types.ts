export interface ResultStoreConfig {
  storageDir: string;
  ttlMs: number;
}

export interface StoredArtifact {
  key: string;
  sampleRateHz: number;
  durationMs: number;
  createdAt: number;
  expiresAt: number;
}

export interface Artifact extends StoredArtifact {
  /** 16-bit PCM mono WAV. */
  wav: Buffer;
}
