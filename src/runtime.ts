import { FfmpegDecoder } from './audio/ffmpegDecoder';
import type { RuntimeConfig } from './config';
import { InlineEngineHost } from './engine/inlineEngineHost';
import { ModelSession } from './engine/modelSession';
import type { EngineWorkerData } from './engine/protocol';
import { createEngine } from './engine/registry';
import type { EngineHost } from './engine/types';
import { WorkerEngineHost } from './engine/workerEngineHost';
import type { FatalEngineError } from './errors';
import { log } from './log';
import { ResultStore } from './storage/resultStore';
import { RequestCoordinator } from './synthesis/requestCoordinator';
import { AudioIngestor } from './voice/audioIngestor';
import { loadVoiceCatalog } from './voice/catalog';

export interface Runtime {
  ingestor: AudioIngestor;
  session: ModelSession;
  store: ResultStore;
  coordinator: RequestCoordinator;
  start(): Promise<void>;
  stop(): Promise<void>;
}

function createEngineHost(engine: RuntimeConfig['engine']): EngineHost {
  if (engine.isolation === 'inline') {
    return new InlineEngineHost(createEngine(engine.spec));
  }
  const workerData: EngineWorkerData = { engine: engine.spec };
  return new WorkerEngineHost({ workerData, loadTimeoutMs: engine.loadTimeoutMs });
}

export async function createRuntime(
  config: RuntimeConfig,
  options: { onFatal: (error: FatalEngineError) => void },
): Promise<Runtime> {
  const catalog = await loadVoiceCatalog(config.samplesDir);
  const ingestor = new AudioIngestor(catalog, config.ingest, new FfmpegDecoder(config.decoder));
  const session = new ModelSession(createEngineHost(config.engine), { onFatal: options.onFatal });
  const store = new ResultStore(config.store);
  const coordinator = new RequestCoordinator({ ingestor, session, store }, config.coordinator);

  return {
    ingestor,
    session,
    store,
    coordinator,
    async start() {
      await session.load();
      const unusable = await ingestor.preloadCatalog();
      const removed = await store.sweep();
      store.startSweeper(config.sweepIntervalMs);
      log.info(
        {
          event: 'runtime_started',
          device: session.status().device,
          voices: catalog.size,
          unusable_voices: unusable,
          stale_artifacts_removed: removed,
          isolation: config.engine.isolation,
        },
        'runtime started',
      );
    },
    async stop() {
      store.stop();
      await session.dispose();
    },
  };
}
