import type { EngineSpec } from './protocol';
import type { InferenceEngine } from './types';
import { XttsHttpEngine } from './xttsHttpEngine';

export function createEngine(spec: EngineSpec): InferenceEngine {
  switch (spec.kind) {
    case 'xtts_http':
      return new XttsHttpEngine({ url: spec.url, healthUrl: spec.healthUrl, retries: spec.retries });
  }
}
