import type { ServiceConfig } from './config.js';
import { JobGate } from './core/jobGate.js';
import { JobRunner } from './core/jobRunner.js';
import type { JobStore } from './core/jobStore.js';
import type { ArtifactStorage } from './providers/storage/types.js';
import type { AppContext } from './types/appContext.js';
import type { MediaEngine } from './types/media.js';

export function buildAppContext(deps: {
  config: ServiceConfig;
  engine: MediaEngine;
  storage: ArtifactStorage;
  store: JobStore;
  logPrefix?: string;
}): AppContext {
  const gate = new JobGate(deps.config.workers);
  const runner = new JobRunner({
    engine: deps.engine,
    storage: deps.storage,
    store: deps.store,
    gate,
    outputDir: deps.config.outputDir,
    timeoutSeconds: deps.config.requestTimeoutSeconds,
    logPrefix: deps.logPrefix,
  });

  return { ...deps, gate, runner };
}
