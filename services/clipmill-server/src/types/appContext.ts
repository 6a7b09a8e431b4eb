import type { ServiceConfig } from '../config.js';
import type { JobGate } from '../core/jobGate.js';
import type { JobRunner } from '../core/jobRunner.js';
import type { JobStore } from '../core/jobStore.js';
import type { ArtifactStorage } from '../providers/storage/types.js';
import type { MediaEngine } from './media.js';

export interface AppContext {
  config: ServiceConfig;
  engine: MediaEngine;
  storage: ArtifactStorage;
  store: JobStore;
  gate: JobGate;
  runner: JobRunner;
}
