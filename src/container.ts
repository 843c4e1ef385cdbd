import type { Database } from './db/index.js';
import type { Clock } from './lib/clock.js';
import { systemClock } from './lib/clock.js';
import { DocumentExtractor } from './lib/document-extractor.js';
import type { LlmExecutor } from './lib/llm-client.js';
import { ArtifactStorage } from './lib/storage.js';
import { defaultModules, ModuleRegistry } from './modules/index.js';
import type { AnyToolModule } from './modules/types.js';
import { HistoryIndex } from './services/history-index/index.js';
import { JobRunner } from './services/job-runner/index.js';
import { JobService } from './services/job-service/index.js';
import { JobStore } from './services/job-store/index.js';
import { ModuleConfigService } from './services/module-config/index.js';
import { QuotaPolicy } from './services/quota-policy/index.js';
import { ReferenceDataService } from './services/reference-data/index.js';
import { RetentionSweeper } from './services/retention-sweeper/index.js';
import { SessionService } from './services/sessions/index.js';
import { UsageLedger } from './services/usage-ledger/index.js';

export interface ServiceContainer {
  registry: ModuleRegistry;
  storage: ArtifactStorage;
  extractor: DocumentExtractor;
  sessions: SessionService;
  store: JobStore;
  ledger: UsageLedger;
  quota: QuotaPolicy;
  history: HistoryIndex;
  moduleConfig: ModuleConfigService;
  referenceData: ReferenceDataService;
  runner: JobRunner;
  jobs: JobService;
  sweeper: RetentionSweeper;
}

export interface ContainerOptions {
  db: Database;
  llm: LlmExecutor;
  storageRoot: string;
  defaultModel: string;
  retentionHours: number;
  historyLimit: number;
  modules?: AnyToolModule[];
  clock?: Clock;
  sleep?: (ms: number) => Promise<void>;
}

export function createServiceContainer(options: ContainerOptions): ServiceContainer {
  const { db, llm } = options;
  const clock = options.clock ?? systemClock;

  const registry = new ModuleRegistry(options.modules ?? defaultModules);
  const storage = new ArtifactStorage(options.storageRoot);
  const store = new JobStore(db, clock);
  const ledger = new UsageLedger(db, clock);
  const quota = new QuotaPolicy(db, ledger, clock);
  const history = new HistoryIndex(db, options.historyLimit, clock);
  const referenceData = new ReferenceDataService(db, clock);
  const moduleConfig = new ModuleConfigService(db, registry, options.defaultModel, clock, referenceData);
  const runner = new JobRunner({ db, store, ledger, llm, registry, moduleConfig, storage, sleep: options.sleep });

  return {
    registry,
    storage,
    extractor: new DocumentExtractor(),
    sessions: new SessionService(db, clock),
    store,
    ledger,
    quota,
    history,
    moduleConfig,
    referenceData,
    runner,
    jobs: new JobService({ db, store, ledger, quota, history, registry, moduleConfig, runner }),
    sweeper: new RetentionSweeper(store, storage, options.retentionHours, clock),
  };
}
