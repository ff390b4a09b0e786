import { ConcurrencyGate } from '../utils/concurrency';
import { InMemoryVectorStore } from '../vector/InMemoryVectorStore';
import type { VectorStore } from '../vector/VectorStore';
import { HeuristicSemanticAnalyzer } from '../services/analysis/HeuristicSemanticAnalyzer';
import { InMemoryKnowledgeStorage } from '../services/knowledge/InMemoryKnowledgeStorage';
import type { KnowledgeStorage } from '../services/knowledge/KnowledgeStorage';
import { CompositeProgressObserver } from '../services/progress/CompositeProgressObserver';
import { InMemoryJobRepository, type JobRepository } from '../services/pipeline/JobRepository';
import { JobManager } from '../services/pipeline/JobManager';
import type { PipelineDependencies } from '../services/pipeline/KnowledgePipeline';
import { FakeSite, RecordingObserver, SITE, sitePage } from './fakes';

export const A = `${SITE}/`;
export const B = `${SITE}/b`;
export const C = `${SITE}/c`;
export const D = `${SITE}/d`;
export const E = `${SITE}/e`;

/** A -> B, C; B -> D; C -> E */
export const FIVE_PAGES: Record<string, string> = {
  [A]: sitePage('Alpha', ['/b', '/c']),
  [B]: sitePage('Beta', ['/d']),
  [C]: sitePage('Gamma', ['/e']),
  [D]: sitePage('Delta'),
  [E]: sitePage('Epsilon'),
};

export interface Harness {
  manager: JobManager;
  site: FakeSite;
  storage: KnowledgeStorage;
  vectorStore: VectorStore;
  jobRepository: JobRepository;
  observer: CompositeProgressObserver;
  recorder: RecordingObserver;
}

/**
 * JobManager over in-memory backends and a FakeSite, with retries that do not wait.
 */
export function createHarness(pages: Record<string, string>, overrides: Partial<PipelineDependencies> = {}): Harness {
  const site = new FakeSite(pages);
  const recorder = new RecordingObserver();
  const observer = new CompositeProgressObserver([recorder]);
  const deps: PipelineDependencies = {
    fetcher: site,
    analyzer: new HeuristicSemanticAnalyzer(64),
    storage: new InMemoryKnowledgeStorage(),
    vectorStore: new InMemoryVectorStore(),
    jobRepository: new InMemoryJobRepository(),
    observer,
    fetchGate: new ConcurrencyGate(4),
    ...overrides,
  };
  const manager = new JobManager(deps, {
    defaults: { maxDepth: 3, maxPages: 50, subdomainPolicy: 'internal' },
    fetchMaxRetries: 2,
    fetchInitialDelayMs: 0,
    fetchMaxDelayMs: 0,
    storageRetryDelayMs: 0,
  });
  return { manager, site, storage: deps.storage, vectorStore: deps.vectorStore, jobRepository: deps.jobRepository, observer, recorder };
}
