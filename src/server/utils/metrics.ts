import { Registry, Counter, Histogram, Gauge } from 'prom-client';

/**
 * Prometheus metrics registry
 */
export const metricsRegistry = new Registry();

export const httpRequestDuration = new Histogram({
  name: 'http_request_duration_seconds',
  help: 'Duration of HTTP requests in seconds',
  labelNames: ['method', 'route', 'status_code'],
  buckets: [0.05, 0.1, 0.5, 1, 2, 5],
  registers: [metricsRegistry],
});

/**
 * Crawl Metrics
 */
export const pagesProcessed = new Counter({
  name: 'exploration_pages_processed_total',
  help: 'Pages taken off a frontier, by outcome',
  labelNames: ['outcome'],
  registers: [metricsRegistry],
});

export const pageProcessingDuration = new Histogram({
  name: 'exploration_page_processing_seconds',
  help: 'Time spent fetching, analyzing and storing one page',
  buckets: [0.1, 0.5, 1, 2, 5, 10, 30],
  registers: [metricsRegistry],
});

export const fetchRetries = new Counter({
  name: 'exploration_fetch_retries_total',
  help: 'Page fetch retry attempts',
  registers: [metricsRegistry],
});

export const observerFailures = new Counter({
  name: 'exploration_observer_failures_total',
  help: 'Progress observer deliveries that threw',
  labelNames: ['observer', 'event'],
  registers: [metricsRegistry],
});

export const activeJobs = new Gauge({
  name: 'exploration_active_jobs',
  help: 'Exploration jobs currently running or paused',
  registers: [metricsRegistry],
});

export const jobsFinished = new Counter({
  name: 'exploration_jobs_finished_total',
  help: 'Exploration jobs that reached a terminal status',
  labelNames: ['status'],
  registers: [metricsRegistry],
});
