import { FetchError, IllegalStateTransitionError } from '../../../types/errors';
import type { ExplorationConfig } from '../../../types/job';
import { ExplorationJob } from '../ExplorationJob';

const CONFIG: ExplorationConfig = {
  seedUrl: 'https://example.com/',
  maxDepth: 2,
  maxPages: 10,
  strategy: 'BFS',
  subdomainPolicy: 'internal',
  includePaths: [],
  excludePaths: [],
};

function runningJob(): ExplorationJob {
  const job = new ExplorationJob('job-1', CONFIG);
  job.transition('running');
  return job;
}

describe('ExplorationJob', () => {
  it('starts idle with the seed queued', () => {
    const job = new ExplorationJob('job-1', CONFIG);

    expect(job.status).toBe('idle');
    expect(job.engine.queuedCount).toBe(1);
    expect(job.total).toBe(1);
    expect(job.snapshot()).toMatchObject({ jobId: 'job-1', status: 'idle', startedAt: null, finishedAt: null });
  });

  it('rejects illegal transitions', () => {
    const job = new ExplorationJob('job-1', CONFIG);

    expect(() => job.transition('paused')).toThrow(IllegalStateTransitionError);
    expect(() => job.requestPause()).toThrow(IllegalStateTransitionError);
    expect(() => job.requestCancel()).toThrow(IllegalStateTransitionError);
    expect(() => job.resume()).toThrow(IllegalStateTransitionError);
    expect(job.status).toBe('idle');
  });

  it('emits status and stamps start and finish times', () => {
    const job = new ExplorationJob('job-1', CONFIG);
    const seen: string[] = [];
    job.on('status', (status: string) => seen.push(status));

    job.transition('running');
    job.transition('completed');

    expect(seen).toEqual(['running', 'completed']);
    expect(job.snapshot().startedAt).not.toBeNull();
    expect(job.snapshot().finishedAt).not.toBeNull();
    expect(job.isTerminal).toBe(true);
  });

  it('only flags a pause until the loop applies it', () => {
    const job = runningJob();
    job.requestPause();

    expect(job.status).toBe('running');
    expect(job.pauseRequested).toBe(true);

    job.resume();
    expect(job.pauseRequested).toBe(false);
    expect(job.status).toBe('running');
  });

  it('wakes a paused loop on resume', async () => {
    const job = runningJob();
    job.requestPause();
    job.applyPause();
    expect(job.status).toBe('paused');

    const woken = job.waitForResume();
    job.resume();
    await woken;

    expect(job.status).toBe('running');
  });

  it('cancels a paused job at once and wakes the loop', async () => {
    const job = runningJob();
    job.requestPause();
    job.applyPause();

    const woken = job.waitForResume();
    job.requestCancel();
    await woken;

    expect(job.status).toBe('cancelled');
    expect(() => job.resume()).toThrow(IllegalStateTransitionError);
  });

  it('flags cancellation of a running job and refuses later pauses', () => {
    const job = runningJob();
    job.requestCancel();

    expect(job.status).toBe('running');
    expect(job.cancelRequested).toBe(true);
    expect(() => job.requestPause()).toThrow(IllegalStateTransitionError);
  });

  it('resolves waitForStatus once a listed status is reached', async () => {
    const job = runningJob();
    const reached = job.waitForStatus(['completed', 'failed']);
    job.transition('failed');

    await expect(reached).resolves.toBe('failed');
    await expect(job.waitForStatus(['failed'])).resolves.toBe('failed');
  });

  it('categorizes recorded errors', () => {
    const job = runningJob();
    const entry = job.recordError(
      'fetch',
      'https://example.com/missing',
      new FetchError('https://example.com/missing', 'HTTP 404 for https://example.com/missing', { statusCode: 404 })
    );

    expect(entry).toMatchObject({ kind: 'fetch', url: 'https://example.com/missing', category: 'http_4xx' });
    expect(job.errors).toHaveLength(1);
  });

  describe('records', () => {
    it('restores an interrupted running job as idle with its checkpoint', () => {
      const job = runningJob();
      const seed = job.engine.next();
      if (!seed) throw new Error('seed missing');
      job.engine.trackVisited(seed.url);
      job.counters.processed = 1;
      job.storedUrls.add(seed.url);
      job.recordWarning(seed.url, 'extractTopics', new Error('no topics'));

      const restored = ExplorationJob.fromRecord(job.toRecord());

      expect(restored.status).toBe('idle');
      expect(restored.counters.processed).toBe(1);
      expect(restored.engine.isVisited(seed.url)).toBe(true);
      expect(restored.engine.queuedCount).toBe(0);
      expect([...restored.storedUrls]).toEqual([seed.url]);
      expect(restored.warnings).toHaveLength(1);
      expect(restored.createdAt).toBe(job.createdAt);
    });

    it('keeps a paused job paused', () => {
      const job = runningJob();
      job.requestPause();
      job.applyPause();

      expect(ExplorationJob.fromRecord(job.toRecord()).status).toBe('paused');
    });

    it('refuses to restore a finished job', () => {
      const job = runningJob();
      job.transition('completed');

      expect(() => ExplorationJob.fromRecord(job.toRecord())).toThrow(IllegalStateTransitionError);
    });
  });
});
