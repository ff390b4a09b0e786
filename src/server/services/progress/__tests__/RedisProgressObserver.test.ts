import type { ExplorationProgress } from '../../../types/progress';
import { CompositeProgressObserver } from '../CompositeProgressObserver';
import { RedisProgressObserver, type ProgressPublisher } from '../RedisProgressObserver';

class FakePublisher implements ProgressPublisher {
  readonly messages: Array<{ channel: string; message: string }> = [];

  async publish(channel: string, message: string): Promise<number> {
    this.messages.push({ channel, message });
    return 1;
  }
}

const PROGRESS: ExplorationProgress = {
  jobId: 'job-1',
  status: 'running',
  processed: 1,
  total: 3,
  queued: 2,
  failed: 0,
  currentUrl: 'https://example.com/',
  externalLinksDetected: 0,
  estimatedTimeRemainingMs: 200,
  processingRatePerMinute: 600,
  recentPages: [{ url: 'https://example.com/', title: 'Home' }],
};

describe('RedisProgressObserver', () => {
  it('publishes events as JSON on per-job channels', async () => {
    const publisher = new FakePublisher();
    const observer = new RedisProgressObserver(publisher);

    await observer.onProgress(PROGRESS);
    await observer.onExternalLinkDetected({ jobId: 'job-1', from: 'https://example.com/', to: 'https://other.org/' });

    expect(publisher.messages.map((message) => message.channel)).toEqual([
      'exploration:job-1:progress',
      'exploration:job-1:external_link_detected',
    ]);
    expect(JSON.parse(publisher.messages[0].message)).toMatchObject({ kind: 'progress', payload: PROGRESS });
  });

  it('uses the configured channel prefix', async () => {
    const publisher = new FakePublisher();
    const observer = new RedisProgressObserver(publisher, 'crawl');

    await observer.onError({ jobId: 'job-2', context: 'storage', message: 'down' });

    expect(publisher.messages[0].channel).toBe('crawl:job-2:error');
    expect(observer.channelFor('job-2', 'page_completed')).toBe('crawl:job-2:page_completed');
  });

  it('does not disturb the crawl when publishing fails', async () => {
    const publisher: ProgressPublisher = {
      publish: () => Promise.reject(new Error('Connection is closed.')),
    };
    const composite = new CompositeProgressObserver([new RedisProgressObserver(publisher)]);

    composite.onProgress(PROGRESS);
    await expect(composite.flush()).resolves.toBeUndefined();
  });
});
