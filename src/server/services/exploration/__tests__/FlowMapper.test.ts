import { FlowMapper } from '../FlowMapper';

const SEED = 'https://example.com/';
const A = 'https://example.com/a';
const B = 'https://example.com/b';

function sampleFlow(): FlowMapper {
  const flow = new FlowMapper();
  flow.trackNavigation(SEED, null);
  flow.trackNavigation(A, SEED);
  flow.trackNavigation(B, SEED);
  flow.trackNavigation(A, B);
  flow.recordOutgoingLinks(SEED, 2);
  flow.recordOutgoingLinks(A, 0);
  flow.recordOutgoingLinks(B, 1);
  flow.recordPath([SEED, A]);
  flow.recordPath([SEED, B, A]);
  flow.recordPath([SEED, A]);
  flow.recordPath([SEED]);
  return flow;
}

describe('FlowMapper', () => {
  it('tracks referrers, visits and entry points', () => {
    const flow = sampleFlow();

    expect(flow.getReferrer(A)).toBe(SEED);
    expect(flow.getReferrers(A)).toEqual([SEED, B]);
    expect(flow.getReferrer(SEED)).toBeNull();
    expect(flow.getVisitCount(A)).toBe(2);
    expect(flow.isEntryPoint(SEED)).toBe(true);
    expect(flow.getEntryPoints()).toEqual([SEED]);
  });

  it('makes a page an entry point only when its first visit has no referrer', () => {
    const flow = new FlowMapper();
    flow.trackNavigation(A, SEED);
    flow.trackNavigation(A, null);
    flow.trackNavigation(B, null);
    flow.trackNavigation(B, null);

    expect(flow.isEntryPoint(A)).toBe(false);
    expect(flow.getVisitCount(A)).toBe(2);
    expect(flow.isEntryPoint(B)).toBe(true);
    expect(flow.getEntryPoints()).toEqual([B]);
    expect(flow.getVisitCount(B)).toBe(2);
  });

  it('reports pages without outgoing internal links as exit points', () => {
    expect(sampleFlow().getExitPoints()).toEqual([A]);
  });

  it('falls back to referrer data when outgoing links were never recorded', () => {
    const flow = new FlowMapper();
    flow.trackNavigation(SEED, null);
    flow.trackNavigation(A, SEED);

    expect(flow.getExitPoints()).toEqual([A]);
  });

  it('ranks popular paths and pages', () => {
    const flow = sampleFlow();

    expect(flow.getPopularPaths()).toEqual([
      { path: [SEED, A], count: 2 },
      { path: [SEED, B, A], count: 1 },
    ]);
    expect(flow.getPopularPages()).toEqual([
      { url: A, visits: 2 },
      { url: SEED, visits: 1 },
      { url: B, visits: 1 },
    ]);
    expect(flow.getAveragePathLength()).toBe(2);
  });

  it('builds paths step by step', () => {
    const flow = new FlowMapper();
    flow.startPath(SEED);
    flow.addToPath(A);
    expect(flow.getCurrentPath()).toEqual([SEED, A]);
    flow.endPath();
    flow.endPath();

    expect(flow.getAllPaths()).toEqual([[SEED, A]]);
    expect(flow.getCurrentPath()).toEqual([]);
  });

  it('summarizes and resets', () => {
    const flow = sampleFlow();
    expect(flow.getFlowStats()).toEqual({
      totalPages: 3,
      totalPaths: 4,
      entryPointCount: 1,
      exitPointCount: 1,
      totalVisits: 4,
    });

    flow.reset();
    expect(flow.analyzeFlows()).toEqual({
      entryPoints: [],
      exitPoints: [],
      popularPaths: [],
      popularPages: [],
      averagePathLength: 0,
    });
  });

  it('restores from a snapshot', () => {
    const flow = sampleFlow();
    const restored = new FlowMapper(flow.toSnapshot());

    expect(restored.analyzeFlows()).toEqual(flow.analyzeFlows());
    expect(restored.getReferrers(A)).toEqual([SEED, B]);
  });
});
