export interface PopularPath {
  path: string[];
  count: number;
}

export interface PageVisits {
  url: string;
  visits: number;
}

export interface FlowAnalysis {
  entryPoints: string[];
  exitPoints: string[];
  popularPaths: PopularPath[];
  popularPages: PageVisits[];
  averagePathLength: number;
}

export interface FlowStats {
  totalPages: number;
  totalPaths: number;
  entryPointCount: number;
  exitPointCount: number;
  totalVisits: number;
}

/** Serializable Flow Mapper state, written into job checkpoints. */
export interface FlowSnapshot {
  referrers: Array<[string, string[]]>;
  visitCounts: Array<[string, number]>;
  entryPoints: string[];
  outgoingCounts: Array<[string, number]>;
  paths: string[][];
}
