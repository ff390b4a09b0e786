export type ExplorationStrategy = 'BFS' | 'DFS';
export type LinkKind = 'internal' | 'external';

/**
 * How hosts under the seed's registrable domain are classified.
 * 'internal': www.example.com and docs.example.com are crawled when seeded from example.com.
 * 'external': only the seed's exact host is internal.
 */
export type SubdomainPolicy = 'internal' | 'external';

/** An anchor as found in markup, before resolution and classification. */
export interface RawAnchor {
  href: string;
  text: string;
  attributes: Record<string, string>;
}

export interface DiscoveredLink {
  url: string;
  text: string;
  attributes: Record<string, string>;
  kind: LinkKind;
}

export interface LinkDiscovery {
  internal: DiscoveredLink[];
  external: DiscoveredLink[];
}

export interface FormField {
  name: string;
  type: string;
  value?: string;
  readOnly: boolean;
}

export interface DiscoveredForm {
  action: string;
  method: string;
  fields: FormField[];
  /** True for GET forms and forms whose data fields are all hidden, readonly or disabled */
  safe: boolean;
}

export interface FormDiscovery {
  safe: DiscoveredForm[];
  mutatingCount: number;
}

export interface FrontierEntry {
  url: string;
  depth: number;
  referrer: string | null;
  /** URLs from the seed down to this entry, inclusive */
  path: string[];
}
