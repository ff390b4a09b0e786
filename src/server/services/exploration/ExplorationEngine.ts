import * as cheerio from 'cheerio';
import type { Element } from 'domhandler';
import type {
  DiscoveredForm,
  DiscoveredLink,
  FormDiscovery,
  FormField,
  FrontierEntry,
  LinkDiscovery,
  RawAnchor,
} from '../../types/exploration.js';
import type { ExplorationConfig } from '../../types/job.js';
import { canonicalizeUrl, isInternalUrl } from '../../utils/urlCanonicalizer.js';
import { PathFilter } from '../../utils/pathFilter.js';
import { Frontier } from './Frontier.js';

/** Input types that submit or reset a form rather than carry data. */
const NON_DATA_INPUT_TYPES = new Set(['submit', 'button', 'reset', 'image']);

export interface ExplorationEngineState {
  frontier: FrontierEntry[];
  visited: string[];
}

/**
 * Link and form discovery plus the frontier and visited set of a single job.
 * Depth and page limits are applied when candidates are admitted, so nothing
 * beyond max depth ever reaches the frontier.
 */
export class ExplorationEngine {
  private readonly frontier: Frontier;
  private readonly visited: Set<string>;
  private readonly pathFilter: PathFilter;
  private readonly seedUrl: string;

  constructor(
    private readonly config: ExplorationConfig,
    state?: ExplorationEngineState
  ) {
    this.seedUrl = canonicalizeUrl(config.seedUrl) ?? config.seedUrl;
    this.frontier = new Frontier(config.strategy, state?.frontier ?? []);
    this.visited = new Set(state?.visited ?? []);
    this.pathFilter = new PathFilter(config.includePaths, config.excludePaths);

    if (!state) {
      this.frontier.push({ url: this.seedUrl, depth: 0, referrer: null, path: [this.seedUrl] });
    }
  }

  get seed(): string {
    return this.seedUrl;
  }

  get queuedCount(): number {
    return this.frontier.size;
  }

  get visitedCount(): number {
    return this.visited.size;
  }

  extractAnchors(html: string): RawAnchor[] {
    const $ = cheerio.load(html);
    return $('a[href]')
      .toArray()
      .filter((el): el is Element => el.type === 'tag')
      .map((el) => {
        const anchor = $(el);
        return {
          href: anchor.attr('href') ?? '',
          text: anchor.text().replace(/\s+/g, ' ').trim(),
          attributes: { ...el.attribs },
        };
      });
  }

  /**
   * Extract every anchor of a page, resolve it against `baseUrl` (or the page's
   * <base href>) and split it into internal and external links.
   */
  discoverLinks(html: string, baseUrl: string): LinkDiscovery {
    const $ = cheerio.load(html);
    const baseHref = $('base[href]').first().attr('href');
    const resolutionBase = (baseHref && canonicalizeUrl(baseHref, baseUrl)) || baseUrl;
    return this.classifyAnchors(this.extractAnchors(html), resolutionBase);
  }

  /**
   * Resolve and classify already-extracted anchors. Non-http(s) schemes and
   * unparseable hrefs are dropped; each target URL is reported once per page.
   */
  classifyAnchors(anchors: RawAnchor[], baseUrl: string): LinkDiscovery {
    const internal: DiscoveredLink[] = [];
    const external: DiscoveredLink[] = [];
    const seen = new Set<string>();

    for (const anchor of anchors) {
      const url = canonicalizeUrl(anchor.href, baseUrl);
      if (!url || seen.has(url)) {
        continue;
      }
      seen.add(url);

      const kind = isInternalUrl(url, this.seedUrl, this.config.subdomainPolicy) ? 'internal' : 'external';
      const link: DiscoveredLink = { url, text: anchor.text, attributes: anchor.attributes, kind };
      if (kind === 'internal') {
        internal.push(link);
      } else {
        external.push(link);
      }
    }

    return { internal, external };
  }

  /**
   * Find forms on a page. Only GET forms and forms whose data fields are all
   * read-only are returned; the rest are counted and never submitted.
   */
  discoverForms(html: string, baseUrl: string): FormDiscovery {
    const $ = cheerio.load(html);
    const safe: DiscoveredForm[] = [];
    let mutatingCount = 0;

    $('form')
      .toArray()
      .filter((el): el is Element => el.type === 'tag')
      .forEach((formEl) => {
        const form = $(formEl);
        const method = (form.attr('method') ?? 'GET').trim().toUpperCase() || 'GET';
        const action = canonicalizeUrl(form.attr('action') ?? '', baseUrl) ?? baseUrl;

        const fields: FormField[] = form
          .find('input, select, textarea')
          .toArray()
          .filter((el): el is Element => el.type === 'tag')
          .map((fieldEl) => {
            const field = $(fieldEl);
            const type = fieldEl.name === 'input' ? (field.attr('type') ?? 'text').toLowerCase() : fieldEl.name;
            const readOnly =
              type === 'hidden' || field.attr('readonly') !== undefined || field.attr('disabled') !== undefined;
            return {
              name: field.attr('name') ?? field.attr('id') ?? '',
              type,
              value: field.attr('value'),
              readOnly,
            };
          })
          .filter((field) => !NON_DATA_INPUT_TYPES.has(field.type));

        const isSafe = method === 'GET' || (fields.length > 0 && fields.every((field) => field.readOnly));
        if (isSafe) {
          safe.push({ action, method, fields, safe: true });
        } else {
          mutatingCount++;
        }
      });

    return { safe, mutatingCount };
  }

  isVisited(url: string): boolean {
    return this.visited.has(canonicalizeUrl(url) ?? url);
  }

  trackVisited(url: string): void {
    this.visited.add(canonicalizeUrl(url) ?? url);
  }

  /**
   * Whether an internal URL passes the job's include/exclude path patterns.
   */
  shouldExplore(url: string): boolean {
    if (!isInternalUrl(url, this.seedUrl, this.config.subdomainPolicy)) {
      return false;
    }
    return url === this.seedUrl || this.pathFilter.allows(url);
  }

  /**
   * Admit the internal links of `parent` to the frontier.
   *
   * @param processed - pages already processed by the job; nothing is admitted once it reaches max pages
   * @returns the entries that were actually added
   */
  admit(links: DiscoveredLink[], parent: FrontierEntry, processed: number): FrontierEntry[] {
    const depth = parent.depth + 1;
    if (depth > this.config.maxDepth || processed >= this.config.maxPages) {
      return [];
    }

    const children = links
      .filter((link) => link.kind === 'internal')
      .filter((link) => !this.visited.has(link.url) && this.shouldExplore(link.url))
      .map((link) => ({
        url: link.url,
        depth,
        referrer: parent.url,
        path: [...parent.path, link.url],
      }));

    return this.frontier.pushChildren(children);
  }

  /**
   * Next frontier entry that has not been visited yet.
   */
  next(): FrontierEntry | undefined {
    let entry = this.frontier.next();
    while (entry && this.visited.has(entry.url)) {
      entry = this.frontier.next();
    }
    return entry;
  }

  snapshot(): ExplorationEngineState {
    return {
      frontier: this.frontier.toArray(),
      visited: [...this.visited],
    };
  }
}
