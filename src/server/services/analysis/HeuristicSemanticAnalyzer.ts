import { createHash } from 'crypto';
import * as cheerio from 'cheerio';
import type { Element } from 'domhandler';
import lexicon from '../../data/analyzerLexicon.json';
import type { Entity, EntityType, Heading, PageContent, TopicSummary } from '../../types/knowledge.js';
import type { SemanticAnalyzer } from './SemanticAnalyzer.js';

const STOP_WORDS = new Set(lexicon.stopWords);
const CATEGORY_KEYWORDS: Array<[string, string[]]> = Object.entries(lexicon.categoryKeywords);

const BOILERPLATE_SELECTORS = 'script, style, noscript, iframe, svg, nav, footer, aside, [role="navigation"]';
const MAX_KEYWORDS = 20;
const MAX_MAIN_TOPICS = 10;
const MAX_DESCRIPTION_LENGTH = 100;

const ENTITY_PATTERNS: Array<[EntityType, RegExp]> = [
  ['EMAIL', /\b[A-Za-z0-9._%+-]+@[A-Za-z0-9.-]+\.[A-Za-z]{2,}\b/g],
  ['URL', /https?:\/\/[^\s<>"']+/g],
  ['PHONE', /\b\d{3}[-.]?\d{3}[-.]?\d{4}\b/g],
  ['DATE', /\b\d{1,2}[/-]\d{1,2}[/-]\d{2,4}\b/g],
  ['MONEY', /\$\d+(?:,\d{3})*(?:\.\d{2})?/g],
];

function collapseWhitespace(value: string): string {
  return value.replace(/\s+/g, ' ').trim();
}

export function tokenize(text: string): string[] {
  return text.toLowerCase().match(/\b[a-z]+\b/g) ?? [];
}

/**
 * Dependency-free analyzer: markup heuristics for content, regexes for
 * entities, word frequency for topics and feature hashing for embeddings.
 * Embeddings capture lexical overlap only.
 */
export class HeuristicSemanticAnalyzer implements SemanticAnalyzer {
  constructor(private readonly embeddingDimension: number = 128) {}

  async extractContent(rawContent: string, _url: string): Promise<PageContent> {
    const $ = cheerio.load(rawContent);
    const metaDescription = collapseWhitespace($('meta[name="description"]').attr('content') ?? '');
    const documentTitle = collapseWhitespace($('title').first().text());

    $(BOILERPLATE_SELECTORS).remove();

    const headings: Heading[] = $('h1, h2, h3, h4, h5, h6')
      .toArray()
      .filter((el): el is Element => el.type === 'tag')
      .map((el) => ({ level: Number(el.name.slice(1)), text: collapseWhitespace($(el).text()) }))
      .filter((heading) => heading.text.length > 0);

    const paragraphs = $('p')
      .toArray()
      .map((el) => collapseWhitespace($(el).text()))
      .filter((text) => text.length > 0);

    const text = paragraphs.length > 0 ? paragraphs.join(' ') : collapseWhitespace($('body').text());
    const title = documentTitle || headings.find((heading) => heading.level === 1)?.text || '';

    let description = metaDescription;
    if (!description && paragraphs.length > 0) {
      description =
        paragraphs[0].length > MAX_DESCRIPTION_LENGTH
          ? `${paragraphs[0].slice(0, MAX_DESCRIPTION_LENGTH)}...`
          : paragraphs[0];
    }

    return { title, description, headings, paragraphs, text };
  }

  async extractEntities(text: string): Promise<Entity[]> {
    const entities: Entity[] = [];
    const seen = new Set<string>();
    for (const [type, pattern] of ENTITY_PATTERNS) {
      for (const match of text.matchAll(pattern)) {
        const key = `${type}:${match[0]}`;
        if (!seen.has(key)) {
          seen.add(key);
          entities.push({ type, value: match[0] });
        }
      }
    }
    return entities;
  }

  async extractTopics(content: PageContent): Promise<TopicSummary> {
    const frequencies = new Map<string, number>();
    for (const word of tokenize(content.text)) {
      if (word.length > 3 && !STOP_WORDS.has(word)) {
        frequencies.set(word, (frequencies.get(word) ?? 0) + 1);
      }
    }

    // sort is stable, so equally frequent words keep first-occurrence order
    const keywords = [...frequencies.entries()]
      .sort((a, b) => b[1] - a[1])
      .slice(0, MAX_KEYWORDS)
      .map(([word]) => word);

    const mainTopics = content.headings
      .filter((heading) => heading.level <= 2)
      .slice(0, MAX_MAIN_TOPICS)
      .map((heading) => heading.text);

    const haystack = `${content.headings.map((heading) => heading.text).join(' ')} ${content.text}`.toLowerCase();
    const categories = CATEGORY_KEYWORDS.filter(([, words]) =>
      words.some((word) => new RegExp(`\\b${word}`).test(haystack))
    ).map(([category]) => category);

    return { keywords, mainTopics, categories };
  }

  /**
   * Signed feature hashing of non-stop-word tokens, L2-normalized.
   * Empty or stop-word-only text yields the zero vector.
   */
  async generateEmbedding(text: string): Promise<number[]> {
    const vector = new Array<number>(this.embeddingDimension).fill(0);
    for (const token of tokenize(text)) {
      if (STOP_WORDS.has(token)) {
        continue;
      }
      const digest = createHash('sha1').update(token).digest();
      const bucket = digest.readUInt32BE(0) % this.embeddingDimension;
      const sign = (digest[4] & 1) === 0 ? 1 : -1;
      vector[bucket] += sign;
    }

    const norm = Math.sqrt(vector.reduce((sum, value) => sum + value * value, 0));
    return norm === 0 ? vector : vector.map((value) => value / norm);
  }
}
