import type { Entity, PageContent, TopicSummary } from '../../types/knowledge.js';

/**
 * Content model used by the pipeline. Each step may fail independently; the
 * pipeline records a warning and stores the page with whatever succeeded.
 */
export interface SemanticAnalyzer {
  extractContent(rawContent: string, url: string): Promise<PageContent>;
  extractEntities(text: string): Promise<Entity[]>;
  extractTopics(content: PageContent): Promise<TopicSummary>;
  generateEmbedding(text: string): Promise<number[]>;
}
