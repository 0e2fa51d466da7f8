/**
 * Analysis Operations
 *
 * One operation per label. Each sends its instruction prompt through an
 * already-primed conversation and parses the reply.
 */

import { Category, Sentiment, type AnalysisKind } from '../types/index.js';
import { getAnnotationPrompt } from '../prompts/index.js';
import { parseCategory, parseFlag, parseSentiment, parseTags } from './parsers.js';

/**
 * The part of a conversation an operation needs
 */
export interface PromptChannel {
  send(prompt: string): Promise<string>;
}

export abstract class AnalysisOperation<T> {
  abstract readonly kind: AnalysisKind;
  /** Value a reply falls back to when it cannot be interpreted */
  abstract readonly fallback: T;

  get prompt(): string {
    return getAnnotationPrompt(this.kind);
  }

  abstract parse(reply: string): T;

  /**
   * Send the prompt and parse the reply. Transport errors propagate so the
   * orchestrator can retry; parse failures never do.
   */
  async execute(channel: PromptChannel): Promise<T> {
    const reply = await channel.send(this.prompt);
    const value = this.parse(reply);

    if (this.isFallback(value, reply)) {
      console.warn(`[Analysis] ${this.kind}: could not interpret reply ${JSON.stringify(reply)}`);
    } else {
      console.log(`[Analysis] ${this.kind}: ${JSON.stringify(value)}`);
    }
    return value;
  }

  protected isFallback(value: T, _reply: string): boolean {
    return value === this.fallback;
  }
}

export class TagsOperation extends AnalysisOperation<string[]> {
  readonly kind = 'tags';
  readonly fallback: string[] = [];

  parse(reply: string): string[] {
    return parseTags(reply);
  }

  protected isFallback(value: string[], reply: string): boolean {
    return value.length === 0 && !/^\[\s*\]$/.test(reply.trim());
  }
}

export class CategoryOperation extends AnalysisOperation<Category> {
  readonly kind = 'category';
  readonly fallback: Category = Category.NONE;

  parse(reply: string): Category {
    return parseCategory(reply);
  }
}

export class SentimentOperation extends AnalysisOperation<Sentiment> {
  readonly kind = 'sentiment';
  readonly fallback: Sentiment = Sentiment.NONE;

  parse(reply: string): Sentiment {
    return parseSentiment(reply);
  }
}

/**
 * True/false questions. Replies other than `true` read as false, which
 * also covers garbage, so false here means "not confirmed"
 */
export class FlagOperation extends AnalysisOperation<boolean> {
  readonly fallback = false;

  constructor(readonly kind: 'hotspot' | 'creative') {
    super();
  }

  parse(reply: string): boolean {
    return parseFlag(reply);
  }

  protected isFallback(value: boolean, reply: string): boolean {
    return !value && reply.trim().toLowerCase() !== 'false';
  }
}

export const ANALYSIS_OPERATIONS = {
  tags: new TagsOperation(),
  category: new CategoryOperation(),
  sentiment: new SentimentOperation(),
  hotspot: new FlagOperation('hotspot'),
  creative: new FlagOperation('creative'),
} as const;
