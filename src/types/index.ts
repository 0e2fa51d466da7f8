/**
 * postlens Shared Types
 */

// =============================================================================
// MODELS
// =============================================================================

/**
 * One remote LLM backend with its own call quotas
 */
export interface ModelSpec {
  readonly name: string;                 // Unique within a catalog
  readonly maxCallsPerMinute: number;
  readonly maxCallsPerDay: number;
}

// =============================================================================
// ANALYSIS RESULTS
// =============================================================================

export const Category = {
  NONE: 'NONE',
  KNOWLEDGE: 'KNOWLEDGE',                 // tutorials, industry forecasts, tool reviews
  OPINION: 'OPINION',                     // commentary, industry observation, book reviews
  LIFESTYLE: 'LIFESTYLE',                 // personal growth, essays, travel and food
  ENTERTAINMENT: 'ENTERTAINMENT',         // jokes, memes, rants
  INTERACTIVE: 'INTERACTIVE',             // polls, challenges, quizzes
  PRODUCT_MARKETING: 'PRODUCT_MARKETING', // product introductions, campaigns
} as const;

export type Category = (typeof Category)[keyof typeof Category];

export const Sentiment = {
  NONE: 'NONE',
  NEUTRAL: 'NEUTRAL',
  NEGATIVE: 'NEGATIVE',
  POSITIVE: 'POSITIVE',
} as const;

export type Sentiment = (typeof Sentiment)[keyof typeof Sentiment];

export const ContentLength = {
  NONE: 'NONE',
  SHORT: 'SHORT',
  MEDIUM: 'MEDIUM',
  LONG: 'LONG',
  LONGER: 'LONGER',
} as const;

export type ContentLength = (typeof ContentLength)[keyof typeof ContentLength];

export type AnalysisKind = 'tags' | 'category' | 'sentiment' | 'hotspot' | 'creative';

// =============================================================================
// POSTS
// =============================================================================

/**
 * A post as read from a posts file. Fields other than `link` are optional
 * and anything unknown is carried through untouched.
 */
export interface PostRecord {
  link: string;
  title?: string;
  selectedDate?: string;
  content?: string | null;
  [field: string]: unknown;
}

export interface PostAnnotations {
  contentLength: ContentLength;
  tags: string[];
  category: Category;
  sentiment: Sentiment;
  isHotspot: boolean;
  isCreative: boolean;
  annotatedWith: string | null;          // Model in use for the last label, null when skipped
}

export type AnnotatedPost = PostRecord & PostAnnotations;
