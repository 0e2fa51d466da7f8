/**
 * Post Annotator
 *
 * Runs every label over a list of posts, one annotation session per post,
 * strictly in sequence.
 */

import {
  Category,
  ContentLength,
  Sentiment,
  type AnnotatedPost,
  type PostAnnotations,
  type PostRecord,
} from '../types/index.js';
import {
  OrchestrationAbortedError,
  isFatalOrchestrationError,
  isNoAvailableModelError,
  toError,
} from '../infra/errors.js';
import type { AnnotationSession } from './session.js';

export type SessionOpener = (content: string) => Promise<AnnotationSession>;

export function classifyContentLength(content: string | null | undefined): ContentLength {
  if (content === null || content === undefined) return ContentLength.NONE;

  const length = content.length;
  if (length < 100) return ContentLength.SHORT;
  if (length < 500) return ContentLength.MEDIUM;
  if (length < 2000) return ContentLength.LONG;
  return ContentLength.LONGER;
}

function emptyAnnotations(content: string | null | undefined): PostAnnotations {
  return {
    contentLength: classifyContentLength(content),
    tags: [],
    category: Category.NONE,
    sentiment: Sentiment.NONE,
    isHotspot: false,
    isCreative: false,
    annotatedWith: null,
  };
}

/**
 * Annotate one post. Posts without usable content come back with empty
 * labels and are never sent to a model.
 */
export async function annotatePost(post: PostRecord, openSession: SessionOpener): Promise<AnnotatedPost> {
  const content = typeof post.content === 'string' ? post.content : null;

  if (!content || !content.trim()) {
    console.warn(`[PostAnnotator] ${post.link} has no content, skipping`);
    return { ...post, ...emptyAnnotations(content) };
  }

  const session = await openSession(content);

  const tags = await session.tags();
  const category = await session.category();
  const sentiment = await session.sentiment();
  const isHotspot = await session.isHotspot();
  const isCreative = await session.isCreative();

  return {
    ...post,
    contentLength: classifyContentLength(content),
    tags,
    category,
    sentiment,
    isHotspot,
    isCreative,
    annotatedWith: session.currentModel.name,
  };
}

/**
 * Raised when a run stops early; carries what was finished before it
 */
export class AnnotationRunError extends Error {
  readonly completed: AnnotatedPost[];
  readonly failedPost: PostRecord | null;
  readonly reason: Error;

  constructor(reason: Error, completed: AnnotatedPost[], failedPost: PostRecord | null) {
    super(
      failedPost
        ? `Annotation stopped at ${failedPost.link}: ${reason.message}`
        : `Annotation stopped: ${reason.message}`
    );
    this.name = 'AnnotationRunError';
    this.reason = reason;
    this.completed = completed;
    this.failedPost = failedPost;
  }

  /** True when the run stopped because every model was used up */
  get poolExhausted(): boolean {
    return isNoAvailableModelError(this.reason);
  }

  /** True when orchestration gave up (pool, attempt ceiling or abort), false for setup errors */
  get orchestrationFailed(): boolean {
    return isFatalOrchestrationError(this.reason);
  }
}

export interface AnnotatePostsOptions {
  openSession: SessionOpener;
  signal?: AbortSignal;
  onProgress?: (done: number, total: number, post: AnnotatedPost) => void;
}

export async function annotatePosts(
  posts: PostRecord[],
  options: AnnotatePostsOptions
): Promise<AnnotatedPost[]> {
  const results: AnnotatedPost[] = [];

  for (const post of posts) {
    if (options.signal?.aborted) {
      throw new AnnotationRunError(new OrchestrationAbortedError('annotate'), results, post);
    }

    let annotated: AnnotatedPost;
    try {
      annotated = await annotatePost(post, options.openSession);
    } catch (error) {
      throw new AnnotationRunError(toError(error), results, post);
    }

    results.push(annotated);
    options.onProgress?.(results.length, posts.length, annotated);
  }

  return results;
}
