/**
 * Post Annotator Tests
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import {
  annotatePost,
  annotatePosts,
  AnnotationRunError,
  classifyContentLength,
} from '../annotator/post-annotator.js';
import { AnnotationSession } from '../annotator/session.js';
import { Category, ContentLength, Sentiment, type PostRecord } from '../types/index.js';
import { ManualClock, ScriptedTransport, modelA, promptKindOf, replyByKind } from './fixtures/transport.fixtures.js';

describe('classifyContentLength', () => {
  it('should bucket by character count', () => {
    expect(classifyContentLength(null)).toBe(ContentLength.NONE);
    expect(classifyContentLength(undefined)).toBe(ContentLength.NONE);
    expect(classifyContentLength('a'.repeat(99))).toBe(ContentLength.SHORT);
    expect(classifyContentLength('a'.repeat(100))).toBe(ContentLength.MEDIUM);
    expect(classifyContentLength('a'.repeat(499))).toBe(ContentLength.MEDIUM);
    expect(classifyContentLength('a'.repeat(500))).toBe(ContentLength.LONG);
    expect(classifyContentLength('a'.repeat(1999))).toBe(ContentLength.LONG);
    expect(classifyContentLength('a'.repeat(2000))).toBe(ContentLength.LONGER);
  });
});

describe('Post annotation', () => {
  let clock: ManualClock;

  beforeEach(() => {
    clock = new ManualClock();
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    vi.spyOn(console, 'log').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should skip posts without content', async () => {
    const openSession = vi.fn();
    const post: PostRecord = { link: 'https://example.com/p/1', title: 'empty', content: null, likes: 3 };

    const result = await annotatePost(post, openSession);

    expect(openSession).not.toHaveBeenCalled();
    expect(result).toEqual({
      link: 'https://example.com/p/1',
      title: 'empty',
      content: null,
      likes: 3,
      contentLength: ContentLength.NONE,
      tags: [],
      category: Category.NONE,
      sentiment: Sentiment.NONE,
      isHotspot: false,
      isCreative: false,
      annotatedWith: null,
    });
  });

  it('should run every label on one session and keep the original fields', async () => {
    const transport = new ScriptedTransport(replyByKind());
    const post: PostRecord = { link: 'https://example.com/p/2', content: 'A new phone launched today.', likes: 12 };

    const result = await annotatePost(post, content =>
      AnnotationSession.open(content, { transport, catalog: [modelA], clock })
    );

    expect(result).toEqual({
      link: 'https://example.com/p/2',
      content: 'A new phone launched today.',
      likes: 12,
      contentLength: ContentLength.SHORT,
      tags: ['product', 'review'],
      category: Category.PRODUCT_MARKETING,
      sentiment: Sentiment.POSITIVE,
      isHotspot: false,
      isCreative: true,
      annotatedWith: 'model-a',
    });
    expect(transport.kinds()).toEqual(['priming', 'tags', 'category', 'sentiment', 'hotspot', 'creative']);
  });

  it('should annotate posts in order and report progress', async () => {
    const transport = new ScriptedTransport(replyByKind());
    const posts: PostRecord[] = [
      { link: 'p1', content: 'first post' },
      { link: 'p2', content: '   ' },
      { link: 'p3', content: 'third post' },
    ];
    const progress: Array<[number, number, string]> = [];

    const results = await annotatePosts(posts, {
      openSession: content => AnnotationSession.open(content, { transport, catalog: [modelA], clock }),
      onProgress: (done, total, post) => progress.push([done, total, post.link]),
    });

    expect(results.map(r => r.annotatedWith)).toEqual(['model-a', null, 'model-a']);
    expect(results[1].contentLength).toBe(ContentLength.SHORT);
    expect(progress).toEqual([
      [1, 3, 'p1'],
      [2, 3, 'p2'],
      [3, 3, 'p3'],
    ]);
    expect(transport.calls).toHaveLength(12);
  });

  it('should stop with partial results when the pool is exhausted', async () => {
    const transport = new ScriptedTransport((request, index) => {
      if (promptKindOf(request) === 'priming' && request.messages[0].content.includes('broken')) {
        throw new Error('HTTP 500');
      }
      return replyByKind()(request, index);
    });
    const posts: PostRecord[] = [
      { link: 'ok', content: 'fine post' },
      { link: 'bad', content: 'broken post' },
      { link: 'never', content: 'unreached post' },
    ];

    const error = await annotatePosts(posts, {
      openSession: content =>
        AnnotationSession.open(content, { transport, catalog: [modelA], retryMaxNum: 1, clock }),
    }).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(AnnotationRunError);
    if (error instanceof AnnotationRunError) {
      expect(error.completed.map(p => p.link)).toEqual(['ok']);
      expect(error.failedPost?.link).toBe('bad');
      expect(error.poolExhausted).toBe(true);
      expect(error.orchestrationFailed).toBe(true);
      expect(error.message).toBe(
        'Annotation stopped at bad: No fallback model left in the pool (last model: model-a)'
      );
    }
    expect(transport.calls).toHaveLength(7);
  });

  it('should stop before the next post once aborted', async () => {
    const controller = new AbortController();
    const transport = new ScriptedTransport(replyByKind());
    const posts: PostRecord[] = [
      { link: 'p1', content: 'first post' },
      { link: 'p2', content: 'second post' },
    ];

    const error = await annotatePosts(posts, {
      signal: controller.signal,
      openSession: content => AnnotationSession.open(content, { transport, catalog: [modelA], clock }),
      onProgress: () => controller.abort(),
    }).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(AnnotationRunError);
    if (error instanceof AnnotationRunError) {
      expect(error.completed).toHaveLength(1);
      expect(error.failedPost?.link).toBe('p2');
      expect(error.poolExhausted).toBe(false);
      expect(error.orchestrationFailed).toBe(true);
    }
  });

  it('should mark a session setup error as outside orchestration', async () => {
    const posts: PostRecord[] = [{ link: 'p1', content: 'first post' }];

    const error = await annotatePosts(posts, {
      openSession: () => Promise.reject(new Error('ANTHROPIC_API_KEY is required for real LLM calls')),
    }).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(AnnotationRunError);
    if (error instanceof AnnotationRunError) {
      expect(error.completed).toEqual([]);
      expect(error.failedPost?.link).toBe('p1');
      expect(error.poolExhausted).toBe(false);
      expect(error.orchestrationFailed).toBe(false);
    }
  });
});
