/**
 * Post Store Tests
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import { annotatedPathFor, loadPosts, savePosts } from '../store/posts.js';
import { ConfigurationError } from '../infra/errors.js';

describe('Post store', () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'postlens-store-'));
  });

  afterEach(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  it('should save into a new directory and load back with extra fields', async () => {
    const file = path.join(tempDir, 'out', 'posts.json');
    const posts = [
      { link: 'p1', title: 'First', content: 'hello', likes: 4, tags: ['a'] },
      { link: 'p2', content: null },
    ];

    await savePosts(file, posts);

    expect(await loadPosts(file)).toEqual(posts);
    expect(await fs.readdir(path.dirname(file))).toEqual(['posts.json']);
  });

  it('should write pretty JSON with a trailing newline', async () => {
    const file = path.join(tempDir, 'posts.json');
    await savePosts(file, [{ link: 'p1' }]);

    expect(await fs.readFile(file, 'utf-8')).toBe('[\n  {\n    "link": "p1"\n  }\n]\n');
  });

  it('should remove the temporary file when the final rename fails', async () => {
    const file = path.join(tempDir, 'posts.json');
    await fs.mkdir(path.join(file, 'occupied'), { recursive: true });

    await expect(savePosts(file, [{ link: 'p1' }])).rejects.toThrow();

    expect(await fs.readdir(tempDir)).toEqual(['posts.json']);
  });

  it('should reject posts without a link', async () => {
    const file = path.join(tempDir, 'posts.json');
    await fs.writeFile(file, JSON.stringify([{ title: 'no link' }]));

    await expect(loadPosts(file)).rejects.toThrow(ConfigurationError);
  });

  it('should reject files that are not JSON', async () => {
    const file = path.join(tempDir, 'posts.json');
    await fs.writeFile(file, '{ nope');

    await expect(loadPosts(file)).rejects.toThrow(`Invalid JSON in ${file}`);
  });

  it('should derive the default output path', () => {
    expect(annotatedPathFor(path.join('data', 'posts.json'))).toBe(path.join('data', 'posts.annotated.json'));
    expect(annotatedPathFor(path.join('data', 'posts.txt'))).toBe(path.join('data', 'posts.txt.annotated.json'));
  });
});
