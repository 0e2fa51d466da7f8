/**
 * Post Store
 *
 * Reads crawled posts from a JSON array and writes annotated posts back.
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import { z } from 'zod';
import type { PostRecord } from '../types/index.js';
import { ConfigurationError } from '../infra/errors.js';

const PostRecordSchema = z
  .object({
    link: z.string().min(1),
    title: z.string().optional(),
    selectedDate: z.string().optional(),
    content: z.string().nullable().optional(),
  })
  .passthrough();

const PostListSchema = z.array(PostRecordSchema);

/**
 * Load and validate posts from disk
 */
export async function loadPosts(filePath: string): Promise<PostRecord[]> {
  const raw = await fs.readFile(filePath, 'utf-8');

  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigurationError(`Invalid JSON in ${filePath}`, [reason]);
  }

  const parsed = PostListSchema.safeParse(json);
  if (!parsed.success) {
    throw new ConfigurationError(
      `Invalid post list in ${filePath}`,
      parsed.error.issues.map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
    );
  }
  return parsed.data;
}

/**
 * Write posts as pretty JSON. The temp file is renamed over the target so
 * readers never see a half-written file.
 */
export async function savePosts(filePath: string, posts: readonly PostRecord[]): Promise<void> {
  await fs.mkdir(path.dirname(filePath), { recursive: true });

  const tempPath = `${filePath}.${process.pid}.tmp`;
  try {
    await fs.writeFile(tempPath, JSON.stringify(posts, null, 2) + '\n', 'utf-8');
    await fs.rename(tempPath, filePath);
  } catch (error) {
    await fs.rm(tempPath, { force: true });
    throw error;
  }
}

/**
 * Default output path for an input file
 */
export function annotatedPathFor(inputPath: string): string {
  const parsed = path.parse(inputPath);
  const base = parsed.ext === '.json' ? parsed.name : parsed.base;
  return path.join(parsed.dir, `${base}.annotated.json`);
}
