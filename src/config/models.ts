/**
 * Model catalog configuration
 *
 * Ordered list of candidate models, primary first. Each carries the call
 * quotas of the credential it is used with.
 */

import * as fs from 'fs/promises';
import { z } from 'zod';
import type { ModelSpec } from '../types/index.js';
import { ConfigurationError } from '../infra/errors.js';

/**
 * Default model catalog
 */
export const DEFAULT_MODEL_CATALOG: readonly ModelSpec[] = [
  { name: 'claude-sonnet-4-20250514', maxCallsPerMinute: 50, maxCallsPerDay: 1500 },
  { name: 'claude-3-5-sonnet-20241022', maxCallsPerMinute: 50, maxCallsPerDay: 1500 },
  { name: 'claude-3-5-haiku-20241022', maxCallsPerMinute: 50, maxCallsPerDay: 1500 },
  { name: 'claude-3-haiku-20240307', maxCallsPerMinute: 50, maxCallsPerDay: 1500 },
];

const ModelSpecSchema = z.object({
  name: z.string().trim().min(1),
  maxCallsPerMinute: z.number().int().positive(),
  maxCallsPerDay: z.number().int().positive(),
});

const ModelCatalogSchema = z.array(ModelSpecSchema).min(1);

/**
 * Validate a catalog read from configuration
 */
export function parseModelCatalog(input: unknown): ModelSpec[] {
  const parsed = ModelCatalogSchema.safeParse(input);
  if (!parsed.success) {
    throw new ConfigurationError(
      'Invalid model catalog',
      parsed.error.issues.map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
    );
  }

  const seen = new Set<string>();
  const duplicates: string[] = [];
  for (const model of parsed.data) {
    if (seen.has(model.name)) duplicates.push(model.name);
    seen.add(model.name);
  }
  if (duplicates.length > 0) {
    throw new ConfigurationError('Invalid model catalog', duplicates.map(name => `duplicate model ${name}`));
  }

  return parsed.data;
}

/**
 * Load the catalog from a JSON file, or the default catalog without one
 */
export async function loadModelCatalog(path?: string): Promise<ModelSpec[]> {
  if (!path) {
    return [...DEFAULT_MODEL_CATALOG];
  }

  let raw: string;
  try {
    raw = await fs.readFile(path, 'utf-8');
  } catch (error) {
    throw new ConfigurationError(`Cannot read model catalog ${path}`, [String(error)]);
  }

  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (error) {
    throw new ConfigurationError(`Model catalog ${path} is not valid JSON`, [String(error)]);
  }

  return parseModelCatalog(json);
}

/**
 * Model names in fallback order
 */
export function getModelChain(catalog: readonly ModelSpec[] = DEFAULT_MODEL_CATALOG): string[] {
  return catalog.map(m => m.name);
}
