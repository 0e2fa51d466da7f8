/**
 * Prompts Index
 */

export { buildPrimingPrompt, ANNOTATION_PROMPTS } from './annotation.js';

import type { AnalysisKind } from '../types/index.js';
import { ANNOTATION_PROMPTS } from './annotation.js';

/**
 * Get the instruction prompt for one label
 */
export function getAnnotationPrompt(kind: AnalysisKind): string {
  return ANNOTATION_PROMPTS[kind];
}
