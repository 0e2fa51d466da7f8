/**
 * postlens
 *
 * Labels crawled social-media posts with an LLM. Each post gets its own
 * conversation; every call is rate limited per model and fails over along
 * an ordered model catalog.
 */

export * from './types/index.js';
export * from './infra/index.js';
export * from './annotator/index.js';

export { ConversationSession, type ConversationSessionOptions } from './chat/session.js';
export type { ChatMessage, CompletionRequest, LlmTransport } from './chat/types.js';
export { AnthropicTransport, createAnthropicTransport, getAnthropic } from './clients/anthropic/client.js';
export { ANNOTATION_PROMPTS, buildPrimingPrompt, getAnnotationPrompt } from './prompts/index.js';
export {
  ANALYSIS_OPERATIONS,
  AnalysisOperation,
  parseCategory,
  parseFlag,
  parseSentiment,
  parseTags,
  type PromptChannel,
} from './analysis/index.js';
export { DEFAULT_MODEL_CATALOG, loadModelCatalog, parseModelCatalog, getModelChain } from './config/index.js';
export { getConfig, validateConfig, logConfig, type AnnotatorConfig } from './config.js';
export { loadPosts, savePosts, annotatedPathFor } from './store/posts.js';
