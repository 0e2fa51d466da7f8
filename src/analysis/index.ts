/**
 * Analysis Exports
 */

export {
  AnalysisOperation,
  TagsOperation,
  CategoryOperation,
  SentimentOperation,
  FlagOperation,
  ANALYSIS_OPERATIONS,
  type PromptChannel,
} from './operations.js';

export {
  parseTags,
  parseCategory,
  parseSentiment,
  parseFlag,
  parseStringListLiteral,
  unwrapReply,
} from './parsers.js';
