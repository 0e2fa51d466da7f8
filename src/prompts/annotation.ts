/**
 * Annotation Prompts
 * The priming turn plus one instruction per label
 */

import { Category, Sentiment, type AnalysisKind } from '../types/index.js';

export function buildPrimingPrompt(content: string): string {
  return `I am going to give you a piece of text, followed by a series of tasks about it. Do not answer anything yet.

Text:
${content}`;
}

const CATEGORY_DESCRIPTIONS: Record<Exclude<Category, 'NONE'>, string> = {
  KNOWLEDGE: 'technical tutorials, industry forecasts, tool reviews',
  OPINION: 'commentary on current events, industry observation, book reviews',
  LIFESTYLE: 'personal growth, essays, travel and food',
  ENTERTAINMENT: 'jokes, memes, rants',
  INTERACTIVE: 'polls, chain challenges, quizzes',
  PRODUCT_MARKETING: 'product introductions, marketing campaigns',
};

function buildCategoryPrompt(): string {
  const names = Object.values(Category).filter(c => c !== Category.NONE);
  const descriptions = Object.entries(CATEGORY_DESCRIPTIONS)
    .map(([name, description]) => `${name}: ${description}`)
    .join('\n');

  return `Based on the text above, choose the single type that best represents it.

Types:
${descriptions}

Answer with exactly one of: ${names.join(' or ')}`;
}

function buildSentimentPrompt(): string {
  const names = Object.values(Sentiment).filter(s => s !== Sentiment.NONE);
  return `Based on the text above, is its overall sentiment positive, neutral or negative? Answer with exactly one of: ${names.join(' or ')}`;
}

export const ANNOTATION_PROMPTS: Record<AnalysisKind, string> = {
  tags: "Based on the text above, list the topic keywords that best represent it. Answer in the format: ['tag1', 'tag2', 'tag3']",
  category: buildCategoryPrompt(),
  sentiment: buildSentimentPrompt(),
  hotspot: 'Based on the text above, is it about a hot topic, meaning one widely discussed within the last two years? Answer in the format: True or False',
  creative: 'Based on the text above, is it creative content, meaning content that is original, novel or inventive? Answer in the format: True or False',
};
