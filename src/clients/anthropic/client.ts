/**
 * Anthropic Claude Client
 * LLM transport for annotation sessions
 */

import Anthropic from '@anthropic-ai/sdk';
import type { CompletionRequest, LlmTransport } from '../../chat/types.js';
import { MissingCredentialError } from '../../infra/errors.js';

const DEFAULT_MAX_TOKENS = 1024;

let anthropicInstance: Anthropic | null = null;

/**
 * Get or create Anthropic client instance. An explicit key always builds
 * a new client; otherwise ANTHROPIC_API_KEY backs a shared one.
 */
export function getAnthropic(apiKey?: string): Anthropic {
  const explicitKey = apiKey?.trim();
  if (explicitKey) {
    return new Anthropic({ apiKey: explicitKey });
  }

  if (!anthropicInstance) {
    const envKey = process.env.ANTHROPIC_API_KEY?.trim();

    if (!envKey) {
      throw new MissingCredentialError('ANTHROPIC_API_KEY');
    }

    anthropicInstance = new Anthropic({ apiKey: envKey });
  }
  return anthropicInstance;
}

/**
 * Sends the whole conversation with every request; the Messages API keeps
 * no state between calls.
 */
export class AnthropicTransport implements LlmTransport {
  private anthropic: Anthropic;

  constructor(anthropic: Anthropic) {
    this.anthropic = anthropic;
  }

  async complete(request: CompletionRequest): Promise<string> {
    const message = await this.anthropic.messages.create({
      model: request.model,
      max_tokens: request.maxTokens ?? DEFAULT_MAX_TOKENS,
      messages: request.messages.map(m => ({ role: m.role, content: m.content })),
    });

    return message.content
      .map(block => (block.type === 'text' ? block.text : ''))
      .join('');
  }
}

export function createAnthropicTransport(apiKey?: string): AnthropicTransport {
  return new AnthropicTransport(getAnthropic(apiKey));
}

