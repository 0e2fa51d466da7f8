/**
 * Conversation Session
 *
 * Multi-turn exchange about one piece of content, bound to one model at a
 * time. The content is sent once, in the priming turn; every later prompt
 * relies on the history built up since then.
 */

import type { ModelSpec } from '../types/index.js';
import { SessionNotEstablishedError } from '../infra/errors.js';
import type { SessionBinding } from '../infra/call-orchestrator.js';
import { buildPrimingPrompt } from '../prompts/index.js';
import type { ChatMessage, LlmTransport } from './types.js';

const DEFAULT_MAX_TOKENS = 1024;

export interface ConversationSessionOptions {
  maxTokens?: number;
}

export class ConversationSession implements SessionBinding {
  private transport: LlmTransport;
  private readonly content: string;
  private readonly maxTokens: number;
  private history: ChatMessage[] = [];
  private boundModel: ModelSpec | null = null;

  constructor(transport: LlmTransport, content: string, options: ConversationSessionOptions = {}) {
    this.transport = transport;
    this.content = content;
    this.maxTokens = options.maxTokens ?? DEFAULT_MAX_TOKENS;
  }

  /**
   * Start a fresh conversation on `model` by sending the priming prompt.
   * Nothing is kept if the priming call fails.
   */
  async establish(model: ModelSpec): Promise<string> {
    this.teardown();

    const priming: ChatMessage = { role: 'user', content: buildPrimingPrompt(this.content) };
    const reply = await this.transport.complete({
      model: model.name,
      messages: [priming],
      maxTokens: this.maxTokens,
    });

    this.history = [priming, { role: 'assistant', content: reply }];
    this.boundModel = model;
    console.log(`[ConversationSession] established on ${model.name}`);
    return reply;
  }

  /**
   * Send one prompt in the established conversation. History only grows
   * when the reply arrives, so a failed send can simply be repeated.
   */
  async send(prompt: string): Promise<string> {
    if (!this.boundModel) {
      throw new SessionNotEstablishedError();
    }

    const turn: ChatMessage = { role: 'user', content: prompt };
    const reply = await this.transport.complete({
      model: this.boundModel.name,
      messages: [...this.history, turn],
      maxTokens: this.maxTokens,
    });

    this.history.push(turn, { role: 'assistant', content: reply });
    return reply;
  }

  teardown(): void {
    this.history = [];
    this.boundModel = null;
  }

  get model(): ModelSpec | null {
    return this.boundModel;
  }

  get isEstablished(): boolean {
    return this.boundModel !== null;
  }

  /** Completed user/assistant exchanges, priming included */
  get turnCount(): number {
    return this.history.length / 2;
  }
}
