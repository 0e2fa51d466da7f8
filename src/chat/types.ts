/**
 * Chat Transport Types
 */

export interface ChatMessage {
  role: 'user' | 'assistant';
  content: string;
}

export interface CompletionRequest {
  model: string;
  messages: ChatMessage[];
  maxTokens?: number;
}

/**
 * One stateless request/reply exchange with a remote model.
 * Conversation state lives with the caller.
 */
export interface LlmTransport {
  complete(request: CompletionRequest): Promise<string>;
}
