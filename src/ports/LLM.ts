export interface ChatMessage {
  role: 'system' | 'user' | 'assistant';
  content: string;
}

export interface CompletionOptions {
  model: string;
  temperature?: number;
  maxTokens?: number;
  signal?: AbortSignal;
}

export interface LLM {
  generateCompletion: (messages: ChatMessage[], options: CompletionOptions) => Promise<string>;
}
