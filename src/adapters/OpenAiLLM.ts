import OpenAI from 'openai';
import { ChatMessage, CompletionOptions, LLM } from '../ports/LLM';
import { GenerationUnavailableError } from '../errors';
import { describeOpenAiError } from './openAiErrors';

/** The slice of the OpenAI client this adapter calls. */
export interface ChatCompletionsClient {
    chat: {
        completions: {
            create(
                body: { model: string; messages: ChatMessage[]; temperature?: number; max_completion_tokens?: number },
                options?: { signal?: AbortSignal }
            ): Promise<{ choices: Array<{ message: { content: string | null } }> }>;
        };
    };
}

export class OpenAIChatAdapter implements LLM {
    private readonly client: ChatCompletionsClient | null;

    constructor(options: { apiKey?: string; client?: ChatCompletionsClient } = {}) {
        if (options.client) {
            this.client = options.client;
        } else if (options.apiKey) {
            this.client = new OpenAI({
                apiKey: options.apiKey,
                // candidates are retried by the caller
                maxRetries: 0,
            });
        } else {
            this.client = null;
        }
    }

    async generateCompletion(messages: ChatMessage[], options: CompletionOptions): Promise<string> {
        if (!this.client) {
            throw new GenerationUnavailableError('OPENAI_API_KEY is not set');
        }

        let response: { choices: Array<{ message: { content: string | null } }> };
        try {
            response = await this.client.chat.completions.create(
                {
                    model: options.model,
                    messages,
                    ...(options.temperature !== undefined ? { temperature: options.temperature } : {}),
                    ...(options.maxTokens !== undefined ? { max_completion_tokens: options.maxTokens } : {}),
                },
                { signal: options.signal }
            );
        } catch (error) {
            throw new GenerationUnavailableError(`${options.model}: ${describeOpenAiError(error)}`, error);
        }

        const content = response.choices[0]?.message?.content;
        if (!content) {
            throw new GenerationUnavailableError(`${options.model}: response missing choices[0].message.content`);
        }
        return content;
    }
}
