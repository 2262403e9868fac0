import type { LLM, ChatMessage } from '../ports/LLM';
import type { ScoredChunk } from './vector-index';
import { SYSTEM_PROMPT, buildUserPrompt } from '../prompts/systemPrompt';
import { CancelledError, GenerationUnavailableError, getErrorMessage } from '../errors';
import { throwIfCancelled, withDeadline } from '../utils/abort';
import { Logger, silentLogger } from '../utils/logger';

export interface SynthesizerOptions {
  fallbackMessage: string;
  timeoutMs: number;
  temperature?: number;
  maxTokens?: number;
}

export interface CandidateFailure {
  model: string;
  error: string;
}

export type SynthesisOutcome =
  | { kind: 'answered'; text: string; model: string; failures: CandidateFailure[] }
  | { kind: 'fallback'; text: string; failures: CandidateFailure[] };

/** Drops blank identifiers and repeats, keeping the first occurrence. */
export function normalizeCandidates(candidates: readonly string[]): string[] {
  const seen = new Set<string>();
  const result: string[] = [];
  for (const raw of candidates) {
    const model = raw.trim();
    if (!model || seen.has(model)) continue;
    seen.add(model);
    result.push(model);
  }
  return result;
}

export class AnswerSynthesizer {
  constructor(
    private readonly llm: LLM,
    private readonly options: SynthesizerOptions,
    private readonly logger: Logger = silentLogger
  ) {}

  buildMessages(question: string, context: ScoredChunk[]): ChatMessage[] {
    return [
      { role: 'system', content: SYSTEM_PROMPT },
      { role: 'user', content: buildUserPrompt(question, context, this.options.fallbackMessage) },
    ];
  }

  async answer(
    question: string,
    context: ScoredChunk[],
    modelCandidates: readonly string[],
    options: { signal?: AbortSignal } = {}
  ): Promise<SynthesisOutcome> {
    const messages = this.buildMessages(question, context);
    const failures: CandidateFailure[] = [];

    for (const model of normalizeCandidates(modelCandidates)) {
      throwIfCancelled(options.signal);
      const deadline = withDeadline(this.options.timeoutMs, options.signal);
      try {
        const text = await this.llm.generateCompletion(messages, {
          model,
          temperature: this.options.temperature,
          maxTokens: this.options.maxTokens,
          signal: deadline.signal,
        });
        if (!text.trim()) {
          throw new GenerationUnavailableError(`Model ${model} returned an empty answer`);
        }
        return { kind: 'answered', text: text.trim(), model, failures };
      } catch (error) {
        if (options.signal?.aborted) {
          throw new CancelledError('Question cancelled while generating', error);
        }
        const reason = deadline.timedOut() ? `timed out after ${this.options.timeoutMs}ms` : getErrorMessage(error);
        failures.push({ model, error: reason });
        this.logger.warn(`⚠️  Model ${model} unavailable: ${reason}`);
      } finally {
        deadline.dispose();
      }
    }

    if (failures.length > 0) {
      this.logger.error(`❌ All ${failures.length} model candidates failed, answering with the fallback message`);
    } else {
      this.logger.error('❌ No model candidates configured, answering with the fallback message');
    }
    return { kind: 'fallback', text: this.options.fallbackMessage, failures };
  }
}
