import type { VectorIndex, QueryResult } from "./vector-index";
import type { Retriever } from "./retriever";
import type { AnswerSynthesizer } from "./answer-synthesizer";
import { decide } from "./relevance-gate";
import { CancelledError, ConfigurationError, getErrorMessage } from "../errors";
import { throwIfCancelled } from "../utils/abort";
import { Logger, silentLogger } from "../utils/logger";

export type QuestionState =
  | 'received'
  | 'embedded'
  | 'gated'
  | 'synthesizing'
  | 'answered'
  | 'fallback-returned';

export type FallbackReason =
  | 'empty-question'
  | 'below-threshold'
  | 'embedding-unavailable'
  | 'configuration'
  | 'generation-unavailable';

export type Answer =
  | { kind: 'answered'; text: string; model: string; sources: string[]; topScore: number; states: QuestionState[] }
  | { kind: 'fallback'; text: string; reason: FallbackReason; topScore: number | null; states: QuestionState[] };

export interface QueryHandlerOptions {
  topK: number;
  relevanceThreshold: number;
  modelCandidates: readonly string[];
  fallbackMessage: string;
}

export class QueryHandler {
  constructor(
    private readonly index: VectorIndex,
    private readonly retriever: Retriever,
    private readonly synthesizer: AnswerSynthesizer,
    private readonly options: QueryHandlerOptions,
    private readonly logger: Logger = silentLogger
  ) {}

  /**
   * Answers one question. Resolves with either a grounded answer or the
   * fallback message; rejects only with CancelledError.
   */
  async run(question: string, options: { signal?: AbortSignal } = {}): Promise<Answer> {
    const states: QuestionState[] = ['received'];
    const fallback = (reason: FallbackReason, topScore: number | null = null): Answer => {
      states.push('fallback-returned');
      return { kind: 'fallback', text: this.options.fallbackMessage, reason, topScore, states };
    };

    throwIfCancelled(options.signal);
    if (!question.trim()) return fallback('empty-question');

    let results: QueryResult;
    try {
      results = await this.retriever.query(this.index, question, this.options.topK, {
        signal: options.signal,
        onEmbedded: () => states.push('embedded'),
      });
    } catch (error) {
      if (error instanceof CancelledError) throw error;
      if (error instanceof ConfigurationError) {
        this.logger.error(`❌ ${error.message}`);
        return fallback('configuration');
      }
      this.logger.error(`❌ Retrieval failed: ${getErrorMessage(error)}`);
      return fallback('embedding-unavailable');
    }

    const gate = decide(results, this.options.relevanceThreshold);
    states.push('gated');
    if (gate.decision === 'fallback') {
      this.logger.debug(`🚧 Top score ${gate.topScore ?? 'n/a'} below threshold ${this.options.relevanceThreshold}`);
      return fallback('below-threshold', gate.topScore);
    }

    this.logger.debug(`🔍 Top score ${gate.topScore.toFixed(3)} from ${gate.context[0].chunk.id}`);
    states.push('synthesizing');
    const outcome = await this.synthesizer.answer(question, gate.context, this.options.modelCandidates, {
      signal: options.signal,
    });
    if (outcome.kind === 'fallback') return fallback('generation-unavailable', gate.topScore);

    const sources = gate.context.map(result => result.chunk.source);
    const uniqueSources = sources.filter((source, index, arr) => arr.indexOf(source) === index);

    states.push('answered');
    return { kind: 'answered', text: outcome.text, model: outcome.model, sources: uniqueSources, topScore: gate.topScore, states };
  }
}
