import { describe, it, expect } from 'vitest';
import { AnswerSynthesizer, normalizeCandidates } from './answer-synthesizer';
import type { ScoredChunk } from './vector-index';
import type { ChatMessage, CompletionOptions, LLM } from '../ports/LLM';
import { FakeLLM } from '../test-helpers/fakes';
import { SYSTEM_PROMPT } from '../prompts/systemPrompt';
import { CancelledError, GenerationUnavailableError } from '../errors';

const FALLBACK = 'Please contact HR.';

const context: ScoredChunk[] = [
  {
    chunk: { id: 'handbook.txt#0', source: 'handbook.txt', ordinal: 0, text: 'Employees receive 25 vacation days per year.', start: 0, end: 44 },
    score: 0.9,
  },
];

/** Never answers; rejects once its signal aborts. */
class HangingLLM implements LLM {
  calls = 0;

  generateCompletion(_messages: ChatMessage[], options: CompletionOptions): Promise<string> {
    this.calls += 1;
    return new Promise((_resolve, reject) => {
      options.signal?.addEventListener('abort', () => reject(new Error('aborted')), { once: true });
    });
  }
}

function synthesizer(llm: LLM, timeoutMs = 1000): AnswerSynthesizer {
  return new AnswerSynthesizer(llm, { fallbackMessage: FALLBACK, timeoutMs, temperature: 0.2, maxTokens: 300 });
}

describe('normalizeCandidates', () => {
  it('drops blanks and duplicates but keeps the order', () => {
    expect(normalizeCandidates(['b', ' ', 'a', 'b', ' c ', ''])).toEqual(['b', 'a', 'c']);
  });
});

describe('AnswerSynthesizer', () => {
  it('builds a grounded prompt from the system instruction, excerpts and question', () => {
    const messages = synthesizer(new FakeLLM()).buildMessages('How many vacation days do I have?', context);

    expect(messages[0]).toEqual({ role: 'system', content: SYSTEM_PROMPT });
    expect(messages[1].role).toBe('user');
    expect(messages[1].content).toContain('[1] Source: handbook.txt\nEmployees receive 25 vacation days per year.');
    expect(messages[1].content).toContain(`reply with: "${FALLBACK}"`);
    expect(messages[1].content.endsWith('User question: How many vacation days do I have?')).toBe(true);
  });

  it('uses the first candidate that answers', async () => {
    const llm = new FakeLLM({ 'model-a': 'First answer', 'model-b': 'Second answer' });

    const outcome = await synthesizer(llm).answer('question', context, ['model-a', 'model-b']);

    expect(outcome).toEqual({ kind: 'answered', text: 'First answer', model: 'model-a', failures: [] });
    expect(llm.models).toEqual(['model-a']);
    expect(llm.calls[0].options).toMatchObject({ temperature: 0.2, maxTokens: 300 });
  });

  it('tries failing candidates once each, in order, before the one that works', async () => {
    const llm = new FakeLLM({
      A: new GenerationUnavailableError('A is down'),
      B: new Error('rate limited'),
      C: 'Answer from C',
    });

    const outcome = await synthesizer(llm).answer('question', context, ['A', 'B', 'C']);

    expect(outcome.kind).toBe('answered');
    expect(outcome.text).toBe('Answer from C');
    expect(llm.models).toEqual(['A', 'B', 'C']);
    expect(outcome.failures).toEqual([
      { model: 'A', error: 'A is down' },
      { model: 'B', error: 'rate limited' },
    ]);
  });

  it('returns the fallback message when every candidate fails', async () => {
    const llm = new FakeLLM({ A: new Error('down'), B: new Error('down') });

    const outcome = await synthesizer(llm).answer('question', context, ['A', 'B']);

    expect(outcome.kind).toBe('fallback');
    expect(outcome.text).toBe(FALLBACK);
    expect(outcome.failures).toHaveLength(2);
  });

  it('returns the fallback message when no candidate is configured', async () => {
    const llm = new FakeLLM();

    const outcome = await synthesizer(llm).answer('question', context, ['', '  ']);

    expect(outcome).toEqual({ kind: 'fallback', text: FALLBACK, failures: [] });
    expect(llm.calls).toHaveLength(0);
  });

  it('treats a blank completion as a failed candidate', async () => {
    const llm = new FakeLLM({ A: '   ', B: ' Answer from B\n' });

    const outcome = await synthesizer(llm).answer('question', context, ['A', 'B']);

    expect(outcome.text).toBe('Answer from B');
    expect(outcome.failures).toEqual([{ model: 'A', error: 'Model A returned an empty answer' }]);
  });

  it('moves to the next candidate when a call times out', async () => {
    const hanging = new HangingLLM();
    const fallbackLLM = new FakeLLM({ fast: 'Fast answer' });
    const llm: LLM = {
      generateCompletion: (messages, options) =>
        options.model === 'slow' ? hanging.generateCompletion(messages, options) : fallbackLLM.generateCompletion(messages, options),
    };

    const outcome = await synthesizer(llm, 20).answer('question', context, ['slow', 'fast']);

    expect(outcome.text).toBe('Fast answer');
    expect(outcome.failures).toEqual([{ model: 'slow', error: 'timed out after 20ms' }]);
  });

  it('stops without calling a model when the caller already cancelled', async () => {
    const llm = new FakeLLM({ A: 'answer' });
    const controller = new AbortController();
    controller.abort();

    await expect(synthesizer(llm).answer('question', context, ['A'], { signal: controller.signal })).rejects.toBeInstanceOf(
      CancelledError
    );
    expect(llm.calls).toHaveLength(0);
  });

  it('cancels the in-flight call and tries no further candidates', async () => {
    const llm = new HangingLLM();
    const controller = new AbortController();

    const pending = synthesizer(llm).answer('question', context, ['A', 'B'], { signal: controller.signal });
    controller.abort();

    await expect(pending).rejects.toBeInstanceOf(CancelledError);
    expect(llm.calls).toBe(1);
  });
});
