import type { ScoredChunk } from '../core/vector-index';

export const DEFAULT_FALLBACK_MESSAGE = "I'm not fully sure - please contact HR at hr@company.ch";

export const SYSTEM_PROMPT = [
  'You are the internal HR and IT policy assistant for employees.',
  'Answer clearly, politely and in a professional corporate tone.',
  'Use only the context excerpts provided with the question. Do not rely on outside knowledge.',
  'If the excerpts do not contain enough information, say that you are not fully sure and suggest contacting HR.',
].join('\n');

export function formatContextBlock(context: ScoredChunk[]): string {
  if (context.length === 0) return '';
  const lines = ['Context (top relevant excerpts):'];
  context.forEach(({ chunk }, i) => {
    lines.push(`[${i + 1}] Source: ${chunk.source}\n${chunk.text.trim()}`);
  });
  return lines.join('\n\n');
}

export function buildUserPrompt(question: string, context: ScoredChunk[], fallbackMessage: string): string {
  return [
    "Using the provided context excerpts, answer the user's question.",
    '- Be concise, polite, and professional.',
    `- If the context is insufficient to answer confidently, reply with: "${fallbackMessage}"`,
    '',
    formatContextBlock(context),
    '',
    `User question: ${question.trim()}`,
  ].join('\n');
}
