import type { ChatMessage, ContextTurn, RetrievalResult, SourceChunk } from '../types.js';
import type { LLMProvider } from '../providers/types.js';
import { GenerationUnavailableError, RetrievalUnavailableError } from '../core/errors.js';
import { TimeoutError, withTimeout } from '../utils/async.js';
import { getErrorMessage, toError } from '../utils/errors.js';
import { logDebug } from '../telemetry/logger.js';

// Types

export interface SynthesisInput {
  /** The raw question as the user typed it. */
  question: string;
  contextTurns: ContextTurn[];
  retrieval: RetrievalResult;
}

export interface SynthesizedAnswer {
  /** Completion text, verbatim. */
  answer: string;
  /** The retrieval chunk set the answer was grounded on; may be empty. */
  usedSources: SourceChunk[];
}

export interface AnswerSynthesizerOptions {
  timeoutMs?: number;
  /** Refuse to synthesize on top of a failed retrieval. */
  requireRetrieval?: boolean;
  systemPrompt?: string;
}

// Prompt

export const SYSTEM_PROMPT = `
You are an HR assistant that helps employees understand company policies and benefits.

Follow these guidelines for your answers:

## CONTENT GUIDELINES:
1. Be accurate, based on the provided HR policy documentation.
2. Include specific data like dollar amounts, plan names, and coverage tiers when available.
3. If you don't know the answer, just say that you don't know, don't try to make up an answer.
4. If the user's current message refers to a previous topic, use the last 2 Q&A pairs to infer the full context.
   For example, if they previously asked about remote work and now ask "What about interns?", interpret this as asking about
   remote work policies for interns.

## FORMATTING GUIDELINES (VERY IMPORTANT):
1. Keep answers concise and user-friendly - limit to 2-4 short paragraphs maximum (under 8 sentences total).
2. Start with a clear, direct answer (yes/no/summary), followed by key details like eligibility or duration.
3. Use bullet points for comparing options or listing multiple items.
4. Avoid essay-like structures or long-winded legal text unless explicitly requested.
5. End with a brief reference suggestion like: "Refer to the Benefits Guide for more details" or "Contact HR for specific eligibility questions."
`.trim();

export const CONTEXT_HEADER = "\n\nUse the following information to answer the user's question:\n";

/**
 * System message first, then the prior turns in order, then the question.
 * Retrieved chunk texts are appended to the system message verbatim.
 */
export function buildMessages(
  input: SynthesisInput,
  systemPrompt: string = SYSTEM_PROMPT
): ChatMessage[] {
  const chunks = input.retrieval.chunks;
  const system =
    chunks.length > 0
      ? `${systemPrompt}${CONTEXT_HEADER}${chunks.map((scored) => scored.chunk.text).join('\n\n')}`
      : systemPrompt;
  return [
    { role: 'system', content: system },
    ...input.contextTurns.map((turn) => ({ role: turn.role, content: turn.content })),
    { role: 'user', content: input.question },
  ];
}

// Synthesizer

/**
 * One generation call per question. No retry: the query engine maps a
 * failure to the fixed apology.
 */
export class AnswerSynthesizer {
  private readonly systemPrompt: string;

  constructor(
    private readonly llm: LLMProvider | null,
    private readonly options: AnswerSynthesizerOptions = {}
  ) {
    this.systemPrompt = options.systemPrompt ?? SYSTEM_PROMPT;
  }

  /**
   * @throws GenerationUnavailableError when no LLM is configured or the call fails
   * @throws RetrievalUnavailableError in strict mode when retrieval was degraded
   */
  async synthesize(input: SynthesisInput): Promise<SynthesizedAnswer> {
    const degraded = input.retrieval.degraded;
    if (this.options.requireRetrieval && degraded) {
      throw new RetrievalUnavailableError('unavailable', `cannot answer without retrieval (${degraded.message})`);
    }
    const llm = this.llm;
    if (!llm) {
      throw new GenerationUnavailableError('not_configured', 'no generation provider configured');
    }

    const messages = buildMessages(input, this.systemPrompt);
    let content: string;
    try {
      const response = await withTimeout(llm.complete({ messages }), this.options.timeoutMs, {
        context: 'answer generation',
      });
      content = response.content;
      logDebug('Generation complete', { model: response.model, totalTokens: response.usage?.totalTokens });
    } catch (error) {
      const reason = error instanceof TimeoutError ? 'timeout' : 'unavailable';
      throw new GenerationUnavailableError(reason, getErrorMessage(error), toError(error));
    }
    return {
      answer: content,
      usedSources: input.retrieval.chunks.map((scored) => ({ ...scored.chunk })),
    };
  }
}
