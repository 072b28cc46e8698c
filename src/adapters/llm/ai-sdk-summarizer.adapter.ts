// =============================================================================
// AiSdkSummarizerAdapter — Compresses a slice of turns into a short summary
// =============================================================================

import { generateText } from "ai";
import type { LanguageModel } from "ai";

import type { Turn } from "../../domain/memory.schema.js";
import type { SummarizerPort } from "../../ports/summarizer.port.js";

export const SUMMARIZATION_PROMPT = `Summarize this conversation in 2-3 concise sentences.

Focus on:
- Key facts shared by the user
- Main topics discussed
- Important decisions or commitments

Conversation:
{conversation}

Summary:`;

export interface AiSdkSummarizerOptions {
  model: LanguageModel;
  /** Per-turn character clip applied before prompting (default: 100) */
  maxCharsPerTurn?: number;
  temperature?: number;
  maxOutputTokens?: number;
}

export class AiSdkSummarizerAdapter implements SummarizerPort {
  private readonly model: LanguageModel;
  private readonly maxCharsPerTurn: number;
  private readonly temperature: number;
  private readonly maxOutputTokens: number;

  constructor(options: AiSdkSummarizerOptions) {
    this.model = options.model;
    this.maxCharsPerTurn = options.maxCharsPerTurn ?? 100;
    this.temperature = options.temperature ?? 0.3;
    this.maxOutputTokens = options.maxOutputTokens ?? 150;
  }

  async summarize(turns: Turn[], signal?: AbortSignal): Promise<string> {
    const result = await generateText({
      model: this.model,
      prompt: buildSummarizationPrompt(turns, this.maxCharsPerTurn),
      temperature: this.temperature,
      maxOutputTokens: this.maxOutputTokens,
      maxRetries: 0,
      abortSignal: signal,
    });
    return result.text.trim();
  }
}

export function buildSummarizationPrompt(turns: Turn[], maxCharsPerTurn = 100): string {
  const conversation = turns
    .map((turn) => `${capitalize(turn.role)}: ${turn.content.slice(0, maxCharsPerTurn)}`)
    .join("\n");
  return SUMMARIZATION_PROMPT.replace("{conversation}", conversation);
}

function capitalize(value: string): string {
  return value.charAt(0).toUpperCase() + value.slice(1);
}
