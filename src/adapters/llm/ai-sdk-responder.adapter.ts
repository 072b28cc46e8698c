// =============================================================================
// AiSdkResponderAdapter — Memory-aware reply generation via AI SDK
// =============================================================================

import { generateText } from "ai";
import type { LanguageModel, ModelMessage } from "ai";

import type { RespondParams, ResponderPort } from "../../ports/responder.port.js";

export const DEFAULT_RESPONDER_INSTRUCTIONS =
  "You are a helpful assistant. Use the memory below when it is relevant and answer consistently with it.";

export interface AiSdkResponderOptions {
  model: LanguageModel;
  instructions?: string;
  temperature?: number;
  maxOutputTokens?: number;
}

export class AiSdkResponderAdapter implements ResponderPort {
  private readonly model: LanguageModel;
  private readonly instructions: string;
  private readonly temperature: number | undefined;
  private readonly maxOutputTokens: number | undefined;

  constructor(options: AiSdkResponderOptions) {
    this.model = options.model;
    this.instructions = options.instructions ?? DEFAULT_RESPONDER_INSTRUCTIONS;
    this.temperature = options.temperature;
    this.maxOutputTokens = options.maxOutputTokens;
  }

  async respond(params: RespondParams): Promise<string> {
    const result = await generateText({
      model: this.model,
      system: buildResponderSystemPrompt(this.instructions, params.memoryContext),
      messages: toModelMessages(params),
      temperature: this.temperature,
      maxOutputTokens: this.maxOutputTokens,
      abortSignal: params.signal,
    });
    return result.text.trim();
  }
}

export function buildResponderSystemPrompt(instructions: string, memoryContext: string): string {
  if (memoryContext.trim() === "") return instructions;
  return `${instructions}\n\n[ACTIVE MEMORY]\n${memoryContext}`;
}

function toModelMessages(params: RespondParams): ModelMessage[] {
  if (params.recentTurns.length === 0) {
    return [{ role: "user", content: params.message }];
  }
  return params.recentTurns.map((turn): ModelMessage =>
    turn.role === "user"
      ? { role: "user", content: turn.content }
      : { role: "assistant", content: turn.content },
  );
}
