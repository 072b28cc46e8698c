// =============================================================================
// AiSdkFactExtractorAdapter — Pulls structured fact candidates from a message
// =============================================================================

import { generateText } from "ai";
import type { LanguageModel } from "ai";

import { RawFactCandidateSchema, type RawFactCandidate } from "../../domain/memory.schema.js";
import type { FactExtractorPort } from "../../ports/fact-extractor.port.js";
import type { LoggingPort } from "../../ports/logging.port.js";
import { KeyNormalizer } from "../../memory/key-normalizer.js";
import { silentLogger } from "../logging/console-logging.adapter.js";

export interface AiSdkFactExtractorOptions {
  model: LanguageModel;
  /** Source of the canonical keys listed in the prompt */
  keys?: KeyNormalizer;
  logger?: LoggingPort;
  temperature?: number;
  maxOutputTokens?: number;
}

export class AiSdkFactExtractorAdapter implements FactExtractorPort {
  private readonly model: LanguageModel;
  private readonly promptHeader: string;
  private readonly logger: LoggingPort;
  private readonly temperature: number;
  private readonly maxOutputTokens: number;

  constructor(options: AiSdkFactExtractorOptions) {
    this.model = options.model;
    this.promptHeader = buildExtractionInstructions(options.keys ?? new KeyNormalizer());
    this.logger = options.logger ?? silentLogger;
    this.temperature = options.temperature ?? 0.1;
    this.maxOutputTokens = options.maxOutputTokens ?? 300;
  }

  /**
   * Candidates found in the model output. Malformed JSON is thrown so the
   * pipeline can retry; malformed entries inside valid JSON are dropped.
   */
  async extract(message: string, signal?: AbortSignal): Promise<RawFactCandidate[]> {
    const result = await generateText({
      model: this.model,
      prompt: `${this.promptHeader}\n\nUser message: ${message}\n\nJSON array:`,
      temperature: this.temperature,
      maxOutputTokens: this.maxOutputTokens,
      maxRetries: 0,
      abortSignal: signal,
    });

    const parsed = parseCandidateJson(result.text);
    const items = Array.isArray(parsed) ? parsed : [parsed];
    const candidates: RawFactCandidate[] = [];
    for (const item of items) {
      const candidate = RawFactCandidateSchema.safeParse(item);
      if (candidate.success) {
        candidates.push(candidate.data);
      } else {
        this.logger.debug("Discarding malformed extraction entry", { entry: item });
      }
    }
    return candidates;
  }
}

export function buildExtractionInstructions(keys: KeyNormalizer): string {
  const grouped = keys.keysByCategory();
  const categoryLines = Object.entries(grouped)
    .filter(([, list]) => list.length > 0)
    .map(([category, list]) => `- ${category}: ${list.join(", ")}`);

  return [
    "Extract structured facts from the user's message. Return ONLY a JSON array.",
    "",
    "Use these canonical keys:",
    `- ${keys.canonicalKeys().join(", ")}`,
    "",
    "Categories:",
    ...categoryLines,
    "",
    'Format: [{"category":"identity","key":"name","value":"Alex","confidence":0.9,"importance":0.8}]',
    "",
    "If no facts exist, return: []",
  ].join("\n");
}

/**
 * Strip what models wrap around JSON: code fences, a leading `json` label
 * and prose before the first bracket or after the last one.
 */
export function cleanModelJson(response: string): string {
  let cleaned = response.trim();

  if (cleaned.startsWith("```")) {
    const firstNewline = cleaned.indexOf("\n");
    if (firstNewline > 0) cleaned = cleaned.slice(firstNewline + 1);
    if (cleaned.endsWith("```")) cleaned = cleaned.slice(0, -3);
    cleaned = cleaned.trim();
  }

  if (cleaned.toLowerCase().startsWith("json")) {
    cleaned = cleaned.slice(4).trim();
  }

  const start = cleaned.search(/[[{]/);
  if (start === -1) return "";
  cleaned = cleaned.slice(start);

  const end = Math.max(cleaned.lastIndexOf("]"), cleaned.lastIndexOf("}"));
  return end === -1 ? cleaned : cleaned.slice(0, end + 1);
}

/** Parsed JSON payload; an empty or bracket-less response means no facts. */
export function parseCandidateJson(response: string): unknown {
  const cleaned = cleanModelJson(response);
  if (cleaned === "") return [];
  return JSON.parse(cleaned);
}
