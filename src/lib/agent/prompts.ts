import type { LLMRequest } from "../llm/types";
import type { TradeDraft } from "../trade/types";
import { LANGUAGE_NAMES, type LanguageCode } from "./language";
import { TRADE_EXTRACTION_JSON_SCHEMA, TRANSLATION_JSON_SCHEMA } from "./types";

// ═══════════════════════════════════════════════════════════════════════════════
// Trade Extraction Prompt
// ═══════════════════════════════════════════════════════════════════════════════

const EXTRACTION_SYSTEM_PROMPT = `You are a data extraction assistant for vendors in an Indian wholesale market (mandi).

Given the latest message of a vendor describing a trade, plus the earlier conversation and the data already known, extract the trade as JSON. Return ONLY valid JSON with no additional text.

Required JSON fields (all keys must be present):
- productName: string or null — the commodity being traded (e.g., "wheat", "onion", "tomato"). English name if you know it.
- quantity: number or null — how much was traded, in the unit below
- unit: string or null — the unit of quantity and price (e.g., "kg", "quintal", "ton", "dozen", "piece")
- unitPrice: number or null — rupees for ONE unit. If only a total price is given, set unitPrice to null and mention the total in notes.
- confidence: number between 0.0 and 1.0 — how confident you are in the extraction:
  - 0.9-1.0: All fields clearly stated with no ambiguity
  - 0.6-0.8: Some fields present, some inferred
  - 0.3-0.5: Partial information, significant uncertainty
  - 0.0-0.2: No trade data found, message is conversational or unrelated
- notes: string array — observations that don't fit the fields above. Examples:
  - "Vendor quoted a total of 4000 rather than a per-unit price"
  - "Two products mentioned — only first extracted"
  - "Price given as a range 20-25; lower bound used"

Rules:
- Numbers must be JSON numbers, never strings. Convert spoken or written number words ("do", "paanch", "two") to digits.
- "per quintal", "prati kilo", "₹20/kg" give the unit of the price; use the same unit for quantity when the vendor does not say otherwise.
- Fields already known are listed for context. Return a field only when the latest message states or corrects it; otherwise set it to null.
- Do not invent or hallucinate data. If a field is not mentioned, set it to null.`;

export interface ExtractionPromptInput {
  /** Latest vendor message, in the pivot language. */
  message: string;
  /** Earlier turns, oldest first, in the pivot language. */
  history: ReadonlyArray<{ role: "user" | "agent"; text: string }>;
  partialData: TradeDraft;
}

function formatHistory(history: ExtractionPromptInput["history"]): string {
  if (history.length === 0) return "No prior messages.";
  return history
    .map((m) => `[${m.role === "user" ? "VENDOR" : "AGENT"}]\n${m.text}`)
    .join("\n\n---\n\n");
}

function formatPartialData(d: TradeDraft): string {
  const lines = [
    `Product: ${d.productName ?? "not known"}`,
    `Quantity: ${d.quantity ?? "not known"}`,
    `Unit: ${d.unit ?? "not known"}`,
    `Price per unit: ${d.unitPrice !== null ? `₹${d.unitPrice}` : "not known"}`,
  ];
  return lines.join("\n");
}

export function buildExtractionPrompt(input: ExtractionPromptInput): LLMRequest {
  const userMessage = `## Conversation So Far
${formatHistory(input.history)}

## Already Known
${formatPartialData(input.partialData)}

## Latest Vendor Message
${input.message}`;

  return {
    systemPrompt: EXTRACTION_SYSTEM_PROMPT,
    userMessage,
    maxTokens: 1024,
    temperature: 0,
    outputSchema: {
      name: "record_trade",
      description: "Record the trade details stated in a vendor's message",
      schema: TRADE_EXTRACTION_JSON_SCHEMA,
    },
  };
}

// ═══════════════════════════════════════════════════════════════════════════════
// Translation Prompt
// ═══════════════════════════════════════════════════════════════════════════════

const TRANSLATION_SYSTEM_PROMPT = `You translate short messages exchanged between market vendors and a trade-recording assistant.

Rules:
- Translate faithfully. Keep every number, unit and currency amount exactly as written (₹, kg, quintal stay as they are).
- Keep commodity names recognizable; transliterate when there is no common word.
- Do not add explanations, greetings or quotes.

Return ONLY valid JSON with:
- translatedText: string — the translation`;

export function buildTranslationPrompt(
  text: string,
  source: LanguageCode,
  target: LanguageCode
): LLMRequest {
  return {
    systemPrompt: TRANSLATION_SYSTEM_PROMPT,
    userMessage: `Translate from ${LANGUAGE_NAMES[source]} to ${LANGUAGE_NAMES[target]}:\n\n---\n${text}\n---`,
    maxTokens: 512,
    temperature: 0,
    outputSchema: {
      name: "translate_text",
      description: "Return the translated text",
      schema: TRANSLATION_JSON_SCHEMA,
    },
  };
}
