import { z } from "zod";
import type { JsonObjectSchema } from "../llm/types";
import type { DigitalParchi, TradeDraft, TradeField } from "../trade/types";
import type { LanguageCode } from "./language";

// ─── Zod schema for LLM extraction output ─────────────────────────────────────
// Every key is required and no value is coerced: "20" for a number is a
// malformed response, not a quantity of 20.
export const TradeExtractionOutputSchema = z.object({
  productName: z.string().nullable(),
  quantity: z.number().nullable(),
  unit: z.string().nullable(),
  unitPrice: z.number().nullable(),
  confidence: z.number(),
  notes: z.array(z.string()),
});

export type TradeExtractionOutput = z.infer<typeof TradeExtractionOutputSchema>;

export const TranslationOutputSchema = z.object({
  translatedText: z.string(),
});

// ─── JSON Schemas for structured output (tool_use) ────────────────────────────
// These mirror the Zod schemas above in JSON Schema form for the provider APIs.

export const TRADE_EXTRACTION_JSON_SCHEMA: JsonObjectSchema = {
  type: "object",
  properties: {
    productName: { type: ["string", "null"], description: "Commodity being traded, e.g. wheat, onion. null if not mentioned." },
    quantity: { type: ["number", "null"], description: "Amount traded in the stated unit. null if not mentioned — never use 0 to mean 'not mentioned'." },
    unit: { type: ["string", "null"], description: "Unit of the quantity and price, e.g. kg, quintal, dozen. null if not mentioned." },
    unitPrice: { type: ["number", "null"], description: "Price in rupees for ONE unit. null if not mentioned." },
    confidence: { type: "number", description: "0.0-1.0 confidence in extraction. 0.9+ = all fields clear, 0.0-0.2 = no trade data found." },
    notes: { type: "array", items: { type: "string" }, description: "Observations that don't fit the structured fields" },
  },
  required: ["productName", "quantity", "unit", "unitPrice", "confidence", "notes"],
};

export const TRANSLATION_JSON_SCHEMA: JsonObjectSchema = {
  type: "object",
  properties: {
    translatedText: { type: "string", description: "The translated text only, with no commentary" },
  },
  required: ["translatedText"],
};

// ─── Extraction outcome ───────────────────────────────────────────────────────
export type ExtractionFailureKind = "timeout" | "rate_limited" | "malformed" | "provider";

export interface ExtractionFailure {
  kind: ExtractionFailureKind;
  message: string;
}

export interface ExtractionMeta {
  provider: string;
  model: string;
  latencyMs: number;
  inputTokens: number;
  outputTokens: number;
  retryCount: number;
}

export type ExtractionOutcome =
  | {
      ok: true;
      draft: TradeDraft;
      confidence: number;
      notes: string[];
      meta: ExtractionMeta;
    }
  | {
      ok: false;
      failure: ExtractionFailure;
    };

// ─── Negotiation state ────────────────────────────────────────────────────────
export type NegotiationState =
  | "IDLE"
  | "LISTENING"
  | "EXTRACTING"
  | "AWAITING_CLARIFICATION"
  | "COMPLETE"
  | "FAILED"
  | "ABANDONED";

export interface ConversationMessage {
  role: "user" | "agent";
  /** Text as the user said it, or as the agent replied to them. */
  originalText: string;
  /** Same text in the pivot language; equal to originalText when no translation was needed or possible. */
  pivotText: string;
  language: LanguageCode;
  timestamp: Date;
}

// ─── ExtractionResult — what one turn produces ────────────────────────────────
export interface ExtractionResult {
  /** Merged best-known data; null only when nothing has been extracted yet. */
  extractedData: TradeDraft | null;
  /** Reply in the user's language (or the fallback language). */
  responseText: string;
  confidenceScore: number;
  requiresClarification: boolean;
  /** Missing or invalid required fields, in canonical order. */
  missingFields: TradeField[];
  state: NegotiationState;
  language: LanguageCode;
  languageFallback: boolean;
  translationDegraded: boolean;
  parchi: DigitalParchi | null;
  /** Diagnostics for the caller's logs; never shown to the user. */
  failure: ExtractionFailure | null;
  terminal: boolean;
}
