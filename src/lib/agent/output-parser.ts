import { normalizeUnit, type TradeDraft } from "../trade/types";
import { TradeExtractionOutputSchema, TranslationOutputSchema } from "./types";

export type ParseResult<T> =
  | { success: true; data: T }
  | { success: false; error: string };

export interface TradeExtraction {
  draft: TradeDraft;
  confidence: number;
  notes: string[];
}

function blankToNull(value: string | null): string | null {
  if (value === null) return null;
  const trimmed = value.trim();
  return trimmed === "" ? null : trimmed;
}

/**
 * Parses raw LLM text output into a trade draft.
 * Handles clean JSON, markdown code blocks and leading/trailing text.
 * A missing key or a wrong type is a failed parse, never a default.
 */
export function parseTradeExtractionOutput(raw: string): ParseResult<TradeExtraction> {
  const parsed = parseJsonObject(raw);
  if (!parsed.success) return parsed;

  const validation = TradeExtractionOutputSchema.safeParse(parsed.data);
  if (!validation.success) {
    return {
      success: false,
      error: `Validation failed: ${JSON.stringify(validation.error.issues)}`,
    };
  }

  const output = validation.data;
  const unit = blankToNull(output.unit);

  return {
    success: true,
    data: {
      draft: {
        productName: blankToNull(output.productName),
        quantity: output.quantity,
        unit: unit === null ? null : normalizeUnit(unit),
        unitPrice: output.unitPrice,
      },
      confidence: Math.max(0, Math.min(1, output.confidence)),
      notes: output.notes,
    },
  };
}

export function parseTranslationOutput(raw: string): ParseResult<string> {
  const parsed = parseJsonObject(raw);
  if (!parsed.success) return parsed;

  const validation = TranslationOutputSchema.safeParse(parsed.data);
  if (!validation.success) {
    return {
      success: false,
      error: `Validation failed: ${JSON.stringify(validation.error.issues)}`,
    };
  }

  const text = validation.data.translatedText.trim();
  if (text === "") {
    return { success: false, error: "Translation was empty" };
  }
  return { success: true, data: text };
}

function parseJsonObject(raw: string): ParseResult<unknown> {
  const jsonString = extractJson(raw);
  if (!jsonString) {
    return { success: false, error: "Could not find valid JSON in LLM output" };
  }

  // Sanitize unescaped newlines inside strings first
  try {
    const data: unknown = JSON.parse(sanitizeJsonNewlines(jsonString));
    return { success: true, data };
  } catch {
    return { success: false, error: `Invalid JSON: ${jsonString.substring(0, 100)}...` };
  }
}

/**
 * Extracts JSON from raw LLM output. Handles:
 * - Clean JSON (starts with {)
 * - Markdown code blocks (```json ... ```)
 * - JSON embedded in prose text
 */
export function extractJson(raw: string): string | null {
  const trimmed = raw.trim();

  // Try 1: It's already clean JSON
  if (trimmed.startsWith("{")) {
    const end = findClosingBrace(trimmed, 0);
    if (end !== -1) return trimmed.substring(0, end + 1);
  }

  // Try 2: Markdown code block
  const codeBlockMatch = trimmed.match(/```(?:json)?\s*\n?([\s\S]*?)\n?```/);
  if (codeBlockMatch) {
    const inner = codeBlockMatch[1].trim();
    if (inner.startsWith("{")) return inner;
  }

  // Try 3: Find first { and last matching }
  const firstBrace = trimmed.indexOf("{");
  if (firstBrace !== -1) {
    const end = findClosingBrace(trimmed, firstBrace);
    if (end !== -1) return trimmed.substring(firstBrace, end + 1);
  }

  return null;
}

/**
 * Finds the matching closing brace for an opening brace at position `start`.
 */
function findClosingBrace(str: string, start: number): number {
  let depth = 0;
  let inString = false;
  let escape = false;

  for (let i = start; i < str.length; i++) {
    const char = str[i];

    if (escape) {
      escape = false;
      continue;
    }
    if (char === "\\") {
      escape = true;
      continue;
    }
    if (char === '"') {
      inString = !inString;
      continue;
    }
    if (inString) continue;

    if (char === "{") depth++;
    if (char === "}") {
      depth--;
      if (depth === 0) return i;
    }
  }

  return -1;
}

/**
 * Models sometimes emit literal newlines inside JSON strings instead of
 * \n escapes, which breaks JSON.parse. Rewrites them in place.
 */
function sanitizeJsonNewlines(json: string): string {
  let result = "";
  let inString = false;
  let escape = false;

  for (let i = 0; i < json.length; i++) {
    const char = json[i];

    if (escape) {
      result += char;
      escape = false;
      continue;
    }
    if (char === "\\") {
      result += char;
      escape = true;
      continue;
    }
    if (char === '"') {
      inString = !inString;
      result += char;
      continue;
    }

    if (inString && (char === "\n" || char === "\r")) {
      result += "\\n";
      // \r\n counts once
      if (char === "\r" && i + 1 < json.length && json[i + 1] === "\n") {
        i++;
      }
      continue;
    }

    result += char;
  }

  return result;
}
