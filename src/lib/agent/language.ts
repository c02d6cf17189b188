export const SUPPORTED_LANGUAGES = ["hi", "ta", "te", "bn", "mr", "gu", "en"] as const;

export type LanguageCode = (typeof SUPPORTED_LANGUAGES)[number];

export const LANGUAGE_NAMES: Record<LanguageCode, string> = {
  hi: "Hindi",
  ta: "Tamil",
  te: "Telugu",
  bn: "Bengali",
  mr: "Marathi",
  gu: "Gujarati",
  en: "English",
};

export function isSupportedLanguage(code: string): code is LanguageCode {
  return (SUPPORTED_LANGUAGES as readonly string[]).includes(code);
}

/** Supported and, when an allow-list is given, on it. */
export function isAllowedLanguage(
  code: string,
  allowed: readonly LanguageCode[] = SUPPORTED_LANGUAGES
): code is LanguageCode {
  return isSupportedLanguage(code) && allowed.includes(code);
}

// Unicode blocks per script. Marathi shares Devanagari with Hindi, so
// script detection alone resolves Devanagari to Hindi; a caller that knows
// better passes a language hint.
const SCRIPT_RANGES: ReadonlyArray<{ language: LanguageCode; from: number; to: number }> = [
  { language: "hi", from: 0x0900, to: 0x097f },
  { language: "bn", from: 0x0980, to: 0x09ff },
  { language: "gu", from: 0x0a80, to: 0x0aff },
  { language: "ta", from: 0x0b80, to: 0x0bff },
  { language: "te", from: 0x0c00, to: 0x0c7f },
];

function scriptOf(char: string): LanguageCode | null {
  const code = char.codePointAt(0);
  if (code === undefined) return null;
  if ((code >= 0x41 && code <= 0x5a) || (code >= 0x61 && code <= 0x7a)) return "en";
  for (const range of SCRIPT_RANGES) {
    if (code >= range.from && code <= range.to) return range.language;
  }
  return null;
}

export interface LanguageDetection {
  language: LanguageCode;
  /** Share of script characters belonging to the dominant script. */
  confidence: number;
}

/**
 * Script-based detection. Returns null when the text has no letters from
 * a supported script (digits, punctuation, emoji only).
 */
export function detectLanguage(text: string): LanguageDetection | null {
  const counts = new Map<LanguageCode, number>();
  let total = 0;

  for (const char of text) {
    const language = scriptOf(char);
    if (!language) continue;
    counts.set(language, (counts.get(language) ?? 0) + 1);
    total++;
  }

  if (total === 0) return null;

  let best: LanguageCode = "en";
  let bestCount = 0;
  for (const [language, count] of counts) {
    if (count > bestCount) {
      best = language;
      bestCount = count;
    }
  }

  return { language: best, confidence: bestCount / total };
}

export interface ResolvedLanguage {
  language: LanguageCode;
  confidence: number;
  /** True when detection failed or was too weak and the default was used. */
  fallback: boolean;
  source: "hint" | "detected" | "default";
}

export interface ResolveLanguageOptions {
  hint?: string;
  defaultLanguage: LanguageCode;
  threshold: number;
  /** Languages this deployment serves; hints and detections outside it fall back to the default. */
  supported?: readonly LanguageCode[];
}

export function resolveLanguage(text: string, options: ResolveLanguageOptions): ResolvedLanguage {
  const supported = options.supported ?? SUPPORTED_LANGUAGES;
  const hint = options.hint?.trim().toLowerCase();
  if (hint && isAllowedLanguage(hint, supported)) {
    return { language: hint, confidence: 1, fallback: false, source: "hint" };
  }

  const detection = detectLanguage(text);
  if (!detection || detection.confidence < options.threshold || !supported.includes(detection.language)) {
    return {
      language: options.defaultLanguage,
      confidence: detection?.confidence ?? 0,
      fallback: true,
      source: "default",
    };
  }

  return { language: detection.language, confidence: detection.confidence, fallback: false, source: "detected" };
}
