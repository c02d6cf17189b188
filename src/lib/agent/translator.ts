import type { LLMClient } from "../llm/types";
import { errorMessageOf } from "../llm/errors";
import type { LanguageCode } from "./language";
import { parseTranslationOutput } from "./output-parser";
import { buildTranslationPrompt } from "./prompts";

export type TranslationResult = { ok: true; text: string } | { ok: false; error: string };

export interface Translator {
  translate(text: string, source: LanguageCode, target: LanguageCode): Promise<TranslationResult>;
}

/** Translation through the language model, with a `translate_text` structured output. */
export class LLMTranslator implements Translator {
  private llm: LLMClient;

  constructor(llm: LLMClient) {
    this.llm = llm;
  }

  async translate(text: string, source: LanguageCode, target: LanguageCode): Promise<TranslationResult> {
    if (source === target || text.trim() === "") {
      return { ok: true, text };
    }

    try {
      const result = await this.llm.call(buildTranslationPrompt(text, source, target));
      const parsed = parseTranslationOutput(result.response.content);
      return parsed.success ? { ok: true, text: parsed.data } : { ok: false, error: parsed.error };
    } catch (error) {
      return { ok: false, error: errorMessageOf(error) };
    }
  }
}

/** Returns text unchanged. For tests and setups where everyone speaks the pivot language. */
export class IdentityTranslator implements Translator {
  async translate(text: string, _source?: LanguageCode, _target?: LanguageCode): Promise<TranslationResult> {
    return { ok: true, text };
  }
}
