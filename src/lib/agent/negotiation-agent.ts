import { v4 as uuidv4 } from "uuid";
import { DEFAULT_AGENT_CONFIG, type AgentConfig } from "../config";
import { SessionBusyError, SessionClosedError } from "../errors";
import { errorKindOf, errorMessageOf } from "../llm/errors";
import { withTimeout } from "../llm/timeout";
import { createLogger, type Logger } from "../logger";
import { buildTradeData, completeParchi, createDraftParchi } from "../trade/parchi";
import type { TradeField } from "../trade/types";
import { fieldsNeedingInput, validateTradeDraft } from "../trade/validation";
import { ConversationContext } from "./conversation-context";
import { isAllowedLanguage, resolveLanguage, type LanguageCode } from "./language";
import {
  buildAbandonedText,
  buildClarificationText,
  buildCompletionText,
  buildFailureText,
  buildRetryText,
} from "./messages";
import type { ExtractionPromptInput } from "./prompts";
import type { Translator } from "./translator";
import type { ExtractionFailure, ExtractionOutcome, ExtractionResult, NegotiationState } from "./types";

/** What the agent needs from extraction. Extractor satisfies it. */
export interface TradeExtractor {
  extract(input: ExtractionPromptInput): Promise<ExtractionOutcome>;
}

export interface NegotiationAgentOptions {
  extractor: TradeExtractor;
  translator: Translator;
  config?: Partial<AgentConfig>;
  /** Clock for timestamps; tests pin it. */
  now?: () => Date;
}

export interface StartSessionOptions {
  sessionId?: string;
  language?: string;
  vendorId?: string | null;
}

export interface TurnOptions {
  /** Language reported by speech-to-text, when known. */
  languageHint?: string;
}

interface TurnLanguage {
  language: LanguageCode;
  fallback: boolean;
}

/**
 * Drives one negotiation per ConversationContext:
 * IDLE → LISTENING → EXTRACTING → AWAITING_CLARIFICATION → COMPLETE | FAILED.
 *
 * Holds no per-session state itself, so one agent serves any number of
 * concurrent sessions. A context accepts one turn at a time.
 */
export class NegotiationAgent {
  private extractor: TradeExtractor;
  private translator: Translator;
  private config: AgentConfig;
  private now: () => Date;
  private log: Logger;

  constructor(options: NegotiationAgentOptions) {
    this.extractor = options.extractor;
    this.translator = options.translator;
    this.config = { ...DEFAULT_AGENT_CONFIG, ...options.config };
    this.now = options.now ?? (() => new Date());
    this.log = createLogger("agent/negotiation");
  }

  startSession(options: StartSessionOptions = {}): ConversationContext {
    const requested = options.language?.trim().toLowerCase();
    const language =
      requested && isAllowedLanguage(requested, this.config.supportedLanguages) ? requested : this.config.defaultLanguage;
    const context = new ConversationContext(options.sessionId ?? uuidv4(), language, {
      vendorId: options.vendorId,
      startedAt: this.now(),
    });
    context.state = "LISTENING";
    this.log.debug({ sessionId: context.sessionId, language }, "session started");
    return context;
  }

  /** Marks the session abandoned. Terminal sessions are left as they are. */
  abandon(context: ConversationContext): void {
    if (context.state === "COMPLETE" || context.state === "FAILED") return;
    context.state = "ABANDONED";
    this.log.info({ sessionId: context.sessionId }, "session abandoned");
  }

  async processTurn(context: ConversationContext, text: string, options: TurnOptions = {}): Promise<ExtractionResult> {
    if (context.state === "EXTRACTING") {
      throw new SessionBusyError(context.sessionId);
    }
    if (!context.isOpen()) {
      throw new SessionClosedError(context.sessionId, context.state);
    }

    const previousState = context.state;
    context.state = "EXTRACTING";
    try {
      const result = this.closeIfAbandoned(context, await this.runTurn(context, text, options));
      this.settle(context, result.state);
      this.log.info(
        {
          sessionId: context.sessionId,
          state: result.state,
          language: result.language,
          missingFields: result.missingFields,
          attempts: context.extractionAttempts,
          failureKind: result.failure?.kind,
        },
        "turn processed"
      );
      return result;
    } catch (error) {
      this.settle(context, previousState);
      this.log.error({ sessionId: context.sessionId, err: error }, "turn aborted");
      throw error;
    }
  }

  /**
   * abandon() may land while a turn is in flight. The turn's outcome is
   * discarded: no parchi leaves the agent for an abandoned session.
   */
  private closeIfAbandoned(context: ConversationContext, result: ExtractionResult): ExtractionResult {
    if (context.state !== "ABANDONED") return result;
    return {
      ...result,
      responseText: buildAbandonedText(result.language),
      requiresClarification: false,
      missingFields: [],
      state: "ABANDONED",
      parchi: null,
      terminal: true,
    };
  }

  private settle(context: ConversationContext, state: NegotiationState): void {
    if (context.state === "ABANDONED") return;
    context.state = state;
  }

  private async runTurn(context: ConversationContext, text: string, options: TurnOptions): Promise<ExtractionResult> {
    const { language, fallback } = this.resolveTurnLanguage(context, text, options);
    const pivot = this.config.pivotLanguage;
    let translationDegraded = false;

    let pivotText = text;
    if (language !== pivot) {
      const translated = await this.translate(text, language, pivot);
      if (translated === null) {
        translationDegraded = true;
      } else {
        pivotText = translated;
      }
    }

    context.addUserMessage(text, pivotText, language);

    const outcome = await this.extractWithRetries(context, pivotText);

    const base = { language, languageFallback: fallback };

    if (!outcome.ok) {
      return this.handleExtractionFailure(context, outcome.failure, { ...base, translationDegraded });
    }

    context.extractionAttempts = 0;
    context.mergeExtraction(outcome.draft);

    const partial = context.getPartialData();
    const validation = validateTradeDraft(partial);

    if (!validation.complete) {
      const fields = fieldsNeedingInput(validation);
      const reply = await this.clarificationReply(fields, language);
      context.addAgentMessage(reply.text, reply.pivotText, language);
      return {
        ...base,
        extractedData: context.hasExtractedData() ? partial : null,
        responseText: reply.text,
        confidenceScore: outcome.confidence,
        requiresClarification: true,
        missingFields: fields,
        state: "AWAITING_CLARIFICATION",
        translationDegraded: translationDegraded || reply.degraded,
        parchi: null,
        failure: null,
        terminal: false,
      };
    }

    const now = this.now();
    const tradeData = buildTradeData(partial, {
      language,
      conversationId: context.sessionId,
      timestamp: now,
    });
    const parchi = completeParchi(createDraftParchi(tradeData, { vendorId: context.vendorId, now }), now);
    const responseText = buildCompletionText(tradeData, language);
    context.addAgentMessage(responseText, buildCompletionText(tradeData, pivot), language);

    return {
      ...base,
      extractedData: partial,
      responseText,
      confidenceScore: outcome.confidence,
      requiresClarification: false,
      missingFields: [],
      state: "COMPLETE",
      translationDegraded,
      parchi,
      failure: null,
      terminal: true,
    };
  }

  private resolveTurnLanguage(context: ConversationContext, text: string, options: TurnOptions): TurnLanguage {
    const resolved = resolveLanguage(text, {
      hint: options.languageHint,
      defaultLanguage: this.config.defaultLanguage,
      threshold: this.config.languageConfidenceThreshold,
      supported: this.config.supportedLanguages,
    });

    if (resolved.fallback) {
      this.log.warn(
        { sessionId: context.sessionId, confidence: resolved.confidence, fallback: resolved.language },
        "language detection fell back to default"
      );
    }

    context.currentLanguage = resolved.language;
    return { language: resolved.language, fallback: resolved.fallback };
  }

  /** Translation bounded by the call timeout. Returns null on any failure. */
  private async translate(text: string, source: LanguageCode, target: LanguageCode): Promise<string | null> {
    try {
      const result = await withTimeout(
        this.translator.translate(text, source, target),
        this.config.callTimeoutMs,
        "translation"
      );
      if (result.ok) return result.text;
      this.log.warn({ source, target, error: result.error }, "translation failed");
    } catch (error) {
      this.log.warn({ source, target, error: errorMessageOf(error) }, "translation failed");
    }
    return null;
  }

  private async extractWithRetries(context: ConversationContext, message: string): Promise<ExtractionOutcome> {
    const input: ExtractionPromptInput = {
      message,
      history: context.historyForPrompt(),
      partialData: context.getPartialData(),
    };

    let outcome: ExtractionOutcome = {
      ok: false,
      failure: { kind: "provider", message: "Extraction was not attempted" },
    };

    for (let attempt = 0; attempt <= this.config.retriesPerTurn; attempt++) {
      outcome = await this.extractOnce(input);
      if (outcome.ok) return outcome;
      this.log.warn(
        { sessionId: context.sessionId, attempt, kind: outcome.failure.kind, error: outcome.failure.message },
        "extraction attempt failed"
      );
    }

    return outcome;
  }

  private async extractOnce(input: ExtractionPromptInput): Promise<ExtractionOutcome> {
    try {
      return await withTimeout(this.extractor.extract(input), this.config.callTimeoutMs, "extraction");
    } catch (error) {
      return { ok: false, failure: { kind: errorKindOf(error), message: errorMessageOf(error) } };
    }
  }

  private handleExtractionFailure(
    context: ConversationContext,
    failure: ExtractionFailure,
    flags: { language: LanguageCode; languageFallback: boolean; translationDegraded: boolean }
  ): ExtractionResult {
    context.extractionAttempts++;
    const exhausted = context.extractionAttempts >= this.config.maxExtractionAttempts;
    const { language } = flags;
    const pivot = this.config.pivotLanguage;

    const responseText = exhausted ? buildFailureText(language) : buildRetryText(language);
    context.addAgentMessage(responseText, exhausted ? buildFailureText(pivot) : buildRetryText(pivot), language);

    const partial = context.getPartialData();
    return {
      ...flags,
      extractedData: context.hasExtractedData() ? partial : null,
      responseText,
      confidenceScore: 0,
      requiresClarification: !exhausted,
      missingFields: fieldsNeedingInput(validateTradeDraft(partial)),
      state: exhausted ? "FAILED" : "AWAITING_CLARIFICATION",
      parchi: null,
      failure,
      terminal: exhausted,
    };
  }

  /**
   * Clarification composed in the pivot language and translated back.
   * Falls back to the localized template when translation fails.
   */
  private async clarificationReply(
    fields: TradeField[],
    language: LanguageCode
  ): Promise<{ text: string; pivotText: string; degraded: boolean }> {
    const pivot = this.config.pivotLanguage;
    const pivotText = buildClarificationText(fields, pivot);
    if (language === pivot) {
      return { text: pivotText, pivotText, degraded: false };
    }

    const translated = await this.translate(pivotText, pivot, language);
    if (translated === null) {
      return { text: buildClarificationText(fields, language), pivotText, degraded: true };
    }
    return { text: translated, pivotText, degraded: false };
  }
}
