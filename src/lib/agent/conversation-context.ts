import { emptyTradeDraft, REQUIRED_TRADE_FIELDS, type TradeDraft } from "../trade/types";
import type { LanguageCode } from "./language";
import type { ConversationMessage, NegotiationState } from "./types";

function hasValue<T>(value: T | null): value is T {
  if (value === null) return false;
  return typeof value !== "string" || value.trim() !== "";
}

/**
 * Folds a new extraction into the known data. A field takes the newest
 * non-empty value; null or blank never erases what was already known.
 */
export function mergeTradeDraft(known: TradeDraft, incoming: TradeDraft): TradeDraft {
  return {
    productName: hasValue(incoming.productName) ? incoming.productName : known.productName,
    quantity: hasValue(incoming.quantity) ? incoming.quantity : known.quantity,
    unit: hasValue(incoming.unit) ? incoming.unit : known.unit,
    unitPrice: hasValue(incoming.unitPrice) ? incoming.unitPrice : known.unitPrice,
  };
}

/**
 * One negotiation session: message history plus data accumulated across
 * turns. Owned by the caller and mutated only by the NegotiationAgent.
 */
export class ConversationContext {
  readonly sessionId: string;
  readonly vendorId: string | null;
  readonly startedAt: Date;
  currentLanguage: LanguageCode;
  state: NegotiationState = "IDLE";
  /** Failed turns since the last successful extraction. */
  extractionAttempts = 0;
  private messages: ConversationMessage[] = [];
  private partialData: TradeDraft = emptyTradeDraft();

  constructor(
    sessionId: string,
    language: LanguageCode,
    options: { vendorId?: string | null; startedAt?: Date } = {}
  ) {
    this.sessionId = sessionId;
    this.currentLanguage = language;
    this.vendorId = options.vendorId ?? null;
    this.startedAt = options.startedAt ?? new Date();
  }

  addUserMessage(originalText: string, pivotText: string, language: LanguageCode): void {
    this.messages.push({ role: "user", originalText, pivotText, language, timestamp: new Date() });
  }

  addAgentMessage(originalText: string, pivotText: string, language: LanguageCode): void {
    this.messages.push({ role: "agent", originalText, pivotText, language, timestamp: new Date() });
  }

  mergeExtraction(draft: TradeDraft): void {
    this.partialData = mergeTradeDraft(this.partialData, draft);
  }

  getPartialData(): TradeDraft {
    return { ...this.partialData };
  }

  /** True once any required field has been extracted. */
  hasExtractedData(): boolean {
    return REQUIRED_TRADE_FIELDS.some((f) => hasValue(this.partialData[f]));
  }

  getMessages(): ConversationMessage[] {
    return [...this.messages];
  }

  getMessageCount(): number {
    return this.messages.length;
  }

  /** Messages before the latest one, in the pivot language, for the extraction prompt. */
  historyForPrompt(): Array<{ role: "user" | "agent"; text: string }> {
    return this.messages.slice(0, -1).map((m) => ({ role: m.role, text: m.pivotText }));
  }

  isOpen(): boolean {
    return this.state === "IDLE" || this.state === "LISTENING" || this.state === "AWAITING_CLARIFICATION";
  }
}
