import type { ConversationContext } from "./agent/conversation-context";
import type { NegotiationAgent, StartSessionOptions, TurnOptions } from "./agent/negotiation-agent";
import type { ExtractionResult } from "./agent/types";
import { buildBusyText } from "./agent/messages";
import { SessionBusyError, SessionClosedError } from "./errors";
import { errorMessageOf } from "./llm/errors";
import { createLogger, type Logger } from "./logger";
import type { ParchiStore } from "./storage/types";
import { summarizeLedger, type LedgerSummary } from "./trade/parchi";
import type { DigitalParchi } from "./trade/types";

export interface SaveOutcome {
  persisted: boolean;
  /** Set when the store rejected the write; the parchi can be retried with retrySave(). */
  persistenceError?: string;
}

export interface SubmitResult extends SaveOutcome {
  result: ExtractionResult;
}

export interface Ledger {
  parchis: DigitalParchi[];
  summary: LedgerSummary;
}

/** Reply for a message that arrives while the session's previous turn is still running. */
function busyResult(context: ConversationContext): ExtractionResult {
  const partial = context.getPartialData();
  return {
    extractedData: context.hasExtractedData() ? partial : null,
    responseText: buildBusyText(context.currentLanguage),
    confidenceScore: 0,
    requiresClarification: false,
    missingFields: [],
    state: context.state,
    language: context.currentLanguage,
    languageFallback: false,
    translationDegraded: false,
    parchi: null,
    failure: null,
    terminal: false,
  };
}

/**
 * Runs live negotiation sessions and files each completed parchi with the
 * store. Sessions are held on the desk instance and dropped once terminal.
 */
export class TradeDesk {
  private agent: NegotiationAgent;
  private store: ParchiStore;
  private sessions = new Map<string, ConversationContext>();
  private log: Logger;

  constructor(agent: NegotiationAgent, store: ParchiStore) {
    this.agent = agent;
    this.store = store;
    this.log = createLogger("trade-desk");
  }

  open(options: StartSessionOptions = {}): string {
    const context = this.agent.startSession(options);
    this.sessions.set(context.sessionId, context);
    return context.sessionId;
  }

  hasSession(sessionId: string): boolean {
    return this.sessions.has(sessionId);
  }

  activeSessionCount(): number {
    return this.sessions.size;
  }

  async submit(sessionId: string, text: string, options: TurnOptions = {}): Promise<SubmitResult> {
    const context = this.sessions.get(sessionId);
    if (!context) {
      throw new SessionClosedError(sessionId, "UNKNOWN");
    }

    let result: ExtractionResult;
    try {
      result = await this.agent.processTurn(context, text, options);
    } catch (error) {
      if (!(error instanceof SessionBusyError)) throw error;
      this.log.warn({ sessionId }, "turn rejected while another is in flight");
      return { result: busyResult(context), persisted: false };
    }
    if (result.terminal) {
      this.sessions.delete(sessionId);
    }

    if (!result.parchi || context.state === "ABANDONED") {
      return { result, persisted: false };
    }
    return { result, ...(await this.retrySave(result.parchi)) };
  }

  /** Saves a parchi; a store failure is reported, not thrown. */
  async retrySave(parchi: DigitalParchi): Promise<SaveOutcome> {
    try {
      await this.store.save(parchi);
      this.log.info({ parchiId: parchi.id, total: parchi.tradeData.totalAmount }, "parchi saved");
      return { persisted: true };
    } catch (error) {
      const persistenceError = errorMessageOf(error);
      this.log.error({ parchiId: parchi.id, err: error }, "parchi could not be saved");
      return { persisted: false, persistenceError };
    }
  }

  /** Returns false when the session is unknown or already closed. */
  abandon(sessionId: string): boolean {
    const context = this.sessions.get(sessionId);
    if (!context) return false;
    this.agent.abandon(context);
    this.sessions.delete(sessionId);
    return true;
  }

  async ledger(limit = 20): Promise<Ledger> {
    const parchis = await this.store.list({ limit });
    return { parchis, summary: summarizeLedger(parchis) };
  }
}
