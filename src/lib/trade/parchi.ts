import { v4 as uuidv4 } from "uuid";
import { InvalidTransitionError, ValidationError } from "../errors";
import type { LanguageCode } from "../agent/language";
import { calculateTradeAmounts, sumAmounts, validateCalculationConsistency } from "./calculations";
import type { DigitalParchi, ParchiStatus, TradeData, TradeDraft } from "./types";
import { validateTradeDraft } from "./validation";

const ALLOWED_TRANSITIONS: Record<ParchiStatus, readonly ParchiStatus[]> = {
  DRAFT: ["COMPLETED", "CANCELLED"],
  COMPLETED: [],
  CANCELLED: [],
};

export function canTransition(from: ParchiStatus, to: ParchiStatus): boolean {
  return ALLOWED_TRANSITIONS[from].includes(to);
}

export interface TradeMeta {
  language: LanguageCode;
  conversationId: string;
  timestamp?: Date;
}

/**
 * Finalizes a complete draft into TradeData, deriving total and cess.
 * Throws ValidationError when a required field is missing or not positive.
 */
export function buildTradeData(draft: TradeDraft, meta: TradeMeta): TradeData {
  const validation = validateTradeDraft(draft);
  const problem = validation.missingFields[0] ?? validation.invalidFields[0];
  if (problem || !draft.productName || !draft.unit || draft.quantity === null || draft.unitPrice === null) {
    throw new ValidationError(`Trade draft is not complete: ${problem ?? "unknown field"}`, problem);
  }

  const { totalAmount, mandiCess } = calculateTradeAmounts(draft.quantity, draft.unitPrice);
  return {
    productName: draft.productName.trim(),
    quantity: draft.quantity,
    unit: draft.unit.trim(),
    unitPrice: draft.unitPrice,
    totalAmount,
    mandiCess,
    timestamp: meta.timestamp ?? new Date(),
    language: meta.language,
    conversationId: meta.conversationId,
  };
}

export function createDraftParchi(
  tradeData: TradeData,
  options: { vendorId?: string | null; now?: Date } = {}
): DigitalParchi {
  const now = options.now ?? new Date();
  return {
    id: uuidv4(),
    tradeData,
    vendorId: options.vendorId ?? null,
    status: "DRAFT",
    createdAt: now,
    updatedAt: now,
  };
}

/** Returns a copy of the parchi in the new status, enforcing the lifecycle. */
export function transitionParchi(parchi: DigitalParchi, to: ParchiStatus, now: Date = new Date()): DigitalParchi {
  if (!canTransition(parchi.status, to)) {
    throw new InvalidTransitionError(parchi.status, to);
  }
  const updatedAt = now.getTime() < parchi.createdAt.getTime() ? parchi.createdAt : now;
  return { ...parchi, status: to, updatedAt };
}

/** DRAFT → COMPLETED, gated on completeness and consistent amounts. */
export function completeParchi(parchi: DigitalParchi, now?: Date): DigitalParchi {
  const t = parchi.tradeData;
  if (!validateTradeDraft(t).complete) {
    throw new ValidationError("Cannot complete a parchi with incomplete trade data");
  }
  if (!validateCalculationConsistency(t.quantity, t.unitPrice, t.totalAmount, t.mandiCess)) {
    throw new ValidationError("Cannot complete a parchi whose amounts do not match quantity and price");
  }
  return transitionParchi(parchi, "COMPLETED", now);
}

export function cancelParchi(parchi: DigitalParchi, now?: Date): DigitalParchi {
  return transitionParchi(parchi, "CANCELLED", now);
}

// ─── Ledger summary ───────────────────────────────────────────────────────────
export interface LedgerSummary {
  tradeCount: number;
  totalAmount: number;
  totalCess: number;
}

/** Totals over completed parchis only. */
export function summarizeLedger(parchis: readonly DigitalParchi[]): LedgerSummary {
  const completed = parchis.filter((p) => p.status === "COMPLETED");
  return {
    tradeCount: completed.length,
    totalAmount: sumAmounts(completed.map((p) => p.tradeData.totalAmount)),
    totalCess: sumAmounts(completed.map((p) => p.tradeData.mandiCess)),
  };
}
