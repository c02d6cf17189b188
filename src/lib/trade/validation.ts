import { isBillableTrade } from "./calculations";
import { REQUIRED_TRADE_FIELDS, type TradeDraft, type TradeField } from "./types";

export interface DraftValidation {
  complete: boolean;
  /** Required fields that have not been said yet. */
  missingFields: TradeField[];
  /**
   * Numeric fields that were said but are not strictly positive. When both
   * are positive but their total rounds to zero paise, both are listed.
   */
  invalidFields: TradeField[];
  presentFields: TradeField[];
}

function isPresent(value: unknown): boolean {
  if (value === null || value === undefined) return false;
  if (typeof value === "string") return value.trim() !== "";
  return true;
}

function isPositiveNumber(value: unknown): boolean {
  return typeof value === "number" && Number.isFinite(value) && value > 0;
}

/**
 * Completeness check over a trade draft. Pure: safe to call at every turn
 * and again at finalization.
 */
export function validateTradeDraft(draft: Partial<TradeDraft>): DraftValidation {
  const missingFields: TradeField[] = [];
  const invalidFields: TradeField[] = [];
  const presentFields: TradeField[] = [];

  for (const field of REQUIRED_TRADE_FIELDS) {
    const value = draft[field];
    if (!isPresent(value)) {
      missingFields.push(field);
      continue;
    }
    presentFields.push(field);
    if ((field === "quantity" || field === "unitPrice") && !isPositiveNumber(value)) {
      invalidFields.push(field);
    }
  }

  const { quantity, unitPrice } = draft;
  if (
    invalidFields.length === 0 &&
    typeof quantity === "number" &&
    typeof unitPrice === "number" &&
    !isBillableTrade(quantity, unitPrice)
  ) {
    invalidFields.push("quantity", "unitPrice");
  }

  return {
    complete: missingFields.length === 0 && invalidFields.length === 0,
    missingFields,
    invalidFields,
    presentFields,
  };
}

export function isTradeDraftComplete(draft: Partial<TradeDraft>): boolean {
  return validateTradeDraft(draft).complete;
}

/** Missing and invalid fields together, in canonical field order. */
export function fieldsNeedingInput(validation: DraftValidation): TradeField[] {
  return REQUIRED_TRADE_FIELDS.filter(
    (f) => validation.missingFields.includes(f) || validation.invalidFields.includes(f)
  );
}
