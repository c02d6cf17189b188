export {
  MANDI_CESS_RATE,
  calculateTotalAmount,
  calculateMandiCess,
  calculateTradeAmounts,
  isBillableTrade,
  validateCalculationConsistency,
  sumAmounts,
  formatAmount,
  toMinorUnits,
  type TradeAmounts,
} from "./calculations";
export {
  validateTradeDraft,
  isTradeDraftComplete,
  fieldsNeedingInput,
  type DraftValidation,
} from "./validation";
export {
  buildTradeData,
  createDraftParchi,
  transitionParchi,
  completeParchi,
  cancelParchi,
  canTransition,
  summarizeLedger,
  type LedgerSummary,
  type TradeMeta,
} from "./parchi";
export {
  REQUIRED_TRADE_FIELDS,
  emptyTradeDraft,
  normalizeUnit,
  type TradeField,
  type TradeDraft,
  type TradeData,
  type ParchiStatus,
  type DigitalParchi,
  type ParchiUpdate,
} from "./types";
