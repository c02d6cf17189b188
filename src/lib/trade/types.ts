import type { LanguageCode } from "../agent/language";

// ─── Unit normalization ───────────────────────────────────────────────────────
// Maps spoken and written variants to one token per unit
const UNIT_ALIASES: Record<string, string> = {
  kg: "kg",
  kgs: "kg",
  kilo: "kg",
  kilos: "kg",
  kilogram: "kg",
  kilograms: "kg",
  "किलो": "kg",
  quintal: "quintal",
  quintals: "quintal",
  qtl: "quintal",
  "क्विंटल": "quintal",
  g: "gram",
  gm: "gram",
  gram: "gram",
  grams: "gram",
  ton: "ton",
  tons: "ton",
  tonne: "ton",
  tonnes: "ton",
  "टन": "ton",
  l: "liter",
  ltr: "liter",
  litre: "liter",
  litres: "liter",
  liter: "liter",
  liters: "liter",
  dozen: "dozen",
  dozens: "dozen",
  "दर्जन": "dozen",
  pc: "piece",
  pcs: "piece",
  piece: "piece",
  pieces: "piece",
};

export function normalizeUnit(raw: string): string {
  const key = raw.trim().toLowerCase();
  return UNIT_ALIASES[key] ?? key;
}

// ─── Trade fields ─────────────────────────────────────────────────────────────
export const REQUIRED_TRADE_FIELDS = ["productName", "quantity", "unit", "unitPrice"] as const;

export type TradeField = (typeof REQUIRED_TRADE_FIELDS)[number];

/** In-progress trade: whatever has been said so far. */
export interface TradeDraft {
  productName: string | null;
  quantity: number | null;
  unit: string | null;
  unitPrice: number | null;
}

export function emptyTradeDraft(): TradeDraft {
  return { productName: null, quantity: null, unit: null, unitPrice: null };
}

/**
 * A finalized trade observation. Only `buildTradeData` produces one, so
 * totalAmount and mandiCess always come from the calculation engine.
 */
export interface TradeData {
  readonly productName: string;
  readonly quantity: number;
  readonly unit: string;
  readonly unitPrice: number;
  readonly totalAmount: number;
  readonly mandiCess: number;
  readonly timestamp: Date;
  readonly language: LanguageCode;
  readonly conversationId: string;
}

// ─── Digital Parchi ───────────────────────────────────────────────────────────
export type ParchiStatus = "DRAFT" | "COMPLETED" | "CANCELLED";

export interface DigitalParchi {
  readonly id: string;
  readonly tradeData: TradeData;
  readonly vendorId: string | null;
  readonly status: ParchiStatus;
  readonly createdAt: Date;
  readonly updatedAt: Date;
}

/** Fields a store may change after a parchi is saved. */
export interface ParchiUpdate {
  status?: ParchiStatus;
  vendorId?: string | null;
}
