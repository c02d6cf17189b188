import catalog from "./locales/messages.json";
import type { LanguageCode } from "./language";
import type { TradeData, TradeField } from "../trade/types";
import { formatAmount } from "../trade/calculations";

export interface LocaleMessages {
  fieldLabels: Record<TradeField, string>;
  listSeparator: string;
  listConjunction: string;
  clarify: string;
  retry: string;
  failed: string;
  completed: string;
  busy: string;
  abandoned: string;
}

const MESSAGES: Record<LanguageCode, LocaleMessages> = catalog;

export function messagesFor(language: LanguageCode): LocaleMessages {
  return MESSAGES[language] ?? MESSAGES.en;
}

function fill(template: string, values: Record<string, string>): string {
  return template.replace(/\{(\w+)\}/g, (whole, key: string) => values[key] ?? whole);
}

function joinList(items: string[], m: LocaleMessages): string {
  if (items.length <= 1) return items.join("");
  return items.slice(0, -1).join(m.listSeparator) + m.listConjunction + items[items.length - 1];
}

/** Asks for exactly the given fields, in the order given. */
export function buildClarificationText(fields: readonly TradeField[], language: LanguageCode): string {
  const m = messagesFor(language);
  return fill(m.clarify, { fields: joinList(fields.map((f) => m.fieldLabels[f]), m) });
}

export function buildRetryText(language: LanguageCode): string {
  return messagesFor(language).retry;
}

export function buildFailureText(language: LanguageCode): string {
  return messagesFor(language).failed;
}

export function buildBusyText(language: LanguageCode): string {
  return messagesFor(language).busy;
}

export function buildAbandonedText(language: LanguageCode): string {
  return messagesFor(language).abandoned;
}

export function buildCompletionText(trade: TradeData, language: LanguageCode): string {
  return fill(messagesFor(language).completed, {
    product: trade.productName,
    quantity: String(trade.quantity),
    unit: trade.unit,
    unitPrice: formatAmount(trade.unitPrice),
    total: formatAmount(trade.totalAmount),
    cess: formatAmount(trade.mandiCess),
  });
}
