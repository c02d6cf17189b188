/**
 * Display helpers for the chat CLI: turn results, parchis and the ledger.
 */

import type { ExtractionResult } from "../lib/agent/types";
import type { Ledger, SubmitResult } from "../lib/trade-desk";
import { formatAmount } from "../lib/trade/calculations";
import type { DigitalParchi, TradeDraft } from "../lib/trade/types";

// ─── Turn Result ─────────────────────────────────────────────────────────────

function formatDraft(d: TradeDraft): string {
  const parts = [
    `product=${d.productName ?? "?"}`,
    `qty=${d.quantity ?? "?"}`,
    `unit=${d.unit ?? "?"}`,
    `price=${d.unitPrice ?? "?"}`,
  ];
  return parts.join("  ");
}

export function printTurnResult(submitted: SubmitResult, indent = "  "): void {
  const r: ExtractionResult = submitted.result;

  console.log(`\n${indent}+-- AGENT -----------------------------------+`);
  r.responseText.split("\n").forEach((line) => {
    console.log(`${indent}|  ${line}`);
  });
  console.log(`${indent}+--------------------------------------------+`);

  console.log(`${indent}State:       ${r.state}`);
  console.log(`${indent}Language:    ${r.language}${r.languageFallback ? " (fallback)" : ""}`);
  console.log(`${indent}Confidence:  ${(r.confidenceScore * 100).toFixed(0)}%`);
  if (r.extractedData) {
    console.log(`${indent}Known:       ${formatDraft(r.extractedData)}`);
  }
  if (r.missingFields.length > 0) {
    console.log(`${indent}Missing:     ${r.missingFields.join(", ")}`);
  }
  if (r.translationDegraded) {
    console.log(`${indent}Note:        translation unavailable, used original text`);
  }
  if (r.failure) {
    console.log(`${indent}Failure:     ${r.failure.kind} (${r.failure.message})`);
  }

  if (r.parchi) {
    console.log();
    printParchi(r.parchi, indent);
    console.log(
      submitted.persisted
        ? `${indent}Saved.`
        : `${indent}NOT saved: ${submitted.persistenceError ?? "unknown error"}`
    );
  }
}

// ─── Parchi ──────────────────────────────────────────────────────────────────

export function printParchi(p: DigitalParchi, indent = "  "): void {
  const t = p.tradeData;
  console.log(`${indent}--- Digital Parchi ${p.id} ---`);
  console.log(`${indent}  Status:     ${p.status}`);
  console.log(`${indent}  Product:    ${t.productName}`);
  console.log(`${indent}  Quantity:   ${t.quantity} ${t.unit}`);
  console.log(`${indent}  Unit price: ₹${formatAmount(t.unitPrice)} / ${t.unit}`);
  console.log(`${indent}  Total:      ₹${formatAmount(t.totalAmount)}`);
  console.log(`${indent}  Mandi cess: ₹${formatAmount(t.mandiCess)}`);
  if (p.vendorId) {
    console.log(`${indent}  Vendor:     ${p.vendorId}`);
  }
  console.log(`${indent}  Recorded:   ${t.timestamp.toISOString()}`);
}

// ─── Ledger ──────────────────────────────────────────────────────────────────

export function printLedger(ledger: Ledger, indent = "  "): void {
  if (ledger.parchis.length === 0) {
    console.log(`${indent}No parchis recorded yet.`);
    return;
  }
  for (const p of ledger.parchis) {
    const t = p.tradeData;
    console.log(
      `${indent}${t.timestamp.toISOString().slice(0, 16)}  ${p.status.padEnd(9)}  ${t.productName} ${t.quantity} ${t.unit}  ₹${formatAmount(t.totalAmount)}`
    );
  }
  const s = ledger.summary;
  console.log(`${indent}-- ${s.tradeCount} completed, total ₹${formatAmount(s.totalAmount)}, cess ₹${formatAmount(s.totalCess)}`);
}
