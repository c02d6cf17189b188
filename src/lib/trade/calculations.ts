import { ValidationError } from "../errors";

// Currency amounts are rupees with paise as the minor unit
const CURRENCY_PLACES = 2;

/** Mandi cess rate, as an exact decimal string. */
export const MANDI_CESS_RATE = "0.05";

export interface TradeAmounts {
  totalAmount: number;
  mandiCess: number;
  finalAmount: number;
}

// ─── Exact decimal helpers ────────────────────────────────────────────────────
// value = units / 10^scale. Numbers enter through their shortest decimal
// representation, so 25.5 is 255/10 and never 25.4999999....

interface ExactDecimal {
  units: bigint;
  scale: number;
}

function parseDecimal(text: string): ExactDecimal {
  const match = /^(-?)(\d+)(?:\.(\d+))?(?:e([+-]?\d+))?$/i.exec(text);
  if (!match) throw new ValidationError(`Not a decimal number: ${text}`);
  const [, sign, intPart, fraction = "", exponent = "0"] = match;

  let digits = intPart + fraction;
  let scale = fraction.length - Number(exponent);
  if (scale < 0) {
    digits += "0".repeat(-scale);
    scale = 0;
  }
  return { units: BigInt(sign + digits), scale };
}

function toDecimal(value: number, field: string): ExactDecimal {
  if (!Number.isFinite(value)) {
    throw new ValidationError(`${field} must be a finite number`, field);
  }
  return parseDecimal(String(value));
}

function multiply(a: ExactDecimal, b: ExactDecimal): ExactDecimal {
  return { units: a.units * b.units, scale: a.scale + b.scale };
}

/** Rounds a non-negative decimal half-up and returns it in units of 10^-places. */
function roundHalfUp(value: ExactDecimal, places: number): bigint {
  if (value.scale <= places) {
    return value.units * 10n ** BigInt(places - value.scale);
  }
  const divisor = 10n ** BigInt(value.scale - places);
  const quotient = value.units / divisor;
  const remainder = value.units % divisor;
  return remainder * 2n >= divisor ? quotient + 1n : quotient;
}

function fromMinorUnits(minor: bigint): number {
  return Number(minor) / 10 ** CURRENCY_PLACES;
}

/** Converts an amount to paise, rounding half-up if it carries more than two decimals. */
export function toMinorUnits(amount: number): bigint {
  const decimal = toDecimal(amount, "amount");
  if (decimal.units < 0n) {
    throw new ValidationError("amount must not be negative", "amount");
  }
  return roundHalfUp(decimal, CURRENCY_PLACES);
}

// ─── Calculation engine ───────────────────────────────────────────────────────

function requirePositive(value: number, field: string): ExactDecimal {
  if (!Number.isFinite(value) || value <= 0) {
    throw new ValidationError(`${field} must be greater than zero, got ${value}`, field);
  }
  return toDecimal(value, field);
}

function totalMinorUnits(quantity: number, unitPrice: number): bigint {
  const q = requirePositive(quantity, "quantity");
  const p = requirePositive(unitPrice, "unitPrice");
  const total = roundHalfUp(multiply(q, p), CURRENCY_PLACES);
  if (total === 0n) {
    throw new ValidationError(`quantity × unitPrice rounds to zero (${quantity} × ${unitPrice})`, "unitPrice");
  }
  return total;
}

/**
 * True when quantity and unit price are positive and their total is at
 * least one paisa. Never throws.
 */
export function isBillableTrade(quantity: number, unitPrice: number): boolean {
  if (!(Number.isFinite(quantity) && quantity > 0 && Number.isFinite(unitPrice) && unitPrice > 0)) {
    return false;
  }
  const q = toDecimal(quantity, "quantity");
  const p = toDecimal(unitPrice, "unitPrice");
  return roundHalfUp(multiply(q, p), CURRENCY_PLACES) > 0n;
}

function cessMinorUnits(totalMinor: bigint): bigint {
  const total: ExactDecimal = { units: totalMinor, scale: CURRENCY_PLACES };
  return roundHalfUp(multiply(total, parseDecimal(MANDI_CESS_RATE)), CURRENCY_PLACES);
}

/** quantity × unitPrice, rounded half-up to paise. A total below half a paisa is rejected. */
export function calculateTotalAmount(quantity: number, unitPrice: number): number {
  return fromMinorUnits(totalMinorUnits(quantity, unitPrice));
}

/** 5% of the total, rounded half-up to paise. A zero total has zero cess. */
export function calculateMandiCess(totalAmount: number): number {
  if (!Number.isFinite(totalAmount) || totalAmount < 0) {
    throw new ValidationError(`totalAmount must not be negative, got ${totalAmount}`, "totalAmount");
  }
  return fromMinorUnits(cessMinorUnits(toMinorUnits(totalAmount)));
}

export function calculateTradeAmounts(quantity: number, unitPrice: number): TradeAmounts {
  const totalMinor = totalMinorUnits(quantity, unitPrice);
  const cessMinor = cessMinorUnits(totalMinor);
  return {
    totalAmount: fromMinorUnits(totalMinor),
    mandiCess: fromMinorUnits(cessMinor),
    finalAmount: fromMinorUnits(totalMinor + cessMinor),
  };
}

/**
 * True when the stored total and cess are exactly what the engine derives
 * from quantity and unit price. Non-positive inputs are never consistent.
 */
export function validateCalculationConsistency(
  quantity: number,
  unitPrice: number,
  totalAmount: number,
  mandiCess: number
): boolean {
  if (!isBillableTrade(quantity, unitPrice)) return false;
  const expected = calculateTradeAmounts(quantity, unitPrice);
  return expected.totalAmount === totalAmount && expected.mandiCess === mandiCess;
}

/** Exact sum of rupee amounts. */
export function sumAmounts(amounts: readonly number[]): number {
  return fromMinorUnits(amounts.reduce((acc, a) => acc + toMinorUnits(a), 0n));
}

/** "255.00" style rendering with exactly two decimals. */
export function formatAmount(amount: number): string {
  const minor = toMinorUnits(amount);
  const rupees = minor / 100n;
  const paise = (minor % 100n).toString().padStart(2, "0");
  return `${rupees}.${paise}`;
}
