import {
  calculateMandiCess,
  calculateTotalAmount,
  calculateTradeAmounts,
  formatAmount,
  isBillableTrade,
  sumAmounts,
  toMinorUnits,
  validateCalculationConsistency,
} from "@/lib/trade/calculations";
import { ValidationError } from "@/lib/errors";

describe("calculateTradeAmounts", () => {
  it("computes total, 5% cess and final amount for 10 kg at 25.50", () => {
    expect(calculateTradeAmounts(10, 25.5)).toEqual({
      totalAmount: 255,
      mandiCess: 12.75,
      finalAmount: 267.75,
    });
  });

  it("computes 2 quintal at 2000 per quintal", () => {
    expect(calculateTradeAmounts(2, 2000)).toEqual({
      totalAmount: 4000,
      mandiCess: 200,
      finalAmount: 4200,
    });
  });

  it("multiplies exactly where binary floating point would drift", () => {
    // 0.1 * 3 is 0.30000000000000004 in floating point
    expect(calculateTotalAmount(3, 0.1)).toBe(0.3);
    expect(calculateTotalAmount(3, 333.33)).toBe(999.99);
  });

  it("rounds the total half-up to paise", () => {
    expect(calculateTotalAmount(1.005, 1)).toBe(1.01);
    expect(calculateTotalAmount(1.004, 1)).toBe(1);
  });

  it("rounds the cess half-up from the rounded total", () => {
    // 23.31 * 0.05 = 1.1655
    expect(calculateTradeAmounts(7, 3.33)).toEqual({
      totalAmount: 23.31,
      mandiCess: 1.17,
      finalAmount: 24.48,
    });
    // 999.99 * 0.05 = 49.9995
    expect(calculateMandiCess(999.99)).toBe(50);
  });

  it("rejects non-positive quantity or price before any arithmetic", () => {
    expect(() => calculateTotalAmount(0, 10)).toThrow(ValidationError);
    expect(() => calculateTotalAmount(5, -1)).toThrow(ValidationError);
    expect(() => calculateTotalAmount(Number.NaN, 10)).toThrow(ValidationError);
    expect(() => calculateTotalAmount(5, Number.POSITIVE_INFINITY)).toThrow(ValidationError);
  });

  it("rejects a total that rounds to zero paise", () => {
    expect(() => calculateTotalAmount(0.001, 1)).toThrow("quantity × unitPrice rounds to zero (0.001 × 1)");
    expect(() => calculateTradeAmounts(2, 0.002)).toThrow(ValidationError);
    // 0.005 rounds half-up to one paisa
    expect(calculateTotalAmount(0.005, 1)).toBe(0.01);
  });

  it("names the offending field", () => {
    try {
      calculateTradeAmounts(5, 0);
      throw new Error("expected a ValidationError");
    } catch (error) {
      expect(error).toBeInstanceOf(ValidationError);
      expect(error).toMatchObject({ field: "unitPrice" });
    }
  });
});

describe("calculateMandiCess", () => {
  it("returns 0 for a zero total", () => {
    expect(calculateMandiCess(0)).toBe(0);
  });

  it("rounds small totals half-up", () => {
    // 0.30 * 0.05 = 0.015
    expect(calculateMandiCess(0.3)).toBe(0.02);
  });

  it("rejects a negative total", () => {
    expect(() => calculateMandiCess(-1)).toThrow(ValidationError);
  });
});

describe("isBillableTrade", () => {
  it("accepts any positive trade worth at least one paisa", () => {
    expect(isBillableTrade(10, 25.5)).toBe(true);
    expect(isBillableTrade(0.005, 1)).toBe(true);
  });

  it("rejects totals below half a paisa and non-positive inputs without throwing", () => {
    expect(isBillableTrade(0.001, 1)).toBe(false);
    expect(isBillableTrade(0, 10)).toBe(false);
    expect(isBillableTrade(5, Number.NaN)).toBe(false);
  });
});

describe("validateCalculationConsistency", () => {
  it("accepts amounts that match the engine", () => {
    expect(validateCalculationConsistency(10, 25.5, 255, 12.75)).toBe(true);
  });

  it("rejects a tampered total or cess", () => {
    expect(validateCalculationConsistency(10, 25.5, 255.01, 12.75)).toBe(false);
    expect(validateCalculationConsistency(10, 25.5, 255, 12.76)).toBe(false);
  });

  it("never treats non-positive inputs as consistent", () => {
    expect(validateCalculationConsistency(0, 25.5, 0, 0)).toBe(false);
    expect(validateCalculationConsistency(10, -1, -10, -0.5)).toBe(false);
    expect(validateCalculationConsistency(0.001, 1, 0, 0)).toBe(false);
  });
});

describe("money helpers", () => {
  it("converts rupees to paise", () => {
    expect(toMinorUnits(19.99)).toBe(1999n);
    expect(toMinorUnits(0)).toBe(0n);
  });

  it("sums exactly", () => {
    expect(sumAmounts([0.1, 0.2])).toBe(0.3);
    expect(sumAmounts([])).toBe(0);
  });

  it("formats with two decimals", () => {
    expect(formatAmount(255)).toBe("255.00");
    expect(formatAmount(12.75)).toBe("12.75");
    expect(formatAmount(0.5)).toBe("0.50");
  });
});
