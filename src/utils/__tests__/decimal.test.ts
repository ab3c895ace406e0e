import { describe, it, expect } from "vitest";
import {
  applyReturnRate,
  compareAmounts,
  fromMinorUnits,
  isAmount,
  multiplyAmount,
  normalizeAmount,
  subtractAmounts,
  sumAmounts,
  toGatewayAmount,
} from "../decimal.js";
import { ValidationError } from "../errors.js";

describe("normalizeAmount()", () => {
  it("pads to two fraction digits", () => {
    expect(normalizeAmount("100")).toBe("100.00");
    expect(normalizeAmount(" 7.5 ")).toBe("7.50");
  });

  it("rounds half up on the third fraction digit", () => {
    expect(normalizeAmount("0.005")).toBe("0.01");
    expect(normalizeAmount("0.004")).toBe("0.00");
    expect(normalizeAmount(12.345)).toBe("12.35");
  });

  it("rejects malformed input", () => {
    expect(() => normalizeAmount("12,50")).toThrow(ValidationError);
    expect(() => normalizeAmount(Number.NaN)).toThrow(ValidationError);
  });
});

describe("arithmetic", () => {
  it("adds and subtracts without float drift", () => {
    expect(sumAmounts(["0.10", "0.20"])).toBe("0.30");
    expect(sumAmounts(["150", "35.5"])).toBe("185.50");
    expect(subtractAmounts("185.00", "150.00")).toBe("35.00");
    expect(sumAmounts([])).toBe("0.00");
  });

  it("multiplies a unit price by a whole quantity", () => {
    expect(multiplyAmount("25.50", 3)).toBe("76.50");
    expect(() => multiplyAmount("1", 1.5)).toThrow(ValidationError);
  });

  it("compares by value, not by string", () => {
    expect(compareAmounts("10", "10.00")).toBe(0);
    expect(compareAmounts("9.99", "10")).toBe(-1);
    expect(compareAmounts("100", "20")).toBe(1);
  });

  it("formats negative minor units", () => {
    expect(fromMinorUnits(-150n)).toBe("-1.50");
  });
});

describe("applyReturnRate()", () => {
  it("adds the percentage to the principal", () => {
    expect(applyReturnRate("100", "30")).toBe("130.00");
    expect(applyReturnRate("100.00", "12.5")).toBe("112.50");
    expect(applyReturnRate("500", "0")).toBe("500.00");
  });

  it("rounds the interest half up to minor units", () => {
    expect(applyReturnRate("0.05", "10")).toBe("0.06");
    expect(applyReturnRate("33.33", "10")).toBe("36.66");
  });
});

describe("gateway amounts", () => {
  it("converts to integer minor units", () => {
    expect(toGatewayAmount("1500.50")).toBe(150050);
    expect(toGatewayAmount("20")).toBe(2000);
  });

  it("recognises amount-shaped input", () => {
    expect(isAmount("1.5")).toBe(true);
    expect(isAmount(42)).toBe(true);
    expect(isAmount("abc")).toBe(false);
    expect(isAmount(Number.POSITIVE_INFINITY)).toBe(false);
  });
});
