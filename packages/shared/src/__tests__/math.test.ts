import { describe, it, expect } from "vitest";
import {
  ceilDiv,
  mulDiv,
  mulDivCeil,
  applyPerc,
  formatFixed,
  parseFixed,
  minBigInt,
  maxBigInt,
  MathError,
} from "../math/index.js";

describe("Fixed-point math", () => {
  describe("ceilDiv", () => {
    it("should round up inexact division", () => {
      expect(ceilDiv(7n, 2n)).toBe(4n);
      expect(ceilDiv(8n, 2n)).toBe(4n);
      expect(ceilDiv(0n, 3n)).toBe(0n);
    });

    it("should throw on division by zero", () => {
      expect(() => ceilDiv(1n, 0n)).toThrow(MathError);
    });
  });

  describe("mulDiv", () => {
    it("should truncate", () => {
      expect(mulDiv(10n, 2n, 3n)).toBe(6n);
      expect(mulDivCeil(10n, 2n, 3n)).toBe(7n);
    });
  });

  describe("applyPerc", () => {
    it("should keep the sign of the percentage", () => {
      expect(applyPerc(1000n, 10_000_000n, 100_000_000n)).toBe(100n);
      expect(applyPerc(1000n, -10_000_000n, 100_000_000n)).toBe(-100n);
    });

    it("should truncate the magnitude toward zero", () => {
      expect(applyPerc(15n, -3_000_000n, 100_000_000n)).toBe(0n);
    });
  });

  describe("min/max", () => {
    it("should pick the right operand", () => {
      expect(minBigInt(3n, -1n)).toBe(-1n);
      expect(maxBigInt(3n, -1n)).toBe(3n);
    });
  });

  describe("formatFixed / parseFixed", () => {
    it("should render and parse decimal strings", () => {
      expect(formatFixed(150_000_000n, 8)).toBe("1.5");
      expect(formatFixed(-5_000_000n, 8)).toBe("-0.05");
      expect(formatFixed(200n, 2)).toBe("2");
      expect(parseFixed("1.33", 8)).toBe(133_000_000n);
      expect(parseFixed("-0.05", 8)).toBe(-5_000_000n);
      expect(parseFixed("0.123456789", 8)).toBe(12_345_678n);
    });

    it("should reject malformed input", () => {
      expect(() => parseFixed("1.2.3", 8)).toThrow(MathError);
    });
  });
});
