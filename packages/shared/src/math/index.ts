/**
 * Fixed-point bigint math
 *
 * Amounts, prices and percentages are integers scaled by their unit
 * constants. Division truncates toward zero unless the name says otherwise.
 */

// ============================================
// ERRORS
// ============================================

export class MathError extends Error {
  constructor(
    message: string,
    public readonly operation: string
  ) {
    super(message);
    this.name = "MathError";
  }
}

// ============================================
// BASIC HELPERS
// ============================================

export function minBigInt(a: bigint, b: bigint): bigint {
  return a < b ? a : b;
}

export function maxBigInt(a: bigint, b: bigint): bigint {
  return a > b ? a : b;
}

export function absBigInt(a: bigint): bigint {
  return a < 0n ? -a : a;
}

/**
 * Division of non-negative operands rounded up
 */
export function ceilDiv(a: bigint, b: bigint): bigint {
  if (b === 0n) {
    throw new MathError("Division by zero", "ceilDiv");
  }
  if (a < 0n || b < 0n) {
    throw new MathError("ceilDiv expects non-negative operands", "ceilDiv");
  }
  return a === 0n ? 0n : (a - 1n) / b + 1n;
}

// ============================================
// MUL-DIV
// ============================================

/**
 * a * b / denominator, truncated toward zero
 */
export function mulDiv(a: bigint, b: bigint, denominator: bigint): bigint {
  if (denominator === 0n) {
    throw new MathError("Division by zero", "mulDiv");
  }
  return (a * b) / denominator;
}

/**
 * a * b / denominator, rounded up. Operands must be non-negative.
 */
export function mulDivCeil(a: bigint, b: bigint, denominator: bigint): bigint {
  return ceilDiv(a * b, denominator);
}

/**
 * Applies a signed percentage to an amount: amount * perc / unit.
 * A negative percentage yields a negative result of the same magnitude.
 */
export function applyPerc(amount: bigint, perc: bigint, unit: bigint): bigint {
  const magnitude = mulDiv(amount, absBigInt(perc), unit);
  return perc < 0n ? -magnitude : magnitude;
}

// ============================================
// FORMATTING
// ============================================

/**
 * Renders a fixed-point integer as a decimal string, e.g. (150000000n, 8) -> "1.5"
 */
export function formatFixed(value: bigint, decimals: number): string {
  const negative = value < 0n;
  const magnitude = absBigInt(value);
  const unit = 10n ** BigInt(decimals);
  const whole = magnitude / unit;
  const fraction = (magnitude % unit).toString().padStart(decimals, "0").replace(/0+$/, "");
  const body = fraction.length > 0 ? `${whole}.${fraction}` : whole.toString();
  return negative ? `-${body}` : body;
}

/**
 * Parses a decimal string into a fixed-point integer, truncating extra digits
 */
export function parseFixed(value: string, decimals: number): bigint {
  const match = /^(-)?(\d+)(?:\.(\d+))?$/.exec(value.trim());
  if (!match) {
    throw new MathError(`Invalid decimal string: ${value}`, "parseFixed");
  }
  const [, sign, whole, fraction = ""] = match;
  const padded = fraction.slice(0, decimals).padEnd(decimals, "0");
  const magnitude = BigInt(whole) * 10n ** BigInt(decimals) + BigInt(padded || "0");
  return sign ? -magnitude : magnitude;
}
