import { InvalidArgumentError } from "commander";
import { UsageError } from "./errors";
import type { ListDisplay } from "./types";

export function parsePositiveIntOption(name: string) {
  return (value: string): number => {
    const n = Number(value);
    if (!Number.isFinite(n) || !Number.isInteger(n) || n <= 0) {
      throw new InvalidArgumentError(`${name} must be a positive integer.`);
    }
    return n;
  };
}

export function parseNonNegativeIntOption(name: string) {
  return (value: string): number => {
    const n = Number(value);
    if (!Number.isFinite(n) || !Number.isInteger(n) || n < 0) {
      throw new InvalidArgumentError(`${name} must be a non-negative integer.`);
    }
    return n;
  };
}

const BANDWIDTH_RE = /^\s*(\d+)\s?([kmg]?bit)?\s*$/i;

const BANDWIDTH_EXPONENT: Record<string, number> = {
  bit: 0,
  kbit: 3,
  mbit: 6,
  gbit: 9
};

/** "100mbit", "1 gbit", "500kbit" or a bare number of bits, as bits per second. */
export function parseBandwidth(value: string): number {
  const match = BANDWIDTH_RE.exec(value);
  if (!match) {
    throw new InvalidArgumentError("Expected a bandwidth such as 100mbit, 1gbit or 500kbit.");
  }
  const unit = match[2]?.toLowerCase() ?? "bit";
  const exponent = BANDWIDTH_EXPONENT[unit] ?? 0;
  const bits = Number(match[1]) * 10 ** exponent;
  if (bits > Number.MAX_SAFE_INTEGER) {
    throw new InvalidArgumentError("Bandwidth is too large.");
  }
  return bits;
}

/** Repeatable option collector; keeps every value in the order given. */
export function collectRepeatable(value: string, previous: string[]): string[] {
  return [...previous, value];
}

export function resolveDisplay(
  flags: { long?: boolean; brief?: boolean; id?: boolean },
  fallback: ListDisplay = "id"
): ListDisplay {
  const picked: ListDisplay[] = [];
  if (flags.long) picked.push("long");
  if (flags.brief) picked.push("brief");
  if (flags.id) picked.push("id");
  if (picked.length > 1) {
    throw new UsageError("Use only one of -l, -b or -i.");
  }
  return picked[0] ?? fallback;
}
