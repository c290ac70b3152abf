import { InvalidArgumentError } from "commander";
import { ERROR_CORRECTION_LEVELS, type ErrorCorrectionLevel } from "../qr/provider.js";

export function parseIntegerOption(min: number, max = Number.MAX_SAFE_INTEGER) {
  return (raw: string): number => {
    const trimmed = raw.trim();
    if (!/^[-+]?\d+$/.test(trimmed)) {
      throw new InvalidArgumentError(`expected an integer, got "${raw}"`);
    }
    const value = Number.parseInt(trimmed, 10);
    if (value < min || value > max) {
      throw new InvalidArgumentError(`expected a value between ${min} and ${max}, got ${value}`);
    }
    return value;
  };
}

export function parseRatioOption(raw: string): number {
  const value = Number(raw.trim());
  if (!raw.trim() || !Number.isFinite(value) || value < 0 || value > 1) {
    throw new InvalidArgumentError(`expected a number between 0 and 1, got "${raw}"`);
  }
  return value;
}

export function isErrorCorrectionLevel(value: string): value is ErrorCorrectionLevel {
  return ERROR_CORRECTION_LEVELS.some((level) => level === value);
}

export function parseErrorCorrectionOption(raw: string): ErrorCorrectionLevel {
  const value = raw.trim().toUpperCase();
  if (!isErrorCorrectionLevel(value)) {
    throw new InvalidArgumentError(
      `expected one of ${ERROR_CORRECTION_LEVELS.join(", ")}, got "${raw}"`,
    );
  }
  return value;
}
