/**
 * Environment readers shared by the pipeline configuration. Blank values count
 * as unset so an exported-but-empty variable falls back to the default.
 */
import process from "node:process";

type Env = Readonly<Record<string, string | undefined>>;

/** Normalises the raw value retrieved from the environment. */
function normaliseEnvValue(raw: string | undefined): string | undefined {
  if (typeof raw !== "string") {
    return undefined;
  }

  const trimmed = raw.trim();
  return trimmed.length === 0 ? undefined : trimmed;
}

interface NumberOptions {
  /** Minimum allowed value (inclusive). */
  readonly min?: number;
  /** Maximum allowed value (inclusive). */
  readonly max?: number;
}

function withinBounds(value: number, options: NumberOptions | undefined): boolean {
  if (!Number.isFinite(value)) {
    return false;
  }
  if (options?.min !== undefined && value < options.min) {
    return false;
  }
  if (options?.max !== undefined && value > options.max) {
    return false;
  }
  return true;
}

/** Returns an optional integer when `name` contains a valid base-10 literal. */
export function readOptionalInt(name: string, options?: NumberOptions, env: Env = process.env): number | undefined {
  const normalised = normaliseEnvValue(env[name]);
  if (!normalised || !/^[-+]?\d+$/.test(normalised)) {
    return undefined;
  }

  const value = Number.parseInt(normalised, 10);
  if (!Number.isSafeInteger(value)) {
    return undefined;
  }

  return withinBounds(value, options) ? value : undefined;
}

/**
 * Reads the variable as a base-10 integer. Malformed or out-of-range values
 * yield `defaultValue`.
 */
export function readInt(name: string, defaultValue: number, options?: NumberOptions, env: Env = process.env): number {
  return readOptionalInt(name, options, env) ?? defaultValue;
}

/** Returns the trimmed value when `name` is set to a non-empty string. */
export function readOptionalString(name: string, env: Env = process.env): string | undefined {
  return normaliseEnvValue(env[name]);
}

export function readString(name: string, defaultValue: string, env: Env = process.env): string {
  return readOptionalString(name, env) ?? defaultValue;
}

/**
 * Reads an enum-like variable. Matching is case-insensitive and the canonical
 * spelling from `allowed` is returned; anything else yields `defaultValue`.
 */
export function readEnum<T extends string>(
  name: string,
  allowed: readonly T[],
  defaultValue: T,
  env: Env = process.env,
): T {
  const normalised = normaliseEnvValue(env[name]);
  if (!normalised) {
    return defaultValue;
  }
  const candidate = allowed.find((value) => value.toLowerCase() === normalised.toLowerCase());
  return candidate ?? defaultValue;
}
