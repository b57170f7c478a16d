/**
 * Helpers reading environment variables with consistent coercion rules. Blank
 * values count as unset and invalid literals fall back to the caller's default.
 */
import process from "node:process";

/** Normalises the raw value retrieved from {@link process.env}. */
function normaliseEnvValue(raw: string | undefined): string | undefined {
  if (typeof raw !== "string") {
    return undefined;
  }

  const trimmed = raw.trim();
  return trimmed.length === 0 ? undefined : trimmed;
}

/** Returns the trimmed string when {@link name} is set to a non-empty value. */
export function readOptionalString(name: string): string | undefined {
  return normaliseEnvValue(process.env[name]);
}

/**
 * Reads an enum-like environment variable while validating that the literal belongs to the
 * supplied allow-list. Comparison is case-insensitive; `undefined` signals an absent or
 * unrecognised value.
 */
export function readOptionalEnum<T extends string>(
  name: string,
  allowed: readonly T[],
): T | undefined {
  const normalised = normaliseEnvValue(process.env[name]);
  if (!normalised) {
    return undefined;
  }

  const lookup = new Map<string, T>();
  for (const value of allowed) {
    lookup.set(value.toLowerCase(), value);
  }

  return lookup.get(normalised.toLowerCase());
}

/** Returns a canonical enum value, defaulting to {@link defaultValue} when unset or invalid. */
export function readEnum<T extends string>(
  name: string,
  allowed: readonly T[],
  defaultValue: T,
): T {
  return readOptionalEnum(name, allowed) ?? defaultValue;
}
