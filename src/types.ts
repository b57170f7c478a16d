/**
 * Shared types used across the topology package. Grouping the error catalogue
 * here keeps the codes carried by {@link TopologyError} consistent between the
 * graph model, the generators and the CLI.
 */

/**
 * Strongly typed catalogue of stable error codes grouped by feature family.
 */
export const ERROR_CATALOG = {
  TOPO: {
    INVALID_ARGUMENT: "E-TOPO-INVALID-ARGUMENT",
    OUT_OF_RANGE: "E-TOPO-OUT-OF-RANGE",
    IMMUTABLE: "E-TOPO-IMMUTABLE",
  },
} as const;

type ErrorCatalog = typeof ERROR_CATALOG;

/** Utility type used to flatten the nested error catalogue. */
type FlattenCatalog<T extends Record<string, Record<string, string>>> = {
  [Family in keyof T & string as `${Family}_${keyof T[Family] & string}`]: T[Family][keyof T[Family] & string];
};

/** Flattened version of {@link ERROR_CATALOG} used for ergonomic lookups. */
type FlatErrorCatalog = FlattenCatalog<ErrorCatalog>;

/**
 * Builds a flattened object whose properties map to their fully qualified error
 * codes (e.g. `TOPO_OUT_OF_RANGE`). Runtime data stays frozen while the strongly
 * typed relationship with {@link ERROR_CATALOG} is preserved.
 */
function flattenCatalog<T extends Record<string, Record<string, string>>>(
  catalog: T,
): FlattenCatalog<T> {
  const flat: Record<string, string> = {};
  for (const familyKey of Object.keys(catalog) as Array<keyof T & string>) {
    const family = catalog[familyKey];
    for (const codeKey of Object.keys(family) as Array<keyof T[typeof familyKey] & string>) {
      flat[`${familyKey}_${codeKey}`] = family[codeKey];
    }
  }
  return Object.freeze(flat) as FlattenCatalog<T>;
}

/** Flat access to all stable error codes (e.g. `ERROR_CODES.TOPO_IMMUTABLE`). */
export const ERROR_CODES: FlatErrorCatalog = flattenCatalog(ERROR_CATALOG);

/** Union type representing every stable error code raised by the package. */
export type ErrorCode = FlatErrorCatalog[keyof FlatErrorCatalog];

/** Maximum number of UTF-16 code units allowed for error messages and hints. */
export const ERROR_TEXT_MAX_LENGTH = 120;

/**
 * Collapses whitespace, trims surrounding spaces and enforces the maximum length
 * for an error message. Empty input resolves to the fallback.
 */
export function normaliseErrorMessage(text: string, fallback = "unexpected error"): string {
  const collapsed = text.replace(/\s+/g, " ").trim();
  const base = collapsed.length === 0 ? fallback : collapsed;
  if (base.length <= ERROR_TEXT_MAX_LENGTH) {
    return base;
  }
  return `${base.slice(0, ERROR_TEXT_MAX_LENGTH - 1)}…`;
}
