import { z } from "zod";

import { InvalidArgumentError } from "./errors.js";

const INT32_MIN = -(2 ** 31);
const INT32_MAX = 2 ** 31 - 1;

/** Topology size: a non-negative safe integer (zero is rejected separately). */
export const SizeSchema = z.number().int().nonnegative().max(Number.MAX_SAFE_INTEGER);

export const DimensionListSchema = z.array(SizeSchema);

/** Caller-assigned vertex identity: a 32-bit signed integer. */
export const VertexIdSchema = z.number().int().min(INT32_MIN).max(INT32_MAX);

function describe(value: unknown): string {
  return typeof value === "number" ? String(value) : typeof value;
}

/** Validates a generator size; `0` and non-integers raise {@link InvalidArgumentError}. */
export function parseSize(value: unknown, label = "size"): number {
  const parsed = SizeSchema.safeParse(value);
  if (!parsed.success) {
    throw new InvalidArgumentError(`${label} must be a non-negative integer, received ${describe(value)}`, {
      issues: parsed.error.issues,
    });
  }
  if (parsed.data === 0) {
    throw new InvalidArgumentError(`${label} must be positive`, { hint: "use 1 for a single vertex" });
  }
  return parsed.data;
}

/** Validates a raw dimension list; any `0` entry raises {@link InvalidArgumentError}. */
export function parseDimensionList(value: unknown): number[] {
  const parsed = DimensionListSchema.safeParse(value);
  if (!parsed.success) {
    throw new InvalidArgumentError("dimensions must be a list of non-negative integers", {
      issues: parsed.error.issues,
    });
  }
  const zeroIndex = parsed.data.indexOf(0);
  if (zeroIndex >= 0) {
    throw new InvalidArgumentError(`dimension at index ${zeroIndex} must be positive`, {
      hint: "use 1 for a collapsed dimension",
    });
  }
  return parsed.data;
}

/** Validates a vertex id before it is stored. */
export function parseVertexId(value: unknown): number {
  const parsed = VertexIdSchema.safeParse(value);
  if (!parsed.success) {
    throw new InvalidArgumentError(`vertex id must be a 32-bit signed integer, received ${describe(value)}`, {
      issues: parsed.error.issues,
    });
  }
  return parsed.data;
}
