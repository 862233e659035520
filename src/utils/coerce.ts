/**
 * Lenient numeric conversion for loosely typed source fields.
 * Finite numbers pass through, numeric strings are parsed, everything else is rejected.
 */
export function toFloat(value: unknown): number | null {
  if (typeof value === "number") return Number.isFinite(value) ? value : null;
  if (typeof value === "boolean") return value ? 1 : 0;
  if (typeof value !== "string") return null;

  const trimmed = value.trim();
  if (!/^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/.test(trimmed)) return null;
  return Number(trimmed);
}

/**
 * Integer conversion: integer strings are parsed, finite numbers are truncated toward zero.
 * Decimal strings such as "2.5" are rejected.
 */
export function toInt(value: unknown): number | null {
  if (typeof value === "number") return Number.isFinite(value) ? Math.trunc(value) : null;
  if (typeof value === "boolean") return value ? 1 : 0;
  if (typeof value !== "string") return null;

  const trimmed = value.trim();
  if (!/^[+-]?\d+$/.test(trimmed)) return null;
  return Number.parseInt(trimmed, 10);
}

/** Parses an optional numeric CSV cell; empty or non-numeric cells become undefined. */
export function optionalNumber(value: string | undefined): number | undefined {
  const parsed = toFloat(value);
  return parsed === null ? undefined : parsed;
}
