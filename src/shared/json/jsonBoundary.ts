export function normalizeJsonObject(
  value: unknown,
): Record<string, unknown> | undefined {
  if (typeof value === "object" && value !== null && !Array.isArray(value)) {
    return value as Record<string, unknown>;
  }
  return undefined;
}

/**
 * Accepts `{ field: ... }` or `{ [root]: { field: ... } }` and returns the
 * flat attribute object. Top-level keys fill in anything the wrapper lacks.
 */
export function unwrapParams(
  body: unknown,
  root: string,
): Record<string, unknown> {
  const flat = normalizeJsonObject(body) ?? {};
  const wrapped = normalizeJsonObject(flat[root]);

  if (!wrapped) return flat;

  const { [root]: _wrapper, ...rest } = flat;
  return { ...rest, ...wrapped };
}
