/**
 * Validation helpers for CLI flags
 */

/**
 * Parses a positive integer flag.
 *
 * @param name - Flag name used in the error message
 * @throws Error if the value is not an integer >= 1
 */
export function parsePositiveInt(value: string | undefined, name: string): number | undefined {
  if (value === undefined) return undefined;

  const parsed = Number(value.trim());
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new Error(`Invalid ${name}: "${value}". Expected a positive integer.`);
  }
  return parsed;
}

/**
 * Splits a comma-separated flag value into trimmed, non-empty entries.
 */
export function parseList(value: string | undefined): string[] | undefined {
  if (value === undefined) return undefined;

  const entries = value
    .split(",")
    .map((entry) => entry.trim())
    .filter((entry) => entry.length > 0);
  return entries.length > 0 ? entries : undefined;
}
