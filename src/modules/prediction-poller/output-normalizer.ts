/**
 * Normalize a provider's raw job output into a list of strings.
 *
 * absent → []; a single string → [string]; a list → each item as a string;
 * any other value → [String(value)].
 */
export function normalizeOutput(output: unknown): string[] {
  if (output === null || output === undefined) return []
  if (typeof output === 'string') return [output]
  if (Array.isArray(output)) {
    return output.map((item: unknown) => (typeof item === 'string' ? item : String(item)))
  }
  return [String(output)]
}
