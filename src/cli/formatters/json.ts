/**
 * JSON output for machine consumption. Query results are plain data, so
 * this is a straight serialization.
 */
export function formatJson(value: unknown): string {
  return JSON.stringify(value, null, 2);
}
