/**
 * Parses `field=value` pairs from the command line into a record.
 * Only the first `=` separates; values stay strings and may be empty.
 */
export function parseAssignments(pairs: readonly string[]): Record<string, string> {
  const record: Record<string, string> = {};

  for (const pair of pairs) {
    const separator = pair.indexOf('=');
    const field = separator === -1 ? '' : pair.slice(0, separator).trim();
    if (!field) {
      throw new Error(`Invalid assignment "${pair}": expected field=value`);
    }
    record[field] = pair.slice(separator + 1);
  }

  return record;
}
