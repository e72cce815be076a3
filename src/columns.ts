const COLUMN_START = /^[\p{L}_]$/u;
const COLUMN_PART = /^[\p{L}\p{Nd}_]$/u;

export function isValidColumnName(name: string): boolean {
  const [first, ...rest] = Array.from(name);
  return first !== undefined && COLUMN_START.test(first) && rest.every((ch) => COLUMN_PART.test(ch));
}

/**
 * Replace every character that may not appear at its position with `_`.
 */
export function toValidColumnName(name: string): string {
  if (name.length === 0) return "_";
  return Array.from(name)
    .map((ch, i) => ((i === 0 ? COLUMN_START : COLUMN_PART).test(ch) ? ch : "_"))
    .join("");
}

/**
 * Make result column names usable by structured sinks: invalid identifiers are
 * rewritten, and names that occur more than once get a zero-based occurrence
 * suffix (`id0`, `id1`). Length and order are preserved.
 *
 * Some queries (query35 for one) select several columns under the same name.
 */
export function sanitizeColumnNames(names: readonly string[]): string[] {
  const valid = names.map((name) => (isValidColumnName(name) ? name : toValidColumnName(name)));

  const counts = new Map<string, number>();
  for (const name of valid) {
    counts.set(name, (counts.get(name) ?? 0) + 1);
  }

  const taken = new Set(valid.filter((name) => counts.get(name) === 1));
  const nextIndex = new Map<string, number>();

  return valid.map((name) => {
    if (counts.get(name) === 1) return name;

    let index = nextIndex.get(name) ?? 0;
    while (taken.has(`${name}${String(index)}`)) index++;

    const deduplicated = `${name}${String(index)}`;
    nextIndex.set(name, index + 1);
    taken.add(deduplicated);
    return deduplicated;
  });
}
