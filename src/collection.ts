import { MissingQueryError } from "./errors.js";
import type { QueryUnit } from "./types.js";

/**
 * Name-keyed query units in run order. Entries live in an array, with a name
 * index beside it; setting an existing name replaces the body in place.
 */
export class QueryCollection implements Iterable<QueryUnit> {
  private readonly entries: QueryUnit[] = [];
  private readonly index = new Map<string, number>();

  constructor(units: Iterable<QueryUnit> = []) {
    for (const unit of units) {
      this.set(unit.name, unit.body);
    }
  }

  get size(): number {
    return this.entries.length;
  }

  set(name: string, body: string): this {
    const position = this.index.get(name);
    if (position === undefined) {
      this.index.set(name, this.entries.length);
      this.entries.push({ name, body });
    } else {
      this.entries[position] = { name, body };
    }
    return this;
  }

  get(name: string): QueryUnit | undefined {
    const position = this.index.get(name);
    return position === undefined ? undefined : this.entries[position];
  }

  has(name: string): boolean {
    return this.index.has(name);
  }

  names(): string[] {
    return this.entries.map((unit) => unit.name);
  }

  toArray(): QueryUnit[] {
    return [...this.entries];
  }

  [Symbol.iterator](): Iterator<QueryUnit> {
    return this.toArray()[Symbol.iterator]();
  }
}

/**
 * Keep only the named queries. The names act as a membership filter: the
 * result follows the collection's order, not the order of `names`.
 */
export function selectQueries(collection: QueryCollection, names: readonly string[]): QueryCollection {
  if (names.length === 0) {
    return collection;
  }

  const missing = [...new Set(names)].filter((name) => !collection.has(name));
  if (missing.length > 0) {
    throw new MissingQueryError(missing);
  }

  const wanted = new Set(names);
  return new QueryCollection(collection.toArray().filter((unit) => wanted.has(unit.name)));
}
