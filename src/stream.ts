import { readFile } from "node:fs/promises";
import { QueryCollection } from "./collection.js";
import { MalformedStreamError } from "./errors.js";
import { containsKeyword, hasCode, splitStatements } from "./statements.js";

export const START_MARKER = "-- start";

/**
 * Templates that always produce two statements run one after the other:
 * query14, query23, query24 and query39.
 */
export const SPLIT_TEMPLATES: ReadonlySet<string> = new Set([
  "query14",
  "query23",
  "query24",
  "query39",
]);

// e.g. "-- start query 32 in stream 0 using template query98.tpl"
const TEMPLATE_PATTERN = /template\s+([A-Za-z0-9_]+)\.tpl/;

/**
 * Read the template identifier from the marker line of a query block.
 */
export function templateName(block: string): string {
  const headerLine = firstLine(block);
  const match = TEMPLATE_PATTERN.exec(headerLine);
  if (!match?.[1]) {
    throw new MalformedStreamError(`No template marker in query block header: "${headerLine}"`);
  }
  return match[1];
}

/**
 * Parse a query stream into query units keyed by template name, in stream
 * order. Split templates become `<name>_part1` and `<name>_part2`.
 */
export function parseQueryStream(text: string): QueryCollection {
  const collection = new QueryCollection();

  // the text before the first marker is header boilerplate
  for (const chunk of text.split(START_MARKER).slice(1)) {
    const block = START_MARKER + chunk;
    const name = templateName(block);
    const statements = splitStatements(block);

    if (isSplitQuery(name, statements)) {
      const [part1, part2] = splitQueryBlock(block, statements);
      collection.set(`${name}_part1`, part1);
      collection.set(`${name}_part2`, part2);
    } else {
      collection.set(name, block);
    }
  }

  return collection;
}

export async function readQueryStream(path: string): Promise<QueryCollection> {
  return parseQueryStream(await readFile(path, "utf8"));
}

function isSplitQuery(name: string, statements: string[]): boolean {
  const second = statements[1];
  if (second === undefined || !hasCode(second)) return false;
  return SPLIT_TEMPLATES.has(name) || containsKeyword(second, "select");
}

/**
 * Cut a two-statement block into two stand-alone blocks. Each keeps the
 * marker line, with its template renamed to `<name>_partN.tpl`.
 */
function splitQueryBlock(block: string, statements: string[]): [string, string] {
  const header = firstLine(block);
  const [first = "", second = ""] = statements;

  const part1 = header.replace(".tpl", "_part1.tpl") + first.slice(header.length) + ";";
  const part2 = header.replace(".tpl", "_part2.tpl") + "\n" + second.replace(/^\r?\n/, "") + ";";
  return [part1, part2];
}

function firstLine(text: string): string {
  const end = text.indexOf("\n");
  return end === -1 ? text : text.slice(0, end);
}
