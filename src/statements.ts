import { MalformedStreamError } from "./errors.js";

type ScanState = "code" | "single" | "double" | "backtick" | "line" | "block";

/**
 * Blank out comments, string literals and quoted identifiers, keeping the text
 * length and line breaks. What remains is the SQL a parser would see as code.
 */
export function maskNonCode(text: string): string {
  let state: ScanState = "code";
  let masked = "";

  for (let i = 0; i < text.length; i++) {
    const ch = text.charAt(i);
    const next = text.charAt(i + 1);

    switch (state) {
      case "code":
        if (ch === "'" || ch === '"' || ch === "`") {
          // quotes stay visible, their contents do not
          state = ch === "'" ? "single" : ch === '"' ? "double" : "backtick";
          masked += ch;
          continue;
        }
        if (ch === "-" && next === "-") state = "line";
        else if (ch === "/" && next === "*") {
          masked += "  ";
          i++;
          state = "block";
          continue;
        } else {
          masked += ch;
          continue;
        }
        break;
      case "single":
      case "double": {
        const quote = state === "single" ? "'" : '"';
        if (ch === quote) {
          if (next === quote) {
            // doubled quote is an escaped quote
            masked += "  ";
            i++;
            continue;
          }
          state = "code";
          masked += ch;
          continue;
        }
        break;
      }
      case "backtick":
        if (ch === "`") {
          state = "code";
          masked += ch;
          continue;
        }
        break;
      case "line":
        if (ch === "\n") {
          state = "code";
          masked += ch;
          continue;
        }
        break;
      case "block":
        if (ch === "*" && next === "/") {
          masked += "  ";
          i++;
          state = "code";
          continue;
        }
        break;
    }

    masked += ch === "\n" ? "\n" : " ";
  }

  return masked;
}

/**
 * Split SQL text on top-level `;` terminators. Semicolons inside literals,
 * quoted identifiers and comments do not split. Like `String.split`, the result
 * always has one more piece than there are terminators and keeps empty pieces.
 */
export function splitStatements(text: string): string[] {
  const masked = maskNonCode(text);
  const pieces: string[] = [];
  let start = 0;

  for (let i = masked.indexOf(";"); i !== -1; i = masked.indexOf(";", i + 1)) {
    pieces.push(text.slice(start, i));
    start = i + 1;
  }
  pieces.push(text.slice(start));

  return pieces;
}

/** Whether `keyword` appears as a whole word in the code part of `sql` */
export function containsKeyword(sql: string, keyword: string): boolean {
  const pattern = new RegExp(`\\b${keyword}\\b`, "i");
  return pattern.test(maskNonCode(sql));
}

/** Whether the piece holds anything besides comments and whitespace */
export function hasCode(sql: string): boolean {
  return maskNonCode(sql).trim().length > 0;
}

/**
 * The statement an engine should run for a query unit: the first piece with
 * code in it, without its terminator.
 */
export function executableStatement(body: string): string {
  const statement = splitStatements(body).find(hasCode);
  if (statement === undefined) {
    throw new MalformedStreamError(`Query block has no SQL statement:\n${body}`);
  }
  return statement.trim();
}
