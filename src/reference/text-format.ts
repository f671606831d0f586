/**
 * Single-line text rendering of ranges for error messages
 *
 * Output follows the protobuf short text format used by existing genomics
 * tooling: `reference_name: "chr1" start: 10 end: 20`. Fields holding their
 * default value (empty string, zero) are omitted, so a range starting at 0
 * renders without `start`.
 *
 * @module reference/text-format
 */

import type { Range } from "../types";

const ESCAPES: Record<string, string> = {
  "\n": "\\n",
  "\r": "\\r",
  "\t": "\\t",
  '"': '\\"',
  "'": "\\'",
  "\\": "\\\\",
};

/**
 * C-escape a string field value and wrap it in double quotes
 *
 * Remaining control characters become 3-digit octal escapes (`\001`);
 * non-ASCII characters are kept as UTF-8.
 */
function quote(value: string): string {
  let escaped = "";
  for (const char of value) {
    const code = char.charCodeAt(0);
    escaped +=
      ESCAPES[char] ??
      (code < 0x20 || code === 0x7f ? `\\${code.toString(8).padStart(3, "0")}` : char);
  }
  return `"${escaped}"`;
}

/**
 * Render a range in protobuf short text format
 *
 * @example
 * ```typescript
 * formatRange({ referenceName: "chr1", start: 1, end: 3 });
 * // 'reference_name: "chr1" start: 1 end: 3'
 * formatRange({ referenceName: "chr1", start: 0, end: 4 });
 * // 'reference_name: "chr1" end: 4'
 * ```
 */
export function formatRange(range: Range): string {
  const fields: string[] = [];
  if (range.referenceName !== "") {
    fields.push(`reference_name: ${quote(range.referenceName)}`);
  }
  if (range.start !== 0) {
    fields.push(`start: ${range.start}`);
  }
  if (range.end !== 0) {
    fields.push(`end: ${range.end}`);
  }
  return fields.join(" ");
}
