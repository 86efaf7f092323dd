/**
 * whitespace.ts
 * Line and whitespace helpers shared by the notebook and percent-script codecs.
 *
 * Line boundaries are the "universal newline" set: `\r\n`, `\r`, `\n`, plus
 * `\v`, `\f`, the file/group/record separators (`\x1c`–`\x1e`), NEL (`\x85`)
 * and the Unicode line/paragraph separators.
 */

const LINE_BREAK = /\r\n|[\n\v\f\r\x1c-\x1e\x85\u2028\u2029]/g;

// whitespace as understood when trimming cell text: \s plus the C0 separators
// and NEL, minus the byte-order mark
const SPACE =
  /[\t\n\v\f\r \x1c-\x1f\x85\xa0\u1680\u2000-\u200a\u2028\u2029\u202f\u205f\u3000]/;

/**
 * Split `text` into lines. A terminating line break does not yield a trailing
 * empty line and the empty string yields no lines at all.
 */
export function splitLines(
  text: string,
  opts?: { keepEnds?: boolean },
): string[] {
  const lines: string[] = [];
  const re = new RegExp(LINE_BREAK.source, "g");
  let start = 0;
  let m: RegExpExecArray | null;
  while ((m = re.exec(text)) !== null) {
    const end = m.index + m[0].length;
    lines.push(text.slice(start, opts?.keepEnds ? end : m.index));
    start = end;
  }
  if (start < text.length) lines.push(text.slice(start));
  return lines;
}

export function isBlank(line: string): boolean {
  for (let i = 0; i < line.length; i++) {
    if (!SPACE.test(line.charAt(i))) return false;
  }
  return true;
}

/** Remove whitespace (including blank lines) from the end of `text` only. */
export function trimTrailing(text: string): string {
  let end = text.length;
  while (end > 0 && SPACE.test(text.charAt(end - 1))) end--;
  return text.slice(0, end);
}

/** Remove whitespace from the start of `text` only. */
export function trimLeading(text: string): string {
  let start = 0;
  while (start < text.length && SPACE.test(text.charAt(start))) start++;
  return text.slice(start);
}
