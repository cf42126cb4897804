/**
 * Percent-escaping for free-text record fields, so that field and frame
 * delimiters can appear inside `info`, `track`, `datum` and frame names.
 */

const ESCAPES: ReadonlyArray<readonly [string, string]> = [
  ['%', '%25'],
  [',', '%2C'],
  ['#', '%23'],
  [';', '%3B'],
  ['\n', '%0A'],
  ['\r', '%0D'],
];

const DECODE_TABLE = new Map(ESCAPES.map(([raw, code]) => [code, raw]));

const NEEDS_ESCAPE = /[%,#;\n\r]/;

export function escapeField(value: string): string {
  if (!NEEDS_ESCAPE.test(value)) {
    return value;
  }
  let out = '';
  for (const ch of value) {
    const hit = ESCAPES.find(([raw]) => raw === ch);
    out += hit ? hit[1] : ch;
  }
  return out;
}

/**
 * Reverse of {@link escapeField}. Returns null when the value holds a `%`
 * that does not start a known escape.
 */
export function unescapeField(value: string): string | null {
  if (!value.includes('%')) {
    return value;
  }
  let out = '';
  for (let i = 0; i < value.length; i++) {
    const ch = value[i];
    if (ch !== '%') {
      out += ch;
      continue;
    }
    const raw = DECODE_TABLE.get(value.slice(i, i + 3).toUpperCase());
    if (raw === undefined) {
      return null;
    }
    out += raw;
    i += 2;
  }
  return out;
}
