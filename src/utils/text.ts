export const INDENT = '    ';

// Prefixes every non-empty line with one indent level. Applied bottom-up,
// so nested blocks pick up one level per parent.
export function indentLines(text: string, prefix: string = INDENT): string {
  return text
    .split('\n')
    .map((ln) => (ln.length > 0 ? prefix + ln : ln))
    .join('\n');
}

export function isBlank(line: string): boolean {
  return line.trim().length === 0;
}

// Plain codepoint order, independent of locale.
export function compareNames(a: string, b: string): number {
  if (a === b) return 0;
  return a < b ? -1 : 1;
}

const utf8 = new TextDecoder('utf-8', { fatal: true });

// Strict UTF-8; null when the bytes are not valid UTF-8.
export function decodeUtf8(bytes: Uint8Array): string | null {
  try {
    return utf8.decode(bytes);
  } catch {
    return null;
  }
}
