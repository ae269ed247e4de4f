export function normalizeText(s: string): string {
    return s
      .replace(/\r\n/g, "\n")
      .replace(/\t/g, "  ")
      .replace(/[ \u00A0]+/g, " ")
      .replace(/\n{3,}/g, "\n\n")
      .trim();
  }

/** Collapses all whitespace (newlines included) into single spaces. */
export function squashWhitespace(s: string): string {
    return s.replace(/\s+/g, " ").trim();
}

export function truncate(s: string, maxChars: number): string {
    return s.length > maxChars ? `${s.slice(0, maxChars)}...` : s;
}

/** Lower-cased, punctuation-free word tokens. */
export function tokenize(s: string): string[] {
    return s.toLowerCase().split(/[^\p{L}\p{N}']+/u).filter(Boolean);
}
