const TOKEN_PATTERN = /[\p{L}\p{N}_]{2,}/gu;

/** Lowercased runs of two or more word characters. */
export function tokenize(text: string): string[] {
  return text.toLowerCase().match(TOKEN_PATTERN) ?? [];
}
