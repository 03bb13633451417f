const WORD = /^[a-zA-Z]+$/;

/**
 * Split text into tokens on literal spaces, one line at a time.
 * Punctuation stays attached to its token.
 */
export function tokenize(text: string): string[] {
  const tokens: string[] = [];
  for (const line of text.split(/\r?\n/)) {
    for (const token of line.split(" ")) {
      if (token.length > 0) tokens.push(token);
    }
  }
  return tokens;
}

/** Only plain ASCII letters count as a word; "3rd", "well-known" and "end." do not. */
export function isWord(token: string): boolean {
  return WORD.test(token);
}
