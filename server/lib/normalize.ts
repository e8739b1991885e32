export type Token = {
  text: string;
  normalized: string;
};

const nonWordChars = /[^\p{L}\p{M}\p{N}'’]+/gu;
const edgeApostrophes = /^['’]+|['’]+$/g;

export function normalizeLanguage(language: string): string {
  return language.trim().toLowerCase().split(/[-_]/)[0] ?? "";
}

export function normalizeToken(token: string, language = "en"): string {
  return token
    .normalize("NFC")
    .toLocaleLowerCase(normalizeLanguage(language) || undefined)
    .replace(nonWordChars, "")
    .replace(edgeApostrophes, "")
    .replace(/’/g, "'");
}

/**
 * Splits text on whitespace. Display text keeps its punctuation; tokens
 * with nothing left after normalization (a lone dash, an ellipsis) are dropped.
 */
export function tokenize(text: string, language = "en"): Token[] {
  return text
    .split(/\s+/)
    .filter((raw) => raw.length > 0)
    .map((raw) => ({ text: raw, normalized: normalizeToken(raw, language) }))
    .filter((token) => token.normalized.length > 0);
}
