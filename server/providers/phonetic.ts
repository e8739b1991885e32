import { PhonemizationError } from "../lib/errors";
import { normalizeLanguage, tokenize } from "../lib/normalize";

export interface PhoneticTranscriber {
  readonly name: string;
  supports(language: string): boolean;
  /** Loads whatever the backend needs for `language` ahead of the first request. */
  prepare(language: string): Promise<void>;
  toIPA(text: string, language: string): Promise<string>;
}

export type PhoneticBackend = "espeak" | "orthographic";

const espeakVoices: Record<string, string> = {
  en: "en-us",
  de: "de",
  fr: "fr-fr",
  es: "es",
  it: "it",
  nl: "nl",
  pt: "pt-br",
};

/**
 * IPA from the espeak-ng phonemizer compiled to WebAssembly. The module is
 * loaded on first use.
 */
export class EspeakPhoneticTranscriber implements PhoneticTranscriber {
  readonly name = "espeak";

  constructor(private readonly languages: readonly string[]) {}

  supports(language: string): boolean {
    const base = normalizeLanguage(language);
    return this.languages.includes(base) && base in espeakVoices;
  }

  async prepare(language: string): Promise<void> {
    await this.toIPA("a", language);
  }

  async toIPA(text: string, language: string): Promise<string> {
    const base = normalizeLanguage(language);
    const voice = this.supports(base) ? espeakVoices[base] : undefined;
    if (!voice) throw new PhonemizationError(base);

    let phones: string[];
    try {
      const { phonemize } = await import("phonemizer");
      phones = await phonemize(text, voice);
    } catch (err) {
      throw new PhonemizationError(
        base,
        `Phonemizer failed for "${text}": ${err instanceof Error ? err.message : String(err)}`
      );
    }
    const ipa = phones.join(" ").trim();
    if (!ipa) {
      throw new PhonemizationError(base, `No phonemes produced for "${text}"`);
    }
    return ipa;
  }
}

/**
 * Spelling stands in for pronunciation: the normalized letters of each
 * word. Scores then measure letter-level edit distance.
 */
export class OrthographicTranscriber implements PhoneticTranscriber {
  readonly name = "orthographic";

  constructor(private readonly languages: readonly string[]) {}

  supports(language: string): boolean {
    return this.languages.includes(normalizeLanguage(language));
  }

  async prepare(language: string): Promise<void> {
    if (!this.supports(language)) throw new PhonemizationError(normalizeLanguage(language));
  }

  async toIPA(text: string, language: string): Promise<string> {
    if (!this.supports(language)) throw new PhonemizationError(normalizeLanguage(language));
    return tokenize(text, language)
      .map((token) => token.normalized)
      .join(" ");
  }
}

export const createPhoneticTranscriber = (
  backend: PhoneticBackend,
  languages: readonly string[]
): PhoneticTranscriber =>
  backend === "orthographic"
    ? new OrthographicTranscriber(languages)
    : new EspeakPhoneticTranscriber(languages);
