import type { AppConfig } from "./config";
import { PhonemizationError } from "./lib/errors";
import { logEvent } from "./lib/logger";
import { normalizeLanguage } from "./lib/normalize";
import { AssemblyAITranscriptionProvider } from "./providers/assemblyai";
import { createPhoneticTranscriber, type PhoneticTranscriber } from "./providers/phonetic";
import type { TranscriptionProvider } from "./providers/transcription";
import { WhisperTranscriptionProvider } from "./providers/whisper";
import { PronunciationTrainer } from "./trainer";

export type TrainerFactory = (language: string) => Promise<PronunciationTrainer>;

export type TrainerCacheOptions = {
  languages: readonly string[];
  factory: TrainerFactory;
};

/**
 * Process-wide trainers keyed by base language code. The pending creation
 * is stored before it is awaited, so concurrent first requests for a
 * language share one creation. A failed creation is dropped and the next
 * request tries again.
 */
export class TrainerCache {
  private readonly trainers = new Map<string, Promise<PronunciationTrainer>>();
  private readonly ready = new Set<string>();
  private readonly languages: readonly string[];
  private readonly factory: TrainerFactory;

  constructor(options: TrainerCacheOptions) {
    this.languages = options.languages.map(normalizeLanguage);
    this.factory = options.factory;
  }

  supportedLanguages(): string[] {
    return [...this.languages];
  }

  readyLanguages(): string[] {
    return [...this.ready].sort();
  }

  getOrCreate(language: string): Promise<PronunciationTrainer> {
    const key = normalizeLanguage(language);
    if (!this.languages.includes(key)) {
      return Promise.reject(new PhonemizationError(key || language));
    }

    const existing = this.trainers.get(key);
    if (existing) return existing;

    const created = this.factory(key).then(
      (trainer) => {
        this.ready.add(key);
        logEvent("info", "trainer.created", { language: key });
        return trainer;
      },
      (err: unknown) => {
        this.trainers.delete(key);
        throw err;
      }
    );
    this.trainers.set(key, created);
    return created;
  }
}

export const createTranscriptionProvider = (config: AppConfig): TranscriptionProvider =>
  config.transcription.provider === "assemblyai"
    ? new AssemblyAITranscriptionProvider({ apiKey: config.transcription.assemblyai.apiKey })
    : new WhisperTranscriptionProvider({
        apiKey: config.transcription.whisper.apiKey,
        baseURL: config.transcription.whisper.baseURL,
        model: config.transcription.whisper.model,
        timeoutMs: config.transcription.timeoutMs,
      });

export type TrainerDependencies = {
  transcription?: TranscriptionProvider;
  phonetic?: PhoneticTranscriber;
};

/**
 * Wires the configured providers into a cache. Providers are shared by
 * every language; each trainer prepares the phonemizer for its language.
 */
export function createTrainerCache(
  config: AppConfig,
  dependencies: TrainerDependencies = {}
): TrainerCache {
  const transcription = dependencies.transcription ?? createTranscriptionProvider(config);
  const phonetic =
    dependencies.phonetic ?? createPhoneticTranscriber(config.phonetic.backend, config.languages);

  return new TrainerCache({
    languages: config.languages,
    factory: async (language) => {
      if (!phonetic.supports(language)) throw new PhonemizationError(language);
      await phonetic.prepare(language);
      return new PronunciationTrainer(language, transcription, phonetic, {
        thresholds: config.scoring.thresholds,
        gapCost: config.scoring.gapCost,
        timeoutMs: config.transcription.timeoutMs,
        retries: config.transcription.retries,
      });
    },
  });
}
