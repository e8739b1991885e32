import { alignWords, type AlignmentPair, type TimedWord, type Word } from "./lib/alignment";
import type { AudioClip } from "./lib/audio";
import {
  DegenerateInputError,
  PhonemizationError,
  RequestCancelledError,
  TranscriptionProviderError,
} from "./lib/errors";
import { logEvent } from "./lib/logger";
import { normalizeLanguage, tokenize, type Token } from "./lib/normalize";
import { AbortedError, withRetry, withTimeout, TimeoutError } from "./lib/retry";
import {
  DEFAULT_THRESHOLDS,
  scoreAlignment,
  type CategoryThresholds,
  type WordScore,
} from "./lib/scoring";
import { estimateSpans, timingForReference, type TimeSpan } from "./lib/timing";
import type { PhoneticTranscriber } from "./providers/phonetic";
import type { Transcript, TranscriptionProvider } from "./providers/transcription";

export type ScoringResult = {
  language: string;
  transcript: string;
  referenceIpa: string;
  recognizedIpa: string;
  accuracy: number;
  words: WordScore[];
  alignment: AlignmentPair[];
};

export type TrainerOptions = {
  thresholds?: CategoryThresholds;
  gapCost?: number;
  timeoutMs?: number;
  retries?: number;
  retryDelayMs?: number;
};

export type ProcessAudioInput = {
  referenceText: string;
  clip: AudioClip;
};

export type ProcessAudioOptions = {
  signal?: AbortSignal;
  timeoutMs?: number;
};

const DEFAULT_TIMEOUT_MS = 30_000;

type IpaResolver = (normalized: string) => Promise<string>;

/**
 * Scores one language. Holds no per-request state, so one instance serves
 * concurrent requests.
 */
export class PronunciationTrainer {
  readonly language: string;

  constructor(
    language: string,
    private readonly transcription: TranscriptionProvider,
    private readonly phonetic: PhoneticTranscriber,
    private readonly options: TrainerOptions = {}
  ) {
    this.language = normalizeLanguage(language);
  }

  /**
   * Per-request IPA lookup: one call per distinct word. A word the
   * phonemizer rejects is represented by its own spelling.
   */
  private createIpaResolver(): IpaResolver {
    const memo = new Map<string, Promise<string>>();
    return (normalized) => {
      const cached = memo.get(normalized);
      if (cached) return cached;
      const pending = this.phonetic.toIPA(normalized, this.language).catch((err: unknown) => {
        if (!(err instanceof PhonemizationError)) throw err;
        logEvent("warn", "phonemize.fallback", {
          language: this.language,
          word: normalized,
          message: err.message,
        });
        return normalized;
      });
      memo.set(normalized, pending);
      return pending;
    };
  }

  private async resolveWords(tokens: readonly Token[], resolve: IpaResolver): Promise<Word[]> {
    return Promise.all(
      tokens.map(async (token, index) => ({
        text: token.text,
        normalized: token.normalized,
        ipa: await resolve(token.normalized),
        index,
      }))
    );
  }

  private recognizedTokens(transcript: Transcript): Array<Token & { span: TimeSpan | null }> {
    if (transcript.words?.length) {
      return transcript.words.flatMap((word) =>
        tokenize(word.text, this.language).map((token) => ({
          ...token,
          span: { start: word.start, end: word.end },
        }))
      );
    }
    return tokenize(transcript.text, this.language).map((token) => ({ ...token, span: null }));
  }

  private referenceTokens(referenceText: string): Token[] {
    const tokens = tokenize(referenceText, this.language);
    if (tokens.length === 0) throw new DegenerateInputError();
    return tokens;
  }

  /**
   * Scores a transcript that is already in hand. `durationSec` is used to
   * estimate word timing when the transcript carries none.
   */
  async scoreTranscript(
    referenceText: string,
    transcript: Transcript,
    durationSec?: number
  ): Promise<ScoringResult> {
    const referenceTokens = this.referenceTokens(referenceText);
    const recognizedTokens = this.recognizedTokens(transcript);
    const resolve = this.createIpaResolver();

    const reference = await this.resolveWords(referenceTokens, resolve);
    const recognizedWords = await this.resolveWords(recognizedTokens, resolve);
    const recognized: TimedWord[] = recognizedWords.map((word, index) => {
      const span = recognizedTokens[index].span;
      return span ? { ...word, start: span.start, end: span.end } : word;
    });

    const alignment = alignWords(reference, recognized, { gapCost: this.options.gapCost });
    const scored = scoreAlignment(
      reference,
      recognized,
      alignment,
      this.options.thresholds ?? DEFAULT_THRESHOLDS
    );

    const knownDuration = transcript.durationSec ?? durationSec;
    const spans: Array<TimeSpan | null> = recognizedTokens.some((token) => token.span)
      ? recognizedTokens.map((token) => token.span)
      : estimateSpans(
          recognizedTokens.map((token) => token.normalized),
          knownDuration ?? 0
        );
    const timings = timingForReference(alignment, reference.length, spans);

    const words = scored.words.map((score, index) => ({ ...score, ...timings[index] }));

    return {
      language: this.language,
      transcript: transcript.text,
      referenceIpa: reference.map((word) => word.ipa).join(" "),
      recognizedIpa: recognized.map((word) => word.ipa).join(" "),
      accuracy: scored.accuracy,
      words,
      alignment,
    };
  }

  private async transcribe(clip: AudioClip, options: ProcessAudioOptions): Promise<Transcript> {
    const timeoutMs = options.timeoutMs ?? this.options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    try {
      return await withRetry(
        () =>
          withTimeout(
            (signal) => this.transcription.transcribe(clip, this.language, { signal }),
            timeoutMs,
            `Transcription timed out after ${timeoutMs}ms`,
            options.signal
          ),
        {
          retries: this.options.retries ?? 1,
          delayMs: this.options.retryDelayMs,
          isRetryable: (err) => err instanceof TranscriptionProviderError && err.retryable,
          signal: options.signal,
        }
      );
    } catch (err) {
      if (err instanceof AbortedError || options.signal?.aborted) {
        throw new RequestCancelledError();
      }
      if (err instanceof TimeoutError) {
        throw new TranscriptionProviderError(this.transcription.name, "timeout", err.message);
      }
      if (err instanceof TranscriptionProviderError) {
        logEvent("warn", "transcription.failed", {
          provider: err.provider,
          reason: err.reason,
          message: err.message,
        });
      }
      throw err;
    }
  }

  /**
   * Transcribes the clip and scores it against `referenceText`. An empty
   * reference fails before the provider is called; an empty transcript
   * scores every word as missed.
   */
  async processAudio(
    input: ProcessAudioInput,
    options: ProcessAudioOptions = {}
  ): Promise<ScoringResult> {
    this.referenceTokens(input.referenceText);

    const transcript = await this.transcribe(input.clip, options);
    if (options.signal?.aborted) throw new RequestCancelledError();

    const result = await this.scoreTranscript(
      input.referenceText,
      transcript,
      input.clip.durationSec
    );
    logEvent("info", "score.completed", {
      language: this.language,
      provider: this.transcription.name,
      referenceWords: result.words.length,
      recognizedWords: result.alignment.filter((pair) => pair.recIndex !== null).length,
      accuracy: Math.round(result.accuracy),
    });
    return result;
  }
}
