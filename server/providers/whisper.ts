import OpenAI, { toFile } from "openai";
import { z } from "zod";
import { fileExtension, type AudioClip } from "../lib/audio";
import { TranscriptionProviderError } from "../lib/errors";
import { normalizeLanguage } from "../lib/normalize";
import { AbortedError } from "../lib/retry";
import {
  toProviderError,
  type TranscribeOptions,
  type Transcript,
  type TranscriptionProvider,
} from "./transcription";

const verboseTranscriptionSchema = z.object({
  text: z.string().default(""),
  duration: z.number().optional(),
  words: z
    .array(
      z.object({
        word: z.string(),
        start: z.number(),
        end: z.number(),
      })
    )
    .optional(),
});

export type WhisperProviderOptions = {
  apiKey?: string;
  baseURL?: string;
  model: string;
  timeoutMs: number;
};

/**
 * OpenAI-compatible `/audio/transcriptions` with word timestamps
 * (`verbose_json`). Works against any base URL that speaks that API.
 */
export class WhisperTranscriptionProvider implements TranscriptionProvider {
  readonly name = "whisper";
  private client: OpenAI | null = null;

  constructor(private readonly options: WhisperProviderOptions) {}

  private getClient(): OpenAI {
    if (this.client) return this.client;
    if (!this.options.apiKey) {
      throw new TranscriptionProviderError(this.name, "auth", "WHISPER_API_KEY is not set");
    }
    this.client = new OpenAI({
      apiKey: this.options.apiKey,
      baseURL: this.options.baseURL,
      timeout: this.options.timeoutMs,
      maxRetries: 0,
    });
    return this.client;
  }

  async transcribe(
    clip: AudioClip,
    language: string,
    options: TranscribeOptions = {}
  ): Promise<Transcript> {
    try {
      const client = this.getClient();
      const file = await toFile(clip.data, `audio.${fileExtension(clip.format)}`, {
        type: clip.mimeType,
      });
      const response: unknown = await client.audio.transcriptions.create(
        {
          file,
          model: this.options.model,
          language: normalizeLanguage(language),
          response_format: "verbose_json",
          timestamp_granularities: ["word"],
        },
        { signal: options.signal }
      );

      const parsed = verboseTranscriptionSchema.safeParse(response);
      if (!parsed.success) {
        throw new TranscriptionProviderError(
          this.name,
          "provider",
          "Unexpected transcription response shape"
        );
      }

      const words = (parsed.data.words ?? [])
        .map((word) => ({ text: word.word.trim(), start: word.start, end: word.end }))
        .filter((word) => word.text.length > 0);

      return {
        text: parsed.data.text.trim(),
        ...(words.length ? { words } : {}),
        ...(parsed.data.duration !== undefined ? { durationSec: parsed.data.duration } : {}),
      };
    } catch (err) {
      if (options.signal?.aborted) throw new AbortedError();
      throw toProviderError(this.name, err);
    }
  }
}
