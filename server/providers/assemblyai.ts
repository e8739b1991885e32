import { AssemblyAI, type Transcript as AssemblyTranscript } from "assemblyai";
import type { AudioClip } from "../lib/audio";
import { TranscriptionProviderError } from "../lib/errors";
import { normalizeLanguage } from "../lib/normalize";
import { AbortedError, sleep } from "../lib/retry";
import {
  toProviderError,
  type TranscribeOptions,
  type Transcript,
  type TranscriptionProvider,
} from "./transcription";

export type AssemblyAIProviderOptions = {
  apiKey?: string;
  pollingIntervalMs?: number;
};

const MS_PER_SECOND = 1000;

export class AssemblyAITranscriptionProvider implements TranscriptionProvider {
  readonly name = "assemblyai";
  private client: AssemblyAI | null = null;

  constructor(private readonly options: AssemblyAIProviderOptions) {}

  private getClient(): AssemblyAI {
    if (this.client) return this.client;
    if (!this.options.apiKey) {
      throw new TranscriptionProviderError(this.name, "auth", "ASSEMBLYAI_API_KEY is not set");
    }
    this.client = new AssemblyAI({ apiKey: this.options.apiKey });
    return this.client;
  }

  /**
   * Submits the clip and polls until the job settles. Polling stops as
   * soon as `signal` aborts.
   */
  private async waitUntilSettled(
    client: AssemblyAI,
    id: string,
    signal?: AbortSignal
  ): Promise<AssemblyTranscript> {
    const interval = this.options.pollingIntervalMs ?? 1000;
    // eslint-disable-next-line no-constant-condition
    while (true) {
      await sleep(interval, signal);
      const current = await client.transcripts.get(id);
      if (current.status === "completed" || current.status === "error") {
        return current;
      }
    }
  }

  async transcribe(
    clip: AudioClip,
    language: string,
    options: TranscribeOptions = {}
  ): Promise<Transcript> {
    try {
      const client = this.getClient();
      const submitted = await client.transcripts.submit({
        audio: clip.data,
        language_code: normalizeLanguage(language),
        punctuate: true,
        format_text: true,
      });
      const completed =
        submitted.status === "completed" || submitted.status === "error"
          ? submitted
          : await this.waitUntilSettled(client, submitted.id, options.signal);

      if (completed.status === "error") {
        throw new Error(completed.error ?? "Transcription failed");
      }

      const words = (completed.words ?? [])
        .map((word) => ({
          text: word.text.trim(),
          start: word.start / MS_PER_SECOND,
          end: word.end / MS_PER_SECOND,
        }))
        .filter((word) => word.text.length > 0);

      return {
        text: (completed.text ?? "").trim(),
        ...(words.length ? { words } : {}),
        ...(typeof completed.audio_duration === "number"
          ? { durationSec: completed.audio_duration }
          : {}),
      };
    } catch (err) {
      if (options.signal?.aborted) throw new AbortedError();
      throw toProviderError(this.name, err);
    }
  }
}
