import type { ScoreResponse } from "@shared/routes";
import type { ScoringResult } from "../trainer";
import { categoryCodes } from "./scoring";

const MISSING = "-";

const formatTime = (seconds: number | null): string =>
  seconds === null ? MISSING : String(Math.round(seconds * 1000) / 1000);

/**
 * Flattens a scoring result into parallel space-separated lists, one entry
 * per reference word. Words that were never heard show "-".
 */
export function toScoreResponse(result: ScoringResult): ScoreResponse {
  const { words } = result;
  return {
    real_transcript: result.transcript,
    ipa_transcript: result.recognizedIpa,
    pronunciation_accuracy: String(Math.round(result.accuracy)),
    real_transcripts: words.map((word) => word.text).join(" "),
    matched_transcripts: words.map((word) => word.matchedText ?? MISSING).join(" "),
    real_transcripts_ipa: words.map((word) => word.ipa).join(" "),
    matched_transcripts_ipa: words.map((word) => word.matchedIpa ?? MISSING).join(" "),
    pair_accuracy_category: words.map((word) => categoryCodes[word.category]).join(" "),
    start_time: words.map((word) => formatTime(word.startTime)).join(" "),
    end_time: words.map((word) => formatTime(word.endTime)).join(" "),
    is_letter_correct_all_words: words
      .map((word) => word.letterCorrectness.map((correct) => (correct ? "1" : "0")).join(""))
      .join(" "),
  };
}
