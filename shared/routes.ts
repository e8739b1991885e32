import { z } from "zod";

export const errorSchema = z.object({
  code: z.string(),
  message: z.string(),
  requestId: z.string(),
  details: z.union([z.record(z.unknown()), z.string()]).optional(),
});

const languageSchema = z
  .string()
  .trim()
  .regex(/^[A-Za-z]{2,3}([-_][A-Za-z0-9]{2,8})*$/, "language must be a language code such as en or en-US");

export const scoreRequestSchema = z.object({
  title: z.string({ required_error: "title is required" }),
  audio: z.string().optional(),
  language: languageSchema,
});

export const transcriptWordSchema = z
  .object({
    text: z.string(),
    start: z.number().nonnegative(),
    end: z.number().nonnegative(),
  })
  .refine((word) => word.end >= word.start, {
    message: "end must not be before start",
    path: ["end"],
  });

export const scoreTranscriptRequestSchema = z.object({
  title: z.string({ required_error: "title is required" }),
  transcript: z.string(),
  language: languageSchema,
  words: z.array(transcriptWordSchema).optional(),
  durationSec: z.number().positive().optional(),
});

export const scoreResponseSchema = z.object({
  real_transcript: z.string(),
  ipa_transcript: z.string(),
  pronunciation_accuracy: z.string(),
  real_transcripts: z.string(),
  matched_transcripts: z.string(),
  real_transcripts_ipa: z.string(),
  matched_transcripts_ipa: z.string(),
  pair_accuracy_category: z.string(),
  start_time: z.string(),
  end_time: z.string(),
  is_letter_correct_all_words: z.string(),
});

export type ErrorBody = z.infer<typeof errorSchema>;
export type ScoreRequest = z.infer<typeof scoreRequestSchema>;
export type ScoreTranscriptRequest = z.infer<typeof scoreTranscriptRequestSchema>;
export type ScoreResponse = z.infer<typeof scoreResponseSchema>;

export const api = {
  score: {
    create: {
      method: "POST" as const,
      path: "/api/score",
      input: scoreRequestSchema,
      responses: {
        200: scoreResponseSchema,
        400: errorSchema,
        422: errorSchema,
        503: errorSchema,
      },
    },
    fromTranscript: {
      method: "POST" as const,
      path: "/api/score/transcript",
      input: scoreTranscriptRequestSchema,
      responses: {
        200: scoreResponseSchema,
        400: errorSchema,
        422: errorSchema,
      },
    },
  },
  languages: {
    list: {
      method: "GET" as const,
      path: "/api/languages",
      responses: {
        200: z.object({
          languages: z.array(z.string()),
          ready: z.array(z.string()),
        }),
      },
    },
  },
};
