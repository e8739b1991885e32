import "dotenv/config";
import { appConfig } from "../server/config";
import { toScoreResponse } from "../server/lib/scoreResponse";
import { OrthographicTranscriber } from "../server/providers/phonetic";
import { PronunciationTrainer } from "../server/trainer";
import { createTranscriptionProvider } from "../server/trainerCache";

const samples = [
  { reference: "Hello from the other side", spoken: "hello from the other side" },
  { reference: "Hello from the other side", spoken: "hello from the far side" },
  { reference: "The quick brown fox", spoken: "the quick fox jumps" },
  { reference: "Good morning", spoken: "" },
];

const language = appConfig.languages[0] ?? "en";
const trainer = new PronunciationTrainer(
  language,
  createTranscriptionProvider(appConfig),
  new OrthographicTranscriber(appConfig.languages),
  { thresholds: appConfig.scoring.thresholds, gapCost: appConfig.scoring.gapCost }
);

for (const sample of samples) {
  const result = await trainer.scoreTranscript(sample.reference, { text: sample.spoken }, 2);
  console.log(JSON.stringify({ ...sample, ...toScoreResponse(result) }, null, 2));
}
