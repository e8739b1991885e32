import "dotenv/config";
import fs from "fs";
import { appConfig } from "../server/config";
import { decodeAudio } from "../server/lib/audio";
import { ApiError } from "../server/lib/http";
import { toScoreResponse } from "../server/lib/scoreResponse";
import { createTrainerCache } from "../server/trainerCache";

const usage = "Usage: npm run score:file -- <audio-file> <reference text> [language]";

const [audioPath, referenceText, language = appConfig.languages[0] ?? "en"] = process.argv.slice(2);

if (!audioPath || !referenceText) {
  console.error(usage);
  process.exit(1);
}

if (!fs.existsSync(audioPath)) {
  console.error(`Audio file not found: ${audioPath}`);
  process.exit(1);
}

try {
  const clip = decodeAudio(fs.readFileSync(audioPath));
  const trainer = await createTrainerCache(appConfig).getOrCreate(language);
  const result = await trainer.processAudio({ referenceText, clip });
  console.log(JSON.stringify(toScoreResponse(result), null, 2));
} catch (err) {
  if (err instanceof ApiError) {
    console.error(`${err.code}: ${err.message}`);
  } else {
    console.error(err instanceof Error ? err.stack ?? err.message : String(err));
  }
  process.exit(1);
}
