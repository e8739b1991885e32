import { AudioDecodeError } from "./errors";

export type AudioFormat = "wav" | "webm" | "ogg" | "mp3" | "flac" | "mp4";

export type AudioClip = {
  data: Buffer;
  format: AudioFormat;
  mimeType: string;
  sampleRate?: number;
  channels?: number;
  durationSec?: number;
};

const mimeTypes: Record<AudioFormat, string> = {
  wav: "audio/wav",
  webm: "audio/webm",
  ogg: "audio/ogg",
  mp3: "audio/mpeg",
  flac: "audio/flac",
  mp4: "audio/mp4",
};

export const fileExtension = (format: AudioFormat): string =>
  format === "mp4" ? "m4a" : format;

const dataUrlPrefix = /^data:[^;,]*(;[^,]*)?,/i;
const base64Body = /^[A-Za-z0-9+/_-]*={0,2}$/;

export const sniffFormat = (content: Buffer): AudioFormat | null => {
  if (content.length < 4) return null;
  const head = content.subarray(0, 12);
  const ascii = (start: number, end: number) => head.subarray(start, end).toString("latin1");

  if (ascii(0, 4) === "RIFF" && ascii(8, 12) === "WAVE") return "wav";
  if (head[0] === 0x1a && head[1] === 0x45 && head[2] === 0xdf && head[3] === 0xa3) return "webm";
  if (ascii(0, 4) === "OggS") return "ogg";
  if (ascii(0, 4) === "fLaC") return "flac";
  if (ascii(0, 3) === "ID3") return "mp3";
  if (head[0] === 0xff && (head[1] & 0xe0) === 0xe0) return "mp3";
  if (ascii(4, 8) === "ftyp") return "mp4";
  return null;
};

type WavInfo = {
  sampleRate: number;
  channels: number;
  durationSec: number;
};

/**
 * Walks the RIFF chunks for `fmt ` and `data`. A data chunk that claims
 * more bytes than are present (streamed recorders write 0 or 0xffffffff)
 * is measured by what actually follows its header.
 */
export function readWavInfo(content: Buffer): WavInfo {
  let offset = 12;
  let sampleRate = 0;
  let channels = 0;
  let byteRate = 0;
  let dataBytes: number | null = null;

  while (offset + 8 <= content.length) {
    const id = content.subarray(offset, offset + 4).toString("latin1");
    const size = content.readUInt32LE(offset + 4);
    const body = offset + 8;

    if (id === "fmt ") {
      if (size < 16 || body + 16 > content.length) {
        throw new AudioDecodeError("WAV fmt chunk is truncated");
      }
      channels = content.readUInt16LE(body + 2);
      sampleRate = content.readUInt32LE(body + 4);
      byteRate = content.readUInt32LE(body + 8);
    } else if (id === "data") {
      const available = content.length - body;
      dataBytes = size === 0 || size > available ? available : size;
      break;
    }

    offset = body + size + (size % 2);
  }

  if (!sampleRate || !channels || !byteRate) {
    throw new AudioDecodeError("WAV payload has no usable fmt chunk");
  }
  if (dataBytes === null) {
    throw new AudioDecodeError("WAV payload has no data chunk");
  }
  if (dataBytes === 0) {
    throw new AudioDecodeError("WAV payload contains no samples");
  }

  return { sampleRate, channels, durationSec: dataBytes / byteRate };
}

export function decodeBase64Audio(payload: string): Buffer {
  const body = payload.trim().replace(dataUrlPrefix, "").replace(/\s+/g, "");
  if (!body) {
    throw new AudioDecodeError("Audio payload is empty");
  }
  if (!base64Body.test(body)) {
    throw new AudioDecodeError("Audio payload is not valid base64");
  }
  return Buffer.from(body, body.includes("-") || body.includes("_") ? "base64url" : "base64");
}

/**
 * Frames an encoded clip for the transcription provider. The container is
 * identified from its magic bytes; WAV clips also report rate and length.
 */
export function decodeAudio(input: Buffer | string): AudioClip {
  const data = typeof input === "string" ? decodeBase64Audio(input) : input;
  if (data.length === 0) {
    throw new AudioDecodeError("Audio payload is empty");
  }

  const format = sniffFormat(data);
  if (!format) {
    throw new AudioDecodeError("Audio payload is not a recognized audio container");
  }

  const clip: AudioClip = { data, format, mimeType: mimeTypes[format] };
  if (format === "wav") {
    return { ...clip, ...readWavInfo(data) };
  }
  return clip;
}
