import { describe, expect, it } from "vitest";
import { buildWav } from "../__tests__/fakes";
import { decodeAudio, decodeBase64Audio, fileExtension, readWavInfo, sniffFormat } from "./audio";
import { AudioDecodeError } from "./errors";

describe("decodeAudio", () => {
  it("frames a WAV buffer with its rate and length", () => {
    const clip = decodeAudio(buildWav(16_000));
    expect(clip).toMatchObject({
      format: "wav",
      mimeType: "audio/wav",
      sampleRate: 16_000,
      channels: 1,
      durationSec: 1,
    });
  });

  it("accepts base64 and data URLs", () => {
    const wav = buildWav(8_000);
    expect(decodeAudio(wav.toString("base64")).durationSec).toBe(0.5);
    expect(decodeAudio(`data:audio/wav;base64,${wav.toString("base64")}`).data.equals(wav)).toBe(
      true
    );
  });

  it("rejects payloads that are not audio", () => {
    expect(() => decodeAudio(Buffer.from("hello world"))).toThrow(AudioDecodeError);
    expect(() => decodeAudio(Buffer.alloc(0))).toThrow("Audio payload is empty");
  });

  it("rejects a WAV with no samples", () => {
    expect(() => readWavInfo(buildWav(0))).toThrow("WAV payload contains no samples");
  });
});

describe("decodeBase64Audio", () => {
  it("rejects blank and malformed input", () => {
    expect(() => decodeBase64Audio("   ")).toThrow("Audio payload is empty");
    expect(() => decodeBase64Audio("!!")).toThrow("Audio payload is not valid base64");
  });
});

describe("sniffFormat", () => {
  it("identifies common containers", () => {
    expect(sniffFormat(Buffer.from("OggS\0\0\0\0", "latin1"))).toBe("ogg");
    expect(sniffFormat(Buffer.from("ID3\u0004\0\0", "latin1"))).toBe("mp3");
    expect(sniffFormat(Buffer.from("fLaC\0\0\0\0", "latin1"))).toBe("flac");
    expect(sniffFormat(Buffer.from([0x1a, 0x45, 0xdf, 0xa3, 0x01]))).toBe("webm");
    expect(sniffFormat(Buffer.from("abc"))).toBeNull();
  });

  it("maps mp4 audio to the m4a extension", () => {
    expect(fileExtension("mp4")).toBe("m4a");
    expect(fileExtension("wav")).toBe("wav");
  });
});
