import { describe, it, expect } from "vitest";
import { chunkPcm16, durationMs, extensionFor, isSupportedExtension, normalizeExtension } from "./audio";

describe("extensions", () => {
  it("normalizes case and leading dots", () => {
    expect(normalizeExtension(" .MP3 ")).toBe("mp3");
    expect(normalizeExtension("..wav")).toBe("wav");
  });

  it("accepts the supported containers only", () => {
    expect(isSupportedExtension(".WAV")).toBe(true);
    expect(isSupportedExtension("opus")).toBe(true);
    expect(isSupportedExtension("txt")).toBe(false);
    expect(isSupportedExtension("")).toBe(false);
  });

  it("prefers the filename and falls back to the MIME type", () => {
    expect(extensionFor("Talk.MP3", "audio/wav")).toBe("mp3");
    expect(extensionFor("recording", "audio/mpeg")).toBe("mp3");
    expect(extensionFor(undefined, "audio/x-wav")).toBe("wav");
    expect(extensionFor("notes.xyz", "audio/mpeg")).toBe("xyz");
    expect(extensionFor(undefined, "application/octet-stream")).toBe("");
    expect(extensionFor(undefined, undefined)).toBe("");
  });
});

describe("pcm helpers", () => {
  it("chunks without dropping the tail", () => {
    expect(chunkPcm16(Buffer.alloc(10), 4).map((c) => c.length)).toEqual([4, 4, 2]);
    expect(chunkPcm16(Buffer.alloc(0), 4)).toEqual([]);
  });

  it("computes duration from sample count", () => {
    expect(durationMs({ pcm16: Buffer.alloc(32_000), sampleRate: 16_000 })).toBe(1000);
    expect(durationMs({ pcm16: Buffer.alloc(8_000), sampleRate: 8_000 })).toBe(500);
  });
});
