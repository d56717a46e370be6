import path from "node:path";

/** Signed 16-bit little-endian mono PCM, the format the recognizer receives. */
export interface CanonicalAudio {
  pcm16: Buffer;
  sampleRate: number;
}

export const SUPPORTED_EXTENSIONS = [
  "wav",
  "mp3",
  "m4a",
  "aac",
  "flac",
  "ogg",
  "wma",
  "amr",
  "3gp",
  "opus",
  "webm",
  "mp4",
] as const;

export type SupportedExtension = (typeof SUPPORTED_EXTENSIONS)[number];

export const normalizeExtension = (ext: string): string => ext.trim().replace(/^\.+/, "").toLowerCase();

export const isSupportedExtension = (ext: string): ext is SupportedExtension => {
  const normalized = normalizeExtension(ext);
  return SUPPORTED_EXTENSIONS.some((e) => e === normalized);
};

const extensionByMime: Record<string, SupportedExtension> = {
  "audio/wav": "wav",
  "audio/x-wav": "wav",
  "audio/wave": "wav",
  "audio/mpeg": "mp3",
  "audio/mp3": "mp3",
  "audio/mp4": "m4a",
  "audio/x-m4a": "m4a",
  "audio/aac": "aac",
  "audio/flac": "flac",
  "audio/ogg": "ogg",
  "audio/opus": "opus",
  "audio/webm": "webm",
  "audio/amr": "amr",
  "audio/3gpp": "3gp",
  "video/mp4": "mp4",
};

/** Picks the container extension from the filename, falling back to the MIME type. */
export const extensionFor = (filename: string | undefined, mimeType: string | undefined): string => {
  const fromName = filename ? normalizeExtension(path.extname(filename)) : "";
  if (fromName) return fromName;
  return (mimeType && extensionByMime[mimeType.toLowerCase()]) || "";
};

export const chunkPcm16 = (pcm: Buffer, bytesPerChunk: number): Buffer[] => {
  const chunks: Buffer[] = [];
  for (let i = 0; i < pcm.length; i += bytesPerChunk) {
    chunks.push(pcm.subarray(i, Math.min(i + bytesPerChunk, pcm.length)));
  }
  return chunks;
};

export const durationMs = (audio: CanonicalAudio): number =>
  Math.round((audio.pcm16.length / 2 / audio.sampleRate) * 1000);
