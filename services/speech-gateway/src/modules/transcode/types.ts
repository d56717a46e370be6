import type { CanonicalAudio } from "../../util/audio";

export interface ReadyStatus {
  ok: boolean;
  details?: Record<string, unknown>;
}

export interface Transcoder {
  ready(): Promise<ReadyStatus>;
  /** Converts an uploaded container into canonical PCM. */
  transcode(input: Buffer, extension: string): Promise<CanonicalAudio>;
}
