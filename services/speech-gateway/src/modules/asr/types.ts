import type { RecognitionMode } from "../../config";
import type { CanonicalAudio } from "../../util/audio";
import type { ReadyStatus } from "../transcode/types";

export interface RecognitionParams {
  host: string;
  port: number;
  useSsl: boolean;
  mode: RecognitionMode;
  chunkSize: [number, number, number];
  chunkInterval: number;
  /** Name echoed back by the server; defaults to a generated id. */
  wavName?: string;
}

export interface AsrResult {
  text: string;
  mode: RecognitionMode;
  /** Fragments in receipt order. */
  fragments: string[];
}

export interface AsrModule {
  readonly name: string;
  ready(): Promise<ReadyStatus>;
  recognize(audio: CanonicalAudio, params?: Partial<RecognitionParams>): Promise<AsrResult>;
  describe(): Record<string, unknown>;
}
