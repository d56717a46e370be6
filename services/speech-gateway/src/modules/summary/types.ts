import type { ReadyStatus } from "../transcode/types";
import type { SummaryTypeInfo } from "./prompts";

export interface SummaryInput {
  text: string;
  style: string;
  /** Falls back to the service's configured default. */
  maxLength?: number;
}

export interface SummaryResult {
  summary: string;
  style: string;
  maxLength: number;
  /** True when the output was clipped to `maxLength`. */
  truncated: boolean;
  model: string;
  originalLength: number;
  summaryLength: number;
}

export interface SummaryModule {
  readonly name: string;
  ready(): Promise<ReadyStatus>;
  summarize(input: SummaryInput): Promise<SummaryResult>;
  summaryTypes(): SummaryTypeInfo[];
  describe(): Record<string, unknown>;
}
