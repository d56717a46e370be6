import { errorBody, toServiceError, type ErrorBody } from "../../errors";
import { log } from "../../util/log";
import type { SummaryModule, SummaryResult } from "./types";

export type BatchSummaryItem =
  | { index: number; success: true; result: SummaryResult }
  | { index: number; success: false; error: ErrorBody };

export interface BatchSummary {
  items: BatchSummaryItem[];
  successCount: number;
}

/**
 * Summarizes each text on its own, one after another. A failing item is
 * reported in place and does not stop the rest.
 */
export const summarizeBatch = async (
  service: SummaryModule,
  texts: string[],
  style: string,
  maxLength?: number,
): Promise<BatchSummary> => {
  const items: BatchSummaryItem[] = [];
  for (const [index, text] of texts.entries()) {
    try {
      const result = await service.summarize({ text, style, maxLength });
      items.push({ index, success: true, result });
    } catch (e) {
      const err = toServiceError(e);
      log.warn("batch item failed", { index, kind: err.kind, err: err.message });
      items.push({ index, success: false, error: errorBody(err) });
    }
  }
  const successCount = items.filter((i) => i.success).length;
  log.info("batch summarized", { total: items.length, successCount });
  return { items, successCount };
};
