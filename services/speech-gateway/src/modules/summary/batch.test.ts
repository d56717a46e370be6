import { describe, it, expect } from "vitest";
import { ServiceError } from "../../errors";
import { FakeSummarizer } from "../../testing/fakes";
import { summarizeBatch } from "./batch";

describe("summarizeBatch", () => {
  it("keeps order and isolates a failing item", async () => {
    const service = new FakeSummarizer("fake");
    service.failures.set("second", new ServiceError("RateLimited", "too many requests"));

    const batch = await summarizeBatch(service, ["first", "second", "third"], "brief", 50);

    expect(batch.successCount).toBe(2);
    expect(batch.items.map((i) => [i.index, i.success])).toEqual([
      [0, true],
      [1, false],
      [2, true],
    ]);
    expect(batch.items[1]).toEqual({
      index: 1,
      success: false,
      error: { kind: "RateLimited", message: "too many requests" },
    });
    const last = batch.items[2];
    if (!last?.success) throw new Error("expected the last item to succeed");
    expect(last.result.summary).toBe("summary of third");
    expect(service.calls.map((c) => c.text)).toEqual(["first", "second", "third"]);
    expect(service.calls.every((c) => c.style === "brief" && c.maxLength === 50)).toBe(true);
  });

  it("reports a rejected style on the item", async () => {
    const service = new FakeSummarizer("fake");

    const batch = await summarizeBatch(service, ["ok"], "no-such-style");

    expect(batch.successCount).toBe(0);
    expect(batch.items[0]).toEqual({
      index: 0,
      success: false,
      error: { kind: "ValidationError", message: "unsupported summary type: no-such-style" },
    });
  });
});
