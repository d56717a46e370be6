import { describe, it, expect } from "vitest";
import { DEFAULT_PROMPTS_PATH } from "../../config";
import { thrown } from "../../testing/fakes";
import { PromptCatalog } from "./prompts";

const catalog = (over: Record<string, unknown> = {}) => ({
  summary_types: [
    { key: "general", name: "General", description: "everything" },
    { key: "brief", name: "Brief", description: "short" },
  ],
  summary_prompts: {
    general: { template: "Summarize{max_length_instruction}: {text}" },
    brief: { template: "Briefly{max_length_instruction}: {text}" },
  },
  max_length_instruction: " in at most {max_length} chars",
  ...over,
});

describe("PromptCatalog", () => {
  it("loads the shipped catalog", async () => {
    const prompts = await PromptCatalog.load(DEFAULT_PROMPTS_PATH);

    expect(prompts.keys()).toEqual(["general", "key_points", "brief"]);
    expect(prompts.render("brief", "Hello", 100)).toBe(
      "Give a brief overview of the main content of the following text, in no more than 100 characters:\n\nHello\n\nOverview:",
    );
    expect(prompts.render("general", "Hi")).toBe(
      "Summarize the following text, keeping the main information and key details:\n\nHi\n\nSummary:",
    );
  });

  it("inserts the text verbatim, once", () => {
    const prompts = PromptCatalog.parse(catalog());

    expect(prompts.render("general", "{max_length_instruction} $& {text}", 5)).toBe(
      "Summarize in at most 5 chars: {max_length_instruction} $& {text}",
    );
  });

  it("lists types with names and descriptions", () => {
    expect(PromptCatalog.parse(catalog()).types()).toEqual([
      { key: "general", name: "General", description: "everything" },
      { key: "brief", name: "Brief", description: "short" },
    ]);
  });

  it("rejects unknown styles with the supported list", () => {
    const prompts = PromptCatalog.parse(catalog());

    expect(thrown(() => prompts.render("poem", "x"))).toMatchObject({
      kind: "ValidationError",
      message: "unsupported summary type: poem",
      details: { supported: ["general", "brief"] },
    });
  });

  it("validates the catalog shape", () => {
    expect(() =>
      PromptCatalog.parse(catalog({ summary_prompts: { general: { template: "no slot" }, brief: { template: "{text}" } } })),
    ).toThrow("summary_prompts.general.template: template must contain {text} exactly once");

    expect(() => PromptCatalog.parse(catalog({ summary_prompts: { general: { template: "{text}" } } }))).toThrow(
      'summary_prompts.brief: no prompt template for summary type "brief"',
    );

    expect(() => PromptCatalog.parse(catalog({ max_length_instruction: "short" }))).toThrow(
      "max_length_instruction must contain {max_length}",
    );
  });
});
