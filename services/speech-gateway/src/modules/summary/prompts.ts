import fs from "node:fs/promises";
import { z } from "zod";
import { ServiceError } from "../../errors";

const TEXT_SLOT = "{text}";
const LENGTH_SLOT = "{max_length_instruction}";

const countOccurrences = (haystack: string, needle: string) => haystack.split(needle).length - 1;

const catalogSchema = z
  .object({
    summary_types: z
      .array(
        z.object({
          key: z.string().min(1),
          name: z.string(),
          description: z.string(),
        }),
      )
      .min(1),
    summary_prompts: z.record(
      z.object({
        template: z.string().refine((t) => countOccurrences(t, TEXT_SLOT) === 1, {
          message: `template must contain ${TEXT_SLOT} exactly once`,
        }),
      }),
    ),
    max_length_instruction: z.string().refine((t) => t.includes("{max_length}"), {
      message: "max_length_instruction must contain {max_length}",
    }),
  })
  .superRefine((catalog, ctx) => {
    for (const type of catalog.summary_types) {
      if (!catalog.summary_prompts[type.key]) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["summary_prompts", type.key],
          message: `no prompt template for summary type "${type.key}"`,
        });
      }
    }
  });

export type PromptCatalogData = z.infer<typeof catalogSchema>;

export type SummaryTypeInfo = {
  key: string;
  name: string;
  description: string;
};

/** Style → prompt template table loaded from `config/prompts.json`. */
export class PromptCatalog {
  constructor(private readonly data: PromptCatalogData) {}

  static parse(raw: unknown, source = "prompt catalog"): PromptCatalog {
    const parsed = catalogSchema.safeParse(raw);
    if (!parsed.success) {
      const issues = parsed.error.errors.map((e) => `${e.path.join(".")}: ${e.message}`).join("; ");
      throw new ServiceError("ValidationError", `${source} is invalid: ${issues}`);
    }
    return new PromptCatalog(parsed.data);
  }

  static async load(path: string): Promise<PromptCatalog> {
    const raw = await fs.readFile(path, "utf8");
    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (e) {
      throw new ServiceError("ValidationError", `${path} is not valid JSON`, { cause: e });
    }
    return PromptCatalog.parse(json, path);
  }

  types(): SummaryTypeInfo[] {
    return this.data.summary_types.map((t) => ({ ...t }));
  }

  keys(): string[] {
    return this.data.summary_types.map((t) => t.key);
  }

  has(style: string): boolean {
    return this.keys().includes(style);
  }

  /**
   * Renders the style's template. The length instruction is filled in first so
   * that the user text is inserted exactly once and never re-scanned.
   */
  render(style: string, text: string, maxLength?: number): string {
    const entry = this.has(style) ? this.data.summary_prompts[style] : undefined;
    if (!entry) {
      throw new ServiceError("ValidationError", `unsupported summary type: ${style}`, {
        details: { supported: this.keys() },
      });
    }
    const instruction = maxLength
      ? this.data.max_length_instruction.replace("{max_length}", String(maxLength))
      : "";
    return entry.template.split(LENGTH_SLOT).join(instruction).replace(TEXT_SLOT, () => text);
  }
}
