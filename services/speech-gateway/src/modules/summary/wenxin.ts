import { z } from "zod";
import type { WenxinConfig } from "../../config";
import { ServiceError } from "../../errors";
import { errMessage, log } from "../../util/log";
import { withRetry } from "../../util/retry";
import type { ReadyStatus } from "../transcode/types";
import type { PromptCatalog, SummaryTypeInfo } from "./prompts";
import type { SummaryInput, SummaryModule, SummaryResult } from "./types";

export type FetchFn = (url: string, init: RequestInit) => Promise<Response>;

/** Chat endpoint per model name on the wenxinworkshop API. */
export const MODEL_ENDPOINTS: Record<string, string> = {
  "ERNIE-Bot": "completions",
  "ERNIE-Bot-turbo": "eb-instant",
  "ERNIE-Bot-4": "completions_pro",
  "ERNIE-Speed-8K": "ernie_speed",
  "ERNIE-Speed-128K": "ernie-speed-128k",
  "ERNIE-Lite-8K": "ernie-lite-8k",
};

const AUTH_ERROR_CODES = new Set([13, 14, 15, 110, 111]);
const RATE_LIMIT_CODES = new Set([4, 17, 18, 336501, 336502]);

// refresh a minute before the server-side expiry
const TOKEN_EXPIRY_SLACK_MS = 60_000;

const tokenSchema = z.object({ access_token: z.string().min(1), expires_in: z.number() });
const tokenErrorSchema = z.object({ error: z.string(), error_description: z.string().optional() });
const chatSchema = z.object({ result: z.string(), is_truncated: z.boolean().optional() });
const chatErrorSchema = z.object({ error_code: z.number(), error_msg: z.string().optional() });

interface WenxinDeps {
  fetch?: FetchFn;
  sleep?: (ms: number) => Promise<void>;
  now?: () => number;
}

const isTimeout = (e: unknown) => typeof e === "object" && e !== null && "name" in e && e.name === "TimeoutError";

export class WenxinSummarizer implements SummaryModule {
  readonly name = "wenxin";
  private readonly fetchFn: FetchFn;
  private readonly now: () => number;
  private token: { value: string; expiresAt: number } | null = null;

  constructor(
    private readonly config: WenxinConfig,
    private readonly prompts: PromptCatalog,
    private readonly deps: WenxinDeps = {},
  ) {
    this.fetchFn = deps.fetch ?? ((url, init) => fetch(url, init));
    this.now = deps.now ?? Date.now;
  }

  get endpoint(): string {
    return MODEL_ENDPOINTS[this.config.model] ?? this.config.model.toLowerCase();
  }

  summaryTypes(): SummaryTypeInfo[] {
    return this.prompts.types();
  }

  describe(): Record<string, unknown> {
    return {
      service_name: "Baidu Wenxin",
      model: this.config.model,
      endpoint: this.endpoint,
      temperature: this.config.temperature,
      top_p: this.config.topP,
      penalty_score: this.config.penaltyScore,
      max_length: this.config.maxLength,
      supported_models: Object.keys(MODEL_ENDPOINTS),
      supported_types: this.prompts.keys(),
    };
  }

  async ready(): Promise<ReadyStatus> {
    const details = { model: this.config.model, endpoint: this.endpoint };
    try {
      await this.accessToken();
      return { ok: true, details };
    } catch (e) {
      return { ok: false, details: { ...details, error: errMessage(e) } };
    }
  }

  async summarize(input: SummaryInput): Promise<SummaryResult> {
    const text = input.text;
    if (!text.trim()) {
      throw new ServiceError("ValidationError", "text to summarize is empty");
    }
    const maxLength = input.maxLength ?? this.config.maxLength;
    const prompt = this.prompts.render(input.style, text, maxLength);

    const started = this.now();
    const output = await withRetry(() => this.complete(prompt), {
      label: "wenxin.summarize",
      retries: this.config.maxRetries,
      baseDelayMs: this.config.retryBaseMs,
      factor: 2,
      maxDelayMs: this.config.retryMaxMs,
      sleep: this.deps.sleep,
    });

    // lengths count code points, the unit maxLength is given in
    const chars = Array.from(output.trim());
    const truncated = chars.length > maxLength;
    const kept = truncated ? chars.slice(0, maxLength) : chars;
    const summary = kept.join("");
    const originalLength = Array.from(text).length;

    log.info("text summarized", {
      style: input.style,
      model: this.config.model,
      originalLength,
      summaryLength: kept.length,
      truncated,
      elapsedMs: this.now() - started,
    });

    return {
      summary,
      style: input.style,
      maxLength,
      truncated,
      model: this.config.model,
      originalLength,
      summaryLength: kept.length,
    };
  }

  private async post(url: URL, body?: unknown): Promise<{ status: number; json: unknown }> {
    let res: Response;
    try {
      res = await this.fetchFn(url.toString(), {
        method: "POST",
        headers: { "Content-Type": "application/json" },
        body: body === undefined ? undefined : JSON.stringify(body),
        signal: AbortSignal.timeout(this.config.timeoutMs),
      });
    } catch (e) {
      if (isTimeout(e)) {
        throw new ServiceError("Timeout", `${url.pathname} timed out after ${this.config.timeoutMs}ms`, { cause: e });
      }
      throw new ServiceError("ConnectionFailed", `${url.host} unreachable: ${errMessage(e)}`, { cause: e });
    }

    const raw = await res.text();
    if (res.status === 429) throw new ServiceError("RateLimited", `${url.pathname} rate limited (429)`);
    if (res.status >= 500) {
      throw new ServiceError("UpstreamError", `${url.pathname} failed with ${res.status}`, {
        details: { body: raw.slice(0, 300) },
      });
    }
    if (res.status === 401 || res.status === 403) {
      this.token = null;
      throw new ServiceError("AuthError", `${url.pathname} rejected credentials (${res.status})`);
    }

    try {
      return { status: res.status, json: JSON.parse(raw) };
    } catch (e) {
      throw new ServiceError("ParseError", `${url.pathname} returned a non-JSON body (${res.status})`, {
        cause: e,
        details: { body: raw.slice(0, 300) },
      });
    }
  }

  private async accessToken(): Promise<string> {
    if (this.token && this.now() < this.token.expiresAt) return this.token.value;

    const { apiKey, secretKey } = this.config;
    if (!apiKey || !secretKey) {
      throw new ServiceError("AuthError", "BAIDU_API_KEY and BAIDU_SECRET_KEY must be set");
    }

    const url = new URL("/oauth/2.0/token", this.config.baseUrl);
    url.searchParams.set("grant_type", "client_credentials");
    url.searchParams.set("client_id", apiKey);
    url.searchParams.set("client_secret", secretKey);

    const { json } = await this.post(url);
    const ok = tokenSchema.safeParse(json);
    if (ok.success) {
      this.token = {
        value: ok.data.access_token,
        expiresAt: this.now() + ok.data.expires_in * 1000 - TOKEN_EXPIRY_SLACK_MS,
      };
      return ok.data.access_token;
    }
    const failed = tokenErrorSchema.safeParse(json);
    if (failed.success) {
      throw new ServiceError("AuthError", `token request refused: ${failed.data.error_description ?? failed.data.error}`);
    }
    throw new ServiceError("ParseError", "token response has no access_token");
  }

  private async complete(prompt: string): Promise<string> {
    const token = await this.accessToken();
    const url = new URL(`/rpc/2.0/ai_custom/v1/wenxinworkshop/chat/${this.endpoint}`, this.config.baseUrl);
    url.searchParams.set("access_token", token);

    const { json } = await this.post(url, {
      messages: [{ role: "user", content: prompt }],
      temperature: this.config.temperature,
      top_p: this.config.topP,
      penalty_score: this.config.penaltyScore,
    });

    const ok = chatSchema.safeParse(json);
    if (ok.success) return ok.data.result;

    const failed = chatErrorSchema.safeParse(json);
    if (!failed.success) {
      throw new ServiceError("ParseError", "chat response has neither result nor error_code");
    }
    const { error_code: code, error_msg: msg = "unknown error" } = failed.data;
    if (AUTH_ERROR_CODES.has(code)) {
      this.token = null;
      throw new ServiceError("AuthError", `wenxin auth error ${code}: ${msg}`);
    }
    if (RATE_LIMIT_CODES.has(code)) {
      throw new ServiceError("RateLimited", `wenxin rate limit ${code}: ${msg}`);
    }
    throw new ServiceError("UpstreamError", `wenxin error ${code}: ${msg}`, { details: { code } });
  }
}
