import { describe, it, expect } from "vitest";
import { loadConfig } from "./config";
import { FunAsrClient } from "./modules/asr/funasr";
import { WenxinSummarizer } from "./modules/summary/wenxin";
import { ServiceRegistry } from "./registry";
import { registerServices } from "./services";
import { testPrompts } from "./testing/fakes";

describe("registerServices", () => {
  it("registers the built-in backends and seals the registry", () => {
    const registry = registerServices(new ServiceRegistry(), loadConfig({}), testPrompts());

    expect(registry.asr.names()).toEqual(["funasr"]);
    expect(registry.summary.names()).toEqual(["wenxin"]);
    expect(registry.asr.resolve("funasr")).toBeInstanceOf(FunAsrClient);
    expect(registry.summary.resolve("wenxin")).toBeInstanceOf(WenxinSummarizer);
    expect(() => registry.asr.register("other", () => new FunAsrClient(loadConfig({}).funasr))).toThrow(
      'registry is sealed; cannot register asr service "other"',
    );
  });
});
