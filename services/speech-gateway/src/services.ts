import type { AppConfig } from "./config";
import { FunAsrClient } from "./modules/asr/funasr";
import type { PromptCatalog } from "./modules/summary/prompts";
import { WenxinSummarizer } from "./modules/summary/wenxin";
import { ServiceRegistry } from "./registry";

/**
 * The complete set of services this gateway offers. Adding a backend means
 * adding a line here; nothing registers itself on import.
 */
export const registerServices = (
  registry: ServiceRegistry,
  config: AppConfig,
  prompts: PromptCatalog,
): ServiceRegistry => {
  registry.asr.register("funasr", () => new FunAsrClient(config.funasr));
  registry.summary.register("wenxin", () => new WenxinSummarizer(config.wenxin, prompts));
  registry.seal();
  return registry;
};
