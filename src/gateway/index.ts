import type { AppConfig } from "../config";
import { ChatCompletionsGateway } from "./chatCompletionsGateway";
import type { ModelGateway } from "./types";

export function createGateway(config: AppConfig): ModelGateway {
  return new ChatCompletionsGateway({
    baseUrl: config.gatewayBaseUrl,
    model: config.model,
    apiKey: config.apiKey,
    timeoutMs: config.gatewayTimeoutMs,
    ignoreHttpsErrors: config.ignoreHttpsErrors,
  });
}

export * from "./chatCompletionsGateway";
export * from "./dispatcher";
export * from "./types";
