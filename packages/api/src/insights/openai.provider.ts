import type { Provider } from "@nestjs/common";
import OpenAI from "openai";
import { APP_CONFIG } from "../config/configuration";
import type { AppConfig } from "../config/configuration";

export const OPENAI_CLIENT = Symbol("OPENAI_CLIENT");

/** Resolves to null when no API key is configured. */
export const openAiProvider: Provider = {
  provide: OPENAI_CLIENT,
  inject: [APP_CONFIG],
  useFactory: (config: AppConfig): OpenAI | null =>
    config.openai.apiKey
      ? new OpenAI({
          apiKey: config.openai.apiKey,
          baseURL: config.openai.baseUrl ?? undefined,
          timeout: config.openai.timeoutMs,
          maxRetries: 1,
        })
      : null,
};
