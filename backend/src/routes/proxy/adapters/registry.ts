import type { SupportedProvider } from "@shared";
import { BedrockRuntimeInvoker } from "@/clients/bedrock-client";
import {
  type OpenAiChatClient,
  OpenAiSdkChatClient,
} from "@/clients/openai-client";
import type { Config, ProviderDefaults } from "@/config";
import logger from "@/logging";
import type { ChatAdapter, ProviderInvoker } from "@/types";
import { routeModel } from "../model-routing";
import { BedrockAdapter } from "./bedrock";
import { BedrockToOpenAIAdapter } from "./bedrock-openai";
import { OpenAIAdapter } from "./openai";

export interface AdapterRegistryOptions {
  defaults: ProviderDefaults;
  /** Called at most once, on the first Bedrock adapter miss */
  createBedrockInvoker: () => ProviderInvoker;
  /** Called at most once, on the first OpenAI adapter miss */
  createOpenAiClient: () => OpenAiChatClient;
}

/**
 * Process-lifetime adapter cache keyed by (provider, resolved model id,
 * defaults fingerprint).
 *
 * Lookup and insert run in one synchronous section, so concurrent requests
 * for the same key cannot interleave between them; an entry, once stored,
 * is never replaced.
 */
export class AdapterRegistry {
  private readonly adapters = new Map<string, ChatAdapter>();
  private readonly reverseAdapters = new Map<string, BedrockToOpenAIAdapter>();
  private readonly options: AdapterRegistryOptions;
  private bedrockInvoker: ProviderInvoker | undefined;
  private openAiClient: OpenAiChatClient | undefined;

  constructor(options: AdapterRegistryOptions) {
    this.options = options;
  }

  get size(): number {
    return this.adapters.size + this.reverseAdapters.size;
  }

  getAdapter(modelId: string): ChatAdapter {
    const route = routeModel(modelId);
    const key = this.cacheKey(route.provider, route.modelId);

    const cached = this.adapters.get(key);
    if (cached !== undefined) {
      return cached;
    }

    const adapter = this.createAdapter(route.provider, route.modelId);
    this.adapters.set(key, adapter);
    logger.debug(
      { provider: route.provider, modelId: route.modelId },
      "[AdapterRegistry] created adapter",
    );
    return adapter;
  }

  /**
   * Reverse adapter for the model `modelId` routes to; throws for ids that
   * do not route
   */
  getReverseAdapter(modelId: string): BedrockToOpenAIAdapter {
    const route = routeModel(modelId);
    const key = this.cacheKey(route.provider, route.modelId);

    const cached = this.reverseAdapters.get(key);
    if (cached !== undefined) {
      return cached;
    }

    const adapter = new BedrockToOpenAIAdapter(route.modelId);
    this.reverseAdapters.set(key, adapter);
    return adapter;
  }

  clear(): void {
    this.adapters.clear();
    this.reverseAdapters.clear();
  }

  private cacheKey(provider: SupportedProvider, modelId: string): string {
    return `${provider}:${modelId}:${this.options.defaults.fingerprint}`;
  }

  private createAdapter(
    provider: SupportedProvider,
    modelId: string,
  ): ChatAdapter {
    switch (provider) {
      case "bedrock":
        this.bedrockInvoker ??= this.options.createBedrockInvoker();
        return new BedrockAdapter(modelId, {
          invoker: this.bedrockInvoker,
          defaults: this.options.defaults,
        });
      case "openai":
        this.openAiClient ??= this.options.createOpenAiClient();
        return new OpenAIAdapter(modelId, {
          client: this.openAiClient,
          defaults: this.options.defaults,
        });
    }
  }
}

/**
 * Registry wired to the real SDK clients
 */
export function createAdapterRegistry(
  config: Config,
  defaults: ProviderDefaults,
): AdapterRegistry {
  return new AdapterRegistry({
    defaults,
    createBedrockInvoker: () =>
      BedrockRuntimeInvoker.fromConfig(config.llm.bedrock, {
        maxAttempts: config.llm.retry.maxAttempts,
      }),
    createOpenAiClient: () =>
      OpenAiSdkChatClient.fromConfig(config.llm.openai, {
        maxRetries: config.llm.retry.maxAttempts,
      }),
  });
}
