import type {
  LLMClient,
  LLMProvider,
  LLMRequest,
  LLMServiceConfig,
  LLMServiceResult,
  LLMAttemptLog,
} from "./types";
import { LLMError, errorKindOf, errorMessageOf } from "./errors";
import { withTimeout } from "./timeout";

export class LLMService implements LLMClient {
  private config: LLMServiceConfig;

  constructor(config: LLMServiceConfig) {
    this.config = config;
  }

  async call(request: LLMRequest): Promise<LLMServiceResult> {
    const attempts: LLMAttemptLog[] = [];
    const providers: LLMProvider[] = [this.config.primaryProvider];
    if (this.config.fallbackProvider) {
      providers.push(this.config.fallbackProvider);
    }

    for (const provider of providers) {
      for (let attempt = 0; attempt < this.config.maxRetriesPerProvider; attempt++) {
        if (attempts.length > 0 && !attempts[attempts.length - 1].success) {
          await this.delay(this.config.retryDelayMs);
        }

        const start = Date.now();
        try {
          const response = await this.callProvider(provider, request);
          attempts.push({
            provider: provider.name,
            model: response.model,
            latencyMs: Date.now() - start,
            success: true,
          });
          return { response, attempts };
        } catch (error) {
          attempts.push({
            provider: provider.name,
            model: "unknown",
            latencyMs: Date.now() - start,
            success: false,
            error: errorMessageOf(error),
            errorKind: errorKindOf(error),
          });
        }
      }
    }

    const last = attempts[attempts.length - 1];
    throw new LLMError(
      `All LLM providers failed. Last error: ${last?.error ?? "Unknown error"}`,
      last?.errorKind ?? "provider"
    );
  }

  private callProvider(provider: LLMProvider, request: LLMRequest) {
    const pending = provider.call(request);
    return this.config.timeoutMs
      ? withTimeout(pending, this.config.timeoutMs, `${provider.name} call`)
      : pending;
  }

  private delay(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms));
  }
}
