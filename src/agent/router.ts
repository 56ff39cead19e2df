import type { Logger } from "../log.js";
import { ProviderNotRegisteredError } from "./provider-errors.js";
import type { CompletionRequest, LLMResponse, ProviderAdapter, ProviderName } from "./types.js";

/**
 * LLM Router - name → adapter map with a default provider
 */
export class LLMRouter implements ProviderAdapter {
  readonly defaultProvider: ProviderName;
  private readonly providers: Map<ProviderName, ProviderAdapter> = new Map();
  private readonly logger: Logger;

  constructor(params: { defaultProvider: ProviderName; logger: Logger }) {
    this.defaultProvider = params.defaultProvider;
    this.logger = params.logger.child({ component: "router" });
  }

  /**
   * Register an adapter. A second registration under the same name replaces
   * the first.
   */
  registerProvider(name: ProviderName, adapter: ProviderAdapter): void {
    if (this.providers.has(name)) {
      this.logger.debug({ provider: name }, "Provider already registered, replacing");
    }
    this.providers.set(name, adapter);
  }

  has(name: ProviderName): boolean {
    return this.providers.has(name);
  }

  providerNames(): ProviderName[] {
    return Array.from(this.providers.keys());
  }

  /**
   * Forward the request to the selected adapter, unmodified both ways.
   */
  async complete(request: CompletionRequest, signal?: AbortSignal): Promise<LLMResponse> {
    const name = request.provider || this.defaultProvider;
    const adapter = this.providers.get(name);
    if (!adapter) {
      throw new ProviderNotRegisteredError(name);
    }
    return adapter.complete(request, signal);
  }
}
