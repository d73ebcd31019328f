/**
 * Provider Manager
 *
 * Holds the configured generation backends and fails over between them.
 * The orchestrator talks to this class as if it were a single provider.
 */

import type {
  GenerationChunk,
  GenerationOptions,
  GenerationProvider,
  GenerationResult,
  LLMMessage,
} from "./types";
import { createLogger } from "../utils/logger";
import {
  errorMessage,
  NotFoundError,
  ProviderUnavailableError,
} from "../lib/errors";

const log = createLogger("ProviderManager");

export interface ProviderStatus {
  name: string;
  model: string;
  current: boolean;
  healthy: boolean;
}

export class ProviderManager implements GenerationProvider {
  readonly name = "provider-manager";
  private providers = new Map<string, GenerationProvider>();
  private currentName: string;

  constructor(providers: GenerationProvider[]) {
    const [first] = providers;
    if (!first) {
      throw new Error("ProviderManager needs at least one provider");
    }
    for (const provider of providers) {
      this.providers.set(provider.name, provider);
    }
    this.currentName = first.name;
  }

  get model(): string {
    return this.current().model;
  }

  get currentProvider(): string {
    return this.currentName;
  }

  switchProvider(name: string): void {
    if (!this.providers.has(name)) {
      throw new NotFoundError("Provider", name);
    }
    log.info(`Switching provider: ${this.currentName} → ${name}`);
    this.currentName = name;
  }

  async generate(
    messages: LLMMessage[],
    options: GenerationOptions = {}
  ): Promise<GenerationResult> {
    const failures: string[] = [];

    for (const provider of this.failoverOrder()) {
      try {
        const result = await provider.generate(messages, options);
        this.promote(provider.name);
        return result;
      } catch (error) {
        if (options.signal?.aborted) throw error;
        failures.push(`${provider.name}: ${errorMessage(error)}`);
        log.warn(`Provider ${provider.name} failed: ${errorMessage(error)}`);
      }
    }

    throw new ProviderUnavailableError(
      `All generation providers failed (${failures.join("; ")})`,
      this.currentName,
      undefined,
      "generation"
    );
  }

  /**
   * Streams from the first provider that produces output. Once a delta has
   * been forwarded a failure is final, since the caller has already seen text.
   */
  async *generateStream(
    messages: LLMMessage[],
    options: GenerationOptions = {}
  ): AsyncGenerator<GenerationChunk> {
    const failures: string[] = [];

    for (const provider of this.failoverOrder()) {
      let forwarded = false;
      try {
        for await (const chunk of provider.generateStream(messages, options)) {
          forwarded = true;
          yield chunk;
        }
        this.promote(provider.name);
        return;
      } catch (error) {
        if (forwarded || options.signal?.aborted) throw error;
        failures.push(`${provider.name}: ${errorMessage(error)}`);
        log.warn(`Provider ${provider.name} failed to stream: ${errorMessage(error)}`);
      }
    }

    throw new ProviderUnavailableError(
      `All generation providers failed (${failures.join("; ")})`,
      this.currentName,
      undefined,
      "generation"
    );
  }

  async healthCheck(): Promise<boolean> {
    return this.current().healthCheck();
  }

  async getStatus(): Promise<ProviderStatus[]> {
    return Promise.all(
      [...this.providers.values()].map(async (provider) => ({
        name: provider.name,
        model: provider.model,
        current: provider.name === this.currentName,
        healthy: await provider.healthCheck().catch(() => false),
      }))
    );
  }

  private current(): GenerationProvider {
    const provider = this.providers.get(this.currentName);
    if (!provider) {
      throw new NotFoundError("Provider", this.currentName);
    }
    return provider;
  }

  private failoverOrder(): GenerationProvider[] {
    const current = this.current();
    return [
      current,
      ...[...this.providers.values()].filter((p) => p !== current),
    ];
  }

  private promote(name: string): void {
    if (name !== this.currentName) {
      log.info(`Failed over to provider: ${name}`);
      this.currentName = name;
    }
  }
}
