import OpenAI from 'openai';
import { config } from '../../config/index.js';
import { ConfigurationError } from '../../utils/errors.js';

export class OpenAIClientFactory {
  private static instance: OpenAI | null = null;

  static getClient(): OpenAI {
    if (this.instance) {
      return this.instance;
    }

    if (!config.llm.apiKey) {
      throw new ConfigurationError(`Missing API key for advisory provider ${config.llm.provider}`);
    }

    const clientConfig: { apiKey: string; baseURL?: string; timeout?: number; maxRetries?: number } = {
      apiKey: config.llm.apiKey,
      timeout: 60_000,
      // Retries are owned by the decision engine's bounded retry.
      maxRetries: 0,
    };

    if (config.llm.provider === 'openrouter') {
      clientConfig.baseURL = 'https://openrouter.ai/api/v1';
    }

    this.instance = new OpenAI(clientConfig);
    return this.instance;
  }

  static reset(): void {
    this.instance = null;
  }
}
