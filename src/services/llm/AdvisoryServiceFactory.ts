import { config } from '../../config/index.js';
import { logger } from '../../utils/logger.js';
import type { AdvisoryService } from './AdvisoryService.interface.js';
import { OpenAIAdvisoryService } from './OpenAIAdvisoryService.js';
import { AnthropicAdvisoryService } from './AnthropicAdvisoryService.js';

export class AdvisoryServiceFactory {
  private static instance: AdvisoryService | null = null;

  static createAdvisoryService(): AdvisoryService {
    if (this.instance) {
      return this.instance;
    }

    const service = this.build();
    this.instance = service;
    return service;
  }

  private static build(): AdvisoryService {
    switch (config.llm.provider) {
      case 'openai':
        logger.info('Initializing OpenAI advisory service');
        return new OpenAIAdvisoryService();
      case 'openrouter':
        logger.info('Initializing OpenRouter advisory service');
        return new OpenAIAdvisoryService();
      case 'anthropic':
        logger.info('Initializing Anthropic advisory service');
        return new AnthropicAdvisoryService();
    }
  }

  static reset(): void {
    this.instance = null;
  }
}
