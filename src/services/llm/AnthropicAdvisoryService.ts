import Anthropic from '@anthropic-ai/sdk';
import { config } from '../../config/index.js';
import { logger } from '../../utils/logger.js';
import { AdvisoryError, ConfigurationError } from '../../utils/errors.js';
import type { AdvisoryRequest, AdvisoryService } from './AdvisoryService.interface.js';

export class AnthropicAdvisoryService implements AdvisoryService {
  private client: Anthropic;

  constructor(client?: Anthropic) {
    if (!client && !config.llm.apiKey) {
      throw new ConfigurationError('Missing API key for advisory provider anthropic');
    }
    this.client = client ?? new Anthropic({ apiKey: config.llm.apiKey, maxRetries: 0 });
  }

  async testConnection(): Promise<boolean> {
    try {
      await this.client.messages.create({
        model: config.llm.model,
        max_tokens: 10,
        messages: [{ role: 'user', content: 'test' }],
      });
      return true;
    } catch {
      return false;
    }
  }

  async advise(request: AdvisoryRequest): Promise<string> {
    try {
      logger.debug({ model: config.llm.model, promptLength: request.userPrompt.length }, 'Sending coaching request to Anthropic');

      const message = await this.client.messages.create({
        model: config.llm.model,
        max_tokens: config.llm.maxTokens,
        temperature: config.llm.temperature,
        system: request.systemPrompt,
        messages: [{ role: 'user', content: request.userPrompt }],
      });

      const content = message.content[0];
      if (!content || content.type !== 'text') {
        throw new AdvisoryError('Unexpected response type from Anthropic');
      }

      return content.text;
    } catch (error) {
      if (error instanceof AdvisoryError) {
        throw error;
      }
      throw new AdvisoryError('Anthropic API error', error);
    }
  }
}
