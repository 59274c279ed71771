import type OpenAI from 'openai';
import { config } from '../../config/index.js';
import { logger } from '../../utils/logger.js';
import { AdvisoryError } from '../../utils/errors.js';
import type { AdvisoryRequest, AdvisoryService } from './AdvisoryService.interface.js';
import { OpenAIClientFactory } from './OpenAIClientFactory.js';

export class OpenAIAdvisoryService implements AdvisoryService {
  private client: OpenAI;

  constructor(client?: OpenAI) {
    this.client = client ?? OpenAIClientFactory.getClient();
  }

  async testConnection(): Promise<boolean> {
    try {
      await this.client.models.list();
      return true;
    } catch {
      return false;
    }
  }

  async advise(request: AdvisoryRequest): Promise<string> {
    try {
      logger.debug({ model: config.llm.model, promptLength: request.userPrompt.length }, 'Sending coaching request to OpenAI');

      const completion = await this.client.chat.completions.create({
        model: config.llm.model,
        messages: [
          { role: 'system', content: request.systemPrompt },
          { role: 'user', content: request.userPrompt },
        ],
        temperature: config.llm.temperature,
        max_tokens: config.llm.maxTokens,
        response_format: { type: 'json_object' },
      });

      const content = completion.choices[0]?.message?.content;
      if (!content) {
        throw new AdvisoryError('Empty response from OpenAI');
      }

      return content;
    } catch (error) {
      if (error instanceof AdvisoryError) {
        throw error;
      }
      throw new AdvisoryError('OpenAI API error', error);
    }
  }
}
