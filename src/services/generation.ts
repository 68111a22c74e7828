/**
 * Generation client
 * Sends the assembled prompt to an OpenAI-compatible chat endpoint
 */

import OpenAI from 'openai';
import { GenerationConfig } from '../config.js';
import { GenerationResult } from '../types/index.js';
import { Logger, createLogger, describeError } from '../utils/logger.js';

export interface GenerationClient {
  generate(prompt: string, numPredict: number, ownerKey: string): Promise<GenerationResult>;
}

export function buildSystemPrompt(tone: string, ownerKey: string): string {
  return [
    `You are a ${tone} commentator for the game server "${ownerKey}".`,
    'Summarize the new events below as a short piece of commentary.',
    'Refer to players by name and never repeat earlier commentary word for word.'
  ].join(' ');
}

export class OpenAIGenerationClient implements GenerationClient {
  private openai: OpenAI;

  constructor(
    private readonly config: GenerationConfig,
    private readonly logger: Logger = createLogger('generation')
  ) {
    this.openai = new OpenAI({
      apiKey: config.apiKey,
      baseURL: config.baseURL
    });
  }

  async generate(prompt: string, numPredict: number, ownerKey: string): Promise<GenerationResult> {
    try {
      const response = await this.openai.chat.completions.create({
        model: this.config.model,
        messages: [
          { role: 'system', content: buildSystemPrompt(this.config.tone, ownerKey) },
          { role: 'user', content: prompt }
        ],
        temperature: this.config.temperature,
        max_tokens: numPredict
      });

      const text = response.choices[0]?.message?.content?.trim();
      if (!text) {
        return { ok: false, error: 'Generator returned an empty response' };
      }

      this.logger.debug(`Generated ${text.length} characters for ${ownerKey} (limit ${numPredict} tokens)`);
      return { ok: true, text };
    } catch (error) {
      this.logger.error(`Generation failed for ${ownerKey}: ${describeError(error)}`);
      return { ok: false, error: describeError(error) };
    }
  }
}
