import { GoogleGenAI } from '@google/genai';
import type { LlmConfig } from '../config';
import type { Logger } from './logService';
import type { GenerationLogKind } from './types';
import { sleep } from './utils';

export const DISABLED_PLACEHOLDER = '[LLM-GENERATED-CONTENT]';
export const ERROR_PLACEHOLDER = '[LLM-ERROR]';

export type CompletionOptions = {
  maxTokens?: number;
  temperature?: number;
  systemPrompt?: string;
};

export type TextServiceStats = {
  callCount: number;
  totalTokens: number;
};

export type TextServiceEvents = (
  kind: Extract<GenerationLogKind, 'llm_request' | 'llm_error'>,
  payload: Record<string, unknown>
) => Promise<void>;

/**
 * Short-form text completion. Without an API key every call returns
 * `DISABLED_PLACEHOLDER`; a failed call returns `ERROR_PLACEHOLDER`.
 */
export class TextService {
  private readonly ai: GoogleGenAI | null;
  private callCount = 0;
  private totalTokens = 0;

  constructor(
    private readonly config: LlmConfig,
    private readonly logger: Logger,
    private readonly onEvent?: TextServiceEvents
  ) {
    this.ai = config.apiKey ? new GoogleGenAI({ apiKey: config.apiKey }) : null;
    if (!this.ai) {
      logger.warn('No API key provided; text completion is disabled.');
    }
  }

  get enabled() {
    return this.ai !== null;
  }

  async complete(prompt: string, options: CompletionOptions = {}): Promise<string> {
    if (!this.ai) return DISABLED_PLACEHOLDER;

    const model = this.config.model;
    let text: string;
    let tokens: number;
    try {
      const response = await this.ai.models.generateContent({
        model,
        contents: prompt,
        config: {
          systemInstruction: options.systemPrompt,
          temperature: options.temperature ?? this.config.temperature,
          maxOutputTokens: options.maxTokens ?? this.config.maxTokens,
        },
      });
      text = (response.text ?? '').trim();
      tokens = response.usageMetadata?.totalTokenCount ?? 0;
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.logger.error(`Completion failed: ${message}`);
      await this.onEvent?.('llm_error', { model, message });
      return ERROR_PLACEHOLDER;
    }

    this.callCount += 1;
    this.totalTokens += tokens;
    await this.onEvent?.('llm_request', { model, tokens, characters: text.length });
    return text;
  }

  /** Runs prompts one after another, pausing `batchDelayMs` between live calls. */
  async completeBatch(prompts: string[], options: CompletionOptions = {}): Promise<string[]> {
    const results: string[] = [];
    for (const [index, prompt] of prompts.entries()) {
      if (index > 0 && this.enabled && this.config.batchDelayMs > 0) {
        await sleep(this.config.batchDelayMs);
      }
      results.push(await this.complete(prompt, options));
    }
    return results;
  }

  getStats(): TextServiceStats {
    return { callCount: this.callCount, totalTokens: this.totalTokens };
  }
}
